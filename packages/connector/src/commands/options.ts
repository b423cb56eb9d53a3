import { InvalidArgumentError } from "commander";

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return parsed;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

import pino from "pino";

export type CapturedLog = {
  level: number;
  msg?: string;
  module?: string;
  [key: string]: unknown;
};

/** A real pino logger writing parsed records into memory. */
export function createCaptureLogger() {
  const records: CapturedLog[] = [];
  const logger = pino(
    { level: "trace" },
    {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    }
  );

  return {
    logger,
    records,
    messages(): string[] {
      return records.flatMap((record) => (record.msg ? [record.msg] : []));
    },
    has(msg: string): boolean {
      return records.some((record) => record.msg === msg);
    },
    find(msg: string): CapturedLog | undefined {
      return records.find((record) => record.msg === msg);
    },
  };
}

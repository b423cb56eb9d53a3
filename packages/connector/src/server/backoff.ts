export type ReconnectPolicy = {
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
  /** How long a connection must stay active before the attempt counter resets. */
  stableAfterMs: number;
};

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  baseDelayMs: 1_000,
  maxDelayMs: 60_000,
  factor: 2,
  stableAfterMs: 60_000,
};

/** Upper bound of the jitter window for a zero-based attempt. */
export function reconnectCeilingMs(attempt: number, policy: ReconnectPolicy): number {
  const exponent = Math.max(0, Math.floor(attempt));
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * policy.factor ** exponent);
}

/**
 * Full jitter: a uniform draw from [0, ceiling). `random` must return values in [0, 1).
 */
export function computeReconnectDelay(
  attempt: number,
  policy: ReconnectPolicy = DEFAULT_RECONNECT_POLICY,
  random: () => number = Math.random
): number {
  return Math.floor(random() * reconnectCeilingMs(attempt, policy));
}

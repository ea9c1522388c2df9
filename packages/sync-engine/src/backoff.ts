export type BackoffPolicy = Readonly<{
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
  /** Fraction of the delay added or removed at random; 0 disables jitter. */
  jitterRatio: number;
}>;

const applyJitter = (
  value: number,
  jitterRatio: number,
  random: () => number
): number => {
  if (jitterRatio <= 0) return value;
  const spread = (random() * 2 - 1) * jitterRatio;
  return Math.round(value * (1 + spread));
};

/**
 * Delay before retry number `attempt` (0-based):
 * `min(base * factor^attempt, max)`, jittered, never above `max`.
 */
export const computeBackoffDelay = (
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random
): number => {
  const exponent = Math.max(0, attempt);
  const raw = policy.baseDelayMs * policy.factor ** exponent;
  const capped = Math.min(raw, policy.maxDelayMs);
  const jittered = applyJitter(capped, policy.jitterRatio, random);
  return Math.min(Math.max(jittered, 0), policy.maxDelayMs);
};

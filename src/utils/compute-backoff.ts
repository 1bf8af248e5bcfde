/**
 * Exponential retry delay: `base * 2^retryCount`, never above `maxDelayMs`.
 */
export function computeBackoffMs(
  retryCount: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  const exponent = Math.max(0, retryCount);
  return Math.min(baseDelayMs * 2 ** exponent, maxDelayMs);
}

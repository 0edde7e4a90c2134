import type { BackoffOptions } from './config.js';

/**
 * Reconnect delay for the given consecutive failure count (1-based).
 *
 * Grows as base * 2^(attempt-1) up to maxDelayMs, then applies a random
 * offset of up to ±jitter of that value and clamps to [0, maxDelayMs].
 * `random` must return a value in [0, 1).
 */
export function computeBackoffDelay(
  attempt: number,
  opts: Pick<BackoffOptions, 'baseDelayMs' | 'maxDelayMs' | 'jitter'>,
  random: () => number = Math.random,
): number {
  const exp = Math.pow(2, Math.max(0, attempt - 1));
  const nominal = Math.min(opts.baseDelayMs * exp, opts.maxDelayMs);
  if (opts.jitter <= 0) return nominal;

  const offset = nominal * opts.jitter * (random() * 2 - 1);
  return Math.round(Math.min(Math.max(nominal + offset, 0), opts.maxDelayMs));
}

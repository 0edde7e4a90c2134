import pino, { type Logger } from 'pino';
import type { BackoffOptions } from '../src/config.js';

export const silent: Logger = pino({ level: 'silent' });

// Fixed delays: base doubling with no jitter
export const NO_JITTER: BackoffOptions = {
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  jitter: 0,
  maxAttempts: 0,
};

/** Lets chained promise callbacks run without advancing fake timers. */
export async function flushMicrotasks(rounds = 50): Promise<void> {
  for (let i = 0; i < rounds; i++) await Promise.resolve();
}

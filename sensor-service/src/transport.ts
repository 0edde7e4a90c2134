import type { AsyncQueue } from './queue.js';

export type TransportEvent =
  | { kind: 'connected'; session: number }
  | { kind: 'disconnected'; session: number; reason: string }
  | { kind: 'message'; topic: string; payload: string };

/**
 * Capability set the agent needs from a publish/subscribe session.
 *
 * Lifecycle notifications and inbound messages are never delivered by
 * callback; they are pushed onto `events` and drained by the agent.
 */
export interface Transport {
  readonly events: AsyncQueue<TransportEvent>;

  /** Opens a new session. Resolves with its session number once the broker accepts it. */
  connect(): Promise<number>;

  subscribe(topics: string[]): Promise<void>;

  /** Rejects when not connected or when the broker round trip fails. */
  publish(topic: string, payload: string): Promise<void>;

  /** Ends the current session, if any. Safe to call repeatedly. */
  close(): Promise<void>;
}

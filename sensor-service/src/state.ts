import { ValidationError } from './errors.js';
import { MAX_TIMER_MS } from './timers.js';

/* -------------------------------------------------------------------------- */
/*  Runtime configuration                                                     */
/* -------------------------------------------------------------------------- */

export interface RuntimeSettings {
  /** Seconds between publishes; an integer from 1 to MAX_INTERVAL_S. */
  interval: number;
  enabled: boolean;
  firmwareVersion: string;
}

export const MAX_INTERVAL_S = Math.floor(MAX_TIMER_MS / 1000);

export const DEFAULT_SETTINGS: Readonly<RuntimeSettings> = Object.freeze({
  interval: 5,
  enabled: true,
  firmwareVersion: '1.0',
});

/**
 * Remotely updatable configuration shared by the attribute handler (writer)
 * and the publish loop (reader).
 *
 * Every write is a single synchronous assignment, so readers see either the
 * previous or the next value of a field. Fields change independently; there
 * is no multi-field transaction.
 */
export class RuntimeConfig {
  private settings: RuntimeSettings;

  constructor(initial: Partial<RuntimeSettings> = {}) {
    this.settings = { ...DEFAULT_SETTINGS };
    if (initial.interval !== undefined) this.setInterval(initial.interval);
    if (initial.enabled !== undefined) this.setEnabled(initial.enabled);
    if (initial.firmwareVersion !== undefined) this.setFirmwareVersion(initial.firmwareVersion);
  }

  get interval(): number {
    return this.settings.interval;
  }

  get enabled(): boolean {
    return this.settings.enabled;
  }

  get firmwareVersion(): string {
    return this.settings.firmwareVersion;
  }

  snapshot(): Readonly<RuntimeSettings> {
    return Object.freeze({ ...this.settings });
  }

  setInterval(seconds: number): void {
    if (!Number.isInteger(seconds) || seconds < 1 || seconds > MAX_INTERVAL_S) {
      throw new ValidationError(`interval must be an integer from 1 to ${MAX_INTERVAL_S}, got ${seconds}`);
    }
    this.settings = { ...this.settings, interval: seconds };
  }

  setEnabled(enabled: boolean): void {
    this.settings = { ...this.settings, enabled };
  }

  setFirmwareVersion(version: string): void {
    this.settings = { ...this.settings, firmwareVersion: version };
  }
}

/* -------------------------------------------------------------------------- */
/*  Connection state                                                          */
/* -------------------------------------------------------------------------- */

export type ConnectionState =
  | { phase: 'disconnected'; cause: 'never-connected' | 'lost' }
  | { phase: 'connecting' }
  | { phase: 'connected'; session: number }
  | { phase: 'stopped' };

/**
 * Owned by the supervisor (writer); the publish loop only asks isConnected().
 * 'stopped' is terminal and absorbs every later transition.
 */
export class ConnectionTracker {
  private current: ConnectionState = { phase: 'disconnected', cause: 'never-connected' };
  private retries = 0;

  get state(): ConnectionState {
    return this.current;
  }

  get retryCount(): number {
    return this.retries;
  }

  isConnected(): boolean {
    return this.current.phase === 'connected';
  }

  isStopped(): boolean {
    return this.current.phase === 'stopped';
  }

  markConnecting(): void {
    if (this.isStopped()) return;
    this.current = { phase: 'connecting' };
  }

  markConnected(session: number): void {
    if (this.isStopped()) return;
    this.current = { phase: 'connected', session };
    this.retries = 0;
  }

  /** Records a failed attempt or an unexpected drop; returns the new retry count. */
  markLost(): number {
    if (this.isStopped()) return this.retries;
    this.current = { phase: 'disconnected', cause: 'lost' };
    this.retries += 1;
    return this.retries;
  }

  markStopped(): void {
    this.current = { phase: 'stopped' };
  }
}

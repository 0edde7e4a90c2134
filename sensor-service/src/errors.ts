/**
 * Error taxonomy for the sensor service.
 *
 * - TransportError: connect/subscribe/publish failures. Retried or skipped, never fatal.
 * - ValidationError: an invariant on runtime state would be broken; the write is refused.
 * - ConfigurationError: startup configuration is unusable; the process exits non-zero.
 */

export class TransportError extends Error {
  readonly reasonCode?: number;

  constructor(message: string, reasonCode?: number) {
    super(message);
    this.name = 'TransportError';
    this.reasonCode = reasonCode;
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

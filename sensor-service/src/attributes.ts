import { ValidationError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { MAX_INTERVAL_S, type RuntimeConfig } from './state.js';
import { ATTRIBUTE_KEYS, type AttributeKey } from './topics.js';

export type AttributeChange =
  | { key: 'interval'; previous: number; next: number }
  | { key: 'enabled'; previous: boolean; next: boolean }
  | { key: 'firmware_version'; previous: string; next: string };

type Json = Record<string, unknown>;

const TRUE_WORDS = new Set(['true', '1', 'yes', 'on']);
const FALSE_WORDS = new Set(['false', '0', 'no', 'off']);

/* -------------------------------------------------------------------------- */
/*  Field coercion                                                            */
/* -------------------------------------------------------------------------- */

/** Whole seconds in 1..MAX_INTERVAL_S, or null when the value cannot be one. */
export function coerceInterval(value: unknown): number | null {
  let n: number;
  if (typeof value === 'number') n = value;
  else if (typeof value === 'string' && value.trim() !== '') n = Number(value.trim());
  else return null;
  if (!Number.isFinite(n)) return null;
  const seconds = Math.trunc(n);
  return seconds >= 1 && seconds <= MAX_INTERVAL_S ? seconds : null;
}

export function coerceEnabled(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value;
  if (value === 1) return true;
  if (value === 0) return false;
  if (typeof value === 'string') {
    const word = value.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return true;
    if (FALSE_WORDS.has(word)) return false;
  }
  return null;
}

export function coerceFirmwareVersion(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return null;
}

function isJsonObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Snapshot responses wrap shared attributes as {"shared": {...}}; push updates
 * are flat. Both are merged the same way.
 */
export function extractAttributes(body: Json): Json {
  return isJsonObject(body.shared) ? body.shared : body;
}

/* -------------------------------------------------------------------------- */
/*  Handler                                                                   */
/* -------------------------------------------------------------------------- */

/**
 * Applies inbound attribute payloads to the runtime config field by field.
 * A bad field is skipped and logged; the rest of the payload still applies.
 * Never throws and never touches the network.
 */
export class AttributeUpdateHandler {
  constructor(
    private readonly config: RuntimeConfig,
    private readonly logger: Logger,
  ) {}

  handleMessage(topic: string, payload: string): AttributeChange[] {
    let body: unknown;
    try {
      body = JSON.parse(payload);
    } catch (e) {
      this.logger.warn({ topic, err: errorMessage(e) }, 'ignoring attribute payload that is not valid JSON');
      return [];
    }
    if (!isJsonObject(body)) {
      this.logger.warn({ topic }, 'ignoring attribute payload that is not a JSON object');
      return [];
    }
    this.logger.info({ topic, payload: body }, 'received attribute message');
    return this.apply(extractAttributes(body));
  }

  apply(attributes: Json): AttributeChange[] {
    const present = ATTRIBUTE_KEYS.filter((k) => Object.prototype.hasOwnProperty.call(attributes, k));
    if (present.length === 0) {
      this.logger.debug({ keys: Object.keys(attributes) }, 'attribute update has no recognized keys');
      return [];
    }

    const changes: AttributeChange[] = [];
    for (const key of present) {
      const change = this.applyField(key, attributes[key]);
      if (change) changes.push(change);
    }

    if (changes.some((c) => c.key === 'firmware_version')) this.simulateOta();
    return changes;
  }

  private applyField(key: AttributeKey, raw: unknown): AttributeChange | null {
    try {
      switch (key) {
        case 'interval': {
          const next = coerceInterval(raw);
          if (next === null) return this.reject(key, raw, `expected an integer from 1 to ${MAX_INTERVAL_S}`);
          const previous = this.config.interval;
          this.config.setInterval(next);
          return this.record({ key, previous, next });
        }
        case 'enabled': {
          const next = coerceEnabled(raw);
          if (next === null) return this.reject(key, raw, 'expected a boolean');
          const previous = this.config.enabled;
          this.config.setEnabled(next);
          return this.record({ key, previous, next });
        }
        case 'firmware_version': {
          const next = coerceFirmwareVersion(raw);
          if (next === null) return this.reject(key, raw, 'expected a string');
          const previous = this.config.firmwareVersion;
          this.config.setFirmwareVersion(next);
          return this.record({ key, previous, next });
        }
      }
    } catch (e) {
      if (e instanceof ValidationError) return this.reject(key, raw, e.message);
      throw e;
    }
  }

  private reject(key: AttributeKey, value: unknown, reason: string): null {
    this.logger.warn({ key, value, reason }, `rejected ${key} update, keeping previous value`);
    return null;
  }

  private record(change: AttributeChange): AttributeChange | null {
    if (change.previous === change.next) {
      this.logger.debug({ key: change.key, value: change.next }, `${change.key} unchanged`);
      return null;
    }
    this.logger.info({ key: change.key, previous: change.previous, next: change.next }, `updated ${change.key}`);
    return change;
  }

  private simulateOta(): void {
    this.logger.info({ firmwareVersion: this.config.firmwareVersion }, `simulating OTA update to firmware v${this.config.firmwareVersion}`);
    this.logger.info('OTA simulation completed');
  }
}

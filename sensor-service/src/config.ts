// Service configuration and typed environment access
import { ConfigurationError } from './errors.js';
import { MAX_TIMER_MS } from './timers.js';

export const SERVICE = 'sensor-service';

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the delay applied as +/- random jitter (0.2 = ±20%). */
  jitter: number;
  /** 0 means retry forever. */
  maxAttempts: number;
}

export interface AgentConfig {
  mqttUrl: string;
  accessToken: string;
  deviceName: string;
  tls: {
    ca?: string;
    cert?: string;
    key?: string;
    rejectUnauthorized: boolean;
  };
  keepaliveSec: number;
  connectTimeoutMs: number;
  publishTimeoutMs: number;
  backoff: BackoffOptions;
  disabledPollMs: number;
  shutdownGraceMs: number;
  log: {
    level: LogLevel;
    file: string;
    pretty: boolean;
  };
}

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

type Env = Record<string, string | undefined>;

function readLogLevel(env: Env): LogLevel {
  const raw = (env.LOG_LEVEL || 'info').toLowerCase();
  const level = LOG_LEVELS.find((l) => l === raw);
  if (!level) throw new ConfigurationError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  return level;
}

function readNumber(env: Env, name: string, fallback: number, opts: { min: number; integer?: boolean; max?: number }): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
  if (opts.integer && !Number.isInteger(value)) throw new ConfigurationError(`${name} must be an integer, got "${raw}"`);
  if (value < opts.min) throw new ConfigurationError(`${name} must be >= ${opts.min}, got ${value}`);
  if (opts.max !== undefined && value > opts.max) throw new ConfigurationError(`${name} must be <= ${opts.max}, got ${value}`);
  return value;
}

export function loadConfig(env: Env = process.env): AgentConfig {
  const accessToken = env.DEVICE_ACCESS_TOKEN?.trim();
  if (!accessToken) {
    throw new ConfigurationError('DEVICE_ACCESS_TOKEN is required');
  }

  const baseDelayMs = readNumber(env, 'RECONNECT_BASE_MS', 1000, { min: 1, max: MAX_TIMER_MS });
  const maxDelayMs = readNumber(env, 'RECONNECT_MAX_MS', 60000, { min: 1, max: MAX_TIMER_MS });
  if (maxDelayMs < baseDelayMs) {
    throw new ConfigurationError(`RECONNECT_MAX_MS (${maxDelayMs}) must not be below RECONNECT_BASE_MS (${baseDelayMs})`);
  }

  return {
    mqttUrl: env.MQTT_URL || 'mqtt://eu.thingsboard.cloud:1883',
    accessToken,
    deviceName: env.DEVICE_NAME || 'VirtualSensor01',
    tls: {
      ca: env.MQTT_TLS_CA || undefined,
      cert: env.MQTT_TLS_CERT || undefined,
      key: env.MQTT_TLS_KEY || undefined,
      rejectUnauthorized: (env.MQTT_TLS_REJECT_UNAUTHORIZED ?? 'true') !== 'false',
    },
    keepaliveSec: readNumber(env, 'MQTT_KEEPALIVE_S', 60, { min: 0, integer: true, max: 65535 }),
    connectTimeoutMs: readNumber(env, 'MQTT_CONNECT_TIMEOUT_MS', 30000, { min: 1, max: MAX_TIMER_MS }),
    publishTimeoutMs: readNumber(env, 'PUBLISH_TIMEOUT_MS', 10000, { min: 1, max: MAX_TIMER_MS }),
    backoff: {
      baseDelayMs,
      maxDelayMs,
      jitter: readNumber(env, 'RECONNECT_JITTER', 0.2, { min: 0, max: 1 }),
      maxAttempts: readNumber(env, 'RECONNECT_MAX_ATTEMPTS', 0, { min: 0, integer: true }),
    },
    disabledPollMs: readNumber(env, 'DISABLED_POLL_MS', 1000, { min: 1, max: MAX_TIMER_MS }),
    shutdownGraceMs: readNumber(env, 'SHUTDOWN_GRACE_MS', 5000, { min: 0, max: MAX_TIMER_MS }),
    log: {
      level: readLogLevel(env),
      file: env.LOG_FILE || 'sensor.log',
      pretty: (env.PRETTY_LOGS ?? 'true').toLowerCase() !== 'false',
    },
  };
}

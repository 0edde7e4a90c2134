import { connect, type IClientOptions, type MqttClient } from 'mqtt';
import { existsSync, readFileSync } from 'fs';
import type { AgentConfig } from './config.js';
import { TransportError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { AsyncQueue } from './queue.js';
import { withTimeout } from './timers.js';
import type { Transport, TransportEvent } from './transport.js';

// CONNACK refusals a ThingsBoard broker sends back (3.1.1 codes 1-5, 5.0 codes 128+)
const CONNACK_REASONS: Record<number, string> = {
  1: 'unsupported protocol version',
  2: 'client id rejected',
  3: 'broker unavailable',
  4: 'bad access token',
  5: 'not authorized',
  128: 'unspecified error',
  133: 'client id rejected',
  134: 'bad access token',
  135: 'not authorized',
  136: 'broker unavailable',
  137: 'broker busy',
  159: 'connection rate exceeded',
};

export function connackReasonText(code: number): string {
  return CONNACK_REASONS[code] ?? `reason code ${code}`;
}

function reasonCodeOf(err: Error): number | undefined {
  return 'code' in err && typeof err.code === 'number' ? err.code : undefined;
}

export type MqttTransportOptions = Pick<
  AgentConfig,
  'mqttUrl' | 'accessToken' | 'deviceName' | 'tls' | 'keepaliveSec' | 'connectTimeoutMs' | 'publishTimeoutMs'
>;

/**
 * Transport over mqtt.js. The client's built-in reconnect is disabled
 * (reconnectPeriod: 0); every connect() creates a fresh client and session
 * number, and reconnect policy belongs to the supervisor.
 */
export class MqttTransport implements Transport {
  readonly events = new AsyncQueue<TransportEvent>();
  private client: MqttClient | null = null;
  private session = 0;
  private pending = new Set<(err: Error) => void>();

  constructor(
    private readonly opts: MqttTransportOptions,
    private readonly logger: Logger,
  ) {}

  connect(): Promise<number> {
    this.discard();
    const session = ++this.session;
    const client = connect(this.opts.mqttUrl, this.buildOptions());
    this.client = client;

    return new Promise<number>((resolve, reject) => {
      let settled = false;
      let accepted = false;
      let closed = false;
      let lastError: string | undefined;

      client.on('connect', () => {
        if (settled) return;
        settled = true;
        accepted = true;
        this.events.push({ kind: 'connected', session });
        resolve(session);
      });

      client.on('error', (err) => {
        const code = reasonCodeOf(err);
        lastError = code !== undefined ? `${err.message} (${connackReasonText(code)})` : err.message;
        if (!settled) {
          settled = true;
          client.end(true);
          reject(new TransportError(`connect to ${this.opts.mqttUrl} failed: ${lastError}`, code));
          return;
        }
        this.logger.warn({ session, err: err.message }, 'mqtt client error');
      });

      client.on('close', () => {
        if (closed) return;
        closed = true;
        if (this.client === client) {
          this.client = null;
          this.failPending(new TransportError('connection closed'));
        }
        if (!settled) {
          settled = true;
          reject(new TransportError(lastError ? `connect failed: ${lastError}` : 'connection closed before CONNACK'));
          return;
        }
        if (accepted) this.events.push({ kind: 'disconnected', session, reason: lastError ?? 'connection closed' });
      });

      client.on('message', (topic, payload) => {
        this.events.push({ kind: 'message', topic, payload: payload.toString('utf8') });
      });
    });
  }

  subscribe(topics: string[]): Promise<void> {
    const client = this.client;
    if (!client || !client.connected) return Promise.reject(new TransportError('not connected'));
    return new Promise<void>((resolve, reject) => {
      client.subscribe(topics, { qos: 1 }, (err, granted) => {
        if (err) {
          reject(new TransportError(`subscribe failed: ${err.message}`));
          return;
        }
        const refused = (granted ?? []).filter((g) => g.qos === 128).map((g) => g.topic);
        if (refused.length > 0) {
          reject(new TransportError(`subscribe refused for ${refused.join(', ')}`));
          return;
        }
        resolve();
      });
    });
  }

  publish(topic: string, payload: string): Promise<void> {
    const client = this.client;
    if (!client || !client.connected) return Promise.reject(new TransportError('not connected'));

    let fail: (err: Error) => void = () => undefined;
    const sent = new Promise<void>((resolve, reject) => {
      fail = reject;
      client.publish(topic, payload, { qos: 1 }, (err) => {
        if (err) reject(new TransportError(`publish to ${topic} failed: ${err.message}`));
        else resolve();
      });
    });
    this.pending.add(fail);
    return withTimeout(sent, this.opts.publishTimeoutMs, `publish to ${topic} timed out`).finally(() => {
      this.pending.delete(fail);
    });
  }

  close(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (!client) return Promise.resolve();
    this.failPending(new TransportError('transport closed'));
    return new Promise<void>((resolve) => {
      try {
        // Graceful DISCONNECT only makes sense on a live socket
        client.end(!client.connected, {}, () => resolve());
      } catch (err) {
        this.logger.warn({ err: errorMessage(err) }, 'error while closing mqtt client');
        resolve();
      }
    });
  }

  // Drops a client left over from an earlier session without waiting on it.
  private discard(): void {
    const stale = this.client;
    if (!stale) return;
    this.client = null;
    this.failPending(new TransportError('session replaced'));
    stale.end(true);
  }

  private failPending(err: Error): void {
    for (const fail of this.pending) fail(err);
    this.pending.clear();
  }

  private readTls(name: string, path: string | undefined): Buffer | undefined {
    if (!path) return undefined;
    try {
      if (existsSync(path)) return readFileSync(path);
      this.logger.warn(`${name} path set but file not found: ${path}`);
    } catch (e) {
      this.logger.warn(`failed to read ${name} (${path}): ${errorMessage(e)}`);
    }
    return undefined;
  }

  private buildOptions(): IClientOptions {
    // Only consider TLS materials when using mqtts:// to avoid accidental TLS on mqtt://
    const usingTls = this.opts.mqttUrl.startsWith('mqtts://');
    const { tls } = this.opts;
    const ca = usingTls ? this.readTls('MQTT_TLS_CA', tls.ca) : undefined;
    const cert = usingTls ? this.readTls('MQTT_TLS_CERT', tls.cert) : undefined;
    const key = usingTls ? this.readTls('MQTT_TLS_KEY', tls.key) : undefined;

    return {
      clientId: this.opts.deviceName,
      // ThingsBoard authenticates devices by access token in the username field
      username: this.opts.accessToken,
      keepalive: this.opts.keepaliveSec,
      connectTimeout: this.opts.connectTimeoutMs,
      reconnectPeriod: 0,
      clean: true,
      ca,
      cert,
      key,
      rejectUnauthorized: tls.rejectUnauthorized,
    };
  }
}

import { computeBackoffDelay } from './backoff.js';
import type { BackoffOptions } from './config.js';
import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { ConnectionTracker } from './state.js';
import { TOPICS, snapshotRequestPayload } from './topics.js';
import type { Transport } from './transport.js';

export interface SupervisorDeps {
  transport: Transport;
  connection: ConnectionTracker;
  backoff: BackoffOptions;
  logger: Logger;
  random?: () => number;
}

/**
 * Drives the broker session: connect, subscribe to attribute updates, ask for
 * the current attribute snapshot. Failures and unexpected drops are retried
 * with exponential backoff until stop() is called.
 */
export class ConnectionSupervisor {
  private readonly transport: Transport;
  private readonly connection: ConnectionTracker;
  private readonly backoff: BackoffOptions;
  private readonly logger: Logger;
  private readonly random: () => number;

  private reconnectTimer: NodeJS.Timeout | null = null;
  private requestId = 0;
  private attempt: Promise<void> | null = null;

  constructor(deps: SupervisorDeps) {
    this.transport = deps.transport;
    this.connection = deps.connection;
    this.backoff = deps.backoff;
    this.logger = deps.logger;
    this.random = deps.random ?? Math.random;
  }

  start(): void {
    if (this.connection.isStopped()) return;
    this.launch();
  }

  /** Called by the agent for every `disconnected` event drained from the transport. */
  handleDisconnect(session: number, reason: string): void {
    const state = this.connection.state;
    if (state.phase !== 'connected' || state.session !== session) {
      this.logger.debug({ session, reason, phase: state.phase }, 'ignoring disconnect from inactive session');
      return;
    }
    this.logger.warn({ session, reason }, 'unexpected disconnection from broker');
    this.fail();
  }

  async stop(): Promise<void> {
    if (this.connection.isStopped()) return;
    this.connection.markStopped();
    this.clearReconnectTimer();
    try {
      await this.transport.close();
      this.logger.info('disconnected from broker');
    } catch (e) {
      this.logger.warn({ err: errorMessage(e) }, 'error closing broker session');
    }
  }

  /** Resolves once any in-flight connect attempt has finished. */
  async settled(): Promise<void> {
    await this.attempt;
  }

  private launch(): void {
    this.attempt = this.connectOnce()
      .catch((e: unknown) => {
        this.logger.error({ err: errorMessage(e) }, 'connect attempt aborted');
      })
      .finally(() => {
        this.attempt = null;
      });
  }

  private async connectOnce(): Promise<void> {
    this.connection.markConnecting();
    this.logger.info({ attempt: this.connection.retryCount + 1 }, 'connecting to broker');

    let session: number;
    try {
      session = await this.transport.connect();
    } catch (e) {
      if (this.connection.isStopped()) return;
      this.logger.error({ err: errorMessage(e) }, 'failed to connect to broker');
      this.fail();
      return;
    }

    if (this.connection.isStopped()) {
      await this.transport.close();
      return;
    }

    this.connection.markConnected(session);
    this.logger.info({ session }, 'connected to broker');

    try {
      // Subscribe first so the snapshot response cannot arrive before we listen for it
      await this.transport.subscribe([TOPICS.attributes, TOPICS.attributesResponse]);
      this.logger.info({ topics: [TOPICS.attributes, TOPICS.attributesResponse] }, 'subscribed to attribute topics');
      const requestId = ++this.requestId;
      await this.transport.publish(TOPICS.attributesRequest(requestId), snapshotRequestPayload());
      this.logger.info({ requestId }, 'requested shared attributes');
    } catch (e) {
      if (this.connection.isStopped()) return;
      const state = this.connection.state;
      if (state.phase !== 'connected' || state.session !== session) return;
      this.logger.error({ session, err: errorMessage(e) }, 'session setup failed, reconnecting');
      this.fail();
      await this.transport.close();
    }
  }

  private fail(): void {
    const retries = this.connection.markLost();
    const { maxAttempts } = this.backoff;
    if (maxAttempts > 0 && retries > maxAttempts) {
      this.logger.error({ retries, maxAttempts }, 'max reconnection attempts reached, giving up');
      return;
    }
    this.scheduleReconnect(retries);
  }

  private scheduleReconnect(retries: number): void {
    this.clearReconnectTimer();
    const delay = computeBackoffDelay(retries, this.backoff, this.random);
    this.logger.info({ retries, delayMs: delay }, `reconnecting in ${delay}ms`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.connection.isStopped()) return;
      this.launch();
    }, delay);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}

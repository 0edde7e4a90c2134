import { AttributeUpdateHandler, type AttributeChange } from './attributes.js';
import type { BackoffOptions } from './config.js';
import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { PublishLoop } from './publisher.js';
import { createReadingSource, type ReadingSource } from './readings.js';
import { ConnectionTracker, RuntimeConfig, type RuntimeSettings } from './state.js';
import { ConnectionSupervisor } from './supervisor.js';
import { TOPICS, isAttributeTopic } from './topics.js';
import type { Transport, TransportEvent } from './transport.js';

export interface SensorAgentOptions {
  transport: Transport;
  logger: Logger;
  backoff: BackoffOptions;
  disabledPollMs: number;
  initial?: Partial<RuntimeSettings>;
  readings?: ReadingSource;
  random?: () => number;
}

/**
 * Composition root. Owns the runtime config and connection state and hands
 * them to the supervisor, the attribute handler and the publish loop.
 * Transport events are drained in order by a single pump.
 */
export class SensorAgent {
  readonly config: RuntimeConfig;
  readonly connection: ConnectionTracker;

  private readonly transport: Transport;
  private readonly logger: Logger;
  private readonly supervisor: ConnectionSupervisor;
  private readonly attributes: AttributeUpdateHandler;
  private readonly loop: PublishLoop;
  private pump: Promise<void> | null = null;
  private stopping: Promise<boolean> | null = null;

  constructor(opts: SensorAgentOptions) {
    this.transport = opts.transport;
    this.logger = opts.logger;
    this.config = new RuntimeConfig(opts.initial);
    this.connection = new ConnectionTracker();

    this.supervisor = new ConnectionSupervisor({
      transport: this.transport,
      connection: this.connection,
      backoff: opts.backoff,
      logger: opts.logger.child({ component: 'supervisor' }),
      random: opts.random,
    });
    this.attributes = new AttributeUpdateHandler(this.config, opts.logger.child({ component: 'attributes' }));
    this.loop = new PublishLoop({
      config: this.config,
      connection: this.connection,
      transport: this.transport,
      readings: opts.readings ?? createReadingSource(opts.random),
      logger: opts.logger.child({ component: 'telemetry' }),
      disabledPollMs: opts.disabledPollMs,
    });
  }

  start(): void {
    if (this.pump) return;
    this.logger.info({ settings: this.config.snapshot() }, 'starting sensor agent');
    this.pump = this.drain();
    this.supervisor.start();
    this.loop.start();
  }

  /**
   * Stops the publish loop and the broker session. Resolves true when both
   * finished within graceMs, false when the grace period ran out first.
   */
  stop(graceMs: number): Promise<boolean> {
    if (!this.stopping) this.stopping = this.shutdown(graceMs);
    return this.stopping;
  }

  private async shutdown(graceMs: number): Promise<boolean> {
    this.logger.info('stopping sensor agent');
    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), graceMs);
    });
    const stopped = Promise.all([this.loop.stop(), this.supervisor.stop()]).then(() => true);
    const clean = await Promise.race([stopped, grace]);
    clearTimeout(timer);

    this.transport.events.close();
    await this.pump;
    if (clean) this.logger.info('sensor agent stopped');
    else this.logger.warn({ graceMs }, 'shutdown grace period elapsed before all tasks finished');
    return clean;
  }

  private async drain(): Promise<void> {
    for await (const event of this.transport.events) {
      try {
        await this.dispatch(event);
      } catch (e) {
        this.logger.error({ kind: event.kind, err: errorMessage(e) }, 'error handling transport event');
      }
    }
  }

  private async dispatch(event: TransportEvent): Promise<void> {
    switch (event.kind) {
      case 'connected':
        this.logger.debug({ session: event.session }, 'transport session opened');
        return;
      case 'disconnected':
        this.supervisor.handleDisconnect(event.session, event.reason);
        return;
      case 'message':
        if (!isAttributeTopic(event.topic)) {
          this.logger.debug({ topic: event.topic }, 'ignoring message on unexpected topic');
          return;
        }
        await this.reportFirmware(this.attributes.handleMessage(event.topic, event.payload));
        return;
    }
  }

  // Tell the broker which firmware the device now runs (client-side attribute).
  private async reportFirmware(changes: AttributeChange[]): Promise<void> {
    const change = changes.find((c) => c.key === 'firmware_version');
    if (!change || !this.connection.isConnected()) return;
    try {
      await this.transport.publish(TOPICS.attributes, JSON.stringify({ firmware_version: change.next }));
      this.logger.info({ firmwareVersion: change.next }, 'reported firmware version');
    } catch (e) {
      this.logger.warn({ err: errorMessage(e) }, 'failed to report firmware version');
    }
  }
}

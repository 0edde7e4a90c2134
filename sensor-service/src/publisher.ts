import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { ReadingSource } from './readings.js';
import type { ConnectionTracker, RuntimeConfig } from './state.js';
import { sleep } from './timers.js';
import { TOPICS } from './topics.js';
import type { Transport } from './transport.js';

export type CycleOutcome = 'published' | 'skipped' | 'failed' | 'disabled' | 'cancelled';

export interface PublishLoopDeps {
  config: RuntimeConfig;
  connection: ConnectionTracker;
  transport: Pick<Transport, 'publish'>;
  readings: ReadingSource;
  logger: Logger;
  /** How often a disabled sensor re-checks its enabled flag. */
  disabledPollMs: number;
}

/**
 * Wait-then-publish loop. Every cycle re-reads the runtime config, so a new
 * interval applies from the next cycle on. While disabled it polls at
 * disabledPollMs and publishes right away once re-enabled.
 */
export class PublishLoop {
  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;
  private paused = false;

  constructor(private readonly deps: PublishLoopDeps) {}

  get isRunning(): boolean {
    return this.running !== null;
  }

  start(): void {
    if (this.running) return;
    const controller = new AbortController();
    this.controller = controller;
    this.running = this.run(controller.signal);
  }

  /** Interrupts the current sleep and resolves once the loop has exited. */
  async stop(): Promise<void> {
    this.controller?.abort();
    await this.running;
    this.running = null;
    this.controller = null;
  }

  async cycle(signal: AbortSignal): Promise<CycleOutcome> {
    const { config, logger, disabledPollMs } = this.deps;
    const { enabled, interval } = config.snapshot();

    if (!enabled) {
      if (!this.paused) {
        this.paused = true;
        logger.info('sensor disabled, pausing telemetry');
      }
      return (await sleep(disabledPollMs, signal)) ? 'disabled' : 'cancelled';
    }

    if (this.paused) {
      this.paused = false;
      logger.info('sensor enabled, resuming telemetry');
      return this.publishOnce();
    }

    if (!(await sleep(interval * 1000, signal))) return 'cancelled';
    if (!config.enabled) return 'disabled';
    return this.publishOnce();
  }

  async publishOnce(): Promise<CycleOutcome> {
    const { connection, transport, readings, logger } = this.deps;
    if (!connection.isConnected()) {
      logger.warn('not connected, skipping telemetry publish');
      return 'skipped';
    }

    const sample = readings();
    try {
      await transport.publish(TOPICS.telemetry, JSON.stringify(sample));
      logger.info(sample, 'published telemetry');
      return 'published';
    } catch (e) {
      logger.warn({ ...sample, err: errorMessage(e) }, 'failed to publish telemetry');
      return 'failed';
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    const { logger, disabledPollMs } = this.deps;
    logger.info('starting telemetry loop');
    while (!signal.aborted) {
      try {
        await this.cycle(signal);
      } catch (e) {
        logger.error({ err: errorMessage(e) }, 'telemetry cycle failed');
        await sleep(disabledPollMs, signal);
      }
    }
    logger.info('telemetry loop stopped');
  }
}

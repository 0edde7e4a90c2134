import type { SensorAgent } from './agent.js';
import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';

export function registerShutdown(agent: SensorAgent, logger: Logger, graceMs: number): void {
  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`received ${signal}, shutting down...`);
    agent
      .stop(graceMs)
      .then((clean) => {
        logger.info({ clean }, 'application exited');
        process.exit(0);
      })
      .catch((e: unknown) => {
        logger.error({ err: errorMessage(e) }, 'error during shutdown');
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

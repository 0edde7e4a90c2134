import pino, { type Logger, type StreamEntry } from 'pino';
import pinoPretty from 'pino-pretty';
import type { AgentConfig } from './config.js';

export type { Logger };

// Console output (pretty unless disabled) plus a JSON-lines file that survives restarts.
export function createLogger(service: string, opts: AgentConfig['log']): Logger {
  const level = opts.level;

  const stdout: StreamEntry = opts.pretty
    ? {
        level,
        stream: pinoPretty({
          translateTime: 'SYS:standard',
          colorize: true,
          ignore: 'pid,hostname,service',
        }),
      }
    : { level, stream: process.stdout };

  const file: StreamEntry = {
    level,
    stream: pino.destination({ dest: opts.file, mkdir: true, sync: true }),
  };

  return pino(
    {
      level,
      base: { service },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream([stdout, file]),
  );
}


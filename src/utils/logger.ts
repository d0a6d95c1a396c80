import pino, { type Logger as PinoLogger } from 'pino';
import { config } from '../config/index.js';

// stdout is reserved for the hook protocol, so diagnostics go to stderr or LOG_FILE.
function buildLogger(): PinoLogger {
  if (config.logging.pretty) {
    return pino({
      level: config.logging.level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: !config.logging.file,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: config.logging.file ?? 2,
          mkdir: true,
        },
      },
    });
  }

  return pino(
    { level: config.logging.level },
    pino.destination({ dest: config.logging.file ?? 2, sync: true, mkdir: true })
  );
}

export const logger = buildLogger();

export type Logger = PinoLogger;

import pino from 'pino';

let logger: pino.Logger | undefined;

export interface LoggerOptions {
  /** Pretty-print through pino-pretty. Defaults to whether stdout is a TTY. */
  pretty?: boolean;
}

export function createLogger(level = 'info', opts: LoggerOptions = {}): pino.Logger {
  if (logger) {
    // Modules grab the logger at import time, before the CLI has read its config
    logger.level = level;
    return logger;
  }

  const pretty = opts.pretty ?? Boolean(process.stdout.isTTY);

  logger = pretty
    ? pino({
        level,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      })
    : pino({ level });

  return logger;
}

export function getLogger(): pino.Logger {
  if (!logger) return createLogger();
  return logger;
}

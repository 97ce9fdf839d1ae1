import pino, { type Logger as PinoLogger, type LoggerOptions as PinoLoggerOptions } from 'pino';

export type LogFormat = 'json' | 'pretty';

export interface LoggerOptions {
  level?: string;
  format?: LogFormat;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): PinoLogger {
  const { level = 'info', format = 'json', name } = options;

  const baseOptions: PinoLoggerOptions = {
    level,
    name,
    base: {
      pid: process.pid,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (format === 'pretty') {
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(baseOptions);
}

function envFormat(value: string | undefined): LogFormat {
  return value === 'pretty' ? 'pretty' : 'json';
}

let rootLogger: PinoLogger | undefined;

/** Root logger, built from LOG_LEVEL and LOG_FORMAT on first use unless one was installed. */
export function getLogger(): PinoLogger {
  rootLogger ??= createLogger({
    level: process.env['LOG_LEVEL'] ?? 'info',
    format: envFormat(process.env['LOG_FORMAT']),
    name: 'spot-perps-migrator',
  });
  return rootLogger;
}

export function setLogger(next: PinoLogger): void {
  rootLogger = next;
}

export function createServiceLogger(serviceName: string, parent: PinoLogger = getLogger()): PinoLogger {
  return parent.child({ service: serviceName });
}

/** Logger that discards everything; handy for tests and library callers. */
export function createSilentLogger(): PinoLogger {
  return pino({ level: 'silent' });
}

export type { PinoLogger as Logger };

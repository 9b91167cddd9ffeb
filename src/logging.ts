import { destination, pino, stdTimeFunctions, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type AppLogger = Logger;

export interface CreateLoggerOptions {
  readonly level?: string;
  readonly verbose?: boolean;
  /** Defaults to stderr so reports on stdout stay clean. */
  readonly destination?: DestinationStream;
}

/** `LOG_LEVEL` wins, then `--verbose`, then `warn`. */
export function resolveLevel(verbose: boolean): string {
  const envLevel = process.env['LOG_LEVEL']?.trim();
  if (envLevel !== undefined && envLevel !== '') {
    return envLevel;
  }
  return verbose ? 'debug' : 'warn';
}

export function createLogger(options: CreateLoggerOptions = {}): AppLogger {
  const loggerOptions: LoggerOptions = {
    level: options.level ?? resolveLevel(options.verbose === true),
    base: { service: 'kafka-topic-audit' },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
  return pino(loggerOptions, options.destination ?? destination(2));
}

/** A logger that drops everything; for library callers that pass none. */
export function silentLogger(): AppLogger {
  return pino({ level: 'silent' });
}

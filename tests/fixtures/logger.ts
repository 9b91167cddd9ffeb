import { pino } from 'pino';
import type { AppLogger } from '../../src/logging.js';

export interface CapturedLogger {
  readonly logger: AppLogger;
  /** Every line written so far, parsed. */
  entries(): unknown[];
}

export function captureLogger(level = 'debug'): CapturedLogger {
  const lines: string[] = [];
  const logger = pino(
    { level },
    {
      write(msg: string) {
        lines.push(msg);
      },
    },
  );
  return { logger, entries: () => lines.map((line): unknown => JSON.parse(line)) };
}

/**
 * Logger
 * ======
 *
 * Components depend on the small Logger contract below rather than on pino
 * directly, so tests can hand in vi.fn() spies.
 */

import { pino, type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { getEnv } from '../config/env.js';

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug: (obj: object, msg?: string) => void;
}

const BASE_OPTIONS: LoggerOptions = {
  base: { service: 'rs-tournament' },
  timestamp: pino.stdTimeFunctions.isoTime,
};

let rootLogger: PinoLogger | undefined;

// Built on first use, at the validated LOG_LEVEL
function root(): PinoLogger {
  if (!rootLogger) {
    rootLogger = pino({ ...BASE_OPTIONS, level: getEnv().LOG_LEVEL });
  }
  return rootLogger;
}

export function createLogger(module: string): Logger {
  return root().child({ module });
}

/**
 * Info-level logger that does not read the environment, for reporting
 * failures that happen before it is validated.
 */
export function createBootLogger(module: string): Logger {
  return pino({ ...BASE_OPTIONS, level: 'info' }).child({ module });
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

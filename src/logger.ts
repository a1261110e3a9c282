/**
 * Logging
 *
 * Structured JSON logging via pino. Components accept a `Logger` and derive a
 * child tagged with their name; library code defaults to a silent logger.
 */

import pino from 'pino';

export type Logger = pino.Logger;

export interface LoggerOptions {
  level?: string;
  /** Pretty-print through pino-pretty (development only) */
  pretty?: boolean;
  name?: string;
}

/**
 * Create the root logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', pretty = false, name = 'commerce-gateway' } = options;

  return pino({
    name,
    level,
    transport: pretty
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  });
}

const silent = pino({ level: 'silent' });

/**
 * Child logger for a component, falling back to a silent root
 */
export function componentLogger(component: string, logger?: Logger): Logger {
  return (logger ?? silent).child({ component });
}

/**
 * Logger
 * Shared pino root logger; components take a named child.
 */

import { pino, type Logger } from 'pino';

export type { Logger };

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      name: 'commercesync',
      level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
    });
  }
  return rootLogger;
}

/**
 * Child logger tagged with a component name
 */
export function createLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  return getRootLogger().child({ component, ...bindings });
}

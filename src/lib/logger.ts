/**
 * Logging
 *
 * pino loggers for the simulation components. Components accept an optional
 * injected logger and stay silent without one.
 */

import type { Logger } from 'pino';
import { pino } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

const LOG_LEVELS: readonly string[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/** Environment variable overriding the default level */
export const LOG_LEVEL_ENV = 'THERMAL_PI_LOG_LEVEL';

function resolveLevel(level?: LogLevel | 'silent'): string {
  if (level) {
    return level;
  }
  const envLevel = process.env[LOG_LEVEL_ENV]?.toLowerCase();
  return envLevel && LOG_LEVELS.includes(envLevel) ? envLevel : 'info';
}

/**
 * Create a named logger
 *
 * @param name - Component name (e.g. 'SimulationDriver')
 * @param level - Level override; defaults to THERMAL_PI_LOG_LEVEL or 'info'
 */
export function createLogger(name: string, level?: LogLevel | 'silent'): Logger {
  return pino({ name, level: resolveLevel(level) });
}

/**
 * Log with a context object built only when the level is enabled
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ stepsCount, Ts }), 'Simulation run started');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}

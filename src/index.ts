/**
 * thermal-pi-sim
 *
 * PI control with conditional-integration anti-windup on a simulated
 * first-order thermal plant.
 */

export * from './controllers';
export * from './simulator';
export * from './analysis';
export * from './config';
export * from './plotting';
export { ControlError, zodErrorToControlError, type ControlErrorCode, type ControlErrorShape } from './lib/errors';
export { createLogger, lazyLog, LOG_LEVEL_ENV, type Logger, type LogLevel } from './lib/logger';

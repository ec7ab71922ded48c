/**
 * Controllers Module
 *
 * Exports the PI controller and its types.
 */

export { PIController, clamp } from './PIController';
export type {
  PIGains,
  PIControllerConfig,
  ResolvedPIControllerConfig,
  PIDiagnostics,
  IController,
} from './types';

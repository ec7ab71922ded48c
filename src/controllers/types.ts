/**
 * Controller Types and Interfaces
 *
 * Defines TypeScript interfaces for the PI controller and anything the
 * simulation driver can step.
 */

/**
 * PI Controller Gains
 *
 * - Kp: Proportional gain - responds to current error
 * - Ki: Integral gain - responds to accumulated error over time
 */
export interface PIGains {
  Kp: number;
  Ki: number;
}

/**
 * PI Controller Configuration
 *
 * Output bounds default to [-100, 100] (actuator power in percent,
 * positive heats, negative cools).
 */
export interface PIControllerConfig extends PIGains {
  /** Sample period in seconds, must be > 0 */
  Ts: number;
  /** Lower output bound */
  uMin?: number;
  /** Upper output bound, must be >= uMin */
  uMax?: number;
  /** Conditional integration while saturated (default: true) */
  antiWindup?: boolean;
}

/**
 * Fully resolved controller configuration
 */
export type ResolvedPIControllerConfig = Required<PIControllerConfig>;

/**
 * PI Controller Diagnostics
 *
 * Values computed by the most recent step, for tuning and debugging.
 */
export interface PIDiagnostics {
  /** Setpoint minus measurement */
  error: number;
  /** Proportional term contribution */
  P: number;
  /** Integral accumulator value the step tried to commit */
  candidateIntegral: number;
  /** Output before clamping */
  rawOutput: number;
  /** Output after clamping */
  output: number;
  /** Raw output fell outside [uMin, uMax] */
  saturated: boolean;
  /** Candidate integral was discarded by the anti-windup rule */
  integrationHeld: boolean;
  /** Committed integral accumulator value */
  integral: number;
}

/**
 * Controller Interface
 *
 * What the simulation driver needs from a controller.
 */
export interface IController {
  /**
   * Compute the bounded control output for one sample period
   *
   * @param setpoint - Desired value
   * @param measurement - Current measured value
   * @returns Control output within the configured bounds
   */
  step(setpoint: number, measurement: number): number;

  /**
   * Clear controller state before an independent run
   *
   * @param initialIntegral - Starting integral accumulator value
   */
  reset(initialIntegral?: number): void;

  /** Replace the output bounds */
  setOutputLimits(uMin: number, uMax: number): void;

  /** Current integral accumulator value */
  readonly integral: number;

  /** Most recent bounded output */
  readonly lastOutput: number;

  /** Sample period in seconds */
  readonly sampleTime: number;
}

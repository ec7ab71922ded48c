/**
 * Default Configuration Constants
 *
 * Controller, plant and run defaults in one place. The room-temperature
 * scenario: hold 26 °C from a 20 °C start while the ambient rises to 24 °C
 * two minutes in.
 */

/**
 * Controller Defaults
 */
export const CONTROLLER = {
  /** Proportional gain */
  KP: 10.0,

  /** Integral gain */
  KI: 0.5,

  /** Sample period (s) */
  TS: 1.0,

  /** Actuator power bounds (%) */
  U_MIN: -100.0,
  U_MAX: 100.0,

  /** Conditional integration while saturated */
  ANTI_WINDUP: true,
} as const;

/**
 * First-order Thermal Plant Defaults
 */
export const PLANT = {
  /** Response speed, (0, 1] for a stable explicit-Euler update */
  ALPHA: 0.2,

  /** Actuator effectiveness */
  BETA: 0.5,

  /** Starting measured value (°C) */
  INITIAL_VALUE: 20.0,

  /** Standard deviation of the additive disturbance (0 = none) */
  NOISE_STD_DEV: 0.0,
} as const;

/**
 * Ambient Disturbance Defaults
 */
export const AMBIENT = {
  /** Ambient value at the start of a run (°C) */
  INITIAL: 20.0,

  /** Sample index of the scheduled ambient step */
  STEP_AT: 120,

  /** Ambient value after the step (°C) */
  STEP_VALUE: 24.0,
} as const;

/**
 * Run Defaults
 */
export const RUN = {
  /** Number of samples */
  STEPS: 240,

  /** Target value (°C) */
  SETPOINT: 26.0,
} as const;

/**
 * Response Metrics Defaults
 */
export const METRICS = {
  /** Trailing window for the mean steady-state error (samples) */
  STEADY_STATE_WINDOW: 20,

  /** Settling band as a fraction of the initial error magnitude */
  SETTLING_BAND_FRACTION: 0.02,
} as const;

/** Scenario file location relative to the package root */
export const SCENARIO_FILE = 'config/scenarios.yaml';

/**
 * Simulator Types and Interfaces
 *
 * Defines TypeScript interfaces for the first-order thermal plant and the
 * simulation driver that closes the loop around a controller.
 */

/**
 * Run Phase
 *
 * idle → running → complete. A finished run only goes back to running
 * through a fresh `run` call.
 */
export type SimulationPhase = 'idle' | 'running' | 'complete';

/**
 * Plant Coefficients
 */
export interface PlantParameters {
  /** Response speed, (0, 1] */
  alpha: number;
  /** Actuator effectiveness */
  beta: number;
}

/**
 * Plant State
 */
export interface PlantState {
  /** Measured quantity */
  value: number;
  /** Ambient disturbance acting on the plant */
  ambient: number;
}

/**
 * Ambient Step Event
 *
 * From sample `triggerStep` onward the ambient value is `newAmbientValue`.
 */
export interface AmbientStepEvent {
  triggerStep: number;
  newAmbientValue: number;
}

/**
 * Output Bounds
 */
export interface OutputBounds {
  uMin: number;
  uMax: number;
}

/**
 * Noise Source
 *
 * Pluggable zero-mean disturbance generator. Seeding is the caller's concern.
 */
export interface NoiseSource {
  /**
   * Draw one sample
   *
   * @param stdDev - Standard deviation, > 0
   */
  sample(stdDev: number): number;
}

/**
 * Simulation Run Options (resolved)
 */
export interface SimulationRunOptions extends PlantParameters {
  /** Number of samples to simulate */
  stepsCount: number;
  /** Sample period (s), spacing of the time axis */
  Ts: number;
  /** Target value */
  setpoint: number;
  /** Measured value at t = 0 */
  initialValue: number;
  /** Ambient value at t = 0 */
  ambientInitial: number;
  /** Optional scheduled ambient change */
  ambientStep: AmbientStepEvent | null;
  /** Disturbance standard deviation (0 = none) */
  noiseStdDev: number;
  /** Bounds applied to the controller before the first sample */
  outputBounds: OutputBounds;
}

/**
 * Simulation Run Input
 *
 * Plant, ambient, noise and bound settings fall back to the defaults in
 * config/defaults.ts.
 */
export type SimulationRunInput = Pick<
  SimulationRunOptions,
  'stepsCount' | 'Ts' | 'setpoint' | 'initialValue'
> &
  Partial<Omit<SimulationRunOptions, 'stepsCount' | 'Ts' | 'setpoint' | 'initialValue'>>;

/**
 * Simulation Result
 *
 * State sequences (`time`, `measured`, `integral`, `setpoint`, `ambient`)
 * describe samples and hold stepsCount + 1 entries. Transition sequences
 * (`control`, `error`) describe the moves between samples and hold
 * stepsCount entries; `control[k]` and `error[k]` belong to `time[k]`.
 */
export interface SimulationResult {
  /** Time points (s) */
  time: Float64Array;
  /** Measured values */
  measured: Float64Array;
  /** Bounded control outputs */
  control: Float64Array;
  /** Setpoint minus the pre-step measurement */
  error: Float64Array;
  /** Controller integral after each step (index 0: after reset) */
  integral: Float64Array;
  /** Setpoint per sample */
  setpoint: Float64Array;
  /** Ambient value per sample */
  ambient: Float64Array;
  /** Sample period (s) */
  Ts: number;
  /** Number of simulated steps */
  stepsCount: number;
}

/**
 * One completed step, as streamed to listeners
 */
export interface SimulationSample {
  /** Step index k */
  index: number;
  /** Time at the end of the step, (k + 1) * Ts */
  time: number;
  /** Control output u_k */
  control: number;
  /** Error e_k */
  error: number;
  /** Controller integral after the step */
  integral: number;
  /** Measured value after the step, y_{k+1} */
  measured: number;
  /** Ambient value acting during the step */
  ambient: number;
  /** Setpoint */
  setpoint: number;
}

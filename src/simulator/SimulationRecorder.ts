/**
 * Simulation Recorder
 *
 * Pre-sized, append-only buffers for one run. State sequences get
 * stepsCount + 1 slots, transition sequences stepsCount.
 */

import type { SimulationResult, SimulationSample } from './types';

export class SimulationRecorder {
  private readonly stepsCount: number;
  private readonly Ts: number;

  private readonly time: Float64Array;
  private readonly measured: Float64Array;
  private readonly integral: Float64Array;
  private readonly setpoint: Float64Array;
  private readonly ambient: Float64Array;
  private readonly control: Float64Array;
  private readonly error: Float64Array;

  private recorded = 0;

  constructor(stepsCount: number, Ts: number) {
    this.stepsCount = stepsCount;
    this.Ts = Ts;

    this.time = new Float64Array(stepsCount + 1);
    this.measured = new Float64Array(stepsCount + 1);
    this.integral = new Float64Array(stepsCount + 1);
    this.setpoint = new Float64Array(stepsCount + 1);
    this.ambient = new Float64Array(stepsCount + 1);
    this.control = new Float64Array(stepsCount);
    this.error = new Float64Array(stepsCount);
  }

  /**
   * Record the sample at t = 0
   */
  start(measured: number, integral: number, setpoint: number, ambient: number): void {
    this.time[0] = 0;
    this.measured[0] = measured;
    this.integral[0] = integral;
    this.setpoint[0] = setpoint;
    this.ambient[0] = ambient;
    this.recorded = 0;
  }

  /**
   * Append one completed step
   */
  append(sample: SimulationSample): void {
    if (this.recorded >= this.stepsCount) {
      throw new RangeError(`Recorder is full (${this.stepsCount} steps)`);
    }
    const k = this.recorded;
    this.control[k] = sample.control;
    this.error[k] = sample.error;
    this.time[k + 1] = (k + 1) * this.Ts;
    this.measured[k + 1] = sample.measured;
    this.integral[k + 1] = sample.integral;
    this.setpoint[k + 1] = sample.setpoint;
    this.ambient[k + 1] = sample.ambient;
    this.recorded = k + 1;
  }

  get length(): number {
    return this.recorded;
  }

  /**
   * Hand over the buffers as a result
   */
  toResult(): SimulationResult {
    return {
      time: this.time,
      measured: this.measured,
      control: this.control,
      error: this.error,
      integral: this.integral,
      setpoint: this.setpoint,
      ambient: this.ambient,
      Ts: this.Ts,
      stepsCount: this.stepsCount,
    };
  }
}

/**
 * Simulation Driver
 *
 * Closes the loop around a controller and the first-order thermal plant:
 *
 *   controller.step(setpoint, y[k]) → u[k] → plant update → y[k+1] → next step
 *
 * A run is synchronous and atomic from the caller's point of view. Listeners
 * see each step as it is appended (`sample`) but must not reconfigure the
 * controller or start another run on the same driver meanwhile.
 */

import { EventEmitter } from 'eventemitter3';
import { ControlError, zodErrorToControlError } from '../lib/errors';
import { lazyLog, type Logger } from '../lib/logger';
import { SimulationRunSchema } from '../config/schemas';
import type { IController } from '../controllers/types';
import type { SimulationEvents } from './events';
import { GaussianNoise } from './noise';
import { SimulationRecorder } from './SimulationRecorder';
import { ThermalPlant } from './ThermalPlant';
import type {
  NoiseSource,
  SimulationPhase,
  SimulationResult,
  SimulationRunInput,
  SimulationRunOptions,
  SimulationSample,
} from './types';

/**
 * Driver dependencies
 */
export interface SimulationDriverOptions {
  /** Disturbance source used when noiseStdDev > 0 (default: GaussianNoise over Math.random) */
  noise?: NoiseSource;
  logger?: Logger;
}

export class SimulationDriver extends EventEmitter<SimulationEvents> {
  private readonly noise: NoiseSource;
  private readonly logger?: Logger;
  private phase: SimulationPhase = 'idle';

  constructor(options: SimulationDriverOptions = {}) {
    super();
    this.noise = options.noise ?? new GaussianNoise();
    this.logger = options.logger;
  }

  /**
   * Current run phase
   */
  getPhase(): SimulationPhase {
    return this.phase;
  }

  /**
   * Run a closed-loop simulation
   *
   * Applies the output bounds to the controller and resets it before the
   * first sample, so every run starts from a clean integral.
   *
   * @param controller - Controller to step; owned by this run until it returns
   * @param input - Run parameters (plant, ambient, noise and bounds default from config/defaults.ts)
   * @returns Full trajectories
   * @throws ControlError InvalidConfiguration for invalid parameters, InvalidState when re-entered
   */
  run(controller: IController, input: SimulationRunInput): SimulationResult {
    if (this.phase === 'running') {
      throw new ControlError('InvalidState', 'A simulation run is already in progress on this driver');
    }

    const parsed = SimulationRunSchema.safeParse(input);
    if (!parsed.success) {
      throw zodErrorToControlError(parsed.error);
    }
    const options = parsed.data;

    controller.setOutputLimits(options.outputBounds.uMin, options.outputBounds.uMax);
    controller.reset(0.0);

    if (controller.sampleTime !== options.Ts) {
      lazyLog(
        this.logger,
        'warn',
        () => ({ controllerTs: controller.sampleTime, runTs: options.Ts }),
        'Controller sample period differs from the run sample period'
      );
    }

    this.phase = 'running';
    const startedAt = performance.now();
    try {
      this.emit('run:started', { options, timestamp: Date.now() });
      lazyLog(
        this.logger,
        'debug',
        () => ({ stepsCount: options.stepsCount, Ts: options.Ts, setpoint: options.setpoint }),
        'Simulation run started'
      );

      const result = this.loop(controller, options);

      this.phase = 'complete';
      const durationMs = performance.now() - startedAt;
      lazyLog(
        this.logger,
        'debug',
        () => ({
          stepsCount: result.stepsCount,
          finalValue: result.measured[result.stepsCount],
          durationMs,
        }),
        'Simulation run completed'
      );
      this.emit('run:completed', { result, phase: this.phase, durationMs, timestamp: Date.now() });

      return result;
    } catch (error) {
      this.phase = 'idle';
      throw error;
    }
  }

  private loop(controller: IController, options: SimulationRunOptions): SimulationResult {
    const { stepsCount, Ts, setpoint, ambientStep, noiseStdDev } = options;

    const plant = new ThermalPlant(
      { alpha: options.alpha, beta: options.beta },
      { value: options.initialValue, ambient: options.ambientInitial }
    );
    const recorder = new SimulationRecorder(stepsCount, Ts);
    recorder.start(plant.value, controller.integral, setpoint, plant.ambient);

    for (let k = 0; k < stepsCount; k++) {
      if (ambientStep !== null && k === ambientStep.triggerStep) {
        plant.setAmbient(ambientStep.newAmbientValue);
      }

      const current = plant.value;
      const control = controller.step(setpoint, current);
      // Recomputed from the same pre-step measurement the controller saw, so it
      // equals the controller's internal error. Kept separate: a filtered
      // measurement or derivative term would apply to one side only.
      const error = setpoint - current;

      const disturbance = noiseStdDev > 0 ? this.noise.sample(noiseStdDev) : 0;
      const measured = plant.advance(control, disturbance);

      const sample: SimulationSample = {
        index: k,
        time: (k + 1) * Ts,
        control,
        error,
        integral: controller.integral,
        measured,
        ambient: plant.ambient,
        setpoint,
      };
      recorder.append(sample);
      this.emit('sample', sample);
    }

    return recorder.toResult();
  }
}

/**
 * Run one simulation with a throwaway driver
 */
export function runSimulation(
  controller: IController,
  input: SimulationRunInput,
  options: SimulationDriverOptions = {}
): SimulationResult {
  return new SimulationDriver(options).run(controller, input);
}

/**
 * Simulator Module
 *
 * Exports the plant model, the simulation driver and their types.
 */

export { SimulationDriver, runSimulation, type SimulationDriverOptions } from './SimulationDriver';
export { SimulationRecorder } from './SimulationRecorder';
export { ThermalPlant, advancePlant, equilibriumValue } from './ThermalPlant';
export { GaussianNoise, createPRNG, type UniformSource } from './noise';
export type {
  RunStartedEvent,
  SampleEvent,
  RunCompletedEvent,
  SimulationEvents,
  SimulationEventName,
} from './events';
export type {
  SimulationPhase,
  PlantParameters,
  PlantState,
  AmbientStepEvent,
  OutputBounds,
  NoiseSource,
  SimulationRunOptions,
  SimulationRunInput,
  SimulationResult,
  SimulationSample,
} from './types';
export {
  runScenario,
  compareScenarios,
  type ScenarioRunnerDeps,
  type ScenarioOutcome,
} from './ScenarioRunner';

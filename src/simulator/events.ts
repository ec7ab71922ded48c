/**
 * Simulation Event System
 *
 * Event payloads emitted by SimulationDriver while a run progresses.
 */

import type { SimulationPhase, SimulationResult, SimulationRunOptions, SimulationSample } from './types';

/**
 * Event payload when a run starts (after the controller is reset)
 */
export interface RunStartedEvent {
  options: Readonly<SimulationRunOptions>;
  timestamp: number;
}

/**
 * Event payload for each completed step
 */
export type SampleEvent = Readonly<SimulationSample>;

/**
 * Event payload when a run completes
 */
export interface RunCompletedEvent {
  result: SimulationResult;
  phase: SimulationPhase;
  durationMs: number;
  timestamp: number;
}

/**
 * Map of all driver events
 */
export interface SimulationEvents {
  'run:started': (event: RunStartedEvent) => void;
  sample: (event: SampleEvent) => void;
  'run:completed': (event: RunCompletedEvent) => void;
}

export type SimulationEventName = keyof SimulationEvents;

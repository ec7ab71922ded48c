/**
 * Scenario Runner
 *
 * Runs resolved scenarios end to end: builds the controller from the
 * scenario's controller section and drives it through a fresh driver.
 */

import { summarizeResponse, type ResponseMetrics } from '../analysis/responseMetrics';
import { resolveScenario, type Scenario } from '../config/loader';
import type { ScenarioFile } from '../config/schemas';
import { PIController } from '../controllers/PIController';
import { createLogger, type Logger } from '../lib/logger';
import { SimulationDriver } from './SimulationDriver';
import type { NoiseSource, SimulationResult } from './types';

export interface ScenarioRunnerDeps {
  /** Disturbance source for noisy scenarios */
  noise?: NoiseSource;
  /** Default: createLogger('ScenarioRunner') */
  logger?: Logger;
}

/**
 * Outcome of one scenario in a comparison
 */
export interface ScenarioOutcome {
  scenario: Scenario;
  result: SimulationResult;
  metrics: ResponseMetrics;
}

/**
 * Run one resolved scenario
 */
export function runScenario(scenario: Scenario, deps: ScenarioRunnerDeps = {}): SimulationResult {
  const logger = deps.logger ?? createLogger('ScenarioRunner');
  const controller = new PIController(scenario.controller);
  const driver = new SimulationDriver({ noise: deps.noise, logger });

  logger.info(
    {
      scenario: scenario.name,
      Kp: scenario.controller.Kp,
      Ki: scenario.controller.Ki,
      antiWindup: scenario.controller.antiWindup,
    },
    'Running scenario'
  );

  return driver.run(controller, scenario.run);
}

/**
 * Run several presets of a scenario file and summarize each response
 *
 * @example
 * ```typescript
 * const [p, pi] = compareScenarios(loadScenarioFile(), ['p-only', 'pi']);
 * p.metrics.steadyStateError > pi.metrics.steadyStateError; // => true
 * ```
 */
export function compareScenarios(
  file: ScenarioFile,
  names: readonly string[],
  deps: ScenarioRunnerDeps = {}
): ScenarioOutcome[] {
  // Resolve everything first so an unknown name fails before any run
  const scenarios = names.map((name) => resolveScenario(file, name));

  return scenarios.map((scenario) => {
    const result = runScenario(scenario, deps);
    return {
      scenario,
      result,
      metrics: summarizeResponse(result, { outputBounds: scenario.run.outputBounds }),
    };
  });
}

/**
 * Scenario Requests
 *
 * Turns the flat values an interactive front end submits (numbers or
 * numeric text) into scenario overrides. Malformed values are rejected here,
 * before anything reaches the controller or the driver.
 */

import { zodErrorToControlError } from '../lib/errors';
import { resolveScenario, DEFAULT_SCENARIO, type Scenario } from './loader';
import {
  ScenarioRequestSchema,
  type ScenarioFile,
  type ScenarioOverrides,
} from './schemas';

/**
 * Parse a scenario request into overrides
 *
 * Step counts are truncated ("120.7" → 120).
 *
 * @example
 * ```typescript
 * parseScenarioRequest({ kp: '12', ki: '0.4', steps: '300' });
 * // => { controller: { kp: 12, ki: 0.4 }, run: { steps: 300 }, ... }
 * ```
 * @throws ControlError InvalidConfiguration for non-numeric text or unknown fields
 */
export function parseScenarioRequest(raw: unknown): ScenarioOverrides {
  const parsed = ScenarioRequestSchema.safeParse(raw);
  if (!parsed.success) {
    throw zodErrorToControlError(parsed.error);
  }
  const request = parsed.data;

  const hasAmbientStep =
    request.ambientStepAt !== undefined || request.ambientStepValue !== undefined;

  return {
    controller: { kp: request.kp, ki: request.ki },
    plant: { initial_value: request.initialValue },
    ambient: {
      initial: request.ambient,
      step: hasAmbientStep
        ? { at_step: request.ambientStepAt, value: request.ambientStepValue }
        : undefined,
    },
    run: { steps: request.steps, setpoint: request.setpoint },
  };
}

/**
 * Resolve a preset with a scenario request applied on top
 */
export function scenarioFromRequest(
  file: ScenarioFile,
  raw: unknown,
  name: string = DEFAULT_SCENARIO
): Scenario {
  return resolveScenario(file, name, parseScenarioRequest(raw));
}

/**
 * Scenario Loader
 *
 * Loads named closed-loop scenarios from config/scenarios.yaml. Each preset
 * is deep-merged over the `defaults` block and validated before use.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { ControlError, zodErrorToControlError } from '../lib/errors';
import type { ResolvedPIControllerConfig } from '../controllers/types';
import type { SimulationRunOptions } from '../simulator/types';
import { SCENARIO_FILE } from './defaults';
import {
  ScenarioFileSchema,
  ScenarioSectionSchema,
  type ScenarioFile,
  type ScenarioOverrides,
  type ScenarioSection,
} from './schemas';

/**
 * A resolved scenario, ready for a controller and a driver
 */
export interface Scenario {
  name: string;
  description?: string;
  controller: ResolvedPIControllerConfig;
  run: SimulationRunOptions;
}

/**
 * Name and description of a preset
 */
export interface ScenarioSummary {
  name: string;
  description?: string;
}

/** Name used for the `defaults` block itself */
export const DEFAULT_SCENARIO = 'defaults';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects; undefined source values leave the target untouched
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const output: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

/**
 * Default scenario file path (config/scenarios.yaml under the package root)
 */
export function defaultScenarioPath(): string {
  return join(findPackageRoot(), SCENARIO_FILE);
}

/**
 * Validate a parsed scenario file
 *
 * Every preset must produce a complete scenario once merged over the defaults.
 */
export function validateScenarioFile(raw: unknown): ScenarioFile {
  const parsed = ScenarioFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw zodErrorToControlError(parsed.error);
  }

  for (const name of Object.keys(parsed.data.scenarios)) {
    mergeSection(parsed.data, name);
  }

  return parsed.data;
}

/**
 * Load and validate a scenario file
 *
 * @param scenarioPath - YAML file (default: config/scenarios.yaml)
 * @throws ControlError InvalidConfiguration when the file is missing, unparsable or invalid
 */
export function loadScenarioFile(scenarioPath?: string): ScenarioFile {
  const finalPath = scenarioPath ?? defaultScenarioPath();

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ControlError('InvalidConfiguration', `Scenario file not found: ${finalPath}`, {
        path: finalPath,
      });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ControlError('InvalidConfiguration', `Failed to load scenario file: ${reason}`, {
      path: finalPath,
    });
  }

  return validateScenarioFile(raw);
}

/**
 * List the presets of a scenario file
 */
export function listScenarios(file: ScenarioFile): ScenarioSummary[] {
  return Object.entries(file.scenarios).map(([name, overrides]) => ({
    name,
    description: overrides.description,
  }));
}

function mergeSection(
  file: ScenarioFile,
  name: string,
  overrides?: ScenarioOverrides
): ScenarioSection {
  let merged: Record<string, unknown> = file.defaults;

  if (name !== DEFAULT_SCENARIO) {
    const preset = file.scenarios[name];
    if (!preset) {
      throw new ControlError('InvalidConfiguration', `Unknown scenario: ${name}`, {
        name,
        available: Object.keys(file.scenarios),
      });
    }
    merged = deepMerge(merged, preset);
  }

  if (overrides) {
    merged = deepMerge(merged, overrides);
  }

  const parsed = ScenarioSectionSchema.safeParse(merged);
  if (!parsed.success) {
    const error = zodErrorToControlError(parsed.error);
    throw new ControlError('InvalidConfiguration', `Scenario '${name}': ${error.message}`, {
      scenario: name,
      ...error.details,
    });
  }
  return parsed.data;
}

/**
 * Convert a validated scenario section (snake_case) into controller and run options
 */
export function toScenario(name: string, section: ScenarioSection): Scenario {
  const { controller, plant, ambient, run } = section;

  return {
    name,
    description: section.description,
    controller: {
      Kp: controller.kp,
      Ki: controller.ki,
      Ts: controller.ts,
      uMin: controller.u_min,
      uMax: controller.u_max,
      antiWindup: controller.anti_windup,
    },
    run: {
      stepsCount: run.steps,
      Ts: controller.ts,
      setpoint: run.setpoint,
      initialValue: plant.initial_value,
      alpha: plant.alpha,
      beta: plant.beta,
      ambientInitial: ambient.initial,
      ambientStep: ambient.step
        ? { triggerStep: ambient.step.at_step, newAmbientValue: ambient.step.value }
        : null,
      noiseStdDev: plant.noise_std_dev,
      outputBounds: { uMin: controller.u_min, uMax: controller.u_max },
    },
  };
}

/**
 * Resolve a named preset, optionally with further overrides
 *
 * @param file - Validated scenario file
 * @param name - Preset name, or 'defaults' for the base scenario
 * @param overrides - Applied last (e.g. from parseScenarioRequest)
 */
export function resolveScenario(
  file: ScenarioFile,
  name: string = DEFAULT_SCENARIO,
  overrides?: ScenarioOverrides
): Scenario {
  return toScenario(name, mergeSection(file, name, overrides));
}

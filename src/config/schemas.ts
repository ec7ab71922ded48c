/**
 * Configuration Schemas
 *
 * Zod schemas for controller construction, simulation runs, the scenario
 * file (config/scenarios.yaml) and loosely typed scenario requests coming
 * from a form or query string.
 *
 * @module config/schemas
 */

import { z } from 'zod';
import type { ResolvedPIControllerConfig, PIControllerConfig } from '../controllers/types';
import type {
  OutputBounds,
  SimulationRunInput,
  SimulationRunOptions,
} from '../simulator/types';
import { AMBIENT, CONTROLLER, PLANT } from './defaults';

/**
 * Finite number validator (rejects NaN and ±Infinity)
 */
export const FiniteNumber = z.number().finite('Must be finite');

/**
 * Sample period validator
 */
export const SamplePeriod = z.number().finite('Must be finite').positive('Sample period must be positive');

/**
 * Non-negative integer validator
 */
export const NonNegativeInteger = z
  .number()
  .int('Must be an integer')
  .min(0, 'Must be non-negative');

/**
 * Output bounds, uMin <= uMax
 */
export const OutputBoundsSchema = z
  .object({
    uMin: FiniteNumber,
    uMax: FiniteNumber,
  })
  .refine((data) => data.uMin <= data.uMax, {
    message: 'must be >= uMin',
    path: ['uMax'],
  });

/**
 * PI controller construction parameters
 */
export const ControllerConfigSchema: z.ZodType<
  ResolvedPIControllerConfig,
  z.ZodTypeDef,
  PIControllerConfig
> = z
  .object({
    Kp: FiniteNumber,
    Ki: FiniteNumber,
    Ts: SamplePeriod,
    uMin: FiniteNumber.default(CONTROLLER.U_MIN),
    uMax: FiniteNumber.default(CONTROLLER.U_MAX),
    antiWindup: z.boolean().default(CONTROLLER.ANTI_WINDUP),
  })
  .refine((data) => data.uMin <= data.uMax, {
    message: 'must be >= uMin',
    path: ['uMax'],
  });

/**
 * Scheduled one-time ambient change
 */
export const AmbientStepEventSchema = z.object({
  triggerStep: NonNegativeInteger,
  newAmbientValue: FiniteNumber,
});

/**
 * Simulation run parameters
 */
export const SimulationRunSchema: z.ZodType<
  SimulationRunOptions,
  z.ZodTypeDef,
  SimulationRunInput
> = z.object({
  stepsCount: NonNegativeInteger,
  Ts: SamplePeriod,
  setpoint: FiniteNumber,
  initialValue: FiniteNumber,
  alpha: z
    .number()
    .gt(0, 'alpha must be > 0')
    .max(1, 'alpha must be <= 1')
    .default(PLANT.ALPHA),
  beta: FiniteNumber.default(PLANT.BETA),
  ambientInitial: FiniteNumber.default(AMBIENT.INITIAL),
  ambientStep: AmbientStepEventSchema.nullable().default(null),
  noiseStdDev: z
    .number()
    .finite('Must be finite')
    .min(0, 'Noise standard deviation must be >= 0')
    .default(PLANT.NOISE_STD_DEV),
  outputBounds: OutputBoundsSchema.default({
    uMin: CONTROLLER.U_MIN,
    uMax: CONTROLLER.U_MAX,
  } satisfies OutputBounds),
});

// ---------------------------------------------------------------------------
// Scenario file (snake_case, mirrors config/scenarios.yaml)
// ---------------------------------------------------------------------------

/**
 * Controller section
 */
export const ScenarioControllerSchema = z
  .object({
    kp: FiniteNumber,
    ki: FiniteNumber,
    ts: SamplePeriod,
    u_min: FiniteNumber,
    u_max: FiniteNumber,
    anti_windup: z.boolean(),
  })
  .refine((data) => data.u_min <= data.u_max, {
    message: 'must be >= u_min',
    path: ['u_max'],
  });

/**
 * Plant section
 */
export const ScenarioPlantSchema = z.object({
  alpha: z.number().gt(0, 'alpha must be > 0').max(1, 'alpha must be <= 1'),
  beta: FiniteNumber,
  initial_value: FiniteNumber,
  noise_std_dev: z.number().finite('Must be finite').min(0, 'must be >= 0'),
});

/**
 * Ambient section
 */
export const ScenarioAmbientSchema = z.object({
  initial: FiniteNumber,
  step: z
    .object({
      at_step: NonNegativeInteger,
      value: FiniteNumber,
    })
    .nullable(),
});

/**
 * Run section
 */
export const ScenarioRunSchema = z.object({
  steps: NonNegativeInteger,
  setpoint: FiniteNumber,
});

/**
 * A complete scenario (the `defaults` block, or a preset merged over it)
 */
export const ScenarioSectionSchema = z.object({
  description: z.string().optional(),
  controller: ScenarioControllerSchema,
  plant: ScenarioPlantSchema,
  ambient: ScenarioAmbientSchema,
  run: ScenarioRunSchema,
});

/**
 * A preset: any subset of a scenario section
 */
export const ScenarioOverridesSchema = z.object({
  description: z.string().optional(),
  controller: z
    .object({
      kp: FiniteNumber.optional(),
      ki: FiniteNumber.optional(),
      ts: SamplePeriod.optional(),
      u_min: FiniteNumber.optional(),
      u_max: FiniteNumber.optional(),
      anti_windup: z.boolean().optional(),
    })
    .optional(),
  plant: ScenarioPlantSchema.partial().optional(),
  ambient: z
    .object({
      initial: FiniteNumber.optional(),
      step: z
        .object({
          at_step: NonNegativeInteger.optional(),
          value: FiniteNumber.optional(),
        })
        .nullable()
        .optional(),
    })
    .optional(),
  run: ScenarioRunSchema.partial().optional(),
});

/**
 * The whole scenario file
 */
export const ScenarioFileSchema = z.object({
  defaults: ScenarioSectionSchema,
  scenarios: z.record(z.string().min(1, 'Scenario name cannot be empty'), ScenarioOverridesSchema),
});

export type ScenarioSection = z.infer<typeof ScenarioSectionSchema>;
export type ScenarioOverrides = z.infer<typeof ScenarioOverridesSchema>;
export type ScenarioFile = z.infer<typeof ScenarioFileSchema>;

// ---------------------------------------------------------------------------
// Scenario requests (form fields: numbers or numeric text)
// ---------------------------------------------------------------------------

const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function coerceNumeric(value: unknown, truncate: boolean): unknown {
  let numeric = value;
  if (typeof value === 'string' && NUMERIC_TEXT.test(value.trim())) {
    numeric = Number(value.trim());
  }
  if (truncate && typeof numeric === 'number' && Number.isFinite(numeric)) {
    return Math.trunc(numeric);
  }
  return numeric;
}

const NumericField = z
  .preprocess(
    (value) => coerceNumeric(value, false),
    z.number({ invalid_type_error: 'Must be a number' }).finite('Must be finite')
  )
  .optional();

const StepCountField = z
  .preprocess(
    (value) => coerceNumeric(value, true),
    z
      .number({ invalid_type_error: 'Must be a number' })
      .int('Must be an integer')
      .min(0, 'Must be non-negative')
  )
  .optional();

/**
 * Flat scenario request, as an interactive front end submits it
 */
export const ScenarioRequestSchema = z
  .object({
    kp: NumericField,
    ki: NumericField,
    setpoint: NumericField,
    initialValue: NumericField,
    ambient: NumericField,
    ambientStepAt: StepCountField,
    ambientStepValue: NumericField,
    steps: StepCountField,
  })
  .strict();

export type ScenarioRequest = z.infer<typeof ScenarioRequestSchema>;

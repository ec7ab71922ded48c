/**
 * Configuration Module
 */

export * as defaults from './defaults';
export {
  loadScenarioFile,
  validateScenarioFile,
  resolveScenario,
  listScenarios,
  toScenario,
  deepMerge,
  defaultScenarioPath,
  DEFAULT_SCENARIO,
  type Scenario,
  type ScenarioSummary,
} from './loader';
export { parseScenarioRequest, scenarioFromRequest } from './request';
export {
  ControllerConfigSchema,
  OutputBoundsSchema,
  SimulationRunSchema,
  ScenarioFileSchema,
  ScenarioSectionSchema,
  ScenarioOverridesSchema,
  ScenarioRequestSchema,
  type ScenarioFile,
  type ScenarioSection,
  type ScenarioOverrides,
  type ScenarioRequest,
} from './schemas';

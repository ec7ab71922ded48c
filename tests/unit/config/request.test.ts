import { describe, it, expect } from 'vitest';
import { loadScenarioFile } from '@/config/loader';
import { parseScenarioRequest, scenarioFromRequest } from '@/config/request';
import { catchControlError } from '../../helpers/errors';

describe('parseScenarioRequest', () => {
  it('coerces numeric text and truncates step counts', () => {
    expect(parseScenarioRequest({ kp: '12', ki: ' 0.4 ', steps: '300.7' })).toEqual({
      controller: { kp: 12, ki: 0.4 },
      plant: {},
      ambient: {},
      run: { steps: 300 },
    });
  });

  it('passes numbers through', () => {
    const overrides = parseScenarioRequest({ setpoint: 30, ambientStepAt: 60, ambientStepValue: 18 });

    expect(overrides.run?.setpoint).toBe(30);
    expect(overrides.ambient?.step).toEqual({ at_step: 60, value: 18 });
  });

  it('rejects non-numeric text', () => {
    const error = catchControlError(() => parseScenarioRequest({ kp: 'warm' }));

    expect(error.code).toBe('InvalidConfiguration');
    expect(error.message).toBe("Validation error on field 'kp': Must be a number");
  });

  it('rejects text that overflows to infinity', () => {
    expect(catchControlError(() => parseScenarioRequest({ setpoint: '1e400' })).message).toBe(
      "Validation error on field 'setpoint': Must be finite"
    );
  });

  it('rejects negative step counts', () => {
    expect(catchControlError(() => parseScenarioRequest({ steps: '-3' })).message).toBe(
      "Validation error on field 'steps': Must be non-negative"
    );
  });

  it('rejects unknown fields', () => {
    expect(catchControlError(() => parseScenarioRequest({ gain: 1 })).message).toBe(
      "Validation error on field 'root': Unrecognized key(s) in object: 'gain'"
    );
  });
});

describe('scenarioFromRequest', () => {
  const file = loadScenarioFile();

  it('applies the request over a preset', () => {
    const scenario = scenarioFromRequest(file, { setpoint: '30', ambientStepAt: '60' }, 'p-only');

    expect(scenario.controller.Ki).toBe(0);
    expect(scenario.run.setpoint).toBe(30);
    expect(scenario.run.ambientStep).toEqual({ triggerStep: 60, newAmbientValue: 24 });
  });

  it('starts from the defaults block when no preset is named', () => {
    const scenario = scenarioFromRequest(file, { kp: '3' });

    expect(scenario.name).toBe('defaults');
    expect(scenario.controller).toMatchObject({ Kp: 3, Ki: 0.5 });
  });

  it('rejects a malformed request before resolving', () => {
    expect(catchControlError(() => scenarioFromRequest(file, { ki: '' }, 'pi')).message).toBe(
      "Validation error on field 'ki': Must be a number"
    );
  });
});

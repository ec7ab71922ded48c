import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import { proportionalOffset } from '@/analysis/responseMetrics';
import { loadScenarioFile, resolveScenario } from '@/config/loader';
import { createLogger } from '@/lib/logger';
import { GaussianNoise, createPRNG } from '@/simulator/noise';
import { compareScenarios, runScenario } from '@/simulator/ScenarioRunner';
import { catchControlError } from '../../helpers/errors';

const logger = createLogger('scenario-runner-test', 'silent');

describe('runScenario', () => {
  const file = loadScenarioFile();

  it('runs a preset with its controller settings', () => {
    const result = runScenario(resolveScenario(file, 'pi'), { logger });

    expect(result.stepsCount).toBe(240);
    expect(Math.abs(result.measured[240] - 26)).toBeLessThan(0.01);
  });

  it('logs the scenario it runs', () => {
    const lines: string[] = [];
    const capture = pino({ level: 'info' }, { write: (line: string) => lines.push(line) });

    runScenario(resolveScenario(file, 'p-only'), { logger: capture });

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0]);
    expect(entry).toMatchObject({ msg: 'Running scenario', scenario: 'p-only', Kp: 10, Ki: 0 });
  });

  it('reproduces a noisy preset with a seeded source', () => {
    const scenario = resolveScenario(file, 'pi-noisy');
    const a = runScenario(scenario, { logger, noise: new GaussianNoise(createPRNG(5)) });
    const b = runScenario(scenario, { logger, noise: new GaussianNoise(createPRNG(5)) });

    expect(a.measured).toEqual(b.measured);
  });
});

describe('compareScenarios', () => {
  const file = loadScenarioFile();

  it('shows the offset integral action removes', () => {
    const [pOnly, pi] = compareScenarios(file, ['p-only', 'pi'], { logger });

    expect(pOnly.scenario.name).toBe('p-only');
    expect(pOnly.metrics.finalError).toBeCloseTo(proportionalOffset(26, 24, 10, 0.5), 6);
    expect(pOnly.metrics.steadyStateError).toBeCloseTo(1 / 3, 6);
    expect(pi.metrics.steadyStateError).toBeLessThan(0.01);
    expect(pi.metrics.saturationRatio).toBe(0);
  });

  it('shows the overshoot conditional integration prevents', () => {
    const [withAntiWindup, without] = compareScenarios(
      file,
      ['pi-anti-windup', 'pi-no-anti-windup'],
      { logger }
    );

    expect(withAntiWindup.metrics.maxOvershoot).toBeCloseTo(1.32, 2);
    expect(without.metrics.maxOvershoot).toBeCloseTo(6.564, 3);
    expect(withAntiWindup.metrics.saturationRatio).toBeCloseTo(2 / 240, 10);
    expect(without.metrics.saturationRatio).toBeCloseTo(12 / 240, 10);
  });

  it('fails on an unknown preset before running anything', () => {
    const lines: string[] = [];
    const capture = pino({ level: 'info' }, { write: (line: string) => lines.push(line) });

    const error = catchControlError(() => compareScenarios(file, ['pi', 'nope'], { logger: capture }));

    expect(error.message).toBe('Unknown scenario: nope');
    expect(lines).toHaveLength(0);
  });
});

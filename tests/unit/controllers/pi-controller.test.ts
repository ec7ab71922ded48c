import { describe, it, expect } from 'vitest';
import { PIController, clamp } from '@/controllers/PIController';
import { createPRNG } from '@/simulator/noise';
import { catchControlError } from '../../helpers/errors';

describe('clamp', () => {
  it('limits to the closed interval', () => {
    expect(clamp(5, 0, 3)).toBe(3);
    expect(clamp(-1, 0, 3)).toBe(0);
    expect(clamp(2, 0, 3)).toBe(2);
  });
});

describe('PIController', () => {
  describe('construction', () => {
    it('fills in default bounds and anti-windup', () => {
      const controller = new PIController({ Kp: 2, Ki: 0.5, Ts: 1 });

      expect(controller.getConfig()).toEqual({
        Kp: 2,
        Ki: 0.5,
        Ts: 1,
        uMin: -100,
        uMax: 100,
        antiWindup: true,
      });
      expect(controller.integral).toBe(0);
      expect(controller.lastOutput).toBe(0);
    });

    it('rejects a non-positive sample period', () => {
      const error = catchControlError(() => new PIController({ Kp: 1, Ki: 1, Ts: 0 }));

      expect(error.code).toBe('InvalidConfiguration');
      expect(error.message).toBe("Validation error on field 'Ts': Sample period must be positive");
    });

    it('rejects inverted output bounds', () => {
      const error = catchControlError(
        () => new PIController({ Kp: 1, Ki: 1, Ts: 1, uMin: 10, uMax: -10 })
      );

      expect(error.code).toBe('InvalidConfiguration');
      expect(error.message).toBe("Validation error on field 'uMax': must be >= uMin");
    });

    it('accepts equal bounds', () => {
      const controller = new PIController({ Kp: 1, Ki: 1, Ts: 1, uMin: 4, uMax: 4 });

      expect(controller.step(100, 0)).toBe(4);
    });
  });

  describe('step', () => {
    it('computes P and I terms from the error', () => {
      const controller = new PIController({ Kp: 2, Ki: 0.5, Ts: 1 });

      expect(controller.step(10, 4)).toBe(15);
      expect(controller.integral).toBe(3);
      expect(controller.lastOutput).toBe(15);
      expect(controller.getDiagnostics()).toEqual({
        error: 6,
        P: 12,
        candidateIntegral: 3,
        rawOutput: 15,
        output: 15,
        saturated: false,
        integrationHeld: false,
        integral: 3,
      });
    });

    it('scales integration by the sample period', () => {
      const controller = new PIController({ Kp: 0, Ki: 1, Ts: 1 });
      controller.setSampleTime(0.5);

      expect(controller.step(10, 5)).toBe(2.5);
      expect(controller.sampleTime).toBe(0.5);
    });

    it('rejects non-finite inputs without touching state', () => {
      const controller = new PIController({ Kp: 1, Ki: 1, Ts: 1 });
      controller.step(10, 5);

      const nan = catchControlError(() => controller.step(10, Number.NaN));
      const inf = catchControlError(() => controller.step(Number.POSITIVE_INFINITY, 5));

      expect(nan.code).toBe('InvalidInput');
      expect(inf.code).toBe('InvalidInput');
      expect(controller.integral).toBe(5);
      expect(controller.lastOutput).toBe(10);
    });

    it('rejects inputs whose error overflows, leaving state untouched', () => {
      for (const gains of [{ Kp: 1, Ki: 0 }, { Kp: 0, Ki: 1 }]) {
        const controller = new PIController({ ...gains, Ts: 1 });

        const error = catchControlError(() => controller.step(1e308, -1e308));

        expect(error.code).toBe('InvalidInput');
        expect(controller.integral).toBe(0);
        expect(controller.lastOutput).toBe(0);
        expect(controller.step(26, 20)).toBe(6);
      }
    });

    it('rejects a proportional term that overflows', () => {
      const controller = new PIController({ Kp: 10, Ki: 0.5, Ts: 1 });

      expect(catchControlError(() => controller.step(1e308, 0)).code).toBe('InvalidInput');
      expect(controller.integral).toBe(0);
    });

    it('keeps every output within bounds for generated configurations', () => {
      const random = createPRNG(1234);
      const magnitudes = [1, 1e3, 1e150];

      for (let c = 0; c < 60; c++) {
        const uMin = random() * 200 - 100;
        const uMax = c % 3 === 0 ? uMin : uMin + random() * 200;
        const config = {
          Kp: c % 4 === 0 ? 0 : random() * 20,
          Ki: c % 5 === 0 ? 0 : random() * 5,
          Ts: 0.01 + random() * 2,
          uMin,
          uMax,
          antiWindup: c % 2 === 0,
        };
        const controller = new PIController(config);
        const scale = magnitudes[c % magnitudes.length];

        for (let i = 0; i < 40; i++) {
          const setpoint = (random() * 2 - 1) * scale;
          const measurement = (random() * 2 - 1) * scale;
          const output = controller.step(setpoint, measurement);

          expect(Number.isFinite(output)).toBe(true);
          expect(output).toBeGreaterThanOrEqual(uMin);
          expect(output).toBeLessThanOrEqual(uMax);
          expect(controller.lastOutput).toBe(output);
        }
      }
    });
  });

  describe('reset', () => {
    it('clears the integral', () => {
      const controller = new PIController({ Kp: 0, Ki: 1, Ts: 1 });
      controller.step(10, 5);
      controller.step(10, 5);
      controller.step(10, 5);

      controller.reset();

      expect(controller.integral).toBe(0);
      expect(controller.lastOutput).toBe(0);
      expect(controller.step(10, 5)).toBe(5);
      expect(controller.step(10, 5)).toBe(10);
    });

    it('seeds the integral', () => {
      const controller = new PIController({ Kp: 0, Ki: 1, Ts: 1 });
      controller.reset(2.5);

      expect(controller.integral).toBe(2.5);
      expect(controller.getDiagnostics().integral).toBe(2.5);
      expect(controller.step(10, 5)).toBe(7.5);
    });

    it('rejects a non-finite seed', () => {
      const controller = new PIController({ Kp: 0, Ki: 1, Ts: 1 });

      expect(catchControlError(() => controller.reset(Number.NaN)).code).toBe('InvalidConfiguration');
    });
  });

  describe('anti-windup', () => {
    const bounded = { Kp: 1, Ki: 1, Ts: 1, uMin: -10, uMax: 10 };

    it('holds the integral while saturated and pushing deeper', () => {
      const controller = new PIController(bounded);

      for (let i = 0; i < 20; i++) {
        expect(controller.step(100, 0)).toBe(10);
      }

      expect(controller.integral).toBe(0);
      expect(controller.getDiagnostics()).toMatchObject({
        saturated: true,
        integrationHeld: true,
        rawOutput: 200,
      });
    });

    it('leaves the bound as soon as the error reverses', () => {
      const controller = new PIController(bounded);
      for (let i = 0; i < 20; i++) {
        controller.step(100, 0);
      }

      expect(controller.step(0, 5)).toBe(-10);
      expect(controller.integral).toBe(-5);
    });

    it('winds up without conditional integration', () => {
      const controller = new PIController({ ...bounded, antiWindup: false });
      for (let i = 0; i < 20; i++) {
        controller.step(100, 0);
      }

      expect(controller.integral).toBe(2000);
      expect(controller.step(0, 5)).toBe(10);
      expect(controller.integral).toBe(1995);
    });

    it('holds at the lower bound too', () => {
      const controller = new PIController(bounded);

      expect(controller.step(0, 50)).toBe(-10);
      expect(controller.integral).toBe(0);
    });

    it('integrates while saturated if the error pulls back', () => {
      const controller = new PIController({ Kp: 0, Ki: 1, Ts: 1, uMin: -10, uMax: 10 });
      controller.reset(50);

      expect(controller.step(0, 5)).toBe(10);
      expect(controller.integral).toBe(45);
      expect(controller.getDiagnostics()).toMatchObject({
        saturated: true,
        integrationHeld: false,
      });
    });

    it('can be switched off at runtime', () => {
      const controller = new PIController(bounded);
      controller.setAntiWindup(false);
      controller.step(100, 0);

      expect(controller.integral).toBe(100);
      expect(controller.getConfig().antiWindup).toBe(false);
    });
  });

  describe('reconfiguration', () => {
    it('updates gains selectively', () => {
      const controller = new PIController({ Kp: 2, Ki: 0.5, Ts: 1 });
      controller.setGains(null, 2);

      expect(controller.getGains()).toEqual({ Kp: 2, Ki: 2 });
      expect(catchControlError(() => controller.setGains(Number.NaN, null)).code).toBe(
        'InvalidConfiguration'
      );
      expect(controller.getGains()).toEqual({ Kp: 2, Ki: 2 });
    });

    it('changes output limits without touching the integral', () => {
      const controller = new PIController({ Kp: 0, Ki: 1, Ts: 1 });
      controller.step(10, 5);
      controller.setOutputLimits(-1, 1);

      expect(controller.integral).toBe(5);
      expect(controller.step(10, 5)).toBe(1);
      expect(controller.integral).toBe(5);
    });

    it('rejects inverted output limits', () => {
      const controller = new PIController({ Kp: 1, Ki: 1, Ts: 1 });
      const error = catchControlError(() => controller.setOutputLimits(5, -5));

      expect(error.code).toBe('InvalidConfiguration');
      expect(controller.getConfig().uMin).toBe(-100);
    });

    it('rejects a non-positive sample time', () => {
      const controller = new PIController({ Kp: 1, Ki: 1, Ts: 1 });
      const error = catchControlError(() => controller.setSampleTime(-1));

      expect(error.message).toBe("Validation error on field 'Ts': Sample period must be positive");
      expect(controller.sampleTime).toBe(1);
    });

    it('returns diagnostics by value', () => {
      const controller = new PIController({ Kp: 1, Ki: 1, Ts: 1 });
      controller.step(3, 1);

      const diagnostics = controller.getDiagnostics();
      diagnostics.integral = 999;

      expect(controller.getDiagnostics().integral).toBe(2);
    });
  });
});

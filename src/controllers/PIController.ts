/**
 * PI Controller Implementation
 *
 * A discrete Proportional-Integral controller with bounded output and
 * conditional-integration anti-windup.
 *
 * Each sample period:
 * - error = setpoint - measurement
 * - candidate integral = I + Ki * Ts * error
 * - raw output = Kp * error + candidate integral
 * - output = raw output clamped to [uMin, uMax]
 *
 * The candidate integral is discarded when the output is clamped and the
 * error pushes further into the same bound; otherwise it is committed.
 */

import { ControlError, zodErrorToControlError } from '../lib/errors';
import { ControllerConfigSchema, OutputBoundsSchema, SamplePeriod } from '../config/schemas';
import type {
  IController,
  PIControllerConfig,
  PIDiagnostics,
  PIGains,
  ResolvedPIControllerConfig,
} from './types';

/**
 * Clamp a value to [lo, hi]
 */
export function clamp(x: number, lo: number, hi: number): number {
  return x < lo ? lo : x > hi ? hi : x;
}

export class PIController implements IController {
  // Gains
  private Kp: number;
  private Ki: number;

  // Sample period (s)
  private Ts: number;

  // Output limits
  private uMin: number;
  private uMax: number;

  private antiWindup: boolean;

  // Internal state
  private I: number;
  private lastU: number;

  private diagnostics: PIDiagnostics;

  /**
   * Create a PI controller
   *
   * @param config - Gains, sample period and output bounds (default [-100, 100])
   * @throws ControlError InvalidConfiguration when Ts <= 0, uMin > uMax or a value is not finite
   */
  constructor(config: PIControllerConfig) {
    const parsed = ControllerConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw zodErrorToControlError(parsed.error);
    }

    this.Kp = parsed.data.Kp;
    this.Ki = parsed.data.Ki;
    this.Ts = parsed.data.Ts;
    this.uMin = parsed.data.uMin;
    this.uMax = parsed.data.uMax;
    this.antiWindup = parsed.data.antiWindup;

    this.I = 0.0;
    this.lastU = 0.0;
    this.diagnostics = PIController.emptyDiagnostics();
  }

  /**
   * Compute the bounded control output for one sample period
   *
   * @param setpoint - Desired value
   * @param measurement - Current measured value
   * @returns Control output within [uMin, uMax]
   * @throws ControlError InvalidInput when either argument is NaN or infinite, or the
   *   error or output overflows
   */
  step(setpoint: number, measurement: number): number {
    if (!Number.isFinite(setpoint) || !Number.isFinite(measurement)) {
      throw new ControlError(
        'InvalidInput',
        `Setpoint and measurement must be finite (setpoint=${setpoint}, measurement=${measurement})`,
        { setpoint, measurement }
      );
    }

    const error = setpoint - measurement;

    const P = this.Kp * error;
    const candidateIntegral = this.I + this.Ki * this.Ts * error;

    const rawOutput = P + candidateIntegral;
    // Finite inputs can still overflow; reject before any state changes
    if (!Number.isFinite(error) || !Number.isFinite(candidateIntegral) || !Number.isFinite(rawOutput)) {
      throw new ControlError(
        'InvalidInput',
        `Control computation overflowed (setpoint=${setpoint}, measurement=${measurement})`,
        { setpoint, measurement, error, candidateIntegral, rawOutput }
      );
    }
    const output = clamp(rawOutput, this.uMin, this.uMax);

    const saturated = rawOutput !== output;
    const pushingDeeper = (rawOutput > output && error > 0) || (rawOutput < output && error < 0);

    const integrationHeld = this.antiWindup && saturated && pushingDeeper;
    if (!integrationHeld) {
      this.I = candidateIntegral;
    }

    this.lastU = output;
    this.diagnostics = {
      error,
      P,
      candidateIntegral,
      rawOutput,
      output,
      saturated,
      integrationHeld,
      integral: this.I,
    };

    return output;
  }

  /**
   * Reset controller state
   *
   * Never called automatically; the simulation driver calls it before
   * every run.
   *
   * @param initialIntegral - Starting integral accumulator value (default: 0)
   */
  reset(initialIntegral: number = 0.0): void {
    if (!Number.isFinite(initialIntegral)) {
      throw new ControlError('InvalidConfiguration', 'Initial integral must be finite', {
        initialIntegral,
      });
    }
    this.I = initialIntegral;
    this.lastU = 0.0;
    this.diagnostics = PIController.emptyDiagnostics();
    this.diagnostics.integral = initialIntegral;
  }

  /**
   * Update gains
   *
   * @param Kp - New proportional gain (or null to keep current)
   * @param Ki - New integral gain (or null to keep current)
   */
  setGains(Kp: number | null, Ki: number | null): void {
    const next = { Kp: Kp ?? this.Kp, Ki: Ki ?? this.Ki };
    if (!Number.isFinite(next.Kp) || !Number.isFinite(next.Ki)) {
      throw new ControlError('InvalidConfiguration', 'Gains must be finite', next);
    }
    this.Kp = next.Kp;
    this.Ki = next.Ki;
  }

  /**
   * Replace the output bounds
   *
   * The integral accumulator is left as is; the next step re-evaluates
   * saturation against the new bounds.
   */
  setOutputLimits(uMin: number, uMax: number): void {
    const parsed = OutputBoundsSchema.safeParse({ uMin, uMax });
    if (!parsed.success) {
      throw zodErrorToControlError(parsed.error);
    }
    this.uMin = parsed.data.uMin;
    this.uMax = parsed.data.uMax;
  }

  /**
   * Replace the sample period
   */
  setSampleTime(Ts: number): void {
    const parsed = SamplePeriod.safeParse(Ts);
    if (!parsed.success) {
      throw new ControlError(
        'InvalidConfiguration',
        `Validation error on field 'Ts': ${parsed.error.issues[0]?.message ?? 'Invalid value'}`,
        { Ts }
      );
    }
    this.Ts = parsed.data;
  }

  /**
   * Enable or disable conditional integration
   */
  setAntiWindup(enabled: boolean): void {
    this.antiWindup = enabled;
  }

  getGains(): PIGains {
    return {
      Kp: this.Kp,
      Ki: this.Ki,
    };
  }

  getConfig(): ResolvedPIControllerConfig {
    return {
      Kp: this.Kp,
      Ki: this.Ki,
      Ts: this.Ts,
      uMin: this.uMin,
      uMax: this.uMax,
      antiWindup: this.antiWindup,
    };
  }

  /**
   * Get diagnostic information for tuning
   *
   * `integrationHeld` shows the anti-windup rule at work: the output was
   * pinned and the error kept pushing into the bound.
   */
  getDiagnostics(): PIDiagnostics {
    return { ...this.diagnostics };
  }

  get integral(): number {
    return this.I;
  }

  get lastOutput(): number {
    return this.lastU;
  }

  get sampleTime(): number {
    return this.Ts;
  }

  private static emptyDiagnostics(): PIDiagnostics {
    return {
      error: 0.0,
      P: 0.0,
      candidateIntegral: 0.0,
      rawOutput: 0.0,
      output: 0.0,
      saturated: false,
      integrationHeld: false,
      integral: 0.0,
    };
  }
}

/**
 * Response Metrics
 *
 * Summaries of a closed-loop trajectory. Tracking error here is the
 * state-based error `setpoint[k] - measured[k]` over all stepsCount + 1
 * samples, so the final entry reflects the last plant update.
 */

import { METRICS } from '../config/defaults';
import type { OutputBounds, SimulationResult } from '../simulator/types';

export interface ResponseMetricsOptions {
  /** Trailing samples averaged for the steady-state error (at least 1) */
  steadyStateWindow?: number;
  /** Settling band as a fraction of the initial |error| */
  settlingBandFraction?: number;
  /** Bounds the control was clamped to; needed for saturationRatio */
  outputBounds?: OutputBounds;
}

export interface ResponseMetrics {
  /** setpoint - measured at the last sample */
  finalError: number;
  /** Mean |error| over the trailing window */
  steadyStateError: number;
  /** Largest excursion above the setpoint (0 if never above) */
  maxOvershoot: number;
  /** First sample from which |error| stays inside the band, or null */
  settlingIndex: number | null;
  /** Σ|error[k]|·Ts over the recorded transitions */
  integralAbsoluteError: number;
  /** Share of control samples at a bound, or null without bounds */
  saturationRatio: number | null;
}

function trackingError(result: SimulationResult, k: number): number {
  return result.setpoint[k] - result.measured[k];
}

/**
 * Summarize a simulation result
 *
 * @example
 * ```typescript
 * const metrics = summarizeResponse(result, { outputBounds: { uMin: -100, uMax: 100 } });
 * metrics.saturationRatio; // share of steps spent at ±100
 * ```
 */
export function summarizeResponse(
  result: SimulationResult,
  options: ResponseMetricsOptions = {}
): ResponseMetrics {
  const window = Math.max(1, Math.floor(options.steadyStateWindow ?? METRICS.STEADY_STATE_WINDOW));
  const bandFraction = options.settlingBandFraction ?? METRICS.SETTLING_BAND_FRACTION;
  const samples = result.stepsCount + 1;

  const first = Math.max(0, samples - window);
  let trailingSum = 0;
  for (let k = first; k < samples; k++) {
    trailingSum += Math.abs(trackingError(result, k));
  }

  let maxOvershoot = 0;
  for (let k = 0; k < samples; k++) {
    maxOvershoot = Math.max(maxOvershoot, -trackingError(result, k));
  }

  const band = bandFraction * Math.abs(trackingError(result, 0));
  let settlingIndex: number | null = 0;
  for (let k = samples - 1; k >= 0; k--) {
    if (Math.abs(trackingError(result, k)) > band) {
      settlingIndex = k + 1 < samples ? k + 1 : null;
      break;
    }
  }

  let iae = 0;
  for (let k = 0; k < result.stepsCount; k++) {
    iae += Math.abs(result.error[k]) * result.Ts;
  }

  let saturationRatio: number | null = null;
  if (options.outputBounds) {
    const { uMin, uMax } = options.outputBounds;
    let saturated = 0;
    for (let k = 0; k < result.stepsCount; k++) {
      if (result.control[k] <= uMin || result.control[k] >= uMax) {
        saturated++;
      }
    }
    saturationRatio = result.stepsCount > 0 ? saturated / result.stepsCount : 0;
  }

  return {
    finalError: trackingError(result, samples - 1),
    steadyStateError: trailingSum / (samples - first),
    maxOvershoot,
    settlingIndex,
    integralAbsoluteError: iae,
    saturationRatio,
  };
}

/**
 * Steady-state error of a proportional-only loop on the first-order plant
 *
 * From y* = ambient + beta·Kp·(r - y*): e* = (r - ambient) / (1 + Kp·beta).
 */
export function proportionalOffset(
  setpoint: number,
  ambient: number,
  Kp: number,
  beta: number
): number {
  return (setpoint - ambient) / (1 + Kp * beta);
}

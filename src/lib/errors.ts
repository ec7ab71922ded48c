/**
 * Control Errors
 *
 * A single error type for every failure the controller, the simulation
 * driver and the configuration layer can raise. Saturation, persistent
 * error and oscillation are normal operating states and never surface here.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to callers.
 *
 * - InvalidConfiguration: non-positive sample period, inverted output bounds,
 *   malformed scenario values
 * - InvalidInput: non-finite setpoint or measurement passed to a step
 * - InvalidState: a run started while another run on the same driver is in progress
 */
export type ControlErrorCode = 'InvalidConfiguration' | 'InvalidInput' | 'InvalidState';

/**
 * Plain-object form of a ControlError
 */
export interface ControlErrorShape {
  code: ControlErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class ControlError extends Error implements ControlErrorShape {
  public readonly code: ControlErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: ControlErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ControlError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape (for logs and UI collaborators).
   */
  public toObject(): ControlErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Convert a Zod validation error to a ControlError
 *
 * The message names the first failing field; every issue is kept in
 * `details.issues`.
 *
 * @example
 * ```typescript
 * const result = ControllerConfigSchema.safeParse({ Kp: 1, Ki: 0, Ts: 0 });
 * if (!result.success) {
 *   throw zodErrorToControlError(result.error);
 * }
 * // Throws: "Validation error on field 'Ts': Sample period must be positive"
 * ```
 */
export function zodErrorToControlError(
  error: ZodError,
  code: ControlErrorCode = 'InvalidConfiguration'
): ControlError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'Invalid value'}`;

  return new ControlError(code, message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}

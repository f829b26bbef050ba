// src/utils/intakeErrors.ts
import { HttpError } from './httpError.js';

export type IntakeStep = 'resolve_customer' | 'resolve_vehicle' | 'create_order' | 'record_visit' | 'commit';

/** The identity tuple or request is insufficiently specified. Raised before any store access. */
export class ValidationFailure extends HttpError {
  constructor(message: string, details?: unknown) {
    super(422, 'VALIDATION_ERROR', message, { details });
    this.name = 'ValidationFailure';
  }
}

/** Retries exhausted without finding the expected record. Callers may retry. */
export class ResolutionFailure extends HttpError {
  readonly retryable = true;

  constructor(message: string, details?: Record<string, unknown>) {
    super(409, 'RESOLUTION_FAILED', message, { details });
    this.name = 'ResolutionFailure';
  }
}

/**
 * A step inside the coordinated unit of work failed; the whole unit was rolled
 * back, so nothing it touched is persisted.
 */
export class AtomicityViolation extends HttpError {
  readonly step: IntakeStep;
  readonly retryable: boolean;

  constructor(step: IntakeStep, cause: unknown) {
    const retryable = isRetryable(cause);
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(retryable ? 409 : 500, 'INTAKE_ROLLED_BACK', `Intake rolled back at ${step}: ${reason}`, {
      details: { step, retryable },
      cause,
    });
    this.name = 'AtomicityViolation';
    this.step = step;
    this.retryable = retryable;
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof ResolutionFailure || (error instanceof AtomicityViolation && error.retryable);
}

// src/utils/httpError.ts
import type { ApiErrorBody } from '@intake-desk/shared';

export class HttpError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(status: number, code: string, message?: string, options?: { details?: unknown; cause?: unknown }) {
    super(message || code, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'HttpError';
    this.status = status;
    this.code = code;
    this.details = options?.details;
    Error.captureStackTrace?.(this, new.target);
  }

  toJSON(): ApiErrorBody {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details ?? null,
      },
    };
  }
}

/** Base factory */
function h(status: number, code: string, message?: string, details?: unknown): HttpError {
  return new HttpError(status, code, message, { details });
}

export const NotFound = (msg?: string, details?: unknown) => h(404, 'NOT_FOUND', msg, details);

/** Type guard */
export function isHttpError(err: unknown): err is HttpError {
  return err instanceof HttpError;
}

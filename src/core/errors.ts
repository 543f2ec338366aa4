/**
 * Error taxonomy.
 *
 * Nothing in the decision path throws across its public surface:
 * operations return a Result, and the worst outcome of any failure
 * is "don't auto-respond, defer to the external generator".
 */

import type { ZodError } from 'zod';

export type ErrorCode =
  | 'INVALID_INPUT'
  | 'VALIDATION_ERROR'
  | 'TEMPLATE_ERROR'
  | 'GUARD_UNAVAILABLE'
  | 'SINK_UNAVAILABLE'
  | 'STORE_UNAVAILABLE'
  | 'NOT_FOUND';

export class EngineError extends Error {
  readonly code: ErrorCode;
  /** HTTP status the API answers with */
  readonly status: number;
  readonly details: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, status: number, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.details = details;
  }

  toJSON() {
    return { error: this.message, code: this.code, details: this.details };
  }
}

/** Message text missing, empty, malformed or too long */
export class InvalidInputError extends EngineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'INVALID_INPUT', 400, details);
  }
}

/** Pattern (or feedback) rejected before anything changed */
export class ValidationError extends EngineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'VALIDATION_ERROR', 422, details);
  }

  static fromZod(error: ZodError, message = 'Validation failed'): ValidationError {
    return new ValidationError(message, {
      issues: error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
}

/** Template needs context that is not there */
export class TemplateError extends EngineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'TEMPLATE_ERROR', 422, details);
  }
}

/** Per-user guard state cannot be read or written */
export class GuardUnavailableError extends EngineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'GUARD_UNAVAILABLE', 503);
    if (cause !== undefined) this.cause = cause;
  }
}

/** Stats sink rejected a write. Never fatal. */
export class SinkUnavailableError extends EngineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SINK_UNAVAILABLE', 503);
    if (cause !== undefined) this.cause = cause;
  }
}

/** Pattern store rejected a read or write; the active set is unchanged */
export class StoreUnavailableError extends EngineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'STORE_UNAVAILABLE', 503);
    if (cause !== undefined) this.cause = cause;
  }
}

export class NotFoundError extends EngineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'NOT_FOUND', 404, details);
  }
}

// ── Result ─────────────────────────────────────────────────

export type Result<T, E extends EngineError = EngineError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends EngineError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

import { ErrorCode, type ApiError } from '@mrm/shared';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }

  toApiError(requestId: string): ApiError {
    return {
      error: {
        code: this.code,
        message: this.message,
        requestId,
        ...(this.details && { details: this.details }),
      },
    };
  }
}

// Malformed observation or request: skip, log, continue
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.VALIDATION_ERROR, message, 400, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(ErrorCode.NOT_FOUND, `${resource} not found: ${id}`, 404);
    this.name = 'NotFoundError';
  }
}

// Non-fatal: the observation becomes a new, flagged entity
export class AmbiguousMatchError extends AppError {
  constructor(identityKey: string, candidateKeys: string[], reason: string) {
    super(
      ErrorCode.AMBIGUOUS_MATCH,
      `Ambiguous match for ${identityKey}: ${reason}`,
      409,
      { identityKey, candidateKeys, reason }
    );
    this.name = 'AmbiguousMatchError';
  }
}

// Source-level failure for one entity
export class CollectorError extends AppError {
  constructor(source: string, message: string, details?: Record<string, unknown>) {
    super(ErrorCode.COLLECTOR_ERROR, `Collector ${source} failed: ${message}`, 502, {
      source,
      ...details,
    });
    this.name = 'CollectorError';
  }
}

// Persistence failure for one merge
export class StorageError extends AppError {
  constructor(operation: string, message: string, details?: Record<string, unknown>) {
    super(ErrorCode.STORAGE_ERROR, `Storage ${operation} failed: ${message}`, 503, {
      operation,
      ...details,
    });
    this.name = 'StorageError';
  }
}

// A write raced another writer: an entity changed under a merge, or a task is already open
export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.CONFLICT, message, 409, details);
    this.name = 'ConflictError';
  }
}

// Configuration or setup failure: fatal for a whole batch
export class OrchestrationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.ORCHESTRATION_ERROR, message, 500, details);
    this.name = 'OrchestrationError';
  }
}

export class InvalidStateTransitionError extends AppError {
  constructor(from: string, to: string) {
    super(
      ErrorCode.INVALID_STATE_TRANSITION,
      `Invalid state transition from ${from} to ${to}`,
      400
    );
    this.name = 'InvalidStateTransitionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Wrap anything thrown below the orchestrator into a typed error
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  return new AppError(ErrorCode.INTERNAL_ERROR, errorMessage(error), 500);
}

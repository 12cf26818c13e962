import type { OperationError } from '../types/index.js';
import { isErrorWithCode, toErrorWithMessage } from '../types/index.js';

/**
 * Error taxonomy for the coordination core
 */

export type CoordinationErrorCode =
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'BUSY'
  | 'VALIDATION_ERROR'
  | 'STORAGE_CORRUPTION'
  | 'INTERNAL_ERROR';

export class CoordinationError extends Error {
  readonly code: CoordinationErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: CoordinationErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class NotFoundError extends CoordinationError {
  constructor(entity: string, id: string) {
    super('NOT_FOUND', `${entity} ${id} not found`, { entity, id });
  }
}

export class BusyError extends CoordinationError {
  constructor(key: string, attempts: number, cause?: string) {
    super('BUSY', `Storage key ${key} is busy after ${attempts} attempts`, {
      key,
      attempts,
      ...(cause ? { cause } : {}),
    });
  }
}

export interface FieldError {
  field: string;
  message: string;
  value?: unknown;
}

export class ValidationError extends CoordinationError {
  readonly validationDetails: FieldError[];
  readonly isValidationError = true;

  constructor(message: string, validationDetails: FieldError[] = []) {
    super('VALIDATION_ERROR', message, { fields: validationDetails });
    this.validationDetails = validationDetails;
  }
}

export class StorageCorruptionError extends CoordinationError {
  constructor(key: string, reason: string, quarantinedTo?: string) {
    super('STORAGE_CORRUPTION', `Corrupt record at ${key}: ${reason}`, {
      key,
      reason,
      ...(quarantinedTo ? { quarantinedTo } : {}),
    });
  }
}

export function isCoordinationError(error: unknown): error is CoordinationError {
  return error instanceof CoordinationError;
}

/**
 * Convert anything thrown into the structured error returned to callers
 */
export function toOperationError(error: unknown): OperationError {
  if (isCoordinationError(error)) {
    return { code: error.code, message: error.message, details: error.details };
  }
  if (isErrorWithCode(error)) {
    return { code: error.code, message: error.message };
  }
  return { code: 'INTERNAL_ERROR', message: toErrorWithMessage(error).message };
}

// Core entity types
export * from './Storage.js';
export * from './Agent.js';
export * from './Context.js';
export * from './FileLock.js';
export * from './SessionEvent.js';
export * from './Project.js';

// Every coordination operation resolves to one of these
export type OperationResult<T> =
  | { success: true; data: T }
  | { success: false; error: OperationError };

export interface OperationError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// Error handling types and utilities
export interface ErrorWithMessage {
  message: string;
}

export interface ErrorWithCode extends ErrorWithMessage {
  code: string;
}

export function isErrorWithMessage(error: unknown): error is ErrorWithMessage {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

export function isErrorWithCode(error: unknown): error is ErrorWithCode {
  return (
    isErrorWithMessage(error) &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

export function toErrorWithMessage(maybeError: unknown): ErrorWithMessage {
  if (isErrorWithMessage(maybeError)) return maybeError;
  
  try {
    return new Error(JSON.stringify(maybeError));
  } catch {
    // fallback in case there's an error stringifying the maybeError
    // like with circular references for example.
    return new Error(String(maybeError));
  }
}

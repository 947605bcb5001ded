/**
 * Domain Error System
 *
 * Every error raised by repositories and domain services extends
 * RepositoryError so the transport layer can map it by class.
 */

/**
 * Base error class for all repository and service operations
 */
export class RepositoryError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RepositoryError';
    Object.setPrototypeOf(this, RepositoryError.prototype);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      stack: this.stack,
    };
  }
}

export interface NotFoundErrorOptions {
  /** Overrides the generated "<type> with ID '<id>' not found" message */
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Entity not found error
 * Thrown when attempting to access a non-existent entity
 */
export class NotFoundError extends RepositoryError {
  constructor(entityType: string, entityId: string, options?: NotFoundErrorOptions) {
    super(
      options?.message ?? `${entityType} with ID '${entityId}' not found`,
      'NOT_FOUND',
      { entityType, entityId, ...options?.details }
    );
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
  value?: unknown;
}

/**
 * Validation error
 * Thrown when input or stored data fails validation
 */
export class ValidationError extends RepositoryError {
  constructor(
    message: string,
    public readonly errors: ValidationErrorDetail[] = [],
    details?: Record<string, unknown>
  ) {
    super(message, 'VALIDATION_ERROR', { errors, ...details });
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Conflict error
 * Thrown when operation conflicts with existing data
 */
export class ConflictError extends RepositoryError {
  constructor(
    message: string,
    public readonly conflictType: 'duplicate' | 'version' | 'constraint' | 'state',
    details?: Record<string, unknown>
  ) {
    super(message, 'CONFLICT', { conflictType, ...details });
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

/**
 * Lock error
 * Thrown when lock operation fails
 */
export class LockError extends RepositoryError {
  constructor(
    message: string,
    public readonly lockType: 'acquire' | 'release' | 'timeout' | 'disposed',
    details?: Record<string, unknown>
  ) {
    super(message, 'LOCK_ERROR', { lockType, ...details });
    this.name = 'LockError';
    Object.setPrototypeOf(this, LockError.prototype);
  }
}

/**
 * Storage error
 * Thrown when underlying storage system fails
 */
export class StorageError extends RepositoryError {
  constructor(
    message: string,
    public readonly storageType: string,
    public readonly cause?: Error,
    details?: Record<string, unknown>
  ) {
    super(message, 'STORAGE_ERROR', { storageType, cause: cause?.message, ...details });
    this.name = 'StorageError';
    Object.setPrototypeOf(this, StorageError.prototype);
  }
}

/**
 * Permission error
 * Thrown when the acting user may not perform the operation
 */
export class PermissionDeniedError extends RepositoryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PERMISSION_DENIED', details);
    this.name = 'PermissionDeniedError';
    Object.setPrototypeOf(this, PermissionDeniedError.prototype);
  }
}

/**
 * Authentication error
 * Thrown for bad, expired or revoked credentials
 */
export class AuthenticationError extends RepositoryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTHENTICATION_FAILED', details);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Type guard to check if error is a RepositoryError
 */
export function isRepositoryError(error: unknown): error is RepositoryError {
  return error instanceof RepositoryError;
}

/**
 * Extract error information for logging
 */
export function extractErrorInfo(error: unknown): {
  name: string;
  message: string;
  code?: string;
  details?: Record<string, unknown>;
  stack?: string;
} {
  if (isRepositoryError(error)) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      details: error.details,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}

/**
 * Application error hierarchy.
 * Every error carries a machine-readable code and the HTTP status it maps to.
 */

import type { ErrorCode } from './types/api.js';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super('UNAUTHORIZED', message, 401);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Insufficient permissions') {
    super('FORBIDDEN', message, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

/** Backup snapshot could not be persisted. */
export class BackupError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('BACKUP_FAILED', message, 500, details);
  }
}

/** Stored field configuration could not be interpreted. */
export class SchemaError extends AppError {
  constructor(message: string) {
    super('INVALID_SCHEMA', message, 500);
  }
}

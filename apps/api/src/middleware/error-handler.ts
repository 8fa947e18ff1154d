import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import type { ContractStatus } from '@quill/shared';
import { logger } from '../shared/logger';

export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super(401, message, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(404, `${resource} with id ${id} not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Access denied') {
    super(403, message, 'FORBIDDEN');
    this.name = 'ForbiddenError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code = 'CONFLICT', details?: Record<string, unknown>, statusCode = 409) {
    super(statusCode, message, code, details);
    this.name = 'ConflictError';
  }
}

/**
 * A status change outside the transition table.
 * Surfaces as 400 even though it is a conflict with the current state.
 */
export class InvalidTransitionError extends ConflictError {
  constructor(oldStatus: ContractStatus, newStatus: ContractStatus) {
    super(`Cannot transition from ${oldStatus} to ${newStatus}`, 'INVALID_TRANSITION', { oldStatus, newStatus }, 400);
    this.name = 'InvalidTransitionError';
  }
}

export class DuplicateEmailError extends ConflictError {
  constructor(email: string) {
    super(`A party with email ${email} is already on this contract`, 'DUPLICATE_EMAIL', { email });
    this.name = 'DuplicateEmailError';
  }
}

/**
 * Global error handler middleware.
 * Converts known error types to structured API responses.
 */
export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof AppError) {
    res.status(err.statusCode).json({
      code: err.code,
      message: err.message,
      details: err.details,
    });
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      code: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      details: { issues: err.issues },
    });
    return;
  }

  // Infrastructure and unexpected errors: never leak internals
  logger.error({ err }, 'Unhandled error');
  res.status(500).json({
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
  });
}

/**
 * Error Handler Tests
 */

import { describe, it, expect, vi } from 'vitest';
import type { Request, Response, NextFunction } from 'express';
import { ZodError, ZodIssueCode } from 'zod';
import {
  AppError,
  ValidationError,
  NotFoundError,
  ForbiddenError,
  ConflictError,
  InvalidTransitionError,
  DuplicateEmailError,
  errorHandler,
} from './error-handler';

// Mock logger to suppress output during tests
vi.mock('../shared/logger', () => ({
  logger: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  },
}));

function mockRes(): Response {
  const res = {
    status: vi.fn().mockReturnThis(),
    json: vi.fn().mockReturnThis(),
  } as unknown as Response;
  return res;
}

const mockReq = {} as Request;
const mockNext = vi.fn() as NextFunction;

describe('AppError', () => {
  it('stores statusCode, message, code, and details', () => {
    const err = new AppError(422, 'Invalid input', 'VALIDATION_FAILED', { field: 'email' });
    expect(err.statusCode).toBe(422);
    expect(err.message).toBe('Invalid input');
    expect(err.code).toBe('VALIDATION_FAILED');
    expect(err.details).toEqual({ field: 'email' });
    expect(err).toBeInstanceOf(Error);
  });

  it('defaults code to INTERNAL_ERROR', () => {
    const err = new AppError(500, 'Boom');
    expect(err.code).toBe('INTERNAL_ERROR');
    expect(err.details).toBeUndefined();
  });
});

describe('business error kinds', () => {
  it('ValidationError is a 400', () => {
    const err = new ValidationError('Reason required for cancellation');
    expect(err.statusCode).toBe(400);
    expect(err.code).toBe('VALIDATION_ERROR');
  });

  it('NotFoundError formats the resource and id', () => {
    const err = new NotFoundError('Contract', 'abc-123');
    expect(err.statusCode).toBe(404);
    expect(err.code).toBe('NOT_FOUND');
    expect(err.message).toBe('Contract with id abc-123 not found');
  });

  it('ForbiddenError defaults its message', () => {
    const err = new ForbiddenError();
    expect(err.statusCode).toBe(403);
    expect(err.code).toBe('FORBIDDEN');
    expect(err.message).toBe('Access denied');
  });

  it('ConflictError is a 409', () => {
    const err = new ConflictError('Cannot delete a fully signed contract');
    expect(err.statusCode).toBe(409);
    expect(err.code).toBe('CONFLICT');
  });

  it('InvalidTransitionError specializes ConflictError and carries both statuses', () => {
    const err = new InvalidTransitionError('SIGNING', 'DRAFT');
    expect(err).toBeInstanceOf(ConflictError);
    expect(err.statusCode).toBe(400);
    expect(err.code).toBe('INVALID_TRANSITION');
    expect(err.message).toBe('Cannot transition from SIGNING to DRAFT');
    expect(err.details).toEqual({ oldStatus: 'SIGNING', newStatus: 'DRAFT' });
  });

  it('DuplicateEmailError specializes ConflictError', () => {
    const err = new DuplicateEmailError('ana@example.com');
    expect(err).toBeInstanceOf(ConflictError);
    expect(err.statusCode).toBe(409);
    expect(err.code).toBe('DUPLICATE_EMAIL');
    expect(err.details).toEqual({ email: 'ana@example.com' });
  });
});

describe('errorHandler', () => {
  it('handles AppError with correct status and body', () => {
    const res = mockRes();
    const err = new AppError(422, 'Bad', 'BAD', { x: 1 });

    errorHandler(err, mockReq, res, mockNext);

    expect(res.status).toHaveBeenCalledWith(422);
    expect(res.json).toHaveBeenCalledWith({
      code: 'BAD',
      message: 'Bad',
      details: { x: 1 },
    });
  });

  it('renders an invalid transition with its details', () => {
    const res = mockRes();

    errorHandler(new InvalidTransitionError('SIGNED', 'DRAFT'), mockReq, res, mockNext);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      code: 'INVALID_TRANSITION',
      message: 'Cannot transition from SIGNED to DRAFT',
      details: { oldStatus: 'SIGNED', newStatus: 'DRAFT' },
    });
  });

  it('handles ZodError as 400 VALIDATION_ERROR', () => {
    const res = mockRes();
    const zodErr = new ZodError([
      {
        code: ZodIssueCode.invalid_type,
        expected: 'string',
        received: 'number',
        path: ['title'],
        message: 'Expected string, received number',
      },
    ]);

    errorHandler(zodErr, mockReq, res, mockNext);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      code: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      details: { issues: zodErr.issues },
    });
  });

  it('hides infrastructure errors behind a generic 500', () => {
    const res = mockRes();
    const err = new Error('connection terminated unexpectedly');

    errorHandler(err, mockReq, res, mockNext);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    });
  });
});

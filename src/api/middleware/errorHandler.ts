// API layer: Global error handler middleware

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { GameEngineError, IllegalActionError } from '@/utils/errors.js';

export class ApiError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code: string = 'INTERNAL_ERROR',
    public details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export function createError(
  message: string,
  statusCode: number = 500,
  code?: string,
  details?: unknown
): ApiError {
  return new ApiError(message, statusCode, code, details);
}

export interface ErrorBody {
  code: string;
  message: string;
  details?: unknown;
  forceApplyAvailable?: boolean;
}

export function describeError(err: unknown): { statusCode: number; body: ErrorBody } {
  if (err instanceof ZodError) {
    return {
      statusCode: 400,
      body: { code: 'VALIDATION_ERROR', message: 'Invalid request', details: err.flatten() },
    };
  }
  if (err instanceof GameEngineError) {
    return {
      statusCode: err.statusCode,
      body: {
        code: err.code,
        message: err.message,
        ...(err.details ? { details: err.details } : {}),
        ...(err instanceof IllegalActionError && err.forceApplyAvailable ? { forceApplyAvailable: true } : {}),
      },
    };
  }
  if (err instanceof ApiError) {
    return {
      statusCode: err.statusCode,
      body: { code: err.code, message: err.message, ...(err.details ? { details: err.details } : {}) },
    };
  }
  // express.json() reports malformed bodies with a status on the error
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return { statusCode: 400, body: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' } };
  }
  return {
    statusCode: 500,
    body: { code: 'INTERNAL_ERROR', message: err instanceof Error ? err.message : String(err) },
  };
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const { statusCode, body } = describeError(err);

  // Log error details (but not in test environment)
  if (process.env.NODE_ENV !== 'test') {
    console.error(`[Error ${body.code}] ${body.message}`);
    if (statusCode === 500 && err instanceof Error && err.stack) {
      console.error(err.stack);
    }
  }

  // Don't leak error details in production
  const isProduction = process.env.NODE_ENV === 'production';
  if (isProduction && statusCode === 500) {
    body.message = 'Internal server error';
  }
  if (isProduction) {
    delete body.details;
  }

  res.status(statusCode).json({ success: false, error: body });
}

// Async handler wrapper to avoid try-catch in every route
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

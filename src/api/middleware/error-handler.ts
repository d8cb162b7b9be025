// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER — API Error Classes and Express Error Middleware
// ═══════════════════════════════════════════════════════════════════════════════
//
// Routes throw; asyncHandler forwards rejections to errorHandler, which maps
// API errors, validation failures and pipeline errors to one JSON shape:
//
//   { error, code, details?, requestId?, timestamp }
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { ConfigError, getEnvironment, isConfigLoaded } from '../../config/index.js';
import { ResourceNotFoundError } from '../../conversion/service.js';
import { SessionBusyError } from '../../conversion/session.js';
import { WorkbookError } from '../../conversion/workbook.js';
import { getLogger } from '../../logging/index.js';
import { AlignmentError, BatchAbort, UnparsableResponse } from '../../pipeline/errors.js';
import { ProviderCallFailed, UnknownModelError } from '../../providers/errors.js';
import { StorageError } from '../../storage/index.js';

const logger = getLogger({ component: 'api' });

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR CLASSES
// ─────────────────────────────────────────────────────────────────────────────────

export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;
  /** False for faults the client cannot act on */
  readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode = 400,
    code = 'BAD_REQUEST',
    details?: Record<string, unknown>,
    isOperational = true
  ) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string, id?: string) {
    super(id ? `${resource} not found: ${id}` : `${resource} not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class ConflictError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 409, 'CONFLICT', details);
    this.name = 'ConflictError';
  }
}

export class InternalError extends ApiError {
  constructor(message = 'Internal server error') {
    super(message, 500, 'INTERNAL_ERROR', undefined, false);
    this.name = 'InternalError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// ASYNC HANDLER
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Forward a rejected handler promise to the error middleware.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): (req: Request, res: Response, next: NextFunction) => Promise<void> {
  return async (req, res, next) => {
    try {
      await fn(req, res, next);
    } catch (error) {
      next(error);
    }
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR MAPPING
// ─────────────────────────────────────────────────────────────────────────────────

const WORKBOOK_STATUS: Record<WorkbookError['code'], number> = {
  UNSUPPORTED_FORMAT: 415,
  UNREADABLE_WORKBOOK: 422,
  EMPTY_WORKBOOK: 422,
};

function isJsonSyntaxError(error: unknown): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

/**
 * Map any thrown value to an ApiError. Pipeline failures become 502 with
 * their diagnostics; unknown errors become a non-operational 500.
 */
export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }
  if (error instanceof ZodError) {
    return new ValidationError('Invalid request', { fields: error.flatten().fieldErrors, issues: error.issues.length });
  }
  if (isJsonSyntaxError(error)) {
    return new ApiError('Invalid JSON in request body', 400, 'INVALID_JSON');
  }
  if (error instanceof ResourceNotFoundError) {
    return new NotFoundError(error.resource, error.resourceId);
  }
  if (error instanceof SessionBusyError) {
    return new ApiError(error.message, 409, error.code, { activeTask: error.activeTask });
  }
  if (error instanceof WorkbookError) {
    return new ApiError(error.message, WORKBOOK_STATUS[error.code], error.code);
  }
  if (error instanceof UnknownModelError) {
    return new ApiError(error.message, 400, error.code, { provider: error.provider, model: error.model });
  }
  if (error instanceof ProviderCallFailed) {
    return new ApiError(error.message, 502, error.code, { provider: error.provider, reason: error.reason });
  }
  if (error instanceof UnparsableResponse) {
    return new ApiError(error.message, 502, error.code, {
      expectedCount: error.expectedCount,
      bestEffortCount: error.bestEffortCount,
      strategies: [...error.strategies],
      snippet: error.snippet,
    });
  }
  if (error instanceof BatchAbort) {
    return new ApiError(error.message, 502, error.code, {
      label: error.label,
      chunkIndex: error.chunkIndex,
      totalChunks: error.totalChunks,
      completedChunks: error.completedChunks,
      discardedResults: error.discardedResults,
    });
  }
  if (error instanceof AlignmentError) {
    return new ApiError(error.message, 502, error.code);
  }
  if (error instanceof StorageError) {
    return new ApiError(error.message, 500, 'STORAGE_ERROR', { document: error.document }, false);
  }
  if (error instanceof ConfigError) {
    return new ApiError(error.message, 500, 'CONFIG_ERROR', undefined, false);
  }
  return new InternalError(error instanceof Error ? error.message : String(error));
}

// ─────────────────────────────────────────────────────────────────────────────────
// MIDDLEWARE
// ─────────────────────────────────────────────────────────────────────────────────

export interface ErrorResponse {
  error: string;
  code: string;
  details?: Record<string, unknown>;
  requestId?: string;
  timestamp: string;
}

/**
 * Express error middleware. Non-operational errors are logged at error level
 * and their message is hidden in production.
 */
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const apiError = toApiError(error);
  const context = { path: req.path, method: req.method, code: apiError.code, requestId: req.requestId };

  if (apiError.isOperational) {
    logger.warn(apiError.message, { ...context, statusCode: apiError.statusCode });
  } else {
    logger.error('Unhandled error', error, context);
  }

  const environment = isConfigLoaded() ? getEnvironment() : process.env.NODE_ENV;
  const hide = !apiError.isOperational && environment === 'production';
  const body: ErrorResponse = {
    error: hide ? 'An unexpected error occurred' : apiError.message,
    code: apiError.code,
    ...(apiError.details && !hide ? { details: apiError.details } : {}),
    ...(req.requestId ? { requestId: req.requestId } : {}),
    timestamp: new Date().toISOString(),
  };
  res.status(apiError.statusCode).json(body);
}

/**
 * 404 for unmatched routes.
 */
export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(new NotFoundError('Route', `${req.method} ${req.path}`));
};

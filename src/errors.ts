import type { Request, Response, NextFunction } from 'express';

export class ApiError extends Error {
  constructor(readonly status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnauthenticatedError extends ApiError {
  constructor(message = 'Authentication required') {
    super(401, message);
  }
}

export class ForbiddenError extends ApiError {
  constructor(message = 'Admin access required') {
    super(403, message);
  }
}

export class NotFoundError extends ApiError {
  constructor(message = 'Not found') {
    super(404, message);
  }
}

export class ValidationError extends ApiError {
  constructor(readonly fields: string[]) {
    super(400, `Missing or invalid fields: ${fields.join(', ')}`);
  }
}

/** Wraps a failed database statement; the driver error is kept as `cause`. */
export class StoreError extends ApiError {
  constructor(message: string, cause: unknown) {
    super(500, message, { cause });
  }
}

export function sendError(res: Response, error: unknown, action: string): void {
  if (error instanceof StoreError) {
    console.error(`${action} error:`, error.cause);
    res.status(error.status).json({ error: error.message });
    return;
  }

  if (error instanceof ValidationError) {
    res.status(error.status).json({ error: error.message, fields: error.fields });
    return;
  }

  if (error instanceof ApiError) {
    res.status(error.status).json({ error: error.message });
    return;
  }

  console.error(`${action} error:`, error);
  res.status(500).json({ error: `Failed to ${action.toLowerCase()}` });
}

function isBodyParseError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed';
}

// Final error middleware: keeps failures that escape a route JSON-shaped
export function errorHandler(error: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (isBodyParseError(error)) {
    sendError(res, new ApiError(400, 'Malformed JSON body'), 'Parse body');
    return;
  }

  sendError(res, error, 'Handle request');
}

import { Request, Response, NextFunction } from 'express';
import { logger } from './logger';

export class AppError extends Error {
  public statusCode: number;
  public isOperational: boolean;

  constructor(message: string, statusCode: number, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Malformed input, or input with nothing usable left after cleaning. */
export class InvalidInputError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** A valid but empty skill set; callers substitute a defined fallback. */
export class EmptyInputError extends AppError {
  constructor(message: string) {
    super(message, 422);
  }
}

/** The embedding or index collaborator did not answer in time. Never retried here. */
export class RetrievalTimeoutError extends AppError {
  public skills: string[];

  constructor(message: string, skills: string[] = []) {
    super(message, 504);
    this.skills = skills;
  }
}

/** Any other embedding or index failure, tagged with the skills being resolved. */
export class EmbeddingError extends AppError {
  public skills: string[];

  constructor(message: string, skills: string[] = []) {
    super(message, 502);
    this.skills = skills;
  }
}

export function describeError(err: unknown): { type: string; message: string; skills?: string[] } {
  if (err instanceof RetrievalTimeoutError || err instanceof EmbeddingError) {
    return { type: err.name, message: err.message, skills: err.skills };
  }
  if (err instanceof AppError) {
    return { type: err.name, message: err.message };
  }
  if (err instanceof Error) {
    return { type: 'InternalError', message: err.message };
  }
  return { type: 'InternalError', message: String(err) };
}

export const handleError = (err: Error, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof AppError) {
    logger.error('Application error', { message: err.message, statusCode: err.statusCode, type: err.name });
    const body: Record<string, unknown> = { error: err.message, type: err.name };
    if (err instanceof RetrievalTimeoutError || err instanceof EmbeddingError) {
      body.skills = err.skills;
    }
    return res.status(err.statusCode).json(body);
  }

  if (err instanceof SyntaxError && 'body' in err) {
    return res.status(400).json({
      error: 'Malformed JSON body',
      type: 'InvalidInputError'
    });
  }

  if (err.message.includes('duplicate key value')) {
    return res.status(409).json({
      error: 'Resource already exists'
    });
  }

  logger.error('Unexpected error', err);

  res.status(500).json({
    error: 'Internal server error'
  });
};

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    error: 'Route not found'
  });
};

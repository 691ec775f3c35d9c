import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '@/lib/logger';
import { AppError } from '@/lib/errors';

export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  _next: NextFunction
) => {
  let statusCode = 500;
  let message = 'Internal Server Error';
  let details: { field: string; message: string }[] | undefined;

  // Handle Zod validation errors
  if (error instanceof ZodError) {
    statusCode = 400;
    message = 'Validation Error';
    details = error.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
  }
  // Handle application errors
  else if (error instanceof AppError) {
    statusCode = error.statusCode;
    message = error.isOperational ? error.message : message;
  }

  const stack = error instanceof Error ? error.stack : undefined;

  logger.error(`${req.method} ${req.path} - ${message}`, {
    statusCode,
    stack,
    query: req.query,
    params: req.params,
  });

  res.status(statusCode).json({
    success: false,
    error: {
      message,
      ...(details ? { details } : {}),
      ...(process.env.NODE_ENV === 'development' && stack ? { stack } : {}),
    },
  });
};

import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { logger } from '../logger/index.js';
import { HttpError } from '../../shared/errors.js';

const isMongoUnavailable = (err: Error) =>
  err.name === 'MongoServerSelectionError' ||
  err.name === 'MongoNetworkError' ||
  err.message.includes('ECONNREFUSED') ||
  err.message.includes('Topology is closed');

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      message: 'Validation failed',
      issues: err.issues,
      requestId: req.id,
    });
    return;
  }

  if (err instanceof HttpError) {
    // Below 500 the message is user-actionable; above it only the generic text is exposed
    if (err.status < 500) {
      logger.warn({ err, status: err.status, path: req.path, method: req.method }, 'HttpError (user-actionable)');
    } else {
      logger.error({ err, status: err.status, path: req.path, method: req.method }, 'HttpError (server error)');
    }
    res.status(err.status).json({
      message: err.message,
      requestId: req.id,
      details: err.details,
    });
    return;
  }

  if (err instanceof Error && isMongoUnavailable(err)) {
    logger.error({ err, path: req.path, method: req.method }, 'MongoDB connection error');
    res.status(503).json({
      message: 'Database service unavailable',
      requestId: req.id,
      error: 'SERVICE_UNAVAILABLE',
    });
    return;
  }

  logger.error({ err, path: req.path, method: req.method }, 'Unhandled error');
  res.status(500).json({
    message: 'Internal server error',
    requestId: req.id,
  });
};

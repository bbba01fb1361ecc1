import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { DeployerError, errorMessage } from '@deployer/core';
import { logger } from '../utils/logger.js';
import { errorBody } from '../utils/responses.js';
import { requestIdOf } from './request-id.js';

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    status: 'error',
    code: 'NOT_FOUND',
    message: `Route ${req.method} ${req.path} not found`,
  });
}

/**
 * Domain errors keep HTTP 200 and carry their code in the body. Malformed
 * requests get 400; anything else is logged and reported as a 500.
 */
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const requestId = requestIdOf(res);

  if (error instanceof DeployerError) {
    logger.warn('Request failed', { requestId, code: error.code, path: req.path, message: error.message });
    res.json(errorBody(error));
    return;
  }

  if (error instanceof ZodError) {
    const message = error.errors.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`).join('; ');
    res.status(400).json({ status: 'error', code: 'INVALID_REQUEST', message, requestId });
    return;
  }

  // body-parser marks its own failures (bad JSON, oversized body) with a 4xx status
  const status = httpStatusOf(error);
  if (status !== undefined && status >= 400 && status < 500) {
    res.status(status).json({ status: 'error', code: 'INVALID_REQUEST', message: errorMessage(error), requestId });
    return;
  }

  logger.error('Unhandled error', {
    requestId,
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
    path: req.path,
    method: req.method,
  });
  res.status(500).json({ status: 'error', code: 'INTERNAL_ERROR', message: 'Internal server error', requestId });
}

import type { Response } from 'express';
import type { DeployerError } from '@deployer/core';

export interface ErrorBody {
  status: 'error';
  code: string;
  message: string;
}

export function errorBody(error: Pick<DeployerError, 'code' | 'message'>): ErrorBody {
  return { status: 'error', code: error.code, message: error.message };
}

/** Domain failures are reported in the body; the HTTP status stays 200. */
export function sendError(res: Response, error: Pick<DeployerError, 'code' | 'message'>): void {
  res.json(errorBody(error));
}

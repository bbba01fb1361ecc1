import { BaseError } from 'viem';
import { errorMessage } from '@deployer/core';

/** viem errors carry request dumps in `message`; the short form is enough for callers. */
export function describeChainError(error: unknown): string {
  return error instanceof BaseError ? error.shortMessage : errorMessage(error);
}

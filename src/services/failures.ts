import type { FailedOperation, OperationFailure } from '../types/index.js';

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toFailure(path: string, operation: FailedOperation, error: unknown): OperationFailure {
  return {
    path,
    operation,
    code: errorCode(error),
    message: errorMessage(error),
  };
}

import type { ErrorCode } from '@landgrab/shared';

export class EngineError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = 'EngineError';
  }
}

export const isEngineError = (error: unknown): error is EngineError => error instanceof EngineError;

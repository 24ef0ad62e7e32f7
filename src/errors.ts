import type { ZodError } from 'zod';

export type EngineErrorKind =
  | 'InvalidArgument'
  | 'NotFound'
  | 'StorageUnavailable'
  | 'Conflict';

export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;
}

/** Malformed or out-of-range input. Never retried. */
export class InvalidArgumentError extends EngineError {
  readonly kind = 'InvalidArgument';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }

  static fromZod(err: ZodError): InvalidArgumentError {
    const issue = err.issues[0];
    if (!issue) return new InvalidArgumentError(err.message);
    const field = issue.path.join('.');
    return new InvalidArgumentError(field ? `${field}: ${issue.message}` : issue.message);
  }
}

export class NotFoundError extends EngineError {
  readonly kind = 'NotFound';

  constructor(
    public readonly entity: 'goal' | 'task' | 'concept' | 'skill',
    public readonly ref: string | number,
  ) {
    super(`${entity} "${ref}" not found`);
    this.name = 'NotFoundError';
  }
}

/** The store file could not be opened or written. Fatal for the call. */
export class StorageUnavailableError extends EngineError {
  readonly kind = 'StorageUnavailable';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageUnavailableError';
  }
}

/** The database stayed locked by another connection through every retry. */
export class ConflictError extends EngineError {
  readonly kind = 'Conflict';

  constructor(
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConflictError';
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

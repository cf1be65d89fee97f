export type ErrorKind = 'validation' | 'not_found' | 'external' | 'invalid_state' | 'internal';

export class LocalReviewError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/**
 * Bad form input. Shown inline by the form that produced it.
 */
export class ValidationError extends LocalReviewError {
  constructor(message: string) {
    super('validation', message);
  }
}

export class NotFoundError extends LocalReviewError {
  constructor(what: string, id: string) {
    super('not_found', `${what} not found: ${id}`);
  }
}

/**
 * A database or Git operation failed.
 */
export class ExternalCollaboratorError extends LocalReviewError {
  constructor(operation: string, cause: unknown) {
    super('external', `${operation} failed: ${describeError(cause)}`, { cause });
  }
}

export class InvalidStateError extends LocalReviewError {
  constructor(message: string) {
    super('invalid_state', message);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorKindOf(error: unknown): ErrorKind {
  return error instanceof LocalReviewError ? error.kind : 'internal';
}

export interface AppErrorPayload {
  type: 'error';
  kind: ErrorKind;
  message: string;
  /** what was running when it failed */
  source: string;
}

export function toAppError(error: unknown, source: string): AppErrorPayload {
  return { type: 'error', kind: errorKindOf(error), message: describeError(error), source };
}

/**
 * Runs a collaborator call and rethrows any failure as ExternalCollaboratorError.
 * Errors that are already classified pass through untouched.
 */
export async function external<T>(operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof LocalReviewError) {
      throw error;
    }
    throw new ExternalCollaboratorError(operation, error);
  }
}

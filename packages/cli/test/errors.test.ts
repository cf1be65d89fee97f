import { describe, expect, it } from 'vitest';
import {
  external,
  ExternalCollaboratorError,
  InvalidStateError,
  NotFoundError,
  toAppError,
  ValidationError,
} from '../src/errors';

describe('errors', () => {
  it('classifies each error by kind', () => {
    expect(new ValidationError('Comment cannot be empty').kind).toBe('validation');
    expect(new NotFoundError('Review', 'review-1').message).toBe('Review not found: review-1');
    expect(new InvalidStateError('nothing pending').name).toBe('InvalidStateError');
  });

  it('turns any thrown value into an error event payload', () => {
    expect(toAppError(new NotFoundError('Comment', 'comment-1'), 'toggle comment')).toEqual({
      type: 'error',
      kind: 'not_found',
      message: 'Comment not found: comment-1',
      source: 'toggle comment',
    });
    expect(toAppError('boom', 'render')).toEqual({ type: 'error', kind: 'internal', message: 'boom', source: 'render' });
  });

  it('wraps collaborator failures but keeps classified errors', async () => {
    const cause = new Error('SQLITE_BUSY');
    const wrapped = external('load reviews', () => Promise.reject(cause));

    await expect(wrapped).rejects.toBeInstanceOf(ExternalCollaboratorError);
    await expect(wrapped).rejects.toThrow('load reviews failed: SQLITE_BUSY');
    expect(await wrapped.catch((error: unknown) => error instanceof Error && error.cause)).toBe(cause);

    const invalid = new InvalidStateError('no pending change');
    await expect(external('refresh', () => Promise.reject(invalid))).rejects.toBe(invalid);
  });
});

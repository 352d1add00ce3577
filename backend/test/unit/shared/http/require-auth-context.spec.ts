import { describe, it, expect } from 'vitest';
import { AppError } from '../../../../src/shared/http/errors';
import { anonymousAuthContext } from '../../../../src/shared/http/auth-context';
import { requireSession } from '../../../../src/shared/http/require-auth-context';

function thrown(fn: () => unknown): AppError {
  try {
    fn();
  } catch (err) {
    if (err instanceof AppError) return err;
    throw err;
  }
  throw new Error('expected requireSession to throw');
}

describe('requireSession', () => {
  it('returns the ids of a live session', () => {
    const authContext = { userId: 'user-1', sessionId: 'session-1', tokenRejected: false };

    expect(requireSession({ authContext })).toEqual({ userId: 'user-1', sessionId: 'session-1' });
  });

  it('is UNAUTHENTICATED when no token was presented', () => {
    const err = thrown(() => requireSession({ authContext: anonymousAuthContext() }));

    expect(err.status).toBe(401);
    expect(err.code).toBe('UNAUTHENTICATED');
    expect(err.message).toBe('Authentication credentials were not provided.');
  });

  it('is AUTHENTICATION_FAILED when a token was presented and rejected', () => {
    const err = thrown(() => requireSession({ authContext: anonymousAuthContext(true) }));

    expect(err.status).toBe(401);
    expect(err.code).toBe('AUTHENTICATION_FAILED');
    expect(err.message).toBe('Invalid or expired token');
  });
});

import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { registerAccount, type ErrorBody } from '../helpers/accounts';
import type { AuthResultView } from '../../src/modules/auth/auth.types';

const INVALID_CREDENTIALS = {
  error: {
    code: 'INVALID_CREDENTIALS',
    message: 'Invalid phone number/email or password.',
  },
};

describe('POST /login', () => {
  it('logs in by phone number and by email; every login gets its own token', async () => {
    const { app, close } = await buildTestApp();
    try {
      const account = await registerAccount(app, {
        phone_number: '5551240001',
        email: 'login@example.com',
      });

      const byPhone = await app.inject({
        method: 'POST',
        url: '/login',
        payload: { identifier: '5551240001', password: account.password },
      });
      const byEmail = await app.inject({
        method: 'POST',
        url: '/login',
        payload: { identifier: 'LOGIN@example.com', password: account.password },
      });

      expect(byPhone.statusCode).toBe(200);
      expect(byEmail.statusCode).toBe(200);

      const a = byPhone.json<AuthResultView>();
      const b = byEmail.json<AuthResultView>();
      expect(a.user.id).toBe(account.id);
      expect(b.user.id).toBe(account.id);
      expect(new Set([account.token, a.session_token, b.session_token]).size).toBe(3);
    } finally {
      await close();
    }
  });

  it('keeps earlier sessions live after a new login', async () => {
    const { app, close } = await buildTestApp();
    try {
      const account = await registerAccount(app);

      await app.inject({
        method: 'POST',
        url: '/login',
        payload: { identifier: account.phoneNumber, password: account.password },
      });

      const res = await app.inject({
        method: 'GET',
        url: '/labels',
        headers: { authorization: account.token },
      });
      expect(res.statusCode).toBe(200);
    } finally {
      await close();
    }
  });

  it('answers a wrong password and an unknown user identically', async () => {
    const { app, db, close } = await buildTestApp();
    try {
      const account = await registerAccount(app);

      const wrongPassword = await app.inject({
        method: 'POST',
        url: '/login',
        payload: { identifier: account.phoneNumber, password: 'wrong-password' },
      });
      const unknownUser = await app.inject({
        method: 'POST',
        url: '/login',
        payload: { identifier: '5559990000', password: 'whatever-password' },
      });

      expect(wrongPassword.statusCode).toBe(400);
      expect(unknownUser.statusCode).toBe(400);
      expect(wrongPassword.json<ErrorBody>()).toEqual(INVALID_CREDENTIALS);
      expect(unknownUser.json<ErrorBody>()).toEqual(INVALID_CREDENTIALS);

      const failures = await db
        .selectFrom('audit_events')
        .select('user_id')
        .where('action', '=', 'auth.login.failed')
        .orderBy('created_at')
        .execute();
      expect(failures.map((f) => f.user_id)).toEqual([account.id, null]);
    } finally {
      await close();
    }
  });

  it('requires both fields', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({ method: 'POST', url: '/login', payload: { identifier: ' ' } });

      expect(res.statusCode).toBe(400);
      const body = res.json<ErrorBody>();
      expect(body.error.code).toBe('VALIDATION_ERROR');
      expect(body.error.fields).toEqual({
        identifier: ['This field may not be blank.'],
        password: ['Required'],
      });
    } finally {
      await close();
    }
  });
});

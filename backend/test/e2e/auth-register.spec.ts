import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { registerPayload, type ErrorBody } from '../helpers/accounts';
import type { AuthResultView } from '../../src/modules/auth/auth.types';

describe('POST /register', () => {
  it('creates the user with profile, settings and the default labels', async () => {
    const { app, db, close } = await buildTestApp();
    try {
      const payload = registerPayload({
        phone_number: '5551230001',
        email: 'New.User@Example.com',
        first_name: 'New',
        last_name: 'User',
      });

      const res = await app.inject({ method: 'POST', url: '/register', payload });

      expect(res.statusCode).toBe(201);
      const body = res.json<AuthResultView>();
      expect(body.user).toMatchObject({
        phone_number: '5551230001',
        email: 'new.user@example.com',
        first_name: 'New',
        last_name: 'User',
      });
      expect(body.session_token.length).toBeGreaterThan(0);
      expect(body.user).not.toHaveProperty('password_hash');

      const userId = body.user.id;
      const profile = await db
        .selectFrom('user_profiles')
        .selectAll()
        .where('user_id', '=', userId)
        .executeTakeFirst();
      expect(profile?.two_factor_enabled).toBe(false);

      const settings = await db
        .selectFrom('user_settings')
        .select('id')
        .where('user_id', '=', userId)
        .execute();
      expect(settings).toHaveLength(1);

      const labels = await db
        .selectFrom('labels')
        .select(['name', 'color'])
        .where('user_id', '=', userId)
        .orderBy('name')
        .execute();
      expect(labels).toEqual([
        { name: 'Important', color: '#FF0000' },
        { name: 'Personal', color: '#00FF00' },
        { name: 'Work', color: '#0000FF' },
      ]);

      const audit = await db
        .selectFrom('audit_events')
        .select('action')
        .where('user_id', '=', userId)
        .execute();
      expect(audit.map((a) => a.action)).toEqual(['auth.register.success']);
    } finally {
      await close();
    }
  });

  it('returns a token that authenticates immediately', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({ method: 'POST', url: '/register', payload: registerPayload() });
      const { session_token } = res.json<AuthResultView>();

      const profile = await app.inject({
        method: 'GET',
        url: '/profile',
        headers: { authorization: session_token },
      });

      expect(profile.statusCode).toBe(200);
    } finally {
      await close();
    }
  });

  it.each(['12345', '+15551234567', '555-123-4567', 'abcdefghij'])(
    'rejects phone number %s and creates nothing',
    async (phone) => {
      const { app, db, close } = await buildTestApp();
      try {
        const res = await app.inject({
          method: 'POST',
          url: '/register',
          payload: registerPayload({ phone_number: phone, email: 'phone-check@example.com' }),
        });

        expect(res.statusCode).toBe(400);
        expect(res.json<ErrorBody>()).toEqual({
          error: {
            code: 'VALIDATION_ERROR',
            message: 'Invalid phone number',
            fields: { phone_number: ['Invalid phone number'] },
          },
        });

        const users = await db.selectFrom('users').select('id').execute();
        expect(users).toHaveLength(0);
      } finally {
        await close();
      }
    },
  );

  it('rejects a duplicate phone number', async () => {
    const { app, db, close } = await buildTestApp();
    try {
      await app.inject({
        method: 'POST',
        url: '/register',
        payload: registerPayload({ phone_number: '5551230002' }),
      });

      const res = await app.inject({
        method: 'POST',
        url: '/register',
        payload: registerPayload({ phone_number: '5551230002', email: 'other@example.com' }),
      });

      expect(res.statusCode).toBe(400);
      const body = res.json<ErrorBody>();
      expect(body.error.code).toBe('DUPLICATE_RESOURCE');
      expect(body.error.fields).toEqual({ phone_number: ['Phone number already registered.'] });

      const users = await db.selectFrom('users').select('id').execute();
      expect(users).toHaveLength(1);
    } finally {
      await close();
    }
  });

  it('rejects a duplicate email in any case', async () => {
    const { app, close } = await buildTestApp();
    try {
      await app.inject({
        method: 'POST',
        url: '/register',
        payload: registerPayload({ email: 'taken@example.com' }),
      });

      const res = await app.inject({
        method: 'POST',
        url: '/register',
        payload: registerPayload({ email: 'TAKEN@example.com' }),
      });

      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorBody>().error.fields).toEqual({ email: ['Email already registered.'] });
    } finally {
      await close();
    }
  });

  it('reports missing and malformed fields', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({
        method: 'POST',
        url: '/register',
        payload: { phone_number: '5551230003', password: 'short', email: 'not-an-email' },
      });

      expect(res.statusCode).toBe(400);
      const body = res.json<ErrorBody>();
      expect(body.error.code).toBe('VALIDATION_ERROR');
      expect(body.error.fields?.password).toEqual(['Password must be at least 8 characters']);
      expect(body.error.fields?.email).toEqual(['Enter a valid email address.']);
      expect(Object.keys(body.error.fields ?? {}).sort()).toEqual([
        'email',
        'first_name',
        'last_name',
        'password',
      ]);
    } finally {
      await close();
    }
  });
});

import { describe, it, expect } from 'vitest';
import { access, readdir } from 'node:fs/promises';
import path from 'node:path';
import { buildTestApp } from '../helpers/build-test-app';
import { authHeaders, registerAccount, type ErrorBody } from '../helpers/accounts';
import { multipartBody } from '../helpers/multipart';
import type { UserWithProfileView } from '../../src/modules/profiles/profile.types';

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x01]);

async function exists(file: string): Promise<boolean> {
  return access(file).then(
    () => true,
    () => false,
  );
}

describe('GET /profile', () => {
  it('returns the user and an empty profile after registration', async () => {
    const { app, close } = await buildTestApp();
    try {
      const account = await registerAccount(app, { first_name: 'Ada', last_name: 'Lovelace' });

      const res = await app.inject({ method: 'GET', url: '/profile', headers: authHeaders(account) });

      expect(res.statusCode).toBe(200);
      const body = res.json<UserWithProfileView>();
      expect(body.user).toMatchObject({ id: account.id, first_name: 'Ada', last_name: 'Lovelace' });
      expect(body.profile).toMatchObject({
        bio: null,
        birthdate: null,
        profile_picture: null,
        two_factor_enabled: false,
      });
    } finally {
      await close();
    }
  });
});

describe('PUT /profile', () => {
  it('updates user and profile fields from JSON, leaving the rest alone', async () => {
    const { app, close } = await buildTestApp();
    try {
      const account = await registerAccount(app, { last_name: 'Keep' });

      const res = await app.inject({
        method: 'PUT',
        url: '/profile',
        headers: authHeaders(account),
        payload: { first_name: 'Renamed', bio: 'Hello there', birthdate: '1990-05-17' },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json<UserWithProfileView>();
      expect(body.user.first_name).toBe('Renamed');
      expect(body.user.last_name).toBe('Keep');
      expect(body.profile.bio).toBe('Hello there');
      expect(body.profile.birthdate).toBe('1990-05-17');
    } finally {
      await close();
    }
  });

  it('clears bio and birthdate with null', async () => {
    const { app, close } = await buildTestApp();
    try {
      const account = await registerAccount(app);
      const headers = authHeaders(account);
      await app.inject({
        method: 'PUT',
        url: '/profile',
        headers,
        payload: { bio: 'x', birthdate: '2000-01-01' },
      });

      const res = await app.inject({
        method: 'PUT',
        url: '/profile',
        headers,
        payload: { bio: null, birthdate: null },
      });

      expect(res.json<UserWithProfileView>().profile).toMatchObject({ bio: null, birthdate: null });
    } finally {
      await close();
    }
  });

  it('rejects a date that does not exist', async () => {
    const { app, close } = await buildTestApp();
    try {
      const account = await registerAccount(app);

      const res = await app.inject({
        method: 'PUT',
        url: '/profile',
        headers: authHeaders(account),
        payload: { birthdate: '2023-02-30' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorBody>().error.fields).toEqual({
        birthdate: ['Date has wrong format. Use YYYY-MM-DD.'],
      });
    } finally {
      await close();
    }
  });

  it('rejects an email that belongs to another user', async () => {
    const { app, close } = await buildTestApp();
    try {
      const other = await registerAccount(app);
      const account = await registerAccount(app);

      const res = await app.inject({
        method: 'PUT',
        url: '/profile',
        headers: authHeaders(account),
        payload: { email: other.email.toUpperCase() },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorBody>()).toEqual({
        error: {
          code: 'DUPLICATE_RESOURCE',
          message: 'Email already registered.',
          fields: { email: ['Email already registered.'] },
        },
      });
    } finally {
      await close();
    }
  });

  it('accepts the current email of the caller without a conflict', async () => {
    const { app, close } = await buildTestApp();
    try {
      const account = await registerAccount(app);

      const res = await app.inject({
        method: 'PUT',
        url: '/profile',
        headers: authHeaders(account),
        payload: { email: account.email },
      });

      expect(res.statusCode).toBe(200);
    } finally {
      await close();
    }
  });

  it('stores a multipart picture and replaces the previous file', async () => {
    const { app, uploadsDir, close } = await buildTestApp();
    try {
      const account = await registerAccount(app);
      const upload = () => {
        const body = multipartBody({ bio: 'With picture', birthdate: '' }, [
          { field: 'profile_picture', filename: 'me.png', contentType: 'image/png', data: PNG_BYTES },
        ]);
        return app.inject({
          method: 'PUT',
          url: '/profile',
          headers: { ...authHeaders(account), ...body.headers },
          payload: body.payload,
        });
      };

      const first = await upload();
      expect(first.statusCode).toBe(200);
      const firstProfile = first.json<UserWithProfileView>().profile;
      expect(firstProfile.bio).toBe('With picture');
      expect(firstProfile.birthdate).toBeNull();
      const firstRef = firstProfile.profile_picture ?? '';
      expect(firstRef).toMatch(new RegExp(`^profile-pictures/${account.id}/[0-9a-f-]{36}\\.png$`));
      expect(await exists(path.join(uploadsDir, firstRef))).toBe(true);

      const second = await upload();
      const secondRef = second.json<UserWithProfileView>().profile.profile_picture ?? '';
      expect(secondRef).not.toBe(firstRef);
      expect(await exists(path.join(uploadsDir, firstRef))).toBe(false);
      expect(await exists(path.join(uploadsDir, secondRef))).toBe(true);
    } finally {
      await close();
    }
  });

  it('refuses a picture that is not an image and writes no file', async () => {
    const { app, uploadsDir, close } = await buildTestApp();
    try {
      const account = await registerAccount(app);
      const body = multipartBody({}, [
        {
          field: 'profile_picture',
          filename: 'notes.txt',
          contentType: 'text/plain',
          data: Buffer.from('hello'),
        },
      ]);

      const res = await app.inject({
        method: 'PUT',
        url: '/profile',
        headers: { ...authHeaders(account), ...body.headers },
        payload: body.payload,
      });

      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorBody>().error.message).toBe(
        'Profile picture must be a PNG, JPEG, GIF or WebP image.',
      );
      expect(await readdir(uploadsDir)).toEqual([]);
    } finally {
      await close();
    }
  });

  it('rejects a picture over the upload limit with 413', async () => {
    const { app, close } = await buildTestApp();
    try {
      const account = await registerAccount(app);
      const body = multipartBody({}, [
        {
          field: 'profile_picture',
          filename: 'big.png',
          contentType: 'image/png',
          data: Buffer.alloc(64 * 1024 + 1),
        },
      ]);

      const res = await app.inject({
        method: 'PUT',
        url: '/profile',
        headers: { ...authHeaders(account), ...body.headers },
        payload: body.payload,
      });

      expect(res.statusCode).toBe(413);
    } finally {
      await close();
    }
  });
});

describe('DELETE /profile', () => {
  it('removes the profile but keeps the account', async () => {
    const { app, close } = await buildTestApp();
    try {
      const account = await registerAccount(app);
      const headers = authHeaders(account);

      const del = await app.inject({ method: 'DELETE', url: '/profile', headers });
      expect(del.statusCode).toBe(204);
      expect(del.body).toBe('');

      const get = await app.inject({ method: 'GET', url: '/profile', headers });
      expect(get.statusCode).toBe(404);
      expect(get.json<ErrorBody>().error).toEqual({
        code: 'NOT_FOUND',
        message: 'Profile not found.',
      });

      const again = await app.inject({ method: 'DELETE', url: '/profile', headers });
      expect(again.statusCode).toBe(404);

      const login = await app.inject({
        method: 'POST',
        url: '/login',
        payload: { identifier: account.phoneNumber, password: account.password },
      });
      expect(login.statusCode).toBe(200);
    } finally {
      await close();
    }
  });
});

import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';

describe('GET /health', () => {
  it('returns ok with the service identity and a request id', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      const body = res.json<{ ok: boolean; env: string; service: string; requestId: string }>();
      expect(body.ok).toBe(true);
      expect(body.env).toBe('test');
      expect(body.service).toBe('webmail-backend');
      expect(body.requestId.length).toBeGreaterThan(0);
    } finally {
      await close();
    }
  });

  it('answers unknown routes with the error envelope', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({ method: 'GET', url: '/nope' });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({
        error: { code: 'NOT_FOUND', message: 'Route GET /nope not found' },
      });
    } finally {
      await close();
    }
  });
});

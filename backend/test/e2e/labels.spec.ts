import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { authHeaders, registerAccount } from '../helpers/accounts';
import type { LabelView } from '../../src/modules/labels/label.types';

describe('GET /labels', () => {
  it('lists only the labels the caller owns, by name', async () => {
    const { app, close } = await buildTestApp();
    try {
      const account = await registerAccount(app);
      await registerAccount(app);

      const res = await app.inject({ method: 'GET', url: '/labels', headers: authHeaders(account) });

      expect(res.statusCode).toBe(200);
      const { labels } = res.json<{ labels: LabelView[] }>();
      expect(labels.map((l) => [l.name, l.color])).toEqual([
        ['Important', '#FF0000'],
        ['Personal', '#00FF00'],
        ['Work', '#0000FF'],
      ]);
    } finally {
      await close();
    }
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createInProcessDb } from '../helpers/in-process-postgres';
import { seedUser } from '../helpers/seed';
import { migrateToLatest } from '../../src/shared/db/migrator';
import type { Db } from '../../src/shared/db/db';
import { TwoFactorRepo } from '../../src/modules/auth/dal/two-factor.repo';

const t0 = new Date('2024-05-01T12:00:00.000Z');
const plus = (seconds: number) => new Date(t0.getTime() + seconds * 1000);

describe('two-factor codes DAL', () => {
  let db: Db;

  beforeEach(async () => {
    db = createInProcessDb();
    await migrateToLatest(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('consumes a code exactly once', async () => {
    const user = await seedUser(db);
    const repo = new TwoFactorRepo(db);
    const { id } = await repo.insertCode({ userId: user.id, codeHash: 'hash-a', expiresAt: plus(300) });

    expect(await repo.consumeAtomic({ userId: user.id, codeHash: 'hash-a', now: plus(10) })).toEqual({
      id,
    });
    expect(await repo.consumeAtomic({ userId: user.id, codeHash: 'hash-a', now: plus(20) })).toBeNull();
  });

  it('does not consume an expired code, a wrong hash or a code of another user', async () => {
    const user = await seedUser(db);
    const other = await seedUser(db);
    const repo = new TwoFactorRepo(db);
    await repo.insertCode({ userId: user.id, codeHash: 'hash-a', expiresAt: plus(300) });

    expect(await repo.consumeAtomic({ userId: user.id, codeHash: 'hash-a', now: plus(300) })).toBeNull();
    expect(await repo.consumeAtomic({ userId: user.id, codeHash: 'hash-b', now: plus(1) })).toBeNull();
    expect(await repo.consumeAtomic({ userId: other.id, codeHash: 'hash-a', now: plus(1) })).toBeNull();
  });

  it('invalidateUnused retires earlier codes', async () => {
    const user = await seedUser(db);
    const repo = new TwoFactorRepo(db);
    await repo.insertCode({ userId: user.id, codeHash: 'old', expiresAt: plus(300) });

    await repo.invalidateUnused({ userId: user.id, now: plus(5) });
    await repo.insertCode({ userId: user.id, codeHash: 'new', expiresAt: plus(305) });

    expect(await repo.consumeAtomic({ userId: user.id, codeHash: 'old', now: plus(6) })).toBeNull();
    expect(await repo.consumeAtomic({ userId: user.id, codeHash: 'new', now: plus(6) })).not.toBeNull();
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createInProcessDb } from '../helpers/in-process-postgres';
import { seedUser } from '../helpers/seed';
import { migrateToLatest } from '../../src/shared/db/migrator';
import { isUniqueViolation, type Db } from '../../src/shared/db/db';
import {
  UserRepo,
  USER_EMAIL_UNIQUE,
  USER_PHONE_UNIQUE,
  getUserByEmail,
  getUserById,
  getUserCredentials,
  getUsersByPhonesOrEmails,
} from '../../src/modules/users';

describe('users DAL', () => {
  let db: Db;

  beforeEach(async () => {
    db = createInProcessDb();
    await migrateToLatest(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('stores emails lowercase and finds them case-insensitively', async () => {
    const seeded = await seedUser(db, { phoneNumber: '5551000001', email: 'Alice@Example.COM' });

    const user = await getUserByEmail(db, 'ALICE@example.com');

    expect(user?.id).toBe(seeded.id);
    expect(user?.email).toBe('alice@example.com');
    expect(user?.phoneNumber).toBe('5551000001');
    expect(user?.createdAt).toBeInstanceOf(Date);
  });

  it('getUserCredentials looks up by phone or email and carries the hash', async () => {
    const seeded = await seedUser(db, { phoneNumber: '5551000002', email: 'bob@example.com' });

    const byPhone = await getUserCredentials(db, { kind: 'phone', value: '5551000002' });
    const byEmail = await getUserCredentials(db, { kind: 'email', value: 'bob@example.com' });

    expect(byPhone?.id).toBe(seeded.id);
    expect(byPhone?.passwordHash).toBe('placeholder-hash');
    expect(byEmail?.id).toBe(seeded.id);
    expect(await getUserCredentials(db, { kind: 'phone', value: '5559999999' })).toBeUndefined();
  });

  it('getUsersByPhonesOrEmails matches either column', async () => {
    const a = await seedUser(db, { phoneNumber: '5551000003' });
    const b = await seedUser(db, { email: 'carol@example.com' });
    await seedUser(db);

    const users = await getUsersByPhonesOrEmails(db, {
      phoneNumbers: ['5551000003', '5550009999'],
      emails: ['CAROL@example.com'],
    });

    expect(users.map((u) => u.id).sort()).toEqual([a.id, b.id].sort());
    expect(await getUsersByPhonesOrEmails(db, { phoneNumbers: [], emails: [] })).toEqual([]);
  });

  it('rejects a duplicate phone number with the named constraint', async () => {
    await seedUser(db, { phoneNumber: '5551000004' });

    const err = await seedUser(db, { phoneNumber: '5551000004' }).catch((e: unknown) => e);

    expect(isUniqueViolation(err, USER_PHONE_UNIQUE)).toBe(true);
    expect(isUniqueViolation(err, USER_EMAIL_UNIQUE)).toBe(false);
  });

  it('rejects a duplicate email regardless of case', async () => {
    await seedUser(db, { email: 'dup@example.com' });

    const err = await seedUser(db, { email: 'DUP@example.com' }).catch((e: unknown) => e);

    expect(isUniqueViolation(err, USER_EMAIL_UNIQUE)).toBe(true);
  });

  it('refuses a malformed phone number at the database', async () => {
    await expect(seedUser(db, { phoneNumber: '555-123' })).rejects.toThrow();
  });

  it('updateUser patches only the given fields', async () => {
    const seeded = await seedUser(db, { firstName: 'Old', lastName: 'Name' });

    await new UserRepo(db).updateUser(seeded.id, { firstName: 'New', email: 'New@Example.com' });
    const user = await getUserById(db, seeded.id);

    expect(user?.firstName).toBe('New');
    expect(user?.lastName).toBe('Name');
    expect(user?.email).toBe('new@example.com');
  });
});

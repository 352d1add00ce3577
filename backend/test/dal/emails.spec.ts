import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createInProcessDb } from '../helpers/in-process-postgres';
import { seedUser } from '../helpers/seed';
import { migrateToLatest } from '../../src/shared/db/migrator';
import type { Db } from '../../src/shared/db/db';
import { LabelRepo, getLabelsByNames } from '../../src/modules/labels';
import { EmailRepo } from '../../src/modules/emails/dal/email.repo';
import { escapeLikePattern } from '../../src/modules/emails/dal/email.query-sql';
import { getEmailForViewer, searchEmails } from '../../src/modules/emails/queries/email.queries';
import type { EmailSearchCriteria } from '../../src/modules/emails/email.types';

function criteria(overrides: Partial<EmailSearchCriteria> = {}): EmailSearchCriteria {
  return {
    terms: [],
    sentBetween: null,
    status: null,
    label: null,
    hasAttachments: false,
    limit: 50,
    offset: 0,
    ...overrides,
  };
}

describe('escapeLikePattern', () => {
  it('escapes LIKE metacharacters and the escape character', () => {
    expect(escapeLikePattern('50%_off\\')).toBe('50\\%\\_off\\\\');
  });
});

describe('emails DAL', () => {
  let db: Db;
  let repo: EmailRepo;

  beforeEach(async () => {
    db = createInProcessDb();
    await migrateToLatest(db);
    repo = new EmailRepo(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  async function send(
    senderId: string,
    recipientIds: string[],
    content: { subject?: string; body?: string; sentAt?: string } = {},
  ): Promise<string> {
    const { id } = await repo.insertEmail({
      senderId,
      subject: content.subject ?? 'Hello',
      body: content.body ?? 'Body',
    });
    await repo.insertRecipients(id, recipientIds);
    if (content.sentAt) {
      await db
        .updateTable('emails')
        .set({ sent_at: new Date(content.sentAt) })
        .where('id', '=', id)
        .execute();
    }
    return id;
  }

  it('an email is visible to its sender and recipients only', async () => {
    const alice = await seedUser(db);
    const bob = await seedUser(db);
    const carol = await seedUser(db);
    const id = await send(alice.id, [bob.id]);

    expect((await searchEmails(db, { userId: alice.id, criteria: criteria() })).count).toBe(1);
    expect((await searchEmails(db, { userId: bob.id, criteria: criteria() })).count).toBe(1);
    expect(await searchEmails(db, { userId: carol.id, criteria: criteria() })).toEqual({
      emails: [],
      count: 0,
    });
    expect(await getEmailForViewer(db, { emailId: id, userId: carol.id })).toBeUndefined();
  });

  it('hydrates sender, recipients and attachments', async () => {
    const alice = await seedUser(db, { firstName: 'Alice' });
    const bob = await seedUser(db, { phoneNumber: '5552000002' });
    const carol = await seedUser(db, { phoneNumber: '5552000001' });
    const id = await send(alice.id, [bob.id, carol.id], { subject: 'Plans', body: 'Lunch?' });
    await repo.insertAttachments(id, [{ fileName: 'menu.pdf', fileRef: 'files/menu.pdf' }]);

    const email = await getEmailForViewer(db, { emailId: id, userId: bob.id });

    expect(email?.subject).toBe('Plans');
    expect(email?.sender.firstName).toBe('Alice');
    expect(email?.recipients.map((r) => r.phoneNumber)).toEqual(['5552000001', '5552000002']);
    expect(email?.attachments.map((a) => [a.fileName, a.fileRef])).toEqual([
      ['menu.pdf', 'files/menu.pdf'],
    ]);
    expect(email?.isRead).toBe(false);
  });

  it('has_attachments returns an email once however many files it carries', async () => {
    const alice = await seedUser(db);
    const bob = await seedUser(db);
    const withFiles = await send(alice.id, [bob.id]);
    await send(alice.id, [bob.id]);
    await repo.insertAttachments(withFiles, [
      { fileName: 'a.txt', fileRef: 'files/a.txt' },
      { fileName: 'b.txt', fileRef: 'files/b.txt' },
    ]);

    const page = await searchEmails(db, {
      userId: bob.id,
      criteria: criteria({ hasAttachments: true }),
    });

    expect(page.count).toBe(1);
    expect(page.emails.map((e) => e.id)).toEqual([withFiles]);
    expect(page.emails[0]?.attachments).toHaveLength(2);
  });

  it('search excludes trashed emails but the viewer can still load one by id', async () => {
    const alice = await seedUser(db);
    const bob = await seedUser(db);
    const id = await send(alice.id, [bob.id]);

    expect(await repo.updateFlags(id, { isTrashed: true })).toBe(true);

    expect((await searchEmails(db, { userId: bob.id, criteria: criteria() })).count).toBe(0);
    expect((await getEmailForViewer(db, { emailId: id, userId: bob.id }))?.isTrashed).toBe(true);
  });

  it('terms are AND-ed, match subject, body or sender phone, and treat % literally', async () => {
    const alice = await seedUser(db, { phoneNumber: '5553000001' });
    const bob = await seedUser(db);
    const sale = await send(alice.id, [bob.id], { subject: 'Spring sale', body: '50% off today' });
    await send(alice.id, [bob.id], { subject: 'Inventory', body: '500 units today' });

    const search = async (terms: string[]) =>
      (await searchEmails(db, { userId: bob.id, criteria: criteria({ terms }) })).emails.map(
        (e) => e.id,
      );

    expect(await search(['50%'])).toEqual([sale]);
    expect(await search(['SALE', 'today'])).toEqual([sale]);
    expect(await search(['sale', 'units'])).toEqual([]);
    expect(await search(['3000001'])).toHaveLength(2);
  });

  it('status filters on the email flags', async () => {
    const alice = await seedUser(db);
    const bob = await seedUser(db);
    const read = await send(alice.id, [bob.id]);
    const starred = await send(alice.id, [bob.id]);
    await repo.updateFlags(read, { isRead: true });
    await repo.updateFlags(starred, { isStarred: true });

    const unread = await searchEmails(db, {
      userId: bob.id,
      criteria: criteria({ status: 'unread' }),
    });
    const starredPage = await searchEmails(db, {
      userId: bob.id,
      criteria: criteria({ status: 'starred' }),
    });

    expect(unread.emails.map((e) => e.id)).toEqual([starred]);
    expect(starredPage.emails.map((e) => e.id)).toEqual([starred]);
  });

  it('label filters and label names are scoped to the viewer', async () => {
    const alice = await seedUser(db);
    const bob = await seedUser(db);
    await new LabelRepo(db).insertDefaultLabels(alice.id);
    await new LabelRepo(db).insertDefaultLabels(bob.id);
    const [aliceWork] = await getLabelsByNames(db, { userId: alice.id, names: ['Work'] });
    const id = await send(alice.id, [bob.id]);
    await repo.insertEmailLabels(id, aliceWork ? [aliceWork.id] : []);

    const forAlice = await searchEmails(db, {
      userId: alice.id,
      criteria: criteria({ label: 'Work' }),
    });
    const forBob = await searchEmails(db, {
      userId: bob.id,
      criteria: criteria({ label: 'Work' }),
    });

    expect(forAlice.emails.map((e) => e.labels)).toEqual([['Work']]);
    expect(forBob.count).toBe(0);
    expect((await getEmailForViewer(db, { emailId: id, userId: bob.id }))?.labels).toEqual([]);
  });

  it('orders newest first, pages with limit/offset and counts the whole match', async () => {
    const alice = await seedUser(db);
    const bob = await seedUser(db);
    const oldest = await send(alice.id, [bob.id], { sentAt: '2024-01-01T00:00:00Z' });
    const middle = await send(alice.id, [bob.id], { sentAt: '2024-02-01T00:00:00Z' });
    const newest = await send(alice.id, [bob.id], { sentAt: '2024-03-01T00:00:00Z' });

    const first = await searchEmails(db, { userId: bob.id, criteria: criteria({ limit: 2 }) });
    const second = await searchEmails(db, {
      userId: bob.id,
      criteria: criteria({ limit: 2, offset: 2 }),
    });

    expect(first.emails.map((e) => e.id)).toEqual([newest, middle]);
    expect(first.count).toBe(3);
    expect(second.emails.map((e) => e.id)).toEqual([oldest]);
    expect(second.count).toBe(3);
  });

  it('sentBetween is inclusive on both ends', async () => {
    const alice = await seedUser(db);
    const bob = await seedUser(db);
    await send(alice.id, [bob.id], { sentAt: '2024-01-31T23:59:59.999Z' });
    const start = await send(alice.id, [bob.id], { sentAt: '2024-02-01T00:00:00.000Z' });
    const end = await send(alice.id, [bob.id], { sentAt: '2024-02-29T23:59:59.999Z' });
    await send(alice.id, [bob.id], { sentAt: '2024-03-01T00:00:00.000Z' });

    const page = await searchEmails(db, {
      userId: bob.id,
      criteria: criteria({
        sentBetween: {
          start: new Date('2024-02-01T00:00:00.000Z'),
          end: new Date('2024-02-29T23:59:59.999Z'),
        },
      }),
    });

    expect(page.emails.map((e) => e.id)).toEqual([end, start]);
  });

  it('updateFlags reports a missing email', async () => {
    expect(
      await repo.updateFlags('00000000-0000-4000-8000-000000000000', { isRead: true }),
    ).toBe(false);
  });
});

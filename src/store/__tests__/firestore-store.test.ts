/**
 * Tests for the Firestore-backed stores against an in-process Firestore fake.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  AlreadySentError,
  DraftNotFoundError,
  FirestoreError,
  InvalidTransitionError,
} from '../../errors.js';
import { COLLECTIONS, createFakeStores } from './fixtures/fake-firestore.js';

const NOW = new Date('2026-03-02T10:00:00Z');

describe('FirestoreDraftStore', () => {
  let stores: ReturnType<typeof createFakeStores>;

  beforeEach(() => {
    stores = createFakeStores(() => NOW);
  });

  it('creates a pending draft with canonical fields', async () => {
    const id = await stores.drafts.create({
      to: 'ana@example.com',
      subject: 'Hello',
      body: 'Hi there',
      versionGroupId: 'vg-1',
      externalId: 'ext-1',
    });

    expect(id).toBe('doc-1');
    expect(stores.db.doc(COLLECTIONS.drafts, id)).toEqual({
      to: 'ana@example.com',
      subject: 'Hello',
      body: 'Hi there',
      status: 'pending',
      created_at: NOW,
      version_group_id: 'vg-1',
      x_external_id: 'ext-1',
    });
  });

  it('returns null for a missing draft', async () => {
    expect(await stores.drafts.get('missing')).toBeNull();
  });

  it('normalizes legacy documents on read', async () => {
    stores.db.seed(COLLECTIONS.drafts, 'legacy', {
      to_address: 'old@example.com',
      content: 'old body',
      status: 'approved',
    });

    const draft = await stores.drafts.get('legacy');
    expect(draft?.to).toBe('old@example.com');
    expect(draft?.body).toBe('old body');
    expect(draft?.status).toBe('pending');
  });

  describe('markSent', () => {
    it('writes status, ids, timestamp and pixel in one transaction', async () => {
      const id = await stores.drafts.create({ to: 'a@example.com', subject: 'S', body: 'B', versionGroupId: 'vg' });
      const sentAt = new Date('2026-03-02T11:00:00Z');

      await stores.drafts.markSent(id, { messageId: 'm1', threadId: 't1', sentAt, pixelId: 'px-1' });

      const draft = await stores.drafts.get(id);
      expect(draft?.status).toBe('sent');
      expect(draft?.gmailMessageId).toBe('m1');
      expect(draft?.gmailThreadId).toBe('t1');
      expect(draft?.sentAt).toEqual(sentAt);
      expect(draft?.pixelId).toBe('px-1');
      expect(stores.db.transactions).toBe(1);
    });

    it('refuses a second send', async () => {
      const id = await stores.drafts.create({ to: 'a@example.com', subject: 'S', body: 'B', versionGroupId: 'vg' });
      await stores.drafts.markSent(id, { messageId: 'm1', threadId: 't1', sentAt: NOW });

      await expect(
        stores.drafts.markSent(id, { messageId: 'm2', threadId: 't2', sentAt: NOW }),
      ).rejects.toBeInstanceOf(AlreadySentError);

      const draft = await stores.drafts.get(id);
      expect(draft?.gmailMessageId).toBe('m1');
    });

    it('throws DraftNotFoundError for an unknown id', async () => {
      await expect(
        stores.drafts.markSent('nope', { messageId: 'm', threadId: 't', sentAt: NOW }),
      ).rejects.toBeInstanceOf(DraftNotFoundError);
    });
  });

  describe('update', () => {
    it('records the Gmail draft id without a transaction', async () => {
      const id = await stores.drafts.create({ to: 'a@example.com', subject: 'S', body: 'B', versionGroupId: 'vg' });
      await stores.drafts.update(id, { gmailDraftId: 'gd-1' });

      expect(stores.db.doc(COLLECTIONS.drafts, id)?.gmail_draft_id).toBe('gd-1');
      expect(stores.db.transactions).toBe(0);
    });

    it('allows pending -> rejected', async () => {
      const id = await stores.drafts.create({ to: 'a@example.com', subject: 'S', body: 'B', versionGroupId: 'vg' });
      await stores.drafts.update(id, { status: 'rejected' });
      expect((await stores.drafts.get(id))?.status).toBe('rejected');
    });

    it('refuses a backward move', async () => {
      const id = await stores.drafts.create({ to: 'a@example.com', subject: 'S', body: 'B', versionGroupId: 'vg' });
      await stores.drafts.update(id, { status: 'rejected' });

      await expect(stores.drafts.update(id, { status: 'pending' })).rejects.toBeInstanceOf(InvalidTransitionError);
    });
  });

  it('queries by status ordered by createdAt and limited', async () => {
    const mk = (subject: string, iso: string) =>
      stores.drafts.create({ to: 'a@example.com', subject, body: 'B', versionGroupId: 'vg', createdAt: new Date(iso) });
    await mk('third', '2026-03-03T00:00:00Z');
    await mk('first', '2026-03-01T00:00:00Z');
    await mk('second', '2026-03-02T00:00:00Z');

    const drafts = await stores.drafts.queryByStatus('pending', 2);
    expect(drafts.map(d => d.subject)).toEqual(['first', 'second']);
  });

  it('queries by external key', async () => {
    await stores.drafts.create({ to: 'a@example.com', subject: 'one', body: 'B', versionGroupId: 'vg-1', externalId: 'ext-1' });
    await stores.drafts.create({ to: 'a@example.com', subject: 'two', body: 'B', versionGroupId: 'vg-1' });

    expect((await stores.drafts.queryByExternalKey('x_external_id', 'ext-1')).map(d => d.subject)).toEqual(['one']);
    expect(await stores.drafts.queryByExternalKey('version_group_id', 'vg-1')).toHaveLength(2);
  });

  it('wraps client failures in FirestoreError', async () => {
    stores.db.failNext(new Error('14 UNAVAILABLE: connection dropped'));

    const error = await stores.drafts.get('d1').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(FirestoreError);
    expect(error).toMatchObject({
      code: 'FIRESTORE_ERROR',
      status: 500,
      context: { operation: 'get_draft' },
    });
  });
});

describe('FirestoreFollowupStore', () => {
  it('lists follow-ups for a draft ordered by number', async () => {
    const stores = createFakeStores(() => NOW);
    const base = { to: 'a@example.com', subject: 'S', body: 'B', versionGroupId: 'vg', originalDraftId: 'd1' };
    await stores.followups.create({ ...base, followupNumber: 3 });
    await stores.followups.create({ ...base, followupNumber: 1 });
    await stores.followups.create({ ...base, originalDraftId: 'other', followupNumber: 2 });

    const list = await stores.followups.listForDraft('d1');
    expect(list.map(f => f.followupNumber)).toEqual([1, 3]);
  });

  it('marks a follow-up sent once', async () => {
    const stores = createFakeStores(() => NOW);
    const id = await stores.followups.create({
      to: 'a@example.com', subject: 'S', body: 'B', versionGroupId: 'vg', originalDraftId: 'd1', followupNumber: 1,
    });

    await stores.followups.markSent(id, { messageId: 'm1', threadId: 't1', sentAt: NOW });
    await expect(
      stores.followups.markSent(id, { messageId: 'm2', threadId: 't1', sentAt: NOW }),
    ).rejects.toBeInstanceOf(AlreadySentError);
  });
});

describe('FirestoreTrackingStore', () => {
  it('registers a pixel keyed by its id with zero opens', async () => {
    const stores = createFakeStores(() => NOW);
    await stores.tracking.register({
      pixelId: 'px-1',
      draftId: 'd1',
      kind: 'draft',
      recipient: 'ana@example.com',
      subject: 'Hello',
    });

    expect(stores.db.doc(COLLECTIONS.tracking, 'px-1')).toEqual({
      pixel_id: 'px-1',
      draft_id: 'd1',
      type: 'draft',
      recipient: 'ana@example.com',
      subject: 'Hello',
      open_count: 0,
      created_at: NOW,
    });
  });
});

/**
 * Shared DraftService wiring for tests: real store classes over the
 * in-process Firestore fake, vi.fn fakes for the mailbox, scheduler and
 * generator, and sequential ids.
 */

import { vi } from 'vitest';
import { COLLECTIONS, createFakeStores } from '../../store/__tests__/fixtures/fake-firestore.js';
import { DraftService } from '../draft-service.js';
import type { DraftServiceOptions, Mailbox } from '../draft-service.js';

export { COLLECTIONS };

export const NOW = new Date('2026-03-02T10:00:00Z');
export const TRACKER = 'https://tracker.test';

export function makeMailbox() {
  return {
    sendEmail: vi.fn(async () => ({ messageId: 'msg-1', threadId: 'thr-1', labelIds: ['SENT'] })),
    createDraft: vi.fn(async () => ({ draftId: 'gd-1', messageId: 'm-d', threadId: 't-d' })),
    deleteDraft: vi.fn(async (_draftId: string) => undefined),
    getThread: vi.fn(async (threadId: string) => ({ id: threadId, historyId: 'h-1', messages: [] })),
    getMessageHeaders: vi.fn(async () => ({ 'message-id': '<orig@mail.test>' })),
    getUserSignature: vi.fn(async () => ''),
  } satisfies Mailbox;
}

export function setup(overrides: Partial<DraftServiceOptions> = {}) {
  const stores = createFakeStores(() => NOW);
  const mailbox = makeMailbox();
  const mailboxes = { get: vi.fn((_address: string) => mailbox) };
  const scheduler = { schedule: vi.fn(async () => true) };
  const generator = {
    generateFollowup: vi.fn(async () => ({ subject: 'Following up', body: 'Just checking in' })),
  };
  let counter = 0;

  const service = new DraftService({
    drafts: stores.drafts,
    followups: stores.followups,
    tracking: stores.tracking,
    mailboxes,
    scheduler,
    generator,
    options: {
      defaultSender: 'default@example.org',
      defaultSendMode: 'draft',
      trackerUrl: TRACKER,
      appendSignature: false,
      testSubjectPrefix: '[TEST] ',
      ...overrides,
    },
    newId: () => `id-${++counter}`,
    now: () => NOW,
  });

  return { service, stores, mailbox, mailboxes, scheduler, generator };
}

export type Setup = ReturnType<typeof setup>;

export function seedDraft(ctx: Setup, id: string, data: Record<string, unknown> = {}) {
  ctx.stores.db.seed(COLLECTIONS.drafts, id, {
    to: 'real@example.com',
    to_name: 'Real Person',
    subject: 'Hi',
    body: 'Hello **there**',
    sender_email: 'rep@example.org',
    sender_name: 'Rep',
    status: 'pending',
    created_at: NOW,
    version_group_id: 'vg-1',
    ...data,
  });
}

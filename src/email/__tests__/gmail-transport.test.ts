// ============================================================================
// Tests: Gmail API Transport
// ============================================================================
//
// A hand-built stand-in for the googleapis client checks the request shapes
// and how responses are mapped onto the transport types.

import { describe, test, expect, vi } from 'vitest';
import type { gmail_v1 } from 'googleapis';
import { gmailTransport } from '../gmail-transport.js';

function makeGmail() {
  const api = {
    users: {
      messages: {
        send: vi.fn(async () => ({ data: { id: 'msg-1', threadId: 'thr-1', labelIds: ['SENT'] } })),
        get: vi.fn(async () => ({
          data: {
            payload: {
              headers: [
                { name: 'Message-ID', value: '<orig@mail.test>' },
                { name: 'Subject', value: 'Hello' },
                { value: 'no name' },
              ],
            },
          },
        })),
      },
      drafts: {
        create: vi.fn(async () => ({ data: { id: 'gd-1', message: { id: 'm-1', threadId: 't-1' } } })),
        delete: vi.fn(async () => ({ data: '' })),
      },
      threads: {
        get: vi.fn(async () => ({
          data: {
            id: 'thr-1',
            historyId: '42',
            messages: [
              { id: 'msg-1', snippet: 'Hi', labelIds: ['SENT'], payload: { headers: [{ name: 'From', value: 'rep@example.org' }] } },
              { id: 'msg-2' },
            ],
          },
        })),
      },
      settings: {
        sendAs: {
          get: vi.fn(async () => ({ data: { signature: '<b>Rep</b>' } })),
        },
      },
    },
  };
  return { api, transport: gmailTransport(api as unknown as gmail_v1.Gmail) };
}

describe('gmailTransport', () => {
  test('sends the raw message without a thread id for a new conversation', async () => {
    const { api, transport } = makeGmail();

    const sent = await transport.sendMessage('cmF3');

    expect(sent).toEqual({ id: 'msg-1', threadId: 'thr-1', labelIds: ['SENT'] });
    expect(api.users.messages.send).toHaveBeenCalledWith(
      { userId: 'me', requestBody: { raw: 'cmF3' } },
      { timeout: 20_000 },
    );
  });

  test('adds the thread id when replying', async () => {
    const { api, transport } = makeGmail();

    await transport.sendMessage('cmF3', 'thr-9');

    expect(api.users.messages.send).toHaveBeenCalledWith(
      { userId: 'me', requestBody: { raw: 'cmF3', threadId: 'thr-9' } },
      { timeout: 20_000 },
    );
  });

  test('fails when Gmail returns no message id', async () => {
    const { api, transport } = makeGmail();
    api.users.messages.send.mockResolvedValueOnce({ data: { id: '', threadId: '', labelIds: [] } });

    await expect(transport.sendMessage('cmF3')).rejects.toThrow('Gmail API returned sent message with no ID');
  });

  test('creates a draft and maps its ids', async () => {
    const { transport } = makeGmail();
    await expect(transport.createDraft('cmF3')).resolves.toEqual({ draftId: 'gd-1', messageId: 'm-1', threadId: 't-1' });
  });

  test('deletes a draft by id', async () => {
    const { api, transport } = makeGmail();

    await transport.deleteDraft('gd-1');

    expect(api.users.drafts.delete).toHaveBeenCalledWith({ userId: 'me', id: 'gd-1' }, { timeout: 30_000 });
  });

  test('maps a thread with lower-cased header names and defaults', async () => {
    const { transport } = makeGmail();

    await expect(transport.getThread('thr-1')).resolves.toEqual({
      id: 'thr-1',
      historyId: '42',
      messages: [
        { id: 'msg-1', snippet: 'Hi', labelIds: ['SENT'], headers: { from: 'rep@example.org' } },
        { id: 'msg-2', snippet: '', labelIds: [], headers: {} },
      ],
    });
  });

  test('returns message headers keyed by lower-cased name', async () => {
    const { transport } = makeGmail();
    await expect(transport.getMessageHeaders('msg-1')).resolves.toEqual({
      'message-id': '<orig@mail.test>',
      'subject': 'Hello',
    });
  });

  test('reads the send-as signature', async () => {
    const { api, transport } = makeGmail();

    await expect(transport.getSendAsSignature('rep@example.org')).resolves.toBe('<b>Rep</b>');
    expect(api.users.settings.sendAs.get).toHaveBeenCalledWith(
      { userId: 'me', sendAsEmail: 'rep@example.org' },
      { timeout: 10_000 },
    );
  });
});

/**
 * Gmail API Transport
 *
 * Adapts the googleapis Gmail client to the MailboxTransport seam used by
 * mailbox-client.ts. One transport is bound to one delegated access token;
 * the mailbox client throws it away and builds a new one on invalidation.
 *
 * Errors from googleapis (GaxiosError) propagate unchanged; the mailbox
 * client classifies them (transient vs rejected vs not found).
 *
 * Internal module — not exported from the barrel.
 */

import { google } from 'googleapis';
import type { gmail_v1 } from 'googleapis';
import { OAuth2Client } from 'google-auth-library';
import type {
  MailboxTransport,
  ThreadData,
  TransportDraft,
  TransportMessage,
} from './types.js';

type GmailClient = gmail_v1.Gmail;

/** Per-call timeouts: sends are critical-path, lookups may walk long threads */
const SEND_TIMEOUT_MS = 20_000;
const LOOKUP_TIMEOUT_MS = 30_000;
const SIGNATURE_TIMEOUT_MS = 10_000;

/**
 * Creates a transport whose requests carry the given bearer token.
 */
export function createGmailTransport(accessToken: string): MailboxTransport {
  const auth = new OAuth2Client();
  auth.setCredentials({ access_token: accessToken });
  return gmailTransport(google.gmail({ version: 'v1', auth }));
}

/**
 * Wraps an existing Gmail client. Exported for tests.
 */
export function gmailTransport(gmail: GmailClient): MailboxTransport {
  return {
    async sendMessage(raw: string, threadId?: string): Promise<TransportMessage> {
      const response = await gmail.users.messages.send(
        {
          userId: 'me',
          requestBody: { raw, ...(threadId ? { threadId } : {}) },
        },
        { timeout: SEND_TIMEOUT_MS },
      );

      const messageId = response.data.id;
      if (!messageId) {
        throw new Error('Gmail API returned sent message with no ID');
      }

      return {
        id: messageId,
        threadId: response.data.threadId ?? '',
        labelIds: response.data.labelIds ?? [],
      };
    },

    async createDraft(raw: string, threadId?: string): Promise<TransportDraft> {
      const response = await gmail.users.drafts.create(
        {
          userId: 'me',
          requestBody: { message: { raw, ...(threadId ? { threadId } : {}) } },
        },
        { timeout: SEND_TIMEOUT_MS },
      );

      const draftId = response.data.id;
      if (!draftId) {
        throw new Error('Gmail API returned draft with no ID');
      }

      return {
        draftId,
        messageId: response.data.message?.id ?? '',
        threadId: response.data.message?.threadId ?? '',
      };
    },

    async deleteDraft(draftId: string): Promise<void> {
      await gmail.users.drafts.delete({ userId: 'me', id: draftId }, { timeout: LOOKUP_TIMEOUT_MS });
    },

    async getThread(threadId: string): Promise<ThreadData> {
      const response = await gmail.users.threads.get(
        { userId: 'me', id: threadId, format: 'metadata' },
        { timeout: LOOKUP_TIMEOUT_MS },
      );

      return {
        id: response.data.id ?? threadId,
        historyId: response.data.historyId ?? null,
        messages: (response.data.messages ?? []).map(message => ({
          id: message.id ?? '',
          snippet: message.snippet ?? '',
          labelIds: message.labelIds ?? [],
          headers: headerMap(message.payload?.headers),
        })),
      };
    },

    async getMessageHeaders(messageId: string): Promise<Record<string, string>> {
      const response = await gmail.users.messages.get(
        { userId: 'me', id: messageId, format: 'metadata' },
        { timeout: LOOKUP_TIMEOUT_MS },
      );
      return headerMap(response.data.payload?.headers);
    },

    async getSendAsSignature(sendAsEmail: string): Promise<string> {
      const response = await gmail.users.settings.sendAs.get(
        { userId: 'me', sendAsEmail },
        { timeout: SIGNATURE_TIMEOUT_MS },
      );
      return response.data.signature ?? '';
    },
  };
}

/** Gmail header list -> map keyed by lower-cased name (last one wins) */
function headerMap(headers: gmail_v1.Schema$MessagePartHeader[] | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  for (const header of headers ?? []) {
    if (header.name) {
      result[header.name.toLowerCase()] = header.value ?? '';
    }
  }
  return result;
}

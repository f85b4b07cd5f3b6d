/**
 * Document Normalization
 *
 * Older writers stored drafts under different field names. Every read goes
 * through here once, so the rest of the service only sees typed records:
 *
 *   to           <- to | recipient_email | to_address
 *   to_name      <- to_name | recipient_name | contact_name
 *   body         <- body | content
 *   sender_email <- sender_email | from_address
 *   sender_name  <- sender_name | from_name
 *   company_name <- company_name | partner_name
 *   gmail_message_id / gmail_thread_id <- message_id / thread_id
 *
 * Writes always use the canonical names (toDraftDocument, toFollowupDocument).
 */

import { FirestoreError } from '../errors.js';
import { isDraftStatus } from './types.js';
import type {
  DraftRecord,
  DraftStatus,
  FollowupRecord,
  NewDraft,
  NewFollowup,
  SentMarker,
} from './types.js';

export type DocumentData = Record<string, unknown>;

/** Statuses written by earlier versions, mapped onto the current set */
const LEGACY_STATUSES: Record<string, DraftStatus> = {
  approved: 'pending',
  draft: 'pending',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** First non-empty string among the given fields */
function pickString(data: DocumentData, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = data[key];
    if (typeof value === 'string' && value !== '') return value;
  }
  return undefined;
}

function pickNumber(data: DocumentData, key: string): number | undefined {
  const value = data[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && /^\d+$/.test(value)) return parseInt(value, 10);
  return undefined;
}

/**
 * Firestore Timestamp, Date or ISO string -> Date.
 */
export function toDate(value: unknown): Date | undefined {
  if (value instanceof Date) return value;
  if (isRecord(value) && typeof value.toDate === 'function') {
    const converted: unknown = value.toDate();
    return converted instanceof Date ? converted : undefined;
  }
  if (typeof value === 'string' || typeof value === 'number') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? undefined : parsed;
  }
  return undefined;
}

export function normalizeStatus(value: unknown, id: string): DraftStatus {
  if (value === undefined || value === null || value === '') return 'pending';
  if (isDraftStatus(value)) return value;
  if (typeof value === 'string' && Object.hasOwn(LEGACY_STATUSES, value)) return LEGACY_STATUSES[value];
  throw new FirestoreError(`Document ${id} has unknown status "${String(value)}"`, 'normalize_status');
}

/**
 * Raw draft document -> DraftRecord.
 */
export function normalizeDraft(id: string, data: DocumentData): DraftRecord {
  return {
    id,
    to: pickString(data, 'to', 'recipient_email', 'to_address') ?? '',
    toName: pickString(data, 'to_name', 'recipient_name', 'contact_name'),
    subject: pickString(data, 'subject') ?? '',
    body: pickString(data, 'body', 'content') ?? '',
    senderEmail: pickString(data, 'sender_email', 'from_address'),
    senderName: pickString(data, 'sender_name', 'from_name'),
    companyName: pickString(data, 'company_name', 'partner_name'),
    status: normalizeStatus(data.status, id),
    createdAt: toDate(data.created_at) ?? new Date(0),
    sentAt: toDate(data.sent_at),
    gmailMessageId: pickString(data, 'gmail_message_id', 'message_id'),
    gmailThreadId: pickString(data, 'gmail_thread_id', 'thread_id'),
    gmailDraftId: pickString(data, 'gmail_draft_id'),
    pixelId: pickString(data, 'pixel_id'),
    versionGroupId: pickString(data, 'version_group_id') ?? id,
    followupNumber: pickNumber(data, 'followup_number'),
    externalId: pickString(data, 'x_external_id'),
    notes: pickString(data, 'notes'),
  };
}

/**
 * Raw follow-up document -> FollowupRecord. Follow-ups are numbered from 1.
 */
export function normalizeFollowup(id: string, data: DocumentData): FollowupRecord {
  const draft = normalizeDraft(id, data);
  return {
    ...draft,
    originalDraftId: pickString(data, 'original_draft_id') ?? '',
    followupNumber: draft.followupNumber ?? 1,
  };
}

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

/** Drops undefined values; Firestore rejects them */
function compact(data: Record<string, unknown>): DocumentData {
  const result: DocumentData = {};
  for (const [key, value] of Object.entries(data)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

export function toDraftDocument(draft: NewDraft, createdAt: Date): DocumentData {
  return compact({
    to: draft.to,
    to_name: draft.toName,
    subject: draft.subject,
    body: draft.body,
    sender_email: draft.senderEmail,
    sender_name: draft.senderName,
    company_name: draft.companyName,
    status: 'pending',
    created_at: createdAt,
    gmail_draft_id: draft.gmailDraftId,
    version_group_id: draft.versionGroupId,
    followup_number: draft.followupNumber,
    x_external_id: draft.externalId,
    notes: draft.notes,
  });
}

export function toFollowupDocument(followup: NewFollowup, createdAt: Date): DocumentData {
  return compact({
    to: followup.to,
    to_name: followup.toName,
    subject: followup.subject,
    body: followup.body,
    sender_email: followup.senderEmail,
    sender_name: followup.senderName,
    company_name: followup.companyName,
    status: 'pending',
    created_at: createdAt,
    version_group_id: followup.versionGroupId,
    followup_number: followup.followupNumber,
    original_draft_id: followup.originalDraftId,
    x_external_id: followup.externalId,
    notes: followup.notes,
  });
}

/** The single write that moves a record to `sent` */
export function toSentFields(marker: SentMarker): DocumentData {
  return compact({
    status: 'sent',
    gmail_message_id: marker.messageId,
    gmail_thread_id: marker.threadId,
    sent_at: marker.sentAt,
    pixel_id: marker.pixelId,
  });
}

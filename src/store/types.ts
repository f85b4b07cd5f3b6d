/**
 * Store Type Definitions
 *
 * Typed records for the drafts, follow-ups and tracking collections, the
 * status state machine, and the store interfaces the orchestration layer
 * depends on. firestore-store.ts implements them against Firestore; tests
 * use the in-memory fakes under __tests__/fixtures.
 */

import type { PixelKind } from '../email/body.js';

export type { PixelKind };

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

export const DRAFT_STATUSES = ['pending', 'sent', 'rejected', 'bounced', 'replied'] as const;

export type DraftStatus = (typeof DRAFT_STATUSES)[number];

/** Statuses reached only after a successful send; Gmail ids are set for these */
export const SENT_FAMILY: readonly DraftStatus[] = ['sent', 'bounced', 'replied'];

const TRANSITIONS: Record<DraftStatus, readonly DraftStatus[]> = {
  pending: ['sent', 'rejected'],
  sent: ['bounced', 'replied'],
  rejected: [],
  bounced: [],
  replied: [],
};

/** Status only moves forward along the allowed edges */
export function canTransition(from: DraftStatus, to: DraftStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isDraftStatus(value: unknown): value is DraftStatus {
  return typeof value === 'string' && (DRAFT_STATUSES as readonly string[]).includes(value);
}

export function isSentFamily(status: DraftStatus): boolean {
  return SENT_FAMILY.includes(status);
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export interface DraftRecord {
  id: string;
  to: string;
  toName?: string;
  subject: string;
  /** Markdown */
  body: string;
  senderEmail?: string;
  senderName?: string;
  companyName?: string;
  status: DraftStatus;
  createdAt: Date;
  sentAt?: Date;
  gmailMessageId?: string;
  gmailThreadId?: string;
  gmailDraftId?: string;
  pixelId?: string;
  versionGroupId: string;
  followupNumber?: number;
  externalId?: string;
  notes?: string;
}

export interface FollowupRecord extends Omit<DraftRecord, 'followupNumber'> {
  originalDraftId: string;
  followupNumber: number;
}

export interface TrackingPixelRecord {
  pixelId: string;
  draftId: string;
  kind: PixelKind;
  recipient: string;
  subject: string;
  openCount: number;
  createdAt: Date;
}

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

/** Fields accepted when creating a draft; status always starts pending */
export type NewDraft = Omit<DraftRecord, 'id' | 'status' | 'createdAt' | 'sentAt' | 'gmailMessageId' | 'gmailThreadId' | 'pixelId'> & {
  createdAt?: Date;
};

export type NewFollowup = Omit<FollowupRecord, 'id' | 'status' | 'createdAt' | 'sentAt' | 'gmailMessageId' | 'gmailThreadId' | 'pixelId' | 'gmailDraftId'> & {
  createdAt?: Date;
};

/** Fields `update` may change. Sent ids are written only by markSent. */
export interface DraftUpdate {
  status?: Exclude<DraftStatus, 'sent'>;
  gmailDraftId?: string;
  notes?: string;
  subject?: string;
  body?: string;
}

export interface SentMarker {
  messageId: string;
  threadId: string;
  sentAt: Date;
  pixelId?: string;
}

export type ExternalKey = 'x_external_id' | 'version_group_id';

// ---------------------------------------------------------------------------
// Store interfaces
// ---------------------------------------------------------------------------

export interface DraftStore {
  get(id: string): Promise<DraftRecord | null>;
  create(data: NewDraft): Promise<string>;
  /** Throws InvalidTransitionError for a backward or unknown status move */
  update(id: string, fields: DraftUpdate): Promise<void>;
  /** The only path to `sent`. Throws AlreadySentError unless the record is pending. */
  markSent(id: string, marker: SentMarker): Promise<void>;
  /** Ordered by createdAt ascending */
  queryByStatus(status: DraftStatus, limit: number): Promise<DraftRecord[]>;
  queryByExternalKey(key: ExternalKey, value: string): Promise<DraftRecord[]>;
}

export interface FollowupStore {
  get(id: string): Promise<FollowupRecord | null>;
  create(data: NewFollowup): Promise<string>;
  markSent(id: string, marker: SentMarker): Promise<void>;
  /** Ordered by followupNumber ascending */
  listForDraft(draftId: string): Promise<FollowupRecord[]>;
}

export interface TrackingStore {
  register(pixel: Omit<TrackingPixelRecord, 'openCount' | 'createdAt'>): Promise<void>;
}

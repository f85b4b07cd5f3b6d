/**
 * Firestore Stores
 *
 * DraftStore, FollowupStore and TrackingStore over @google-cloud/firestore.
 * Every failure that is not already a known error is wrapped in
 * FirestoreError with the operation name; reads go through normalize.ts.
 *
 * Status writes (`update` with a status, `markSent`) run in a transaction
 * that re-reads the current status first, so two concurrent sends of the
 * same draft cannot both reach `sent`.
 *
 * queryByStatus orders on created_at after an equality filter on status,
 * which needs a composite index (status ASC, created_at ASC) per collection.
 */

import type { DocumentReference, Firestore } from '@google-cloud/firestore';
import {
  AlreadySentError,
  AppError,
  DraftNotFoundError,
  FirestoreError,
  FollowupNotFoundError,
  InvalidTransitionError,
  errorMessage,
} from '../errors.js';
import {
  normalizeDraft,
  normalizeFollowup,
  normalizeStatus,
  toDraftDocument,
  toFollowupDocument,
  toSentFields,
} from './normalize.js';
import type { DocumentData } from './normalize.js';
import { canTransition } from './types.js';
import type {
  DraftRecord,
  DraftStatus,
  DraftStore,
  DraftUpdate,
  ExternalKey,
  FollowupRecord,
  FollowupStore,
  NewDraft,
  NewFollowup,
  SentMarker,
  TrackingPixelRecord,
  TrackingStore,
} from './types.js';

type NotFound = (id: string) => AppError;

/**
 * Runs a store operation, passing known errors through and wrapping the rest.
 */
async function guarded<T>(operation: string, resourceId: string | undefined, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof AppError) throw err;
    console.error('[store] Firestore operation failed', {
      operation,
      resourceId,
      error: errorMessage(err),
    });
    throw new FirestoreError(`Firestore ${operation} failed: ${errorMessage(err)}`, operation, err);
  }
}

/**
 * Moves a document from pending to sent inside a transaction.
 */
async function markSentInTransaction(
  db: Firestore,
  ref: DocumentReference,
  marker: SentMarker,
  notFound: NotFound,
): Promise<void> {
  await db.runTransaction(async tx => {
    const snapshot = await tx.get(ref);
    if (!snapshot.exists) throw notFound(ref.id);

    const current = normalizeStatus(snapshot.get('status'), ref.id);
    if (current !== 'pending') {
      throw new AlreadySentError(ref.id, current);
    }
    tx.update(ref, toSentFields(marker));
  });
}

// ---------------------------------------------------------------------------
// Drafts
// ---------------------------------------------------------------------------

export class FirestoreDraftStore implements DraftStore {
  constructor(
    private readonly db: Firestore,
    private readonly collectionName: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  private get collection() {
    return this.db.collection(this.collectionName);
  }

  async get(id: string): Promise<DraftRecord | null> {
    return guarded('get_draft', id, async () => {
      const snapshot = await this.collection.doc(id).get();
      const data: DocumentData | undefined = snapshot.data();
      return snapshot.exists && data ? normalizeDraft(snapshot.id, data) : null;
    });
  }

  async create(data: NewDraft): Promise<string> {
    return guarded('create_draft', undefined, async () => {
      const ref = this.collection.doc();
      await ref.set(toDraftDocument(data, data.createdAt ?? this.now()));
      console.log('[store] Draft created', { draftId: ref.id });
      return ref.id;
    });
  }

  async update(id: string, fields: DraftUpdate): Promise<void> {
    const data: DocumentData = {};
    if (fields.gmailDraftId !== undefined) data.gmail_draft_id = fields.gmailDraftId;
    if (fields.notes !== undefined) data.notes = fields.notes;
    if (fields.subject !== undefined) data.subject = fields.subject;
    if (fields.body !== undefined) data.body = fields.body;

    await guarded('update_draft', id, async () => {
      const ref = this.collection.doc(id);
      const target = fields.status;

      if (target === undefined) {
        await ref.update(data);
      } else {
        await this.db.runTransaction(async tx => {
          const snapshot = await tx.get(ref);
          if (!snapshot.exists) throw new DraftNotFoundError(id);

          const current = normalizeStatus(snapshot.get('status'), id);
          if (!canTransition(current, target)) {
            throw new InvalidTransitionError(id, current, target);
          }
          tx.update(ref, { ...data, status: target });
        });
      }

      console.log('[store] Draft updated', { draftId: id, fields: Object.keys(fields) });
    });
  }

  async markSent(id: string, marker: SentMarker): Promise<void> {
    await guarded('mark_draft_sent', id, async () => {
      await markSentInTransaction(this.db, this.collection.doc(id), marker, draftId => new DraftNotFoundError(draftId));
      console.log('[store] Draft marked sent', { draftId: id, messageId: marker.messageId });
    });
  }

  async queryByStatus(status: DraftStatus, limit: number): Promise<DraftRecord[]> {
    return guarded('query_drafts_by_status', undefined, async () => {
      const snapshot = await this.collection
        .where('status', '==', status)
        .orderBy('created_at', 'asc')
        .limit(limit)
        .get();
      return snapshot.docs.map(doc => normalizeDraft(doc.id, doc.data()));
    });
  }

  async queryByExternalKey(key: ExternalKey, value: string): Promise<DraftRecord[]> {
    return guarded('query_drafts_by_key', undefined, async () => {
      const snapshot = await this.collection.where(key, '==', value).get();
      return snapshot.docs.map(doc => normalizeDraft(doc.id, doc.data()));
    });
  }
}

// ---------------------------------------------------------------------------
// Follow-ups
// ---------------------------------------------------------------------------

export class FirestoreFollowupStore implements FollowupStore {
  constructor(
    private readonly db: Firestore,
    private readonly collectionName: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  private get collection() {
    return this.db.collection(this.collectionName);
  }

  async get(id: string): Promise<FollowupRecord | null> {
    return guarded('get_followup', id, async () => {
      const snapshot = await this.collection.doc(id).get();
      const data: DocumentData | undefined = snapshot.data();
      return snapshot.exists && data ? normalizeFollowup(snapshot.id, data) : null;
    });
  }

  async create(data: NewFollowup): Promise<string> {
    return guarded('create_followup', undefined, async () => {
      const ref = this.collection.doc();
      await ref.set(toFollowupDocument(data, data.createdAt ?? this.now()));
      console.log('[store] Followup created', {
        followupId: ref.id,
        originalDraftId: data.originalDraftId,
        followupNumber: data.followupNumber,
      });
      return ref.id;
    });
  }

  async markSent(id: string, marker: SentMarker): Promise<void> {
    await guarded('mark_followup_sent', id, async () => {
      await markSentInTransaction(this.db, this.collection.doc(id), marker, followupId => new FollowupNotFoundError(followupId));
      console.log('[store] Followup marked sent', { followupId: id, messageId: marker.messageId });
    });
  }

  async listForDraft(draftId: string): Promise<FollowupRecord[]> {
    return guarded('list_followups', draftId, async () => {
      const snapshot = await this.collection.where('original_draft_id', '==', draftId).get();
      return snapshot.docs
        .map(doc => normalizeFollowup(doc.id, doc.data()))
        .sort((a, b) => a.followupNumber - b.followupNumber);
    });
  }
}

// ---------------------------------------------------------------------------
// Tracking
// ---------------------------------------------------------------------------

export class FirestoreTrackingStore implements TrackingStore {
  constructor(
    private readonly db: Firestore,
    private readonly collectionName: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async register(pixel: Omit<TrackingPixelRecord, 'openCount' | 'createdAt'>): Promise<void> {
    await guarded('register_pixel', pixel.pixelId, async () => {
      await this.db.collection(this.collectionName).doc(pixel.pixelId).set({
        pixel_id: pixel.pixelId,
        draft_id: pixel.draftId,
        type: pixel.kind,
        recipient: pixel.recipient,
        subject: pixel.subject,
        open_count: 0,
        created_at: this.now(),
      });
    });
  }
}

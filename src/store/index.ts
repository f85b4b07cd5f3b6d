// ============================================================================
// Store Module — Barrel Export
// ============================================================================

export type {
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
export { DRAFT_STATUSES, canTransition, isDraftStatus, isSentFamily } from './types.js';

export { FirestoreDraftStore, FirestoreFollowupStore, FirestoreTrackingStore } from './firestore-store.js';

// ============================================================================
// Drafts Module — Barrel Export
// ============================================================================

export { DraftService } from './draft-service.js';
export type {
  CreateEmailResponse,
  DraftServiceDeps,
  DraftServiceOptions,
  GenerateFollowupResponse,
  Mailbox,
  MailboxProvider,
  ResendResponse,
  SendDraftResponse,
  SendFollowupResponse,
  UpdateStatusResponse,
} from './draft-service.js';

export { HttpCopyGenerator } from './generator-client.js';
export type { CopyGenerator, FollowupPrompt } from './generator-client.js';
export { HttpFollowupScheduler, disabledScheduler } from './followup-scheduler.js';
export type { FollowupScheduler } from './followup-scheduler.js';

export * from './schemas.js';

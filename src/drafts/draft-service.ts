/**
 * Draft Service
 *
 * Orchestrates store reads, body rendering, Gmail delivery and the status
 * write for every draft operation. Each public operation returns a Result;
 * known failures come back as values and only unexpected errors throw.
 *
 * Send flow (sendDraft):
 * 1. Load the draft (DraftNotFoundError) and refuse anything not pending
 *    unless this is a test send (AlreadySentError)
 * 2. Render Markdown, append the sender's signature, embed the tracking
 *    pixel (tracking on, not test mode)
 * 3. Send through the sender's mailbox client
 * 4. Not test mode: markSent (the only path to `sent`), register the pixel,
 *    discard the Gmail draft made by createEmail, schedule follow-ups for an
 *    initial draft
 *
 * Test mode sends to the override address with a prefixed subject and never
 * writes to the store, embeds a pixel or threads a reply.
 *
 * Logging never includes bodies or full recipient addresses.
 */

import { randomUUID } from 'node:crypto';
import {
  AlreadySentError,
  DraftNotFoundError,
  FollowupNotFoundError,
  NotSentError,
  ValidationError,
  errorMessage,
  settle,
} from '../errors.js';
import type { Result } from '../errors.js';
import type { SendMode } from '../config.js';
import { appendSignature, buildTrackingPixel, renderMarkdown } from '../email/body.js';
import type { PixelKind } from '../email/body.js';
import type { MailboxClient } from '../email/mailbox-client.js';
import type { ThreadData } from '../email/types.js';
import { isSentFamily } from '../store/types.js';
import type {
  DraftRecord,
  DraftStatus,
  DraftStore,
  FollowupRecord,
  FollowupStore,
  TrackingStore,
} from '../store/types.js';
import type { CopyGenerator } from './generator-client.js';
import type { FollowupScheduler } from './followup-scheduler.js';
import type {
  CreateEmailRequest,
  GenerateFollowupRequest,
  ListDraftsQuery,
  ResendRequest,
  SendDraftRequest,
  SendFollowupRequest,
} from './schemas.js';

const TEST_RECIPIENT_NAME = 'Test Recipient';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The mailbox operations the service uses */
export type Mailbox = Pick<
  MailboxClient,
  'sendEmail' | 'createDraft' | 'deleteDraft' | 'getThread' | 'getMessageHeaders' | 'getUserSignature'
>;

export interface MailboxProvider {
  get(address: string): Mailbox;
}

export interface DraftServiceOptions {
  /** Sender used when a draft names none */
  defaultSender: string;
  defaultSendMode: SendMode;
  /** Tracker base URL; undefined disables the pixel */
  trackerUrl: string | undefined;
  appendSignature: boolean;
  testSubjectPrefix: string;
}

export interface DraftServiceDeps {
  drafts: DraftStore;
  followups: FollowupStore;
  tracking: TrackingStore;
  mailboxes: MailboxProvider;
  scheduler: FollowupScheduler;
  generator: CopyGenerator;
  options: DraftServiceOptions;
  newId?: () => string;
  now?: () => Date;
}

export interface SendDraftResponse {
  draft_id: string;
  message_id: string;
  thread_id: string;
  pixel_id: string | null;
  test_mode: boolean;
}

export type CreateEmailResponse =
  | { status: 'ok'; mode: 'existing'; draft_id: string; draft_status: DraftStatus }
  | { status: 'ok'; mode: 'draft'; draft_id: string; gmail_draft_id: string }
  | ({ status: 'ok'; mode: 'send' } & SendDraftResponse);

export interface ResendResponse {
  original_draft_id: string;
  message_id: string;
  thread_id: string;
}

export interface SendFollowupResponse {
  followup_id: string;
  message_id: string;
  thread_id: string;
  pixel_id: string | null;
  test_mode: boolean;
}

export interface GenerateFollowupResponse {
  followup_id: string;
  draft_id: string;
  followup_number: number;
  subject: string;
}

export interface UpdateStatusResponse {
  draft_id: string;
  status: DraftStatus;
}

/** What a send needs once recipient and threading are decided */
interface Delivery {
  mailbox: Mailbox;
  to: string;
  toName: string | undefined;
  fromName: string | undefined;
  subject: string;
  markdown: string;
  pixel: { id: string; kind: PixelKind } | null;
  threadId?: string;
  references?: string;
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export class DraftService {
  private readonly drafts: DraftStore;
  private readonly followups: FollowupStore;
  private readonly tracking: TrackingStore;
  private readonly mailboxes: MailboxProvider;
  private readonly scheduler: FollowupScheduler;
  private readonly generator: CopyGenerator;
  private readonly options: DraftServiceOptions;
  private readonly newId: () => string;
  private readonly now: () => Date;

  constructor(deps: DraftServiceDeps) {
    this.drafts = deps.drafts;
    this.followups = deps.followups;
    this.tracking = deps.tracking;
    this.mailboxes = deps.mailboxes;
    this.scheduler = deps.scheduler;
    this.generator = deps.generator;
    this.options = deps.options;
    this.newId = deps.newId ?? randomUUID;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Stores a new draft and either creates a Gmail draft or sends it.
   * A repeated x_external_id returns the draft created the first time, unless
   * that attempt never reached Gmail (still pending, no Gmail draft): then the
   * stored record is completed with this request's mode.
   */
  createEmail(req: CreateEmailRequest): Promise<Result<CreateEmailResponse>> {
    return settle<CreateEmailResponse>(async () => {
      const existing = req.x_external_id
        ? (await this.drafts.queryByExternalKey('x_external_id', req.x_external_id))[0]
        : undefined;

      if (existing && !isIncomplete(existing)) {
        console.log('[drafts] Duplicate external id, returning existing draft', {
          draftId: existing.id,
          status: existing.status,
        });
        return { status: 'ok', mode: 'existing', draft_id: existing.id, draft_status: existing.status };
      }
      if (existing) {
        console.log('[drafts] Completing pending draft from an earlier failed attempt', { draftId: existing.id });
      }

      const draftId = existing?.id ?? await this.drafts.create({
        to: req.to,
        toName: req.to_name ?? req.contact_name,
        subject: req.subject,
        body: req.message,
        senderEmail: req.sender_email,
        senderName: req.sender_name,
        companyName: req.company_name,
        versionGroupId: req.version_group_id ?? this.newId(),
        followupNumber: req.followup_number,
        externalId: req.x_external_id,
        notes: req.notes,
      });

      const mode = req.mode ?? this.options.defaultSendMode;
      if (mode === 'send') {
        const sent = await this.deliverDraft(draftId, null);
        return { status: 'ok', mode: 'send', ...sent };
      }

      const record = existing ?? await this.requireDraft(draftId);
      const mailbox = this.mailboxes.get(this.senderOf(record));
      const draft = await mailbox.createDraft({
        to: record.to,
        toName: record.toName,
        fromName: record.senderName,
        subject: record.subject,
        htmlBody: await this.renderBody(mailbox, record.body, null),
      });
      await this.drafts.update(draftId, { gmailDraftId: draft.draftId });

      console.log('[drafts] Gmail draft created', { draftId, gmailDraftId: draft.draftId });
      return { status: 'ok', mode: 'draft', draft_id: draftId, gmail_draft_id: draft.draftId };
    });
  }

  sendDraft(req: SendDraftRequest): Promise<Result<SendDraftResponse>> {
    return settle(() => this.deliverDraft(req.draft_id, req.test_mode ? testAddress(req.test_email) : null));
  }

  /**
   * Sends a copy of a draft to another address. The original record is not
   * touched and no pixel is embedded.
   */
  resendToAnother(req: ResendRequest): Promise<Result<ResendResponse>> {
    return settle(async () => {
      const draft = await this.requireDraft(req.draft_id);
      const mailbox = this.mailboxes.get(this.senderOf(draft));

      const result = await this.deliver({
        mailbox,
        to: req.new_recipient_email,
        toName: req.new_recipient_name,
        fromName: draft.senderName,
        subject: draft.subject,
        markdown: draft.body,
        pixel: null,
      });

      console.log('[drafts] Draft resent to another address', {
        draftId: draft.id,
        recipientDomain: domainOf(req.new_recipient_email),
        messageId: result.messageId,
      });
      return { original_draft_id: draft.id, message_id: result.messageId, thread_id: result.threadId };
    });
  }

  /**
   * Sends a stored follow-up, threaded under the original draft's message.
   */
  sendFollowup(req: SendFollowupRequest): Promise<Result<SendFollowupResponse>> {
    return settle(async () => {
      const testEmail = req.test_mode ? testAddress(req.test_email) : null;
      const followup = await this.followups.get(req.followup_id);
      if (!followup) throw new FollowupNotFoundError(req.followup_id);
      if (!testEmail && followup.status !== 'pending') {
        throw new AlreadySentError(followup.id, followup.status);
      }

      const original = followup.originalDraftId ? await this.requireDraft(followup.originalDraftId) : null;
      const mailbox = this.mailboxes.get(this.senderOf(followup));

      let threadId: string | undefined;
      let references: string | undefined;
      if (!testEmail && original) {
        threadId = original.gmailThreadId;
        if (original.gmailMessageId) {
          const headers = await mailbox.getMessageHeaders(original.gmailMessageId);
          references = headers['message-id'] || undefined;
        }
      }

      const pixel = !testEmail && this.options.trackerUrl
        ? { id: this.newId(), kind: 'followup' as const }
        : null;

      const result = await this.deliver({
        mailbox,
        ...this.recipientOf(followup, testEmail),
        fromName: followup.senderName,
        markdown: followup.body,
        pixel,
        threadId,
        references,
      });

      if (!testEmail) {
        await this.followups.markSent(followup.id, {
          messageId: result.messageId,
          threadId: result.threadId,
          sentAt: this.now(),
          pixelId: pixel?.id,
        });
        if (pixel) await this.registerPixel(pixel, followup, result.messageId);
      }

      console.log('[drafts] Follow-up sent', {
        followupId: followup.id,
        followupNumber: followup.followupNumber,
        messageId: result.messageId,
        threaded: threadId !== undefined,
        testMode: testEmail !== null,
      });

      return {
        followup_id: followup.id,
        message_id: result.messageId,
        thread_id: result.threadId,
        pixel_id: pixel?.id ?? null,
        test_mode: testEmail !== null,
      };
    });
  }

  getDraft(id: string): Promise<Result<DraftRecord>> {
    return settle(() => this.requireDraft(id));
  }

  listDrafts(query: ListDraftsQuery): Promise<Result<DraftRecord[]>> {
    return settle(() => this.drafts.queryByStatus(query.status, query.limit));
  }

  /**
   * Moves a draft along the status machine. `sent` is refused here because
   * only a successful send may set it.
   */
  updateStatus(id: string, status: DraftStatus): Promise<Result<UpdateStatusResponse>> {
    return settle(async () => {
      const draft = await this.requireDraft(id);
      if (status === 'sent') {
        throw new ValidationError('status "sent" is set by sending the draft', 'status');
      }
      await this.drafts.update(draft.id, { status });
      console.log('[drafts] Status updated', { draftId: id, from: draft.status, to: status });
      return { draft_id: draft.id, status };
    });
  }

  /**
   * The Gmail thread of a sent draft.
   */
  getDraftThread(id: string): Promise<Result<ThreadData>> {
    return settle(async () => {
      const draft = await this.requireDraft(id);
      if (!draft.gmailThreadId) throw new NotSentError(draft.id, draft.status);
      return this.mailboxes.get(this.senderOf(draft)).getThread(draft.gmailThreadId);
    });
  }

  /**
   * Asks the generator for follow-up copy and stores it as a pending follow-up.
   */
  generateFollowup(req: GenerateFollowupRequest): Promise<Result<GenerateFollowupResponse>> {
    return settle(async () => {
      const draft = await this.requireDraft(req.draft_id);
      if (!isSentFamily(draft.status)) throw new NotSentError(draft.id, draft.status);

      const copy = await this.generator.generateFollowup({
        draft,
        followupNumber: req.followup_number,
        daysSinceLast: req.days_since_last,
      });

      const followupId = await this.followups.create({
        to: draft.to,
        toName: draft.toName,
        subject: copy.subject,
        body: copy.body,
        senderEmail: draft.senderEmail,
        senderName: draft.senderName,
        companyName: draft.companyName,
        versionGroupId: draft.versionGroupId,
        originalDraftId: draft.id,
        followupNumber: req.followup_number,
      });

      return {
        followup_id: followupId,
        draft_id: draft.id,
        followup_number: req.followup_number,
        subject: copy.subject,
      };
    });
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /**
   * Sends a stored draft. `testEmail` non-null means a test send.
   */
  private async deliverDraft(draftId: string, testEmail: string | null): Promise<SendDraftResponse> {
    const draft = await this.requireDraft(draftId);
    if (!testEmail && draft.status !== 'pending') {
      throw new AlreadySentError(draft.id, draft.status);
    }

    const pixel = !testEmail && this.options.trackerUrl
      ? { id: this.newId(), kind: 'draft' as const }
      : null;

    const mailbox = this.mailboxes.get(this.senderOf(draft));
    const result = await this.deliver({
      mailbox,
      ...this.recipientOf(draft, testEmail),
      fromName: draft.senderName,
      markdown: draft.body,
      pixel,
    });

    if (!testEmail) {
      await this.drafts.markSent(draft.id, {
        messageId: result.messageId,
        threadId: result.threadId,
        sentAt: this.now(),
        pixelId: pixel?.id,
      });
      if (pixel) await this.registerPixel(pixel, draft, result.messageId);
      if (draft.gmailDraftId) await this.discardGmailDraft(mailbox, draft.id, draft.gmailDraftId);
      if (!draft.followupNumber) {
        await this.scheduler.schedule(draft.id);
      }
    }

    console.log('[drafts] Draft sent', {
      draftId: draft.id,
      messageId: result.messageId,
      recipientDomain: domainOf(testEmail ?? draft.to),
      testMode: testEmail !== null,
    });

    return {
      draft_id: draft.id,
      message_id: result.messageId,
      thread_id: result.threadId,
      pixel_id: pixel?.id ?? null,
      test_mode: testEmail !== null,
    };
  }

  private async deliver(delivery: Delivery): Promise<{ messageId: string; threadId: string }> {
    if (!delivery.to) {
      throw new ValidationError('No recipient email found in draft', 'to');
    }

    const htmlBody = await this.renderBody(delivery.mailbox, delivery.markdown, delivery.pixel);
    return delivery.mailbox.sendEmail({
      to: delivery.to,
      toName: delivery.toName,
      fromName: delivery.fromName,
      subject: delivery.subject,
      htmlBody,
      threadId: delivery.threadId,
      references: delivery.references,
      inReplyTo: delivery.references,
    });
  }

  private async renderBody(mailbox: Mailbox, markdown: string, pixel: Delivery['pixel']): Promise<string> {
    let html = renderMarkdown(markdown);
    if (this.options.appendSignature) {
      html = appendSignature(html, await mailbox.getUserSignature());
    }
    if (pixel && this.options.trackerUrl) {
      html += buildTrackingPixel(this.options.trackerUrl, pixel.id, pixel.kind);
    }
    return html;
  }

  /**
   * Recipient, display name and subject: the record's own, or the test override.
   */
  private recipientOf(
    record: DraftRecord | FollowupRecord,
    testEmail: string | null,
  ): Pick<Delivery, 'to' | 'toName' | 'subject'> {
    if (testEmail) {
      return {
        to: testEmail,
        toName: TEST_RECIPIENT_NAME,
        subject: `${this.options.testSubjectPrefix}${record.subject}`,
      };
    }
    return { to: record.to, toName: record.toName, subject: record.subject };
  }

  /**
   * The pixel row is written after markSent; losing it only loses open counts.
   */
  private async registerPixel(
    pixel: { id: string; kind: PixelKind },
    record: DraftRecord | FollowupRecord,
    messageId: string,
  ): Promise<void> {
    try {
      await this.tracking.register({
        pixelId: pixel.id,
        draftId: record.id,
        kind: pixel.kind,
        recipient: record.to,
        subject: record.subject,
      });
    } catch (err) {
      console.error('[drafts] Tracking pixel registration failed', {
        draftId: record.id,
        pixelId: pixel.id,
        messageId,
        error: errorMessage(err),
      });
    }
  }

  /**
   * The Gmail draft made by createEmail would send a duplicate if used by
   * hand once the draft went out. Failure is logged; the send stands.
   */
  private async discardGmailDraft(mailbox: Mailbox, draftId: string, gmailDraftId: string): Promise<void> {
    try {
      await mailbox.deleteDraft(gmailDraftId);
      console.log('[drafts] Gmail draft discarded after send', { draftId, gmailDraftId });
    } catch (err) {
      console.warn('[drafts] Gmail draft could not be discarded', {
        draftId,
        gmailDraftId,
        error: errorMessage(err),
      });
    }
  }

  private async requireDraft(id: string): Promise<DraftRecord> {
    const draft = await this.drafts.get(id);
    if (!draft) throw new DraftNotFoundError(id);
    return draft;
  }

  private senderOf(record: DraftRecord | FollowupRecord): string {
    return record.senderEmail ?? this.options.defaultSender;
  }
}

/** Pending with no Gmail draft: an earlier createEmail failed before Gmail accepted it */
function isIncomplete(draft: DraftRecord): boolean {
  return draft.status === 'pending' && !draft.gmailDraftId;
}

/** The schema guarantees test_email with test_mode; checked again for direct callers */
function testAddress(testEmail: string | undefined): string {
  if (!testEmail) {
    throw new ValidationError('test_email is required when test_mode is true', 'test_email');
  }
  return testEmail;
}

function domainOf(address: string): string {
  return address.split('@')[1] ?? 'unknown';
}

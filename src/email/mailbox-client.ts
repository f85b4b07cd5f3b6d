/**
 * Mailbox Client
 *
 * Sends, drafts and reads mail as one impersonated Workspace user. The
 * transport handle is acquired lazily through the credential exchanger and
 * cached until it is invalidated or its token is about to expire:
 *
 *   uninitialized --first use--> active --transient failure / 401 / 403--> invalidated
 *   invalidated --next use--> active
 *
 * Error classification:
 * - Connection failures (reset, refused, DNS, socket hang up) are transient:
 *   the handle is dropped and the call retried after a fixed backoff
 * - 401/403 from Gmail throw GmailAuthError and drop the handle
 * - Any other API response is a rejection and surfaces at once
 * - CredentialError from the exchanger propagates unchanged and is not retried
 *
 * MailboxRegistry keeps one client per sender address.
 */

import { GmailAuthError, GmailError, errorMessage } from '../errors.js';
import { ensureImageAlt } from './body.js';
import { composeMessage } from './mime.js';
import { CredentialExchanger } from './credentials.js';
import { createGmailTransport } from './gmail-transport.js';
import type {
  AccessToken,
  CreateDraftInput,
  CreateDraftResult,
  DelegatedIdentity,
  HandleState,
  MailboxTransport,
  SendEmailInput,
  SendEmailResult,
  ThreadData,
  TokenSource,
  TransportFactory,
} from './types.js';

const SEND_MAX_ATTEMPTS = 3;
const SIGNATURE_MAX_ATTEMPTS = 2;
const DEFAULT_RETRY_DELAY_MS = 1000;
const DEFAULT_SIGNATURE_RETRY_DELAY_MS = 500;

/** A token this close to expiry is refreshed before use */
const TOKEN_REFRESH_MARGIN_MS = 60_000;

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'EPIPE',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EAI_AGAIN',
  'ENOTFOUND',
  'ENETUNREACH',
  'EHOSTUNREACH',
]);

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * HTTP status of a failed Gmail call, or undefined when the request never
 * got a response.
 */
export function statusOf(err: unknown): number | undefined {
  if (!isRecord(err)) return undefined;
  const response = err.response;
  if (isRecord(response) && typeof response.status === 'number') {
    return response.status;
  }
  return typeof err.status === 'number' ? err.status : undefined;
}

/**
 * True for connection-level failures worth a retry on a fresh handle.
 * Anything that carries an HTTP response is an answer from Gmail, not a
 * transport problem.
 */
export function isTransientTransportError(err: unknown): boolean {
  if (statusOf(err) !== undefined) return false;

  let current: unknown = err;
  // Walk the cause chain: gaxios and undici wrap the socket error
  for (let depth = 0; depth < 5 && isRecord(current); depth++) {
    if (typeof current.code === 'string' && TRANSIENT_CODES.has(current.code)) return true;
    if (typeof current.message === 'string' && /socket hang up/i.test(current.message)) return true;
    if (current.name === 'TimeoutError' || current.name === 'AbortError') return true;
    current = current.cause;
  }
  return false;
}

function isAuthStatus(status: number | undefined): boolean {
  return status === 401 || status === 403;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface MailboxClientDeps {
  identity: DelegatedIdentity;
  tokenSource: TokenSource;
  createTransport?: TransportFactory;
  /** Backoff between send attempts */
  retryDelayMs?: number;
  /** Backoff between signature attempts */
  signatureRetryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export class MailboxClient {
  readonly identity: DelegatedIdentity;

  private readonly tokenSource: TokenSource;
  private readonly createTransport: TransportFactory;
  private readonly retryDelayMs: number;
  private readonly signatureRetryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  private handle: { transport: MailboxTransport; token: AccessToken } | null = null;
  private handleState: HandleState = 'uninitialized';

  constructor(deps: MailboxClientDeps) {
    this.identity = deps.identity;
    this.tokenSource = deps.tokenSource;
    this.createTransport = deps.createTransport ?? createGmailTransport;
    this.retryDelayMs = deps.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.signatureRetryDelayMs = deps.signatureRetryDelayMs ?? DEFAULT_SIGNATURE_RETRY_DELAY_MS;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  get state(): HandleState {
    return this.handleState;
  }

  get address(): string {
    return this.identity.impersonatedUser;
  }

  /** Drops the cached handle; the next call acquires a fresh token. */
  invalidate(): void {
    if (this.handleState === 'uninitialized') return;
    this.handle = null;
    this.handleState = 'invalidated';
  }

  /**
   * Sends a message, retrying transient connection failures.
   */
  async sendEmail(input: SendEmailInput): Promise<SendEmailResult> {
    const raw = composeMessage({
      to: input.to,
      toName: input.toName,
      from: this.address,
      fromName: input.fromName,
      subject: input.subject,
      htmlBody: input.htmlBody,
      references: input.references,
      inReplyTo: input.inReplyTo,
    });

    let lastError: unknown;
    for (let attempt = 1; attempt <= SEND_MAX_ATTEMPTS; attempt++) {
      const transport = await this.transport();
      try {
        const sent = await transport.sendMessage(raw, input.threadId);
        console.log('[mailbox] Message sent', {
          messageId: sent.id,
          threadId: sent.threadId,
          recipientDomain: domainOf(input.to),
          attempt,
        });
        return { messageId: sent.id, threadId: sent.threadId, labelIds: sent.labelIds };
      } catch (err) {
        if (!isTransientTransportError(err)) {
          throw this.classify(err, 'SendRejected', 'send');
        }
        lastError = err;
        this.invalidate();
        console.warn('[mailbox] Transient send failure', {
          attempt,
          maxAttempts: SEND_MAX_ATTEMPTS,
          error: errorMessage(err),
        });
        if (attempt < SEND_MAX_ATTEMPTS) {
          await this.sleep(this.retryDelayMs);
        }
      }
    }

    throw new GmailError(
      'TransportError',
      `Send failed after ${SEND_MAX_ATTEMPTS} attempts: ${errorMessage(lastError)}`,
      { operation: 'send', attempts: SEND_MAX_ATTEMPTS },
      lastError,
    );
  }

  /**
   * Creates a Gmail draft in the sender's mailbox. Single attempt.
   */
  async createDraft(input: CreateDraftInput): Promise<CreateDraftResult> {
    const raw = composeMessage({
      to: input.to,
      toName: input.toName,
      from: this.address,
      fromName: input.fromName,
      subject: input.subject,
      htmlBody: input.htmlBody,
    });

    const transport = await this.transport();
    try {
      const draft = await transport.createDraft(raw, input.threadId);
      console.log('[mailbox] Draft created', {
        draftId: draft.draftId,
        recipientDomain: domainOf(input.to),
      });
      return draft;
    } catch (err) {
      throw this.classify(err, 'SendRejected', 'create_draft');
    }
  }

  /**
   * Deletes a Gmail draft. A draft that is already gone counts as deleted.
   */
  async deleteDraft(draftId: string): Promise<void> {
    const transport = await this.transport();
    try {
      await transport.deleteDraft(draftId);
    } catch (err) {
      if (statusOf(err) === 404) return;
      throw this.classify(err, 'SendRejected', 'delete_draft');
    }
  }

  async getThread(threadId: string): Promise<ThreadData> {
    const transport = await this.transport();
    try {
      return await transport.getThread(threadId);
    } catch (err) {
      const status = statusOf(err);
      if (status === 404) {
        throw new GmailError('ThreadNotFound', `Thread not found: ${threadId}`, { threadId }, err);
      }
      throw this.classify(err, 'TransportError', 'get_thread');
    }
  }

  /**
   * Header map of one message, names lower-cased.
   */
  async getMessageHeaders(messageId: string): Promise<Record<string, string>> {
    const transport = await this.transport();
    try {
      return await transport.getMessageHeaders(messageId);
    } catch (err) {
      throw this.classify(err, 'SendRejected', 'get_message_headers');
    }
  }

  /**
   * The sender's Gmail signature with alt="" on images that lack one.
   * Best-effort: any failure yields an empty string.
   */
  async getUserSignature(): Promise<string> {
    for (let attempt = 1; attempt <= SIGNATURE_MAX_ATTEMPTS; attempt++) {
      try {
        const transport = await this.transport();
        const signature = await transport.getSendAsSignature(this.address);
        return ensureImageAlt(signature);
      } catch (err) {
        if (!isTransientTransportError(err)) {
          if (isAuthStatus(statusOf(err))) this.invalidate();
          console.warn('[mailbox] Signature unavailable', { error: errorMessage(err) });
          return '';
        }
        this.invalidate();
        if (attempt < SIGNATURE_MAX_ATTEMPTS) {
          await this.sleep(this.signatureRetryDelayMs);
        }
      }
    }

    console.warn('[mailbox] Signature unavailable after retries', { attempts: SIGNATURE_MAX_ATTEMPTS });
    return '';
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async transport(): Promise<MailboxTransport> {
    if (this.handle && this.isFresh(this.handle.token)) {
      return this.handle.transport;
    }

    const token = await this.tokenSource.acquireDelegatedToken(this.identity);
    const transport = this.createTransport(token.value);
    this.handle = { transport, token };
    this.handleState = 'active';
    return transport;
  }

  private isFresh(token: AccessToken): boolean {
    return token.expiresAt.getTime() - this.now().getTime() > TOKEN_REFRESH_MARGIN_MS;
  }

  /**
   * Maps a non-transient failure to the error callers see.
   * `fallback` is the kind for API rejections; connection failures are always TransportError.
   */
  private classify(
    err: unknown,
    fallback: 'SendRejected' | 'TransportError',
    operation: string,
  ): GmailAuthError | GmailError {
    const status = statusOf(err);

    if (isAuthStatus(status)) {
      this.invalidate();
      return new GmailAuthError(
        `Gmail rejected delegated credentials (${status}): ${errorMessage(err)}`,
        { operation, status: status ?? null },
        err,
      );
    }

    const kind = isTransientTransportError(err) ? 'TransportError' : fallback;
    return new GmailError(kind, `Gmail ${operation} failed: ${errorMessage(err)}`, {
      operation,
      status: status ?? null,
    }, err);
  }
}

function domainOf(address: string): string {
  return address.split('@')[1] ?? 'unknown';
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export interface MailboxRegistryOptions {
  serviceAccountEmail: string;
  scopes: readonly string[];
  tokenSource?: TokenSource;
  createTransport?: TransportFactory;
  retryDelayMs?: number;
  signatureRetryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

/**
 * One MailboxClient per impersonated address, created on first request.
 */
export class MailboxRegistry {
  private readonly clients = new Map<string, MailboxClient>();
  private readonly tokenSource: TokenSource;

  constructor(private readonly options: MailboxRegistryOptions) {
    this.tokenSource = options.tokenSource ?? new CredentialExchanger();
  }

  get(address: string): MailboxClient {
    const key = address.trim().toLowerCase();
    const existing = this.clients.get(key);
    if (existing) return existing;

    const client = new MailboxClient({
      identity: {
        serviceAccountEmail: this.options.serviceAccountEmail,
        impersonatedUser: key,
        scopes: this.options.scopes,
      },
      tokenSource: this.tokenSource,
      createTransport: this.options.createTransport,
      retryDelayMs: this.options.retryDelayMs,
      signatureRetryDelayMs: this.options.signatureRetryDelayMs,
      sleep: this.options.sleep,
      now: this.options.now,
    });
    this.clients.set(key, client);
    return client;
  }

  get size(): number {
    return this.clients.size;
  }

  /** Drops every cached client (tests, credential rotation). */
  clear(): void {
    this.clients.clear();
  }
}

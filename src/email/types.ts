/**
 * Email Module Type Definitions
 *
 * Types for:
 * - Delegated credentials (DelegatedIdentity, SignedAssertionClaims, AccessToken)
 * - MIME message construction (ComposeMessageInput)
 * - The Gmail transport seam (MailboxTransport) and its results
 * - Mailbox client operations (SendEmailInput, SendEmailResult, CreateDraftResult)
 *
 * Consumers:
 * - credentials.ts, mime.ts, mailbox-client.ts, gmail-transport.ts
 * - drafts/draft-service.ts
 */

// ---------------------------------------------------------------------------
// Delegated Credentials
// ---------------------------------------------------------------------------

/** Who signs, who is impersonated, and with which scopes. Built once from config. */
export interface DelegatedIdentity {
  readonly serviceAccountEmail: string;
  readonly impersonatedUser: string;
  readonly scopes: readonly string[];
}

/** Claim set of the delegation assertion (JWT body before signing) */
export interface SignedAssertionClaims {
  iss: string;
  sub: string;
  scope: string;
  aud: string;
  iat: number;
  exp: number;
}

export interface AccessToken {
  value: string;
  expiresAt: Date;
}

/** Supplies the bearer token of the identity the process runs as */
export interface AmbientCredentialProvider {
  getAccessToken(): Promise<string>;
}

/** Turns a delegated identity into a user-impersonating access token */
export interface TokenSource {
  acquireDelegatedToken(identity: DelegatedIdentity): Promise<AccessToken>;
}

// ---------------------------------------------------------------------------
// MIME Message
// ---------------------------------------------------------------------------

/** Input for MIME message construction */
export interface ComposeMessageInput {
  to: string;
  toName?: string;
  from: string;
  fromName?: string;
  subject: string;
  htmlBody: string;
  /** Message-ID(s) of the conversation this message continues */
  references?: string;
  inReplyTo?: string;
  /** Fixed multipart boundary; random when omitted */
  boundary?: string;
}

// ---------------------------------------------------------------------------
// Transport seam
// ---------------------------------------------------------------------------

export interface TransportMessage {
  id: string;
  threadId: string;
  labelIds: string[];
}

export interface TransportDraft {
  draftId: string;
  messageId: string;
  threadId: string;
}

export interface ThreadMessage {
  id: string;
  snippet: string;
  labelIds: string[];
  /** Header names lower-cased */
  headers: Record<string, string>;
}

export interface ThreadData {
  id: string;
  historyId: string | null;
  messages: ThreadMessage[];
}

/**
 * The Gmail calls the mailbox client needs, bound to one access token.
 * gmail-transport.ts adapts googleapis to this; tests supply fakes.
 */
export interface MailboxTransport {
  sendMessage(raw: string, threadId?: string): Promise<TransportMessage>;
  createDraft(raw: string, threadId?: string): Promise<TransportDraft>;
  deleteDraft(draftId: string): Promise<void>;
  getThread(threadId: string): Promise<ThreadData>;
  getMessageHeaders(messageId: string): Promise<Record<string, string>>;
  getSendAsSignature(sendAsEmail: string): Promise<string>;
}

export type TransportFactory = (accessToken: string) => MailboxTransport;

// ---------------------------------------------------------------------------
// Mailbox client operations
// ---------------------------------------------------------------------------

export interface SendEmailInput {
  to: string;
  toName?: string;
  fromName?: string;
  subject: string;
  htmlBody: string;
  /** Gmail thread to append the message to */
  threadId?: string;
  references?: string;
  inReplyTo?: string;
}

export interface SendEmailResult {
  messageId: string;
  threadId: string;
  labelIds: string[];
}

export type CreateDraftInput = Omit<SendEmailInput, 'references' | 'inReplyTo'>;

export type CreateDraftResult = TransportDraft;

/** Lifecycle of the cached transport handle */
export type HandleState = 'uninitialized' | 'active' | 'invalidated';

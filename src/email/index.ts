// ============================================================================
// Email Module — Barrel Export
// ============================================================================
//
// Public API for the email module. Downstream consumers (drafts/, http/,
// context.ts) import from this barrel rather than individual files.
//
// NOT exported:
// - gmail-transport.ts (googleapis adapter, reached through MailboxClient)

export type {
  AccessToken,
  AmbientCredentialProvider,
  ComposeMessageInput,
  CreateDraftInput,
  CreateDraftResult,
  DelegatedIdentity,
  HandleState,
  MailboxTransport,
  SendEmailInput,
  SendEmailResult,
  SignedAssertionClaims,
  ThreadData,
  ThreadMessage,
  TokenSource,
  TransportFactory,
} from './types.js';

// Pure functions
export { composeMessage, formatAddress } from './mime.js';
export {
  renderMarkdown,
  htmlToPlainText,
  buildTrackingPixel,
  appendSignature,
  ensureImageAlt,
} from './body.js';
export type { PixelKind } from './body.js';

// Credentials and Gmail access
export { CredentialExchanger, GoogleAmbientCredential, buildAssertionClaims } from './credentials.js';
export { MailboxClient, MailboxRegistry, isTransientTransportError, statusOf } from './mailbox-client.js';

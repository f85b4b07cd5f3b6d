// ============================================================================
// Error Types — typed failures shared by every module
// ============================================================================
//
// Each error carries a stable `code` and the HTTP status it maps to. Messages
// and context NEVER include message bodies; recipient addresses only appear in
// context for the operator, never in logs (see http/sanitize.ts).

/** Extra detail attached to an error response */
export type ErrorContext = Record<string, string | number | boolean | null>;

/** JSON body of every error response */
export interface ErrorResponseBody {
  error: true;
  code: string;
  message: string;
  context?: ErrorContext;
}

/**
 * Base error for all known failures.
 */
export class AppError extends Error {
  readonly code: string;
  readonly status: number;
  readonly context: ErrorContext | undefined;

  constructor(message: string, code: string, status: number, context?: ErrorContext, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AppError';
    this.code = code;
    this.status = status;
    this.context = context;
  }

  toResponse(): ErrorResponseBody {
    return {
      error: true,
      code: this.code,
      message: this.message,
      ...(this.context && { context: this.context }),
    };
  }
}

// ---------------------------------------------------------------------------
// Request errors
// ---------------------------------------------------------------------------

export class ValidationError extends AppError {
  readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR', 400, field ? { field } : undefined);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class DraftNotFoundError extends AppError {
  constructor(draftId: string) {
    super(`Draft not found: ${draftId}`, 'DRAFT_NOT_FOUND', 404, {
      resourceId: draftId,
      resourceType: 'email_draft',
    });
    this.name = 'DraftNotFoundError';
  }
}

export class FollowupNotFoundError extends AppError {
  constructor(followupId: string) {
    super(`Followup not found: ${followupId}`, 'FOLLOWUP_NOT_FOUND', 404, {
      resourceId: followupId,
      resourceType: 'email_followup',
    });
    this.name = 'FollowupNotFoundError';
  }
}

/** The record already left `pending`; sending it again would duplicate the email. */
export class AlreadySentError extends AppError {
  constructor(resourceId: string, status: string) {
    super(`Already sent: ${resourceId} (status ${status})`, 'ALREADY_SENT', 409, {
      resourceId,
      status,
    });
    this.name = 'AlreadySentError';
  }
}

/** The operation needs a sent record (thread lookup, follow-up generation). */
export class NotSentError extends AppError {
  constructor(resourceId: string, status: string) {
    super(`Draft ${resourceId} has not been sent (status ${status})`, 'DRAFT_NOT_SENT', 409, {
      resourceId,
      status,
    });
    this.name = 'NotSentError';
  }
}

export class InvalidTransitionError extends AppError {
  constructor(resourceId: string, from: string, to: string) {
    super(`Cannot move ${resourceId} from ${from} to ${to}`, 'INVALID_STATUS_TRANSITION', 409, {
      resourceId,
      from,
      to,
    });
    this.name = 'InvalidTransitionError';
  }
}

// ---------------------------------------------------------------------------
// Gmail errors
// ---------------------------------------------------------------------------

/**
 * Thrown when Gmail rejects our credentials or delegation.
 * Surfaces as 502: the upstream dependency failed, not the caller.
 */
export class GmailAuthError extends AppError {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super(message, 'GMAIL_AUTH_ERROR', 502, context, cause);
    this.name = 'GmailAuthError';
  }
}

export type CredentialErrorKind = 'SigningFailed' | 'ExchangeFailed';

/** Signing or exchanging the delegation assertion failed. Never retried. */
export class CredentialError extends GmailAuthError {
  readonly kind: CredentialErrorKind;

  constructor(kind: CredentialErrorKind, message: string, cause?: unknown) {
    super(message, { operation: kind === 'SigningFailed' ? 'sign_assertion' : 'exchange_assertion' }, cause);
    this.name = 'CredentialError';
    this.kind = kind;
  }
}

export type GmailErrorKind = 'SendRejected' | 'ThreadNotFound' | 'TransportError';

const GMAIL_ERROR_CODES: Record<GmailErrorKind, string> = {
  SendRejected: 'GMAIL_SEND_REJECTED',
  ThreadNotFound: 'GMAIL_THREAD_NOT_FOUND',
  TransportError: 'GMAIL_TRANSPORT_ERROR',
};

export class GmailError extends AppError {
  readonly kind: GmailErrorKind;

  constructor(kind: GmailErrorKind, message: string, context?: ErrorContext, cause?: unknown) {
    super(message, GMAIL_ERROR_CODES[kind], 502, context, cause);
    this.name = 'GmailError';
    this.kind = kind;
  }
}

// ---------------------------------------------------------------------------
// Storage and sibling-service errors
// ---------------------------------------------------------------------------

export class FirestoreError extends AppError {
  constructor(message: string, operation: string, cause?: unknown) {
    super(message, 'FIRESTORE_ERROR', 500, { operation }, cause);
    this.name = 'FirestoreError';
  }
}

export class GeneratorError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'GENERATOR_ERROR', 502, { service: 'mail-writer' }, cause);
    this.name = 'GeneratorError';
  }
}

// ---------------------------------------------------------------------------
// Result union
// ---------------------------------------------------------------------------

/** Every failure a service operation can report to its caller */
export type KnownError =
  | ValidationError
  | DraftNotFoundError
  | FollowupNotFoundError
  | AlreadySentError
  | NotSentError
  | InvalidTransitionError
  | GmailAuthError
  | GmailError
  | FirestoreError
  | GeneratorError;

export type Result<T, E = KnownError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function isKnownError(err: unknown): err is KnownError {
  return (
    err instanceof ValidationError ||
    err instanceof DraftNotFoundError ||
    err instanceof FollowupNotFoundError ||
    err instanceof AlreadySentError ||
    err instanceof NotSentError ||
    err instanceof InvalidTransitionError ||
    err instanceof GmailAuthError ||
    err instanceof GmailError ||
    err instanceof FirestoreError ||
    err instanceof GeneratorError
  );
}

/**
 * Runs an operation and reports known failures as a Result.
 * Unexpected errors still throw so the HTTP layer answers 500.
 */
export async function settle<T>(operation: () => Promise<T>): Promise<Result<T>> {
  try {
    return { ok: true, value: await operation() };
  } catch (err) {
    if (isKnownError(err)) return { ok: false, error: err };
    throw err;
  }
}

/** Message of an unknown thrown value, for logs */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

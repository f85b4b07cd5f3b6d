/**
 * Express HTTP Server
 *
 * Routes:
 * - POST /                    Store a draft, then create a Gmail draft or send it
 * - POST /send-draft          Send a stored draft (test_mode sends to test_email)
 * - POST /resend-to-another   Send a draft's content to another address
 * - POST /send-followup       Send a stored follow-up in the original thread
 * - POST /generate-followup   Generate and store follow-up copy
 * - GET  /drafts              List drafts by status
 * - GET  /draft/:id           One draft
 * - POST /draft/:id/status    Move a draft along the status machine
 * - GET  /draft/:id/thread    Gmail thread of a sent draft
 * - GET  /health              Liveness
 *
 * Every request body is validated with zod before the service is called.
 * Known failures map to their status and `{ error, code, message, context? }`;
 * anything else is a 500 with code INTERNAL_ERROR and no stack trace.
 *
 * No PII is logged: failing payloads pass through sanitizeForLog.
 */

import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { ZodTypeAny, output } from 'zod';
import { ValidationError } from '../errors.js';
import type { ErrorResponseBody, Result } from '../errors.js';
import type { AppContext } from '../context.js';
import {
  CreateEmailRequestSchema,
  GenerateFollowupRequestSchema,
  ListDraftsQuerySchema,
  ResendRequestSchema,
  SendDraftRequestSchema,
  SendFollowupRequestSchema,
  UpdateStatusRequestSchema,
  describeZodError,
} from '../drafts/index.js';
import type { DraftRecord } from '../store/index.js';
import { createHealthHandler } from './health.js';
import { requestLogger } from './request-logger.js';
import { sanitizeForLog } from './sanitize.js';

/** Wire shape of a draft: snake_case, absent values as null */
export function toDraftResponse(draft: DraftRecord) {
  return {
    id: draft.id,
    to: draft.to,
    to_name: draft.toName ?? null,
    subject: draft.subject,
    body: draft.body,
    sender_email: draft.senderEmail ?? null,
    sender_name: draft.senderName ?? null,
    company_name: draft.companyName ?? null,
    status: draft.status,
    created_at: draft.createdAt.toISOString(),
    sent_at: draft.sentAt?.toISOString() ?? null,
    gmail_message_id: draft.gmailMessageId ?? null,
    gmail_thread_id: draft.gmailThreadId ?? null,
    gmail_draft_id: draft.gmailDraftId ?? null,
    pixel_id: draft.pixelId ?? null,
    version_group_id: draft.versionGroupId,
    followup_number: draft.followupNumber ?? null,
    x_external_id: draft.externalId ?? null,
    notes: draft.notes ?? null,
  };
}

/**
 * Parses input with a schema. On failure answers 400 and returns undefined.
 */
function parseOr400<S extends ZodTypeAny>(
  schema: S,
  input: unknown,
  route: string,
  res: Response,
): output<S> | undefined {
  const parsed = schema.safeParse(input);
  if (parsed.success) return parsed.data;

  const { message, field } = describeZodError(parsed.error);
  console.warn('[server] Validation failed', { route, field, payload: sanitizeForLog(input) });
  res.status(400).json(new ValidationError(message, field).toResponse());
  return undefined;
}

/**
 * Writes a service Result: the value on success, the error body otherwise.
 */
function send<T>(res: Response, result: Result<T>, map: (value: T) => unknown = value => value): void {
  if (result.ok) {
    res.json(map(result.value));
    return;
  }
  const { error } = result;
  const log = error.status >= 500 ? console.error : console.warn;
  log('[server] Request failed', { code: error.code, status: error.status, message: error.message });
  res.status(error.status).json(error.toResponse());
}

function hasParseFailure(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Create the Express application with all routes configured.
 *
 * Exported as a factory function so tests can create fresh app instances
 * around their own context.
 */
export function createApp(ctx: Pick<AppContext, 'config' | 'drafts'>) {
  const { drafts } = ctx;
  const app = express();
  app.disable('x-powered-by');
  app.use(requestLogger);
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', createHealthHandler(ctx.config));

  app.post('/', async (req: Request, res: Response) => {
    const body = parseOr400(CreateEmailRequestSchema, req.body, 'create_email', res);
    if (!body) return;
    send(res, await drafts.createEmail(body));
  });

  app.post('/send-draft', async (req: Request, res: Response) => {
    const body = parseOr400(SendDraftRequestSchema, req.body, 'send_draft', res);
    if (!body) return;
    send(res, await drafts.sendDraft(body), value => ({ status: 'sent', ...value }));
  });

  app.post('/resend-to-another', async (req: Request, res: Response) => {
    const body = parseOr400(ResendRequestSchema, req.body, 'resend_to_another', res);
    if (!body) return;
    send(res, await drafts.resendToAnother(body), value => ({ status: 'sent', ...value }));
  });

  app.post('/send-followup', async (req: Request, res: Response) => {
    const body = parseOr400(SendFollowupRequestSchema, req.body, 'send_followup', res);
    if (!body) return;
    send(res, await drafts.sendFollowup(body), value => ({ status: 'sent', ...value }));
  });

  app.post('/generate-followup', async (req: Request, res: Response) => {
    const body = parseOr400(GenerateFollowupRequestSchema, req.body, 'generate_followup', res);
    if (!body) return;
    send(res, await drafts.generateFollowup(body), value => ({ status: 'ok', ...value }));
  });

  app.get('/drafts', async (req: Request, res: Response) => {
    const query = parseOr400(ListDraftsQuerySchema, req.query, 'list_drafts', res);
    if (!query) return;
    send(res, await drafts.listDrafts(query), list => ({
      status: query.status,
      count: list.length,
      drafts: list.map(toDraftResponse),
    }));
  });

  app.get('/draft/:id', async (req: Request, res: Response) => {
    send(res, await drafts.getDraft(req.params.id), toDraftResponse);
  });

  app.post('/draft/:id/status', async (req: Request, res: Response) => {
    const body = parseOr400(UpdateStatusRequestSchema, req.body, 'update_status', res);
    if (!body) return;
    send(res, await drafts.updateStatus(req.params.id, body.status));
  });

  app.get('/draft/:id/thread', async (req: Request, res: Response) => {
    send(res, await drafts.getDraftThread(req.params.id));
  });

  // Unknown routes
  app.use((req: Request, res: Response) => {
    const body: ErrorResponseBody = {
      error: true,
      code: 'NOT_FOUND',
      message: `No route for ${req.method} ${req.path}`,
    };
    res.status(404).json(body);
  });

  // Global error handler: malformed JSON is the caller's fault, anything else is ours
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (hasParseFailure(err)) {
      res.status(400).json(new ValidationError('Request body is not valid JSON').toResponse());
      return;
    }

    console.error('[server] Unhandled error:', err);
    const body: ErrorResponseBody = {
      error: true,
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
    res.status(500).json(body);
  });

  return app;
}

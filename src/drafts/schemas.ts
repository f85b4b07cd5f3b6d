/**
 * Request Schemas
 *
 * Zod schemas for every request body and query the HTTP layer accepts.
 * Field names match the wire format (snake_case); the inferred types are the
 * inputs of draft-service.ts.
 */

import { z } from 'zod';
import { DRAFT_STATUSES } from '../store/types.js';

const email = z.string().trim().email();
const optionalText = z.string().trim().optional();

export const CreateEmailRequestSchema = z.object({
  to: email,
  subject: z.string().trim().min(1, 'subject is required'),
  /** Markdown body */
  message: z.string().min(1, 'message is required'),
  x_external_id: optionalText,
  version_group_id: optionalText,
  mode: z.enum(['draft', 'send']).optional(),
  to_name: optionalText,
  contact_name: optionalText,
  company_name: optionalText,
  sender_email: email.optional(),
  sender_name: optionalText,
  followup_number: z.number().int().min(0).optional(),
  notes: optionalText,
});

export type CreateEmailRequest = z.infer<typeof CreateEmailRequestSchema>;

/** Shared by /send-draft and /send-followup: a test send needs its override address */
function requireTestEmail<T extends { test_mode: boolean; test_email?: string }>(
  value: T,
  ctx: z.RefinementCtx,
): void {
  if (value.test_mode && !value.test_email) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'test_email is required when test_mode is true',
      path: ['test_email'],
    });
  }
}

export const SendDraftRequestSchema = z
  .object({
    draft_id: z.string().trim().min(1, 'draft_id is required'),
    test_mode: z.boolean().default(false),
    test_email: email.optional(),
  })
  .superRefine(requireTestEmail);

export type SendDraftRequest = z.infer<typeof SendDraftRequestSchema>;

export const SendFollowupRequestSchema = z
  .object({
    followup_id: z.string().trim().min(1, 'followup_id is required'),
    test_mode: z.boolean().default(false),
    test_email: email.optional(),
  })
  .superRefine(requireTestEmail);

export type SendFollowupRequest = z.infer<typeof SendFollowupRequestSchema>;

export const ResendRequestSchema = z.object({
  draft_id: z.string().trim().min(1, 'draft_id is required'),
  new_recipient_email: email,
  new_recipient_name: optionalText,
});

export type ResendRequest = z.infer<typeof ResendRequestSchema>;

export const GenerateFollowupRequestSchema = z.object({
  draft_id: z.string().trim().min(1, 'draft_id is required'),
  followup_number: z.number().int().min(1).max(10),
  days_since_last: z.number().int().min(0).optional(),
});

export type GenerateFollowupRequest = z.infer<typeof GenerateFollowupRequestSchema>;

export const ListDraftsQuerySchema = z.object({
  status: z.enum(DRAFT_STATUSES).default('pending'),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export type ListDraftsQuery = z.infer<typeof ListDraftsQuerySchema>;

export const UpdateStatusRequestSchema = z.object({
  status: z.enum(DRAFT_STATUSES),
});

export type UpdateStatusRequest = z.infer<typeof UpdateStatusRequestSchema>;

/** What the generator returns for a follow-up */
export const GeneratedCopySchema = z.object({
  subject: z.string().min(1),
  body: z.string().min(1),
});

export type GeneratedCopy = z.infer<typeof GeneratedCopySchema>;

/**
 * First issue of a failed parse as "field: message".
 */
export function describeZodError(error: z.ZodError): { message: string; field?: string } {
  const issue = error.issues[0];
  if (!issue) return { message: 'Invalid request' };
  const field = issue.path.join('.') || undefined;
  return { message: field ? `${field}: ${issue.message}` : issue.message, field };
}

/**
 * Mail Writer Client
 *
 * Asks the copy generator service for a follow-up to an earlier draft.
 * POST {MAIL_WRITER_URL}/followup with the original copy; the response is
 * validated against GeneratedCopySchema. Any failure is a GeneratorError.
 *
 * Only ids and counts are logged; the copy itself never is.
 */

import { GeneratorError, errorMessage } from '../errors.js';
import type { DraftRecord } from '../store/types.js';
import { GeneratedCopySchema } from './schemas.js';
import type { GeneratedCopy } from './schemas.js';

const GENERATOR_TIMEOUT_MS = 60_000;

export interface FollowupPrompt {
  draft: DraftRecord;
  followupNumber: number;
  daysSinceLast?: number;
}

export interface CopyGenerator {
  generateFollowup(prompt: FollowupPrompt): Promise<GeneratedCopy>;
}

export class HttpCopyGenerator implements CopyGenerator {
  constructor(private readonly baseUrl: string | undefined) {}

  async generateFollowup(prompt: FollowupPrompt): Promise<GeneratedCopy> {
    if (!this.baseUrl) {
      throw new GeneratorError('MAIL_WRITER_URL is not configured');
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/followup`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          draft_id: prompt.draft.id,
          followup_number: prompt.followupNumber,
          days_since_last: prompt.daysSinceLast,
          original_subject: prompt.draft.subject,
          original_body: prompt.draft.body,
          to_name: prompt.draft.toName,
          company_name: prompt.draft.companyName,
          sender_name: prompt.draft.senderName,
        }),
        signal: AbortSignal.timeout(GENERATOR_TIMEOUT_MS),
      });
    } catch (err) {
      throw new GeneratorError(`Generator request failed: ${errorMessage(err)}`, err);
    }

    if (!response.ok) {
      throw new GeneratorError(`Generator returned ${response.status} ${response.statusText}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new GeneratorError('Generator returned invalid JSON', err);
    }

    const parsed = GeneratedCopySchema.safeParse(body);
    if (!parsed.success) {
      throw new GeneratorError(`Generator response malformed: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }

    console.log('[generator] Follow-up copy generated', {
      draftId: prompt.draft.id,
      followupNumber: prompt.followupNumber,
      bodyLength: parsed.data.body.length,
    });
    return parsed.data;
  }
}

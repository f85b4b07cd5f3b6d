/**
 * Follow-up Scheduler Client
 *
 * After an initial draft is sent, the auto-follow-up service is told about it:
 * POST {AUTO_FOLLOWUP_URL}/schedule with { draft_id }.
 *
 * Best-effort: a failed schedule never fails the send that triggered it.
 * Errors are logged and the returned promise always resolves.
 */

import { errorMessage } from '../errors.js';

const SCHEDULE_TIMEOUT_MS = 5_000;

export interface FollowupScheduler {
  /** Resolves true when the scheduler accepted the draft */
  schedule(draftId: string): Promise<boolean>;
}

export class HttpFollowupScheduler implements FollowupScheduler {
  constructor(private readonly baseUrl: string) {}

  async schedule(draftId: string): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/schedule`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ draft_id: draftId }),
        signal: AbortSignal.timeout(SCHEDULE_TIMEOUT_MS),
      });

      if (!response.ok) {
        console.warn('[followups] Scheduler rejected draft', { draftId, status: response.status });
        return false;
      }

      console.log('[followups] Follow-up scheduled', { draftId });
      return true;
    } catch (err) {
      console.warn('[followups] Scheduler unreachable', { draftId, error: errorMessage(err) });
      return false;
    }
  }
}

/** Used when auto follow-up is disabled */
export const disabledScheduler: FollowupScheduler = {
  async schedule(): Promise<boolean> {
    return false;
  },
};

/**
 * PII Sanitization for Safe Logging
 *
 * Redacts recipient data and message content from request payloads before
 * they reach a log line (validation failures log the offending payload).
 *
 * - Address fields keep only their domain: 'ana@example.com' -> '[REDACTED]@example.com'
 * - Names, subjects and bodies become '[REDACTED]'
 * - Arrays are replaced with '[Array(N)]' summaries (never iterated into)
 * - Depth limit of 10 guards against deeply nested payloads
 * - Ids, modes and flags pass through for correlation
 */

/** Fields holding an email address; logged as their domain only */
export const ADDRESS_FIELDS: ReadonlySet<string> = new Set([
  'to',
  'email',
  'test_email',
  'new_recipient_email',
  'sender_email',
  'recipient',
]);

/** Fields whose values must never appear in logs */
export const PII_FIELDS: ReadonlySet<string> = new Set([
  'to_name',
  'contact_name',
  'new_recipient_name',
  'sender_name',
  'subject',
  'message',
  'body',
  'notes',
  'signature',
]);

const MAX_DEPTH = 10;
const REDACTED = '[REDACTED]';

function redactAddress(value: unknown): string {
  if (typeof value !== 'string') return REDACTED;
  const at = value.lastIndexOf('@');
  return at >= 0 ? `${REDACTED}${value.slice(at)}` : REDACTED;
}

/**
 * Recursively sanitize a value for safe logging.
 *
 * @param obj - The value to sanitize (any type)
 * @param depth - Current recursion depth (internal use)
 * @returns A new object with PII fields redacted
 */
export function sanitizeForLog(obj: unknown, depth = 0): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj !== 'object') {
    return obj;
  }

  // Arrays: return summary string (never iterate into contents)
  if (Array.isArray(obj)) {
    return `[Array(${obj.length})]`;
  }

  if (depth >= MAX_DEPTH) {
    return '[Object]';
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (ADDRESS_FIELDS.has(key)) {
      result[key] = redactAddress(value);
    } else if (PII_FIELDS.has(key)) {
      result[key] = REDACTED;
    } else {
      result[key] = sanitizeForLog(value, depth + 1);
    }
  }

  return result;
}

/**
 * MIME Message Composer
 *
 * Builds an RFC 5322 multipart/alternative message (plain text + HTML) and
 * base64url encodes it for the Gmail API `message.raw` field.
 *
 * - Headers use CRLF (\r\n) line endings
 * - Both parts are UTF-8 with base64 transfer encoding, wrapped at 76 columns
 * - Display names are quoted (or RFC 2047 encoded) as RFC 5322 requires
 * - Output is base64url with `=` padding kept; Gmail accepts either form
 *
 * No address validation happens here; callers validate recipients first.
 */

import { randomBytes } from 'node:crypto';
import { htmlToPlainText } from './body.js';
import type { ComposeMessageInput } from './types.js';

const CRLF = '\r\n';

/**
 * Composes a plain + HTML message and returns the transport-ready payload.
 *
 * @returns base64url-encoded string suitable for the Gmail API raw field
 */
export function composeMessage(input: ComposeMessageInput): string {
  const boundary = input.boundary ?? `=_part_${randomBytes(12).toString('hex')}`;

  const headerLines = [
    `From: ${formatAddress(input.from, input.fromName)}`,
    `To: ${formatAddress(input.to, input.toName)}`,
    `Subject: ${encodeHeaderText(singleLine(input.subject))}`,
  ];
  // Threading headers only when continuing a conversation
  if (input.references) {
    headerLines.push(`References: ${singleLine(input.references)}`);
  }
  if (input.inReplyTo) {
    headerLines.push(`In-Reply-To: ${singleLine(input.inReplyTo)}`);
  }
  headerLines.push(
    'MIME-Version: 1.0',
    `Content-Type: multipart/alternative; boundary="${boundary}"`,
  );

  const mimeMessage = [
    headerLines.join(CRLF),
    '',
    `--${boundary}`,
    renderPart('text/plain', htmlToPlainText(input.htmlBody)),
    `--${boundary}`,
    renderPart('text/html', input.htmlBody),
    `--${boundary}--`,
    '',
  ].join(CRLF);

  return toBase64Url(mimeMessage);
}

/**
 * Formats an address header value. With a display name the result is
 * `Name <addr>`, quoting the name when it holds RFC 5322 specials and
 * encoding it when it is not ASCII.
 */
export function formatAddress(address: string, displayName?: string): string {
  const name = displayName ? singleLine(displayName).trim() : '';
  if (!name) return address;

  if (!isAscii(name)) {
    return `${encodeWord(name)} <${address}>`;
  }
  if (/[()<>[\]:;@\\,."]/.test(name)) {
    const escaped = name.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
    return `"${escaped}" <${address}>`;
  }
  return `${name} <${address}>`;
}

// ---------------------------------------------------------------------------
// Internal Helpers
// ---------------------------------------------------------------------------

function renderPart(contentType: 'text/plain' | 'text/html', content: string): string {
  const encoded = Buffer.from(content, 'utf-8').toString('base64');
  return [
    `Content-Type: ${contentType}; charset="utf-8"`,
    'Content-Transfer-Encoding: base64',
    '',
    wrap(encoded, 76),
  ].join(CRLF);
}

function wrap(text: string, width: number): string {
  const lines: string[] = [];
  for (let i = 0; i < text.length; i += width) {
    lines.push(text.slice(i, i + width));
  }
  return lines.join(CRLF);
}

/** Header values must not carry line breaks (header injection) */
function singleLine(value: string): string {
  return value.replace(/[\r\n]+/g, ' ');
}

function isAscii(value: string): boolean {
  // eslint-disable-next-line no-control-regex
  return /^[\x00-\x7F]*$/.test(value);
}

function encodeWord(value: string): string {
  return `=?UTF-8?B?${Buffer.from(value, 'utf-8').toString('base64')}?=`;
}

/** RFC 2047 encoded-word for non-ASCII text; ASCII passes through unchanged. */
function encodeHeaderText(value: string): string {
  return isAscii(value) ? value : encodeWord(value);
}

function toBase64Url(value: string): string {
  return Buffer.from(value, 'utf-8')
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_');
}

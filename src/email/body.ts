/**
 * Email Body Rendering
 *
 * Pure functions that turn a stored draft body into the HTML that is sent:
 * 1. renderMarkdown: draft Markdown -> HTML (GFM tables, fenced code, hard line breaks)
 * 2. appendSignature: the sender's Gmail signature below the body
 * 3. buildTrackingPixel: 1x1 open-tracking image served by the tracker service
 *
 * htmlToPlainText produces the text/plain alternative part for mime.ts.
 */

import { Marked } from 'marked';

// Newlines become <br> like the drafts were written in a plain text editor
const markdown = new Marked({ gfm: true, breaks: true });

export type PixelKind = 'draft' | 'followup';

/**
 * Converts Markdown to HTML.
 */
export function renderMarkdown(text: string): string {
  const html = markdown.parse(text, { async: false });
  if (typeof html !== 'string') {
    throw new Error('Markdown renderer returned a promise in sync mode');
  }
  return html.trim();
}

/**
 * Strips tags and unescapes the entities the plain part needs.
 * `&amp;` goes last so an escaped `&amp;nbsp;` stays literal text.
 */
export function htmlToPlainText(html: string): string {
  return html
    .replace(/<[^>]+>/g, '')
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&');
}

/**
 * Builds the hidden open-tracking image.
 *
 * @param trackerBaseUrl - Tracker service base URL without trailing slash
 */
export function buildTrackingPixel(trackerBaseUrl: string, pixelId: string, kind: PixelKind): string {
  const src = `${trackerBaseUrl}/pixel?id=${encodeURIComponent(pixelId)}&type=${kind}`;
  return `<img src="${escapeAttribute(src)}" width="1" height="1" style="display:none" alt="">`;
}

/**
 * Appends the signature block. An empty signature leaves the body unchanged.
 */
export function appendSignature(html: string, signatureHtml: string): string {
  if (!signatureHtml.trim()) return html;
  return `${html}\n<br>\n<div class="gmail_signature">${signatureHtml}</div>`;
}

/**
 * Adds alt="" to every <img> tag that declares no alt attribute.
 * Tags that already carry alt (any value) are left untouched.
 */
export function ensureImageAlt(html: string): string {
  return html.replace(/<img(?![^>]*\balt\s*=)([^>]*)>/gi, '<img alt=""$1>');
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;');
}

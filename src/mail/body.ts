/**
 * Message text helpers: body fallback chain, the combined text blob sent to
 * the extraction engine, and log-safe previews.
 */

import type { Message } from './types.js';

type BodySource = Pick<Message, 'bodyText' | 'bodyPlain' | 'bodyPreview'>;

/** First non-empty of bodyText, bodyPlain, bodyPreview; '' when all are empty */
export function resolveBodyText(message: BodySource): string {
  return message.bodyText || message.bodyPlain || message.bodyPreview || '';
}

/**
 * One plain-text blob per message: `Subject: …`, the resolved body, then the
 * attachment text under a `--- Attachment text ---` marker. Empty parts are
 * skipped; parts are separated by blank lines.
 */
export function buildCombinedText(
  message: Pick<Message, 'subject' | 'bodyText' | 'bodyPlain' | 'bodyPreview' | 'attachmentText'>,
): string {
  const parts: string[] = [];
  const subject = message.subject?.trim();
  if (subject) parts.push(`Subject: ${subject}`);

  const body = resolveBodyText(message);
  if (body) parts.push(body);

  if (message.attachmentText) parts.push(`--- Attachment text ---\n${message.attachmentText}`);

  return parts.join('\n\n').trim();
}

export interface TextPreview {
  len: number;
  preview: string;
}

/** Length plus the first `limit` characters, with an ellipsis when cut */
export function previewText(text: string | null | undefined, limit: number): TextPreview {
  if (!text) return { len: 0, preview: '' };
  const preview = text.length > limit ? `${text.slice(0, limit)}…` : text;
  return { len: text.length, preview };
}

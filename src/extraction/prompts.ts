/**
 * Prompt text and response schemas for the three model tasks.
 */

import { CATEGORIES, INVOICE_FIELD_KEYS, PRIORITIES } from './types.js';
import type { InvoiceFieldKey } from './types.js';
import type { JsonObjectSchema, JsonStringProperty } from '../generator/types.js';

// ---------------------------------------------------------------------------
// Text composition
// ---------------------------------------------------------------------------

/** Trimmed first `maxChars` characters, or '' for empty input */
export function trimText(text: string | null | undefined, maxChars: number): string {
  if (!text) return '';
  return text.trim().slice(0, maxChars);
}

/** Labelled prompt body: subject, email body, then each non-empty attachment */
export function composeEmailText(
  subject: string | null | undefined,
  bodyText: string,
  attachmentTexts: readonly string[] = [],
): string {
  const parts: string[] = [];
  const cleanSubject = subject?.trim();
  if (cleanSubject) parts.push(`Subject: ${cleanSubject}`);
  parts.push('Email Body:');
  parts.push(bodyText.trim());

  const attachments = attachmentTexts.map((text) => text.trim());
  if (attachments.length > 0) {
    parts.push('\nAttachments:');
    attachments.forEach((snippet, index) => {
      if (snippet) parts.push(`--- Attachment ${index + 1} ---\n${snippet}`);
    });
  }
  return parts.join('\n\n');
}

// ---------------------------------------------------------------------------
// Instructions
// ---------------------------------------------------------------------------

export const CLASSIFY_INSTRUCTIONS = `You are a STRICT JSON classifier for business emails.
Return ONLY a JSON object with exactly two keys: "category" and "priority".

category must be one of: ${CATEGORIES.join(', ')}
- Invoice: the email carries or announces a bill, invoice, statement or payment request.
- Customer Requests: a customer, client or colleague asks for something to be done (support, access, changes, quotes).
- Misc: meetings, calendar invitations, timesheets, approvals and other operational notices.
- General: everything else, including newsletters and FYI messages.

priority must be one of: ${PRIORITIES.join(', ')}
- High: explicit urgency, deadlines within a day, outages, escalations.
- Medium: action needed soon but not urgent.
- Low: informational or no action needed.

Do not add explanations, markdown or extra keys.`;

export const INVOICE_INSTRUCTIONS = `Extract invoice details strictly from the text provided (email + attachments).
Return ONLY a JSON object with these keys: ${INVOICE_FIELD_KEYS.join(', ')}.
Rules:
- Copy values exactly as written; do not invent or calculate values.
- Use null for anything not present in the text.
- invoice_amount is the total payable, including the currency symbol or code if shown.
- payment_link is a URL where the invoice can be paid.
- bsb is a 6-digit Australian bank routing number.
- description is one short sentence describing what the invoice is for.
Do not add explanations, markdown or extra keys.`;

export const REQUEST_INSTRUCTIONS = `Summarise the customer's request in 2-3 sentences.
State who is asking, what they need, and any deadline or constraint they mention.
Return ONLY a JSON object with one key: "summary".
Do not add explanations, markdown or extra keys.`;

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

export const CLASSIFICATION_SCHEMA: JsonObjectSchema = {
  type: 'object',
  properties: {
    category: { type: 'string', description: 'Email category', enum: CATEGORIES },
    priority: { type: 'string', description: 'Email priority', enum: PRIORITIES },
  },
  required: ['category', 'priority'],
};

const INVOICE_FIELD_DESCRIPTIONS: Record<InvoiceFieldKey, string> = {
  invoice_number: 'Invoice number or identifier',
  invoice_date: 'Date the invoice was issued',
  due_date: 'Date payment is due',
  invoice_amount: 'Total amount payable, with currency if shown',
  payment_link: 'URL for paying the invoice',
  bsb: 'Bank BSB (6 digits)',
  account_number: 'Bank account number for payment',
  account_name: 'Bank account name for payment',
  biller_code: 'BPAY biller code',
  payment_reference: 'Payment reference or customer reference number',
  description: 'One sentence on what the invoice is for',
};

function invoiceProperties(): Record<string, JsonStringProperty> {
  const properties: Record<string, JsonStringProperty> = {};
  for (const key of INVOICE_FIELD_KEYS) {
    properties[key] = { type: 'string', description: INVOICE_FIELD_DESCRIPTIONS[key], nullable: true };
  }
  return properties;
}

export const INVOICE_SCHEMA: JsonObjectSchema = {
  type: 'object',
  properties: invoiceProperties(),
  required: [],
};

export const REQUEST_SCHEMA: JsonObjectSchema = {
  type: 'object',
  properties: {
    summary: { type: 'string', description: "2-3 sentence summary of the customer's request" },
  },
  required: ['summary'],
};

/**
 * Invoice Field Reconciliation: regex fallback
 *
 * Harvests invoice fields with labelled patterns. Used only to fill gaps when
 * the model returns too few fields, so the patterns favour recall over
 * precision. `description` is never produced here.
 */

import { INVOICE_FIELD_KEYS } from './types.js';
import type { InvoiceFields } from './types.js';

const DATE =
  String.raw`(\d{4}-\d{2}-\d{2}|\d{1,2}[\/.\-]\d{1,2}[\/.\-]\d{2,4}|\d{1,2}(?:st|nd|rd|th)?\s+[A-Za-z]{3,9}\.?,?\s+\d{4}|[A-Za-z]{3,9}\.?\s+\d{1,2}(?:st|nd|rd|th)?,?\s+\d{4})`;

const AMOUNT = String.raw`((?:AUD|USD|NZD|EUR|GBP|CAD)?\s*[$€£]?\s*\d[\d,]*(?:\.\d{1,2})?)`;

const PATTERNS = {
  invoice_number:
    /\b(?:tax\s+)?invoice\s*(?:number|num|no\.?|id|#)\s*[:#.]?\s*([A-Za-z0-9][A-Za-z0-9\-\/]*\d[A-Za-z0-9\-\/]*)/i,
  invoice_date: new RegExp(
    String.raw`\b(?:invoice\s*date|date\s*of\s*issue|issue\s*date|date\s*issued|issued\s*on)\s*[:\-]?\s*${DATE}`,
    'i',
  ),
  due_date: new RegExp(
    String.raw`\b(?:due\s*date|payment\s*due(?:\s*date)?|due\s*by|due\s*on|pay\s*by)\s*[:\-]?\s*${DATE}`,
    'i',
  ),
  invoice_amount: new RegExp(
    String.raw`\b(?:total\s*amount\s*due|total\s*due|amount\s*due|balance\s*due|amount\s*payable|grand\s*total|invoice\s*total|total\s*amount|total)\s*(?:\([A-Za-z]{3}\))?\s*[:\-]?\s*${AMOUNT}`,
    'i',
  ),
  payment_link: /https?:\/\/[^\s<>"')\]]+/i,
  bsb: /\bBSB\s*(?:number|no\.?|#)?\s*[:\-]?\s*(\d{3})[\s\-]?(\d{3})\b/i,
  account_number: /\b(?:account|acct|a\/c)\s*(?:number|num|no\.?|#)\s*[:\-]?\s*(\d[\d \-]{3,18}\d)/i,
  account_name: /\b(?:account|acct|a\/c)\s*name\s*[:\-]\s*([^\r\n]+)/i,
  biller_code: /\bbiller\s*code\s*(?:number|no\.?|#)?\s*[:\-]?\s*(\d{3,10})\b/i,
  payment_reference:
    /\b(?:payment\s*reference(?:\s*number)?|customer\s*reference(?:\s*number)?|reference\s*(?:number|no\.?|#)|ref\s*(?:no\.?|#)|crn|reference)\s*[:\-]?\s*([A-Za-z0-9][A-Za-z0-9\-\/]{2,30})/i,
} as const;

function firstGroup(pattern: RegExp, text: string): string | null {
  const match = pattern.exec(text);
  const value = match?.[1]?.trim();
  return value ? value : null;
}

/**
 * Pattern-based invoice parse. Returns only the fields it found.
 */
export function fallbackInvoiceParse(text: string): Partial<InvoiceFields> {
  const found: Partial<InvoiceFields> = {};
  if (!text) return found;

  const invoiceNumber = firstGroup(PATTERNS.invoice_number, text);
  if (invoiceNumber) found.invoice_number = invoiceNumber;

  const invoiceDate = firstGroup(PATTERNS.invoice_date, text);
  if (invoiceDate) found.invoice_date = invoiceDate;

  const dueDate = firstGroup(PATTERNS.due_date, text);
  if (dueDate) found.due_date = dueDate;

  const amount = firstGroup(PATTERNS.invoice_amount, text);
  if (amount) found.invoice_amount = amount.replace(/,+$/, '').replace(/\s+/g, ' ');

  const link = PATTERNS.payment_link.exec(text)?.[0];
  if (link) found.payment_link = link.replace(/[.,;:!?]+$/, '');

  const bsb = PATTERNS.bsb.exec(text);
  if (bsb?.[1] && bsb[2]) found.bsb = `${bsb[1]}-${bsb[2]}`;

  const accountNumber = firstGroup(PATTERNS.account_number, text);
  if (accountNumber) found.account_number = accountNumber.replace(/\s+/g, '');

  const accountName = firstGroup(PATTERNS.account_name, text);
  if (accountName) found.account_name = accountName;

  const billerCode = firstGroup(PATTERNS.biller_code, text);
  if (billerCode) found.biller_code = billerCode;

  const reference = firstGroup(PATTERNS.payment_reference, text);
  if (reference) found.payment_reference = reference;

  return found;
}

/**
 * Fill only the empty fields of `primary` from `fallback`.
 * A value already present in `primary` is never overwritten.
 */
export function mergeMissingFields(
  primary: InvoiceFields,
  fallback: Partial<InvoiceFields>,
): InvoiceFields {
  const merged: InvoiceFields = { ...primary };
  for (const key of INVOICE_FIELD_KEYS) {
    const candidate = fallback[key];
    if (merged[key] === null && candidate) {
      merged[key] = candidate;
    }
  }
  return merged;
}

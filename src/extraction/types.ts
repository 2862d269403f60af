/**
 * Extraction Type Definitions
 *
 * Types for the classification/extraction pipeline:
 * - CATEGORIES / PRIORITIES: the closed label sets the pipeline emits
 * - INVOICE_FIELD_KEYS: every field an invoice extraction may populate
 * - Zod schemas that coerce raw model output into typed values
 * - RawExtraction: the engine's output, consumed by the flattener
 *
 * Consumers:
 * - extraction/engine.ts, extraction/heuristic.ts, extraction/invoice-fallback.ts
 * - enrichment/flatten.ts, enrichment/worker.ts
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Labels
// ---------------------------------------------------------------------------

export const CATEGORIES = ['General', 'Invoice', 'Customer Requests', 'Misc'] as const;

/** A category the pipeline can assign */
export type Category = typeof CATEGORIES[number];

export const PRIORITIES = ['High', 'Medium', 'Low'] as const;

/** A priority the pipeline can assign (the heuristic path only emits High/Low) */
export type Priority = typeof PRIORITIES[number];

export interface Classification {
  category: Category;
  priority: Priority;
}

const CATEGORY_LABELS: readonly string[] = CATEGORIES;
const PRIORITY_LABELS: readonly string[] = PRIORITIES;

export function isCategory(value: string): value is Category {
  return CATEGORY_LABELS.includes(value);
}

export function isPriority(value: string): value is Priority {
  return PRIORITY_LABELS.includes(value);
}

// ---------------------------------------------------------------------------
// Invoice / Request fields
// ---------------------------------------------------------------------------

export const INVOICE_FIELD_KEYS = [
  'invoice_number',
  'invoice_date',
  'due_date',
  'invoice_amount',
  'payment_link',
  'bsb',
  'account_number',
  'account_name',
  'biller_code',
  'payment_reference',
  'description',
] as const;

export type InvoiceFieldKey = typeof INVOICE_FIELD_KEYS[number];

/** Structured invoice data; every field independently nullable */
export type InvoiceFields = Record<InvoiceFieldKey, string | null>;

export interface RequestFields {
  summary: string;
  ticket_number: string;
}

/**
 * Model output value: numbers become strings, blank strings and anything
 * that is not text become null.
 */
const modelText = z.preprocess((value) => {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
  }
  return null;
}, z.string().nullable());

export const RawClassificationSchema = z.object({
  category: modelText,
  priority: modelText,
});

export const InvoiceFieldsSchema = z.object({
  invoice_number: modelText,
  invoice_date: modelText,
  due_date: modelText,
  invoice_amount: modelText,
  payment_link: modelText,
  bsb: modelText,
  account_number: modelText,
  account_name: modelText,
  biller_code: modelText,
  payment_reference: modelText,
  description: modelText,
});

export const RequestSummarySchema = z.object({
  summary: modelText,
});

export function emptyInvoiceFields(): InvoiceFields {
  return InvoiceFieldsSchema.parse({});
}

/** Number of invoice fields holding a value */
export function countPopulated(fields: InvoiceFields): number {
  return INVOICE_FIELD_KEYS.filter((key) => fields[key] !== null).length;
}

// ---------------------------------------------------------------------------
// Engine I/O
// ---------------------------------------------------------------------------

/** Input for one classify → conditional-extract pass */
export interface ExtractionPayload {
  /** External message id, used for seeding and the ticket suffix */
  externalId: string;
  subject?: string | null;
  /** Required; the worker passes the combined text blob here */
  bodyText: string;
  attachmentTexts?: string[];
  /** ISO-8601 receipt timestamp; drives the ticket date */
  receivedAt?: string | null;
}

/**
 * Result of an extraction pass before business rules are applied.
 * Labels stay loose strings: the flattener accepts whatever a producer emits.
 */
export interface RawExtraction {
  category?: string | null;
  priority?: string | null;
  invoice?: Record<string, unknown> | null;
  request?: Record<string, unknown> | null;
}

/**
 * Business Rule Flattener
 *
 * Projects a RawExtraction onto the fields that are allowed to reach the
 * record store for its category:
 * - Invoice: category, priority and all eleven invoice fields (value or null)
 * - Customer Requests: category, priority, summary, ticket_number
 * - General / Misc / anything else: category and priority only
 *
 * Category matching is case-insensitive ("Invoices", "customer request",
 * "Miscellaneous" are accepted) and known categories come out with their
 * canonical label. Unknown categories are carried through trimmed.
 *
 * Pure: the same input always yields the same output.
 */

import { INVOICE_FIELD_KEYS, emptyInvoiceFields } from '../extraction/types.js';
import type { InvoiceFields, RawExtraction } from '../extraction/types.js';

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface InvoiceResult extends InvoiceFields {
  category: 'Invoice';
  priority: string;
}

export interface CustomerRequestResult {
  category: 'Customer Requests';
  priority: string;
  summary: string | null;
  ticket_number: string | null;
}

/** General, Misc, or a category the pipeline does not know */
export interface LabelOnlyResult {
  category: string;
  priority: string;
}

export type EnrichmentResult = InvoiceResult | CustomerRequestResult | LabelOnlyResult;

export function isInvoiceResult(result: EnrichmentResult): result is InvoiceResult {
  return result.category === 'Invoice' && 'invoice_number' in result;
}

export function isCustomerRequestResult(result: EnrichmentResult): result is CustomerRequestResult {
  return result.category === 'Customer Requests' && 'ticket_number' in result;
}

// ---------------------------------------------------------------------------
// Category dispatch
// ---------------------------------------------------------------------------

export type CategoryKind = 'invoice' | 'customer-request' | 'general' | 'misc' | 'other';

export function categoryKind(category: string): CategoryKind {
  switch (category.trim().toLowerCase()) {
    case 'invoice':
    case 'invoices':
      return 'invoice';
    case 'customer requests':
    case 'customer request':
      return 'customer-request';
    case 'general':
      return 'general';
    case 'misc':
    case 'miscellaneous':
      return 'misc';
    default:
      return 'other';
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled category kind: ${String(value)}`);
}

// ---------------------------------------------------------------------------
// Value helpers
// ---------------------------------------------------------------------------

function labelText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function fieldText(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

function firstText(source: Record<string, unknown>, ...keys: string[]): string | null {
  for (const key of keys) {
    const value = fieldText(source[key]);
    if (value !== null) return value;
  }
  return null;
}

function asRecord(value: unknown): Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}

// ---------------------------------------------------------------------------
// Flatten
// ---------------------------------------------------------------------------

export function flattenExtraction(raw: RawExtraction): EnrichmentResult {
  const category = labelText(raw.category);
  const priority = labelText(raw.priority);
  const kind = categoryKind(category);

  switch (kind) {
    case 'invoice': {
      const invoice = asRecord(raw.invoice);
      const result: InvoiceResult = { category: 'Invoice', priority, ...emptyInvoiceFields() };
      for (const key of INVOICE_FIELD_KEYS) {
        result[key] = fieldText(invoice[key]);
      }
      return result;
    }
    case 'customer-request': {
      const request = asRecord(raw.request);
      return {
        category: 'Customer Requests',
        priority,
        summary: firstText(request, 'summary', 'overview'),
        ticket_number: firstText(request, 'ticket_number', 'request_number'),
      };
    }
    case 'general':
      return { category: 'General', priority };
    case 'misc':
      return { category: 'Misc', priority };
    case 'other':
      return { category, priority };
    default:
      return assertNever(kind);
  }
}

/**
 * Column Mapping
 *
 * Translates Phase-1 fields and Phase-2 enrichment results into store
 * columns. Every column name carries the configured prefix (tables created
 * under a publisher usually need one, e.g. "ops_").
 *
 * Patch rules:
 * - category and priority are written when non-empty
 * - Invoice results write paid=false and every populated invoice field
 * - Customer Requests results write only the summary and ticket columns
 * - null values never appear in a patch
 */

import { INVOICE_FIELD_KEYS } from '../extraction/types.js';
import type { InvoiceFieldKey } from '../extraction/types.js';
import { isCustomerRequestResult, isInvoiceResult } from '../enrichment/flatten.js';
import type { EnrichmentResult } from '../enrichment/flatten.js';
import type { MinimalRecordFields } from './types.js';

export type ColumnValue = string | boolean;
export type ColumnPatch = Record<string, ColumnValue>;

export const RECORD_COLUMNS = {
  externalId: 'external_id',
  sender: 'sender',
  receivedFrom: 'received_from',
  receivedAt: 'received_at',
  subject: 'subject',
  body: 'email_body',
  attachments: 'attachments',
  attachmentContent: 'attachment_content',
  category: 'category',
  priority: 'priority',
  paid: 'paid',
  summary: 'request_overview',
  ticketNumber: 'request_number',
} as const;

export const INVOICE_COLUMNS: Readonly<Record<InvoiceFieldKey, string>> = {
  invoice_number: 'invoice_number',
  invoice_date: 'invoice_date',
  due_date: 'due_date',
  invoice_amount: 'invoice_amount',
  payment_link: 'payment_link',
  bsb: 'bsb',
  account_number: 'account_number',
  account_name: 'account_name',
  biller_code: 'biller_code',
  payment_reference: 'payment_reference',
  description: 'invoice_description',
};

export function createColumns(fields: MinimalRecordFields, prefix = ''): ColumnPatch {
  const columns: ColumnPatch = {
    [prefix + RECORD_COLUMNS.externalId]: fields.externalId,
    [prefix + RECORD_COLUMNS.body]: fields.bodyText,
    [prefix + RECORD_COLUMNS.attachments]: fields.attachmentNames.join(', '),
    [prefix + RECORD_COLUMNS.attachmentContent]: fields.attachmentText,
  };
  if (fields.sender !== null) columns[prefix + RECORD_COLUMNS.sender] = fields.sender;
  if (fields.receivedFrom !== null) columns[prefix + RECORD_COLUMNS.receivedFrom] = fields.receivedFrom;
  if (fields.receivedAt !== null) columns[prefix + RECORD_COLUMNS.receivedAt] = fields.receivedAt;
  if (fields.subject !== null) columns[prefix + RECORD_COLUMNS.subject] = fields.subject;
  return columns;
}

export function patchColumns(result: EnrichmentResult, prefix = ''): ColumnPatch {
  const columns: ColumnPatch = {};
  if (result.category) columns[prefix + RECORD_COLUMNS.category] = result.category;
  if (result.priority) columns[prefix + RECORD_COLUMNS.priority] = result.priority;

  if (result.category === 'Invoice') columns[prefix + RECORD_COLUMNS.paid] = false;

  if (isInvoiceResult(result)) {
    for (const key of INVOICE_FIELD_KEYS) {
      const value = result[key];
      if (value !== null) columns[prefix + INVOICE_COLUMNS[key]] = value;
    }
  } else if (isCustomerRequestResult(result)) {
    if (result.summary !== null) columns[prefix + RECORD_COLUMNS.summary] = result.summary;
    if (result.ticket_number !== null) columns[prefix + RECORD_COLUMNS.ticketNumber] = result.ticket_number;
  }

  return columns;
}

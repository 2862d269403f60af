/**
 * Tests for the in-memory record store, column mapping and idempotent create
 *
 * Tests cover:
 * - createOrSkip creates once and skips afterwards
 * - Phase-1 columns (optional fields omitted, attachment names joined)
 * - Patch columns per result type, with a column prefix
 * - Patching a missing record
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { MemoryRecordStore } from '../memory-store.js';
import { createOrSkip } from '../create-or-skip.js';
import { createColumns, patchColumns } from '../columns.js';
import { RecordNotFoundError } from '../errors.js';
import { minimalFieldsFromMessage } from '../types.js';
import type { Message } from '../../mail/types.js';

const MESSAGE: Message = {
  id: 'msg-1',
  subject: 'Invoice INV-1',
  receivedAt: '2025-08-01T09:00:00Z',
  sender: 'accounts@example.test',
  bodyPlain: 'Please pay',
  attachmentNames: ['inv-1.pdf', 'terms.pdf'],
  attachmentText: 'Total: $10.00',
};

describe('createOrSkip', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('creates a record once and skips it on the second call', async () => {
    const store = new MemoryRecordStore();

    await expect(createOrSkip(store, MESSAGE)).resolves.toBe(true);
    const rowId = await store.lookupRecord('msg-1');
    await expect(createOrSkip(store, MESSAGE)).resolves.toBe(true);

    expect(store.size).toBe(1);
    expect(await store.lookupRecord('msg-1')).toBe(rowId);
  });

  it('propagates store failures', async () => {
    const store = new MemoryRecordStore();
    vi.spyOn(store, 'createRecord').mockRejectedValue(new Error('disk full'));

    await expect(createOrSkip(store, MESSAGE)).rejects.toThrow('disk full');
  });
});

describe('createColumns', () => {
  it('maps the minimal fields and omits missing optional ones', () => {
    expect(createColumns(minimalFieldsFromMessage(MESSAGE))).toEqual({
      external_id: 'msg-1',
      subject: 'Invoice INV-1',
      received_at: '2025-08-01T09:00:00Z',
      sender: 'accounts@example.test',
      email_body: 'Please pay',
      attachments: 'inv-1.pdf, terms.pdf',
      attachment_content: 'Total: $10.00',
    });
  });
});

describe('patchColumns', () => {
  it('writes populated invoice fields with paid=false under the prefix', () => {
    expect(
      patchColumns(
        {
          category: 'Invoice',
          priority: 'Low',
          invoice_number: 'INV-1',
          invoice_date: null,
          due_date: '2025-08-15',
          invoice_amount: null,
          payment_link: null,
          bsb: null,
          account_number: null,
          account_name: null,
          biller_code: null,
          payment_reference: null,
          description: 'Monthly hosting',
        },
        'ops_',
      ),
    ).toEqual({
      ops_category: 'Invoice',
      ops_priority: 'Low',
      ops_paid: false,
      ops_invoice_number: 'INV-1',
      ops_due_date: '2025-08-15',
      ops_invoice_description: 'Monthly hosting',
    });
  });

  it('writes summary and ticket columns for a customer request', () => {
    expect(
      patchColumns({
        category: 'Customer Requests',
        priority: 'High',
        summary: 'Reset access',
        ticket_number: null,
      }),
    ).toEqual({ category: 'Customer Requests', priority: 'High', request_overview: 'Reset access' });
  });

  it('writes paid=false for a heuristic invoice label without fields', () => {
    expect(patchColumns({ category: 'Invoice', priority: 'Low' })).toEqual({
      category: 'Invoice',
      priority: 'Low',
      paid: false,
    });
  });

  it('leaves out empty labels', () => {
    expect(patchColumns({ category: '', priority: '' })).toEqual({});
  });
});

describe('MemoryRecordStore', () => {
  it('merges patches onto the stored columns', async () => {
    const store = new MemoryRecordStore('ops_');
    await store.createRecord(minimalFieldsFromMessage(MESSAGE));

    await store.patchRecord('msg-1', { category: 'General', priority: 'Low' });
    await store.patchRecord('msg-1', { category: 'Misc', priority: 'Medium' });

    expect(store.get('msg-1')?.columns).toMatchObject({
      ops_external_id: 'msg-1',
      ops_category: 'Misc',
      ops_priority: 'Medium',
    });
  });

  it('rejects a patch for an unknown id', async () => {
    const store = new MemoryRecordStore();
    await expect(store.patchRecord('nope', { category: 'General', priority: 'Low' })).rejects.toBeInstanceOf(
      RecordNotFoundError,
    );
  });
});

/**
 * Tests for the Enrichment Worker
 *
 * Tests cover:
 * - Success path: combined blob sent to the engine, flattened result patched
 * - Heuristic fallback when the model path fails (labels only, no sub-fields)
 * - Urgent non-invoice mail ends up High priority
 * - Patch failure and missing id outcomes
 * - Progress counted for every outcome
 *
 * Uses the in-memory record store and a real ExtractionEngine over a
 * scripted backend where the model path matters.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { enrichAndPatch } from '../worker.js';
import type { WorkerDeps } from '../worker.js';
import { ProgressCounter } from '../progress.js';
import { ExtractionEngine } from '../../extraction/engine.js';
import { ModelBackendError, ValidationError } from '../../extraction/errors.js';
import type { ExtractionPayload, RawExtraction } from '../../extraction/types.js';
import type { GenerateRequest, TextGenerator } from '../../generator/types.js';
import type { Message } from '../../mail/types.js';
import { MemoryRecordStore } from '../../store/memory-store.js';
import { StoreApiError } from '../../store/errors.js';
import { minimalFieldsFromMessage } from '../../store/types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const failingGenerator: TextGenerator = {
  name: 'down',
  async generate() {
    throw new ModelBackendError('connection refused', 'down');
  },
};

async function seededStore(message: Message): Promise<MemoryRecordStore> {
  const store = new MemoryRecordStore();
  await store.createRecord(minimalFieldsFromMessage(message));
  return store;
}

function fakeEngine(run: (payload: ExtractionPayload) => Promise<RawExtraction>) {
  return { runExtraction: vi.fn(run) };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('enrichAndPatch', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('sends the combined text blob to the engine and patches the flattened result', async () => {
    const message: Message = {
      id: 'inv-1',
      subject: 'Invoice INV-9',
      bodyText: 'Please pay',
      attachmentText: 'Total: $10.00',
      receivedAt: '2025-08-01T00:00:00Z',
    };
    const store = await seededStore(message);
    const engine = fakeEngine(async () => ({
      category: 'Invoice',
      priority: 'Medium',
      invoice: { invoice_number: 'INV-9', invoice_amount: '$10.00' },
    }));
    const deps: WorkerDeps = { engine, store, progress: new ProgressCounter(1) };

    const outcome = await enrichAndPatch(message, deps);

    expect(engine.runExtraction).toHaveBeenCalledWith({
      externalId: 'inv-1',
      subject: null,
      bodyText: 'Subject: Invoice INV-9\n\nPlease pay\n\n--- Attachment text ---\nTotal: $10.00',
      receivedAt: '2025-08-01T00:00:00Z',
    });
    expect(outcome.status).toBe('success');
    expect(store.get('inv-1')?.columns).toMatchObject({
      category: 'Invoice',
      priority: 'Medium',
      paid: false,
      invoice_number: 'INV-9',
      invoice_amount: '$10.00',
    });
    expect(store.get('inv-1')?.columns).not.toHaveProperty('due_date');
    expect(deps.progress.processed).toBe(1);
  });

  it('puts the subject line in the classification prompt once', async () => {
    const message: Message = { id: 'gen-1', subject: 'Team lunch', bodyText: 'Pizza on Friday' };
    const store = await seededStore(message);
    const requests: GenerateRequest[] = [];
    const generator: TextGenerator = {
      name: 'recording',
      async generate(request) {
        requests.push(request);
        return '{"category":"General","priority":"Low"}';
      },
    };
    const deps: WorkerDeps = { engine: new ExtractionEngine(generator), store, progress: new ProgressCounter(1) };

    const outcome = await enrichAndPatch(message, deps);

    expect(outcome.status).toBe('success');
    expect(requests).toHaveLength(1);
    expect((requests[0]?.prompt ?? '').split('Subject: Team lunch')).toHaveLength(2);
  });

  it('falls back to heuristic labels only when the backend fails on every call', async () => {
    const message: Message = {
      id: 'inv-2',
      subject: 'Your invoice is ready',
      bodyText: 'Invoice Number: INV-1\nTotal: $99.00',
    };
    const store = await seededStore(message);
    const deps: WorkerDeps = {
      engine: new ExtractionEngine(failingGenerator),
      store,
      progress: new ProgressCounter(1),
    };

    const outcome = await enrichAndPatch(message, deps);

    expect(outcome).toEqual({
      status: 'degraded',
      externalId: 'inv-2',
      result: { category: 'Invoice', priority: 'Low' },
      reason: 'ModelBackendError',
    });
    expect(store.get('inv-2')?.columns).toMatchObject({ category: 'Invoice', priority: 'Low', paid: false });
    expect(store.get('inv-2')?.columns).not.toHaveProperty('invoice_number');
  });

  it('marks urgent non-invoice mail High on the fallback path', async () => {
    const message: Message = { id: 'urg-1', subject: 'URGENT', bodyText: 'The VPN is down for the whole office.' };
    const store = await seededStore(message);
    const deps: WorkerDeps = {
      engine: new ExtractionEngine(failingGenerator),
      store,
      progress: new ProgressCounter(1),
    };

    const outcome = await enrichAndPatch(message, deps);

    expect(outcome.status).toBe('degraded');
    expect(outcome.status !== 'failed' && outcome.result).toEqual({ category: 'General', priority: 'High' });
  });

  it('reports a validation failure as degraded with the error name', async () => {
    const message: Message = { id: 'empty-1' };
    const store = await seededStore(message);
    const engine = fakeEngine(async () => {
      throw new ValidationError('Body text is required');
    });

    const outcome = await enrichAndPatch(message, { engine, store, progress: new ProgressCounter(1) });

    expect(outcome).toEqual({
      status: 'degraded',
      externalId: 'empty-1',
      result: { category: 'General', priority: 'Low' },
      reason: 'ValidationError',
    });
  });

  it('reports a failed patch and still counts progress', async () => {
    const message: Message = { id: 'req-1', bodyText: 'Please reset my password' };
    const engine = fakeEngine(async () => ({ category: 'General', priority: 'Low' }));
    const store = {
      patchRecord: vi.fn(async () => {
        throw new StoreApiError('Store error: 500', 500, 'boom');
      }),
    };
    const progress = new ProgressCounter(1);

    const outcome = await enrichAndPatch(message, { engine, store, progress });

    expect(outcome).toEqual({ status: 'failed', externalId: 'req-1', reason: 'patch-failed' });
    expect(progress.processed).toBe(1);
  });

  it('reports a patch onto a missing record as failed', async () => {
    const engine = fakeEngine(async () => ({ category: 'General', priority: 'Low' }));
    const outcome = await enrichAndPatch(
      { id: 'never-created', bodyText: 'Hello' },
      { engine, store: new MemoryRecordStore(), progress: new ProgressCounter(1) },
    );

    expect(outcome).toEqual({ status: 'failed', externalId: 'never-created', reason: 'patch-failed' });
  });

  it('skips a message without an id', async () => {
    const engine = fakeEngine(async () => ({ category: 'General', priority: 'Low' }));
    const progress = new ProgressCounter(1);

    const outcome = await enrichAndPatch({ id: '  ', bodyText: 'Hello' }, {
      engine,
      store: new MemoryRecordStore(),
      progress,
    });

    expect(outcome).toEqual({ status: 'failed', externalId: null, reason: 'missing-id' });
    expect(engine.runExtraction).not.toHaveBeenCalled();
    expect(progress.processed).toBe(1);
  });
});

/**
 * Ingestion Driver
 *
 * Two-phase processing of one batch of already-fetched messages:
 * - Phase 1 (on the caller's path): idempotent create of a minimal record
 *   per message, timed, with a warning when the store is slow
 * - Phase 2 (background): every message is submitted to the bounded
 *   enrichment pool, whether or not Phase 1 succeeded
 *
 * Returns the batch summary without waiting for enrichment.
 */

import { appConfig } from '../config.js';
import { enrichAndPatch } from '../enrichment/worker.js';
import type { WorkerDeps } from '../enrichment/worker.js';
import { ProgressCounter } from '../enrichment/progress.js';
import type { EnrichmentPool } from '../enrichment/pool.js';
import { previewText, resolveBodyText } from '../mail/body.js';
import type { TextPreview } from '../mail/body.js';
import type { Message } from '../mail/types.js';
import { createOrSkip } from '../store/create-or-skip.js';
import type { RecordStore } from '../store/types.js';

/** Subjects in the summary are cut to this length */
const SUBJECT_PREVIEW_CHARS = 120;

export interface IngestionDetail {
  id: string;
  subject: string;
  bodyText: TextPreview;
  attachmentText: TextPreview;
  attachmentsCount: number;
  attachmentMethods: string[];
  createdOrSkipped: boolean;
  createMs: number;
}

export interface IngestionSummary {
  ok: boolean;
  fetched: number;
  phase1CreatedOrSkipped: number;
  phase2QueuedEnrichment: number;
  details: IngestionDetail[];
}

export interface IngestionDeps {
  store: RecordStore;
  pool: EnrichmentPool;
  engine: WorkerDeps['engine'];
  heuristic?: WorkerDeps['heuristic'];
  slowStoreMs?: number;
  previewChars?: number;
}

export async function ingestMessages(
  messages: readonly Message[],
  deps: IngestionDeps,
): Promise<IngestionSummary> {
  const slowStoreMs = deps.slowStoreMs ?? appConfig.enrichment.slowStoreMs;
  const previewChars = deps.previewChars ?? appConfig.enrichment.previewChars;
  const progress = new ProgressCounter(messages.length);

  const workerDeps: WorkerDeps = {
    engine: deps.engine,
    store: deps.store,
    progress,
    heuristic: deps.heuristic,
  };

  let createdOrSkippedCount = 0;
  let queued = 0;
  const details: IngestionDetail[] = [];

  for (const message of messages) {
    const start = Date.now();
    let createdOrSkipped = false;
    try {
      createdOrSkipped = await createOrSkip(deps.store, message);
    } catch (err) {
      console.error('[ingestion] Phase-1 create failed', {
        externalId: message.id,
        error: err instanceof Error ? err.message : String(err),
      });
    }
    const createMs = Date.now() - start;

    if (createMs > slowStoreMs) {
      console.warn('[ingestion] Slow record store create', { externalId: message.id, createMs, slowStoreMs });
    }
    if (createdOrSkipped) {
      createdOrSkippedCount += 1;
      console.log('[ingestion] Phase-1 create or skip ok', { externalId: message.id, createMs });
    }

    deps.pool.submit(() => enrichAndPatch(message, workerDeps));
    queued += 1;

    details.push({
      id: message.id,
      subject: (message.subject ?? '').slice(0, SUBJECT_PREVIEW_CHARS),
      bodyText: previewText(resolveBodyText(message), previewChars),
      attachmentText: previewText(message.attachmentText, previewChars),
      attachmentsCount: message.attachmentNames?.length ?? 0,
      attachmentMethods: message.attachmentMethods ?? [],
      createdOrSkipped,
      createMs,
    });
  }

  console.log('[ingestion] Batch queued', {
    fetched: messages.length,
    phase1CreatedOrSkipped: createdOrSkippedCount,
    phase2QueuedEnrichment: queued,
  });

  return {
    ok: true,
    fetched: messages.length,
    phase1CreatedOrSkipped: createdOrSkippedCount,
    phase2QueuedEnrichment: queued,
    details,
  };
}

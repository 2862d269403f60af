/**
 * Enrichment Worker (Phase 2)
 *
 * Per message:
 * 1. Soft classification with the heuristic classifier (logged only)
 * 2. Combined text blob: subject, resolved body, attachment text
 * 3. Model extraction → business-rule flatten
 *    (any failure on this path → heuristic category/priority only, with no
 *    invoice or request fields)
 * 4. Patch the record keyed by external id
 * 5. Count the message on the batch progress counter
 *
 * The worker never rejects: every outcome, including a failed patch, comes
 * back as an EnrichmentOutcome.
 */

import { classifyHeuristically } from '../extraction/heuristic.js';
import type { HeuristicInput, HeuristicOptions } from '../extraction/heuristic.js';
import type { ExtractionEngine } from '../extraction/engine.js';
import { buildCombinedText, resolveBodyText } from '../mail/body.js';
import type { Message } from '../mail/types.js';
import type { RecordStore } from '../store/types.js';
import { flattenExtraction } from './flatten.js';
import type { EnrichmentResult } from './flatten.js';
import type { ProgressCounter } from './progress.js';

export type FailureReason = 'missing-id' | 'patch-failed' | 'unexpected-error';

export type EnrichmentOutcome =
  | { status: 'success'; externalId: string; result: EnrichmentResult }
  | { status: 'degraded'; externalId: string; result: EnrichmentResult; reason: string }
  | { status: 'failed'; externalId: string | null; reason: FailureReason };

export interface WorkerDeps {
  engine: Pick<ExtractionEngine, 'runExtraction'>;
  store: Pick<RecordStore, 'patchRecord'>;
  progress: ProgressCounter;
  heuristic?: HeuristicOptions;
}

interface ModelPathResult {
  result: EnrichmentResult;
  /** Why the heuristic fallback was used; null when the model path succeeded */
  fallbackReason: string | null;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function heuristicInput(message: Message): HeuristicInput {
  return {
    subject: message.subject,
    body: resolveBodyText(message),
    attachmentNames: message.attachmentNames,
  };
}

async function runModelPath(
  externalId: string,
  message: Message,
  deps: WorkerDeps,
): Promise<ModelPathResult> {
  const textBlob = buildCombinedText(message);
  console.log('[enrichment] Payload built', {
    externalId,
    receivedAt: message.receivedAt ?? null,
    bodyChars: textBlob.length,
  });

  try {
    // The blob already opens with the subject line
    const raw = await deps.engine.runExtraction({
      externalId,
      subject: null,
      bodyText: textBlob,
      receivedAt: message.receivedAt,
    });
    const result = flattenExtraction(raw);
    console.log('[enrichment] Extraction succeeded', {
      externalId,
      category: result.category,
      keys: Object.entries(result)
        .filter(([, value]) => value !== null)
        .map(([key]) => key)
        .sort(),
    });
    return { result, fallbackReason: null };
  } catch (err) {
    const fallback = classifyHeuristically(heuristicInput(message), deps.heuristic);
    const reason = err instanceof Error ? err.name : 'Error';
    console.warn('[enrichment] Extraction failed, falling back to heuristic classifier', {
      externalId,
      reason,
      error: errorMessage(err),
      category: fallback.category,
      priority: fallback.priority,
    });
    return {
      result: { category: fallback.category, priority: fallback.priority },
      fallbackReason: reason,
    };
  }
}

async function enrich(message: Message, deps: WorkerDeps): Promise<EnrichmentOutcome> {
  const externalId = message.id.trim();
  if (!externalId) {
    console.warn('[enrichment] Message has no id, skipping');
    return { status: 'failed', externalId: null, reason: 'missing-id' };
  }

  try {
    const soft = classifyHeuristically(heuristicInput(message), deps.heuristic);
    console.log('[enrichment] Soft classification', {
      externalId,
      category: soft.category,
      priority: soft.priority,
      rule: soft.rule,
    });
  } catch (err) {
    console.error('[enrichment] Soft classification failed', { externalId, error: errorMessage(err) });
  }

  const { result, fallbackReason } = await runModelPath(externalId, message, deps);

  try {
    await deps.store.patchRecord(externalId, result);
  } catch (err) {
    console.error('[enrichment] Patch failed', { externalId, error: errorMessage(err) });
    return { status: 'failed', externalId, reason: 'patch-failed' };
  }
  console.log('[enrichment] Patch succeeded', { externalId, category: result.category });

  return fallbackReason === null
    ? { status: 'success', externalId, result }
    : { status: 'degraded', externalId, result, reason: fallbackReason };
}

/**
 * Enrich one message and patch its record. Resolves with the outcome; the
 * progress counter is incremented whatever the outcome.
 */
export async function enrichAndPatch(message: Message, deps: WorkerDeps): Promise<EnrichmentOutcome> {
  try {
    return await enrich(message, deps);
  } catch (err) {
    console.error('[enrichment] Unexpected worker error', {
      externalId: message.id,
      error: errorMessage(err),
    });
    return { status: 'failed', externalId: message.id || null, reason: 'unexpected-error' };
  } finally {
    deps.progress.increment();
  }
}

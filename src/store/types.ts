/**
 * Record Store Contract
 *
 * One persisted record per external message id. Phase 1 creates it with the
 * minimal fields below; Phase 2 patches the enrichment result onto it.
 */

import { resolveBodyText } from '../mail/body.js';
import type { Message } from '../mail/types.js';
import type { EnrichmentResult } from '../enrichment/flatten.js';

/** Fields written once, at Phase 1 */
export interface MinimalRecordFields {
  externalId: string;
  subject: string | null;
  receivedAt: string | null;
  sender: string | null;
  receivedFrom: string | null;
  bodyText: string;
  attachmentNames: string[];
  attachmentText: string;
}

export interface RecordStore {
  /** Backend name used in logs */
  readonly name: string;
  /** Row id of the record for `externalId`, or null when there is none */
  lookupRecord(externalId: string): Promise<string | null>;
  /** Insert a record; callers check `lookupRecord` first */
  createRecord(fields: MinimalRecordFields): Promise<void>;
  /**
   * Write an enrichment result onto the record for `externalId`.
   * Null values are left out; the last patch wins per column.
   */
  patchRecord(externalId: string, result: EnrichmentResult): Promise<void>;
}

export function minimalFieldsFromMessage(message: Message): MinimalRecordFields {
  return {
    externalId: message.id,
    subject: message.subject ?? null,
    receivedAt: message.receivedAt ?? null,
    sender: message.sender ?? null,
    receivedFrom: message.receivedFrom ?? null,
    bodyText: resolveBodyText(message),
    attachmentNames: message.attachmentNames ?? [],
    attachmentText: message.attachmentText ?? '',
  };
}

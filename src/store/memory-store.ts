/**
 * In-memory record store. Same contract and column mapping as the REST
 * store; used for local runs (STORE_BACKEND=memory) and tests.
 */

import { randomUUID } from 'node:crypto';
import { createColumns, patchColumns } from './columns.js';
import type { ColumnPatch } from './columns.js';
import { RecordNotFoundError } from './errors.js';
import type { MinimalRecordFields, RecordStore } from './types.js';
import type { EnrichmentResult } from '../enrichment/flatten.js';

export interface StoredRecord {
  rowId: string;
  columns: ColumnPatch;
}

export class MemoryRecordStore implements RecordStore {
  readonly name = 'memory';

  private readonly records = new Map<string, StoredRecord>();

  constructor(private readonly columnPrefix = '') {}

  async lookupRecord(externalId: string): Promise<string | null> {
    return this.records.get(externalId)?.rowId ?? null;
  }

  async createRecord(fields: MinimalRecordFields): Promise<void> {
    this.records.set(fields.externalId, {
      rowId: randomUUID(),
      columns: createColumns(fields, this.columnPrefix),
    });
  }

  async patchRecord(externalId: string, result: EnrichmentResult): Promise<void> {
    const record = this.records.get(externalId);
    if (!record) throw new RecordNotFoundError(externalId);
    record.columns = { ...record.columns, ...patchColumns(result, this.columnPrefix) };
  }

  /** Stored record for an external id (inspection helper) */
  get(externalId: string): StoredRecord | undefined {
    return this.records.get(externalId);
  }

  get size(): number {
    return this.records.size;
  }
}

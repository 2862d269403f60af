// ============================================================================
// Record Store Module: Barrel Export
// ============================================================================
//
// Persistence for mail records keyed by external message id, and the factory
// that picks a backend from configuration.

import { MemoryRecordStore } from './memory-store.js';
import { RestRecordStore } from './rest-store.js';
import { loadRestStoreSettings, storeConfig } from './config.js';
import type { StoreBackend } from './config.js';
import type { RecordStore } from './types.js';

export type { RecordStore, MinimalRecordFields } from './types.js';
export { minimalFieldsFromMessage } from './types.js';
export { createOrSkip } from './create-or-skip.js';
export { StoreApiError, StoreAuthError, RecordNotFoundError } from './errors.js';
export { MemoryRecordStore } from './memory-store.js';
export type { StoredRecord } from './memory-store.js';
export { RestRecordStore, odataString } from './rest-store.js';
export { createColumns, patchColumns, RECORD_COLUMNS, INVOICE_COLUMNS } from './columns.js';
export type { ColumnPatch, ColumnValue } from './columns.js';
export { storeConfig, loadRestStoreSettings } from './config.js';
export type { RestStoreSettings, StoreBackend } from './config.js';

export function createRecordStore(backend: StoreBackend = storeConfig.backend): RecordStore {
  switch (backend) {
    case 'memory':
      return new MemoryRecordStore(storeConfig.columnPrefix);
    case 'rest':
      return new RestRecordStore(loadRestStoreSettings());
  }
}

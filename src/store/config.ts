/**
 * Record Store Configuration
 *
 * Environment variables:
 * - STORE_BACKEND: 'memory' (default) or 'rest'
 * - STORE_RESOURCE: Base URL of the OData Web API host (rest only)
 * - STORE_TABLE: Entity set name, e.g. ops_mails (rest only)
 * - STORE_PRIMARY_ID: Primary key column (default <STORE_TABLE minus trailing s>id)
 * - STORE_COLUMN_PREFIX: Prefix added to every column name (default '')
 * - STORE_TENANT_ID / STORE_CLIENT_ID / STORE_CLIENT_SECRET: Client-credentials grant (rest only)
 * - STORE_AUTHORITY_HOST: Token authority (default https://login.microsoftonline.com)
 *
 * The REST settings are loaded lazily so the memory backend runs without them.
 */

import 'dotenv/config';
import { optionalEnv, requiredEnv } from '../config.js';

export type StoreBackend = 'memory' | 'rest';

export interface RestStoreSettings {
  resource: string;
  table: string;
  primaryId: string;
  columnPrefix: string;
  tenantId: string;
  clientId: string;
  clientSecret: string;
  authorityHost: string;
}

function parseStoreBackend(value: string): StoreBackend {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'memory' || normalized === 'rest') return normalized;
  throw new Error(`Unsupported STORE_BACKEND "${value}". Use "memory" or "rest".`);
}

export const storeConfig = {
  backend: parseStoreBackend(optionalEnv('STORE_BACKEND', 'memory')),
  columnPrefix: optionalEnv('STORE_COLUMN_PREFIX'),
};

let _restSettings: RestStoreSettings | null = null;

/** REST settings; throws on the first missing required variable */
export function loadRestStoreSettings(): RestStoreSettings {
  if (_restSettings) return _restSettings;

  const table = requiredEnv('STORE_TABLE');
  _restSettings = {
    resource: requiredEnv('STORE_RESOURCE').replace(/\/+$/, ''),
    table,
    primaryId: optionalEnv('STORE_PRIMARY_ID') || `${table.replace(/s$/, '')}id`,
    columnPrefix: storeConfig.columnPrefix,
    tenantId: requiredEnv('STORE_TENANT_ID'),
    clientId: requiredEnv('STORE_CLIENT_ID'),
    clientSecret: requiredEnv('STORE_CLIENT_SECRET'),
    authorityHost: optionalEnv('STORE_AUTHORITY_HOST', 'https://login.microsoftonline.com').replace(/\/+$/, ''),
  };
  return _restSettings;
}

/**
 * REST Record Store: OData Web API
 *
 * Talks to an OData v4 Web API (`{resource}/api/data/v9.2/{table}`):
 * - lookup: GET with $select=<primary id> and $filter on the external id column
 * - create: POST the Phase-1 columns
 * - patch:  PATCH `{table}({rowId})`; 204 is success
 *
 * Authentication is an OAuth2 client-credentials grant against the configured
 * authority. The bearer token is cached in memory until a minute before it
 * expires; concurrent callers share one token request.
 *
 * Logs carry external ids, row ids and column names only.
 */

import { z } from 'zod';
import { RECORD_COLUMNS, createColumns, patchColumns } from './columns.js';
import type { RestStoreSettings } from './config.js';
import { RecordNotFoundError, StoreApiError, StoreAuthError } from './errors.js';
import type { MinimalRecordFields, RecordStore } from './types.js';
import type { EnrichmentResult } from '../enrichment/flatten.js';

const API_PATH = '/api/data/v9.2';
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().default(3600),
});

const LookupResponseSchema = z.object({
  value: z.array(z.record(z.unknown())),
});

type FetchFn = typeof fetch;

interface CachedToken {
  token: string;
  expiresAt: number;
}

/** OData string literal: single quotes doubled */
export function odataString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export class RestRecordStore implements RecordStore {
  readonly name = 'rest';

  private cachedToken: CachedToken | null = null;
  private tokenRequest: Promise<string> | null = null;

  constructor(
    private readonly settings: RestStoreSettings,
    private readonly fetchFn: FetchFn = fetch,
  ) {}

  private get baseUrl(): string {
    return `${this.settings.resource}${API_PATH}/${this.settings.table}`;
  }

  private column(name: string): string {
    return `${this.settings.columnPrefix}${name}`;
  }

  // -------------------------------------------------------------------------
  // Auth
  // -------------------------------------------------------------------------

  private getToken(): Promise<string> {
    if (this.cachedToken && this.cachedToken.expiresAt > Date.now()) {
      return Promise.resolve(this.cachedToken.token);
    }
    if (!this.tokenRequest) {
      this.tokenRequest = this.requestToken().finally(() => {
        this.tokenRequest = null;
      });
    }
    return this.tokenRequest;
  }

  private async requestToken(): Promise<string> {
    const url = `${this.settings.authorityHost}/${this.settings.tenantId}/oauth2/v2.0/token`;
    const body = new URLSearchParams({
      client_id: this.settings.clientId,
      client_secret: this.settings.clientSecret,
      grant_type: 'client_credentials',
      scope: `${this.settings.resource}/.default`,
    });

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body,
      });
    } catch (err) {
      throw new StoreApiError(
        `Token request failed: ${err instanceof Error ? err.message : 'Unknown error'}`,
        0,
        '',
      );
    }

    if (!response.ok) {
      throw new StoreAuthError(response.status, await response.text());
    }

    const parsed = TokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new StoreApiError('Token response did not include an access token', response.status, '');
    }

    this.cachedToken = {
      token: parsed.data.access_token,
      expiresAt: Date.now() + parsed.data.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS,
    };
    return this.cachedToken.token;
  }

  // -------------------------------------------------------------------------
  // HTTP
  // -------------------------------------------------------------------------

  private async storeFetch(url: string, init: RequestInit): Promise<Response> {
    const token = await this.getToken();
    try {
      return await this.fetchFn(url, {
        ...init,
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
          'OData-MaxVersion': '4.0',
          'OData-Version': '4.0',
        },
      });
    } catch (err) {
      throw new StoreApiError(
        `Record store request failed: ${err instanceof Error ? err.message : 'Unknown error'}`,
        0,
        '',
      );
    }
  }

  private async failure(operation: string, response: Response): Promise<StoreApiError> {
    return new StoreApiError(
      `Record store ${operation} error: ${response.status} ${response.statusText}`,
      response.status,
      await response.text(),
    );
  }

  // -------------------------------------------------------------------------
  // RecordStore
  // -------------------------------------------------------------------------

  async lookupRecord(externalId: string): Promise<string | null> {
    const primaryId = this.settings.primaryId;
    const filter = `${this.column(RECORD_COLUMNS.externalId)} eq ${odataString(externalId)}`;
    const url = `${this.baseUrl}?$select=${encodeURIComponent(primaryId)}&$filter=${encodeURIComponent(filter)}`;

    const response = await this.storeFetch(url, { method: 'GET' });
    if (!response.ok) throw await this.failure('lookup', response);

    const parsed = LookupResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new StoreApiError('Record store lookup returned an unexpected payload', response.status, '');
    }

    const rowId = parsed.data.value[0]?.[primaryId];
    return typeof rowId === 'string' && rowId !== '' ? rowId : null;
  }

  async createRecord(fields: MinimalRecordFields): Promise<void> {
    const response = await this.storeFetch(this.baseUrl, {
      method: 'POST',
      body: JSON.stringify(createColumns(fields, this.settings.columnPrefix)),
    });
    if (!response.ok) throw await this.failure('create', response);

    console.log('[store] Record created', { externalId: fields.externalId });
  }

  async patchRecord(externalId: string, result: EnrichmentResult): Promise<void> {
    const rowId = await this.lookupRecord(externalId);
    if (rowId === null) throw new RecordNotFoundError(externalId);

    const columns = patchColumns(result, this.settings.columnPrefix);
    if (Object.keys(columns).length === 0) {
      console.log('[store] Nothing to patch', { externalId });
      return;
    }

    const response = await this.storeFetch(`${this.baseUrl}(${rowId})`, {
      method: 'PATCH',
      body: JSON.stringify(columns),
    });
    if (response.status !== 204) throw await this.failure('patch', response);

    console.log('[store] Record patched', { externalId, rowId, columns: Object.keys(columns) });
  }
}

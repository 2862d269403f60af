// ============================================================================
// Record Store Error Types: Typed errors for persistence failures
// ============================================================================

/**
 * Thrown when the record store rejects a request or cannot be reached.
 * Carries the HTTP status (0 for transport failures) and the response body.
 * Never includes message text in the error message.
 */
export class StoreApiError extends Error {
  readonly statusCode: number;
  readonly responseBody: string;

  constructor(message: string, statusCode: number, responseBody: string) {
    super(message);
    this.name = 'StoreApiError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

/**
 * Thrown when the store's token endpoint refuses the client credentials.
 */
export class StoreAuthError extends StoreApiError {
  constructor(statusCode: number, responseBody: string) {
    super(
      `Record store authentication failed (${statusCode}). Check STORE_TENANT_ID, STORE_CLIENT_ID and STORE_CLIENT_SECRET.`,
      statusCode,
      responseBody,
    );
    this.name = 'StoreAuthError';
  }
}

/**
 * Thrown when a patch targets an external id that has no record.
 */
export class RecordNotFoundError extends StoreApiError {
  readonly externalId: string;

  constructor(externalId: string) {
    super(`No record for external id ${externalId}`, 404, '');
    this.name = 'RecordNotFoundError';
    this.externalId = externalId;
  }
}

// ============================================================================
// Extraction Error Types: Typed errors for the model-backed path
// ============================================================================

/**
 * Thrown when the backend's output cannot be turned into the expected JSON
 * shape after every recovery attempt.
 * Carries only the response length, never the response text.
 */
export class ModelOutputError extends Error {
  readonly responseLength: number;

  constructor(message: string, responseLength: number) {
    super(message);
    this.name = 'ModelOutputError';
    this.responseLength = responseLength;
  }
}

/**
 * Thrown when the text-generation backend itself fails: transport error,
 * non-OK status, or a call that exceeded the configured timeout.
 */
export class ModelBackendError extends Error {
  readonly backend: string;
  readonly statusCode: number | null;

  constructor(message: string, backend: string, statusCode: number | null = null) {
    super(message);
    this.name = 'ModelBackendError';
    this.backend = backend;
    this.statusCode = statusCode;
  }
}

/**
 * Thrown when an extraction request is missing required input.
 * Not retried: the same input fails the same way.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Text-Generation Backend Contract
 *
 * The extraction engine talks to any backend through TextGenerator. A backend
 * must support two output modes:
 * - 'schema': output constrained to the supplied JSON schema
 * - 'json':   any JSON value (used as the retry when schema mode fails)
 */

export type OutputMode = 'schema' | 'json';

export interface JsonStringProperty {
  type: 'string';
  description: string;
  nullable?: boolean;
  enum?: readonly string[];
}

/** The subset of JSON Schema the extraction tasks use: flat objects of strings */
export interface JsonObjectSchema {
  type: 'object';
  properties: Record<string, JsonStringProperty>;
  required: readonly string[];
}

export interface GenerateRequest {
  model: string;
  prompt: string;
  schema: JsonObjectSchema;
  mode: OutputMode;
  seed: number;
  temperature: number;
  maxTokens: number;
}

export interface TextGenerator {
  /** Backend name used in logs and errors */
  readonly name: string;
  /**
   * Run one generation and return the raw response text.
   * @throws ModelBackendError on transport failure, non-OK status or timeout
   */
  generate(request: GenerateRequest): Promise<string>;
}

/**
 * Ollama Backend
 *
 * Calls Ollama's /api/generate endpoint (non-streaming). Schema mode passes
 * the JSON schema as `format`; JSON mode passes `format: "json"`. The seed,
 * temperature, output cap and context window go in `options` so identical
 * requests reproduce identical output on a deterministic model.
 *
 * Each call is bounded by `timeoutMs` (0 disables the bound).
 */

import { z } from 'zod';
import { ModelBackendError } from '../extraction/errors.js';
import type { GenerateRequest, JsonObjectSchema, TextGenerator } from './types.js';

export interface OllamaSettings {
  host: string;
  keepAlive: string;
  contextWindow: number;
  timeoutMs: number;
}

const OllamaGenerateResponseSchema = z.object({
  response: z.string(),
});

/** Express nullable properties the way JSON Schema does (type arrays) */
export function toOllamaFormat(schema: JsonObjectSchema): Record<string, unknown> {
  const properties: Record<string, Record<string, unknown>> = {};
  for (const [key, property] of Object.entries(schema.properties)) {
    properties[key] = {
      type: property.nullable ? ['string', 'null'] : 'string',
      description: property.description,
      ...(property.enum && { enum: [...property.enum] }),
    };
  }
  return { type: 'object', properties, required: [...schema.required] };
}

export class OllamaGenerator implements TextGenerator {
  readonly name = 'ollama';

  constructor(private readonly settings: OllamaSettings) {}

  async generate(request: GenerateRequest): Promise<string> {
    const url = `${this.settings.host}/api/generate`;
    const body = {
      model: request.model,
      prompt: request.prompt,
      stream: false,
      format: request.mode === 'schema' ? toOllamaFormat(request.schema) : 'json',
      keep_alive: this.settings.keepAlive,
      options: {
        temperature: request.temperature,
        num_predict: request.maxTokens,
        num_ctx: this.settings.contextWindow,
        seed: request.seed,
        top_p: 1,
      },
    };

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'Accept': 'application/json' },
        body: JSON.stringify(body),
        signal: this.settings.timeoutMs > 0 ? AbortSignal.timeout(this.settings.timeoutMs) : undefined,
      });
    } catch (err) {
      const timedOut = err instanceof Error && err.name === 'TimeoutError';
      throw new ModelBackendError(
        timedOut
          ? `Ollama call timed out after ${this.settings.timeoutMs}ms (model ${request.model})`
          : `Ollama connection error at ${url}: ${err instanceof Error ? err.message : String(err)}`,
        this.name,
      );
    }

    if (!response.ok) {
      const detail = await response.text();
      throw new ModelBackendError(
        `Ollama error: ${response.status} ${response.statusText} for model ${request.model}: ${detail.slice(0, 200)}`,
        this.name,
        response.status,
      );
    }

    const parsed = OllamaGenerateResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ModelBackendError(`Ollama returned an unexpected payload for model ${request.model}`, this.name);
    }
    return parsed.data.response;
  }
}

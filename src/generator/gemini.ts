/**
 * Gemini Backend: Google Gemini with Structured Output
 *
 * Schema mode sets responseMimeType + responseSchema (converted from the
 * task's JSON schema); JSON mode sets responseMimeType only. The seed rides in
 * generationConfig next to temperature and maxOutputTokens.
 *
 * The Gemini client is a lazy singleton per generator instance.
 */

import { GoogleGenerativeAI, SchemaType } from '@google/generative-ai';
import type { GenerationConfig, ResponseSchema, Schema } from '@google/generative-ai';
import { ModelBackendError } from '../extraction/errors.js';
import type { GenerateRequest, JsonObjectSchema, TextGenerator } from './types.js';

export interface GeminiSettings {
  apiKey: string;
  timeoutMs: number;
}

/** Gemini's schema dialect: allowed values move into the description */
export function toGeminiSchema(schema: JsonObjectSchema): ResponseSchema {
  const properties: Record<string, Schema> = {};
  for (const [key, property] of Object.entries(schema.properties)) {
    const allowed = property.enum ? ` One of: ${property.enum.join(', ')}.` : '';
    properties[key] = {
      type: SchemaType.STRING,
      description: `${property.description}${allowed}`,
      nullable: property.nullable ?? false,
    };
  }
  return {
    type: SchemaType.OBJECT,
    properties,
    required: [...schema.required],
  };
}

export class GeminiGenerator implements TextGenerator {
  readonly name = 'gemini';

  private genAI: GoogleGenerativeAI | null = null;

  constructor(private readonly settings: GeminiSettings) {
    if (!settings.apiKey) {
      throw new Error(
        'Missing required environment variable: GEMINI_API_KEY. ' +
        'Copy .env.example to .env and fill in the required values.',
      );
    }
  }

  private getGenAI(): GoogleGenerativeAI {
    if (this.genAI) return this.genAI;
    this.genAI = new GoogleGenerativeAI(this.settings.apiKey);
    return this.genAI;
  }

  async generate(request: GenerateRequest): Promise<string> {
    const generationConfig: GenerationConfig & { seed: number } = {
      responseMimeType: 'application/json',
      temperature: request.temperature,
      maxOutputTokens: request.maxTokens,
      seed: request.seed,
      ...(request.mode === 'schema' && { responseSchema: toGeminiSchema(request.schema) }),
    };

    const model = this.getGenAI().getGenerativeModel(
      { model: request.model, generationConfig },
      this.settings.timeoutMs > 0 ? { timeout: this.settings.timeoutMs } : undefined,
    );

    try {
      const result = await model.generateContent(request.prompt);
      return result.response.text();
    } catch (err) {
      throw new ModelBackendError(
        `Gemini call failed for model ${request.model}: ${err instanceof Error ? err.message : String(err)}`,
        this.name,
      );
    }
  }
}

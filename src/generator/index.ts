// ============================================================================
// Generator Module: Barrel Export
// ============================================================================
//
// Text-generation backends behind the TextGenerator contract, and the factory
// that picks one from extraction configuration.

import { GeminiGenerator } from './gemini.js';
import { OllamaGenerator } from './ollama.js';
import { withSlowCallWarning } from './timing.js';
import type { ExtractionConfig } from '../extraction/config.js';
import type { TextGenerator } from './types.js';

export type {
  GenerateRequest,
  JsonObjectSchema,
  JsonStringProperty,
  OutputMode,
  TextGenerator,
} from './types.js';

export { OllamaGenerator, toOllamaFormat } from './ollama.js';
export type { OllamaSettings } from './ollama.js';
export { GeminiGenerator, toGeminiSchema } from './gemini.js';
export type { GeminiSettings } from './gemini.js';
export { withSlowCallWarning } from './timing.js';

type GeneratorConfig = Pick<
  ExtractionConfig,
  'backend' | 'ollamaHost' | 'ollamaKeepAlive' | 'geminiApiKey' | 'contextWindow' | 'timeoutMs' | 'warnMs'
>;

function buildBackend(config: GeneratorConfig): TextGenerator {
  switch (config.backend) {
    case 'ollama':
      return new OllamaGenerator({
        host: config.ollamaHost,
        keepAlive: config.ollamaKeepAlive,
        contextWindow: config.contextWindow,
        timeoutMs: config.timeoutMs,
      });
    case 'gemini':
      return new GeminiGenerator({
        apiKey: config.geminiApiKey,
        timeoutMs: config.timeoutMs,
      });
  }
}

/** Build the configured backend, wrapped with slow-call warnings */
export function createGenerator(config: GeneratorConfig): TextGenerator {
  return withSlowCallWarning(buildBackend(config), config.warnMs);
}

/**
 * Slow-call instrumentation for text-generation backends.
 */

import type { GenerateRequest, TextGenerator } from './types.js';

/**
 * Wrap a generator so that every call exceeding `warnMs` logs a warning.
 * A `warnMs` of 0 returns the generator unchanged.
 */
export function withSlowCallWarning(generator: TextGenerator, warnMs: number): TextGenerator {
  if (warnMs <= 0) return generator;

  return {
    name: generator.name,
    async generate(request: GenerateRequest): Promise<string> {
      const start = Date.now();
      try {
        return await generator.generate(request);
      } finally {
        const elapsedMs = Date.now() - start;
        if (elapsedMs > warnMs) {
          console.warn('[generator] Slow model call', {
            backend: generator.name,
            model: request.model,
            mode: request.mode,
            elapsedMs,
            warnMs,
          });
        }
      }
    },
  };
}

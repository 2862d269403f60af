/**
 * Model Extraction Engine
 *
 * Runs the model-backed half of the pipeline against any TextGenerator:
 * - classifyText: category + priority from subject and trimmed body
 * - extractInvoice: eleven invoice fields, gaps filled by the regex fallback
 *   when the model returns two or fewer
 * - extractCustomerRequestSummary: short summary of a customer request
 * - runExtraction: classify, then extract for Invoice / Customer Requests
 *
 * Output shape is enforced in three escalating attempts: schema-constrained
 * generation with a strict parse, then generic JSON mode with a lenient parse
 * (code fences stripped, first balanced JSON value scanned out). Anything
 * still unreadable is a ModelOutputError.
 *
 * Every generation is seeded from the external message id and the prompt, so
 * the same message yields the same request. Logs carry lengths, elapsed time
 * and a short input hash; never message text.
 *
 * Consumers: enrichment/worker.ts
 */

import { extractionConfig } from './config.js';
import type { ExtractionConfig } from './config.js';
import {
  computeTicketNumber,
  deterministicSeed,
  shortHash,
  yyyymmddFromIso,
} from './determinism.js';
import { ModelOutputError, ValidationError } from './errors.js';
import { fallbackInvoiceParse, mergeMissingFields } from './invoice-fallback.js';
import { parseLenientJson, parseStrictJson } from './json-recovery.js';
import {
  CLASSIFICATION_SCHEMA,
  CLASSIFY_INSTRUCTIONS,
  INVOICE_INSTRUCTIONS,
  INVOICE_SCHEMA,
  REQUEST_INSTRUCTIONS,
  REQUEST_SCHEMA,
  composeEmailText,
  trimText,
} from './prompts.js';
import {
  InvoiceFieldsSchema,
  RawClassificationSchema,
  RequestSummarySchema,
  countPopulated,
  isCategory,
  isPriority,
} from './types.js';
import type {
  Category,
  Classification,
  ExtractionPayload,
  InvoiceFields,
  Priority,
  RawExtraction,
} from './types.js';
import type { JsonObjectSchema, TextGenerator } from '../generator/types.js';

/** Invoice results with this many populated fields or fewer get the regex pass */
const SPARSE_INVOICE_THRESHOLD = 2;

export type EngineSettings = Pick<
  ExtractionConfig,
  | 'classifierModel'
  | 'invoiceModel'
  | 'requestModel'
  | 'temperature'
  | 'maxTokens'
  | 'invoiceMaxTokens'
  | 'classifyMaxChars'
  | 'extractMaxChars'
  | 'ticketPrefix'
>;

interface TaskDefinition {
  task: 'classify' | 'invoice' | 'request';
  model: string;
  instructions: string;
  schema: JsonObjectSchema;
  maxTokens: number;
}

// ---------------------------------------------------------------------------
// Label normalization
// ---------------------------------------------------------------------------

function titleCase(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/\b[a-z]/g, (ch) => ch.toUpperCase());
}

/**
 * Map a model's category label onto the closed set. Exact labels (any case)
 * pass; "invoice…" and "customer request…" match by prefix; anything
 * mentioning "misc" is Misc; the rest is General.
 */
export function normalizeCategory(value: string | null): Category {
  if (!value) return 'General';
  const titled = titleCase(value);
  if (isCategory(titled)) return titled;

  const lower = titled.toLowerCase();
  if (lower.startsWith('invoice')) return 'Invoice';
  if (lower.startsWith('customer request')) return 'Customer Requests';
  if (lower.includes('misc')) return 'Misc';
  return 'General';
}

/** Unknown or missing priorities become Low */
export function normalizePriority(value: string | null): Priority {
  if (!value) return 'Low';
  const titled = titleCase(value);
  return isPriority(titled) ? titled : 'Low';
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class ExtractionEngine {
  constructor(
    private readonly generator: TextGenerator,
    private readonly settings: EngineSettings = extractionConfig,
  ) {}

  /**
   * Generate and parse a JSON value for one task.
   *
   * @throws ModelOutputError when neither attempt yields JSON
   * @throws ModelBackendError when the JSON-mode call itself fails
   */
  async generateJson(definition: TaskDefinition, externalId: string, text: string): Promise<unknown> {
    const prompt = `${definition.instructions}\n\n${text}`;
    const request = {
      model: definition.model,
      prompt,
      schema: definition.schema,
      seed: deterministicSeed(externalId, prompt),
      temperature: this.settings.temperature,
      maxTokens: definition.maxTokens,
    };
    const inputHash = shortHash(text);

    try {
      const raw = await this.generator.generate({ ...request, mode: 'schema' });
      return parseStrictJson(raw);
    } catch (err) {
      console.warn('[extraction] Schema-mode attempt failed, retrying in JSON mode', {
        task: definition.task,
        externalId,
        inputHash,
        error: err instanceof Error ? err.message : String(err),
      });
    }

    const raw = await this.generator.generate({ ...request, mode: 'json' });
    return parseLenientJson(raw);
  }

  private async timed<T>(
    definition: TaskDefinition,
    externalId: string,
    text: string,
    run: () => Promise<T>,
  ): Promise<T> {
    const inputHash = shortHash(text);
    const start = Date.now();
    console.log('[extraction] Task started', {
      task: definition.task,
      model: definition.model,
      externalId,
      inputChars: text.length,
      inputHash,
    });

    try {
      const result = await run();
      console.log('[extraction] Task completed', {
        task: definition.task,
        externalId,
        inputHash,
        elapsedMs: Date.now() - start,
      });
      return result;
    } catch (err) {
      console.error('[extraction] Task failed', {
        task: definition.task,
        externalId,
        inputHash,
        elapsedMs: Date.now() - start,
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  /** Category and priority from the subject and the trimmed body (no attachments) */
  async classifyText(
    externalId: string,
    subject: string | null | undefined,
    bodyText: string,
  ): Promise<Classification> {
    const definition: TaskDefinition = {
      task: 'classify',
      model: this.settings.classifierModel,
      instructions: CLASSIFY_INSTRUCTIONS,
      schema: CLASSIFICATION_SCHEMA,
      maxTokens: this.settings.maxTokens,
    };
    const text = composeEmailText(subject, trimText(bodyText, this.settings.classifyMaxChars));

    return this.timed(definition, externalId, text, async () => {
      const json = await this.generateJson(definition, externalId, text);
      const parsed = RawClassificationSchema.safeParse(json);
      if (!parsed.success) {
        throw new ModelOutputError('Classification response is not a JSON object', JSON.stringify(json).length);
      }
      return {
        category: normalizeCategory(parsed.data.category),
        priority: normalizePriority(parsed.data.priority),
      };
    });
  }

  /** Invoice fields from the labelled extraction text */
  async extractInvoice(externalId: string, text: string): Promise<InvoiceFields> {
    const definition: TaskDefinition = {
      task: 'invoice',
      model: this.settings.invoiceModel,
      instructions: INVOICE_INSTRUCTIONS,
      schema: INVOICE_SCHEMA,
      maxTokens: this.settings.invoiceMaxTokens,
    };

    return this.timed(definition, externalId, text, async () => {
      const json = await this.generateJson(definition, externalId, text);
      const parsed = InvoiceFieldsSchema.safeParse(json);
      if (!parsed.success) {
        throw new ModelOutputError('Invoice response is not a JSON object', JSON.stringify(json).length);
      }

      const fields: InvoiceFields = parsed.data;
      const populated = countPopulated(fields);
      if (populated > SPARSE_INVOICE_THRESHOLD) return fields;

      const merged = mergeMissingFields(fields, fallbackInvoiceParse(text));
      console.log('[extraction] Sparse invoice result reconciled with pattern fallback', {
        externalId,
        fieldsBefore: populated,
        fieldsAfter: countPopulated(merged),
      });
      return merged;
    });
  }

  /**
   * Short summary of a customer request.
   *
   * @throws ModelOutputError when the model returns no summary text
   */
  async extractCustomerRequestSummary(externalId: string, text: string): Promise<string> {
    const definition: TaskDefinition = {
      task: 'request',
      model: this.settings.requestModel,
      instructions: REQUEST_INSTRUCTIONS,
      schema: REQUEST_SCHEMA,
      maxTokens: this.settings.maxTokens,
    };

    return this.timed(definition, externalId, text, async () => {
      const json = await this.generateJson(definition, externalId, text);
      const parsed = RequestSummarySchema.safeParse(json);
      if (!parsed.success || parsed.data.summary === null) {
        throw new ModelOutputError('Request summary is missing or empty', JSON.stringify(json).length);
      }
      return parsed.data.summary;
    });
  }

  /**
   * One classify → conditional-extract pass.
   *
   * @throws ValidationError when the payload has no body text
   */
  async runExtraction(payload: ExtractionPayload): Promise<RawExtraction> {
    if (!payload.bodyText || payload.bodyText.trim() === '') {
      throw new ValidationError(`Body text is required for extraction (message ${payload.externalId})`);
    }

    const { externalId, subject } = payload;
    const classification = await this.classifyText(externalId, subject, payload.bodyText);
    const result: RawExtraction = { ...classification };

    const maxChars = this.settings.extractMaxChars;
    const extractionText = () =>
      composeEmailText(
        subject,
        trimText(payload.bodyText, maxChars),
        (payload.attachmentTexts ?? []).map((text) => trimText(text, maxChars)),
      );

    switch (classification.category) {
      case 'Invoice':
        result.invoice = await this.extractInvoice(externalId, extractionText());
        break;
      case 'Customer Requests': {
        const summary = await this.extractCustomerRequestSummary(externalId, extractionText());
        const ticketNumber = computeTicketNumber(
          yyyymmddFromIso(payload.receivedAt),
          externalId,
          this.settings.ticketPrefix,
        );
        result.request = { summary, ticket_number: ticketNumber };
        break;
      }
      case 'General':
      case 'Misc':
        break;
    }

    return result;
  }
}

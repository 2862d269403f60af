/**
 * Tests for the Model Extraction Engine
 *
 * Tests cover:
 * - Label normalization (prefix/substring coercion, unknown priorities)
 * - Output-shape escalation: schema mode → JSON mode → ModelOutputError
 * - Deterministic seeding from id + prompt
 * - Invoice reconciliation with the regex fallback (fills only nulls)
 * - Customer request summary + ticket number
 * - Body validation
 *
 * The backend is a scripted in-process TextGenerator.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ExtractionEngine, normalizeCategory, normalizePriority } from '../engine.js';
import type { EngineSettings } from '../engine.js';
import { deterministicSeed } from '../determinism.js';
import { ModelBackendError, ModelOutputError, ValidationError } from '../errors.js';
import type { GenerateRequest, TextGenerator } from '../../generator/types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const SETTINGS: EngineSettings = {
  classifierModel: 'clf',
  invoiceModel: 'inv',
  requestModel: 'req',
  temperature: 0,
  maxTokens: 200,
  invoiceMaxTokens: 400,
  classifyMaxChars: 4000,
  extractMaxChars: 12000,
  ticketPrefix: 'REQ-',
};

type Responder = (request: GenerateRequest) => string | Error;

class ScriptedGenerator implements TextGenerator {
  readonly name = 'scripted';
  readonly requests: GenerateRequest[] = [];

  constructor(private readonly respond: Responder) {}

  async generate(request: GenerateRequest): Promise<string> {
    this.requests.push(request);
    const output = this.respond(request);
    if (output instanceof Error) throw output;
    return output;
  }
}

function byModel(responses: Record<string, string>): Responder {
  return (request) => responses[request.model] ?? new Error(`unexpected model ${request.model}`);
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('label normalization', () => {
  it('accepts exact labels in any case', () => {
    expect(normalizeCategory('customer requests')).toBe('Customer Requests');
    expect(normalizeCategory('MISC')).toBe('Misc');
  });

  it('coerces by prefix and substring', () => {
    expect(normalizeCategory('Invoices')).toBe('Invoice');
    expect(normalizeCategory('Customer Request - access')).toBe('Customer Requests');
    expect(normalizeCategory('Miscellaneous')).toBe('Misc');
  });

  it('defaults unknown categories to General', () => {
    expect(normalizeCategory('Spam')).toBe('General');
    expect(normalizeCategory(null)).toBe('General');
  });

  it('defaults unknown priorities to Low', () => {
    expect(normalizePriority('high')).toBe('High');
    expect(normalizePriority('urgent')).toBe('Low');
    expect(normalizePriority(null)).toBe('Low');
  });
});

describe('ExtractionEngine', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  describe('classifyText', () => {
    it('uses schema mode first and normalizes labels', async () => {
      const generator = new ScriptedGenerator(() => '{"category":"invoices","priority":"high"}');
      const engine = new ExtractionEngine(generator, SETTINGS);

      const result = await engine.classifyText('msg-1', 'Bill', 'Please pay');

      expect(result).toEqual({ category: 'Invoice', priority: 'High' });
      expect(generator.requests).toHaveLength(1);
      expect(generator.requests[0]).toMatchObject({ model: 'clf', mode: 'schema', temperature: 0, maxTokens: 200 });
    });

    it('retries in JSON mode with lenient parsing when schema mode output is unreadable', async () => {
      const generator = new ScriptedGenerator((request) =>
        request.mode === 'schema'
          ? 'not json'
          : '```json\n{"category":"Customer Request","priority":"urgent"}\n```',
      );
      const engine = new ExtractionEngine(generator, SETTINGS);

      const result = await engine.classifyText('msg-1', null, 'Can you help?');

      expect(result).toEqual({ category: 'Customer Requests', priority: 'Low' });
      expect(generator.requests.map((request) => request.mode)).toEqual(['schema', 'json']);
    });

    it('retries in JSON mode when the schema-mode call fails', async () => {
      const generator = new ScriptedGenerator((request) =>
        request.mode === 'schema'
          ? new ModelBackendError('schema not supported', 'scripted', 400)
          : 'Answer: {"category":"Misc","priority":"Medium"}',
      );
      const engine = new ExtractionEngine(generator, SETTINGS);

      await expect(engine.classifyText('msg-1', null, 'Lunch?')).resolves.toEqual({
        category: 'Misc',
        priority: 'Medium',
      });
    });

    it('throws ModelOutputError when both attempts are unreadable', async () => {
      const generator = new ScriptedGenerator(() => 'still not json');
      const engine = new ExtractionEngine(generator, SETTINGS);

      await expect(engine.classifyText('msg-1', null, 'text')).rejects.toBeInstanceOf(ModelOutputError);
    });

    it('propagates a JSON-mode backend failure', async () => {
      const generator = new ScriptedGenerator(() => new ModelBackendError('connection refused', 'scripted'));
      const engine = new ExtractionEngine(generator, SETTINGS);

      await expect(engine.classifyText('msg-1', null, 'text')).rejects.toBeInstanceOf(ModelBackendError);
    });

    it('seeds each request from the external id and prompt', async () => {
      const generator = new ScriptedGenerator(() => '{"category":"General","priority":"Low"}');
      const engine = new ExtractionEngine(generator, SETTINGS);

      await engine.classifyText('msg-1', 'Hello', 'Body');
      await engine.classifyText('msg-1', 'Hello', 'Body');
      await engine.classifyText('msg-2', 'Hello', 'Body');

      const [first, second, third] = generator.requests;
      expect(first?.seed).toBe(deterministicSeed('msg-1', first?.prompt ?? ''));
      expect(second?.seed).toBe(first?.seed);
      expect(third?.seed).not.toBe(first?.seed);
    });

    it('sends the trimmed body without attachments', async () => {
      const generator = new ScriptedGenerator(() => '{"category":"General","priority":"Low"}');
      const engine = new ExtractionEngine(generator, SETTINGS);

      await engine.classifyText('msg-1', 'Hi', 'x'.repeat(5000));

      const prompt = generator.requests[0]?.prompt ?? '';
      expect(prompt).toContain('Subject: Hi');
      expect(prompt).toContain('x'.repeat(4000));
      expect(prompt).not.toContain('x'.repeat(4001));
      expect(prompt).not.toContain('--- Attachment');
    });
  });

  describe('runExtraction', () => {
    it('extracts an invoice and reconciles sparse fields from the text (only nulls filled)', async () => {
      const generator = new ScriptedGenerator(
        byModel({
          clf: '{"category":"Invoice","priority":"Low"}',
          inv: '{"invoice_number":"INV-7","invoice_date":null}',
        }),
      );
      const engine = new ExtractionEngine(generator, SETTINGS);

      const result = await engine.runExtraction({
        externalId: 'inv-msg-1',
        subject: 'Monthly services',
        bodyText: 'Please find attached.',
        attachmentTexts: [
          'Invoice Number: INV-7001\nInvoice Date: 2025-08-01\nDue Date: 2025-08-15\nTotal: $480.00',
        ],
      });

      expect(result.category).toBe('Invoice');
      expect(result.priority).toBe('Low');
      expect(result.invoice).toEqual({
        invoice_number: 'INV-7',
        invoice_date: '2025-08-01',
        due_date: '2025-08-15',
        invoice_amount: '$480.00',
        payment_link: null,
        bsb: null,
        account_number: null,
        account_name: null,
        biller_code: null,
        payment_reference: null,
        description: null,
      });
      expect(result.request).toBeUndefined();

      const invoiceRequest = generator.requests.find((request) => request.model === 'inv');
      expect(invoiceRequest?.maxTokens).toBe(400);
      expect(invoiceRequest?.prompt).toContain('--- Attachment 1 ---');
    });

    it('keeps a well-populated invoice result as returned', async () => {
      const generator = new ScriptedGenerator(
        byModel({
          clf: '{"category":"Invoice","priority":"Medium"}',
          inv: '{"invoice_number":"INV-9","invoice_amount":"$10.00","bsb":"062-000"}',
        }),
      );
      const engine = new ExtractionEngine(generator, SETTINGS);

      const result = await engine.runExtraction({
        externalId: 'inv-msg-2',
        bodyText: 'Invoice INV-9\nDue Date: 2025-09-01',
      });

      expect(result.invoice).toMatchObject({
        invoice_number: 'INV-9',
        invoice_amount: '$10.00',
        bsb: '062-000',
        due_date: null,
      });
    });

    it('summarizes a customer request and assigns a ticket number', async () => {
      const generator = new ScriptedGenerator(
        byModel({
          clf: '{"category":"Customer Requests","priority":"High"}',
          req: '{"summary":"  Offboard a leaver by Friday. "}',
        }),
      );
      const engine = new ExtractionEngine(generator, SETTINGS);

      const result = await engine.runExtraction({
        externalId: 'CRQ-offboard-urgent-001',
        subject: 'Offboarding',
        bodyText: 'Please remove access for a leaver by Friday.',
        receivedAt: '2025-08-27T06:50:00Z',
      });

      expect(result).toEqual({
        category: 'Customer Requests',
        priority: 'High',
        request: { summary: 'Offboard a leaver by Friday.', ticket_number: 'REQ-20250827-ENT001' },
      });
    });

    it('rejects an empty summary', async () => {
      const generator = new ScriptedGenerator(
        byModel({
          clf: '{"category":"Customer Requests","priority":"Low"}',
          req: '{"summary":"   "}',
        }),
      );
      const engine = new ExtractionEngine(generator, SETTINGS);

      await expect(
        engine.runExtraction({ externalId: 'msg-3', bodyText: 'Need help' }),
      ).rejects.toBeInstanceOf(ModelOutputError);
    });

    it('stops after classification for General mail', async () => {
      const generator = new ScriptedGenerator(byModel({ clf: '{"category":"General","priority":"Medium"}' }));
      const engine = new ExtractionEngine(generator, SETTINGS);

      const result = await engine.runExtraction({ externalId: 'msg-4', bodyText: 'FYI' });

      expect(result).toEqual({ category: 'General', priority: 'Medium' });
      expect(generator.requests).toHaveLength(1);
    });

    it('rejects a payload without body text before calling the backend', async () => {
      const generator = new ScriptedGenerator(() => '{}');
      const engine = new ExtractionEngine(generator, SETTINGS);

      await expect(engine.runExtraction({ externalId: 'msg-5', bodyText: '   ' })).rejects.toBeInstanceOf(
        ValidationError,
      );
      expect(generator.requests).toHaveLength(0);
    });
  });
});

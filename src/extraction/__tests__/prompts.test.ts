/**
 * Tests for prompt text composition and response schemas
 */

import { describe, it, expect } from 'vitest';
import { CLASSIFICATION_SCHEMA, INVOICE_SCHEMA, composeEmailText, trimText } from '../prompts.js';
import { INVOICE_FIELD_KEYS } from '../types.js';

describe('trimText', () => {
  it('trims then cuts to the limit', () => {
    expect(trimText('  abcdefg ', 3)).toBe('abc');
  });

  it('returns empty text for missing input', () => {
    expect(trimText(null, 5)).toBe('');
  });
});

describe('composeEmailText', () => {
  it('labels subject, body and each non-empty attachment', () => {
    expect(composeEmailText('  Hi ', ' body ', ['a', ' ', 'b'])).toBe(
      'Subject: Hi\n\nEmail Body:\n\nbody\n\n\nAttachments:\n\n--- Attachment 1 ---\na\n\n--- Attachment 3 ---\nb',
    );
  });

  it('omits the subject and attachment sections when absent', () => {
    expect(composeEmailText(null, 'body')).toBe('Email Body:\n\nbody');
  });
});

describe('response schemas', () => {
  it('constrains classification labels', () => {
    expect(CLASSIFICATION_SCHEMA.properties.category?.enum).toEqual(['General', 'Invoice', 'Customer Requests', 'Misc']);
    expect(CLASSIFICATION_SCHEMA.required).toEqual(['category', 'priority']);
  });

  it('declares every invoice field as a nullable string', () => {
    expect(Object.keys(INVOICE_SCHEMA.properties)).toEqual([...INVOICE_FIELD_KEYS]);
    for (const property of Object.values(INVOICE_SCHEMA.properties)) {
      expect(property.nullable).toBe(true);
    }
  });
});

/**
 * JSON Output Recovery
 *
 * Turns raw model text into a parsed JSON value. Models wrap JSON in code
 * fences, prefix it with chatter, or trail it with explanations; the scanner
 * below finds the first balanced object/array in such text.
 *
 * The scanner is an explicit state machine over four states:
 *   seek  : before the first `{` or `[`
 *   value : inside the value, tracking an open-bracket stack
 *   string: inside a JSON string literal (brackets are ignored)
 *   escape: the character after a backslash inside a string
 */

import { ModelOutputError } from './errors.js';

type ScanState = 'seek' | 'value' | 'string' | 'escape';

const OPENERS: Readonly<Record<string, string>> = { '}': '{', ']': '[' };

/** Remove a leading ``` fence line (with optional language tag) and its closing fence */
export function stripCodeFences(raw: string): string {
  const text = raw.trim();
  if (!text.startsWith('```')) return text;

  const lines = text.split(/\r?\n/).slice(1);
  const last = lines[lines.length - 1];
  if (last !== undefined && last.trim().startsWith('```')) {
    lines.pop();
  }
  return lines.join('\n').trim();
}

/**
 * Return the first balanced JSON object or array substring, or null when the
 * first candidate is unterminated or its brackets are mismatched.
 */
export function findFirstJsonValue(text: string): string | null {
  let state: ScanState = 'seek';
  let start = -1;
  const stack: string[] = [];

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);

    switch (state) {
      case 'seek':
        if (ch === '{' || ch === '[') {
          start = i;
          stack.push(ch);
          state = 'value';
        }
        break;

      case 'string':
        if (ch === '\\') state = 'escape';
        else if (ch === '"') state = 'value';
        break;

      case 'escape':
        state = 'string';
        break;

      case 'value':
        if (ch === '"') {
          state = 'string';
        } else if (ch === '{' || ch === '[') {
          stack.push(ch);
        } else if (ch === '}' || ch === ']') {
          if (stack.pop() !== OPENERS[ch]) return null;
          if (stack.length === 0) return text.slice(start, i + 1);
        }
        break;
    }
  }

  return null;
}

/** Strict parse: fences stripped, whole text must be JSON */
export function parseStrictJson(raw: string): unknown {
  return JSON.parse(stripCodeFences(raw));
}

/**
 * Lenient parse: strict first, then the first balanced JSON substring.
 *
 * @throws ModelOutputError when neither yields valid JSON
 */
export function parseLenientJson(raw: string): unknown {
  const text = stripCodeFences(raw);
  try {
    return JSON.parse(text);
  } catch {
    const candidate = findFirstJsonValue(text);
    if (candidate === null) {
      throw new ModelOutputError('No JSON object or array found in model response', raw.length);
    }
    try {
      return JSON.parse(candidate);
    } catch {
      throw new ModelOutputError('Balanced JSON candidate in model response is not valid JSON', raw.length);
    }
  }
}

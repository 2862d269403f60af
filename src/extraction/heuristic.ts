/**
 * Heuristic Classifier
 *
 * Keyword scorer used twice by the enrichment worker: as a logged soft
 * classification before the model call, and as the classifier of last resort
 * when the model path fails. Pure and synchronous; it never throws.
 *
 * - Text: lower-cased subject + body + attachment names
 * - Priority: High when any urgency keyword appears, else Low (never Medium)
 * - Category: first rule in table order with a matching keyword, else General
 */

import { DEFAULT_CATEGORY_RULES, DEFAULT_URGENCY_KEYWORDS } from './keywords.js';
import type { CategoryRule } from './keywords.js';
import type { Category, Priority } from './types.js';

export interface HeuristicInput {
  subject?: string | null;
  body?: string | null;
  attachmentNames?: readonly string[] | null;
}

export interface HeuristicOptions {
  urgencyKeywords?: readonly string[];
  rules?: readonly CategoryRule[];
}

export interface HeuristicResult {
  category: Category;
  priority: Priority;
  /** Rule that decided the category; null when nothing matched */
  rule: string | null;
}

function heuristicText(input: HeuristicInput): string {
  const names = Array.isArray(input.attachmentNames)
    ? input.attachmentNames.filter((name): name is string => typeof name === 'string')
    : [];
  return [input.subject ?? '', input.body ?? '', names.join(' ')].join(' ').toLowerCase();
}

export function classifyHeuristically(
  input: HeuristicInput,
  options: HeuristicOptions = {},
): HeuristicResult {
  const text = heuristicText(input);
  const urgencyKeywords = options.urgencyKeywords ?? DEFAULT_URGENCY_KEYWORDS;
  const rules = options.rules ?? DEFAULT_CATEGORY_RULES;

  const priority: Priority = urgencyKeywords.some((word) => text.includes(word)) ? 'High' : 'Low';

  for (const rule of rules) {
    if (rule.keywords.some((keyword) => text.includes(keyword))) {
      return { category: rule.category, priority, rule: rule.rule };
    }
  }

  return { category: 'General', priority, rule: null };
}

/**
 * Heuristic keyword tables.
 *
 * Rule order is significant: the heuristic classifier returns the category of
 * the FIRST rule with a matching keyword, so the table is an array.
 * Deployments can replace the table with a JSON file (CATEGORY_KEYWORDS_FILE)
 * shaped like config/category-keywords.example.json.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { CATEGORIES } from './types.js';
import type { Category } from './types.js';

export interface CategoryRule {
  /** Name logged when the rule fires */
  rule: string;
  category: Category;
  keywords: string[];
}

export const DEFAULT_URGENCY_KEYWORDS: readonly string[] = [
  'urgent',
  'asap',
  'immediate',
  'important',
  'high priority',
];

export const DEFAULT_CATEGORY_RULES: readonly CategoryRule[] = [
  { rule: 'invoice', category: 'Invoice', keywords: ['invoice', 'bill', 'statement'] },
  { rule: 'service request', category: 'Customer Requests', keywords: ['issue', 'support', 'ticket'] },
  { rule: 'team member request', category: 'Customer Requests', keywords: ['access', 'permission', 'request'] },
  { rule: 'customer request', category: 'Customer Requests', keywords: ['client', 'customer', 'enquiry', 'inquiry'] },
  { rule: 'meeting', category: 'Misc', keywords: ['meeting', 'calendar', 'invite'] },
  { rule: 'timesheets', category: 'Misc', keywords: ['timesheet', 'approval', 'work hours'] },
];

const CategoryRuleFileSchema = z.array(
  z.object({
    rule: z.string().min(1),
    category: z.enum(CATEGORIES),
    keywords: z.array(z.string().trim().toLowerCase().min(1)).min(1),
  }),
).min(1);

/**
 * Load an ordered category rule table from a JSON file.
 *
 * @throws Error naming the file when it cannot be read or fails validation
 */
export function loadCategoryRules(path: string): CategoryRule[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new Error(
      `Cannot read category keyword file ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const parsed = CategoryRuleFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid category keyword file ${path}: ${parsed.error.message}`);
  }
  return parsed.data;
}

/** Split a comma-separated keyword list, lower-casing and dropping blanks */
export function parseKeywordList(value: string): string[] {
  return value
    .split(',')
    .map((word) => word.trim().toLowerCase())
    .filter((word) => word.length > 0);
}

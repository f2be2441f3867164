/**
 * Keyword categorizer for activity descriptions.
 *
 * Used when the vision model omits the category or returns one outside the
 * closed set. Rules live in data/category-rules.json: each keyword found in
 * the lower-cased "activity details" text scores one point for its category,
 * and the highest score wins (earlier categories win ties).
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { ACTIVITY_CATEGORIES, type ActivityCategory } from '../db/schema.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const RULES_PATH = join(__dirname, '../../data/category-rules.json');

const rulesSchema = z.record(z.enum(ACTIVITY_CATEGORIES), z.array(z.string().min(1)));

export type CategoryRules = z.infer<typeof rulesSchema>;

export interface Categorization {
  category: ActivityCategory;
  confidence: number;
  keywords: string[];
}

const FALLBACK: Categorization = { category: 'Other', confidence: 0.5, keywords: [] };

let cachedRules: CategoryRules | null = null;

export function loadCategoryRules(path: string = RULES_PATH): CategoryRules {
  const parsed = rulesSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
  if (!parsed.success) {
    throw new Error(`Invalid category rules in ${path}: ${parsed.error.message}`);
  }
  return parsed.data;
}

function defaultRules(): CategoryRules {
  if (!cachedRules) cachedRules = loadCategoryRules();
  return cachedRules;
}

/** Confidence grows with the number of matched keywords. */
function confidenceFor(matches: number): number {
  if (matches >= 3) return 0.95;
  if (matches === 2) return 0.85;
  return 0.75;
}

export function categorizeActivity(
  activity: string | null,
  details: string | null = null,
  rules: CategoryRules = defaultRules(),
): Categorization {
  if (!activity) return FALLBACK;

  const text = `${activity} ${details ?? ''}`.toLowerCase();

  let best: { category: ActivityCategory; keywords: string[] } | null = null;
  for (const category of ACTIVITY_CATEGORIES) {
    const matched = (rules[category] ?? []).filter((kw) => text.includes(kw));
    if (matched.length > 0 && (!best || matched.length > best.keywords.length)) {
      best = { category, keywords: matched };
    }
  }

  if (!best) return FALLBACK;
  return {
    category: best.category,
    confidence: confidenceFor(best.keywords.length),
    keywords: best.keywords,
  };
}

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

export interface CategoryRule {
  category: string;
  keywords: string[];
}

const DEFAULT_TABLE = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../data/categories.json');

function isCategoryRule(value: unknown): value is CategoryRule {
  return (
    typeof value === 'object' &&
    value !== null &&
    'category' in value &&
    typeof value.category === 'string' &&
    'keywords' in value &&
    Array.isArray(value.keywords) &&
    value.keywords.every((k: unknown) => typeof k === 'string')
  );
}

export function loadCategoryRules(filePath: string = DEFAULT_TABLE): CategoryRule[] {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  if (!Array.isArray(parsed) || !parsed.every(isCategoryRule)) {
    throw new Error(`Invalid category table: ${filePath}`);
  }
  return parsed;
}

/** First rule with a keyword contained in the upper-cased description wins. */
export function createCategorizer(rules: readonly CategoryRule[]): (description: string) => string | undefined {
  const prepared = rules.map((rule) => ({
    category: rule.category,
    keywords: rule.keywords.map((k) => k.toUpperCase()),
  }));
  return (description) => {
    const haystack = description.toUpperCase();
    return prepared.find((rule) => rule.keywords.some((k) => haystack.includes(k)))?.category;
  };
}

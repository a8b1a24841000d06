import fs from 'fs';
import type { TagRule } from '../models/tagging';
import { parseCsvRows } from '../utils/csv';
import type { CsvRow } from '../utils/csv';
import { toTagName } from '../utils/text';

const FALLBACK_RULE: TagRule = {
  tag: 'GENERAL',
  mainCategory: 'General',
  subCategory: '',
  description: 'General category',
  examples: [],
  displayName: 'General',
};

/**
 * Read-only set of valid tag names and the rules behind them. Built once at
 * startup and shared by reference; every accessor hands out frozen data.
 */
export class TagRegistry {
  readonly tagNames: readonly string[];
  private readonly rules: ReadonlyMap<string, Readonly<TagRule>>;

  constructor(rules: TagRule[]) {
    const byTag = new Map<string, Readonly<TagRule>>();
    for (const rule of rules) {
      if (!byTag.has(rule.tag)) {
        byTag.set(rule.tag, Object.freeze({ ...rule, examples: Object.freeze([...rule.examples]) }));
      }
    }
    this.rules = byTag;
    this.tagNames = Object.freeze(Array.from(byTag.keys()));
    Object.freeze(this);
  }

  get size(): number {
    return this.tagNames.length;
  }

  has(tag: string): boolean {
    return this.rules.has(tag);
  }

  get(tag: string): Readonly<TagRule> | undefined {
    return this.rules.get(tag);
  }

  list(): Array<Readonly<TagRule>> {
    return Array.from(this.rules.values());
  }

  static fallback(): TagRegistry {
    return new TagRegistry([FALLBACK_RULE]);
  }
}

export function parseTagRules(text: string): TagRule[] {
  const rules: TagRule[] = [];

  for (const row of parseCsvRows(text)) {
    const mainCategory = pick(row, ['main_category', 'maincategory', 'category']);
    if (!mainCategory) {
      continue;
    }

    const subCategory = pick(row, ['sub_category', 'subcategory']);
    const tag = toTagName(subCategory || mainCategory);
    if (!tag) {
      continue;
    }

    const examples = pick(row, ['examples', 'example'])
      .split(',')
      .map(example => example.trim())
      .filter(example => example.length > 0);

    rules.push({
      tag,
      mainCategory,
      subCategory,
      description: pick(row, ['description']),
      examples,
      displayName: subCategory ? `${mainCategory} - ${subCategory}` : mainCategory,
    });
  }

  return rules;
}

export function loadTagRegistry(filePath: string): TagRegistry {
  let rules: TagRule[] = [];
  try {
    rules = parseTagRules(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    console.error(`[TAGGING] Failed to load tag rules from ${filePath}`, error);
  }

  if (rules.length === 0) {
    console.warn('[TAGGING] No tag rules loaded; using fallback GENERAL tag');
    return TagRegistry.fallback();
  }

  const registry = new TagRegistry(rules);
  console.log(`[TAGGING] Loaded ${registry.size} tags from ${filePath}`);
  return registry;
}

function pick(row: CsvRow, keys: string[]): string {
  for (const key of keys) {
    const value = row[key]?.trim();
    if (value) {
      return value;
    }
  }
  return '';
}

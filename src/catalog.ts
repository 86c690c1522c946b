import * as fs from 'node:fs';
import path from 'node:path';
import type { Action, CatalogTable, Complexity } from './types.js';
import { InvalidConfigError } from './errors.js';
import { isObject, parseJsonWithSchema } from './json.js';

/** Sentinel for algorithms the catalog has no complexity labels for */
export const UNKNOWN_COMPLEXITY: Readonly<Complexity> = Object.freeze({ time: 'unknown', space: 'unknown' });

// Default table shipped beside the sources (dist and src are both siblings of catalog/)
export const DEFAULT_CATALOG_PATH: string = path.resolve(__dirname, '../catalog/algorithms.json');

/** Cheapest first. Classes not listed rank as O(n^2). */
const TIME_CLASS_ORDER = ['O(1)', 'O(log n)', 'O(n)', 'O(n log n)', 'O(n^2)', 'O(n^3)', 'O(2^n)', 'O(n!)'];
const UNRANKED = TIME_CLASS_ORDER.indexOf('O(n^2)');

/**
 * Registry of candidate algorithms per problem category. Pure lookup over an
 * injected table; the legal action set for a category is exactly its keys.
 */
export class AlgorithmCatalog {
  private readonly table: CatalogTable;

  constructor(table: CatalogTable) {
    this.table = cloneTable(table);
  }

  categories(): string[] {
    return Object.keys(this.table);
  }

  hasCategory(category: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.table, category);
  }

  /** Ordered algorithm names; empty for an unknown category */
  algorithmsFor(category: string): readonly Action[] {
    return this.hasCategory(category) ? Object.keys(this.table[category]) : [];
  }

  complexityOf(category: string, action: Action): Readonly<Complexity> {
    if (!this.hasCategory(category)) return UNKNOWN_COMPLEXITY;
    const entries = this.table[category];
    if (!Object.prototype.hasOwnProperty.call(entries, action)) return UNKNOWN_COMPLEXITY;
    return { ...entries[action] };
  }

  /** Algorithms of a category from cheapest to most expensive time class; ties keep table order */
  rankByTimeComplexity(category: string): Action[] {
    const rank = (a: Action): number => {
      const i = TIME_CLASS_ORDER.indexOf(this.complexityOf(category, a).time);
      return i === -1 ? UNRANKED : i;
    };
    return this.algorithmsFor(category)
      .map((a, i) => ({ a, i, r: rank(a) }))
      .sort((x, y) => x.r - y.r || x.i - y.i)
      .map(x => x.a);
  }
}

/** Validate an untrusted table (e.g. parsed JSON). Throws on a malformed shape. */
export function parseCatalogTable(input: unknown): CatalogTable {
  if (!isObject(input)) throw new InvalidConfigError('catalog', 'must be an object of categories');
  const out: CatalogTable = {};
  for (const [category, algorithms] of Object.entries(input)) {
    if (!isObject(algorithms)) throw new InvalidConfigError(`catalog.${category}`, 'must be an object of algorithms');
    out[category] = {};
    for (const [name, c] of Object.entries(algorithms)) {
      if (!isObject(c) || typeof c.time !== 'string' || typeof c.space !== 'string') {
        throw new InvalidConfigError(`catalog.${category}.${name}`, 'must have string "time" and "space"');
      }
      out[category][name] = { time: c.time, space: c.space };
    }
  }
  return out;
}

export function loadDefaultCatalog(file: string = DEFAULT_CATALOG_PATH): AlgorithmCatalog {
  return new AlgorithmCatalog(parseJsonWithSchema(fs.readFileSync(file, 'utf8'), { parse: parseCatalogTable }, file));
}

function cloneTable(table: CatalogTable): CatalogTable {
  const out: CatalogTable = {};
  for (const [category, algorithms] of Object.entries(table)) {
    out[category] = {};
    for (const [name, c] of Object.entries(algorithms)) out[category][name] = { time: c.time, space: c.space };
  }
  return out;
}

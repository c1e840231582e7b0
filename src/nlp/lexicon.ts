/**
 * Layered Sentiment Lexicon
 *
 * Three layers feed the lexicon the scorer sees:
 * - static: hand-curated financial vocabulary shipped with the code
 * - approved: keywords a reviewer approved with a fixed weight
 * - auto: keywords promoted by the auto-aggregation engine
 *
 * Each entry carries its origin and a term resolves to the entry of the
 * highest-precedence origin, so static terms can never be overridden.
 */

import { z } from 'zod';
import viLexiconData from './data/vi-lexicon.json';
import { normalizeText } from './text';
import { TtlCache, Clock, monotonicClock } from '../utils/ttlCache';
import { lexiconCacheEvents } from '../metrics';
import type { LearnedKeywordRecord } from '../database/repository';
import type { AggregatedKeywords } from '../services/keywordAggregator';

// =============================================================================
// TYPES
// =============================================================================

export type LexiconOrigin = 'static' | 'approved' | 'auto';

export interface LexiconEntry {
  term: string;
  /** (0, 1] for positive terms, [-1, 0) for negative ones */
  weight: number;
  origin: LexiconOrigin;
}

export interface MergedLexicon {
  positive: LexiconEntry[];
  negative: LexiconEntry[];
}

export interface ModifierTables {
  /** Longest first */
  negators: string[];
  intensifiers: Array<[string, number]>;
  diminishers: Array<[string, number]>;
}

const ORIGIN_PRECEDENCE: Record<LexiconOrigin, number> = {
  static: 3,
  approved: 2,
  auto: 1,
};

// =============================================================================
// STATIC TABLES
// =============================================================================

const weightTableSchema = z.record(z.string(), z.number());

const staticLexiconSchema = z.object({
  positive: weightTableSchema.refine(
    table => Object.values(table).every(w => w > 0 && w <= 1),
    { message: 'Positive weights must be in (0, 1]' },
  ),
  negative: weightTableSchema.refine(
    table => Object.values(table).every(w => w < 0 && w >= -1),
    { message: 'Negative weights must be in [-1, 0)' },
  ),
  negators: z.array(z.string().min(1)),
  intensifiers: weightTableSchema,
  diminishers: weightTableSchema,
});

export type StaticLexiconData = z.infer<typeof staticLexiconSchema>;

const byLengthDesc = (a: string, b: string): number => b.length - a.length || a.localeCompare(b);

function sortedTable(table: Record<string, number>): Array<[string, number]> {
  return Object.entries(table)
    .map(([term, value]): [string, number] => [normalizeText(term), value])
    .sort((a, b) => byLengthDesc(a[0], b[0]));
}

export class StaticLexicon {
  readonly entries: readonly LexiconEntry[];
  readonly modifiers: ModifierTables;
  readonly terms: ReadonlySet<string>;

  private constructor(data: StaticLexiconData) {
    const entries: LexiconEntry[] = [];
    for (const [term, weight] of Object.entries(data.positive)) {
      entries.push({ term: normalizeText(term), weight, origin: 'static' });
    }
    for (const [term, weight] of Object.entries(data.negative)) {
      entries.push({ term: normalizeText(term), weight, origin: 'static' });
    }
    this.entries = entries;
    this.terms = new Set(entries.map(entry => entry.term));
    this.modifiers = {
      negators: data.negators.map(normalizeText).sort(byLengthDesc),
      intensifiers: sortedTable(data.intensifiers),
      diminishers: sortedTable(data.diminishers),
    };
  }

  static fromData(data: unknown): StaticLexicon {
    return new StaticLexicon(staticLexiconSchema.parse(data));
  }

  /** The bundled Vietnamese financial lexicon. */
  static bundled(): StaticLexicon {
    return StaticLexicon.fromData(viLexiconData);
  }

  has(term: string): boolean {
    return this.terms.has(normalizeText(term));
  }
}

// =============================================================================
// MERGE
// =============================================================================

/**
 * Resolves every term to its highest-precedence variant and splits the
 * result by polarity. Entries are ordered longest term first so scanners can
 * match greedily.
 */
export function mergeLexicon(variants: Iterable<LexiconEntry>): MergedLexicon {
  const winners = new Map<string, LexiconEntry>();

  for (const variant of variants) {
    const term = normalizeText(variant.term);
    if (!term || variant.weight === 0 || !Number.isFinite(variant.weight)) continue;

    const current = winners.get(term);
    if (!current || ORIGIN_PRECEDENCE[variant.origin] > ORIGIN_PRECEDENCE[current.origin]) {
      winners.set(term, { term, weight: Math.max(-1, Math.min(1, variant.weight)), origin: variant.origin });
    }
  }

  const ordered = [...winners.values()].sort((a, b) => byLengthDesc(a.term, b.term));
  return {
    positive: ordered.filter(entry => entry.weight > 0),
    negative: ordered.filter(entry => entry.weight < 0),
  };
}

export function approvedVariants(keywords: LearnedKeywordRecord[]): LexiconEntry[] {
  return keywords.map(keyword => ({
    term: keyword.keyword,
    weight: keyword.sentimentType === 'positive' ? keyword.weight : -keyword.weight,
    origin: 'approved',
  }));
}

export function autoVariants(aggregated: AggregatedKeywords): LexiconEntry[] {
  return [
    ...aggregated.positive.map((k): LexiconEntry => ({ term: k.keyword, weight: k.weight, origin: 'auto' })),
    ...aggregated.negative.map((k): LexiconEntry => ({ term: k.keyword, weight: -k.weight, origin: 'auto' })),
  ];
}

// =============================================================================
// STORE
// =============================================================================

export interface ApprovedKeywordSource {
  listLearnedKeywords(): Promise<LearnedKeywordRecord[]>;
}

export interface AutoKeywordSource {
  aggregated(): Promise<AggregatedKeywords>;
  invalidate(): void;
}

export interface LexiconStoreOptions {
  ttlMs: number;
  clock?: Clock;
}

const MERGED_KEY = 'merged';

/**
 * Serves the merged lexicon from a TTL cache. The cached value is derived
 * from the source tables only, so dropping it never loses information; the
 * TTL is the bound on how stale a served lexicon can be.
 */
export class LexiconStore {
  private readonly cache: TtlCache<MergedLexicon>;

  constructor(
    readonly staticLexicon: StaticLexicon,
    private readonly approved: ApprovedKeywordSource,
    private readonly auto: AutoKeywordSource,
    options: LexiconStoreOptions,
  ) {
    this.cache = new TtlCache(options.ttlMs, options.clock ?? monotonicClock);
  }

  async mergedLexicon(): Promise<MergedLexicon> {
    const { value, hit } = await this.cache.getOrLoad(MERGED_KEY, () => this.compute());
    lexiconCacheEvents.inc({ cache: 'lexicon', result: hit ? 'hit' : 'miss' });
    return value;
  }

  /** Drops the cached lexicon and the aggregation cache behind it. */
  invalidate(): void {
    this.auto.invalidate();
    this.cache.invalidate();
  }

  private async compute(): Promise<MergedLexicon> {
    const [learned, aggregated] = await Promise.all([
      this.approved.listLearnedKeywords(),
      this.auto.aggregated(),
    ]);

    return mergeLexicon([
      ...this.staticLexicon.entries,
      ...approvedVariants(learned),
      ...autoVariants(aggregated),
    ]);
  }
}

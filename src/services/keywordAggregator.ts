/**
 * Auto-Aggregation Engine
 *
 * Promotes mined keyword suggestions into weighted lexicon entries:
 *
 *   confidence = min(1, frequency / 10) * min(1, maxCooccurrence / 5)
 *   weight     = min(0.8, avgSuggestedWeight * (0.5 + confidence * 0.5))
 *
 * Only unreviewed rows inside the lookback window count. A group a reviewer
 * rejected never comes back, and static lexicon terms are never promoted.
 */

import { TtlCache, Clock, monotonicClock } from '../utils/ttlCache';
import { ValidationError } from '../errors';
import { autoLexiconSize, lexiconCacheEvents } from '../metrics';
import type { SentimentRepository, SentimentType, SuggestionGroup } from '../database/repository';

// =============================================================================
// TYPES
// =============================================================================

export interface AggregationParams {
  minConfidence: number;
  minFrequency: number;
  lookbackDays: number;
}

export interface AggregatedKeyword {
  keyword: string;
  sentimentType: SentimentType;
  frequency: number;
  avgWeight: number;
  maxCooccurrence: number;
  confidence: number;
  weight: number;
}

export interface AggregatedKeywords {
  positive: AggregatedKeyword[];
  negative: AggregatedKeyword[];
}

export interface KeywordAggregatorOptions {
  defaults?: Partial<AggregationParams>;
  maxWeight?: number;
  ttlMs: number;
  clock?: Clock;
  now?: () => Date;
}

export const DEFAULT_AGGREGATION: AggregationParams = {
  minConfidence: 0.3,
  minFrequency: 2,
  lookbackDays: 30,
};

// =============================================================================
// PURE AGGREGATION
// =============================================================================

export function keywordConfidence(frequency: number, maxCooccurrence: number): number {
  return Math.min(1, frequency / 10) * Math.min(1, maxCooccurrence / 5);
}

export function keywordWeight(avgWeight: number, confidence: number, maxWeight: number = 0.8): number {
  return Math.min(maxWeight, avgWeight * (0.5 + confidence * 0.5));
}

/**
 * When a keyword was mined under both types only the more frequent type
 * survives; equal frequencies leave the keyword out entirely.
 */
export function dominantGroups(groups: SuggestionGroup[]): SuggestionGroup[] {
  const byKeyword = new Map<string, SuggestionGroup[]>();
  for (const group of groups) {
    const list = byKeyword.get(group.keyword) ?? [];
    list.push(group);
    byKeyword.set(group.keyword, list);
  }

  const result: SuggestionGroup[] = [];
  for (const list of byKeyword.values()) {
    if (list.length === 1) {
      result.push(list[0]);
      continue;
    }
    const ranked = [...list].sort((a, b) => b.frequency - a.frequency);
    if (ranked[0].frequency > ranked[1].frequency) {
      result.push(ranked[0]);
    }
  }
  return result;
}

export function aggregateGroups(
  groups: SuggestionGroup[],
  params: AggregationParams,
  staticTerms: ReadonlySet<string>,
  maxWeight: number = 0.8,
): AggregatedKeywords {
  const aggregated: AggregatedKeywords = { positive: [], negative: [] };

  for (const group of dominantGroups(groups.filter(g => !staticTerms.has(g.keyword)))) {
    const confidence = keywordConfidence(group.frequency, group.maxCooccurrence);
    if (group.frequency < params.minFrequency || confidence < params.minConfidence) continue;

    const weight = keywordWeight(group.avgWeight, confidence, maxWeight);
    if (weight <= 0) continue;

    aggregated[group.sentimentType].push({
      keyword: group.keyword,
      sentimentType: group.sentimentType,
      frequency: group.frequency,
      avgWeight: group.avgWeight,
      maxCooccurrence: group.maxCooccurrence,
      confidence,
      weight,
    });
  }

  const byStrength = (a: AggregatedKeyword, b: AggregatedKeyword): number =>
    b.confidence - a.confidence || b.frequency - a.frequency || a.keyword.localeCompare(b.keyword);
  aggregated.positive.sort(byStrength);
  aggregated.negative.sort(byStrength);
  return aggregated;
}

// =============================================================================
// CACHED ENGINE
// =============================================================================

export class KeywordAggregator {
  private readonly defaults: AggregationParams;
  private readonly maxWeight: number;
  private readonly cache: TtlCache<AggregatedKeywords>;
  private readonly now: () => Date;

  constructor(
    private readonly repository: Pick<SentimentRepository, 'suggestionGroups'>,
    private readonly staticTerms: ReadonlySet<string>,
    options: KeywordAggregatorOptions,
  ) {
    this.defaults = { ...DEFAULT_AGGREGATION, ...options.defaults };
    this.maxWeight = options.maxWeight ?? 0.8;
    this.cache = new TtlCache(options.ttlMs, options.clock ?? monotonicClock);
    this.now = options.now ?? (() => new Date());
  }

  resolveParams(overrides: Partial<AggregationParams> = {}): AggregationParams {
    const params: AggregationParams = {
      minConfidence: overrides.minConfidence ?? this.defaults.minConfidence,
      minFrequency: overrides.minFrequency ?? this.defaults.minFrequency,
      lookbackDays: overrides.lookbackDays ?? this.defaults.lookbackDays,
    };
    if (params.minConfidence < 0 || params.minConfidence > 1) {
      throw new ValidationError('minConfidence must be within [0, 1]', { minConfidence: params.minConfidence });
    }
    if (!Number.isInteger(params.minFrequency) || params.minFrequency < 1) {
      throw new ValidationError('minFrequency must be a positive integer', { minFrequency: params.minFrequency });
    }
    if (!Number.isInteger(params.lookbackDays) || params.lookbackDays < 1 || params.lookbackDays > 365) {
      throw new ValidationError('lookbackDays must be an integer between 1 and 365', { lookbackDays: params.lookbackDays });
    }
    return params;
  }

  async aggregated(overrides: Partial<AggregationParams> = {}): Promise<AggregatedKeywords> {
    const params = this.resolveParams(overrides);
    const key = `${params.minConfidence}|${params.minFrequency}|${params.lookbackDays}`;

    const { value, hit } = await this.cache.getOrLoad(key, async () => {
      const since = new Date(this.now().getTime() - params.lookbackDays * 86_400_000);
      const groups = await this.repository.suggestionGroups(since);
      return aggregateGroups(groups, params, this.staticTerms, this.maxWeight);
    });

    lexiconCacheEvents.inc({ cache: 'aggregation', result: hit ? 'hit' : 'miss' });
    if (!hit) {
      autoLexiconSize.set({ sentiment_type: 'positive' }, value.positive.length);
      autoLexiconSize.set({ sentiment_type: 'negative' }, value.negative.length);
    }
    return value;
  }

  /**
   * Unreviewed groups in the window regardless of thresholds, most frequent
   * first, for the review dashboard.
   */
  async pendingGroups(lookbackDays: number = this.defaults.lookbackDays, limit: number = 100): Promise<SuggestionGroup[]> {
    const { lookbackDays: days } = this.resolveParams({ lookbackDays });
    const since = new Date(this.now().getTime() - days * 86_400_000);
    const groups = await this.repository.suggestionGroups(since);
    return groups
      .filter(group => !this.staticTerms.has(group.keyword))
      .sort((a, b) => b.frequency - a.frequency || a.keyword.localeCompare(b.keyword))
      .slice(0, limit);
  }

  invalidate(): void {
    this.cache.invalidate();
  }
}

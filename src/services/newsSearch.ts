/**
 * Ranked news search by ticker or topic.
 */

import { TickerAliasTable } from '../search/tickerAliases';
import { Bm25Params, DEFAULT_BM25, rankBm25 } from '../search/bm25';
import { SentimentEngine } from '../nlp/sentimentEngine';
import { SentimentLabel } from '../nlp/labels';
import { ValidationError } from '../errors';
import { resolveTimeRange, TimeRange } from '../utils/dates';
import type { SentimentRepository, ArticleRecord } from '../database/repository';

export interface RankedArticle {
  id: number;
  source: string;
  title: string;
  url: string | null;
  publishedAt: Date | null;
  crawledAt: Date;
  bm25: number;
  relevance: number;
  matchedAliases: string[];
  sentimentScore: number;
  sentimentLabel: SentimentLabel;
}

export interface SearchRequest {
  query: string;
  from?: string;
  to?: string;
  limit?: number;
}

export interface SearchResponse {
  query: string;
  aliases: string[];
  range: TimeRange;
  results: RankedArticle[];
}

export interface NewsSearchOptions {
  defaultLimit?: number;
  maxLimit?: number;
  defaultRangeDays?: number;
  bm25?: Bm25Params;
  now?: () => Date;
}

function publishedTime(article: ArticleRecord): number {
  return (article.publishedAt ?? article.crawledAt).getTime();
}

export class NewsSearchService {
  private readonly defaultLimit: number;
  private readonly maxLimit: number;
  private readonly defaultRangeDays: number;
  private readonly bm25: Bm25Params;
  private readonly now: () => Date;

  constructor(
    private readonly repository: SentimentRepository,
    private readonly aliases: TickerAliasTable,
    private readonly engine: SentimentEngine,
    options: NewsSearchOptions = {},
  ) {
    this.defaultLimit = options.defaultLimit ?? 50;
    this.maxLimit = options.maxLimit ?? 1000;
    this.defaultRangeDays = options.defaultRangeDays ?? 7;
    this.bm25 = options.bm25 ?? DEFAULT_BM25;
    this.now = options.now ?? (() => new Date());
  }

  async search(request: SearchRequest): Promise<SearchResponse> {
    const limit = request.limit ?? this.defaultLimit;
    if (!Number.isInteger(limit) || limit < 1 || limit > this.maxLimit) {
      throw new ValidationError(`limit must be an integer between 1 and ${this.maxLimit}`, { limit });
    }
    const range = resolveTimeRange(request.from, request.to, this.defaultRangeDays, this.now());
    const { aliases } = this.aliases.expandQuery(request.query);
    if (aliases.length === 0) {
      throw new ValidationError('query must name at least one ticker or topic', { query: request.query });
    }

    const candidates = await this.repository.searchCandidates(aliases, range.from, range.to);
    if (candidates.length === 0) {
      return { query: request.query, aliases, range, results: [] };
    }
    const corpus = await this.repository.corpusStats(range.from, range.to);

    const hits = rankBm25(
      candidates.map(article => ({ item: article, text: article.title })),
      aliases,
      corpus,
      this.bm25,
    ).sort((a, b) => b.relevance - a.relevance || publishedTime(b.item) - publishedTime(a.item));

    const results: RankedArticle[] = [];
    for (const hit of hits.slice(0, limit)) {
      const article = hit.item;
      const sentiment = article.sentimentScore !== null && article.sentimentLabel !== null
        ? { score: article.sentimentScore, label: article.sentimentLabel }
        : await this.engine.score(article.title);

      results.push({
        id: article.id,
        source: article.source,
        title: article.title,
        url: article.url,
        publishedAt: article.publishedAt,
        crawledAt: article.crawledAt,
        bm25: hit.bm25,
        relevance: hit.relevance,
        matchedAliases: Object.keys(hit.termFrequencies),
        sentimentScore: sentiment.score,
        sentimentLabel: sentiment.label,
      });
    }
    return { query: request.query, aliases, range, results };
  }
}

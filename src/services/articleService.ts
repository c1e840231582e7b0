/**
 * Article ingestion and rescoring.
 *
 * Headlines are scored on the way in; after the lexicon has learned new
 * keywords a rescoring run brings stored scores up to date.
 */

import { z } from 'zod';
import { SentimentEngine } from '../nlp/sentimentEngine';
import { LexiconStore } from '../nlp/lexicon';
import { ValidationError } from '../errors';
import { calendarDate, parseTimestamp } from '../utils/dates';
import type { SentimentRepository, NewArticle, RescoreUpdate } from '../database/repository';

export const ingestItemSchema = z.object({
  source: z.string().trim().min(1).max(100),
  // composed form so dedupe and search see one spelling per headline
  title: z.string().trim().min(1).max(1000).transform(title => title.normalize('NFC')),
  url: z.string().url().max(2048).nullish(),
  publishedAt: z.string().min(1).nullish(),
});

export const ingestBatchSchema = z.array(ingestItemSchema).min(1).max(1000);

export type IngestItem = z.infer<typeof ingestItemSchema>;

export interface IngestResult {
  received: number;
  inserted: number;
  duplicates: number;
}

export interface RescoreOptions {
  onlyUnscored?: boolean;
  chunkSize?: number;
}

export interface RescoreResult {
  processed: number;
  updated: number;
  chunks: number;
}

export class ArticleService {
  constructor(
    private readonly repository: SentimentRepository,
    private readonly engine: SentimentEngine,
    private readonly lexicon: LexiconStore,
    private readonly options: { timeZone: string; chunkSize: number; now?: () => Date },
  ) {}

  async ingest(items: unknown): Promise<IngestResult> {
    const parsed = ingestBatchSchema.safeParse(items);
    if (!parsed.success) {
      throw new ValidationError('Invalid articles payload', parsed.error.errors);
    }

    const crawledAt = this.options.now?.() ?? new Date();
    const crawlDate = calendarDate(crawledAt, this.options.timeZone);

    const articles: NewArticle[] = [];
    for (const item of parsed.data) {
      const { score, label } = await this.engine.score(item.title);
      articles.push({
        source: item.source,
        title: item.title,
        url: item.url ?? null,
        publishedAt: item.publishedAt ? parseTimestamp(item.publishedAt, 'publishedAt') : null,
        crawledAt,
        crawlDate,
        sentimentScore: score,
        sentimentLabel: label,
      });
    }

    const inserted = await this.repository.insertArticles(articles);
    const result = { received: articles.length, inserted, duplicates: articles.length - inserted };
    console.log(`[ArticleService] Ingested ${inserted}/${articles.length} articles for ${crawlDate}`);
    return result;
  }

  /**
   * Recomputes stored scores chunk by chunk in id order. The lexicon cache is
   * dropped once up front so the run sees the latest learned keywords.
   */
  async rescore(options: RescoreOptions = {}): Promise<RescoreResult> {
    const chunkSize = options.chunkSize ?? this.options.chunkSize;
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new ValidationError('chunkSize must be a positive integer', { chunkSize });
    }
    const onlyUnscored = options.onlyUnscored ?? false;

    this.lexicon.invalidate();

    let afterId = 0;
    let processed = 0;
    let updated = 0;
    let chunks = 0;

    for (;;) {
      const batch = await this.repository.listArticlesForRescore(afterId, chunkSize, onlyUnscored);
      if (batch.length === 0) break;

      const updates: RescoreUpdate[] = [];
      for (const article of batch) {
        const { score, label } = await this.engine.score(article.title);
        if (article.sentimentScore !== score || article.sentimentLabel !== label) {
          updates.push({ id: article.id, score, label });
        }
      }
      if (updates.length > 0) {
        await this.repository.updateArticleSentiment(updates);
      }

      chunks++;
      processed += batch.length;
      updated += updates.length;
      afterId = batch[batch.length - 1].id;
      if (batch.length < chunkSize) break;
    }

    console.log(`[ArticleService] Rescored ${processed} articles in ${chunks} chunk(s), ${updated} changed`);
    return { processed, updated, chunks };
  }
}

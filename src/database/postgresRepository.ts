// =============================================================================
// PostgreSQL Sentiment Repository
// =============================================================================

import { QueryResultRow } from 'pg';
import { SqlPool, SqlClient, SqlSession, toStorageError, withTransaction } from './pool';
import { InvalidStateError, NotFoundError, StorageError } from '../errors';
import { SentimentLabel, isSentimentLabel } from '../nlp/labels';
import type { Direction } from '../nlp/signals';
import type {
  SentimentRepository,
  NewArticle,
  ArticleRecord,
  RescoreUpdate,
  NewQueueItem,
  QueueItemRecord,
  QueueStatsRecord,
  QueueStatus,
  FeedbackCommand,
  FeedbackOutcome,
  FeedbackRecord,
  FeedbackSource,
  SentimentType,
  SuggestionGroup,
  LearnedKeywordRecord,
  NewLlmEvaluation,
  LlmEvaluationRecord,
  CorpusStats,
} from './repository';

// =============================================================================
// Row types
// =============================================================================

export interface ArticleRow extends QueryResultRow {
  id: number;
  source: string;
  title: string;
  url: string | null;
  published_at: Date | null;
  crawled_at: Date;
  crawl_date: string;
  sentiment_score: number | null;
  sentiment_label: string | null;
  scored_at: Date | null;
}

export interface QueueRow extends QueryResultRow {
  id: number;
  article_id: number;
  queue_date: string;
  priority_rank: number;
  title: string;
  url: string | null;
  crawl_date: string;
  lexicon_score: number;
  secondary_direction: string | null;
  model_label: string | null;
  final_score: number;
  final_label: string;
  match_count: number;
  signal_conflict: number;
  magnitude_uncertainty: number;
  match_sparsity: number;
  model_conflict: number | null;
  uncertainty_score: number;
  status: string;
  reviewer_score: number | null;
  reviewer_label: string | null;
  reviewer_comment: string | null;
  feedback_id: number | null;
  resolved_at: Date | null;
  created_at: Date;
}

interface FeedbackRow extends QueryResultRow {
  id: number;
  article_id: number | null;
  title: string;
  url: string | null;
  predicted_score: number;
  predicted_label: string;
  user_score: number;
  user_label: string;
  comment: string | null;
  source: string;
  created_at: Date;
}

interface LlmEvaluationRow extends QueryResultRow {
  id: number;
  article_id: number | null;
  title: string;
  score: number;
  label: string;
  confidence: number;
  reasoning: string;
  model: string;
  batch_id: string;
  synced_to_feedback: boolean;
  evaluated_at: Date;
}

const ARTICLE_COLUMNS = `id, source, title, url, published_at, crawled_at,
  to_char(crawl_date, 'YYYY-MM-DD') AS crawl_date, sentiment_score, sentiment_label, scored_at`;

const QUEUE_COLUMNS = `id, article_id, to_char(queue_date, 'YYYY-MM-DD') AS queue_date, priority_rank,
  title, url, to_char(crawl_date, 'YYYY-MM-DD') AS crawl_date, lexicon_score, secondary_direction,
  model_label, final_score, final_label, match_count, signal_conflict, magnitude_uncertainty,
  match_sparsity, model_conflict, uncertainty_score, status, reviewer_score, reviewer_label,
  reviewer_comment, feedback_id, resolved_at, created_at`;

const FEEDBACK_COLUMNS = `id, article_id, title, url, predicted_score, predicted_label,
  user_score, user_label, comment, source, created_at`;

const LLM_COLUMNS = `id, article_id, title, score, label, confidence, reasoning, model,
  batch_id, synced_to_feedback, evaluated_at`;

const SENTIMENT_TYPES: readonly SentimentType[] = ['negative', 'positive'];

// =============================================================================
// Row mapping
// =============================================================================

function corrupt(column: string, value: unknown): StorageError {
  return new StorageError(`Unexpected value in ${column}: ${String(value)}`, { transient: false });
}

function toLabel(value: string, column: string): SentimentLabel {
  if (!isSentimentLabel(value)) throw corrupt(column, value);
  return value;
}

function toOptionalLabel(value: string | null, column: string): SentimentLabel | null {
  return value === null ? null : toLabel(value, column);
}

function toDirection(value: string | null): Direction | null {
  if (value === null) return null;
  if (value === 'positive' || value === 'negative' || value === 'neutral') return value;
  throw corrupt('secondary_direction', value);
}

function toStatus(value: string): QueueStatus {
  if (value === 'pending' || value === 'labeled' || value === 'skipped') return value;
  throw corrupt('status', value);
}

function toSentimentType(value: string): SentimentType {
  if (value === 'positive' || value === 'negative') return value;
  throw corrupt('sentiment_type', value);
}

function toSource(value: string): FeedbackSource {
  if (value === 'human' || value === 'llm') return value;
  throw corrupt('source', value);
}

export function mapArticle(row: ArticleRow): ArticleRecord {
  return {
    id: row.id,
    source: row.source,
    title: row.title,
    url: row.url,
    publishedAt: row.published_at,
    crawledAt: row.crawled_at,
    crawlDate: row.crawl_date,
    sentimentScore: row.sentiment_score,
    sentimentLabel: toOptionalLabel(row.sentiment_label, 'sentiment_label'),
    scoredAt: row.scored_at,
  };
}

export function mapQueueItem(row: QueueRow): QueueItemRecord {
  return {
    id: row.id,
    articleId: row.article_id,
    queueDate: row.queue_date,
    priorityRank: row.priority_rank,
    title: row.title,
    url: row.url,
    crawlDate: row.crawl_date,
    snapshot: {
      lexiconScore: row.lexicon_score,
      secondaryDirection: toDirection(row.secondary_direction),
      modelLabel: toOptionalLabel(row.model_label, 'model_label'),
      finalScore: row.final_score,
      finalLabel: toLabel(row.final_label, 'final_label'),
      matchCount: row.match_count,
      signalConflict: row.signal_conflict,
      magnitudeUncertainty: row.magnitude_uncertainty,
      matchSparsity: row.match_sparsity,
      modelConflict: row.model_conflict,
      uncertaintyScore: row.uncertainty_score,
    },
    status: toStatus(row.status),
    reviewerScore: row.reviewer_score,
    reviewerLabel: toOptionalLabel(row.reviewer_label, 'reviewer_label'),
    reviewerComment: row.reviewer_comment,
    feedbackId: row.feedback_id,
    resolvedAt: row.resolved_at,
    createdAt: row.created_at,
  };
}

function mapFeedback(row: FeedbackRow): FeedbackRecord {
  return {
    id: row.id,
    articleId: row.article_id,
    title: row.title,
    url: row.url,
    predictedScore: row.predicted_score,
    predictedLabel: toLabel(row.predicted_label, 'predicted_label'),
    userScore: row.user_score,
    userLabel: toLabel(row.user_label, 'user_label'),
    comment: row.comment,
    source: toSource(row.source),
    createdAt: row.created_at,
  };
}

function mapLlmEvaluation(row: LlmEvaluationRow): LlmEvaluationRecord {
  return {
    id: row.id,
    articleId: row.article_id,
    title: row.title,
    score: row.score,
    label: toLabel(row.label, 'label'),
    confidence: row.confidence,
    reasoning: row.reasoning,
    model: row.model,
    batchId: row.batch_id,
    syncedToFeedback: row.synced_to_feedback,
    evaluatedAt: row.evaluated_at,
  };
}

/** Escapes LIKE wildcards so an alias matches literally. */
export function likePattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, match => `\\${match}`)}%`;
}

// =============================================================================
// Repository
// =============================================================================

export class PostgresSentimentRepository implements SentimentRepository {
  constructor(private readonly pool: SqlPool) {}

  // ---------------------------------------------------------------------------
  // Articles
  // ---------------------------------------------------------------------------

  async insertArticles(articles: NewArticle[]): Promise<number> {
    if (articles.length === 0) return 0;

    const values: unknown[] = [];
    const tuples = articles.map((article, i) => {
      const base = i * 8;
      values.push(
        article.source,
        article.title,
        article.url,
        article.publishedAt,
        article.crawledAt,
        article.crawlDate,
        article.sentimentScore,
        article.sentimentLabel,
      );
      return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}, $${base + 5}, $${base + 6}::date, $${base + 7}, $${base + 8}, CASE WHEN $${base + 7}::float8 IS NULL THEN NULL ELSE NOW() END)`;
    });

    const result = await this.query(
      `INSERT INTO articles (source, title, url, published_at, crawled_at, crawl_date, sentiment_score, sentiment_label, scored_at)
       VALUES ${tuples.join(', ')}
       ON CONFLICT (source, title, crawl_date) DO NOTHING`,
      values,
    );
    return result.rowCount ?? 0;
  }

  async listArticlesByCrawlDate(crawlDate: string): Promise<ArticleRecord[]> {
    const result = await this.query<ArticleRow>(
      `SELECT ${ARTICLE_COLUMNS} FROM articles WHERE crawl_date = $1::date ORDER BY crawled_at, id`,
      [crawlDate],
    );
    return result.rows.map(mapArticle);
  }

  async latestCrawlDate(): Promise<string | null> {
    const result = await this.query<{ latest: string | null }>(
      `SELECT to_char(MAX(crawl_date), 'YYYY-MM-DD') AS latest FROM articles`,
    );
    return result.rows[0]?.latest ?? null;
  }

  async listArticlesForRescore(afterId: number, limit: number, onlyUnscored: boolean): Promise<ArticleRecord[]> {
    const result = await this.query<ArticleRow>(
      `SELECT ${ARTICLE_COLUMNS} FROM articles
       WHERE id > $1 AND ($3::boolean = FALSE OR sentiment_score IS NULL)
       ORDER BY id
       LIMIT $2`,
      [afterId, limit, onlyUnscored],
    );
    return result.rows.map(mapArticle);
  }

  async updateArticleSentiment(updates: RescoreUpdate[]): Promise<void> {
    if (updates.length === 0) return;
    await this.query(
      `UPDATE articles AS a
       SET sentiment_score = u.score, sentiment_label = u.label, scored_at = NOW()
       FROM unnest($1::int[], $2::float8[], $3::text[]) AS u(id, score, label)
       WHERE a.id = u.id`,
      [updates.map(u => u.id), updates.map(u => u.score), updates.map(u => u.label)],
    );
  }

  // ---------------------------------------------------------------------------
  // Labeling queue
  // ---------------------------------------------------------------------------

  async queuedArticleIds(queueDate: string): Promise<number[]> {
    const result = await this.query<{ article_id: number }>(
      `SELECT article_id FROM labeling_queue WHERE queue_date = $1::date`,
      [queueDate],
    );
    return result.rows.map(row => row.article_id);
  }

  /**
   * Builds for the same date are serialized by an advisory lock so ranks
   * stay unique; (article, date) pairs already queued are skipped.
   */
  async enqueue(queueDate: string, items: NewQueueItem[], capacity: number): Promise<number> {
    if (items.length === 0) return 0;

    return withTransaction(this.pool, async session => {
      await session.query(`SELECT pg_advisory_xact_lock(hashtext('labeling_queue:' || $1))`, [queueDate]);
      const current = await session.query<{ max_rank: number; total: number }>(
        `SELECT COALESCE(MAX(priority_rank), 0)::int AS max_rank, COUNT(*)::int AS total
         FROM labeling_queue WHERE queue_date = $1::date`,
        [queueDate],
      );
      let rank = current.rows[0]?.max_rank ?? 0;
      const room = capacity - (current.rows[0]?.total ?? 0);
      let inserted = 0;

      for (const item of items) {
        if (inserted >= room) break;
        const s = item.snapshot;
        const result = await session.query<{ id: number }>(
          `INSERT INTO labeling_queue (
             article_id, queue_date, priority_rank, title, url, crawl_date,
             lexicon_score, secondary_direction, model_label, final_score, final_label, match_count,
             signal_conflict, magnitude_uncertainty, match_sparsity, model_conflict, uncertainty_score
           ) VALUES ($1, $2::date, $3, $4, $5, $6::date, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17)
           ON CONFLICT (article_id, queue_date) DO NOTHING
           RETURNING id`,
          [
            item.articleId, queueDate, rank + 1, item.title, item.url, item.crawlDate,
            s.lexiconScore, s.secondaryDirection, s.modelLabel, s.finalScore, s.finalLabel, s.matchCount,
            s.signalConflict, s.magnitudeUncertainty, s.matchSparsity, s.modelConflict, s.uncertaintyScore,
          ],
        );
        if (result.rows.length > 0) {
          rank++;
          inserted++;
        }
      }
      return inserted;
    });
  }

  async getQueueItem(id: number): Promise<QueueItemRecord | null> {
    const result = await this.query<QueueRow>(`SELECT ${QUEUE_COLUMNS} FROM labeling_queue WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? mapQueueItem(row) : null;
  }

  async listQueue(queueDate: string, status?: QueueStatus): Promise<QueueItemRecord[]> {
    const result = await this.query<QueueRow>(
      `SELECT ${QUEUE_COLUMNS} FROM labeling_queue
       WHERE queue_date = $1::date AND ($2::text IS NULL OR status = $2)
       ORDER BY priority_rank`,
      [queueDate, status ?? null],
    );
    return result.rows.map(mapQueueItem);
  }

  async queueStats(queueDate: string): Promise<QueueStatsRecord> {
    const result = await this.query<{
      total: number;
      pending: number;
      labeled: number;
      skipped: number;
      min_uncertainty: number | null;
      avg_uncertainty: number | null;
      max_uncertainty: number | null;
    }>(
      `SELECT COUNT(*)::int AS total,
              COUNT(*) FILTER (WHERE status = 'pending')::int AS pending,
              COUNT(*) FILTER (WHERE status = 'labeled')::int AS labeled,
              COUNT(*) FILTER (WHERE status = 'skipped')::int AS skipped,
              MIN(uncertainty_score) AS min_uncertainty,
              AVG(uncertainty_score) AS avg_uncertainty,
              MAX(uncertainty_score) AS max_uncertainty
       FROM labeling_queue WHERE queue_date = $1::date`,
      [queueDate],
    );
    const row = result.rows[0];
    return {
      queueDate,
      total: row?.total ?? 0,
      pending: row?.pending ?? 0,
      labeled: row?.labeled ?? 0,
      skipped: row?.skipped ?? 0,
      minUncertainty: row?.min_uncertainty ?? null,
      avgUncertainty: row?.avg_uncertainty ?? null,
      maxUncertainty: row?.max_uncertainty ?? null,
    };
  }

  async skipQueueItem(id: number): Promise<QueueItemRecord> {
    return withTransaction(this.pool, async session => {
      await this.lockPendingItem(session, id);
      const result = await session.query<QueueRow>(
        `UPDATE labeling_queue SET status = 'skipped', resolved_at = NOW()
         WHERE id = $1
         RETURNING ${QUEUE_COLUMNS}`,
        [id],
      );
      return mapQueueItem(result.rows[0]);
    });
  }

  private async lockPendingItem(session: SqlSession, id: number): Promise<void> {
    const locked = await session.query<{ status: string }>(
      `SELECT status FROM labeling_queue WHERE id = $1 FOR UPDATE`,
      [id],
    );
    const row = locked.rows[0];
    if (!row) {
      throw new NotFoundError(`Queue item ${id} not found`, { itemId: id });
    }
    if (row.status !== 'pending') {
      throw new InvalidStateError(`Queue item ${id} is already ${row.status}`, { itemId: id, status: row.status });
    }
  }

  // ---------------------------------------------------------------------------
  // Feedback and keyword suggestions
  // ---------------------------------------------------------------------------

  /**
   * One transaction: optional queue lock and check, the feedback row, one
   * suggestion row per candidate and the queue transition. Each (keyword,
   * type) group is serialized by an advisory lock so co-occurrence counts
   * never repeat.
   */
  async recordFeedback(command: FeedbackCommand): Promise<FeedbackOutcome> {
    const { feedback, candidates, queueItemId, evaluationId } = command;

    return withTransaction(this.pool, async session => {
      if (queueItemId !== undefined) {
        await this.lockPendingItem(session, queueItemId);
      }

      const inserted = await session.query<{ id: number }>(
        `INSERT INTO sentiment_feedback
           (article_id, title, url, predicted_score, predicted_label, user_score, user_label, comment, source)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         RETURNING id`,
        [
          feedback.articleId, feedback.title, feedback.url, feedback.predictedScore, feedback.predictedLabel,
          feedback.userScore, feedback.userLabel, feedback.comment, feedback.source,
        ],
      );
      const feedbackId = inserted.rows[0].id;

      // Fixed lock order across transactions
      const ordered = [...candidates].sort((a, b) =>
        `${a.keyword}:${a.sentimentType}`.localeCompare(`${b.keyword}:${b.sentimentType}`));

      for (const candidate of ordered) {
        await session.query(
          `SELECT pg_advisory_xact_lock(hashtext($1 || ':' || $2))`,
          [candidate.keyword, candidate.sentimentType],
        );
        const group = await session.query<{ max_count: number; rejected: boolean }>(
          `SELECT COALESCE(MAX(co_occurrence_count), 0)::int AS max_count,
                  COALESCE(BOOL_OR(reviewed), FALSE) AS rejected
           FROM keyword_suggestions
           WHERE keyword = $1 AND sentiment_type = $2`,
          [candidate.keyword, candidate.sentimentType],
        );
        const state = group.rows[0];
        await session.query(
          `INSERT INTO keyword_suggestions
             (keyword, sentiment_type, suggested_weight, co_occurrence_count, supporting_title, feedback_id, reviewed)
           VALUES ($1, $2, $3, $4, $5, $6, $7)`,
          [
            candidate.keyword, candidate.sentimentType, candidate.suggestedWeight,
            (state?.max_count ?? 0) + 1, feedback.title, feedbackId, state?.rejected ?? false,
          ],
        );
      }

      if (queueItemId !== undefined) {
        await session.query(
          `UPDATE labeling_queue
           SET status = 'labeled', reviewer_score = $2, reviewer_label = $3, reviewer_comment = $4,
               feedback_id = $5, resolved_at = NOW()
           WHERE id = $1`,
          [queueItemId, feedback.userScore, feedback.userLabel, feedback.comment, feedbackId],
        );
      }

      if (evaluationId !== undefined) {
        await session.query(`UPDATE llm_evaluations SET synced_to_feedback = TRUE WHERE id = $1`, [evaluationId]);
      }

      return { feedbackId, suggestionsRecorded: ordered.length };
    });
  }

  async listFeedbackSince(since: Date): Promise<FeedbackRecord[]> {
    const result = await this.query<FeedbackRow>(
      `SELECT ${FEEDBACK_COLUMNS} FROM sentiment_feedback WHERE created_at >= $1 ORDER BY created_at, id`,
      [since],
    );
    return result.rows.map(mapFeedback);
  }

  async listMisclassified(minError: number, limit: number): Promise<FeedbackRecord[]> {
    const result = await this.query<FeedbackRow>(
      `SELECT ${FEEDBACK_COLUMNS} FROM sentiment_feedback
       WHERE ABS(user_score - predicted_score) > $1
       ORDER BY ABS(user_score - predicted_score) DESC, created_at DESC
       LIMIT $2`,
      [minError, limit],
    );
    return result.rows.map(mapFeedback);
  }

  async suggestionGroups(since: Date): Promise<SuggestionGroup[]> {
    const result = await this.query<{
      keyword: string;
      sentiment_type: string;
      frequency: number;
      avg_weight: number;
      max_cooccurrence: number;
      last_seen: Date;
    }>(
      `SELECT s.keyword, s.sentiment_type,
              COUNT(*)::int AS frequency,
              AVG(s.suggested_weight)::float8 AS avg_weight,
              COUNT(DISTINCT s.feedback_id)::int AS max_cooccurrence,
              MAX(s.created_at) AS last_seen
       FROM keyword_suggestions s
       WHERE s.created_at >= $1
         AND NOT s.reviewed
         AND NOT EXISTS (
           SELECT 1 FROM keyword_suggestions r
           WHERE r.keyword = s.keyword AND r.sentiment_type = s.sentiment_type AND r.reviewed
         )
       GROUP BY s.keyword, s.sentiment_type`,
      [since],
    );
    return result.rows.map(row => ({
      keyword: row.keyword,
      sentimentType: toSentimentType(row.sentiment_type),
      frequency: row.frequency,
      avgWeight: row.avg_weight,
      maxCooccurrence: row.max_cooccurrence,
      lastSeen: row.last_seen,
    }));
  }

  async markSuggestionsReviewed(keyword: string, sentimentType?: SentimentType): Promise<number> {
    const types = sentimentType ? [sentimentType] : SENTIMENT_TYPES;

    return withTransaction(this.pool, async session => {
      let touched = 0;
      for (const type of types) {
        await session.query(`SELECT pg_advisory_xact_lock(hashtext($1 || ':' || $2))`, [keyword, type]);
        const result = await session.query(
          `UPDATE keyword_suggestions SET reviewed = TRUE WHERE keyword = $1 AND sentiment_type = $2 AND NOT reviewed`,
          [keyword, type],
        );
        touched += result.rowCount ?? 0;
      }
      return touched;
    });
  }

  async listLearnedKeywords(): Promise<LearnedKeywordRecord[]> {
    const result = await this.query<{
      keyword: string;
      sentiment_type: string;
      weight: number;
      approved_by: string | null;
      approved_at: Date;
    }>(`SELECT keyword, sentiment_type, weight, approved_by, approved_at FROM learned_keywords ORDER BY keyword`);
    return result.rows.map(row => ({
      keyword: row.keyword,
      sentimentType: toSentimentType(row.sentiment_type),
      weight: row.weight,
      approvedBy: row.approved_by,
      approvedAt: row.approved_at,
    }));
  }

  async upsertLearnedKeyword(keyword: LearnedKeywordRecord): Promise<void> {
    await this.query(
      `INSERT INTO learned_keywords (keyword, sentiment_type, weight, approved_by, approved_at)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (keyword) DO UPDATE
       SET sentiment_type = EXCLUDED.sentiment_type, weight = EXCLUDED.weight,
           approved_by = EXCLUDED.approved_by, approved_at = EXCLUDED.approved_at`,
      [keyword.keyword, keyword.sentimentType, keyword.weight, keyword.approvedBy, keyword.approvedAt],
    );
  }

  // ---------------------------------------------------------------------------
  // LLM evaluations
  // ---------------------------------------------------------------------------

  async evaluatedArticleIds(articleIds: number[]): Promise<number[]> {
    if (articleIds.length === 0) return [];
    const result = await this.query<{ article_id: number }>(
      `SELECT DISTINCT article_id FROM llm_evaluations WHERE article_id = ANY($1::int[])`,
      [articleIds],
    );
    return result.rows.map(row => row.article_id);
  }

  async saveLlmEvaluations(evaluations: NewLlmEvaluation[]): Promise<LlmEvaluationRecord[]> {
    if (evaluations.length === 0) return [];

    return withTransaction(this.pool, async session => {
      const saved: LlmEvaluationRecord[] = [];
      for (const e of evaluations) {
        const result = await session.query<LlmEvaluationRow>(
          `INSERT INTO llm_evaluations (article_id, title, score, label, confidence, reasoning, model, batch_id)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
           RETURNING ${LLM_COLUMNS}`,
          [e.articleId, e.title, e.score, e.label, e.confidence, e.reasoning, e.model, e.batchId],
        );
        saved.push(mapLlmEvaluation(result.rows[0]));
      }
      return saved;
    });
  }

  async unsyncedEvaluations(articleIds: number[], minConfidence: number): Promise<LlmEvaluationRecord[]> {
    if (articleIds.length === 0) return [];
    const result = await this.query<LlmEvaluationRow>(
      `SELECT ${LLM_COLUMNS} FROM llm_evaluations
       WHERE article_id = ANY($1::int[]) AND synced_to_feedback = FALSE AND confidence >= $2
       ORDER BY id`,
      [articleIds, minConfidence],
    );
    return result.rows.map(mapLlmEvaluation);
  }

  // ---------------------------------------------------------------------------
  // Search
  // ---------------------------------------------------------------------------

  async searchCandidates(terms: string[], from: Date, to: Date): Promise<ArticleRecord[]> {
    if (terms.length === 0) return [];
    const result = await this.query<ArticleRow>(
      `SELECT ${ARTICLE_COLUMNS} FROM articles
       WHERE COALESCE(published_at, crawled_at) BETWEEN $1 AND $2
         AND title ILIKE ANY($3::text[])`,
      [from, to, terms.map(likePattern)],
    );
    return result.rows.map(mapArticle);
  }

  async corpusStats(from: Date, to: Date): Promise<CorpusStats> {
    const result = await this.query<{ document_count: number; average_length: number }>(
      `SELECT COUNT(*)::int AS document_count,
              COALESCE(AVG(array_length(regexp_split_to_array(btrim(title), '\\s+'), 1)), 0)::float8 AS average_length
       FROM articles
       WHERE COALESCE(published_at, crawled_at) BETWEEN $1 AND $2`,
      [from, to],
    );
    const row = result.rows[0];
    return { documentCount: row?.document_count ?? 0, averageLength: row?.average_length ?? 0 };
  }

  async ping(): Promise<void> {
    await this.query('SELECT 1');
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private async query<R extends QueryResultRow>(text: string, values?: unknown[]) {
    return runQuery<R>(this.pool, text, values);
  }
}

async function runQuery<R extends QueryResultRow>(client: SqlClient, text: string, values?: unknown[]) {
  try {
    return await client.query<R>(text, values);
  } catch (error) {
    throw toStorageError(error);
  }
}

/**
 * Labeling Queue
 *
 * Daily, priority-ordered list of headlines a reviewer should label next.
 * Items start pending and move exactly once to labeled (through a feedback
 * submission) or skipped. Ranks grow monotonically within a date, so a
 * rebuild appends after the items already queued.
 */

import { UncertaintyEstimator, UncertaintySnapshot } from './uncertaintyEstimator';
import { FeedbackService, FeedbackResult } from './feedbackService';
import { InvalidStateError, NotFoundError, ValidationError } from '../errors';
import { assertCalendarDate, calendarDate } from '../utils/dates';
import { SentimentLabel, isSentimentLabel } from '../nlp/labels';
import { queueTransitionsTotal } from '../metrics';
import type {
  SentimentRepository,
  ArticleRecord,
  NewQueueItem,
  QueueItemRecord,
  QueueStatsRecord,
  QueueStatus,
} from '../database/repository';

// =============================================================================
// TYPES
// =============================================================================

export interface QueueBuildResult {
  date: string;
  totalCandidates: number;
  alreadyQueued: number;
  scored: number;
  inserted: number;
}

export interface QueueSubmission {
  userScore: number;
  userLabel?: SentimentLabel;
  comment?: string | null;
}

export interface QueueSubmitResult extends FeedbackResult {
  itemId: number;
  status: QueueStatus;
}

export interface LabelingQueueOptions {
  defaultLimit?: number;
  maxLimit?: number;
  timeZone?: string;
  now?: () => Date;
}

interface ScoredCandidate {
  article: ArticleRecord;
  snapshot: UncertaintySnapshot;
}

/** Highest uncertainty first, then the earliest crawled, then the lowest id. */
function byPriority(a: ScoredCandidate, b: ScoredCandidate): number {
  return (
    b.snapshot.uncertaintyScore - a.snapshot.uncertaintyScore ||
    a.article.crawledAt.getTime() - b.article.crawledAt.getTime() ||
    a.article.id - b.article.id
  );
}

// =============================================================================
// QUEUE
// =============================================================================

export class LabelingQueue {
  private readonly defaultLimit: number;
  private readonly maxLimit: number;
  private readonly timeZone: string;
  private readonly now: () => Date;

  constructor(
    private readonly repository: SentimentRepository,
    private readonly estimator: UncertaintyEstimator,
    private readonly feedback: FeedbackService,
    options: LabelingQueueOptions = {},
  ) {
    this.defaultLimit = options.defaultLimit ?? 25;
    this.maxLimit = options.maxLimit ?? 100;
    this.timeZone = options.timeZone ?? 'Asia/Ho_Chi_Minh';
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Fills the queue for `date` up to `limit` items with the most uncertain
   * articles not queued yet. A full queue gets nothing new, so repeated
   * builds with the same limit insert nothing. The store re-checks the bound
   * under its lock, so concurrent builds cannot overshoot it.
   */
  async build(date?: string, limit?: number): Promise<QueueBuildResult> {
    const queueDate = await this.resolveDate(date);
    const size = this.resolveLimit(limit);

    const [articles, queued] = await Promise.all([
      this.repository.listArticlesByCrawlDate(queueDate),
      this.repository.queuedArticleIds(queueDate),
    ]);
    const queuedIds = new Set(queued);
    const candidates = articles.filter(article => !queuedIds.has(article.id));
    const room = Math.max(0, size - queuedIds.size);

    const scored: ScoredCandidate[] = [];
    if (room > 0) {
      for (const article of candidates) {
        scored.push({ article, snapshot: await this.estimator.estimate(article.title) });
      }
      scored.sort(byPriority);
    }

    const items: NewQueueItem[] = scored.slice(0, room).map(({ article, snapshot }) => ({
      articleId: article.id,
      title: article.title,
      url: article.url,
      crawlDate: article.crawlDate,
      snapshot,
    }));
    const inserted = items.length > 0 ? await this.repository.enqueue(queueDate, items, size) : 0;
    if (inserted > 0) {
      queueTransitionsTotal.inc({ status: 'pending' }, inserted);
    }

    console.log(`[LabelingQueue] ${queueDate}: ${scored.length} candidates scored, ${inserted} queued (limit ${size})`);
    return {
      date: queueDate,
      totalCandidates: articles.length,
      alreadyQueued: articles.length - candidates.length,
      scored: scored.length,
      inserted,
    };
  }

  /**
   * Labels a pending item. The feedback row, mined keywords and the status
   * change commit together; a second submission fails with InvalidStateError.
   */
  async submit(itemId: number, submission: QueueSubmission): Promise<QueueSubmitResult> {
    const item = await this.pendingItem(itemId);
    if (submission.userLabel !== undefined && !isSentimentLabel(submission.userLabel)) {
      throw new ValidationError('userLabel is not a known label', { userLabel: submission.userLabel });
    }

    const result = await this.feedback.submit({
      articleId: item.articleId,
      title: item.title,
      url: item.url,
      predictedScore: item.snapshot.finalScore,
      predictedLabel: item.snapshot.finalLabel,
      userScore: submission.userScore,
      userLabel: submission.userLabel,
      comment: submission.comment ?? null,
      source: 'human',
    }, { queueItemId: item.id });

    queueTransitionsTotal.inc({ status: 'labeled' });
    return { ...result, itemId: item.id, status: 'labeled' };
  }

  async skip(itemId: number): Promise<QueueItemRecord> {
    await this.pendingItem(itemId);
    const skipped = await this.repository.skipQueueItem(itemId);
    queueTransitionsTotal.inc({ status: 'skipped' });
    return skipped;
  }

  async list(date?: string, status?: QueueStatus): Promise<{ date: string; items: QueueItemRecord[] }> {
    const queueDate = await this.resolveDate(date);
    return { date: queueDate, items: await this.repository.listQueue(queueDate, status) };
  }

  async stats(date?: string): Promise<QueueStatsRecord> {
    return this.repository.queueStats(await this.resolveDate(date));
  }

  /** The given date, else the latest crawl date, else today in the crawl timezone. */
  async resolveDate(date?: string): Promise<string> {
    if (date !== undefined) return assertCalendarDate(date);
    return (await this.repository.latestCrawlDate()) ?? calendarDate(this.now(), this.timeZone);
  }

  resolveLimit(limit: number | undefined): number {
    const size = limit ?? this.defaultLimit;
    if (!Number.isInteger(size) || size < 1 || size > this.maxLimit) {
      throw new ValidationError(`limit must be an integer between 1 and ${this.maxLimit}`, { limit });
    }
    return size;
  }

  /** Cheap pre-check; the repository re-checks under a row lock. */
  private async pendingItem(itemId: number): Promise<QueueItemRecord> {
    if (!Number.isInteger(itemId) || itemId < 1) {
      throw new ValidationError('Queue item id must be a positive integer', { itemId });
    }
    const item = await this.repository.getQueueItem(itemId);
    if (!item) {
      throw new NotFoundError(`Queue item ${itemId} not found`, { itemId });
    }
    if (item.status !== 'pending') {
      throw new InvalidStateError(`Queue item ${itemId} is already ${item.status}`, { itemId, status: item.status });
    }
    return item;
  }
}

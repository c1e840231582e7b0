/**
 * Feedback Service
 *
 * Single entry point for corrections from reviewers, the labeling queue and
 * the LLM annotator. Each correction is written together with the keyword
 * suggestions it produced (and the queue transition, if any) in one
 * repository transaction.
 */

import { KeywordMiner } from './keywordMiner';
import { ValidationError } from '../errors';
import { SentimentLabel, scoreToLabel, isSentimentLabel } from '../nlp/labels';
import { normalizeText } from '../nlp/text';
import { feedbackReceivedTotal, keywordSuggestionsRecordedTotal } from '../metrics';
import type {
  SentimentRepository,
  FeedbackRecord,
  FeedbackSource,
  SentimentType,
  KeywordCandidate,
} from '../database/repository';

// =============================================================================
// TYPES
// =============================================================================

export interface FeedbackInput {
  articleId?: number | null;
  title: string;
  url?: string | null;
  predictedScore: number;
  predictedLabel?: SentimentLabel;
  userScore: number;
  userLabel?: SentimentLabel;
  comment?: string | null;
  source?: FeedbackSource;
}

/** Rows written together with the feedback */
export interface FeedbackLink {
  queueItemId?: number;
  evaluationId?: number;
}

export interface FeedbackResult {
  feedbackId: number;
  error: number;
  mined: boolean;
  suggestionsRecorded: number;
  candidates: string[];
}

export interface FeedbackStats {
  periodDays: number;
  total: number;
  accurate: number;
  /** Percentage of feedback with error <= 0.2, two decimals */
  accuracy: number;
  avgError: number;
  bySource: Record<FeedbackSource, number>;
}

export interface MisclassifiedItem {
  feedback: FeedbackRecord;
  error: number;
  candidateKeywords: string[];
}

export interface LexiconInvalidator {
  invalidate(): void;
}

export const ACCURATE_ERROR = 0.2;
export const MISCLASSIFIED_ERROR = 0.4;

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function assertScore(value: number, field: string): void {
  if (!Number.isFinite(value) || value < -1 || value > 1) {
    throw new ValidationError(`${field} must be a number within [-1, 1]`, { field, value });
  }
}

// =============================================================================
// SERVICE
// =============================================================================

export class FeedbackService {
  constructor(
    private readonly repository: SentimentRepository,
    private readonly miner: KeywordMiner,
    private readonly lexicon: LexiconInvalidator,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Records one correction. With `queueItemId` the item moves to labeled in
   * the same transaction, failing with NotFoundError or InvalidStateError
   * and leaving nothing behind when it is not pending. With `evaluationId`
   * the LLM evaluation is flagged synced in that transaction too.
   */
  async submit(input: FeedbackInput, link: FeedbackLink = {}): Promise<FeedbackResult> {
    assertScore(input.predictedScore, 'predictedScore');
    assertScore(input.userScore, 'userScore');
    const title = input.title.trim().normalize('NFC');
    if (!title) {
      throw new ValidationError('title is required');
    }
    if (input.userLabel !== undefined && !isSentimentLabel(input.userLabel)) {
      throw new ValidationError('userLabel is not a known label', { userLabel: input.userLabel });
    }

    const source = input.source ?? 'human';
    const candidates = this.miner.mine({
      title,
      predictedScore: input.predictedScore,
      userScore: input.userScore,
    });

    const outcome = await this.repository.recordFeedback({
      feedback: {
        articleId: input.articleId ?? null,
        title,
        url: input.url ?? null,
        predictedScore: input.predictedScore,
        predictedLabel: input.predictedLabel ?? scoreToLabel(input.predictedScore),
        userScore: input.userScore,
        userLabel: input.userLabel ?? scoreToLabel(input.userScore),
        comment: input.comment ?? null,
        source,
      },
      candidates,
      queueItemId: link.queueItemId,
      evaluationId: link.evaluationId,
    });

    feedbackReceivedTotal.inc({ source });
    if (outcome.suggestionsRecorded > 0 && candidates.length > 0) {
      keywordSuggestionsRecordedTotal.inc({ sentiment_type: candidates[0].sentimentType }, outcome.suggestionsRecorded);
    }

    const error = Math.abs(input.userScore - input.predictedScore);
    if (candidates.length > 0) {
      console.log(`[FeedbackService] Feedback ${outcome.feedbackId} (error ${error.toFixed(2)}) produced ${candidates.length} keyword candidate(s)`);
    }

    return {
      feedbackId: outcome.feedbackId,
      error,
      mined: candidates.length > 0,
      suggestionsRecorded: outcome.suggestionsRecorded,
      candidates: candidates.map(c => c.keyword),
    };
  }

  async stats(days: number = 7): Promise<FeedbackStats> {
    if (!Number.isInteger(days) || days < 1 || days > 365) {
      throw new ValidationError('days must be an integer between 1 and 365', { days });
    }
    const since = new Date(this.now().getTime() - days * 86_400_000);
    const rows = await this.repository.listFeedbackSince(since);

    const bySource: Record<FeedbackSource, number> = { human: 0, llm: 0 };
    let accurate = 0;
    let errorSum = 0;
    for (const row of rows) {
      const error = Math.abs(row.userScore - row.predictedScore);
      errorSum += error;
      if (error <= ACCURATE_ERROR) accurate++;
      bySource[row.source]++;
    }

    return {
      periodDays: days,
      total: rows.length,
      accurate,
      accuracy: rows.length === 0 ? 0 : round((accurate / rows.length) * 100, 2),
      avgError: rows.length === 0 ? 0 : round(errorSum / rows.length, 4),
      bySource,
    };
  }

  /** Worst corrections first, with the n-grams their titles would yield. */
  async misclassified(limit: number = 50): Promise<MisclassifiedItem[]> {
    if (!Number.isInteger(limit) || limit < 1 || limit > 500) {
      throw new ValidationError('limit must be an integer between 1 and 500', { limit });
    }
    const rows = await this.repository.listMisclassified(MISCLASSIFIED_ERROR, limit);
    return rows.map(feedback => ({
      feedback,
      error: Math.abs(feedback.userScore - feedback.predictedScore),
      candidateKeywords: this.miner.extractNgrams(feedback.title),
    }));
  }

  // ---------------------------------------------------------------------------
  // KEYWORD REVIEW
  // ---------------------------------------------------------------------------

  /** Pins a keyword with a fixed weight; it then outranks any auto-aggregated weight. */
  async approveKeyword(keyword: string, sentimentType: SentimentType, weight: number, approvedBy?: string): Promise<KeywordCandidate> {
    const term = normalizeText(keyword);
    if (!term) {
      throw new ValidationError('keyword is required');
    }
    if (!Number.isFinite(weight) || weight <= 0 || weight > 1) {
      throw new ValidationError('weight must be within (0, 1]', { weight });
    }

    await this.repository.upsertLearnedKeyword({
      keyword: term,
      sentimentType,
      weight,
      approvedBy: approvedBy ?? null,
      approvedAt: this.now(),
    });
    this.lexicon.invalidate();
    console.log(`[FeedbackService] Approved keyword "${term}" (${sentimentType}, ${weight})`);
    return { keyword: term, sentimentType, suggestedWeight: weight };
  }

  /** Permanently removes a keyword group (or both groups) from auto-aggregation. */
  async rejectKeyword(keyword: string, sentimentType?: SentimentType): Promise<number> {
    const term = normalizeText(keyword);
    if (!term) {
      throw new ValidationError('keyword is required');
    }
    const touched = await this.repository.markSuggestionsReviewed(term, sentimentType);
    this.lexicon.invalidate();
    console.log(`[FeedbackService] Rejected keyword "${term}"${sentimentType ? ` (${sentimentType})` : ''}: ${touched} suggestion(s) marked reviewed`);
    return touched;
  }
}

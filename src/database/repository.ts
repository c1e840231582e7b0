/**
 * Persistence contract of the sentiment loop.
 *
 * Every method that changes more than one row is atomic: implementations run
 * it in a single transaction and serialize writes to the same queue item or
 * keyword group through row-level locks, never through in-process state.
 */

import type { SentimentLabel } from '../nlp/labels';
import type { UncertaintySnapshot } from '../services/uncertaintyEstimator';

// =============================================================================
// ARTICLES
// =============================================================================

export interface NewArticle {
  source: string;
  title: string;
  url: string | null;
  publishedAt: Date | null;
  crawledAt: Date;
  /** YYYY-MM-DD in the crawl timezone */
  crawlDate: string;
  sentimentScore: number | null;
  sentimentLabel: SentimentLabel | null;
}

export interface ArticleRecord extends NewArticle {
  id: number;
  scoredAt: Date | null;
}

// =============================================================================
// LABELING QUEUE
// =============================================================================

export type QueueStatus = 'pending' | 'labeled' | 'skipped';

export interface NewQueueItem {
  articleId: number;
  title: string;
  url: string | null;
  crawlDate: string;
  snapshot: UncertaintySnapshot;
}

export interface QueueItemRecord extends NewQueueItem {
  id: number;
  queueDate: string;
  priorityRank: number;
  status: QueueStatus;
  reviewerScore: number | null;
  reviewerLabel: SentimentLabel | null;
  reviewerComment: string | null;
  feedbackId: number | null;
  resolvedAt: Date | null;
  createdAt: Date;
}

export interface QueueStatsRecord {
  queueDate: string;
  total: number;
  pending: number;
  labeled: number;
  skipped: number;
  minUncertainty: number | null;
  avgUncertainty: number | null;
  maxUncertainty: number | null;
}

// =============================================================================
// FEEDBACK & KEYWORDS
// =============================================================================

export type FeedbackSource = 'human' | 'llm';
export type SentimentType = 'positive' | 'negative';

export interface NewFeedback {
  articleId: number | null;
  title: string;
  url: string | null;
  predictedScore: number;
  predictedLabel: SentimentLabel;
  userScore: number;
  userLabel: SentimentLabel;
  comment: string | null;
  source: FeedbackSource;
}

export interface FeedbackRecord extends NewFeedback {
  id: number;
  createdAt: Date;
}

export interface KeywordCandidate {
  keyword: string;
  sentimentType: SentimentType;
  suggestedWeight: number;
}

export interface KeywordSuggestionRecord extends KeywordCandidate {
  id: number;
  coOccurrenceCount: number;
  supportingTitle: string;
  feedbackId: number;
  reviewed: boolean;
  createdAt: Date;
}

/** Unreviewed suggestion rows of one (keyword, type) group inside a window. */
export interface SuggestionGroup {
  keyword: string;
  sentimentType: SentimentType;
  frequency: number;
  avgWeight: number;
  /** Distinct corrections inside the window; older rows never count */
  maxCooccurrence: number;
  lastSeen: Date;
}

export interface LearnedKeywordRecord {
  keyword: string;
  sentimentType: SentimentType;
  /** Magnitude in (0, 1]; the sign comes from the sentiment type */
  weight: number;
  approvedBy: string | null;
  approvedAt: Date;
}

export interface FeedbackCommand {
  feedback: NewFeedback;
  candidates: KeywordCandidate[];
  /** Queue item to move from pending to labeled in the same transaction */
  queueItemId?: number;
  /** LLM evaluation to flag as synced in the same transaction */
  evaluationId?: number;
}

export interface FeedbackOutcome {
  feedbackId: number;
  suggestionsRecorded: number;
}

// =============================================================================
// LLM EVALUATIONS
// =============================================================================

export interface NewLlmEvaluation {
  articleId: number | null;
  title: string;
  score: number;
  label: SentimentLabel;
  confidence: number;
  reasoning: string;
  model: string;
  batchId: string;
}

export interface LlmEvaluationRecord extends NewLlmEvaluation {
  id: number;
  syncedToFeedback: boolean;
  evaluatedAt: Date;
}

// =============================================================================
// SEARCH
// =============================================================================

export interface CorpusStats {
  documentCount: number;
  /** Mean whitespace-separated token count of the titles */
  averageLength: number;
}

export interface RescoreUpdate {
  id: number;
  score: number;
  label: SentimentLabel;
}

// =============================================================================
// REPOSITORY
// =============================================================================

export interface SentimentRepository {
  // Articles
  /** Inserts new articles, silently skipping (source, title, crawl_date) duplicates. Returns the inserted count. */
  insertArticles(articles: NewArticle[]): Promise<number>;
  listArticlesByCrawlDate(crawlDate: string): Promise<ArticleRecord[]>;
  latestCrawlDate(): Promise<string | null>;
  /** Articles with id > afterId in id order. */
  listArticlesForRescore(afterId: number, limit: number, onlyUnscored: boolean): Promise<ArticleRecord[]>;
  updateArticleSentiment(updates: RescoreUpdate[]): Promise<void>;

  // Labeling queue
  queuedArticleIds(queueDate: string): Promise<number[]>;
  /**
   * Appends items in order after the date's current highest rank until the
   * date holds `capacity` items; existing (article, date) pairs are skipped.
   */
  enqueue(queueDate: string, items: NewQueueItem[], capacity: number): Promise<number>;
  getQueueItem(id: number): Promise<QueueItemRecord | null>;
  listQueue(queueDate: string, status?: QueueStatus): Promise<QueueItemRecord[]>;
  queueStats(queueDate: string): Promise<QueueStatsRecord>;
  /** pending -> skipped; throws NotFoundError / InvalidStateError. */
  skipQueueItem(id: number): Promise<QueueItemRecord>;

  // Feedback and mined keywords
  recordFeedback(command: FeedbackCommand): Promise<FeedbackOutcome>;
  listFeedbackSince(since: Date): Promise<FeedbackRecord[]>;
  listMisclassified(minError: number, limit: number): Promise<FeedbackRecord[]>;
  /** Groups with a reviewed row anywhere in their history are left out. */
  suggestionGroups(since: Date): Promise<SuggestionGroup[]>;
  /** Marks the group(s) reviewed; returns the number of rows touched. */
  markSuggestionsReviewed(keyword: string, sentimentType?: SentimentType): Promise<number>;
  listLearnedKeywords(): Promise<LearnedKeywordRecord[]>;
  upsertLearnedKeyword(keyword: LearnedKeywordRecord): Promise<void>;

  // LLM annotations
  evaluatedArticleIds(articleIds: number[]): Promise<number[]>;
  saveLlmEvaluations(evaluations: NewLlmEvaluation[]): Promise<LlmEvaluationRecord[]>;
  /** Saved evaluations at or above `minConfidence` whose feedback was never written */
  unsyncedEvaluations(articleIds: number[], minConfidence: number): Promise<LlmEvaluationRecord[]>;

  // Search
  /** Articles in the range whose title contains any term, case-insensitively. */
  searchCandidates(terms: string[], from: Date, to: Date): Promise<ArticleRecord[]>;
  corpusStats(from: Date, to: Date): Promise<CorpusStats>;

  ping(): Promise<void>;
}

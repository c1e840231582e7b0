/**
 * LLM Annotator
 *
 * Sends the most uncertain pending headlines to a language model in small
 * batches and feeds confident judgements back into the learning loop as
 * `llm` feedback. Queue items stay pending: the model's answer is a second
 * opinion, not a review.
 */

import crypto from 'crypto';
import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { FeedbackService } from './feedbackService';
import { SentimentLabel, scoreToLabel } from '../nlp/labels';
import { clamp } from '../nlp/text';
import { assertCalendarDate } from '../utils/dates';
import { errorMessage, ValidationError } from '../errors';
import { collaboratorDegradedTotal, llmEvaluationsTotal } from '../metrics';
import type { SentimentRepository, NewLlmEvaluation, LlmEvaluationRecord, QueueItemRecord } from '../database/repository';

// =============================================================================
// TYPES
// =============================================================================

export interface LlmEvaluationRequest {
  articleId: number;
  title: string;
}

export interface LlmJudgement {
  articleId: number;
  title: string;
  score: number;
  label: SentimentLabel;
  confidence: number;
  reasoning: string;
  batchId: string;
}

export interface LlmEvaluator {
  readonly model: string;
  evaluate(requests: LlmEvaluationRequest[]): Promise<LlmJudgement[]>;
}

/** Sends a system prompt and a user prompt, resolves with the reply text. */
export type CompletionFn = (system: string, prompt: string) => Promise<string>;

// =============================================================================
// PROMPT & PARSING
// =============================================================================

export const SYSTEM_PROMPT = `Bạn là chuyên gia phân tích cảm xúc tin tức tài chính Việt Nam.
Nhiệm vụ: đánh giá cảm xúc (sentiment) của từng tiêu đề tin tức về chứng khoán và tài chính.

Quy tắc chấm điểm:
- score từ -1.0 đến 1.0 (âm = tiêu cực, dương = tích cực, 0 = trung lập)
- confidence từ 0.0 đến 1.0 (mức độ chắc chắn của đánh giá)

Dấu hiệu tích cực: tăng, lãi, tốt, mạnh, phục hồi, kỳ vọng cao, đột phá
Dấu hiệu tiêu cực: giảm, lỗ, xấu, yếu, rủi ro, lo ngại, áp lực, mất

Trả về JSON array, mỗi phần tử có dạng:
{"idx": <số thứ tự>, "score": <float>, "confidence": <float>, "reasoning": <chuỗi ngắn>}`;

export function batchPrompt(titles: string[]): string {
  const numbered = titles.map((title, i) => `${i + 1}. ${title}`).join('\n');
  return `Đánh giá sentiment cho ${titles.length} tiêu đề tin tức sau:\n\n${numbered}\n\nTrả về JSON array (đúng format, không giải thích thêm):`;
}

const responseItemSchema = z.object({
  idx: z.coerce.number().int(),
  score: z.coerce.number().finite(),
  confidence: z.coerce.number().finite().default(0.5),
  reasoning: z.string().default(''),
});

export type ParsedEvaluation = z.infer<typeof responseItemSchema>;

const WRAPPER_KEYS = ['items', 'results', 'evaluations'] as const;

function stripFences(raw: string): string {
  return raw.trim().replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '').trim();
}

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function unwrap(data: unknown): unknown[] | null {
  if (Array.isArray(data)) return data;
  if (typeof data === 'object' && data !== null) {
    for (const key of WRAPPER_KEYS) {
      const value: unknown = Reflect.get(data, key);
      if (Array.isArray(value)) return value;
    }
  }
  return null;
}

/**
 * Reads the model's reply: a JSON array, optionally fenced or wrapped in
 * {items|results|evaluations}. Items failing validation are dropped; an
 * unreadable reply yields an empty list.
 */
export function parseEvaluationResponse(raw: string): ParsedEvaluation[] {
  const text = stripFences(raw);
  let items = unwrap(tryJson(text));
  if (!items) {
    const embedded = /\[[\s\S]*\]/.exec(text);
    items = embedded ? unwrap(tryJson(embedded[0])) : null;
  }
  if (!items) {
    console.warn(`[LlmAnnotator] Could not parse model response: ${raw.slice(0, 200)}`);
    return [];
  }

  const parsed: ParsedEvaluation[] = [];
  for (const item of items) {
    const result = responseItemSchema.safeParse(item);
    if (result.success) parsed.push(result.data);
  }
  return parsed;
}

// =============================================================================
// EVALUATORS
// =============================================================================

export class NullLlmEvaluator implements LlmEvaluator {
  readonly model = 'none';

  async evaluate(): Promise<LlmJudgement[]> {
    return [];
  }
}

/** CompletionFn backed by the Anthropic Messages API. */
export function anthropicCompletion(client: Anthropic, model: string, maxTokens: number): CompletionFn {
  return async (system, prompt) => {
    const response = await client.messages.create({
      model,
      max_tokens: maxTokens,
      system,
      messages: [{ role: 'user', content: prompt }],
    });
    return response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('');
  };
}

export class AnthropicLlmEvaluator implements LlmEvaluator {
  constructor(
    private readonly complete: CompletionFn,
    readonly model: string,
    private readonly batchSize: number = 15,
  ) {}

  /**
   * One model call per batch of titles. A failed call is logged and counted;
   * the other batches still go through.
   */
  async evaluate(requests: LlmEvaluationRequest[]): Promise<LlmJudgement[]> {
    const judgements: LlmJudgement[] = [];

    for (let start = 0; start < requests.length; start += this.batchSize) {
      const batch = requests.slice(start, start + this.batchSize);
      const batchId = crypto.randomUUID();

      let reply: string;
      try {
        reply = await this.complete(SYSTEM_PROMPT, batchPrompt(batch.map(r => r.title)));
      } catch (error) {
        console.warn(`[LlmAnnotator] Batch ${batchId} failed: ${errorMessage(error)}`);
        collaboratorDegradedTotal.inc({ collaborator: 'llm' });
        llmEvaluationsTotal.inc({ outcome: 'failed' }, batch.length);
        continue;
      }

      const parsed = parseEvaluationResponse(reply);
      const answered = new Set<number>();
      for (const item of parsed) {
        const request = batch[item.idx - 1];
        if (!request || answered.has(item.idx)) continue;
        answered.add(item.idx);

        const score = clamp(item.score, -1, 1);
        judgements.push({
          articleId: request.articleId,
          title: request.title,
          score,
          label: scoreToLabel(score),
          confidence: clamp(item.confidence, 0, 1),
          reasoning: item.reasoning,
          batchId,
        });
      }
      llmEvaluationsTotal.inc({ outcome: 'evaluated' }, answered.size);
      if (answered.size < batch.length) {
        llmEvaluationsTotal.inc({ outcome: 'missing' }, batch.length - answered.size);
      }
    }

    return judgements;
  }
}

// =============================================================================
// ANNOTATION RUN
// =============================================================================

export interface AnnotationRunOptions {
  date?: string;
  minUncertainty?: number;
  limit?: number;
}

export interface AnnotationRunResult {
  date: string | null;
  candidates: number;
  evaluated: number;
  feedbackCreated: number;
}

export class LlmAnnotationService {
  constructor(
    private readonly repository: SentimentRepository,
    private readonly evaluator: LlmEvaluator,
    private readonly feedback: FeedbackService,
    private readonly options: { uncertaintyThreshold: number; feedbackConfidence: number },
  ) {}

  get model(): string {
    return this.evaluator.model;
  }

  async run(options: AnnotationRunOptions = {}): Promise<AnnotationRunResult> {
    const minUncertainty = options.minUncertainty ?? this.options.uncertaintyThreshold;
    const limit = options.limit ?? 100;
    if (!Number.isInteger(limit) || limit < 1 || limit > 1000) {
      throw new ValidationError('limit must be an integer between 1 and 1000', { limit });
    }

    const date = options.date !== undefined
      ? assertCalendarDate(options.date)
      : await this.repository.latestCrawlDate();
    if (date === null) {
      return { date, candidates: 0, evaluated: 0, feedbackCreated: 0 };
    }

    const queued = await this.repository.listQueue(date, 'pending');
    const byArticle = new Map<number, QueueItemRecord>(queued.map(item => [item.articleId, item]));
    // confident evaluations left unsynced by an earlier failed run
    const resumed = await this.repository.unsyncedEvaluations(
      queued.map(item => item.articleId), this.options.feedbackConfidence);

    const pending = queued.filter(item => item.snapshot.uncertaintyScore >= minUncertainty);
    const done = new Set(await this.repository.evaluatedArticleIds(pending.map(item => item.articleId)));
    const candidates = pending.filter(item => !done.has(item.articleId)).slice(0, limit);
    if (candidates.length === 0 && resumed.length === 0) {
      return { date, candidates: 0, evaluated: 0, feedbackCreated: 0 };
    }

    let saved: LlmEvaluationRecord[] = [];
    if (candidates.length > 0) {
      const judgements = await this.evaluator.evaluate(
        candidates.map(item => ({ articleId: item.articleId, title: item.title })));
      if (judgements.length === 0) {
        console.warn(`[LlmAnnotator] No evaluations for ${candidates.length} candidate(s) on ${date}`);
      }
      saved = await this.repository.saveLlmEvaluations(judgements.map((j): NewLlmEvaluation => ({
        articleId: j.articleId,
        title: j.title,
        score: j.score,
        label: j.label,
        confidence: j.confidence,
        reasoning: j.reasoning,
        model: this.evaluator.model,
        batchId: j.batchId,
      })));
    }

    const confident = saved.filter(evaluation => evaluation.confidence >= this.options.feedbackConfidence);
    let fedBack = 0;
    for (const evaluation of [...resumed, ...confident]) {
      const item = evaluation.articleId === null ? undefined : byArticle.get(evaluation.articleId);
      if (!item) continue;

      // the feedback row and the synced flag commit together
      await this.feedback.submit({
        articleId: item.articleId,
        title: item.title,
        url: item.url,
        predictedScore: item.snapshot.finalScore,
        predictedLabel: item.snapshot.finalLabel,
        userScore: evaluation.score,
        userLabel: evaluation.label,
        comment: evaluation.reasoning || null,
        source: 'llm',
      }, { evaluationId: evaluation.id });
      fedBack++;
    }

    console.log(`[LlmAnnotator] ${date}: ${saved.length}/${candidates.length} evaluated, ${fedBack} fed back` +
      (resumed.length > 0 ? ` (${resumed.length} resumed)` : ''));
    return { date, candidates: candidates.length, evaluated: saved.length, feedbackCreated: fedBack };
  }
}

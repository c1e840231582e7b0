/**
 * /v1 routes. Handlers validate input, call one service and shape the JSON.
 */

import { Router, Request, Response } from 'express';
import type { Services } from '../container';
import type { SentimentResult } from '../nlp/sentimentEngine';
import type { RankedArticle } from '../services/newsSearch';
import { asyncHandler } from './middleware';
import {
  parseInput,
  textBodySchema,
  searchQuerySchema,
  ingestBodySchema,
  queueBuildBodySchema,
  queueListQuerySchema,
  queueDateQuerySchema,
  itemIdParamsSchema,
  queueSubmitBodySchema,
  feedbackBodySchema,
  daysQuerySchema,
  limitQuerySchema,
  aggregatedQuerySchema,
  pendingKeywordsQuerySchema,
  approveKeywordBodySchema,
  rejectKeywordBodySchema,
  llmRunBodySchema,
} from './schemas';

export const SENTIMENT_SCORE_DEFINITION =
  'x <= -0.35: Bearish; -0.35 < x <= -0.15: Somewhat-Bearish; -0.15 < x < 0.15: Neutral; ' +
  '0.15 <= x < 0.35: Somewhat-Bullish; x >= 0.35: Bullish';

function presentScore(result: SentimentResult) {
  return {
    score: result.score,
    label: result.label,
    language: result.language,
    lexicon_score: result.lexiconScore,
    direction: result.direction,
    match_count: result.matchCount,
    matches: result.matches.map(m => ({
      term: m.term,
      weight: m.weight,
      origin: m.origin,
      negated: m.negated,
      modifier: m.modifier,
    })),
  };
}

function presentArticle(article: RankedArticle) {
  return {
    id: article.id,
    title: article.title,
    url: article.url,
    source: article.source,
    time_published: (article.publishedAt ?? article.crawledAt).toISOString(),
    relevance_score: article.relevance,
    bm25: article.bm25,
    matched_aliases: article.matchedAliases,
    overall_sentiment_score: article.sentimentScore,
    overall_sentiment_label: article.sentimentLabel,
  };
}

export function createRoutes(services: Services): Router {
  const router = Router();

  // ---------------------------------------------------------------------------
  // Scoring
  // ---------------------------------------------------------------------------

  router.post('/sentiment/score', asyncHandler(async (req: Request, res: Response) => {
    const { text } = parseInput(textBodySchema, req.body);
    res.json(presentScore(await services.engine.analyze(text)));
  }));

  router.post('/sentiment/uncertainty', asyncHandler(async (req: Request, res: Response) => {
    const { text } = parseInput(textBodySchema, req.body);
    res.json(await services.estimator.estimate(text));
  }));

  // ---------------------------------------------------------------------------
  // Search & articles
  // ---------------------------------------------------------------------------

  router.get('/news/search', asyncHandler(async (req: Request, res: Response) => {
    const query = parseInput(searchQuerySchema, req.query);
    const result = await services.search.search({
      query: query.tickers,
      from: query.time_from,
      to: query.time_to,
      limit: query.limit,
    });
    res.json({
      items: String(result.results.length),
      query: result.query,
      aliases: result.aliases,
      time_from: result.range.from.toISOString(),
      time_to: result.range.to.toISOString(),
      sentiment_score_definition: SENTIMENT_SCORE_DEFINITION,
      feed: result.results.map(presentArticle),
    });
  }));

  router.post('/articles', asyncHandler(async (req: Request, res: Response) => {
    const { articles } = parseInput(ingestBodySchema, req.body, 'Invalid articles payload');
    res.status(201).json(await services.articles.ingest(articles));
  }));

  // ---------------------------------------------------------------------------
  // Labeling queue
  // ---------------------------------------------------------------------------

  router.post('/queue/build', asyncHandler(async (req: Request, res: Response) => {
    const body = parseInput(queueBuildBodySchema, req.body ?? {});
    res.json(await services.queue.build(body.date, body.limit));
  }));

  router.get('/queue', asyncHandler(async (req: Request, res: Response) => {
    const query = parseInput(queueListQuerySchema, req.query);
    const { date, items } = await services.queue.list(query.date, query.status);
    res.json({ date, count: items.length, items });
  }));

  router.get('/queue/stats', asyncHandler(async (req: Request, res: Response) => {
    const query = parseInput(queueDateQuerySchema, req.query);
    res.json(await services.queue.stats(query.date));
  }));

  router.post('/queue/:id/submit', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(itemIdParamsSchema, req.params);
    const body = parseInput(queueSubmitBodySchema, req.body);
    res.json(await services.queue.submit(id, body));
  }));

  router.post('/queue/:id/skip', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(itemIdParamsSchema, req.params);
    res.json(await services.queue.skip(id));
  }));

  // ---------------------------------------------------------------------------
  // Feedback
  // ---------------------------------------------------------------------------

  router.post('/feedback', asyncHandler(async (req: Request, res: Response) => {
    const body = parseInput(feedbackBodySchema, req.body);
    res.status(201).json(await services.feedback.submit({ ...body, source: 'human' }));
  }));

  router.get('/feedback/stats', asyncHandler(async (req: Request, res: Response) => {
    const { days } = parseInput(daysQuerySchema, req.query);
    res.json(await services.feedback.stats(days));
  }));

  router.get('/feedback/misclassified', asyncHandler(async (req: Request, res: Response) => {
    const { limit } = parseInput(limitQuerySchema, req.query);
    const items = await services.feedback.misclassified(limit);
    res.json({ count: items.length, items });
  }));

  // ---------------------------------------------------------------------------
  // Lexicon & keywords
  // ---------------------------------------------------------------------------

  router.get('/lexicon', asyncHandler(async (_req: Request, res: Response) => {
    const lexicon = await services.lexicon.mergedLexicon();
    res.json({
      counts: { positive: lexicon.positive.length, negative: lexicon.negative.length },
      positive: lexicon.positive,
      negative: lexicon.negative,
    });
  }));

  router.get('/keywords/aggregated', asyncHandler(async (req: Request, res: Response) => {
    const query = parseInput(aggregatedQuerySchema, req.query);
    res.json(await services.aggregator.aggregated({
      minConfidence: query.min_confidence,
      minFrequency: query.min_frequency,
      lookbackDays: query.lookback_days,
    }));
  }));

  router.get('/keywords/pending', asyncHandler(async (req: Request, res: Response) => {
    const query = parseInput(pendingKeywordsQuerySchema, req.query);
    const groups = await services.aggregator.pendingGroups(query.lookback_days, query.limit);
    res.json({ count: groups.length, items: groups });
  }));

  router.get('/keywords/approved', asyncHandler(async (_req: Request, res: Response) => {
    const keywords = await services.repository.listLearnedKeywords();
    res.json({ count: keywords.length, items: keywords });
  }));

  router.post('/keywords/approve', asyncHandler(async (req: Request, res: Response) => {
    const body = parseInput(approveKeywordBodySchema, req.body);
    res.json(await services.feedback.approveKeyword(body.keyword, body.sentimentType, body.weight, body.approvedBy));
  }));

  router.post('/keywords/reject', asyncHandler(async (req: Request, res: Response) => {
    const body = parseInput(rejectKeywordBodySchema, req.body);
    const rejected = await services.feedback.rejectKeyword(body.keyword, body.sentimentType);
    res.json({ keyword: body.keyword, sentimentType: body.sentimentType ?? null, suggestionsMarked: rejected });
  }));

  // ---------------------------------------------------------------------------
  // LLM annotation
  // ---------------------------------------------------------------------------

  router.post('/llm/evaluate', asyncHandler(async (req: Request, res: Response) => {
    const body = parseInput(llmRunBodySchema, req.body ?? {});
    res.json(await services.annotator.run(body));
  }));

  return router;
}

/**
 * Wires the services of the learning loop around one repository.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { Config } from './config/default';
import type { SentimentRepository } from './database/repository';
import { LexiconStore, StaticLexicon } from './nlp/lexicon';
import { SentimentEngine } from './nlp/sentimentEngine';
import {
  DirectionClassifier,
  HttpDirectionClassifier,
  HttpLabelClassifier,
  LabelClassifier,
  NullDirectionClassifier,
  NullLabelClassifier,
} from './nlp/signals';
import { UncertaintyEstimator } from './services/uncertaintyEstimator';
import { KeywordMiner } from './services/keywordMiner';
import { KeywordAggregator } from './services/keywordAggregator';
import { FeedbackService } from './services/feedbackService';
import { LabelingQueue } from './services/labelingQueue';
import { ArticleService } from './services/articleService';
import { NewsSearchService } from './services/newsSearch';
import {
  AnthropicLlmEvaluator,
  LlmAnnotationService,
  LlmEvaluator,
  NullLlmEvaluator,
  anthropicCompletion,
} from './services/llmAnnotator';
import { TickerAliasTable } from './search/tickerAliases';
import type { Clock } from './utils/ttlCache';

export interface Services {
  repository: SentimentRepository;
  lexicon: LexiconStore;
  aggregator: KeywordAggregator;
  engine: SentimentEngine;
  estimator: UncertaintyEstimator;
  feedback: FeedbackService;
  queue: LabelingQueue;
  articles: ArticleService;
  search: NewsSearchService;
  annotator: LlmAnnotationService;
}

export interface ServiceOverrides {
  staticLexicon?: StaticLexicon;
  aliases?: TickerAliasTable;
  directionClassifier?: DirectionClassifier;
  labelClassifier?: LabelClassifier;
  llmEvaluator?: LlmEvaluator;
  clock?: Clock;
  now?: () => Date;
}

function directionClassifier(cfg: Config): DirectionClassifier {
  const { directionUrl, timeoutMs } = cfg.classifier;
  return directionUrl ? new HttpDirectionClassifier(directionUrl, timeoutMs) : new NullDirectionClassifier();
}

function labelClassifier(cfg: Config): LabelClassifier {
  const { labelUrl, timeoutMs } = cfg.classifier;
  return labelUrl ? new HttpLabelClassifier(labelUrl, timeoutMs) : new NullLabelClassifier();
}

function llmEvaluator(cfg: Config): LlmEvaluator {
  if (!cfg.llm.apiKey) return new NullLlmEvaluator();
  const client = new Anthropic({ apiKey: cfg.llm.apiKey });
  return new AnthropicLlmEvaluator(
    anthropicCompletion(client, cfg.llm.model, cfg.llm.maxTokens),
    cfg.llm.model,
    cfg.llm.batchSize,
  );
}

export function createServices(repository: SentimentRepository, cfg: Config, overrides: ServiceOverrides = {}): Services {
  const staticLexicon = overrides.staticLexicon ?? StaticLexicon.bundled();
  const now = overrides.now;
  const ttlMs = cfg.scoring.lexiconCacheTtlMs;

  const aggregator = new KeywordAggregator(repository, staticLexicon.terms, {
    defaults: {
      minConfidence: cfg.learning.minConfidence,
      minFrequency: cfg.learning.minFrequency,
      lookbackDays: cfg.learning.lookbackDays,
    },
    maxWeight: cfg.learning.maxAutoWeight,
    ttlMs,
    clock: overrides.clock,
    now,
  });
  const lexicon = new LexiconStore(staticLexicon, repository, aggregator, { ttlMs, clock: overrides.clock });

  const engine = new SentimentEngine(lexicon, {
    lexiconWeight: cfg.scoring.lexiconWeight,
    maxTextLength: cfg.scoring.maxTextLength,
    directionClassifier: overrides.directionClassifier ?? directionClassifier(cfg),
  });
  const estimator = new UncertaintyEstimator(engine, {
    baseWeights: cfg.uncertainty.baseWeights,
    extendedWeights: cfg.uncertainty.extendedWeights,
    magnitudeThreshold: cfg.uncertainty.magnitudeThreshold,
    labelClassifier: overrides.labelClassifier ?? labelClassifier(cfg),
  });

  const miner = new KeywordMiner(staticLexicon.terms, {
    errorThreshold: cfg.learning.errorThreshold,
    neutralBand: cfg.learning.neutralBand,
  });
  const feedback = new FeedbackService(repository, miner, lexicon, now);

  const queue = new LabelingQueue(repository, estimator, feedback, {
    defaultLimit: cfg.queue.defaultLimit,
    maxLimit: cfg.queue.maxLimit,
    timeZone: cfg.scoring.timezone,
    now,
  });

  const articles = new ArticleService(repository, engine, lexicon, {
    timeZone: cfg.scoring.timezone,
    chunkSize: cfg.jobs.rescoreChunkSize,
    now,
  });

  const search = new NewsSearchService(repository, overrides.aliases ?? TickerAliasTable.bundled(), engine, {
    defaultLimit: cfg.search.defaultLimit,
    maxLimit: cfg.search.maxLimit,
    defaultRangeDays: cfg.search.defaultRangeDays,
    bm25: { k1: cfg.search.k1, b: cfg.search.b },
    now,
  });

  const annotator = new LlmAnnotationService(repository, overrides.llmEvaluator ?? llmEvaluator(cfg), feedback, {
    uncertaintyThreshold: cfg.llm.uncertaintyThreshold,
    feedbackConfidence: cfg.llm.feedbackConfidence,
  });

  return { repository, lexicon, aggregator, engine, estimator, feedback, queue, articles, search, annotator };
}

/**
 * Prometheus Metrics Configuration
 * Centralized metrics registry and definitions
 */

import { Registry, collectDefaultMetrics, Counter, Gauge, Histogram } from 'prom-client';

// =============================================================================
// REGISTRY SETUP
// =============================================================================

export const metricsRegistry = new Registry();
collectDefaultMetrics({ register: metricsRegistry });

// =============================================================================
// HTTP METRICS
// =============================================================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'endpoint', 'status'],
  registers: [metricsRegistry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'endpoint'],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [metricsRegistry],
});

// =============================================================================
// SCORING METRICS
// =============================================================================

export const sentimentScoredTotal = new Counter({
  name: 'sentiment_scored_total',
  help: 'Total texts scored',
  labelNames: ['language'],
  registers: [metricsRegistry],
});

// Optional collaborators (secondary classifier, third classifier, LLM) that failed and were skipped
export const collaboratorDegradedTotal = new Counter({
  name: 'collaborator_degraded_total',
  help: 'Total calls to optional collaborators that failed and fell back',
  labelNames: ['collaborator'],
  registers: [metricsRegistry],
});

export const lexiconCacheEvents = new Counter({
  name: 'lexicon_cache_events_total',
  help: 'Merged lexicon and keyword aggregation cache lookups',
  labelNames: ['cache', 'result'],
  registers: [metricsRegistry],
});

// =============================================================================
// ACTIVE LEARNING METRICS
// =============================================================================

export const queueTransitionsTotal = new Counter({
  name: 'labeling_queue_transitions_total',
  help: 'Labeling queue items created or resolved, by resulting status',
  labelNames: ['status'],
  registers: [metricsRegistry],
});

export const feedbackReceivedTotal = new Counter({
  name: 'feedback_received_total',
  help: 'Feedback records written, by source',
  labelNames: ['source'],
  registers: [metricsRegistry],
});

export const keywordSuggestionsRecordedTotal = new Counter({
  name: 'keyword_suggestions_recorded_total',
  help: 'Keyword suggestion rows appended by the miner',
  labelNames: ['sentiment_type'],
  registers: [metricsRegistry],
});

export const autoLexiconSize = new Gauge({
  name: 'auto_lexicon_keywords',
  help: 'Keywords currently promoted by auto-aggregation',
  labelNames: ['sentiment_type'],
  registers: [metricsRegistry],
});

// =============================================================================
// BATCH JOB METRICS
// =============================================================================

export const jobRunDuration = new Histogram({
  name: 'batch_job_duration_seconds',
  help: 'Batch job duration in seconds',
  labelNames: ['job', 'status'],
  buckets: [0.1, 0.5, 1, 5, 15, 60, 300],
  registers: [metricsRegistry],
});

export const llmEvaluationsTotal = new Counter({
  name: 'llm_evaluations_total',
  help: 'LLM annotations by outcome',
  labelNames: ['outcome'],
  registers: [metricsRegistry],
});

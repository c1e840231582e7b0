/**
 * API Integration Tests
 * The full Express app over the in-memory repository; no database is involved.
 */

import { Express } from 'express';
import request from 'supertest';
import { createApp } from '../../src/api/app';
import { SENTIMENT_SCORE_DEFINITION } from '../../src/api/routes';
import { testServices } from '../helpers/services';

function buildApp() {
  const context = testServices();
  const app: Express = createApp(context.services, {
    corsOrigins: ['http://localhost:3000'],
    exposeInternalErrors: false,
    metricsEnabled: true,
    metricsPath: '/metrics',
    version: '1.0.0',
  });
  return { ...context, app };
}

describe('API Integration Tests', () => {
  describe('Health Endpoints', () => {
    it('GET /health should return healthy status', async () => {
      const { app } = buildApp();
      const res = await request(app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('healthy');
      expect(res.body.version).toBe('1.0.0');
      expect(res.body).toHaveProperty('timestamp');
    });

    it('GET /health/live should return alive status', async () => {
      const { app } = buildApp();
      const res = await request(app).get('/health/live');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'alive' });
    });

    it('GET /health/ready should report the database', async () => {
      const { app } = buildApp();
      const res = await request(app).get('/health/ready');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('ready');
      expect(res.body.components).toEqual({ postgres: { status: 'healthy' } });
    });

    it('GET /health/ready should return 503 when the database is down', async () => {
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      const { app, repository } = buildApp();
      repository.pingError = new Error('connection refused');

      const res = await request(app).get('/health/ready');

      expect(res.status).toBe(503);
      expect(res.body).toEqual({ status: 'not_ready', error: 'One or more health checks failed' });
      expect(errorSpy).toHaveBeenCalledWith('[Application] Readiness check failed:', 'connection refused');
    });
  });

  describe('Security Headers', () => {
    it('should include helmet headers and the request id', async () => {
      const { app } = buildApp();
      const res = await request(app).get('/health').set('X-Request-Id', 'trace-1');

      expect(res.headers['x-content-type-options']).toBe('nosniff');
      expect(res.headers['x-frame-options']).toBe('DENY');
      expect(res.headers['x-request-id']).toBe('trace-1');
    });
  });

  describe('Scoring', () => {
    it('POST /v1/sentiment/score should explain the score', async () => {
      const { app } = buildApp();
      const res = await request(app).post('/v1/sentiment/score').send({ text: 'Lãi lớn kỷ lục' });

      expect(res.status).toBe(200);
      expect(res.body.score).toBeCloseTo(Math.tanh(1.44), 10);
      expect(res.body.label).toBe('Bullish');
      expect(res.body.language).toBe('vi');
      expect(res.body.match_count).toBe(2);
      expect(res.body.matches.map((m: { term: string }) => m.term)).toEqual(['lãi lớn', 'kỷ lục']);
    });

    it('POST /v1/sentiment/uncertainty should return the snapshot', async () => {
      const { app } = buildApp();
      const res = await request(app).post('/v1/sentiment/uncertainty').send({ text: 'Thông tin mới' });

      expect(res.status).toBe(200);
      expect(res.body.uncertaintyScore).toBeCloseTo(0.685, 10);
      expect(res.body.finalLabel).toBe('Neutral');
      expect(res.body.modelConflict).toBeNull();
    });

    it('should reject an empty text with the validation envelope', async () => {
      const { app } = buildApp();
      const res = await request(app).post('/v1/sentiment/score').set('X-Request-Id', 'r-400').send({ text: '' });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
      expect(res.body.error.message).toBe('Invalid request');
      expect(res.body.error.details[0].message).toBe('Text is required');
      expect(res.body.error.requestId).toBe('r-400');
    });

    it('should reject malformed JSON', async () => {
      const { app } = buildApp();
      const res = await request(app)
        .post('/v1/sentiment/score')
        .set('Content-Type', 'application/json')
        .send('{"text": ');

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('Malformed JSON body');
    });
  });

  describe('Articles and search', () => {
    it('should ingest articles and find them by ticker alias', async () => {
      const { app } = buildApp();

      const ingest = await request(app).post('/v1/articles').send({
        articles: [
          { source: 'cafef', title: 'Vingroup lãi lớn', publishedAt: '20240314T0930' },
          { source: 'cafef', title: 'Giá thép giảm' },
          { source: 'cafef', title: 'Giá thép giảm' },
        ],
      });
      expect(ingest.status).toBe(201);
      expect(ingest.body).toEqual({ received: 3, inserted: 2, duplicates: 1 });

      const res = await request(app).get('/v1/news/search').query({ tickers: 'VIC' });

      expect(res.status).toBe(200);
      expect(res.body.items).toBe('1');
      expect(res.body.aliases).toEqual(['Vingroup', 'VIC']);
      expect(res.body.time_from).toBe('2024-03-08T03:00:00.000Z');
      expect(res.body.time_to).toBe('2024-03-15T03:00:00.000Z');
      expect(res.body.sentiment_score_definition).toBe(SENTIMENT_SCORE_DEFINITION);
      expect(res.body.feed).toHaveLength(1);
      expect(res.body.feed[0].title).toBe('Vingroup lãi lớn');
      expect(res.body.feed[0].time_published).toBe('2024-03-14T09:30:00.000Z');
      expect(res.body.feed[0].matched_aliases).toEqual(['Vingroup']);
      expect(res.body.feed[0].overall_sentiment_label).toBe('Bullish');
    });

    it('should require tickers', async () => {
      const { app } = buildApp();
      const res = await request(app).get('/v1/news/search');

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('should reject an invalid ingest payload', async () => {
      const { app } = buildApp();
      const res = await request(app).post('/v1/articles').send({ articles: [{ source: 'cafef' }] });

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('Invalid articles payload');
    });
  });

  describe('Labeling queue', () => {
    it('should build, review and report a day of headlines', async () => {
      const { app } = buildApp();
      await request(app).post('/v1/articles').send({
        articles: [
          { source: 'cafef', title: 'Cổ phiếu tăng' },
          { source: 'cafef', title: 'Thông tin mới' },
          { source: 'cafef', title: 'Lãi lớn kỷ lục' },
        ],
      });

      const build = await request(app).post('/v1/queue/build').send({ date: '2024-03-15', limit: 2 });
      expect(build.status).toBe(200);
      expect(build.body).toEqual({ date: '2024-03-15', totalCandidates: 3, alreadyQueued: 0, scored: 3, inserted: 2 });

      const list = await request(app).get('/v1/queue');
      expect(list.body.date).toBe('2024-03-15');
      expect(list.body.count).toBe(2);
      const [first, second] = list.body.items;
      expect([first.title, second.title]).toEqual(['Thông tin mới', 'Cổ phiếu tăng']);

      const submit = await request(app).post(`/v1/queue/${first.id}/submit`).send({ userScore: -0.6 });
      expect(submit.status).toBe(200);
      expect(submit.body.status).toBe('labeled');

      const again = await request(app).post(`/v1/queue/${first.id}/submit`).send({ userScore: -0.6 });
      expect(again.status).toBe(409);
      expect(again.body.error).toMatchObject({
        code: 'INVALID_STATE',
        message: `Queue item ${first.id} is already labeled`,
      });

      const skip = await request(app).post(`/v1/queue/${second.id}/skip`);
      expect(skip.status).toBe(200);
      expect(skip.body.status).toBe('skipped');

      const stats = await request(app).get('/v1/queue/stats').query({ date: '2024-03-15' });
      expect(stats.body).toMatchObject({ queueDate: '2024-03-15', total: 2, pending: 0, labeled: 1, skipped: 1 });
    });

    it('should return 404 for an unknown queue item', async () => {
      const { app } = buildApp();
      const res = await request(app).post('/v1/queue/99/skip');

      expect(res.status).toBe(404);
      expect(res.body.error.message).toBe('Queue item 99 not found');
    });

    it('should reject a non-numeric item id', async () => {
      const { app } = buildApp();
      const res = await request(app).post('/v1/queue/abc/skip');

      expect(res.status).toBe(400);
    });
  });

  describe('Feedback and keywords', () => {
    it('POST /v1/feedback should mine keyword candidates', async () => {
      const { app } = buildApp();
      const res = await request(app).post('/v1/feedback').send({ title: 'Giá thép', predictedScore: 0, userScore: -0.6 });

      expect(res.status).toBe(201);
      expect(res.body.feedbackId).toBe(1);
      expect(res.body.mined).toBe(true);
      expect(res.body.candidates).toEqual(['giá', 'thép', 'giá thép']);
    });

    it('GET /v1/feedback/stats should reject a zero-day window', async () => {
      const { app } = buildApp();
      const res = await request(app).get('/v1/feedback/stats').query({ days: '0' });

      expect(res.status).toBe(400);
    });

    it('should approve a keyword into the lexicon', async () => {
      const { app } = buildApp();

      const approve = await request(app)
        .post('/v1/keywords/approve')
        .send({ keyword: 'Cổ Tức', sentimentType: 'positive', weight: 0.6 });
      expect(approve.status).toBe(200);
      expect(approve.body).toEqual({ keyword: 'cổ tức', sentimentType: 'positive', suggestedWeight: 0.6 });

      const lexicon = await request(app).get('/v1/lexicon');
      expect(lexicon.body.counts).toEqual({ positive: 4, negative: 2 });
      expect(lexicon.body.positive).toContainEqual({ term: 'cổ tức', weight: 0.6, origin: 'approved' });

      const approved = await request(app).get('/v1/keywords/approved');
      expect(approved.body.count).toBe(1);
    });

    it('should report how many suggestions a rejection touched', async () => {
      const { app } = buildApp();
      await request(app).post('/v1/feedback').send({ title: 'Giá thép', predictedScore: 0, userScore: -0.6 });

      const res = await request(app).post('/v1/keywords/reject').send({ keyword: 'giá thép' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ keyword: 'giá thép', sentimentType: null, suggestionsMarked: 1 });
    });
  });

  describe('LLM annotation', () => {
    it('should do nothing without crawled articles', async () => {
      const { app } = buildApp();
      const res = await request(app).post('/v1/llm/evaluate').send({});

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ date: null, candidates: 0, evaluated: 0, feedbackCreated: 0 });
    });
  });

  describe('Metrics', () => {
    it('should expose Prometheus metrics', async () => {
      const { app } = buildApp();
      await request(app).get('/health');
      const res = await request(app).get('/metrics');

      expect(res.status).toBe(200);
      expect(res.text).toContain('http_requests_total');
    });
  });

  describe('404 Handling', () => {
    it('should return 404 for unknown endpoints', async () => {
      const { app } = buildApp();
      const res = await request(app).get('/v1/unknown');

      expect(res.status).toBe(404);
      expect(res.body.error.code).toBe('NOT_FOUND');
      expect(res.body.error.message).toBe('Endpoint GET /v1/unknown not found');
    });
  });
});

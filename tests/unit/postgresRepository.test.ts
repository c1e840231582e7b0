/**
 * PostgreSQL Repository Unit Tests
 * Statements run against a scripted pool; no database is involved.
 */

import {
  PostgresSentimentRepository,
  likePattern,
  mapArticle,
  ArticleRow,
} from '../../src/database/postgresRepository';
import { InvalidStateError, StorageError } from '../../src/errors';
import type { NewQueueItem } from '../../src/database/repository';
import { scriptedPool, pgError } from '../helpers/scriptedPool';
import { FIXED_NOW } from '../helpers/fixtures';

const articleRow: ArticleRow = {
  id: 7,
  source: 'cafef',
  title: 'Cổ phiếu tăng',
  url: null,
  published_at: null,
  crawled_at: FIXED_NOW,
  crawl_date: '2024-03-15',
  sentiment_score: 0.42,
  sentiment_label: 'Bullish',
  scored_at: FIXED_NOW,
};

function queueItem(articleId: number): NewQueueItem {
  return {
    articleId,
    title: `Tin ${articleId}`,
    url: null,
    crawlDate: '2024-03-15',
    snapshot: {
      lexiconScore: 0,
      secondaryDirection: null,
      modelLabel: null,
      finalScore: 0,
      finalLabel: 'Neutral',
      matchCount: 0,
      signalConflict: 0.3,
      magnitudeUncertainty: 1,
      matchSparsity: 1,
      modelConflict: null,
      uncertaintyScore: 0.685,
    },
  };
}

const feedback = {
  articleId: 7,
  title: 'Cổ phiếu tăng',
  url: null,
  predictedScore: 0.42,
  predictedLabel: 'Bullish' as const,
  userScore: -0.6,
  userLabel: 'Bearish' as const,
  comment: null,
  source: 'human' as const,
};

describe('likePattern', () => {
  it('should escape LIKE wildcards and wrap in percent signs', () => {
    expect(likePattern('VIC')).toBe('%VIC%');
    expect(likePattern('50%_a\\b')).toBe('%50\\%\\_a\\\\b%');
  });
});

describe('mapArticle', () => {
  it('should map columns to the record', () => {
    expect(mapArticle(articleRow)).toEqual({
      id: 7,
      source: 'cafef',
      title: 'Cổ phiếu tăng',
      url: null,
      publishedAt: null,
      crawledAt: FIXED_NOW,
      crawlDate: '2024-03-15',
      sentimentScore: 0.42,
      sentimentLabel: 'Bullish',
      scoredAt: FIXED_NOW,
    });
  });

  it('should refuse labels outside the label set', () => {
    expect(() => mapArticle({ ...articleRow, sentiment_label: 'Great' }))
      .toThrow('Unexpected value in sentiment_label: Great');
  });
});

describe('PostgresSentimentRepository', () => {
  describe('insertArticles', () => {
    it('should insert all rows in one statement and report the inserted count', async () => {
      const { pool, queries } = scriptedPool(() => ({ rows: [], rowCount: 1 }));
      const repository = new PostgresSentimentRepository(pool);

      const inserted = await repository.insertArticles([
        { ...mapArticle(articleRow) },
        { ...mapArticle(articleRow), title: 'Giá giảm' },
      ]);

      expect(inserted).toBe(1);
      expect(queries).toHaveLength(1);
      expect(queries[0].text).toContain('ON CONFLICT (source, title, crawl_date) DO NOTHING');
      expect(queries[0].values).toHaveLength(16);
      expect(queries[0].values?.[9]).toBe('Giá giảm');
    });

    it('should skip the round trip for an empty batch', async () => {
      const { pool, queries } = scriptedPool();
      expect(await new PostgresSentimentRepository(pool).insertArticles([])).toBe(0);
      expect(queries).toEqual([]);
    });
  });

  describe('enqueue', () => {
    it('should lock the date and append after the current highest rank', async () => {
      const { pool, queries, statements } = scriptedPool(text => {
        if (text.includes('MAX(priority_rank)')) return [{ max_rank: 4, total: 4 }];
        if (text.startsWith('INSERT INTO labeling_queue')) {
          // the first item is already queued for the date
          return queries.filter(q => q.text.startsWith('INSERT')).length === 1 ? [] : [{ id: 30 }];
        }
        return [];
      });
      const repository = new PostgresSentimentRepository(pool);

      const inserted = await repository.enqueue('2024-03-15', [queueItem(1), queueItem(2), queueItem(3)], 25);

      expect(inserted).toBe(2);
      const ranks = queries.filter(q => q.text.startsWith('INSERT')).map(q => q.values?.[2]);
      expect(ranks).toEqual([5, 5, 6]);
      expect(statements()[0]).toBe('BEGIN');
      expect(statements()[1]).toContain('pg_advisory_xact_lock');
      expect(statements()[statements().length - 1]).toBe('COMMIT');
    });

    it('should stop inserting once the date reaches its capacity', async () => {
      const { pool, queries } = scriptedPool(text => {
        if (text.includes('MAX(priority_rank)')) return [{ max_rank: 24, total: 24 }];
        if (text.startsWith('INSERT INTO labeling_queue')) return [{ id: 31 }];
        return [];
      });
      const repository = new PostgresSentimentRepository(pool);

      const inserted = await repository.enqueue('2024-03-15', [queueItem(1), queueItem(2), queueItem(3)], 25);

      expect(inserted).toBe(1);
      expect(queries.filter(q => q.text.startsWith('INSERT')).map(q => q.values?.[0])).toEqual([1]);
      expect(queries[queries.length - 1].text).toBe('COMMIT');
    });
  });

  describe('recordFeedback', () => {
    it('should continue the co-occurrence count and inherit a rejection', async () => {
      const { pool, queries } = scriptedPool(text => {
        if (text.startsWith('INSERT INTO sentiment_feedback')) return [{ id: 12 }];
        if (text.includes('MAX(co_occurrence_count)')) return [{ max_count: 2, rejected: true }];
        return [];
      });
      const repository = new PostgresSentimentRepository(pool);

      const outcome = await repository.recordFeedback({
        feedback,
        candidates: [
          { keyword: 'tăng', sentimentType: 'negative', suggestedWeight: 0.6 },
          { keyword: 'cổ phiếu', sentimentType: 'negative', suggestedWeight: 0.6 },
        ],
      });

      expect(outcome).toEqual({ feedbackId: 12, suggestionsRecorded: 2 });
      const suggestions = queries.filter(q => q.text.startsWith('INSERT INTO keyword_suggestions'));
      expect(suggestions.map(q => q.values)).toEqual([
        ['cổ phiếu', 'negative', 0.6, 3, 'Cổ phiếu tăng', 12, true],
        ['tăng', 'negative', 0.6, 3, 'Cổ phiếu tăng', 12, true],
      ]);
    });

    it('should roll back when the queue item is no longer pending', async () => {
      const { pool, statements } = scriptedPool(text => (text.includes('FOR UPDATE') ? [{ status: 'labeled' }] : []));
      const repository = new PostgresSentimentRepository(pool);

      await expect(repository.recordFeedback({ feedback, candidates: [], queueItemId: 3 }))
        .rejects.toThrow(InvalidStateError);
      expect(statements()).toEqual([
        'BEGIN',
        'SELECT status FROM labeling_queue WHERE id = $1 FOR UPDATE',
        'ROLLBACK',
      ]);
    });

    it('should move the queue item to labeled in the same transaction', async () => {
      const { pool, queries } = scriptedPool(text => {
        if (text.includes('FOR UPDATE')) return [{ status: 'pending' }];
        if (text.startsWith('INSERT INTO sentiment_feedback')) return [{ id: 13 }];
        return [];
      });
      const repository = new PostgresSentimentRepository(pool);

      await repository.recordFeedback({ feedback, candidates: [], queueItemId: 3 });

      const update = queries.find(q => q.text.startsWith('UPDATE labeling_queue'));
      expect(update?.values).toEqual([3, -0.6, 'Bearish', null, 13]);
      expect(queries[queries.length - 1].text).toBe('COMMIT');
    });

    it('should flag the LLM evaluation synced before committing', async () => {
      const { pool, statements, queries } = scriptedPool(text =>
        (text.startsWith('INSERT INTO sentiment_feedback') ? [{ id: 14 }] : []));
      const repository = new PostgresSentimentRepository(pool);

      await repository.recordFeedback({ feedback: { ...feedback, source: 'llm' }, candidates: [], evaluationId: 5 });

      expect(statements().slice(-2)).toEqual([
        'UPDATE llm_evaluations SET synced_to_feedback = TRUE WHERE id = $1',
        'COMMIT',
      ]);
      expect(queries.find(q => q.text.startsWith('UPDATE llm_evaluations'))?.values).toEqual([5]);
    });
  });

  describe('markSuggestionsReviewed', () => {
    it('should touch both sentiment types when none is given', async () => {
      const { pool, queries } = scriptedPool(text => (text.startsWith('UPDATE') ? { rows: [], rowCount: 2 } : []));
      const repository = new PostgresSentimentRepository(pool);

      expect(await repository.markSuggestionsReviewed('thép')).toBe(4);
      expect(queries.filter(q => q.text.startsWith('UPDATE')).map(q => q.values)).toEqual([
        ['thép', 'negative'],
        ['thép', 'positive'],
      ]);
    });
  });

  describe('suggestionGroups', () => {
    it('should count co-occurrence from rows inside the window', async () => {
      const { pool, queries } = scriptedPool(() => []);
      const repository = new PostgresSentimentRepository(pool);

      await repository.suggestionGroups(FIXED_NOW);

      expect(queries[0].text).toContain('COUNT(DISTINCT s.feedback_id)::int AS max_cooccurrence');
      expect(queries[0].text).not.toContain('co_occurrence_count');
      expect(queries[0].values).toEqual([FIXED_NOW]);
    });

    it('should reject an unknown sentiment type from storage', async () => {
      const { pool } = scriptedPool(() => [{
        keyword: 'thép',
        sentiment_type: 'mixed',
        frequency: 1,
        avg_weight: 0.5,
        max_cooccurrence: 1,
        last_seen: FIXED_NOW,
      }]);
      const repository = new PostgresSentimentRepository(pool);

      await expect(repository.suggestionGroups(FIXED_NOW)).rejects.toThrow(StorageError);
    });
  });

  describe('searchCandidates', () => {
    it('should match escaped aliases case-insensitively', async () => {
      const { pool, queries } = scriptedPool(() => [articleRow]);
      const repository = new PostgresSentimentRepository(pool);
      const from = new Date('2024-03-08T03:00:00.000Z');

      const articles = await repository.searchCandidates(['VIC', 'Vingroup'], from, FIXED_NOW);

      expect(articles.map(a => a.id)).toEqual([7]);
      expect(queries[0].text).toContain('title ILIKE ANY($3::text[])');
      expect(queries[0].values).toEqual([from, FIXED_NOW, ['%VIC%', '%Vingroup%']]);
    });
  });

  describe('connectivity', () => {
    it('should surface a dropped connection as a transient StorageError', async () => {
      const { pool } = scriptedPool(() => pgError('terminating connection due to administrator command', '57P01'));
      const repository = new PostgresSentimentRepository(pool);

      await expect(repository.ping()).rejects.toThrow('Database unavailable: terminating connection due to administrator command');
    });
  });
});

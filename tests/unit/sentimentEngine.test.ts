/**
 * Sentiment Engine Unit Tests
 * Tests for the lexicon scorer blend and the English fallback
 */

import { SentimentEngine, DegradationEvent } from '../../src/nlp/sentimentEngine';
import { EnglishScorer } from '../../src/nlp/englishScorer';
import { LexiconStore } from '../../src/nlp/lexicon';
import { Direction, DirectionClassifier } from '../../src/nlp/signals';
import { testLexicon } from '../helpers/fixtures';

function createLexiconStore(): LexiconStore {
  return new LexiconStore(
    testLexicon(),
    { listLearnedKeywords: async () => [] },
    { aggregated: async () => ({ positive: [], negative: [] }), invalidate: () => undefined },
    { ttlMs: 60_000 },
  );
}

function fixedDirection(direction: Direction | null): DirectionClassifier {
  return { name: 'fixed', classify: async () => direction };
}

const normalize = (s: number) => s / Math.sqrt(s * s + 15);

describe('EnglishScorer', () => {
  const scorer = new EnglishScorer();

  it('should score a positive word', () => {
    const result = scorer.score('Shares surge');
    expect(result.rawSum).toBe(2.4);
    expect(result.value).toBeCloseTo(normalize(2.4), 10);
    expect(result.matchedWords).toEqual(['surge']);
  });

  it('should flip a negated word', () => {
    const result = scorer.score('Shares do not surge');
    expect(result.rawSum).toBeCloseTo(2.4 * -0.74, 10);
    expect(result.value).toBeLessThan(0);
  });

  it('should add booster strength', () => {
    expect(scorer.score('Very strong quarter').rawSum).toBeCloseTo(1.8 + 0.293, 10);
  });

  it('should weigh the clause after a contrast more', () => {
    // profit 1.8 and record 1.8 halved, weak -1.8 scaled by 1.5
    expect(scorer.score('Profit record but weak outlook').rawSum).toBeCloseTo(-0.9, 10);
  });

  it('should return zero without sentiment words', () => {
    const result = scorer.score('Meeting scheduled Tuesday');
    expect(result.value).toBe(0);
    expect(result.matchedWords).toEqual([]);
  });
});

describe('SentimentEngine', () => {
  describe('Initialization', () => {
    it('should reject a lexicon weight outside [0, 1]', () => {
      expect(() => new SentimentEngine(createLexiconStore(), { lexiconWeight: 1.2 }))
        .toThrow('lexiconWeight must be within [0, 1], got 1.2');
    });
  });

  describe('Vietnamese headlines', () => {
    it('should use the lexicon score when no classifier is deployed', async () => {
      const engine = new SentimentEngine(createLexiconStore());
      const result = await engine.analyze('Cổ phiếu tăng');

      expect(result.language).toBe('vi');
      expect(result.direction).toBeNull();
      expect(result.matchCount).toBe(1);
      expect(result.score).toBeCloseTo(Math.tanh(0.45), 10);
      expect(result.lexiconScore).toBe(result.score);
      expect(result.label).toBe('Bullish');
    });

    it('should blend the secondary direction with weight 0.3', async () => {
      const engine = new SentimentEngine(createLexiconStore(), { directionClassifier: fixedDirection('negative') });
      const result = await engine.analyze('Cổ phiếu tăng');

      expect(result.direction).toBe('negative');
      expect(result.score).toBeCloseTo(0.7 * Math.tanh(0.45) - 0.3, 10);
      expect(result.label).toBe('Neutral');
    });

    it('should fall back to the lexicon when the classifier fails', async () => {
      const failing: DirectionClassifier = {
        name: 'direction-http',
        classify: async () => {
          throw new Error('connect ECONNREFUSED');
        },
      };
      const engine = new SentimentEngine(createLexiconStore(), { directionClassifier: failing });
      const events: DegradationEvent[] = [];
      engine.on('degraded', (event: DegradationEvent) => events.push(event));

      const result = await engine.analyze('Cổ phiếu giảm');

      expect(result.direction).toBeNull();
      expect(result.score).toBeCloseTo(Math.tanh(-0.45), 10);
      expect(events).toEqual([{ collaborator: 'direction-http', error: 'connect ECONNREFUSED' }]);
    });

    it('should only score the first maxTextLength characters', async () => {
      const engine = new SentimentEngine(createLexiconStore(), { maxTextLength: 8 });
      const result = await engine.analyze('Hôm nay thị trường giảm');

      expect(result.score).toBe(0);
      expect(result.matchCount).toBe(0);
    });
  });

  describe('Other languages', () => {
    it('should use the English scorer and ignore the direction classifier', async () => {
      const engine = new SentimentEngine(createLexiconStore(), { directionClassifier: fixedDirection('negative') });
      const result = await engine.analyze('Shares surge');

      expect(result.language).toBe('en');
      expect(result.direction).toBeNull();
      expect(result.score).toBeCloseTo(normalize(2.4), 10);
      expect(result.matchCount).toBe(1);
    });
  });

  describe('Edge cases', () => {
    it('should return a neutral result for blank text', async () => {
      const engine = new SentimentEngine(createLexiconStore());
      const result = await engine.analyze('   ');

      expect(result).toEqual({
        score: 0,
        label: 'Neutral',
        language: 'vi',
        lexiconScore: 0,
        direction: null,
        matchCount: 0,
        matches: [],
      });
    });

    it('should expose score and label only through score()', async () => {
      const engine = new SentimentEngine(createLexiconStore());
      const result = await engine.score('Doanh nghiệp thua lỗ');

      expect(Object.keys(result).sort()).toEqual(['label', 'score']);
      expect(result.label).toBe('Bearish');
    });
  });
});

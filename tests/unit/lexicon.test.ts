/**
 * Layered Lexicon Unit Tests
 */

import {
  StaticLexicon,
  LexiconStore,
  mergeLexicon,
  approvedVariants,
  autoVariants,
  AutoKeywordSource,
} from '../../src/nlp/lexicon';
import type { AggregatedKeywords } from '../../src/services/keywordAggregator';
import type { LearnedKeywordRecord } from '../../src/database/repository';
import { TEST_LEXICON_DATA, testLexicon, manualClock, FIXED_NOW } from '../helpers/fixtures';

const learned: LearnedKeywordRecord = {
  keyword: 'cổ tức',
  sentimentType: 'positive',
  weight: 0.6,
  approvedBy: 'analyst',
  approvedAt: FIXED_NOW,
};

const aggregated: AggregatedKeywords = {
  positive: [],
  negative: [{
    keyword: 'nợ xấu',
    sentimentType: 'negative',
    frequency: 6,
    avgWeight: 0.7,
    maxCooccurrence: 5,
    confidence: 0.6,
    weight: 0.4,
  }],
};

describe('StaticLexicon', () => {
  it('should load the bundled Vietnamese lexicon', () => {
    const lexicon = StaticLexicon.bundled();
    expect(lexicon.has('Tăng Mạnh')).toBe(true);
    expect(lexicon.modifiers.negators).toContain('không');
  });

  it('should sort modifiers longest first', () => {
    expect(testLexicon().modifiers.negators).toEqual(['không', 'chưa']);
  });

  it('should reject weights with the wrong sign', () => {
    expect(() => StaticLexicon.fromData({
      ...TEST_LEXICON_DATA,
      positive: { 'tăng': -0.2 },
    })).toThrow('Positive weights must be in (0, 1]');
  });
});

describe('mergeLexicon', () => {
  it('should keep the highest-precedence variant of a term', () => {
    const merged = mergeLexicon([
      { term: 'tăng', weight: 0.5, origin: 'static' },
      { term: 'Tăng', weight: -0.9, origin: 'auto' },
      { term: 'cổ tức', weight: 0.3, origin: 'auto' },
      { term: 'cổ tức', weight: 0.6, origin: 'approved' },
    ]);

    expect(merged.negative).toEqual([]);
    expect(merged.positive).toEqual([
      { term: 'cổ tức', weight: 0.6, origin: 'approved' },
      { term: 'tăng', weight: 0.5, origin: 'static' },
    ]);
  });

  it('should drop zero weights and clamp out-of-range ones', () => {
    const merged = mergeLexicon([
      { term: 'trung tính', weight: 0, origin: 'auto' },
      { term: 'phá sản', weight: -1.4, origin: 'auto' },
    ]);
    expect(merged.positive).toEqual([]);
    expect(merged.negative).toEqual([{ term: 'phá sản', weight: -1, origin: 'auto' }]);
  });

  it('should sign approved and auto variants by sentiment type', () => {
    expect(approvedVariants([{ ...learned, sentimentType: 'negative' }])).toEqual([
      { term: 'cổ tức', weight: -0.6, origin: 'approved' },
    ]);
    expect(autoVariants(aggregated)).toEqual([{ term: 'nợ xấu', weight: -0.4, origin: 'auto' }]);
  });
});

describe('LexiconStore', () => {
  function createStore(ttlMs: number = 1000) {
    const time = manualClock();
    const approved = { listLearnedKeywords: jest.fn(async () => [learned]) };
    const auto: AutoKeywordSource = {
      aggregated: jest.fn(async () => aggregated),
      invalidate: jest.fn(),
    };
    const store = new LexiconStore(testLexicon(), approved, auto, { ttlMs, clock: time.clock });
    return { store, approved, auto, time };
  }

  it('should merge the three layers, longest term first', async () => {
    const { store } = createStore();
    const merged = await store.mergedLexicon();

    expect(merged.positive.map(e => e.term)).toEqual(['lãi lớn', 'cổ tức', 'kỷ lục', 'tăng']);
    expect(merged.negative.map(e => e.term)).toEqual(['thua lỗ', 'nợ xấu', 'giảm']);
    expect(merged.positive.find(e => e.term === 'cổ tức')?.origin).toBe('approved');
  });

  it('should serve from cache until the TTL passes', async () => {
    const { store, approved, time } = createStore(1000);

    await store.mergedLexicon();
    time.advance(999);
    await store.mergedLexicon();
    expect(approved.listLearnedKeywords).toHaveBeenCalledTimes(1);

    time.advance(1);
    await store.mergedLexicon();
    expect(approved.listLearnedKeywords).toHaveBeenCalledTimes(2);
  });

  it('should drop both caches on invalidate', async () => {
    const { store, approved, auto } = createStore();

    await store.mergedLexicon();
    store.invalidate();
    await store.mergedLexicon();

    expect(auto.invalidate).toHaveBeenCalledTimes(1);
    expect(approved.listLearnedKeywords).toHaveBeenCalledTimes(2);
  });
});

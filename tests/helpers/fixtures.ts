/**
 * Small lexicons and a fixed clock so expected scores can be worked out by hand.
 */

import { StaticLexicon } from '../../src/nlp/lexicon';
import { TickerAliasTable } from '../../src/search/tickerAliases';

export const FIXED_NOW = new Date('2024-03-15T03:00:00.000Z'); // 10:00 in Ho Chi Minh City

export const fixedNow = (): Date => new Date(FIXED_NOW.getTime());

/** Controllable monotonic clock for TTL caches. */
export function manualClock(start: number = 0) {
  let now = start;
  const clock = () => now;
  return {
    clock,
    advance(ms: number) {
      now += ms;
    },
  };
}

export const TEST_LEXICON_DATA = {
  positive: {
    'tăng': 0.5,
    'lãi lớn': 0.8,
    'kỷ lục': 0.8,
  },
  negative: {
    'giảm': -0.5,
    'thua lỗ': -0.8,
  },
  negators: ['không', 'chưa'],
  intensifiers: { 'rất': 1.5 },
  diminishers: { 'hơi': 0.5 },
};

export function testLexicon(): StaticLexicon {
  return StaticLexicon.fromData(TEST_LEXICON_DATA);
}

export function testAliases(): TickerAliasTable {
  return TickerAliasTable.fromData({
    tickers: {
      VIC: ['Vingroup', 'VIC'],
      HPG: ['Hòa Phát', 'HPG'],
      NGANHANG: ['ngân hàng', 'Vietcombank'],
    },
    sectors: {
      banking: 'NGANHANG',
      'ngân hàng': 'NGANHANG',
    },
  });
}

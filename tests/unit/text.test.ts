/**
 * Text Utilities Unit Tests
 */

import {
  normalizeText,
  detectLanguage,
  tokenize,
  splitClauses,
  findPhrase,
  containsPhrase,
  clamp,
} from '../../src/nlp/text';
import { scoreToLabel, isSentimentLabel } from '../../src/nlp/labels';

describe('text utilities', () => {
  describe('normalizeText', () => {
    it('should lowercase, collapse whitespace and trim', () => {
      expect(normalizeText('  Cổ phiếu   TĂNG  ')).toBe('cổ phiếu tăng');
    });

    it('should compose decomposed Vietnamese characters', () => {
      const decomposed = 'tăng'.normalize('NFD');
      expect(normalizeText(decomposed)).toBe('tăng'.normalize('NFC'));
    });
  });

  describe('detectLanguage', () => {
    it('should detect Vietnamese from its diacritics', () => {
      expect(detectLanguage('Cổ phiếu ngân hàng tăng')).toBe('vi');
    });

    it('should fall back to English for plain ASCII', () => {
      expect(detectLanguage('Shares rally on strong earnings')).toBe('en');
    });
  });

  describe('tokenize', () => {
    it('should split on anything that is not a letter or digit', () => {
      expect(tokenize('VN-Index tăng 1,5%!')).toEqual(['vn', 'index', 'tăng', '1', '5']);
    });

    it('should return an empty list for punctuation only', () => {
      expect(tokenize(' ... ')).toEqual([]);
    });
  });

  describe('splitClauses', () => {
    it('should split at punctuation and drop empty parts', () => {
      expect(splitClauses('Lãi lớn, nhưng cổ phiếu giảm.')).toEqual(['lãi lớn', 'nhưng cổ phiếu giảm']);
    });
  });

  describe('findPhrase', () => {
    it('should return every occurrence on word boundaries', () => {
      expect(findPhrase('tăng trưởng tăng', 'tăng')).toEqual([0, 12]);
    });

    it('should ignore occurrences inside a longer word', () => {
      expect(findPhrase('tăngtrưởng', 'tăng')).toEqual([]);
      expect(containsPhrase('không tăng', 'tăng')).toBe(true);
    });

    it('should return nothing for an empty phrase', () => {
      expect(findPhrase('tăng', '')).toEqual([]);
    });
  });

  describe('clamp', () => {
    it('should bound values to the range', () => {
      expect(clamp(1.4, -1, 1)).toBe(1);
      expect(clamp(-3, -1, 1)).toBe(-1);
      expect(clamp(0.2, -1, 1)).toBe(0.2);
    });
  });
});

describe('labels', () => {
  it.each([
    [0.35, 'Bullish'],
    [0.9, 'Bullish'],
    [0.15, 'Somewhat-Bullish'],
    [0.3499, 'Somewhat-Bullish'],
    [0.1499, 'Neutral'],
    [0, 'Neutral'],
    [-0.1499, 'Neutral'],
    [-0.15, 'Somewhat-Bearish'],
    [-0.3499, 'Somewhat-Bearish'],
    [-0.35, 'Bearish'],
    [-1, 'Bearish'],
  ])('should label %p as %s', (score, label) => {
    expect(scoreToLabel(score)).toBe(label);
  });

  it('should recognise only the five labels', () => {
    expect(isSentimentLabel('Somewhat-Bearish')).toBe(true);
    expect(isSentimentLabel('bullish')).toBe(false);
  });
});

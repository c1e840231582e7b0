/**
 * Rule-based polarity scorer for English headlines.
 *
 * Word valences on a -4..4 scale, adjusted by boosters and negators in the
 * three preceding tokens and by contrastive conjunctions ("X but Y" weighs
 * Y more), then normalized into (-1, 1) with s / sqrt(s^2 + alpha).
 */

import { z } from 'zod';
import enLexiconData from './data/en-lexicon.json';
import { clamp } from './text';

export interface EnglishScore {
  value: number;
  rawSum: number;
  matchedWords: string[];
}

const NEGATION_SCALAR = -0.74;
const NORMALIZATION_ALPHA = 15;
const LOOKBACK = 3;
// Booster strength decays with distance from the word it modifies
const BOOSTER_DECAY = [1, 0.95, 0.9];
const BEFORE_CONTRAST = 0.5;
const AFTER_CONTRAST = 1.5;

const englishLexiconSchema = z.object({
  words: z.record(z.string(), z.number().min(-4).max(4)),
  negators: z.array(z.string()),
  boosters: z.record(z.string(), z.number()),
  contrast: z.array(z.string()),
});

type EnglishLexiconData = z.infer<typeof englishLexiconSchema>;

function splitWords(text: string): string[] {
  return text
    .normalize('NFC')
    .toLowerCase()
    .replace(/[’‘]/g, "'")
    .split(/\s+/)
    .map(word => word.replace(/^[^\p{L}\p{N}']+|[^\p{L}\p{N}']+$/gu, ''))
    .filter(word => word.length > 0);
}

export class EnglishScorer {
  private readonly words: Map<string, number>;
  private readonly negators: Set<string>;
  private readonly boosters: Map<string, number>;
  private readonly contrast: Set<string>;

  constructor(data: EnglishLexiconData = englishLexiconSchema.parse(enLexiconData)) {
    this.words = new Map(Object.entries(data.words));
    this.negators = new Set(data.negators);
    this.boosters = new Map(Object.entries(data.boosters));
    this.contrast = new Set(data.contrast);
  }

  score(text: string): EnglishScore {
    const tokens = splitWords(text);
    const valences: number[] = [];
    const matchedWords: string[] = [];
    let contrastAt = -1;

    tokens.forEach((token, i) => {
      if (this.contrast.has(token) && contrastAt === -1) {
        contrastAt = i;
      }

      const base = this.words.get(token);
      if (base === undefined) {
        valences.push(0);
        return;
      }
      matchedWords.push(token);

      let valence = base;
      let negated = false;
      for (let back = 1; back <= LOOKBACK && i - back >= 0; back++) {
        const previous = tokens[i - back];
        const boost = this.boosters.get(previous);
        if (boost !== undefined) {
          valence += Math.sign(base) * boost * BOOSTER_DECAY[back - 1];
        }
        if (this.negators.has(previous) || previous.endsWith("n't")) {
          negated = true;
        }
      }
      if (negated) {
        valence *= NEGATION_SCALAR;
      }
      valences.push(valence);
    });

    if (contrastAt >= 0) {
      for (let i = 0; i < valences.length; i++) {
        if (i < contrastAt) valences[i] *= BEFORE_CONTRAST;
        else if (i > contrastAt) valences[i] *= AFTER_CONTRAST;
      }
    }

    const rawSum = valences.reduce((sum, v) => sum + v, 0);
    const value = rawSum === 0
      ? 0
      : clamp(rawSum / Math.sqrt(rawSum * rawSum + NORMALIZATION_ALPHA), -1, 1);

    return { value, rawSum, matchedWords };
  }
}

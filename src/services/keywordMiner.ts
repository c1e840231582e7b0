/**
 * Keyword Miner
 *
 * Turns a large correction into candidate lexicon keywords: the title is
 * split into clauses, stop-words are dropped and every uni-, bi- and trigram
 * inside a clause becomes a candidate carrying the sign of the corrected
 * score.
 */

import { z } from 'zod';
import stopWordsData from '../nlp/data/stop-words.json';
import { splitClauses, tokenize } from '../nlp/text';
import type { KeywordCandidate, SentimentType } from '../database/repository';

export interface KeywordMinerOptions {
  /** Mining starts when |user - predicted| is strictly greater than this */
  errorThreshold?: number;
  /** Corrections with |user score| below this carry no direction */
  neutralBand?: number;
  maxNgram?: number;
  /** Shortest accepted phrase, in characters */
  minLength?: number;
  stopWords?: Iterable<string>;
}

export interface MiningInput {
  title: string;
  predictedScore: number;
  userScore: number;
}

const PURE_NUMBER = /^[\d\s.,%]+$/;

export function bundledStopWords(): string[] {
  return z.array(z.string()).parse(stopWordsData);
}

export class KeywordMiner {
  readonly errorThreshold: number;
  private readonly neutralBand: number;
  private readonly maxNgram: number;
  private readonly minLength: number;
  private readonly stopWords: Set<string>;

  constructor(private readonly staticTerms: ReadonlySet<string>, options: KeywordMinerOptions = {}) {
    this.errorThreshold = options.errorThreshold ?? 0.3;
    this.neutralBand = options.neutralBand ?? 0.15;
    this.maxNgram = options.maxNgram ?? 3;
    this.minLength = options.minLength ?? 3;
    this.stopWords = new Set([...(options.stopWords ?? bundledStopWords())].map(w => w.normalize('NFC').toLowerCase()));
  }

  shouldMine(predictedScore: number, userScore: number): boolean {
    return Math.abs(userScore - predictedScore) > this.errorThreshold;
  }

  sentimentType(userScore: number): SentimentType | null {
    if (userScore >= this.neutralBand) return 'positive';
    if (userScore <= -this.neutralBand) return 'negative';
    return null;
  }

  /** Distinct n-grams of the title, in order of first appearance. */
  extractNgrams(title: string): string[] {
    const seen = new Set<string>();
    const ngrams: string[] = [];

    for (const clause of splitClauses(title)) {
      const words = tokenize(clause).filter(word => !this.stopWords.has(word));
      for (let n = 1; n <= this.maxNgram; n++) {
        for (let i = 0; i + n <= words.length; i++) {
          const phrase = words.slice(i, i + n).join(' ');
          if (phrase.length < this.minLength || PURE_NUMBER.test(phrase) || seen.has(phrase)) continue;
          seen.add(phrase);
          ngrams.push(phrase);
        }
      }
    }
    return ngrams;
  }

  /**
   * Candidates to record for one feedback event; empty when the error is
   * small or the correction is neutral. Static lexicon terms are skipped.
   */
  mine(input: MiningInput): KeywordCandidate[] {
    if (!this.shouldMine(input.predictedScore, input.userScore)) return [];

    const sentimentType = this.sentimentType(input.userScore);
    if (!sentimentType) return [];

    const suggestedWeight = Math.min(1, Math.abs(input.userScore));
    return this.extractNgrams(input.title)
      .filter(keyword => !this.staticTerms.has(keyword))
      .map(keyword => ({ keyword, sentimentType, suggestedWeight }));
  }
}

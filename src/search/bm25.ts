/**
 * Okapi BM25 over headline titles with phrase terms.
 *
 * Scores follow the full-text-search convention of negative numbers, more
 * negative meaning more relevant:
 *
 *   bm25 = -Σ idf(t) * tf * (k1 + 1) / (tf + k1 * (1 - b + b * |d| / avgdl))
 *   idf  = ln((N - n + 0.5) / (n + 0.5)), floored at 1e-6
 */

import { tokenize } from '../nlp/text';

export interface Bm25Params {
  k1: number;
  b: number;
}

export interface Bm25Corpus {
  documentCount: number;
  averageLength: number;
}

export interface Bm25Document<T> {
  item: T;
  text: string;
}

export interface Bm25Hit<T> {
  item: T;
  bm25: number;
  /** round(-bm25 * 100) */
  relevance: number;
  /** Phrase term frequencies, keyed by the phrase as given */
  termFrequencies: Record<string, number>;
}

export const DEFAULT_BM25: Bm25Params = { k1: 1.2, b: 0.75 };

const MIN_IDF = 1e-6;

/** Whitespace-separated length, as the store measures the corpus average. */
export function documentLength(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/** Occurrences of the token sequence `phrase` inside `tokens`. */
export function phraseFrequency(tokens: readonly string[], phrase: readonly string[]): number {
  if (phrase.length === 0 || phrase.length > tokens.length) return 0;
  let count = 0;
  outer: for (let i = 0; i + phrase.length <= tokens.length; i++) {
    for (let j = 0; j < phrase.length; j++) {
      if (tokens[i + j] !== phrase[j]) continue outer;
    }
    count++;
  }
  return count;
}

export function inverseDocumentFrequency(documentCount: number, containing: number): number {
  const idf = Math.log((documentCount - containing + 0.5) / (containing + 0.5));
  return idf > 0 ? idf : MIN_IDF;
}

/**
 * Ranks `documents` against phrase terms. Documents matching no phrase are
 * dropped. Document frequencies come from `documents`, so callers pass every
 * document of the range that can contain a phrase.
 */
export function rankBm25<T>(
  documents: Bm25Document<T>[],
  phrases: string[],
  corpus: Bm25Corpus,
  params: Bm25Params = DEFAULT_BM25,
): Bm25Hit<T>[] {
  const terms = phrases
    .map(phrase => ({ phrase, tokens: tokenize(phrase) }))
    .filter(term => term.tokens.length > 0);

  const analyzed = documents.map(doc => {
    const tokens = tokenize(doc.text);
    const frequencies = terms.map(term => phraseFrequency(tokens, term.tokens));
    return { doc, length: documentLength(doc.text), frequencies };
  });

  const documentCount = Math.max(corpus.documentCount, analyzed.length);
  const averageLength = corpus.averageLength > 0 ? corpus.averageLength : 1;
  const idfs = terms.map((_, t) =>
    inverseDocumentFrequency(documentCount, analyzed.filter(a => a.frequencies[t] > 0).length));

  const hits: Bm25Hit<T>[] = [];
  for (const { doc, length, frequencies } of analyzed) {
    let sum = 0;
    const termFrequencies: Record<string, number> = {};
    frequencies.forEach((tf, t) => {
      if (tf === 0) return;
      termFrequencies[terms[t].phrase] = tf;
      const norm = params.k1 * (1 - params.b + (params.b * length) / averageLength);
      sum += idfs[t] * ((tf * (params.k1 + 1)) / (tf + norm));
    });
    if (sum === 0) continue;
    hits.push({ item: doc.item, bm25: -sum, relevance: Math.round(sum * 100), termFrequencies });
  }
  return hits;
}

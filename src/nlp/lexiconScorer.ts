/**
 * Vietnamese lexicon scorer.
 *
 * Scans the normalized headline for lexicon phrases, longest first, keeping
 * only matches that do not overlap an earlier one. Each match is adjusted by
 * the negators and modifiers found shortly before it, the adjusted weights
 * are summed, and the sum is squashed into (-1, 1).
 */

import { MergedLexicon, ModifierTables, LexiconOrigin, LexiconEntry } from './lexicon';
import { normalizeText, tokenize, findPhrase, containsPhrase, clamp } from './text';

export interface TermMatch {
  term: string;
  start: number;
  baseWeight: number;
  /** Weight after negation and modifiers */
  weight: number;
  origin: LexiconOrigin;
  negated: boolean;
  modifier: number;
}

export interface LexiconScore {
  value: number;
  rawSum: number;
  lengthFactor: number;
  matches: TermMatch[];
}

export const NEGATION_WINDOW = 25;
export const MODIFIER_WINDOW = 20;
export const NEGATION_DAMPENING = 0.6;
export const SQUASH_SCALE = 0.6;
/** Headlines at or below this many tokens get the largest length boost */
export const REFERENCE_LENGTH = 12;
export const MAX_LENGTH_FACTOR = 1.5;

/**
 * Boost for short texts: sqrt(12 / tokens), kept within [1, 1.5], so one or
 * two strong words in a short headline are not diluted.
 */
export function lengthFactor(tokenCount: number): number {
  if (tokenCount <= 0) return 1;
  return clamp(Math.sqrt(REFERENCE_LENGTH / tokenCount), 1, MAX_LENGTH_FACTOR);
}

function overlaps(spans: Array<[number, number]>, start: number, end: number): boolean {
  return spans.some(([s, e]) => start < e && end > s);
}

function modifierBefore(prefix: string, modifiers: ModifierTables): number {
  for (const [word, multiplier] of modifiers.intensifiers) {
    if (containsPhrase(prefix, word)) return multiplier;
  }
  for (const [word, multiplier] of modifiers.diminishers) {
    if (containsPhrase(prefix, word)) return multiplier;
  }
  return 1;
}

function negatedBefore(prefix: string, modifiers: ModifierTables): boolean {
  return modifiers.negators.some(negator => containsPhrase(prefix, negator));
}

const scanOrders = new WeakMap<MergedLexicon, LexiconEntry[]>();

// Both polarities in one list so the longest phrase wins regardless of sign
function scanOrder(lexicon: MergedLexicon): LexiconEntry[] {
  let order = scanOrders.get(lexicon);
  if (!order) {
    order = [...lexicon.positive, ...lexicon.negative]
      .sort((a, b) => b.term.length - a.term.length || a.term.localeCompare(b.term));
    scanOrders.set(lexicon, order);
  }
  return order;
}

export function scoreLexicon(text: string, lexicon: MergedLexicon, modifiers: ModifierTables): LexiconScore {
  const normalized = normalizeText(text);
  const factor = lengthFactor(tokenize(normalized).length);
  if (!normalized) {
    return { value: 0, rawSum: 0, lengthFactor: factor, matches: [] };
  }

  const entries = scanOrder(lexicon);

  const spans: Array<[number, number]> = [];
  const matches: TermMatch[] = [];

  for (const entry of entries) {
    for (const start of findPhrase(normalized, entry.term)) {
      const end = start + entry.term.length;
      if (overlaps(spans, start, end)) continue;
      spans.push([start, end]);

      const negated = negatedBefore(normalized.slice(Math.max(0, start - NEGATION_WINDOW), start), modifiers);
      const modifier = modifierBefore(normalized.slice(Math.max(0, start - MODIFIER_WINDOW), start), modifiers);
      const signed = negated ? -entry.weight * NEGATION_DAMPENING : entry.weight;

      matches.push({
        term: entry.term,
        start,
        baseWeight: entry.weight,
        weight: signed * modifier,
        origin: entry.origin,
        negated,
        modifier,
      });
    }
  }

  matches.sort((a, b) => a.start - b.start);
  const rawSum = matches.reduce((sum, match) => sum + match.weight, 0);
  const value = matches.length === 0 ? 0 : Math.tanh(rawSum * SQUASH_SCALE * factor);

  return { value, rawSum, lengthFactor: factor, matches };
}

/**
 * Text utilities shared by the scorers, the keyword miner and search.
 */

export type Language = 'vi' | 'en';

// Letters that only occur in Vietnamese orthography (plain ASCII and shared Latin-1 vowels are not enough)
const VIETNAMESE_CHARS = /[àáâãèéêìíòóôõùúýăđơưạảấầẩẫậắằẳẵặẹẻẽếềểễệỉịọỏốồổỗộớờởỡợụủứừửữựỳỵỷỹ]/i;

const WORD_CHAR = /[\p{L}\p{N}]/u;
const TOKEN = /[\p{L}\p{N}]+/gu;
const CLAUSE_BREAK = /[,.;:!?…"“”'‘’()[\]{}|/\\–—]+/u;

export function normalizeText(text: string): string {
  return text.normalize('NFC').toLowerCase().replace(/\s+/g, ' ').trim();
}

export function detectLanguage(text: string): Language {
  return VIETNAMESE_CHARS.test(text.normalize('NFC')) ? 'vi' : 'en';
}

/** Lowercased Unicode word tokens. */
export function tokenize(text: string): string[] {
  return normalizeText(text).match(TOKEN) ?? [];
}

/** Splits at punctuation so n-grams never span two clauses. */
export function splitClauses(text: string): string[] {
  return normalizeText(text)
    .split(CLAUSE_BREAK)
    .map(part => part.trim())
    .filter(part => part.length > 0);
}

function isBoundary(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) return true;
  return !WORD_CHAR.test(text[index - 1]) || !WORD_CHAR.test(text[index]);
}

/**
 * Start offsets of every occurrence of `phrase` in `text` that begins and
 * ends on a word boundary. Both arguments must already be normalized.
 */
export function findPhrase(text: string, phrase: string): number[] {
  const hits: number[] = [];
  if (!phrase) return hits;

  let from = 0;
  for (;;) {
    const index = text.indexOf(phrase, from);
    if (index === -1) break;
    if (isBoundary(text, index) && isBoundary(text, index + phrase.length)) {
      hits.push(index);
    }
    from = index + 1;
  }
  return hits;
}

export function containsPhrase(text: string, phrase: string): boolean {
  return findPhrase(text, phrase).length > 0;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

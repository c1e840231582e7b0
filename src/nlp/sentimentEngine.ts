/**
 * Headline Sentiment Engine
 *
 * Vietnamese text is scored with the layered lexicon and blended with the
 * optional secondary direction classifier:
 *
 *   final = w * lexicon + (1 - w) * direction      (w defaults to 0.7)
 *
 * A missing or failing classifier collapses the blend to the lexicon score.
 * Other languages go to the English rule-based scorer, which replaces the
 * blend entirely.
 */

import { EventEmitter } from 'events';
import { LexiconStore } from './lexicon';
import { scoreLexicon, TermMatch } from './lexiconScorer';
import { EnglishScorer } from './englishScorer';
import { DirectionClassifier, Direction, DIRECTION_VALUE, NullDirectionClassifier } from './signals';
import { SentimentLabel, scoreToLabel } from './labels';
import { Language, detectLanguage, clamp } from './text';
import { collaboratorDegradedTotal, sentimentScoredTotal } from '../metrics';
import { errorMessage } from '../errors';

// =============================================================================
// TYPES & INTERFACES
// =============================================================================

export interface SentimentResult {
  score: number;
  label: SentimentLabel;
  language: Language;
  /** Lexicon (or English scorer) component before blending */
  lexiconScore: number;
  /** Secondary direction, null when absent or unavailable */
  direction: Direction | null;
  /** Number of lexicon terms (or English words) that carried sentiment */
  matchCount: number;
  matches: TermMatch[];
}

export interface DegradationEvent {
  collaborator: string;
  error: string;
}

export interface SentimentEngineOptions {
  /** Lexicon share of the blend, in [0, 1] */
  lexiconWeight?: number;
  maxTextLength?: number;
  directionClassifier?: DirectionClassifier;
  englishScorer?: EnglishScorer;
}

const NEUTRAL_RESULT: SentimentResult = {
  score: 0,
  label: 'Neutral',
  language: 'vi',
  lexiconScore: 0,
  direction: null,
  matchCount: 0,
  matches: [],
};

// =============================================================================
// SENTIMENT ENGINE
// =============================================================================

export class SentimentEngine extends EventEmitter {
  private readonly lexiconWeight: number;
  private readonly maxTextLength: number;
  private readonly directionClassifier: DirectionClassifier;
  private readonly englishScorer: EnglishScorer;

  constructor(private readonly lexicon: LexiconStore, options: SentimentEngineOptions = {}) {
    super();
    this.lexiconWeight = options.lexiconWeight ?? 0.7;
    if (this.lexiconWeight < 0 || this.lexiconWeight > 1) {
      throw new Error(`lexiconWeight must be within [0, 1], got ${this.lexiconWeight}`);
    }
    this.maxTextLength = options.maxTextLength ?? 512;
    this.directionClassifier = options.directionClassifier ?? new NullDirectionClassifier();
    this.englishScorer = options.englishScorer ?? new EnglishScorer();
  }

  async analyze(text: string): Promise<SentimentResult> {
    const input = text.slice(0, this.maxTextLength);
    if (!input.trim()) {
      return { ...NEUTRAL_RESULT, matches: [] };
    }

    const language = detectLanguage(input);
    sentimentScoredTotal.inc({ language });

    if (language !== 'vi') {
      const english = this.englishScorer.score(input);
      const score = clamp(english.value, -1, 1);
      return {
        score,
        label: scoreToLabel(score),
        language,
        lexiconScore: score,
        direction: null,
        matchCount: english.matchedWords.length,
        matches: [],
      };
    }

    const merged = await this.lexicon.mergedLexicon();
    const lexical = scoreLexicon(input, merged, this.lexicon.staticLexicon.modifiers);
    const direction = await this.classifyDirection(input);

    const blended = direction === null
      ? lexical.value
      : this.lexiconWeight * lexical.value + (1 - this.lexiconWeight) * DIRECTION_VALUE[direction];
    const score = clamp(blended, -1, 1);

    return {
      score,
      label: scoreToLabel(score),
      language,
      lexiconScore: lexical.value,
      direction,
      matchCount: lexical.matches.length,
      matches: lexical.matches,
    };
  }

  /** Score and label only. */
  async score(text: string): Promise<{ score: number; label: SentimentLabel }> {
    const { score, label } = await this.analyze(text);
    return { score, label };
  }

  private async classifyDirection(text: string): Promise<Direction | null> {
    try {
      return await this.directionClassifier.classify(text);
    } catch (error) {
      const event: DegradationEvent = { collaborator: this.directionClassifier.name, error: errorMessage(error) };
      console.warn(`[SentimentEngine] Direction classifier unavailable, using lexicon only: ${event.error}`);
      collaboratorDegradedTotal.inc({ collaborator: event.collaborator });
      this.emit('degraded', event);
      return null;
    }
  }
}

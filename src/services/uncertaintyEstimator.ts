/**
 * Uncertainty Estimator
 *
 * Combines independent hints that a prediction is unreliable into one score
 * in [0, 1] used to rank headlines for review. Higher means more worth a
 * reviewer's time. The weights are a tunable policy.
 */

import { EventEmitter } from 'events';
import { SentimentEngine, SentimentResult } from '../nlp/sentimentEngine';
import { Direction, LabelClassifier, LabelPrediction, NullLabelClassifier } from '../nlp/signals';
import { SentimentLabel } from '../nlp/labels';
import { clamp } from '../nlp/text';
import { collaboratorDegradedTotal } from '../metrics';
import { errorMessage } from '../errors';
import type { UncertaintyWeights } from '../config/default';

// =============================================================================
// TYPES
// =============================================================================

export interface UncertaintySnapshot {
  lexiconScore: number;
  secondaryDirection: Direction | null;
  modelLabel: SentimentLabel | null;
  finalScore: number;
  finalLabel: SentimentLabel;
  matchCount: number;
  signalConflict: number;
  magnitudeUncertainty: number;
  matchSparsity: number;
  modelConflict: number | null;
  uncertaintyScore: number;
}

export interface UncertaintyEstimatorOptions {
  baseWeights?: UncertaintyWeights;
  extendedWeights?: UncertaintyWeights;
  magnitudeThreshold?: number;
  labelClassifier?: LabelClassifier;
}

export const DEFAULT_BASE_WEIGHTS: UncertaintyWeights = {
  signalConflict: 0.45,
  magnitude: 0.30,
  sparsity: 0.25,
  modelConflict: 0,
};

export const DEFAULT_EXTENDED_WEIGHTS: UncertaintyWeights = {
  signalConflict: 0.35,
  magnitude: 0.25,
  sparsity: 0.20,
  modelConflict: 0.20,
};

/** Lexicon scores inside (-0.05, 0.05) count as no direction. */
export const LEXICON_DEAD_ZONE = 0.05;

// =============================================================================
// SUB-SIGNALS
// =============================================================================

function lexiconSign(score: number): number {
  if (score > LEXICON_DEAD_ZONE) return 1;
  if (score < -LEXICON_DEAD_ZONE) return -1;
  return 0;
}

/**
 * Disagreement between the lexicon and the secondary direction.
 * Full-strength opposite directions give 1; agreement gives at most 0.2,
 * shrinking as the lexicon gets more confident.
 */
export function signalConflict(lexiconScore: number, direction: Direction | null): number {
  const magnitude = Math.abs(lexiconScore);

  if (direction === null || direction === 'neutral') {
    return magnitude < 0.1 ? 0.3 : 0.5;
  }

  const lexSign = lexiconSign(lexiconScore);
  if (lexSign === 0) return 0.4;

  const directionSign = direction === 'positive' ? 1 : -1;
  if (lexSign === directionSign) {
    return Math.max(0, 0.2 - magnitude * 0.2);
  }
  return Math.min(1, magnitude * 0.9 + 0.1);
}

export function magnitudeUncertainty(finalScore: number, threshold: number = 0.35): number {
  return clamp(1 - Math.abs(finalScore) / threshold, 0, 1);
}

const SPARSITY_BY_HITS = [1.0, 0.7, 0.4];

export function matchSparsity(matchCount: number): number {
  return SPARSITY_BY_HITS[matchCount] ?? 0.1;
}

export function modelConflict(finalLabel: SentimentLabel, prediction: LabelPrediction): number {
  const p = clamp(prediction.probability, 0, 1);
  if (prediction.label === finalLabel) {
    return Math.max(0, 0.3 - p * 0.3);
  }
  return Math.min(1, 0.4 + (1 - p) * 0.6);
}

// =============================================================================
// ESTIMATOR
// =============================================================================

export class UncertaintyEstimator extends EventEmitter {
  private readonly baseWeights: UncertaintyWeights;
  private readonly extendedWeights: UncertaintyWeights;
  private readonly magnitudeThreshold: number;
  private readonly labelClassifier: LabelClassifier;

  constructor(private readonly engine: SentimentEngine, options: UncertaintyEstimatorOptions = {}) {
    super();
    this.baseWeights = options.baseWeights ?? DEFAULT_BASE_WEIGHTS;
    this.extendedWeights = options.extendedWeights ?? DEFAULT_EXTENDED_WEIGHTS;
    this.magnitudeThreshold = options.magnitudeThreshold ?? 0.35;
    this.labelClassifier = options.labelClassifier ?? new NullLabelClassifier();
  }

  async estimate(text: string): Promise<UncertaintySnapshot> {
    const result = await this.engine.analyze(text);
    const prediction = await this.predictLabel(text);
    return this.fromResult(result, prediction);
  }

  fromResult(result: SentimentResult, prediction: LabelPrediction | null): UncertaintySnapshot {
    const conflict = signalConflict(result.lexiconScore, result.direction);
    const magnitude = magnitudeUncertainty(result.score, this.magnitudeThreshold);
    const sparsity = matchSparsity(result.matchCount);
    const model = prediction ? modelConflict(result.label, prediction) : null;

    const weights = model === null ? this.baseWeights : this.extendedWeights;
    const combined =
      weights.signalConflict * conflict +
      weights.magnitude * magnitude +
      weights.sparsity * sparsity +
      weights.modelConflict * (model ?? 0);

    return {
      lexiconScore: result.lexiconScore,
      secondaryDirection: result.direction,
      modelLabel: prediction?.label ?? null,
      finalScore: result.score,
      finalLabel: result.label,
      matchCount: result.matchCount,
      signalConflict: conflict,
      magnitudeUncertainty: magnitude,
      matchSparsity: sparsity,
      modelConflict: model,
      uncertaintyScore: clamp(combined, 0, 1),
    };
  }

  private async predictLabel(text: string): Promise<LabelPrediction | null> {
    if (!text.trim()) return null;
    try {
      return await this.labelClassifier.classify(text);
    } catch (error) {
      const message = errorMessage(error);
      console.warn(`[UncertaintyEstimator] Label classifier unavailable: ${message}`);
      collaboratorDegradedTotal.inc({ collaborator: this.labelClassifier.name });
      this.emit('degraded', { collaborator: this.labelClassifier.name, error: message });
      return null;
    }
  }
}

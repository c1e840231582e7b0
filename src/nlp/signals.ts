/**
 * Optional classifier capabilities.
 *
 * The scorer and the uncertainty estimator take these as constructor
 * arguments. When no classifier is deployed the Null implementations are
 * wired in and the core logic runs unchanged.
 */

import { z } from 'zod';
import { SENTIMENT_LABELS, SentimentLabel } from './labels';

export type Direction = 'positive' | 'negative' | 'neutral';

export const DIRECTION_VALUE: Record<Direction, number> = {
  positive: 1,
  negative: -1,
  neutral: 0,
};

/** Coarse direction with no numeric confidence. */
export interface DirectionClassifier {
  readonly name: string;
  /** null when the classifier has no opinion on this text */
  classify(text: string): Promise<Direction | null>;
}

export interface LabelPrediction {
  label: SentimentLabel;
  /** Probability of the predicted label, in [0, 1] */
  probability: number;
}

/** Independently trained five-way classifier. */
export interface LabelClassifier {
  readonly name: string;
  classify(text: string): Promise<LabelPrediction | null>;
}

export class NullDirectionClassifier implements DirectionClassifier {
  readonly name = 'none';

  async classify(): Promise<Direction | null> {
    return null;
  }
}

export class NullLabelClassifier implements LabelClassifier {
  readonly name = 'none';

  async classify(): Promise<LabelPrediction | null> {
    return null;
  }
}

// =============================================================================
// HTTP IMPLEMENTATIONS
// =============================================================================

const directionResponseSchema = z.object({
  label: z.string().transform(s => s.trim().toLowerCase()).pipe(z.enum(['positive', 'negative', 'neutral'])),
});

const labelResponseSchema = z.object({
  label: z.enum(SENTIMENT_LABELS),
  probability: z.number().min(0).max(1),
});

async function postText(url: string, text: string, timeoutMs: number): Promise<unknown> {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
    body: JSON.stringify({ text }),
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    throw new Error(`Classifier responded with HTTP ${response.status}`);
  }
  return response.json();
}

/**
 * Direction classifier served over HTTP: POST {"text"} returns
 * {"label": "positive" | "negative" | "neutral"}.
 */
export class HttpDirectionClassifier implements DirectionClassifier {
  readonly name = 'direction-http';

  constructor(private readonly url: string, private readonly timeoutMs: number) {}

  async classify(text: string): Promise<Direction | null> {
    const body = await postText(this.url, text, this.timeoutMs);
    return directionResponseSchema.parse(body).label;
  }
}

/**
 * Label classifier served over HTTP: POST {"text"} returns
 * {"label": <five-way label>, "probability": number}.
 */
export class HttpLabelClassifier implements LabelClassifier {
  readonly name = 'label-http';

  constructor(private readonly url: string, private readonly timeoutMs: number) {}

  async classify(text: string): Promise<LabelPrediction | null> {
    const body = await postText(this.url, text, this.timeoutMs);
    return labelResponseSchema.parse(body);
  }
}

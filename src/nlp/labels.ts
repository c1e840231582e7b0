export const SENTIMENT_LABELS = [
  'Bullish',
  'Somewhat-Bullish',
  'Neutral',
  'Somewhat-Bearish',
  'Bearish',
] as const;

export type SentimentLabel = typeof SENTIMENT_LABELS[number];

export const LABEL_THRESHOLDS = {
  bullish: 0.35,
  somewhatBullish: 0.15,
  somewhatBearish: -0.15,
  bearish: -0.35,
} as const;

/**
 * Five-bucket label of a score in [-1, 1].
 *
 * | score              | label            |
 * |--------------------|------------------|
 * | x >= 0.35          | Bullish          |
 * | 0.15 <= x < 0.35   | Somewhat-Bullish |
 * | -0.15 < x < 0.15   | Neutral          |
 * | -0.35 < x <= -0.15 | Somewhat-Bearish |
 * | x <= -0.35         | Bearish          |
 */
export function scoreToLabel(score: number): SentimentLabel {
  if (score >= LABEL_THRESHOLDS.bullish) return 'Bullish';
  if (score >= LABEL_THRESHOLDS.somewhatBullish) return 'Somewhat-Bullish';
  if (score <= LABEL_THRESHOLDS.bearish) return 'Bearish';
  if (score <= LABEL_THRESHOLDS.somewhatBearish) return 'Somewhat-Bearish';
  return 'Neutral';
}

export function isSentimentLabel(value: string): value is SentimentLabel {
  return SENTIMENT_LABELS.some(label => label === value);
}

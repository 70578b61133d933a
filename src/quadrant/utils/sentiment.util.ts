import {
  INTENSIFIERS,
  NEGATION_DAMPING,
  NEGATION_WINDOW,
  NEGATORS,
  SENTIMENT_LEXICON,
  SENTIMENT_NEUTRAL_BAND,
  SENTIMENT_NORMALIZATION_ALPHA,
  SENTIMENT_STRONG_BAND,
} from '../config/quadrant.constants';
import { SentimentLabel } from '../types/quadrant.types';
import { clamp, roundTo, tokenizeWords } from './text.util';

/**
 * Lexicon polarity of a span in [-1, 1].
 *
 * Each lexicon hit is scaled by a directly preceding intensifier and flipped
 * (and damped) when a negator occurs within the preceding window. The sum is
 * squashed with `s / sqrt(s^2 + alpha)`.
 */
export function scoreSentiment(text: string): number {
  const tokens = tokenizeWords(text);
  let sum = 0;

  tokens.forEach((token, index) => {
    const base = SENTIMENT_LEXICON.get(token);
    if (base == null) {
      return;
    }

    let value = base;
    const previous = index > 0 ? tokens[index - 1] : undefined;
    if (previous != null && INTENSIFIERS[previous] != null) {
      value *= INTENSIFIERS[previous];
    }

    const window = tokens.slice(Math.max(0, index - NEGATION_WINDOW), index);
    if (window.some((candidate) => NEGATORS.has(candidate))) {
      value *= -NEGATION_DAMPING;
    }

    sum += value;
  });

  if (sum === 0) {
    return 0;
  }
  const normalized = sum / Math.sqrt(sum * sum + SENTIMENT_NORMALIZATION_ALPHA);
  return roundTo(clamp(normalized, -1, 1), 4);
}

export function labelSentiment(score: number): SentimentLabel {
  if (score >= SENTIMENT_STRONG_BAND) {
    return 'very_positive';
  }
  if (score >= SENTIMENT_NEUTRAL_BAND) {
    return 'positive';
  }
  if (score <= -SENTIMENT_STRONG_BAND) {
    return 'very_negative';
  }
  if (score <= -SENTIMENT_NEUTRAL_BAND) {
    return 'negative';
  }
  return 'neutral';
}

import { COMPLEXITY_FLOORS } from '../config/quadrant.constants';
import { ComplexityLevel } from '../types/quadrant.types';
import { roundTo } from './text.util';

const VOWEL_GROUP_RE = /[aeiouy]+/g;
// a trailing "e" after a consonant other than "l" is silent (time, acme)
const SILENT_E_RE = /[^aeiouyl]e$/;

/** Vowel-group estimate for an English word; at least 1. */
export function countSyllables(word: string): number {
  const letters = word.toLowerCase().replace(/[^a-z]/g, '');
  const groups = letters.match(VOWEL_GROUP_RE)?.length ?? 0;
  const silentE = letters.length > 2 && SILENT_E_RE.test(letters) ? 1 : 0;
  return Math.max(1, groups - silentE);
}

/**
 * Flesch reading ease, rounded to one decimal. Returns null when there are
 * no words or sentences to measure.
 */
export function fleschReadingEase(
  words: readonly string[],
  sentenceCount: number,
): number | null {
  if (words.length === 0 || sentenceCount <= 0) {
    return null;
  }
  let syllables = 0;
  for (const word of words) {
    syllables += countSyllables(word);
  }
  const score =
    206.835 -
    1.015 * (words.length / sentenceCount) -
    84.6 * (syllables / words.length);
  return roundTo(score, 1);
}

export function complexityLevel(score: number | null): ComplexityLevel {
  if (score == null) {
    return 'unknown';
  }
  for (const [floor, level] of COMPLEXITY_FLOORS) {
    if (score >= floor) {
      return level;
    }
  }
  return 'very_difficult';
}

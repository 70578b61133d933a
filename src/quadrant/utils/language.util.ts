import {
  ENGLISH_STOPWORD_MIN_RATIO,
  STOPWORDS,
} from '../config/quadrant.constants';
import { tokenizeWords } from './text.util';

const SCRIPT_SHARE_THRESHOLD = 0.3;

const SCRIPT_PATTERNS = {
  latin: /[A-Za-z\u00C0-\u024F]/g,
  han: /[\u4E00-\u9FFF]/g,
  kana: /[\u3040-\u30FF]/g,
  hangul: /[\uAC00-\uD7AF]/g,
  cyrillic: /[\u0400-\u04FF]/g,
  arabic: /[\u0600-\u06FF]/g,
} as const;

type Script = keyof typeof SCRIPT_PATTERNS;

function countScripts(text: string): Record<Script, number> {
  const count = (pattern: RegExp): number => (text.match(pattern) ?? []).length;
  return {
    latin: count(SCRIPT_PATTERNS.latin),
    han: count(SCRIPT_PATTERNS.han),
    kana: count(SCRIPT_PATTERNS.kana),
    hangul: count(SCRIPT_PATTERNS.hangul),
    cyrillic: count(SCRIPT_PATTERNS.cyrillic),
    arabic: count(SCRIPT_PATTERNS.arabic),
  };
}

/**
 * Best-effort ISO 639-1 code by script share; Latin-script text only counts
 * as English when enough of its words are English stop words. Returns 'und'
 * when nothing matches.
 */
export function detectLanguage(text: string): string {
  const counts = countScripts(text);
  const total = Object.values(counts).reduce((sum, value) => sum + value, 0);
  if (total === 0) {
    return 'und';
  }

  const share = (value: number): number => value / total;
  if (share(counts.hangul) > SCRIPT_SHARE_THRESHOLD) {
    return 'ko';
  }
  if (share(counts.han + counts.kana) > SCRIPT_SHARE_THRESHOLD) {
    return counts.kana > 0 ? 'ja' : 'zh';
  }
  if (share(counts.cyrillic) > SCRIPT_SHARE_THRESHOLD) {
    return 'ru';
  }
  if (share(counts.arabic) > SCRIPT_SHARE_THRESHOLD) {
    return 'ar';
  }

  const words = tokenizeWords(text).filter((token) => /[a-z]/.test(token));
  if (words.length === 0) {
    return 'und';
  }
  const stopwordHits = words.filter((token) => STOPWORDS.has(token)).length;
  return stopwordHits / words.length >= ENGLISH_STOPWORD_MIN_RATIO
    ? 'en'
    : 'und';
}

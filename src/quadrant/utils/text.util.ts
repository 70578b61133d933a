import {
  MAX_SENTENCE_CHARS,
  STOPWORDS,
} from '../config/quadrant.constants';

const WS_RE = /\s+/g;
const INLINE_WS_RE = /[^\S\n]+/g;
const TAG_RE = /<[^>]+>/g;
// C0 controls and DEL, except tab, newline, vertical tab, form feed and return
const CONTROL_CHAR_RE = /[\u0000-\u0008\u000E-\u001F\u007F]/g;
const BLOCK_TAG_RE = /<\/?(?:p|div|br|li|ul|ol|h[1-6]|tr|section|article)\b[^>]*>/gi;
const WORD_RE = /[\p{L}\p{N}][\p{L}\p{N}'-]*/gu;
const CONTENT_TOKEN_RE = /^[\p{L}'-]+$/u;

const ENTITY_MAP: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
};

export function decodeHtmlEntities(value: string): string {
  if (!value) {
    return '';
  }
  return value.replace(
    /&(amp|lt|gt|quot|#39|apos|nbsp);/g,
    (match) => ENTITY_MAP[match] ?? match,
  );
}

/**
 * Removes markup and entities but keeps line breaks, which still mark
 * sentence boundaries for the extractor.
 */
export function stripMarkup(value: string): string {
  if (!value) {
    return '';
  }
  const withBreaks = value
    .replace(CONTROL_CHAR_RE, '')
    .replace(/\r\n?/g, '\n')
    .replace(BLOCK_TAG_RE, '\n');
  return decodeHtmlEntities(withBreaks.replace(TAG_RE, ' '))
    .replace(INLINE_WS_RE, ' ')
    .replace(/ *\n */g, '\n')
    .trim();
}

export function cleanText(value: string): string {
  if (!value) {
    return '';
  }
  return stripMarkup(value).replace(WS_RE, ' ').trim();
}

export function splitSentences(value: string): string[] {
  const stripped = stripMarkup(value);
  if (!stripped) {
    return [];
  }

  return stripped
    .split(/\n+/)
    .flatMap((paragraph) => paragraph.split(/(?<=[.!?])\s+/))
    .map((sentence) => sentence.replace(WS_RE, ' ').trim())
    .filter((sentence) => sentence.length > 0);
}

export function clipAtWordBoundary(
  value: string,
  maxChars = MAX_SENTENCE_CHARS,
): string {
  if (value.length <= maxChars) {
    return value;
  }
  const head = value.slice(0, maxChars);
  const lastSpace = head.lastIndexOf(' ');
  return (lastSpace > 0 ? head.slice(0, lastSpace) : head).trim();
}

export function tokenizeWords(value: string): string[] {
  const normalized = value.toLowerCase().replace(/[‘’]/g, "'");
  const matches = normalized.match(WORD_RE) ?? [];
  return matches
    .map((token) => token.replace(/'s$/, '').replace(/['-]+$/, ''))
    .filter((token) => token.length > 0);
}

export function contentTokens(value: string): string[] {
  return tokenizeWords(value).filter(
    (token) =>
      token.length > 2 &&
      CONTENT_TOKEN_RE.test(token) &&
      !STOPWORDS.has(token),
  );
}

/** Counts distinct cue words or phrases present as whole words. */
export function countCueHits(value: string, cues: readonly string[]): number {
  const padded = ` ${tokenizeWords(value).join(' ')} `;
  return cues.filter((cue) => padded.includes(` ${cue} `)).length;
}

/** Counts and cuts by code point so surrogate pairs stay whole. */
export function truncateWithEllipsis(value: string, maxChars: number): string {
  if (maxChars <= 0) {
    return '';
  }
  const chars = Array.from(value);
  if (chars.length <= maxChars) {
    return value;
  }
  if (maxChars === 1) {
    return '…';
  }
  return `${chars.slice(0, maxChars - 1).join('').trimEnd()}…`;
}

const CAPITALIZED_RUN_RE = /\b[A-Z][A-Za-z0-9&'-]*(?:\s+[A-Z][A-Za-z0-9&'-]*)*/g;
const MONEY_RE =
  /\$\d[\d,]*(?:\.\d+)?(?:\s?(?:million|billion|trillion))?/gi;
const PERCENT_RE = /\b\d+(?:\.\d+)?%/g;

export function extractEntities(sentence: string): string[] {
  const found = new Set<string>();

  for (const match of sentence.matchAll(CAPITALIZED_RUN_RE)) {
    const words = match[0].split(/\s+/);
    const atSentenceStart = match.index === 0;
    while (words.length > 0 && STOPWORDS.has(words[0].toLowerCase())) {
      words.shift();
    }
    if (words.length === 0) {
      continue;
    }
    if (atSentenceStart && match[0].split(/\s+/).length === 1) {
      continue;
    }
    const entity = words.join(' ').replace(/'s$/, '');
    if (entity.length > 1) {
      found.add(entity);
    }
  }

  for (const match of sentence.matchAll(MONEY_RE)) {
    found.add(match[0]);
  }
  for (const match of sentence.matchAll(PERCENT_RE)) {
    found.add(match[0]);
  }

  return [...found].sort();
}

export function roundTo(value: number, digits: number): number {
  const rounded = Number(value.toFixed(digits));
  // toFixed keeps the sign of tiny negatives, which would leak -0
  return rounded === 0 ? 0 : rounded;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

import {
  ColorScheme,
  ColorSchemeName,
  ComplexityLevel,
  QuadrantId,
  QuadrantLabels,
  SemanticDimension,
} from '../types/quadrant.types';
import STOPWORD_LIST from './stopwords.json';
import SENTIMENT_LEXICON_TABLE from './sentiment-lexicon.json';

export const SERVICE_NAME = 'article-quadrant-analyzer';
export const SERVICE_VERSION = '1.0.0';

/** Unset, blank and non-numeric values all fall back. */
export function readNumberEnv(
  envName: string,
  fallback: number,
  bounds: { min?: number; max?: number; integer?: boolean } = {},
): number {
  const text = (process.env[envName] ?? '').trim();
  if (!text) {
    return fallback;
  }
  const raw = Number(text);
  if (!Number.isFinite(raw)) {
    return fallback;
  }
  const value = bounds.integer ? Math.floor(raw) : raw;
  return Math.max(
    bounds.min ?? -Infinity,
    Math.min(bounds.max ?? Infinity, value),
  );
}

function readCsvEnv(envName: string, fallback: string[]): string[] {
  const raw = (process.env[envName] ?? '').trim();
  if (!raw) {
    return fallback;
  }
  return raw
    .split(',')
    .map((token) => token.trim().toLowerCase())
    .filter(Boolean);
}

export const PORT = readNumberEnv('PORT', 3000, { min: 1, integer: true });

export const MAX_INSIGHTS_CEILING = 100;
export const DEFAULT_MAX_INSIGHTS = readNumberEnv('MAX_INSIGHTS', 20, {
  min: 1,
  max: MAX_INSIGHTS_CEILING,
  integer: true,
});
export const MIN_CONTENT_LENGTH = readNumberEnv('MIN_CONTENT_LENGTH', 100, {
  min: 1,
  integer: true,
});
export const QUADRANT_CAPACITY = readNumberEnv('QUADRANT_CAPACITY', 15, {
  min: 1,
  integer: true,
});
export const MIN_SENTENCE_CHARS = 10;
export const MAX_SENTENCE_CHARS = 500;
export const MAX_DOCUMENT_TOPICS = 10;
export const OVERVIEW_TOPIC_COUNT = 3;
export const INSIGHT_DEDUPE_JACCARD = readNumberEnv(
  'INSIGHT_DEDUPE_JACCARD',
  0.8,
  { min: 0, max: 1 },
);
export const BORDERLINE_CONFIDENCE = readNumberEnv(
  'BORDERLINE_CONFIDENCE',
  0.1,
  { min: 0, max: 1 },
);

export const SUPPORTED_LANGUAGES = new Set(
  readCsvEnv('SUPPORTED_LANGUAGES', ['en']),
);
// share of Latin-script tokens that must be English stop words to count as 'en'
export const ENGLISH_STOPWORD_MIN_RATIO = 0.15;

export const CANVAS_WIDTH = readNumberEnv('CANVAS_WIDTH', 500, {
  min: 1,
  integer: true,
});
export const CANVAS_HEIGHT = readNumberEnv('CANVAS_HEIGHT', 500, {
  min: 1,
  integer: true,
});

export const COLOR_SCHEMES: Record<ColorSchemeName, ColorScheme> = {
  professional: {
    background: '#ffffff',
    grid: '#e0e0e0',
    axes: '#333333',
    text: '#333333',
    title: '#1a1a1a',
    quadrantFill: {
      Q1: '#e3f2fd',
      Q2: '#f3e5f5',
      Q3: '#fff3e0',
      Q4: '#e8f5e8',
    },
  },
  vibrant: {
    background: '#fafafa',
    grid: '#bdbdbd',
    axes: '#212121',
    text: '#212121',
    title: '#000000',
    quadrantFill: {
      Q1: '#ff9800',
      Q2: '#2196f3',
      Q3: '#4caf50',
      Q4: '#f44336',
    },
  },
  monochrome: {
    background: '#ffffff',
    grid: '#cccccc',
    axes: '#666666',
    text: '#333333',
    title: '#000000',
    quadrantFill: {
      Q1: '#f5f5f5',
      Q2: '#e0e0e0',
      Q3: '#d0d0d0',
      Q4: '#c0c0c0',
    },
  },
};

export function isColorSchemeName(value: string): value is ColorSchemeName {
  return Object.prototype.hasOwnProperty.call(COLOR_SCHEMES, value);
}

const defaultSchemeRaw = (process.env.DEFAULT_COLOR_SCHEME ?? 'professional')
  .trim()
  .toLowerCase();
export const DEFAULT_COLOR_SCHEME: ColorSchemeName = isColorSchemeName(
  defaultSchemeRaw,
)
  ? defaultSchemeRaw
  : 'professional';

export const QUADRANT_IDS: readonly QuadrantId[] = ['Q1', 'Q2', 'Q3', 'Q4'];
export const DEFAULT_QUADRANT_LABELS: QuadrantLabels = ['Q1', 'Q2', 'Q3', 'Q4'];
export const DEFAULT_TITLE = 'Quadrant Analysis';

export const SEMANTIC_DIMENSIONS = [
  'custom',
  'sentiment',
  'importance',
  'urgency',
  'impact',
  'feasibility',
  'complexity',
  'novelty',
  'practicality',
] as const satisfies readonly SemanticDimension[];

export const QUADRANT_RECOMMENDATIONS: Record<QuadrantId, string> = {
  Q1: 'Focus on initiatives that score high on both dimensions',
  Q2: 'Review items that lead on the vertical dimension but lag on the horizontal one',
  Q3: 'Consider whether items low on both dimensions are worth pursuing',
  Q4: 'Reevaluate items that lead on the horizontal dimension but lag on the vertical one',
};

export const STOPWORDS = new Set<string>(STOPWORD_LIST);

export const SENTIMENT_LEXICON = new Map<string, number>(
  Object.entries(SENTIMENT_LEXICON_TABLE),
);
export const SENTIMENT_NORMALIZATION_ALPHA = 15;
export const NEGATION_DAMPING = 0.5;
export const NEGATION_WINDOW = 3;
export const NEGATORS = new Set([
  'not',
  'no',
  'never',
  'none',
  'nobody',
  'nothing',
  'neither',
  'nor',
  'cannot',
  "can't",
  "don't",
  "doesn't",
  "didn't",
  "isn't",
  "aren't",
  "wasn't",
  "weren't",
  "won't",
  'without',
]);
export const INTENSIFIERS: Record<string, number> = {
  very: 1.5,
  extremely: 1.8,
  highly: 1.5,
  really: 1.3,
  deeply: 1.4,
  hugely: 1.6,
  slightly: 0.6,
  somewhat: 0.7,
  barely: 0.5,
};

export const DIMENSION_CUE_SATURATION = 2;

export const URGENCY_CUES = [
  'immediate',
  'immediately',
  'urgent',
  'urgently',
  'critical',
  'now',
  'asap',
  'emergency',
  'deadline',
  'soon',
  'today',
  'quickly',
  'right away',
  'time-sensitive',
];

export const IMPACT_CUES = [
  'significant',
  'significantly',
  'major',
  'transform',
  'transforming',
  'revolutionize',
  'revolutionizing',
  'dramatic',
  'dramatically',
  'substantial',
  'widespread',
  'fundamental',
  'across industries',
  'large-scale',
];

export const COMPLEXITY_CUES = [
  'complex',
  'complexity',
  'difficult',
  'challenging',
  'challenge',
  'challenges',
  'hard',
  'complicated',
  'intricate',
  'uncertain',
  'skilled',
  'regulatory',
];

export const PRACTICALITY_CUES = [
  'implement',
  'execute',
  'build',
  'create',
  'develop',
  'deploy',
  'use',
  'apply',
  'automate',
  'optimize',
  'step',
  'steps',
  'tool',
  'tools',
];

export const NOVELTY_CUES = [
  'new',
  'novel',
  'first',
  'emerging',
  'breakthrough',
  'innovative',
  'innovation',
  'unprecedented',
  'pioneering',
  'experimental',
  'latest',
  'cutting-edge',
];

export const ENTITY_SATURATION = 3;
export const LENGTH_SATURATION_WORDS = 40;

// |score| at or above these picks the stronger or the neutral label
export const SENTIMENT_NEUTRAL_BAND = 0.05;
export const SENTIMENT_STRONG_BAND = 0.5;

// Flesch reading ease floors, highest first; anything lower is very_difficult
export const COMPLEXITY_FLOORS: ReadonlyArray<
  readonly [number, ComplexityLevel]
> = [
  [90, 'very_easy'],
  [80, 'easy'],
  [70, 'fairly_easy'],
  [60, 'standard'],
  [50, 'fairly_difficult'],
  [30, 'difficult'],
];

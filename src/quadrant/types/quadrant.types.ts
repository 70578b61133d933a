export type SemanticDimension =
  | 'custom'
  | 'sentiment'
  | 'importance'
  | 'urgency'
  | 'impact'
  | 'feasibility'
  | 'complexity'
  | 'novelty'
  | 'practicality';

export type QuadrantId = 'Q1' | 'Q2' | 'Q3' | 'Q4';

export type ColorSchemeName = 'professional' | 'vibrant' | 'monochrome';

export type AxisRole = 'x' | 'y';

export type SentimentLabel =
  | 'very_positive'
  | 'positive'
  | 'neutral'
  | 'negative'
  | 'very_negative';

export type ComplexityLevel =
  | 'very_easy'
  | 'easy'
  | 'fairly_easy'
  | 'standard'
  | 'fairly_difficult'
  | 'difficult'
  | 'very_difficult'
  | 'unknown';

export interface Insight {
  readonly text: string;
  readonly topic: string;
  readonly salience: number;
  readonly sentiment: number;
  /** De-duplicated and sorted. */
  readonly entities: readonly string[];
  readonly keywords: readonly string[];
  /** Sentence index in the cleaned source text. */
  readonly position: number;
}

export interface AxisSpec {
  readonly label: string;
  readonly minLabel: string;
  readonly maxLabel: string;
  readonly dimension: SemanticDimension;
}

export interface ScoredInsight extends Insight {
  readonly x: number;
  readonly y: number;
}

export interface QuadrantAssignment {
  readonly quadrant: QuadrantId;
  readonly confidence: number;
  readonly borderline: boolean;
}

export interface ClassifiedInsight {
  readonly insight: ScoredInsight;
  readonly assignment: QuadrantAssignment;
}

export type QuadrantGroups = Readonly<
  Record<QuadrantId, readonly ClassifiedInsight[]>
>;

export interface QuadrantLayout {
  readonly quadrant: QuadrantId;
  readonly label: string;
  readonly insights: readonly ClassifiedInsight[];
  readonly total: number;
  readonly overflowCount: number;
  readonly dominantTheme: string | null;
}

export type QuadrantLabels = readonly [string, string, string, string];

export interface RenderOptions {
  width: number;
  height: number;
  colorScheme: string;
  showLegend: boolean;
  showGrid: boolean;
  showLabels: boolean;
  title: string;
}

export interface ColorScheme {
  background: string;
  grid: string;
  axes: string;
  text: string;
  title: string;
  quadrantFill: Record<QuadrantId, string>;
}

export interface LegendEntry {
  readonly quadrant: QuadrantId;
  readonly label: string;
  readonly color: string;
  readonly count: number;
}

export interface Diagram {
  readonly title: string;
  readonly width: number;
  readonly height: number;
  readonly colorScheme: ColorSchemeName;
  readonly xAxis: AxisSpec;
  readonly yAxis: AxisSpec;
  readonly quadrants: readonly QuadrantLayout[];
  readonly legend: readonly LegendEntry[];
  readonly svg: string;
}

export interface ExtractionOptions {
  maxInsights?: number;
  minLength?: number;
  language?: string;
  /** Only used to head the overview line. */
  title?: string;
}

export interface DocumentTopic {
  readonly term: string;
  readonly frequency: number;
  /** Frequency relative to the most frequent term, in (0, 1]. */
  readonly relevance: number;
}

export interface TextStatistics {
  language: string;
  characterCount: number;
  wordCount: number;
  sentenceCount: number;
  averageSentenceLength: number;
  overallSentiment: number;
  sentimentLabel: SentimentLabel;
  /** Flesch reading ease; null outside English. */
  readabilityScore: number | null;
  complexityLevel: ComplexityLevel;
}

export interface QuadrantSummary {
  totalInsights: number;
  visibleInsights: number;
  dominantQuadrant: QuadrantId | null;
  quadrantCounts: Record<QuadrantId, number>;
  borderlineCount: number;
  keyFindings: string[];
  recommendations: string[];
}

export interface AnalysisRequest {
  text: string;
  xAxis: AxisSpec;
  yAxis: AxisSpec;
  quadrantLabels?: QuadrantLabels;
  title?: string;
  maxInsights?: number;
  minLength?: number;
  capacity?: number;
  language?: string;
  options?: Partial<Omit<RenderOptions, 'title'>>;
}

export interface AnalysisResult {
  diagram: Diagram;
  summary: QuadrantSummary;
  topics: DocumentTopic[];
  statistics: TextStatistics;
  overview: string;
}

export interface InsightExtractionResult {
  insights: Insight[];
  topics: DocumentTopic[];
  statistics: TextStatistics;
  overview: string;
}

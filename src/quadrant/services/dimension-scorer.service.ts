import { Injectable } from '@nestjs/common';
import {
  COMPLEXITY_CUES,
  DIMENSION_CUE_SATURATION,
  ENTITY_SATURATION,
  IMPACT_CUES,
  LENGTH_SATURATION_WORDS,
  NOVELTY_CUES,
  PRACTICALITY_CUES,
  URGENCY_CUES,
} from '../config/quadrant.constants';
import {
  AxisRole,
  AxisSpec,
  Insight,
  ScoredInsight,
  SemanticDimension,
} from '../types/quadrant.types';
import {
  clamp,
  countCueHits,
  roundTo,
  tokenizeWords,
} from '../utils/text.util';

/** Per-insight features, each already mapped onto [-1, 1]. */
export interface InsightFeatures {
  importance: number;
  sentiment: number;
  urgencyCue: number;
  impactCue: number;
  complexityCue: number;
  practicalityCue: number;
  noveltyCue: number;
  entityDensity: number;
  length: number;
  lexicalDiversity: number;
  numeric: number;
}

type DimensionFormula = (features: InsightFeatures, role: AxisRole) => number;

const DIMENSION_FORMULAS: Record<SemanticDimension, DimensionFormula> = {
  sentiment: (f) => f.sentiment,
  importance: (f) => f.importance,
  urgency: (f) => 0.6 * f.urgencyCue + 0.4 * f.importance,
  impact: (f) => 0.5 * f.importance + 0.3 * f.impactCue + 0.2 * f.entityDensity,
  feasibility: (f) => -0.6 * f.complexityCue + 0.4 * f.practicalityCue,
  complexity: (f) => 0.6 * f.complexityCue + 0.4 * f.length,
  novelty: (f) => 0.6 * f.noveltyCue + 0.4 * f.lexicalDiversity,
  practicality: (f) => 0.7 * f.practicalityCue + 0.3 * f.numeric,
  // x: importance plus sentiment, y: importance minus sentiment
  custom: (f, role) =>
    role === 'x'
      ? 0.5 * f.importance + 0.5 * f.sentiment
      : 0.5 * f.importance - 0.5 * f.sentiment,
};

function toSignedUnit(ratio: number): number {
  return 2 * clamp(ratio, 0, 1) - 1;
}

@Injectable()
export class DimensionScorerService {
  score(insight: Insight, xAxis: AxisSpec, yAxis: AxisSpec): ScoredInsight {
    const features = this.extractFeatures(insight);
    return {
      ...insight,
      x: this.scoreAxis(features, xAxis.dimension, 'x'),
      y: this.scoreAxis(features, yAxis.dimension, 'y'),
    };
  }

  scoreAll(
    insights: readonly Insight[],
    xAxis: AxisSpec,
    yAxis: AxisSpec,
  ): ScoredInsight[] {
    return insights.map((insight) => this.score(insight, xAxis, yAxis));
  }

  scoreAxis(
    features: InsightFeatures,
    dimension: SemanticDimension,
    role: AxisRole,
  ): number {
    const formula = DIMENSION_FORMULAS[dimension] ?? DIMENSION_FORMULAS.custom;
    const value = formula(features, role);
    return roundTo(clamp(Number.isFinite(value) ? value : 0, -1, 1), 4);
  }

  extractFeatures(insight: Insight): InsightFeatures {
    const words = tokenizeWords(insight.text);
    const cue = (cues: readonly string[]): number =>
      toSignedUnit(
        countCueHits(insight.text, cues) / DIMENSION_CUE_SATURATION,
      );

    return {
      importance: toSignedUnit(insight.salience),
      sentiment: clamp(insight.sentiment, -1, 1),
      urgencyCue: cue(URGENCY_CUES),
      impactCue: cue(IMPACT_CUES),
      complexityCue: cue(COMPLEXITY_CUES),
      practicalityCue: cue(PRACTICALITY_CUES),
      noveltyCue: cue(NOVELTY_CUES),
      entityDensity: toSignedUnit(insight.entities.length / ENTITY_SATURATION),
      length: toSignedUnit(words.length / LENGTH_SATURATION_WORDS),
      lexicalDiversity:
        words.length === 0
          ? -1
          : toSignedUnit(new Set(words).size / words.length),
      numeric: /\d/.test(insight.text) ? 1 : -1,
    };
  }
}

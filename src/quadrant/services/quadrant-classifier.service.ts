import { Injectable } from '@nestjs/common';
import { BORDERLINE_CONFIDENCE } from '../config/quadrant.constants';
import { ClassificationError } from '../errors/quadrant.errors';
import {
  ClassifiedInsight,
  QuadrantAssignment,
  QuadrantGroups,
  QuadrantId,
  ScoredInsight,
} from '../types/quadrant.types';

@Injectable()
export class QuadrantClassifierService {
  /**
   * Points on an axis belong to the non-negative side, so Q1..Q4 partition
   * [-1, 1]^2 without gaps or overlaps. Confidence is the distance to the
   * nearest axis; 0 means the point sits on a boundary.
   */
  classify(x: number, y: number): QuadrantAssignment {
    this.assertInRange('x', x);
    this.assertInRange('y', y);

    const confidence = Math.min(Math.abs(x), Math.abs(y));
    return {
      quadrant: this.quadrantOf(x, y),
      confidence,
      borderline: confidence < BORDERLINE_CONFIDENCE,
    };
  }

  /** Groups scored insights by quadrant, keeping input order within a group. */
  partition(scored: readonly ScoredInsight[]): QuadrantGroups {
    const groups: Record<QuadrantId, ClassifiedInsight[]> = {
      Q1: [],
      Q2: [],
      Q3: [],
      Q4: [],
    };

    for (const insight of scored) {
      const assignment = this.classify(insight.x, insight.y);
      groups[assignment.quadrant].push({ insight, assignment });
    }
    return groups;
  }

  private quadrantOf(x: number, y: number): QuadrantId {
    if (y >= 0) {
      return x >= 0 ? 'Q1' : 'Q2';
    }
    return x >= 0 ? 'Q4' : 'Q3';
  }

  private assertInRange(field: 'x' | 'y', value: number): void {
    if (!Number.isFinite(value) || value < -1 || value > 1) {
      throw new ClassificationError(field, value);
    }
  }
}

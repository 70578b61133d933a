import { Injectable } from '@nestjs/common';
import {
  DEFAULT_QUADRANT_LABELS,
  QUADRANT_CAPACITY,
  QUADRANT_IDS,
} from '../config/quadrant.constants';
import {
  ClassifiedInsight,
  QuadrantGroups,
  QuadrantLabels,
  QuadrantLayout,
} from '../types/quadrant.types';

const THEME_SAMPLE_SIZE = 5;

@Injectable()
export class QuadrantLayoutService {
  layout(
    groups: QuadrantGroups,
    options: { capacity?: number; labels?: QuadrantLabels } = {},
  ): QuadrantLayout[] {
    const capacity = options.capacity ?? QUADRANT_CAPACITY;
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(
        `capacity must be a positive integer, got ${capacity}`,
      );
    }
    const labels = options.labels ?? DEFAULT_QUADRANT_LABELS;

    return QUADRANT_IDS.map((quadrant, index) => {
      const ordered = this.orderBySalience(groups[quadrant]);
      const visible = ordered.slice(0, capacity);
      return {
        quadrant,
        label: labels[index],
        insights: visible,
        total: ordered.length,
        overflowCount: Math.max(0, ordered.length - capacity),
        dominantTheme: this.dominantTheme(visible),
      };
    });
  }

  private orderBySalience(
    entries: readonly ClassifiedInsight[],
  ): ClassifiedInsight[] {
    return [...entries].sort(
      (a, b) =>
        b.insight.salience - a.insight.salience ||
        a.insight.position - b.insight.position,
    );
  }

  /** Most frequent keyword among the leading visible insights. */
  private dominantTheme(visible: readonly ClassifiedInsight[]): string | null {
    const counts = new Map<string, number>();
    for (const { insight } of visible.slice(0, THEME_SAMPLE_SIZE)) {
      for (const keyword of insight.keywords) {
        if (keyword.length > 3) {
          counts.set(keyword, (counts.get(keyword) ?? 0) + 1);
        }
      }
    }

    let best: string | null = null;
    let bestCount = 0;
    for (const [keyword, count] of counts) {
      if (
        count > bestCount ||
        (count === bestCount && best != null && keyword < best)
      ) {
        best = keyword;
        bestCount = count;
      }
    }
    return best;
  }
}

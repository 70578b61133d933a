import { Injectable, Logger } from '@nestjs/common';
import {
  DEFAULT_TITLE,
  QUADRANT_IDS,
  QUADRANT_RECOMMENDATIONS,
} from '../config/quadrant.constants';
import { QuadrantPipelineError } from '../errors/quadrant.errors';
import {
  AnalysisRequest,
  AnalysisResult,
  ExtractionOptions,
  InsightExtractionResult,
  QuadrantGroups,
  QuadrantId,
  QuadrantLayout,
  QuadrantSummary,
} from '../types/quadrant.types';
import { DimensionScorerService } from './dimension-scorer.service';
import { InsightExtractorService } from './insight-extractor.service';
import { QuadrantClassifierService } from './quadrant-classifier.service';
import { QuadrantLayoutService } from './quadrant-layout.service';
import { QuadrantRendererService } from './quadrant-renderer.service';

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

@Injectable()
export class QuadrantAnalysisService {
  private readonly logger = new Logger(QuadrantAnalysisService.name);

  constructor(
    private readonly extractorService: InsightExtractorService,
    private readonly scorerService: DimensionScorerService,
    private readonly classifierService: QuadrantClassifierService,
    private readonly layoutService: QuadrantLayoutService,
    private readonly rendererService: QuadrantRendererService,
  ) {}

  extractInsights(
    request: ExtractionOptions & { text: string },
  ): InsightExtractionResult {
    const startedAt = Date.now();
    try {
      const result = this.extractorService.analyzeText(request.text, request);
      this.logger.log(
        `stage extract done: insights=${result.insights.length} language=${result.statistics.language} elapsedMs=${Date.now() - startedAt}`,
      );
      return result;
    } catch (error) {
      this.logFailure('extract', error);
      throw error;
    }
  }

  analyze(request: AnalysisRequest): AnalysisResult {
    const startedAt = Date.now();
    const { xAxis, yAxis } = request;
    this.logger.log(
      `analysis start: chars=${request.text.length} x=${xAxis.dimension} y=${yAxis.dimension}`,
    );

    try {
      // option errors surface before any extraction work
      const renderOptions = this.rendererService.resolveOptions({
        ...request.options,
        title: request.title ?? DEFAULT_TITLE,
      });

      const { insights, topics, statistics, overview } =
        this.extractorService.analyzeText(request.text, {
          maxInsights: request.maxInsights,
          minLength: request.minLength,
          language: request.language,
          title: request.title,
        });
      this.logger.log(
        `stage extract done: insights=${insights.length} language=${statistics.language} elapsedMs=${Date.now() - startedAt}`,
      );

      const scored = this.scorerService.scoreAll(insights, xAxis, yAxis);
      const groups = this.classifierService.partition(scored);
      this.logger.log(
        `stage classify done: ${QUADRANT_IDS.map((q) => `${q}=${groups[q].length}`).join(' ')}`,
      );

      const layouts = this.layoutService.layout(groups, {
        capacity: request.capacity,
        labels: request.quadrantLabels,
      });
      const svg = this.rendererService.render(
        layouts,
        xAxis,
        yAxis,
        renderOptions,
      );
      this.logger.log(
        `stage render done: chars=${svg.length} elapsedMs=${Date.now() - startedAt}`,
      );

      return {
        diagram: {
          title: renderOptions.title,
          width: renderOptions.width,
          height: renderOptions.height,
          colorScheme: renderOptions.colorScheme,
          xAxis,
          yAxis,
          quadrants: layouts,
          legend: this.rendererService.legendEntries(
            layouts,
            renderOptions.colorScheme,
          ),
          svg,
        },
        summary: this.summarize(groups, layouts),
        topics,
        statistics,
        overview,
      };
    } catch (error) {
      this.logFailure('analysis', error);
      throw error;
    }
  }

  summarize(
    groups: QuadrantGroups,
    layouts: readonly QuadrantLayout[],
  ): QuadrantSummary {
    const quadrantCounts: Record<QuadrantId, number> = {
      Q1: groups.Q1.length,
      Q2: groups.Q2.length,
      Q3: groups.Q3.length,
      Q4: groups.Q4.length,
    };
    const totalInsights = QUADRANT_IDS.reduce(
      (sum, quadrant) => sum + quadrantCounts[quadrant],
      0,
    );

    let dominantQuadrant: QuadrantId | null = null;
    for (const quadrant of QUADRANT_IDS) {
      if (
        quadrantCounts[quadrant] > 0 &&
        (dominantQuadrant == null ||
          quadrantCounts[quadrant] > quadrantCounts[dominantQuadrant])
      ) {
        dominantQuadrant = quadrant;
      }
    }

    const borderlineCount = QUADRANT_IDS.reduce(
      (sum, quadrant) =>
        sum +
        groups[quadrant].filter((entry) => entry.assignment.borderline).length,
      0,
    );

    const keyFindings = layouts
      .filter((layout) => layout.total > 0)
      .map((layout) => {
        const hidden =
          layout.overflowCount > 0 ? `, ${layout.overflowCount} not shown` : '';
        const theme = layout.dominantTheme
          ? `; dominant theme: ${layout.dominantTheme}`
          : '';
        return `${layout.label} (${layout.quadrant}) holds ${plural(layout.total, 'insight')}${hidden}${theme}`;
      });

    const recommendations: string[] = [];
    if (dominantQuadrant != null) {
      recommendations.push(QUADRANT_RECOMMENDATIONS[dominantQuadrant]);
    }
    if (borderlineCount > 0) {
      recommendations.push(
        `Review ${plural(borderlineCount, 'borderline insight')} near an axis before acting on them`,
      );
    }

    return {
      totalInsights,
      visibleInsights: layouts.reduce(
        (sum, layout) => sum + layout.insights.length,
        0,
      ),
      dominantQuadrant,
      quadrantCounts,
      borderlineCount,
      keyFindings,
      recommendations,
    };
  }

  private logFailure(stage: string, error: unknown): void {
    if (error instanceof QuadrantPipelineError) {
      this.logger.warn(
        `${stage} failed: ${error.name} reason=${error.reason} field=${error.field} value=${String(error.value)}`,
      );
    }
  }
}

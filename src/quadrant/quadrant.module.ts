import { Module } from '@nestjs/common';
import { QuadrantController } from './quadrant.controller';
import { DimensionScorerService } from './services/dimension-scorer.service';
import { InsightExtractorService } from './services/insight-extractor.service';
import { QuadrantAnalysisService } from './services/quadrant-analysis.service';
import { QuadrantClassifierService } from './services/quadrant-classifier.service';
import { QuadrantLayoutService } from './services/quadrant-layout.service';
import { QuadrantRendererService } from './services/quadrant-renderer.service';

@Module({
  controllers: [QuadrantController],
  providers: [
    InsightExtractorService,
    DimensionScorerService,
    QuadrantClassifierService,
    QuadrantLayoutService,
    QuadrantRendererService,
    QuadrantAnalysisService,
  ],
  exports: [QuadrantAnalysisService],
})
export class QuadrantModule {}

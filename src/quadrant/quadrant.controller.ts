import {
  BadRequestException,
  Body,
  Controller,
  Header,
  HttpCode,
  Post,
  UnprocessableEntityException,
} from '@nestjs/common';
import { z } from 'zod';
import {
  AnalyzeRequestSchema,
  ExtractInsightsRequestSchema,
} from './dto/analyze-request.schema';
import { QuadrantPipelineError, RenderError } from './errors/quadrant.errors';
import { QuadrantAnalysisService } from './services/quadrant-analysis.service';
import {
  AnalysisResult,
  InsightExtractionResult,
} from './types/quadrant.types';

@Controller('quadrant')
export class QuadrantController {
  constructor(
    private readonly quadrantAnalysisService: QuadrantAnalysisService,
  ) {}

  @Post('insights')
  @HttpCode(200)
  extractInsights(@Body() body: unknown): InsightExtractionResult {
    const request = this.parseBody(ExtractInsightsRequestSchema, body);
    return this.runPipeline(() =>
      this.quadrantAnalysisService.extractInsights(request),
    );
  }

  @Post('analyze')
  @HttpCode(200)
  analyze(@Body() body: unknown): AnalysisResult {
    const request = this.parseBody(AnalyzeRequestSchema, body);
    return this.runPipeline(() =>
      this.quadrantAnalysisService.analyze(request),
    );
  }

  @Post('analyze.svg')
  @HttpCode(200)
  @Header('Content-Type', 'image/svg+xml; charset=utf-8')
  analyzeSvg(@Body() body: unknown): string {
    const request = this.parseBody(AnalyzeRequestSchema, body);
    return this.runPipeline(
      () => this.quadrantAnalysisService.analyze(request).diagram.svg,
    );
  }

  private parseBody<T extends z.ZodTypeAny>(
    schema: T,
    body: unknown,
  ): z.output<T> {
    const parsed = schema.safeParse(body ?? {});
    if (!parsed.success) {
      throw new BadRequestException({
        statusCode: 400,
        error: 'Bad Request',
        message: 'request body is invalid',
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
    }
    return parsed.data;
  }

  private runPipeline<T>(operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      if (error instanceof RenderError) {
        throw new BadRequestException({ statusCode: 400, ...error.toBody() });
      }
      if (error instanceof QuadrantPipelineError) {
        throw new UnprocessableEntityException({
          statusCode: 422,
          ...error.toBody(),
        });
      }
      throw error;
    }
  }
}

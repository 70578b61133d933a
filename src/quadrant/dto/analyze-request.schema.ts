import { z } from 'zod';
import {
  MAX_INSIGHTS_CEILING,
  SEMANTIC_DIMENSIONS,
} from '../config/quadrant.constants';

const AxisSpecSchema = z.object({
  label: z.string().trim().min(1),
  minLabel: z.string().default('Low'),
  maxLabel: z.string().default('High'),
  dimension: z.enum(SEMANTIC_DIMENSIONS).default('custom'),
});

// Only shapes are checked here; ranges and scheme names are the renderer's
// (RenderError).
const RenderOptionsSchema = z
  .object({
    width: z.number(),
    height: z.number(),
    colorScheme: z.string(),
    showLegend: z.boolean(),
    showGrid: z.boolean(),
    showLabels: z.boolean(),
  })
  .partial();

export const ExtractInsightsRequestSchema = z.object({
  text: z.string(),
  maxInsights: z.number().int().min(1).max(MAX_INSIGHTS_CEILING).optional(),
  minLength: z.number().int().min(0).optional(),
  language: z.string().trim().min(1).optional(),
  title: z.string().optional(),
});

export const AnalyzeRequestSchema = ExtractInsightsRequestSchema.extend({
  xAxis: AxisSpecSchema,
  yAxis: AxisSpecSchema,
  quadrantLabels: z
    .tuple([z.string(), z.string(), z.string(), z.string()])
    .optional(),
  capacity: z.number().int().min(1).optional(),
  options: RenderOptionsSchema.optional(),
});

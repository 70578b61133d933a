import { Injectable } from '@nestjs/common';
import {
  CANVAS_HEIGHT,
  CANVAS_WIDTH,
  COLOR_SCHEMES,
  DEFAULT_COLOR_SCHEME,
  QUADRANT_IDS,
  isColorSchemeName,
} from '../config/quadrant.constants';
import { RenderError } from '../errors/quadrant.errors';
import {
  AxisSpec,
  ColorScheme,
  ColorSchemeName,
  LegendEntry,
  QuadrantId,
  QuadrantLayout,
  RenderOptions,
} from '../types/quadrant.types';
import { element, escapeXml, fmt } from '../utils/svg.util';
import { truncateWithEllipsis } from '../utils/text.util';

export interface ResolvedRenderOptions extends RenderOptions {
  colorScheme: ColorSchemeName;
}

interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

const PADDING_RATIO = 0.12;
const ARROW_SIZE = 8;
const INSET = 8;
const TITLE_BASELINE = 16;
const FIRST_ROW_BASELINE = 32;
const ROW_HEIGHT = 12;
const BOTTOM_INSET = 4;
// average glyph advance for the sans-serif sizes used below
const INSIGHT_CHAR_WIDTH = 6;
const LABEL_CHAR_WIDTH = 7.2;
const TITLE_CHAR_WIDTH = 9.6;
const LEGEND_SWATCH = 10;

@Injectable()
export class QuadrantRendererService {
  resolveOptions(options: Partial<RenderOptions> = {}): ResolvedRenderOptions {
    const width = options.width ?? CANVAS_WIDTH;
    const height = options.height ?? CANVAS_HEIGHT;
    this.assertDimension('width', width);
    this.assertDimension('height', height);

    const colorScheme = options.colorScheme ?? DEFAULT_COLOR_SCHEME;
    if (!isColorSchemeName(colorScheme)) {
      throw new RenderError(
        'colorScheme',
        colorScheme,
        `unsupported color scheme '${colorScheme}' (supported: ${Object.keys(COLOR_SCHEMES).join(', ')})`,
      );
    }

    return {
      width,
      height,
      colorScheme,
      showLegend: options.showLegend ?? true,
      showGrid: options.showGrid ?? true,
      showLabels: options.showLabels ?? true,
      title: options.title ?? '',
    };
  }

  legendEntries(
    layouts: readonly QuadrantLayout[],
    colorScheme: ColorSchemeName,
  ): LegendEntry[] {
    const scheme = COLOR_SCHEMES[colorScheme];
    return this.orderedLayouts(layouts).map((layout) => ({
      quadrant: layout.quadrant,
      label: layout.label,
      color: scheme.quadrantFill[layout.quadrant],
      count: layout.total,
    }));
  }

  render(
    layouts: readonly QuadrantLayout[],
    xAxis: AxisSpec,
    yAxis: AxisSpec,
    options: Partial<RenderOptions> = {},
  ): string {
    const resolved = this.resolveOptions(options);
    const { width, height, title } = resolved;
    const scheme = COLOR_SCHEMES[resolved.colorScheme];
    const padding = Math.round(Math.min(width, height) * PADDING_RATIO);
    const ordered = this.orderedLayouts(layouts);

    const parts: string[] = [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" role="img" aria-label="${escapeXml(title || 'Quadrant diagram')}">`,
    ];
    if (title) {
      parts.push(`<title>${escapeXml(title)}</title>`);
    }
    parts.push(this.styleBlock(scheme));
    parts.push(element('rect', { width, height, fill: scheme.background }));

    if (title) {
      parts.push(
        element(
          'text',
          {
            x: width / 2,
            y: Math.round(padding * 0.4),
            'text-anchor': 'middle',
            class: 'title',
          },
          truncateWithEllipsis(
            title,
            Math.floor((width - 2 * INSET) / TITLE_CHAR_WIDTH),
          ),
        ),
      );
    }

    for (const layout of ordered) {
      parts.push(
        ...this.renderQuadrant(
          layout,
          this.quadrantRect(layout.quadrant, width, height, padding),
          scheme,
          resolved.showLabels,
        ),
      );
    }
    if (resolved.showGrid) {
      parts.push(...this.renderGrid(width, height, padding));
    }
    parts.push(...this.renderAxes(width, height, padding));
    if (resolved.showLabels) {
      parts.push(
        ...this.renderAxisLabels(xAxis, yAxis, width, height, padding),
      );
    }
    if (resolved.showLegend) {
      parts.push(
        ...this.renderLegend(
          this.legendEntries(ordered, resolved.colorScheme),
          width,
          height,
          padding,
        ),
      );
    }

    parts.push('</svg>');
    return parts.join('\n');
  }

  private assertDimension(field: 'width' | 'height', value: number): void {
    if (!Number.isInteger(value) || value <= 0) {
      throw new RenderError(
        field,
        Number.isFinite(value) ? value : null,
        `${field} must be a positive integer`,
      );
    }
  }

  private orderedLayouts(
    layouts: readonly QuadrantLayout[],
  ): QuadrantLayout[] {
    return QUADRANT_IDS.map((quadrant) => {
      const layout = layouts.find((entry) => entry.quadrant === quadrant);
      return (
        layout ?? {
          quadrant,
          label: quadrant,
          insights: [],
          total: 0,
          overflowCount: 0,
          dominantTheme: null,
        }
      );
    });
  }

  private quadrantRect(
    quadrant: QuadrantId,
    width: number,
    height: number,
    padding: number,
  ): Rect {
    const cx = width / 2;
    const cy = height / 2;
    const left = Math.max(0, cx - padding);
    const right = Math.max(0, width - padding - cx);
    const top = Math.max(0, cy - padding);
    const bottom = Math.max(0, height - padding - cy);

    switch (quadrant) {
      case 'Q1':
        return { x: cx, y: padding, width: right, height: top };
      case 'Q2':
        return { x: padding, y: padding, width: left, height: top };
      case 'Q3':
        return { x: padding, y: cy, width: left, height: bottom };
      case 'Q4':
        return { x: cx, y: cy, width: right, height: bottom };
    }
  }

  private renderQuadrant(
    layout: QuadrantLayout,
    rect: Rect,
    scheme: ColorScheme,
    showLabels: boolean,
  ): string[] {
    const parts = [`<g class="quadrant" data-quadrant="${layout.quadrant}">`];
    parts.push(
      element('rect', {
        x: rect.x,
        y: rect.y,
        width: rect.width,
        height: rect.height,
        fill: scheme.quadrantFill[layout.quadrant],
        'fill-opacity': layout.total > 0 ? 0.3 : 0.1,
      }),
    );

    const textX = rect.x + INSET;
    if (showLabels) {
      parts.push(
        element(
          'text',
          { x: textX, y: rect.y + TITLE_BASELINE, class: 'quadrant-label' },
          truncateWithEllipsis(
            layout.label,
            Math.floor((rect.width - 2 * INSET) / LABEL_CHAR_WIDTH),
          ),
        ),
      );
    }

    const rowBudget = rect.height - FIRST_ROW_BASELINE - BOTTOM_INSET;
    const rowChars = Math.floor((rect.width - 2 * INSET) / INSIGHT_CHAR_WIDTH);
    // a region too narrow for one character gets no rows at all
    const rowCapacity =
      rowBudget >= 0 && rowChars > 0
        ? Math.floor(rowBudget / ROW_HEIGHT) + 1
        : 0;

    const needsOverflowRow = layout.overflowCount > 0;
    const fitsAll =
      layout.insights.length + (needsOverflowRow ? 1 : 0) <= rowCapacity;
    const shown = fitsAll
      ? layout.insights.length
      : Math.max(0, rowCapacity - 1);
    const hidden = layout.insights.length - shown + layout.overflowCount;

    layout.insights.slice(0, shown).forEach(({ insight, assignment }, row) => {
      parts.push(
        element(
          'text',
          {
            x: textX,
            y: rect.y + FIRST_ROW_BASELINE + row * ROW_HEIGHT,
            class: assignment.borderline ? 'insight borderline' : 'insight',
          },
          this.insightRowText(insight.text, rowChars),
        ),
      );
    });

    if (hidden > 0 && rowCapacity > 0) {
      parts.push(
        element(
          'text',
          {
            x: textX,
            y: rect.y + FIRST_ROW_BASELINE + shown * ROW_HEIGHT,
            class: 'overflow',
          },
          this.overflowRowText(hidden, rowChars),
        ),
      );
    }

    parts.push('</g>');
    return parts;
  }

  /** The bullet and its space are dropped when they would leave no room. */
  private insightRowText(text: string, rowChars: number): string {
    return rowChars > 2
      ? `• ${truncateWithEllipsis(text, rowChars - 2)}`
      : truncateWithEllipsis(text, rowChars);
  }

  // "+N more", then "+N", then a bare "+"; a count is never cut short
  private overflowRowText(hidden: number, rowChars: number): string {
    const full = `+${hidden} more`;
    if (full.length <= rowChars) {
      return full;
    }
    const count = `+${hidden}`;
    return count.length <= rowChars ? count : '+';
  }

  private renderGrid(width: number, height: number, padding: number): string[] {
    const plotWidth = width - 2 * padding;
    const plotHeight = height - 2 * padding;
    const lines: string[] = [];
    for (const fraction of [0.25, 0.75]) {
      const x = padding + plotWidth * fraction;
      const y = padding + plotHeight * fraction;
      lines.push(
        element('line', {
          x1: x,
          y1: padding,
          x2: x,
          y2: height - padding,
          class: 'grid-line',
        }),
        element('line', {
          x1: padding,
          y1: y,
          x2: width - padding,
          y2: y,
          class: 'grid-line',
        }),
      );
    }
    return lines;
  }

  private renderAxes(width: number, height: number, padding: number): string[] {
    const cx = width / 2;
    const cy = height / 2;
    const xEnd = width - padding;
    const half = ARROW_SIZE / 2;
    const points = (coords: number[][]): string =>
      coords.map(([px, py]) => `${fmt(px)},${fmt(py)}`).join(' ');

    return [
      element('line', {
        x1: padding,
        y1: cy,
        x2: xEnd,
        y2: cy,
        class: 'axis-line',
      }),
      element('polygon', {
        points: points([
          [xEnd, cy],
          [xEnd - ARROW_SIZE, cy - half],
          [xEnd - ARROW_SIZE, cy + half],
        ]),
        class: 'arrow',
      }),
      element('line', {
        x1: cx,
        y1: height - padding,
        x2: cx,
        y2: padding,
        class: 'axis-line',
      }),
      element('polygon', {
        points: points([
          [cx, padding],
          [cx - half, padding + ARROW_SIZE],
          [cx + half, padding + ARROW_SIZE],
        ]),
        class: 'arrow',
      }),
    ];
  }

  private renderAxisLabels(
    xAxis: AxisSpec,
    yAxis: AxisSpec,
    width: number,
    height: number,
    padding: number,
  ): string[] {
    const cx = width / 2;
    const cy = height / 2;
    const marginChars = Math.floor((padding - INSET) / INSIGHT_CHAR_WIDTH);
    const lineChars = Math.floor((width - 2 * INSET) / INSIGHT_CHAR_WIDTH);
    const placements: Array<{
      x: number;
      y: number;
      anchor: 'start' | 'middle' | 'end';
      className: 'axis-title' | 'axis-label';
      text: string;
      maxChars: number;
    }> = [
      // x axis: title and max label at the positive end, min at the left
      {
        x: width - padding + 4,
        y: cy - 6,
        anchor: 'start',
        className: 'axis-title',
        text: xAxis.label,
        maxChars: marginChars,
      },
      {
        x: width - padding + 4,
        y: cy + 14,
        anchor: 'start',
        className: 'axis-label',
        text: xAxis.maxLabel,
        maxChars: marginChars,
      },
      {
        x: padding - 4,
        y: cy + 14,
        anchor: 'end',
        className: 'axis-label',
        text: xAxis.minLabel,
        maxChars: marginChars,
      },
      // y axis: title and max label above the arrow, min below the plot
      {
        x: cx,
        y: padding - 20,
        anchor: 'middle',
        className: 'axis-title',
        text: yAxis.label,
        maxChars: lineChars,
      },
      {
        x: cx,
        y: padding - 8,
        anchor: 'middle',
        className: 'axis-label',
        text: yAxis.maxLabel,
        maxChars: lineChars,
      },
      {
        x: cx,
        y: height - padding + 14,
        anchor: 'middle',
        className: 'axis-label',
        text: yAxis.minLabel,
        maxChars: lineChars,
      },
    ];

    return placements.map((placement) =>
      element(
        'text',
        {
          x: placement.x,
          y: placement.y,
          'text-anchor': placement.anchor,
          class: placement.className,
        },
        truncateWithEllipsis(placement.text, placement.maxChars),
      ),
    );
  }

  private renderLegend(
    entries: readonly LegendEntry[],
    width: number,
    height: number,
    padding: number,
  ): string[] {
    const baseline = height - Math.round(padding * 0.3);
    const cellWidth = (width - 2 * padding) / entries.length;
    const labelChars = Math.floor(
      (cellWidth - LEGEND_SWATCH - 2 * INSET) / INSIGHT_CHAR_WIDTH,
    );

    const parts = ['<g class="legend">'];
    entries.forEach((entry, index) => {
      const cellX = padding + index * cellWidth;
      parts.push(
        element('rect', {
          x: cellX,
          y: baseline - 9,
          width: LEGEND_SWATCH,
          height: LEGEND_SWATCH,
          fill: entry.color,
        }),
        element(
          'text',
          { x: cellX + LEGEND_SWATCH + 4, y: baseline, class: 'legend-label' },
          truncateWithEllipsis(`${entry.label} (${entry.count})`, labelChars),
        ),
      );
    });
    parts.push('</g>');
    return parts;
  }

  private styleBlock(scheme: ColorScheme): string {
    return [
      '<style>',
      `.title{font:bold 16px sans-serif;fill:${scheme.title}}`,
      `.quadrant-label{font:bold 12px sans-serif;fill:${scheme.title}}`,
      `.insight,.overflow{font:10px sans-serif;fill:${scheme.text}}`,
      '.borderline{font-style:italic}',
      '.overflow{font-weight:bold}',
      `.axis-title{font:bold 11px sans-serif;fill:${scheme.text}}`,
      `.axis-label,.legend-label{font:10px sans-serif;fill:${scheme.text}}`,
      `.axis-line{stroke:${scheme.axes};stroke-width:2}`,
      `.arrow{fill:${scheme.axes}}`,
      `.grid-line{stroke:${scheme.grid};stroke-width:1;stroke-dasharray:2,2}`,
      '</style>',
    ].join('\n');
  }
}

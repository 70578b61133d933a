import { RenderError } from '../errors/quadrant.errors';
import {
  AxisSpec,
  ClassifiedInsight,
  QuadrantId,
  QuadrantLayout,
  RenderOptions,
} from '../types/quadrant.types';
import { QuadrantRendererService } from './quadrant-renderer.service';

const X_AXIS: AxisSpec = {
  label: 'Impact',
  minLabel: 'Low',
  maxLabel: 'Very High Impact',
  dimension: 'impact',
};
const Y_AXIS: AxisSpec = {
  label: 'Effort',
  minLabel: 'Low',
  maxLabel: 'High',
  dimension: 'complexity',
};

function entry(
  quadrant: QuadrantId,
  text: string,
  borderline = false,
): ClassifiedInsight {
  return {
    insight: {
      text,
      topic: '',
      salience: 0.5,
      sentiment: 0,
      entities: [],
      keywords: [],
      position: 0,
      x: 0.5,
      y: 0.5,
    },
    assignment: { quadrant, confidence: borderline ? 0 : 0.5, borderline },
  };
}

function layout(
  quadrant: QuadrantId,
  label: string,
  insights: ClassifiedInsight[] = [],
  overflowCount = 0,
): QuadrantLayout {
  return {
    quadrant,
    label,
    insights,
    total: insights.length + overflowCount,
    overflowCount,
    dominantTheme: null,
  };
}

function sampleLayouts(): QuadrantLayout[] {
  return [
    layout('Q1', 'Quick Wins', [
      entry('Q1', 'Acme Corp launched a new battery platform.'),
      entry('Q1', 'Costs fell', true),
      entry('Q1', 'Demand rose'),
    ]),
    layout('Q2', 'Q2'),
    layout('Q3', 'Q3'),
    layout('Q4', 'Q4'),
  ];
}

function captureRenderError(run: () => unknown): RenderError {
  try {
    run();
  } catch (error) {
    if (error instanceof RenderError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a RenderError');
}

// text rows whose estimated width runs past the right edge of their region
function rowsPastRegionEdge(svg: string): string[] {
  const past: string[] = [];
  let right: number | null = null;
  let inRegion = false;
  for (const line of svg.split('\n')) {
    if (line.startsWith('<g class="quadrant"')) {
      inRegion = true;
      right = null;
      continue;
    }
    if (line === '</g>') {
      inRegion = false;
      continue;
    }
    if (!inRegion) {
      continue;
    }
    const rect = /^<rect x="([\d.]+)" y="[\d.]+" width="([\d.]+)"/.exec(line);
    if (rect) {
      right = Number(rect[1]) + Number(rect[2]);
      continue;
    }
    const text =
      /^<text x="([\d.]+)" y="[\d.]+" class="([a-z -]+)">(.*)<\/text>$/.exec(line);
    if (text && right != null) {
      const charWidth = text[2] === 'quadrant-label' ? 7.2 : 6;
      if (Number(text[1]) + Array.from(text[3]).length * charWidth > right) {
        past.push(line);
      }
    }
  }
  return past;
}

function crowdedLayouts(): QuadrantLayout[] {
  const visible = Array.from({ length: 3 }, (_, i) =>
    entry('Q1', `Insight ${i}`),
  );
  return [layout('Q1', 'Q1', visible, 36), layout('Q2', 'Q2')];
}

describe('QuadrantRendererService', () => {
  let service: QuadrantRendererService;

  beforeEach(() => {
    service = new QuadrantRendererService();
  });

  it('renders a complete svg document with default options', () => {
    const lines = service
      .render(sampleLayouts(), X_AXIS, Y_AXIS, { title: 'Test' })
      .split('\n');

    expect(lines[0]).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="500" height="500" viewBox="0 0 500 500" role="img" aria-label="Test">',
    );
    expect(lines[1]).toBe('<title>Test</title>');
    expect(lines[lines.length - 1]).toBe('</svg>');
    expect(lines).toContain(
      '<text x="250" y="24" text-anchor="middle" class="title">Test</text>',
    );
  });

  it('draws one region per quadrant with populated regions more opaque', () => {
    const lines = service
      .render(sampleLayouts(), X_AXIS, Y_AXIS)
      .split('\n');

    expect(lines).toContain(
      '<rect x="250" y="60" width="190" height="190" fill="#e3f2fd" fill-opacity="0.3"/>',
    );
    expect(lines).toContain(
      '<rect x="60" y="60" width="190" height="190" fill="#f3e5f5" fill-opacity="0.1"/>',
    );
    expect(lines).toContain(
      '<rect x="60" y="250" width="190" height="190" fill="#fff3e0" fill-opacity="0.1"/>',
    );
    expect(lines).toContain(
      '<rect x="250" y="250" width="190" height="190" fill="#e8f5e8" fill-opacity="0.1"/>',
    );
    expect(
      lines.filter((line) => line.startsWith('<g class="quadrant"')),
    ).toEqual([
      '<g class="quadrant" data-quadrant="Q1">',
      '<g class="quadrant" data-quadrant="Q2">',
      '<g class="quadrant" data-quadrant="Q3">',
      '<g class="quadrant" data-quadrant="Q4">',
    ]);
  });

  it('lists truncated insights under the quadrant label', () => {
    const lines = service
      .render(sampleLayouts(), X_AXIS, Y_AXIS)
      .split('\n');

    expect(lines).toContain(
      '<text x="258" y="76" class="quadrant-label">Quick Wins</text>',
    );
    expect(lines).toContain(
      '<text x="258" y="92" class="insight">• Acme Corp launched a new b…</text>',
    );
    expect(lines).toContain(
      '<text x="258" y="104" class="insight borderline">• Costs fell</text>',
    );
    expect(lines).toContain(
      '<text x="258" y="116" class="insight">• Demand rose</text>',
    );
    expect(lines.some((line) => line.includes('class="overflow"'))).toBe(
      false,
    );
  });

  it('replaces rows that do not fit with a "+N more" row', () => {
    const visible = Array.from({ length: 14 }, (_, i) =>
      entry('Q1', `Insight ${i}`),
    );
    const lines = service
      .render(
        [layout('Q1', 'Q1', visible, 5), layout('Q2', 'Q2')],
        X_AXIS,
        Y_AXIS,
      )
      .split('\n');

    expect(
      lines.filter((line) => line.includes('class="insight"')),
    ).toHaveLength(12);
    expect(lines).toContain(
      '<text x="258" y="236" class="overflow">+7 more</text>',
    );
  });

  it('shows the overflow row when only hidden insights remain', () => {
    const visible = Array.from({ length: 3 }, (_, i) =>
      entry('Q4', `Insight ${i}`),
    );
    const lines = service
      .render([layout('Q4', 'Q4', visible, 2)], X_AXIS, Y_AXIS)
      .split('\n');

    expect(lines).toContain(
      '<text x="258" y="318" class="overflow">+2 more</text>',
    );
  });

  it('shortens rows and the overflow count to fit a narrow region', () => {
    const svg = service.render(crowdedLayouts(), X_AXIS, Y_AXIS, {
      width: 120,
      height: 140,
    });
    const lines = svg.split('\n');

    expect(lines).toContain(
      '<rect x="60" y="14" width="46" height="56" fill="#e3f2fd" fill-opacity="0.3"/>',
    );
    expect(lines).toContain(
      '<text x="68" y="30" class="quadrant-label">Q1</text>',
    );
    expect(
      lines.filter((line) => line.includes('class="insight"')),
    ).toEqual(['<text x="68" y="46" class="insight">• In…</text>']);
    expect(lines).toContain('<text x="68" y="58" class="overflow">+38</text>');
    expect(rowsPastRegionEdge(svg)).toEqual([]);
  });

  it('drops the bullet when a region has room for one character', () => {
    const svg = service.render(crowdedLayouts(), X_AXIS, Y_AXIS, {
      width: 60,
      height: 140,
    });
    const lines = svg.split('\n');

    expect(
      lines.filter((line) => line.includes('class="insight"')),
    ).toEqual([
      '<text x="38" y="39" class="insight">…</text>',
      '<text x="38" y="51" class="insight">…</text>',
    ]);
    expect(lines).toContain('<text x="38" y="63" class="overflow">+</text>');
    expect(lines).toContain(
      '<text x="38" y="23" class="quadrant-label"></text>',
    );
    expect(rowsPastRegionEdge(svg)).toEqual([]);
  });

  it('emits no rows in a region narrower than its insets', () => {
    const lines = service
      .render(crowdedLayouts(), X_AXIS, Y_AXIS, { width: 40, height: 140 })
      .split('\n');

    expect(
      lines.some(
        (line) =>
          line.includes('class="insight') || line.includes('class="overflow"'),
      ),
    ).toBe(false);
  });

  it('keeps every row of the default canvas inside its region', () => {
    const visible = Array.from({ length: 14 }, (_, i) =>
      entry('Q1', `Insight number ${i} describes a rather long finding`),
    );
    const svg = service.render(
      [layout('Q1', 'A very long quadrant label here', visible, 5)],
      X_AXIS,
      Y_AXIS,
    );

    expect(rowsPastRegionEdge(svg)).toEqual([]);
  });

  it('draws axes with arrows, labels and grid lines', () => {
    const lines = service
      .render(sampleLayouts(), X_AXIS, Y_AXIS)
      .split('\n');

    expect(lines).toContain(
      '<line x1="60" y1="250" x2="440" y2="250" class="axis-line"/>',
    );
    expect(lines).toContain(
      '<polygon points="440,250 432,246 432,254" class="arrow"/>',
    );
    expect(lines).toContain(
      '<polygon points="250,60 246,68 254,68" class="arrow"/>',
    );
    expect(lines).toContain(
      '<text x="444" y="244" text-anchor="start" class="axis-title">Impact</text>',
    );
    expect(lines).toContain(
      '<text x="444" y="264" text-anchor="start" class="axis-label">Very Hi…</text>',
    );
    expect(lines).toContain(
      '<text x="56" y="264" text-anchor="end" class="axis-label">Low</text>',
    );
    expect(lines).toContain(
      '<text x="250" y="40" text-anchor="middle" class="axis-title">Effort</text>',
    );
    expect(lines).toContain(
      '<text x="250" y="454" text-anchor="middle" class="axis-label">Low</text>',
    );
    expect(lines).toContain(
      '<line x1="155" y1="60" x2="155" y2="440" class="grid-line"/>',
    );
    expect(
      lines.filter((line) => line.includes('class="grid-line"')),
    ).toHaveLength(4);
  });

  it('renders a legend with one swatch per quadrant', () => {
    const lines = service
      .render(sampleLayouts(), X_AXIS, Y_AXIS)
      .split('\n');

    expect(lines).toContain('<g class="legend">');
    expect(lines).toContain(
      '<rect x="60" y="473" width="10" height="10" fill="#e3f2fd"/>',
    );
    expect(lines).toContain(
      '<text x="74" y="482" class="legend-label">Quick Wins…</text>',
    );
    expect(lines).toContain(
      '<text x="169" y="482" class="legend-label">Q2 (0)</text>',
    );
  });

  it('omits legend, grid and labels when disabled', () => {
    const lines = service
      .render(sampleLayouts(), X_AXIS, Y_AXIS, {
        showLegend: false,
        showGrid: false,
        showLabels: false,
      })
      .split('\n');

    expect(lines).not.toContain('<g class="legend">');
    expect(lines.some((line) => line.includes('class="grid-line"'))).toBe(
      false,
    );
    expect(
      lines.some(
        (line) =>
          line.includes('class="quadrant-label"') ||
          line.includes('class="axis-title"'),
      ),
    ).toBe(false);
  });

  it('labels an untitled diagram generically', () => {
    const lines = service
      .render(sampleLayouts(), X_AXIS, Y_AXIS)
      .split('\n');

    expect(lines[0]).toContain('aria-label="Quadrant diagram"');
    expect(lines).not.toContain('<title></title>');
  });

  it('escapes user text', () => {
    const lines = service
      .render([layout('Q1', 'R&D <core>')], X_AXIS, Y_AXIS)
      .split('\n');

    expect(lines).toContain(
      '<text x="258" y="76" class="quadrant-label">R&amp;D &lt;core&gt;</text>',
    );
  });

  it('applies the selected color scheme and canvas size', () => {
    const lines = service
      .render(sampleLayouts(), X_AXIS, Y_AXIS, {
        colorScheme: 'vibrant',
        width: 800,
        height: 400,
      })
      .split('\n');

    expect(lines).toContain(
      '<rect x="400" y="48" width="352" height="152" fill="#ff9800" fill-opacity="0.3"/>',
    );
    expect(lines).toContain('<rect width="800" height="400" fill="#fafafa"/>');
  });

  it('is deterministic', () => {
    expect(service.render(sampleLayouts(), X_AXIS, Y_AXIS)).toBe(
      service.render(sampleLayouts(), X_AXIS, Y_AXIS),
    );
  });

  it('builds legend entries from quadrant totals', () => {
    expect(service.legendEntries(sampleLayouts(), 'monochrome')).toEqual([
      { quadrant: 'Q1', label: 'Quick Wins', color: '#f5f5f5', count: 3 },
      { quadrant: 'Q2', label: 'Q2', color: '#e0e0e0', count: 0 },
      { quadrant: 'Q3', label: 'Q3', color: '#d0d0d0', count: 0 },
      { quadrant: 'Q4', label: 'Q4', color: '#c0c0c0', count: 0 },
    ]);
  });

  it.each<[string, Partial<RenderOptions>, number | null]>([
    ['width', { width: 0 }, 0],
    ['width', { width: 12.5 }, 12.5],
    ['height', { height: Number.NaN }, null],
  ])('rejects an invalid %s', (field, options, value) => {
    const error = captureRenderError(() => service.resolveOptions(options));

    expect(error.reason).toBe('InvalidOption');
    expect(error.field).toBe(field);
    expect(error.value).toBe(value);
    expect(error.message).toBe(`${field} must be a positive integer`);
  });

  it('rejects an unknown color scheme', () => {
    const error = captureRenderError(() =>
      service.render(sampleLayouts(), X_AXIS, Y_AXIS, { colorScheme: 'neon' }),
    );

    expect(error.field).toBe('colorScheme');
    expect(error.value).toBe('neon');
    expect(error.message).toBe(
      "unsupported color scheme 'neon' (supported: professional, vibrant, monochrome)",
    );
  });
});

import sharp from 'sharp';
import { describe, expect, it } from 'vitest';
import { VegaChartRenderer, renderChartSvg } from './chartRenderer.js';
import { buildBarChartSpec, buildScatterMatrixSpec } from './chartSpecs.js';

const spec = buildBarChartSpec({ categories: ['A', 'B'], values: [1, 2], width: 200, height: 150 });

describe('renderChartSvg', () => {
  it('renders a Vega-Lite spec to an SVG document', async () => {
    const svg = await renderChartSvg(spec);
    expect(svg).toMatch(/^<svg/);
    expect(svg).toContain('Bar Chart');
  });
});

describe('VegaChartRenderer', () => {
  it('rasterizes to PNG', async () => {
    const png = await new VegaChartRenderer().render(spec);
    expect([...png.subarray(0, 4)]).toEqual([0x89, 0x50, 0x4e, 0x47]);
  });

  it('scales a scatter matrix to exactly the requested size', async () => {
    const matrix = buildScatterMatrixSpec({ data: { a: [1, 2, 3], b: [3, 1, 2] }, width: 300, height: 240 });
    const png = await new VegaChartRenderer().render(matrix, { width: 300, height: 240 });

    const { width, height } = await sharp(png).metadata();
    expect({ width, height }).toEqual({ width: 300, height: 240 });
  });
});

/**
 * Headless chart renderer. Vega-Lite specs are compiled to Vega, rendered to
 * SVG by a Vega View with no DOM renderer attached, and rasterized with sharp.
 */

import sharp from 'sharp';
import * as vega from 'vega';
import * as vegaLite from 'vega-lite';
import type { TopLevelSpec } from 'vega-lite';
import { InvalidInputError } from '../types.js';
import type { PixelSize } from './chartSpecs.js';

export interface ChartRenderer {
  /** Renders a chart spec to PNG bytes, scaled to fit `size` when one is given. */
  render(spec: TopLevelSpec, size?: PixelSize): Promise<Buffer>;
}

/**
 * Render a Vega-Lite spec to an SVG document string.
 */
export async function renderChartSvg(spec: TopLevelSpec): Promise<string> {
  let compiled: vega.Spec;
  try {
    compiled = vegaLite.compile(spec).spec;
  } catch (error: unknown) {
    throw new InvalidInputError(
      `Invalid chart specification: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const view = new vega.View(vega.parse(compiled), { renderer: 'none' });
  try {
    return await view.toSVG();
  } finally {
    view.finalize();
  }
}

export class VegaChartRenderer implements ChartRenderer {
  /**
   * @param density - Rasterization DPI; 72 keeps one SVG unit per pixel.
   */
  constructor(private readonly density = 72) {}

  async render(spec: TopLevelSpec, size?: PixelSize): Promise<Buffer> {
    const svg = await renderChartSvg(spec);
    const image = sharp(Buffer.from(svg), { density: this.density });
    const sized = size
      ? image.resize(size.width, size.height, { fit: 'contain', background: 'white' })
      : image;
    return sized.png().toBuffer();
  }
}

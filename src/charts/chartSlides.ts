// src/charts/chartSlides.ts
import type { TopLevelSpec } from 'vega-lite';
import type { SlideBuilder } from '../presentation/slideBuilder.js';
import { InvalidInputError } from '../types.js';
import type { SlideResult } from '../types.js';
import type { ChartRenderer } from './chartRenderer.js';
import {
  buildBarChartSpec,
  buildHeatmapSpec,
  buildHistogramSpec,
  buildLinePlotSpec,
  buildPieChartSpec,
  buildScatterMatrixSpec,
  buildScatterPlotSpec,
  chartPixelSize,
  SCATTER_MATRIX_DEFAULTS,
  type BarChartInput,
  type ChartSize,
  type HeatmapInput,
  type HistogramInput,
  type PieChartInput,
  type PixelSize,
  type ScatterMatrixInput,
  type XYChartInput,
} from './chartSpecs.js';
import { generateSampleData } from './sampleData.js';

export interface ChartSlideTarget {
  presentationName: string;
  slideTitle: string;
}

export interface SampleChartRequest extends ChartSlideTarget, ChartSize {
  dataType?: string;
  chartType?: string;
  nPoints?: number;
  seed?: number;
}

export type ChartKind =
  | 'bar chart'
  | 'line plot'
  | 'pie chart'
  | 'scatter plot'
  | 'heatmap'
  | 'histogram'
  | 'scatter matrix';

export interface ChartSlideResult extends SlideResult {
  kind: ChartKind;
}

/** Capitalizes each letter run: "sine_wave" becomes "Sine_Wave". */
export function toTitleCase(value: string): string {
  return value.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_, before: string, letter: string) =>
    `${before}${letter.toUpperCase()}`
  );
}

/**
 * Validates chart input, renders it, and places the image on a new slide.
 * Spec builders validate before anything is rendered or sent.
 */
export class ChartSlides {
  constructor(
    private readonly slides: SlideBuilder,
    private readonly renderer: ChartRenderer
  ) {}

  async createBarChart(target: ChartSlideTarget, input: BarChartInput): Promise<ChartSlideResult> {
    const spec = buildBarChartSpec(input);
    const caption = `Chart showing ${input.yLabel ?? 'Values'} by ${input.xLabel ?? 'Categories'}`;
    return this.place(target, 'bar chart', spec, caption, chartPixelSize(input));
  }

  async createLinePlot(target: ChartSlideTarget, input: XYChartInput): Promise<ChartSlideResult> {
    const spec = buildLinePlotSpec(input);
    const caption = `Chart showing ${input.yLabel ?? 'Y Axis'} vs ${input.xLabel ?? 'X Axis'}`;
    return this.place(target, 'line plot', spec, caption, chartPixelSize(input));
  }

  async createPieChart(target: ChartSlideTarget, input: PieChartInput): Promise<ChartSlideResult> {
    const spec = buildPieChartSpec(input);
    const caption = `Pie chart showing distribution of ${input.chartTitle ?? 'Pie Chart'}`;
    return this.place(target, 'pie chart', spec, caption, chartPixelSize(input));
  }

  async createScatterPlot(target: ChartSlideTarget, input: XYChartInput): Promise<ChartSlideResult> {
    const spec = buildScatterPlotSpec(input);
    const caption = `Scatter plot showing relationship between ${input.xLabel ?? 'X Axis'} and ${input.yLabel ?? 'Y Axis'}`;
    return this.place(target, 'scatter plot', spec, caption, chartPixelSize(input));
  }

  async createHeatmap(target: ChartSlideTarget, input: HeatmapInput): Promise<ChartSlideResult> {
    const spec = buildHeatmapSpec(input);
    const caption = `Heatmap visualization of ${input.chartTitle ?? 'Heatmap'}`;
    return this.place(target, 'heatmap', spec, caption, chartPixelSize(input));
  }

  async createHistogram(target: ChartSlideTarget, input: HistogramInput): Promise<ChartSlideResult> {
    const spec = buildHistogramSpec(input);
    const caption = `Histogram showing distribution of ${input.xLabel ?? 'Values'}`;
    return this.place(target, 'histogram', spec, caption, chartPixelSize(input));
  }

  async createScatterMatrix(target: ChartSlideTarget, input: ScatterMatrixInput): Promise<ChartSlideResult> {
    const spec = buildScatterMatrixSpec(input);
    return this.place(
      target,
      'scatter matrix',
      spec,
      'Scatter matrix showing relationships between variables',
      chartPixelSize(input, SCATTER_MATRIX_DEFAULTS)
    );
  }

  async createChartFromSampleData(request: SampleChartRequest): Promise<ChartSlideResult> {
    const dataType = request.dataType ?? 'sine_wave';
    const chartType = request.chartType ?? 'line';
    const data = generateSampleData(dataType, request.nPoints ?? 100, request.seed);
    const target = { presentationName: request.presentationName, slideTitle: request.slideTitle };
    const size = { width: request.width, height: request.height };
    const label = `${toTitleCase(dataType)} Data`;

    if (data.kind === 'xy' && (chartType === 'line' || chartType === 'scatter')) {
      const input = { xValues: data.x, yValues: data.y, ...size };
      return chartType === 'line'
        ? this.createLinePlot(target, { ...input, chartTitle: `Line Plot of ${label}` })
        : this.createScatterPlot(target, { ...input, chartTitle: `Scatter Plot of ${label}` });
    }
    if (data.kind === 'categories' && (chartType === 'bar' || chartType === 'pie')) {
      return chartType === 'bar'
        ? this.createBarChart(target, {
            categories: data.categories,
            values: data.values,
            chartTitle: `Bar Chart of ${label}`,
            ...size,
          })
        : this.createPieChart(target, {
            labels: data.categories,
            values: data.values,
            chartTitle: `Pie Chart of ${label}`,
            ...size,
          });
    }
    // Category data carries a values series too.
    if (chartType === 'histogram' && data.kind !== 'xy') {
      return this.createHistogram(target, {
        values: data.values,
        chartTitle: `Histogram of ${label}`,
        ...size,
      });
    }
    throw new InvalidInputError(`Incompatible data type (${dataType}) and chart type (${chartType}).`);
  }

  private async place(
    target: ChartSlideTarget,
    kind: ChartKind,
    spec: TopLevelSpec,
    caption: string,
    size: PixelSize
  ): Promise<ChartSlideResult> {
    this.slides.requirePresentation(target.presentationName);
    const png = await this.renderer.render(spec, size);
    const result = await this.slides.addImageSlide(
      target.presentationName,
      target.slideTitle,
      { data: png, mimeType: 'image/png' },
      caption
    );
    return { ...result, kind };
  }
}

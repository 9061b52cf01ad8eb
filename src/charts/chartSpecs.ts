// src/charts/chartSpecs.ts
import type { TopLevelSpec } from 'vega-lite';
import type { ColorScheme } from 'vega';
import { InvalidInputError } from '../types.js';

const VEGA_LITE_SCHEMA = 'https://vega.github.io/schema/vega-lite/v5.json';

export const DEFAULT_CHART_WIDTH = 800;
export const DEFAULT_CHART_HEIGHT = 600;
export const DEFAULT_MATRIX_SIZE = 1000;

export interface ChartSize {
  width?: number;
  height?: number;
}

export interface PixelSize {
  width: number;
  height: number;
}

const CHART_DEFAULTS: PixelSize = { width: DEFAULT_CHART_WIDTH, height: DEFAULT_CHART_HEIGHT };
export const SCATTER_MATRIX_DEFAULTS: PixelSize = { width: DEFAULT_MATRIX_SIZE, height: DEFAULT_MATRIX_SIZE };

/** Size of the final image, filling in whichever dimension was left out. */
export function chartPixelSize(size: ChartSize, defaults: PixelSize = CHART_DEFAULTS): PixelSize {
  return { width: size.width ?? defaults.width, height: size.height ?? defaults.height };
}

export interface BarChartInput extends ChartSize {
  categories: string[];
  values: number[];
  chartTitle?: string;
  xLabel?: string;
  yLabel?: string;
}

export interface XYChartInput extends ChartSize {
  xValues: number[];
  yValues: number[];
  chartTitle?: string;
  xLabel?: string;
  yLabel?: string;
}

export interface PieChartInput extends ChartSize {
  labels: string[];
  values: number[];
  chartTitle?: string;
}

export interface HeatmapInput extends ChartSize {
  matrix: number[][];
  xLabels?: string[];
  yLabels?: string[];
  chartTitle?: string;
  colorscale?: string;
}

export interface HistogramInput extends ChartSize {
  values: number[];
  chartTitle?: string;
  xLabel?: string;
  yLabel?: string;
  bins?: number;
}

export interface ScatterMatrixInput extends ChartSize {
  data: Record<string, number[]>;
  chartTitle?: string;
}

// Plotly-style colorscale names mapped to Vega color schemes.
const COLOR_SCHEMES: Record<string, ColorScheme> = {
  viridis: 'viridis',
  cividis: 'cividis',
  inferno: 'inferno',
  magma: 'magma',
  plasma: 'plasma',
  turbo: 'turbo',
  blues: 'blues',
  greens: 'greens',
  greys: 'greys',
  oranges: 'oranges',
  purples: 'purples',
  reds: 'reds',
  ylgnbu: 'yellowgreenblue',
  ylorrd: 'yelloworangered',
  rdbu: 'redblue',
  rainbow: 'rainbow',
};

export function resolveColorScheme(colorscale: string): ColorScheme {
  const scheme = COLOR_SCHEMES[colorscale.toLowerCase()];
  if (!scheme) {
    throw new InvalidInputError(
      `Unsupported colorscale: ${colorscale}. Use one of ${Object.keys(COLOR_SCHEMES).join(', ')}`
    );
  }
  return scheme;
}

/** Vega-Lite reads `.`, `[` and `]` in field names as accessors. */
export function escapeFieldName(name: string): string {
  return name.replace(/([.[\]\\])/g, '\\$1');
}

function assertSameLength(
  leftName: string,
  left: unknown[],
  rightName: string,
  right: unknown[]
): void {
  if (left.length !== right.length) {
    throw new InvalidInputError(
      `${leftName} and ${rightName} must have the same length (got ${left.length} and ${right.length})`
    );
  }
  if (left.length === 0) {
    throw new InvalidInputError(`${leftName} and ${rightName} must not be empty`);
  }
}

function frame(title: string, size: ChartSize) {
  return {
    $schema: VEGA_LITE_SCHEMA,
    title,
    ...chartPixelSize(size),
    autosize: { type: 'fit' as const, contains: 'padding' as const },
    background: 'white',
  };
}

// --- Validation + Spec Builders ---

export function buildBarChartSpec(input: BarChartInput): TopLevelSpec {
  assertSameLength('categories', input.categories, 'values', input.values);
  return {
    ...frame(input.chartTitle ?? 'Bar Chart', input),
    data: {
      values: input.categories.map((category, i) => ({ category, value: input.values[i] })),
    },
    mark: 'bar',
    encoding: {
      x: { field: 'category', type: 'nominal', sort: null, title: input.xLabel ?? 'Categories' },
      y: { field: 'value', type: 'quantitative', title: input.yLabel ?? 'Values' },
    },
  };
}

function xySpec(input: XYChartInput, mark: 'line' | 'point', defaultTitle: string): TopLevelSpec {
  assertSameLength('xValues', input.xValues, 'yValues', input.yValues);
  return {
    ...frame(input.chartTitle ?? defaultTitle, input),
    data: { values: input.xValues.map((x, i) => ({ x, y: input.yValues[i] })) },
    mark: mark === 'point' ? { type: 'point', filled: true } : { type: 'line' },
    encoding: {
      x: { field: 'x', type: 'quantitative', title: input.xLabel ?? 'X Axis' },
      y: { field: 'y', type: 'quantitative', title: input.yLabel ?? 'Y Axis' },
    },
  };
}

export function buildLinePlotSpec(input: XYChartInput): TopLevelSpec {
  return xySpec(input, 'line', 'Line Plot');
}

export function buildScatterPlotSpec(input: XYChartInput): TopLevelSpec {
  return xySpec(input, 'point', 'Scatter Plot');
}

export function buildPieChartSpec(input: PieChartInput): TopLevelSpec {
  assertSameLength('labels', input.labels, 'values', input.values);
  if (input.values.some((value) => value < 0)) {
    throw new InvalidInputError('Pie chart values must not be negative');
  }
  return {
    ...frame(input.chartTitle ?? 'Pie Chart', input),
    data: { values: input.labels.map((label, i) => ({ label, value: input.values[i] })) },
    mark: { type: 'arc' },
    encoding: {
      theta: { field: 'value', type: 'quantitative', stack: true },
      color: { field: 'label', type: 'nominal', sort: null, title: null },
    },
  };
}

export function buildHeatmapSpec(input: HeatmapInput): TopLevelSpec {
  const { matrix } = input;
  const columns = matrix[0]?.length ?? 0;
  if (matrix.length === 0 || columns === 0) {
    throw new InvalidInputError('matrix must have at least one row and one column');
  }
  if (matrix.some((row) => row.length !== columns)) {
    throw new InvalidInputError('All matrix rows must have the same length');
  }
  if (input.xLabels && input.xLabels.length !== columns) {
    throw new InvalidInputError(
      `xLabels must have one label per matrix column (got ${input.xLabels.length}, expected ${columns})`
    );
  }
  if (input.yLabels && input.yLabels.length !== matrix.length) {
    throw new InvalidInputError(
      `yLabels must have one label per matrix row (got ${input.yLabels.length}, expected ${matrix.length})`
    );
  }
  const scheme = resolveColorScheme(input.colorscale ?? 'Viridis');
  const xLabels = input.xLabels ?? Array.from({ length: columns }, (_, i) => String(i));
  const yLabels = input.yLabels ?? matrix.map((_, i) => String(i));

  return {
    ...frame(input.chartTitle ?? 'Heatmap', input),
    data: {
      values: matrix.flatMap((row, r) => row.map((z, c) => ({ x: xLabels[c], y: yLabels[r], z }))),
    },
    mark: 'rect',
    encoding: {
      x: { field: 'x', type: 'ordinal', sort: null, title: null },
      y: { field: 'y', type: 'ordinal', sort: null, title: null },
      color: { field: 'z', type: 'quantitative', scale: { scheme }, title: null },
    },
  };
}

export function buildHistogramSpec(input: HistogramInput): TopLevelSpec {
  if (input.values.length === 0) {
    throw new InvalidInputError('values must not be empty');
  }
  if (input.bins !== undefined && (!Number.isInteger(input.bins) || input.bins < 1)) {
    throw new InvalidInputError(`bins must be a positive integer, got ${input.bins}`);
  }
  return {
    ...frame(input.chartTitle ?? 'Histogram', input),
    data: { values: input.values.map((value) => ({ value })) },
    mark: 'bar',
    encoding: {
      x: {
        field: 'value',
        type: 'quantitative',
        bin: input.bins === undefined ? true : { maxbins: input.bins },
        title: input.xLabel ?? 'Values',
      },
      y: { aggregate: 'count', type: 'quantitative', title: input.yLabel ?? 'Count' },
    },
  };
}

export function buildScatterMatrixSpec(input: ScatterMatrixInput): TopLevelSpec {
  const columns = Object.keys(input.data);
  if (columns.length === 0) {
    throw new InvalidInputError('data must contain at least one column');
  }
  const lengths = new Set(columns.map((column) => input.data[column].length));
  if (lengths.size !== 1) {
    throw new InvalidInputError('All data lists must have the same length');
  }
  const rowCount = input.data[columns[0]].length;
  if (rowCount === 0) {
    throw new InvalidInputError('data lists must not be empty');
  }

  const { width, height } = chartPixelSize(input, SCATTER_MATRIX_DEFAULTS);
  // Repeat layouts cannot autosize. Cells share the requested size, and the
  // renderer scales the finished grid to it exactly.
  const cellWidth = Math.max(40, Math.floor(width / columns.length) - 30);
  const cellHeight = Math.max(40, Math.floor(height / columns.length) - 30);
  const fields = columns.map(escapeFieldName);

  return {
    $schema: VEGA_LITE_SCHEMA,
    title: input.chartTitle ?? 'Scatter Matrix',
    background: 'white',
    data: {
      values: Array.from({ length: rowCount }, (_, i) =>
        Object.fromEntries(columns.map((column) => [column, input.data[column][i]]))
      ),
    },
    repeat: { row: fields, column: fields },
    spec: {
      width: cellWidth,
      height: cellHeight,
      mark: { type: 'point', filled: true, size: 12 },
      encoding: {
        x: { field: { repeat: 'column' }, type: 'quantitative' },
        y: { field: { repeat: 'row' }, type: 'quantitative' },
      },
    },
  };
}

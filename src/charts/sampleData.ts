import { randomInt, randomLcg, randomNormal } from 'd3-random';
import { InvalidInputError, SampleDataTypeSchema } from '../types.js';
import type { SampleDataType } from '../types.js';

export type SampleData =
  | { kind: 'xy'; x: number[]; y: number[] }
  | { kind: 'categories'; categories: string[]; values: number[] }
  | { kind: 'values'; values: number[] };

/** `n` evenly spaced points from `start` to `stop`, both ends included. */
export function linspace(start: number, stop: number, n: number): number[] {
  if (n === 1) return [start];
  const step = (stop - start) / (n - 1);
  return Array.from({ length: n }, (_, i) => start + step * i);
}

export function isSampleDataType(value: string): value is SampleDataType {
  return SampleDataTypeSchema.safeParse(value).success;
}

/**
 * Generates demo series for charts. With a seed, output is reproducible.
 */
export function generateSampleData(
  dataType: string = 'sine_wave',
  nPoints = 100,
  seed?: number
): SampleData {
  if (!Number.isInteger(nPoints) || nPoints < 1) {
    throw new InvalidInputError(`nPoints must be a positive integer, got ${nPoints}`);
  }
  if (!isSampleDataType(dataType)) {
    throw new InvalidInputError(`Unsupported data type: ${dataType}`);
  }

  const source = seed === undefined ? Math.random : randomLcg(seed);
  const normal = (mu: number, sigma: number) => randomNormal.source(source)(mu, sigma);

  switch (dataType) {
    case 'sine_wave': {
      const x = linspace(0, 2 * Math.PI, nPoints);
      const noise = normal(0, 0.2);
      return { kind: 'xy', x, y: x.map((v) => Math.sin(v) + noise()) };
    }
    case 'categories': {
      const draw = randomInt.source(source)(0, 100);
      return {
        kind: 'categories',
        categories: Array.from({ length: nPoints }, (_, i) => `Category ${i + 1}`),
        values: Array.from({ length: nPoints }, () => draw()),
      };
    }
    case 'linear': {
      const x = linspace(0, 10, nPoints);
      const noise = normal(0, 1);
      return { kind: 'xy', x, y: x.map((v) => 2 * v + 5 + noise()) };
    }
    case 'normal': {
      const draw = normal(0, 1);
      return { kind: 'values', values: Array.from({ length: nPoints }, () => draw()) };
    }
  }
}

/** Plain JSON view of the data, keyed the way callers pass it back to chart tools. */
export function sampleDataToJson(data: SampleData): Record<string, Array<number | string>> {
  switch (data.kind) {
    case 'xy':
      return { x: data.x, y: data.y };
    case 'categories':
      return { categories: data.categories, values: data.values };
    case 'values':
      return { values: data.values };
  }
}

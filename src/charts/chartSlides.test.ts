import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import type { TopLevelSpec } from 'vega-lite';
import { PresentationSession } from '../presentation/session.js';
import { SlideBuilder } from '../presentation/slideBuilder.js';
import { createFakeClients, sequentialIds, type FakeClients } from '../test-utils/fakeGoogleApis.js';
import { ChartSlides, toTitleCase } from './chartSlides.js';
import type { PixelSize } from './chartSpecs.js';

const target = { presentationName: 'Deck', slideTitle: 'Sales' };

function captionOf(fake: FakeClients): string | null | undefined {
  return fake.slides.allRequests.find((request) => request.insertText?.objectId?.startsWith('caption'))
    ?.insertText?.text;
}

describe('ChartSlides', () => {
  let fake: FakeClients;
  let render: Mock<(spec: TopLevelSpec, size?: PixelSize) => Promise<Buffer>>;
  let charts: ChartSlides;

  beforeEach(async () => {
    fake = createFakeClients();
    const slides = new SlideBuilder({
      session: new PresentationSession(),
      getClients: fake.getClients,
      createObjectId: sequentialIds(),
    });
    await slides.createPresentation('Deck');
    render = vi.fn(async (_spec: TopLevelSpec, _size?: PixelSize) => Buffer.from('png'));
    charts = new ChartSlides(slides, { render });
  });

  it('renders a bar chart onto a captioned image slide', async () => {
    const result = await charts.createBarChart(target, {
      categories: ['North', 'South'],
      values: [3, 5],
      xLabel: 'Region',
    });

    expect(result).toEqual({ presentationId: 'pres-1', slideId: 'img_1', kind: 'bar chart' });
    expect(render).toHaveBeenCalledTimes(1);
    expect(render.mock.calls[0][1]).toEqual({ width: 800, height: 600 });
    expect(fake.drive.uploads).toEqual([{ name: 'img_Sales.png', mimeType: 'image/png' }]);
    expect(captionOf(fake)).toBe('Chart showing Values by Region');
  });

  it('rejects mismatched data before rendering or calling the API', async () => {
    await expect(
      charts.createBarChart(target, { categories: ['a', 'b', 'c'], values: [1, 2] })
    ).rejects.toThrow('categories and values must have the same length (got 3 and 2)');

    expect(render).not.toHaveBeenCalled();
    expect(fake.slides.batches).toEqual([]);
    expect(fake.drive.uploads).toEqual([]);
  });

  it('checks the presentation name before rendering', async () => {
    await expect(
      charts.createHistogram({ presentationName: 'Nope', slideTitle: 'x' }, { values: [1, 2] })
    ).rejects.toThrow("Presentation 'Nope' not found");
    expect(render).not.toHaveBeenCalled();
  });

  it('renders a scatter matrix at the matrix size unless one is given', async () => {
    await charts.createScatterMatrix(target, { data: { a: [1, 2], b: [2, 1] } });
    await charts.createScatterMatrix(target, { data: { a: [1, 2], b: [2, 1] }, height: 700 });

    expect(render.mock.calls.map((call) => call[1])).toEqual([
      { width: 1000, height: 1000 },
      { width: 1000, height: 700 },
    ]);
    expect(captionOf(fake)).toBe('Scatter matrix showing relationships between variables');
  });

  it('captions each chart kind', async () => {
    await charts.createHeatmap(target, { matrix: [[1]] });
    expect(captionOf(fake)).toBe('Heatmap visualization of Heatmap');
  });

  describe('createChartFromSampleData', () => {
    it('defaults to a line plot of a sine wave', async () => {
      const result = await charts.createChartFromSampleData({ ...target, nPoints: 5, seed: 1 });

      expect(result.kind).toBe('line plot');
      expect(render.mock.calls[0][0]).toMatchObject({ title: 'Line Plot of Sine_Wave Data' });
    });

    it('charts category data as a pie', async () => {
      const result = await charts.createChartFromSampleData({
        ...target,
        dataType: 'categories',
        chartType: 'pie',
        nPoints: 4,
        seed: 1,
      });

      expect(result.kind).toBe('pie chart');
      expect(render.mock.calls[0][0]).toMatchObject({ title: 'Pie Chart of Categories Data' });
      expect(captionOf(fake)).toBe('Pie chart showing distribution of Pie Chart of Categories Data');
    });

    it('bins normal data into a histogram', async () => {
      const result = await charts.createChartFromSampleData({
        ...target,
        dataType: 'normal',
        chartType: 'histogram',
        nPoints: 20,
        seed: 2,
        width: 640,
      });

      expect(result.kind).toBe('histogram');
      expect(render.mock.calls[0][0]).toMatchObject({ title: 'Histogram of Normal Data', width: 640 });
    });

    it('rejects incompatible pairings', async () => {
      await expect(
        charts.createChartFromSampleData({ ...target, dataType: 'normal', chartType: 'line' })
      ).rejects.toThrow('Incompatible data type (normal) and chart type (line).');
      expect(render).not.toHaveBeenCalled();
    });
  });
});

describe('toTitleCase', () => {
  it('capitalizes each letter run', () => {
    expect(toTitleCase('sine_wave')).toBe('Sine_Wave');
    expect(toTitleCase('normal')).toBe('Normal');
  });
});

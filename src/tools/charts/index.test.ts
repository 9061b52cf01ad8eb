import { UserError } from 'fastmcp';
import type { TopLevelSpec } from 'vega-lite';
import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import type { PixelSize } from '../../charts/chartSpecs.js';
import { createToolContext } from '../../server.js';
import { createFakeClients, type FakeClients } from '../../test-utils/fakeGoogleApis.js';
import { ToolRecorder } from '../../test-utils/toolRecorder.js';
import { registerSlidesTools } from '../slides/index.js';
import { registerChartTools } from './index.js';

describe('chart tools', () => {
  let fake: FakeClients;
  let tools: ToolRecorder;
  let render: Mock<(spec: TopLevelSpec, size?: PixelSize) => Promise<Buffer>>;

  beforeEach(async () => {
    fake = createFakeClients();
    tools = new ToolRecorder();
    render = vi.fn(async (_spec: TopLevelSpec, _size?: PixelSize) => Buffer.from('png'));
    const context = createToolContext({ getClients: fake.getClients, renderer: { render } });
    registerSlidesTools(tools, context);
    registerChartTools(tools, context);
    await tools.run('createPresentation', { name: 'Deck' });
  });

  it('adds a rendered bar chart as an image slide', async () => {
    await expect(
      tools.run('createBarChart', {
        presentationName: 'Deck',
        slideTitle: 'Sales',
        categories: ['North', 'South'],
        values: [3, 5],
      })
    ).resolves.toBe("Added bar chart slide 'Sales' to presentation: Deck");
    expect(render).toHaveBeenCalledTimes(1);
    expect(fake.drive.uploads).toEqual([{ name: 'img_Sales.png', mimeType: 'image/png' }]);
  });

  it('reports mismatched series without rendering', async () => {
    const attempt = tools.run('createBarChart', {
      presentationName: 'Deck',
      slideTitle: 'Sales',
      categories: ['a', 'b', 'c'],
      values: [1, 2],
    });

    await expect(attempt).rejects.toThrow(UserError);
    await expect(attempt).rejects.toThrow(
      'Failed to create bar chart: categories and values must have the same length (got 3 and 2)'
    );
    expect(render).not.toHaveBeenCalled();
  });

  it('reports unknown presentations', async () => {
    await expect(
      tools.run('createHistogram', { presentationName: 'Nope', slideTitle: 'Spread', values: [1, 2] })
    ).rejects.toThrow("Failed to create histogram: Presentation 'Nope' not found");
  });

  it('renders a scatter matrix at the matrix size', async () => {
    await expect(
      tools.run('createScatterMatrix', {
        presentationName: 'Deck',
        slideTitle: 'Pairs',
        data: { a: [1, 2], b: [2, 1] },
      })
    ).resolves.toBe("Added scatter matrix slide 'Pairs' to presentation: Deck");
    expect(render.mock.calls[0][1]).toEqual({ width: 1000, height: 1000 });
  });

  describe('createChartFromSampleData', () => {
    it('defaults to a line plot of a sine wave', async () => {
      const parsed = await tools.validate('createChartFromSampleData', {
        presentationName: 'Deck',
        slideTitle: 'Demo',
      });
      expect(parsed.value).toMatchObject({ dataType: 'sine_wave', chartType: 'line', nPoints: 100 });

      await expect(
        tools.run('createChartFromSampleData', { presentationName: 'Deck', slideTitle: 'Demo', nPoints: 10, seed: 1 })
      ).resolves.toBe("Added line plot slide 'Demo' to presentation: Deck");
    });

    it('rejects chart types the data cannot drive', async () => {
      await expect(
        tools.run('createChartFromSampleData', {
          presentationName: 'Deck',
          slideTitle: 'Demo',
          dataType: 'normal',
          chartType: 'line',
        })
      ).rejects.toThrow('Failed to create chart from sample data: Incompatible data type (normal) and chart type (line).');
    });

    it('refuses unknown data types at validation', async () => {
      const parsed = await tools.validate('createChartFromSampleData', {
        presentationName: 'Deck',
        slideTitle: 'Demo',
        dataType: 'cosine',
      });
      expect(parsed.issues).toHaveLength(1);
    });
  });

  it('returns generated sample data as JSON', async () => {
    const output = await tools.run('generateSampleData', { dataType: 'categories', nPoints: 3, seed: 7 });

    const parsed: unknown = JSON.parse(String(output));
    expect(parsed).toEqual({
      categories: ['Category 1', 'Category 2', 'Category 3'],
      values: [expect.any(Number), expect.any(Number), expect.any(Number)],
    });
  });
});

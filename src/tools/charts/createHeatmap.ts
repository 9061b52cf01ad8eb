import { z } from 'zod';
import { ChartSlideParameters } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';
import { chartSlideMessage } from './chartMessages.js';

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'createHeatmap',
    description:
      'Renders a heatmap from a rectangular matrix of numbers and adds it to a new slide.',
    annotations: {
      title: 'Create Heatmap',
      readOnlyHint: false,
      destructiveHint: false,
      openWorldHint: true,
    },
    parameters: ChartSlideParameters.extend({
      matrix: z.array(z.array(z.number())).describe('Rows of numbers; every row has the same length.'),
      xLabels: z.array(z.string()).optional().describe('One label per column.'),
      yLabels: z.array(z.string()).optional().describe('One label per row.'),
      chartTitle: z.string().optional().describe('Title drawn above the chart.'),
      colorscale: z.string().optional().describe('Color scale name, e.g. Viridis, Blues or RdBu.'),
    }),
    execute: async (args, { log }) => {
      const { presentationName, slideTitle, ...input } = args;
      const target = { presentationName, slideTitle };
      log.info(`Adding heatmap to "${presentationName}"`);
      try {
        const result = await context.charts.createHeatmap(target, input);
        return chartSlideMessage(result, target);
      } catch (error: unknown) {
        failTool('create heatmap', error, log);
      }
    },
  });
}

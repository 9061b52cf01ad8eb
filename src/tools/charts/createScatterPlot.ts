import { z } from 'zod';
import { ChartSlideParameters } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';
import { chartSlideMessage } from './chartMessages.js';

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'createScatterPlot',
    description:
      'Renders a scatter plot from parallel x and y value lists and adds it to a new slide.',
    annotations: {
      title: 'Create Scatter Plot',
      readOnlyHint: false,
      destructiveHint: false,
      openWorldHint: true,
    },
    parameters: ChartSlideParameters.extend({
      xValues: z.array(z.number()).describe('X coordinates.'),
      yValues: z.array(z.number()).describe('Y coordinates, one per x value.'),
      chartTitle: z.string().optional().describe('Title drawn above the chart.'),
      xLabel: z.string().optional().describe('X axis label.'),
      yLabel: z.string().optional().describe('Y axis label.'),
    }),
    execute: async (args, { log }) => {
      const { presentationName, slideTitle, ...input } = args;
      const target = { presentationName, slideTitle };
      log.info(`Adding scatter plot to "${presentationName}"`);
      try {
        const result = await context.charts.createScatterPlot(target, input);
        return chartSlideMessage(result, target);
      } catch (error: unknown) {
        failTool('create scatter plot', error, log);
      }
    },
  });
}

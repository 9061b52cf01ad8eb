import { z } from 'zod';
import { ChartSlideParameters } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';
import { chartSlideMessage } from './chartMessages.js';

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'createLinePlot',
    description:
      'Renders a line plot from parallel x and y value lists and adds it to a new slide.',
    annotations: {
      title: 'Create Line Plot',
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
      log.info(`Adding line plot to "${presentationName}"`);
      try {
        const result = await context.charts.createLinePlot(target, input);
        return chartSlideMessage(result, target);
      } catch (error: unknown) {
        failTool('create line plot', error, log);
      }
    },
  });
}

import { z } from 'zod';
import { ChartSlideParameters } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';
import { chartSlideMessage } from './chartMessages.js';

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'createHistogram',
    description:
      'Renders a histogram of a list of numbers and adds it to a new slide.',
    annotations: {
      title: 'Create Histogram',
      readOnlyHint: false,
      destructiveHint: false,
      openWorldHint: true,
    },
    parameters: ChartSlideParameters.extend({
      values: z.array(z.number()).describe('Observations to bin.'),
      chartTitle: z.string().optional().describe('Title drawn above the chart.'),
      xLabel: z.string().optional().describe('X axis label.'),
      yLabel: z.string().optional().describe('Y axis label.'),
      bins: z.number().int().positive().optional().describe('Maximum number of bins.'),
    }),
    execute: async (args, { log }) => {
      const { presentationName, slideTitle, ...input } = args;
      const target = { presentationName, slideTitle };
      log.info(`Adding histogram to "${presentationName}"`);
      try {
        const result = await context.charts.createHistogram(target, input);
        return chartSlideMessage(result, target);
      } catch (error: unknown) {
        failTool('create histogram', error, log);
      }
    },
  });
}

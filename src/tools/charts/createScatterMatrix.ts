import { z } from 'zod';
import { ChartSlideParameters } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';
import { chartSlideMessage } from './chartMessages.js';

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'createScatterMatrix',
    description:
      'Renders a grid of pairwise scatter plots for named numeric columns of equal length and adds it to a new slide.',
    annotations: {
      title: 'Create Scatter Matrix',
      readOnlyHint: false,
      destructiveHint: false,
      openWorldHint: true,
    },
    parameters: ChartSlideParameters.extend({
      data: z.record(z.array(z.number())).describe('Column name to values; all columns have the same length.'),
      chartTitle: z.string().optional().describe('Title drawn above the chart.'),
    }),
    execute: async (args, { log }) => {
      const { presentationName, slideTitle, ...input } = args;
      const target = { presentationName, slideTitle };
      log.info(`Adding scatter matrix to "${presentationName}"`);
      try {
        const result = await context.charts.createScatterMatrix(target, input);
        return chartSlideMessage(result, target);
      } catch (error: unknown) {
        failTool('create scatter matrix', error, log);
      }
    },
  });
}

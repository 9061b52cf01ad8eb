import { z } from 'zod';
import { ChartSlideParameters } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';
import { chartSlideMessage } from './chartMessages.js';

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'createPieChart',
    description:
      'Renders a pie chart from parallel label and non-negative value lists and adds it to a new slide.',
    annotations: {
      title: 'Create Pie Chart',
      readOnlyHint: false,
      destructiveHint: false,
      openWorldHint: true,
    },
    parameters: ChartSlideParameters.extend({
      labels: z.array(z.string()).describe('Slice labels.'),
      values: z.array(z.number()).describe('One non-negative value per label.'),
      chartTitle: z.string().optional().describe('Title drawn above the chart.'),
    }),
    execute: async (args, { log }) => {
      const { presentationName, slideTitle, ...input } = args;
      const target = { presentationName, slideTitle };
      log.info(`Adding pie chart to "${presentationName}"`);
      try {
        const result = await context.charts.createPieChart(target, input);
        return chartSlideMessage(result, target);
      } catch (error: unknown) {
        failTool('create pie chart', error, log);
      }
    },
  });
}

import { z } from 'zod';
import { ChartSlideParameters } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';
import { chartSlideMessage } from './chartMessages.js';

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'createBarChart',
    description:
      'Renders a bar chart from parallel category and value lists and adds it to a new slide.',
    annotations: {
      title: 'Create Bar Chart',
      readOnlyHint: false,
      destructiveHint: false,
      openWorldHint: true,
    },
    parameters: ChartSlideParameters.extend({
      categories: z.array(z.string()).describe('Category labels along the x axis.'),
      values: z.array(z.number()).describe('One value per category.'),
      chartTitle: z.string().optional().describe('Title drawn above the chart.'),
      xLabel: z.string().optional().describe('X axis label.'),
      yLabel: z.string().optional().describe('Y axis label.'),
    }),
    execute: async (args, { log }) => {
      const { presentationName, slideTitle, ...input } = args;
      const target = { presentationName, slideTitle };
      log.info(`Adding bar chart to "${presentationName}"`);
      try {
        const result = await context.charts.createBarChart(target, input);
        return chartSlideMessage(result, target);
      } catch (error: unknown) {
        failTool('create bar chart', error, log);
      }
    },
  });
}

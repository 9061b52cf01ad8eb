import { z } from 'zod';
import { ChartSlideParameters, SampleChartTypeSchema, SampleDataTypeSchema } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';
import { chartSlideMessage } from './chartMessages.js';

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'createChartFromSampleData',
    description:
      'Generates sample data and charts it on a new slide in one step. sine_wave and linear pair with line or scatter; categories pairs with bar, pie or histogram; normal pairs with histogram.',
    annotations: {
      title: 'Create Chart From Sample Data',
      readOnlyHint: false,
      destructiveHint: false,
      openWorldHint: true,
    },
    parameters: ChartSlideParameters.extend({
      dataType: SampleDataTypeSchema.optional().default('sine_wave').describe('Kind of data to generate.'),
      chartType: SampleChartTypeSchema.optional().default('line').describe('Kind of chart to draw.'),
      nPoints: z.number().int().positive().optional().default(100).describe('Number of points.'),
      seed: z.number().int().optional().describe('Seed for reproducible output.'),
    }),
    execute: async (args, { log }) => {
      log.info(`Charting ${args.dataType} sample data as ${args.chartType} in "${args.presentationName}"`);
      try {
        const result = await context.charts.createChartFromSampleData(args);
        return chartSlideMessage(result, args);
      } catch (error: unknown) {
        failTool('create chart from sample data', error, log);
      }
    },
  });
}

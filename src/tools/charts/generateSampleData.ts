import { z } from 'zod';
import { generateSampleData, sampleDataToJson } from '../../charts/sampleData.js';
import { SampleDataTypeSchema } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';

export function register(server: ToolServer, _context: ToolContext) {
  server.addTool({
    name: 'generateSampleData',
    description:
      'Generates demo data for charts and returns it as JSON. sine_wave and linear return x/y series, categories returns labels with integer values, normal returns plain values. Pass a seed for reproducible output.',
    annotations: {
      title: 'Generate Sample Data',
      readOnlyHint: true,
      openWorldHint: false,
    },
    parameters: z.object({
      dataType: SampleDataTypeSchema.optional().default('sine_wave').describe('Kind of data to generate.'),
      nPoints: z.number().int().positive().optional().default(100).describe('Number of points.'),
      seed: z.number().int().optional().describe('Seed for reproducible output.'),
    }),
    execute: async (args, { log }) => {
      try {
        const data = generateSampleData(args.dataType, args.nPoints, args.seed);
        return JSON.stringify(sampleDataToJson(data), null, 2);
      } catch (error: unknown) {
        failTool('generate sample data', error, log);
      }
    },
  });
}

import { z } from 'zod';
import { PresentationNameParameter } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';

const CellValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'addTableSlide',
    description:
      'Appends a slide with a title and a table. The first table row holds the bold headers; every data row must have one value per header.',
    annotations: {
      title: 'Add Table Slide',
      readOnlyHint: false,
      destructiveHint: false,
      openWorldHint: true,
    },
    parameters: PresentationNameParameter.extend({
      title: z.string().describe('Slide title.'),
      headers: z.array(z.string()).describe('Column headers.'),
      rows: z.array(z.array(CellValue)).describe('Data rows; each row has one value per header.'),
    }),
    execute: async (args, { log }) => {
      log.info(
        `Adding ${args.rows.length}x${args.headers.length} table slide to "${args.presentationName}"`
      );
      try {
        await context.slides.addTableSlide(args.presentationName, args.title, args.headers, args.rows);
        return `Added table slide '${args.title}' to presentation: ${args.presentationName}`;
      } catch (error: unknown) {
        failTool('add table slide', error, log);
      }
    },
  });
}

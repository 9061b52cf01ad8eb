import { z } from 'zod';
import { PresentationNameParameter } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'addSectionHeader',
    description: 'Appends a section header slide that separates parts of the deck.',
    annotations: {
      title: 'Add Section Header',
      readOnlyHint: false,
      destructiveHint: false,
      openWorldHint: true,
    },
    parameters: PresentationNameParameter.extend({
      header: z.string().describe('Section header text.'),
      subtitle: z.string().optional().default('').describe('Optional line shown under the header.'),
    }),
    execute: async (args, { log }) => {
      log.info(`Adding section header to "${args.presentationName}"`);
      try {
        await context.slides.addSectionHeaderSlide(args.presentationName, args.header, args.subtitle);
        return `Added section header slide '${args.header}' to presentation: ${args.presentationName}`;
      } catch (error: unknown) {
        failTool('add section header', error, log);
      }
    },
  });
}

import { z } from 'zod';
import { PresentationNameParameter } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'addTitleSlide',
    description: 'Appends a title slide with a title and an optional subtitle.',
    annotations: {
      title: 'Add Title Slide',
      readOnlyHint: false,
      destructiveHint: false,
      openWorldHint: true,
    },
    parameters: PresentationNameParameter.extend({
      title: z.string().describe('Main title text.'),
      subtitle: z.string().optional().default('').describe('Subtitle text shown under the title.'),
    }),
    execute: async (args, { log }) => {
      log.info(`Adding title slide to "${args.presentationName}"`);
      try {
        await context.slides.addTitleSlide(args.presentationName, args.title, args.subtitle);
        return `Added title slide '${args.title}' to presentation: ${args.presentationName}`;
      } catch (error: unknown) {
        failTool('add title slide', error, log);
      }
    },
  });
}

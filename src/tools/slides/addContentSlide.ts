import { z } from 'zod';
import { PresentationNameParameter } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'addContentSlide',
    description:
      'Appends a slide with a title and a bulleted body. Each non-blank line of content becomes a bullet; leading tab characters nest it one level deeper per tab.',
    annotations: {
      title: 'Add Content Slide',
      readOnlyHint: false,
      destructiveHint: false,
      openWorldHint: true,
    },
    parameters: PresentationNameParameter.extend({
      title: z.string().describe('Slide title.'),
      content: z
        .string()
        .describe('Body text, one bullet per line. Indent with "\\t" for nested bullets.'),
    }),
    execute: async (args, { log }) => {
      log.info(`Adding content slide to "${args.presentationName}"`);
      try {
        await context.slides.addContentSlide(args.presentationName, args.title, args.content);
        return `Added content slide '${args.title}' to presentation: ${args.presentationName}`;
      } catch (error: unknown) {
        failTool('add content slide', error, log);
      }
    },
  });
}

import { z } from 'zod';
import { PresentationNameParameter } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'addTwoColumnSlide',
    description:
      'Appends a slide with a title and two columns. Each column starts with a bold heading followed by bulleted content.',
    annotations: {
      title: 'Add Two-Column Slide',
      readOnlyHint: false,
      destructiveHint: false,
      openWorldHint: true,
    },
    parameters: PresentationNameParameter.extend({
      title: z.string().describe('Slide title.'),
      leftTitle: z.string().describe('Heading of the left column.'),
      leftContent: z.string().describe('Left column text, one bullet per line.'),
      rightTitle: z.string().describe('Heading of the right column.'),
      rightContent: z.string().describe('Right column text, one bullet per line.'),
    }),
    execute: async (args, { log }) => {
      log.info(`Adding two-column slide to "${args.presentationName}"`);
      try {
        await context.slides.addTwoColumnSlide(
          args.presentationName,
          args.title,
          args.leftTitle,
          args.leftContent,
          args.rightTitle,
          args.rightContent
        );
        return `Added two-column slide '${args.title}' to presentation: ${args.presentationName}`;
      } catch (error: unknown) {
        failTool('add two-column slide', error, log);
      }
    },
  });
}

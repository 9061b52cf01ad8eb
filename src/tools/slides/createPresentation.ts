import { z } from 'zod';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'createPresentation',
    description:
      'Creates a new, empty Google Slides presentation and remembers it under the given name for the rest of the session. Other tools refer to it by that name.',
    annotations: {
      title: 'Create Presentation',
      readOnlyHint: false,
      destructiveHint: false,
      openWorldHint: true,
    },
    parameters: z.object({
      name: z.string().min(1).describe('Title of the new presentation; also its name in this session.'),
    }),
    execute: async (args, { log }) => {
      log.info(`Creating presentation "${args.name}"`);
      try {
        const presentationId = await context.slides.createPresentation(args.name);
        return `Created new presentation: ${args.name} (ID: ${presentationId})`;
      } catch (error: unknown) {
        failTool('create presentation', error, log);
      }
    },
  });
}

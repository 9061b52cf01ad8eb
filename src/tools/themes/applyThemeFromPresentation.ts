import { z } from 'zod';
import { PresentationNameParameter } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'applyThemeFromPresentation',
    description:
      "Copies the theme colors and master background of another presentation onto a presentation created in this session.",
    annotations: {
      title: 'Apply Theme From Presentation',
      readOnlyHint: false,
      destructiveHint: false,
      openWorldHint: true,
    },
    parameters: PresentationNameParameter.extend({
      sourcePresentationId: z.string().min(1).describe('ID of the presentation whose theme is copied.'),
    }),
    execute: async (args, { log }) => {
      log.info(`Applying theme from ${args.sourcePresentationId} to "${args.presentationName}"`);
      try {
        return await context.themes.applyThemeFromPresentation(
          args.presentationName,
          args.sourcePresentationId
        );
      } catch (error: unknown) {
        failTool('apply theme', error, log);
      }
    },
  });
}

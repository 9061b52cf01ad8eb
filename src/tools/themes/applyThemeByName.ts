import { z } from 'zod';
import { PresentationNameParameter } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'applyThemeByName',
    description:
      'Finds a presentation in Google Drive whose name contains the given text and applies its theme. Use listAvailableThemes to see candidates.',
    annotations: {
      title: 'Apply Theme By Name',
      readOnlyHint: false,
      destructiveHint: false,
      openWorldHint: true,
    },
    parameters: PresentationNameParameter.extend({
      themeName: z.string().min(1).describe('Text the theme template name contains.'),
    }),
    execute: async (args, { log }) => {
      log.info(`Applying theme "${args.themeName}" to "${args.presentationName}"`);
      try {
        return await context.themes.applyThemeByName(args.presentationName, args.themeName);
      } catch (error: unknown) {
        failTool('apply theme', error, log);
      }
    },
  });
}

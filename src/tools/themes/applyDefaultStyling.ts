import { PresentationNameParameter } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'applyDefaultStyling',
    description: 'Gives every slide of the presentation a light blue-gray background.',
    annotations: {
      title: 'Apply Default Styling',
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: true,
    },
    parameters: PresentationNameParameter,
    execute: async (args, { log }) => {
      log.info(`Applying default styling to "${args.presentationName}"`);
      try {
        return await context.themes.applyDefaultStyling(args.presentationName);
      } catch (error: unknown) {
        failTool('apply default styling', error, log);
      }
    },
  });
}

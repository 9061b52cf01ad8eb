import { PresentationNameParameter } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'getPresentationUrl',
    description: 'Returns the edit URL of a presentation created in this session.',
    annotations: {
      title: 'Get Presentation URL',
      readOnlyHint: true,
      openWorldHint: false,
    },
    parameters: PresentationNameParameter,
    execute: async (args, { log }) => {
      try {
        return `Presentation URL: ${context.slides.getPresentationUrl(args.presentationName)}`;
      } catch (error: unknown) {
        failTool('get presentation URL', error, log);
      }
    },
  });
}

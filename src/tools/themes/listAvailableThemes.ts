import { z } from 'zod';
import type { ThemeSummary } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';

export function formatThemeList(themes: ThemeSummary[]): string {
  if (themes.length === 0) {
    return 'No theme templates found in Google Drive.';
  }
  const lines = themes.map((theme) => `- ${theme.name} (ID: ${theme.id}) - Modified: ${theme.modified}`);
  return `Available themes:\n${lines.join('\n')}`;
}

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'listAvailableThemes',
    description:
      'Lists presentations in Google Drive whose names contain "theme" or "template", newest first.',
    annotations: {
      title: 'List Available Themes',
      readOnlyHint: true,
      openWorldHint: true,
    },
    parameters: z.object({}),
    execute: async (_args, { log }) => {
      try {
        const themes = await context.themes.listAvailableThemes();
        log.info(`Found ${themes.length} theme templates`);
        return formatThemeList(themes);
      } catch (error: unknown) {
        failTool('list themes', error, log);
      }
    },
  });
}

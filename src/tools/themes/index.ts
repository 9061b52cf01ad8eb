import type { ToolContext, ToolServer } from '../context.js';

import { register as applyThemeFromPresentation } from './applyThemeFromPresentation.js';
import { register as applyThemeByName } from './applyThemeByName.js';
import { register as listAvailableThemes } from './listAvailableThemes.js';
import { register as applyDefaultStyling } from './applyDefaultStyling.js';

export function registerThemeTools(server: ToolServer, context: ToolContext) {
  applyThemeFromPresentation(server, context);
  applyThemeByName(server, context);
  listAvailableThemes(server, context);
  applyDefaultStyling(server, context);
}

import type { ToolContext, ToolServer } from '../context.js';

import { register as createPresentation } from './createPresentation.js';
import { register as getPresentationUrl } from './getPresentationUrl.js';

// Slide layouts
import { register as addTitleSlide } from './addTitleSlide.js';
import { register as addSectionHeader } from './addSectionHeader.js';
import { register as addContentSlide } from './addContentSlide.js';
import { register as addTwoColumnSlide } from './addTwoColumnSlide.js';
import { register as addTableSlide } from './addTableSlide.js';
import { register as addImageSlide } from './addImageSlide.js';

export function registerSlidesTools(server: ToolServer, context: ToolContext) {
  createPresentation(server, context);
  getPresentationUrl(server, context);

  // Slide layouts
  addTitleSlide(server, context);
  addSectionHeader(server, context);
  addContentSlide(server, context);
  addTwoColumnSlide(server, context);
  addTableSlide(server, context);
  addImageSlide(server, context);
}

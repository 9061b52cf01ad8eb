// src/server.ts
import { FastMCP } from 'fastmcp';
import { ChartSlides } from './charts/chartSlides.js';
import { VegaChartRenderer, type ChartRenderer } from './charts/chartRenderer.js';
import { PresentationSession } from './presentation/session.js';
import { SlideBuilder } from './presentation/slideBuilder.js';
import { ThemeManager } from './presentation/themeManager.js';
import { registerChartTools } from './tools/charts/index.js';
import type { ToolContext } from './tools/context.js';
import { registerSlidesTools } from './tools/slides/index.js';
import { registerThemeTools } from './tools/themes/index.js';
import type { GoogleClientsProvider } from './types.js';

export interface CreateServerOptions {
  getClients: GoogleClientsProvider;
  renderer?: ChartRenderer;
}

export function createToolContext(options: CreateServerOptions): ToolContext {
  const session = new PresentationSession();
  const slides = new SlideBuilder({ session, getClients: options.getClients });
  return {
    slides,
    themes: new ThemeManager(session, options.getClients),
    charts: new ChartSlides(slides, options.renderer ?? new VegaChartRenderer()),
  };
}

export function createServer(options: CreateServerOptions): FastMCP {
  const server = new FastMCP({
    name: 'Google Slides',
    version: '1.0.0',
  });
  const context = createToolContext(options);

  registerSlidesTools(server, context);
  registerThemeTools(server, context);
  registerChartTools(server, context);

  return server;
}

import type { FastMCP } from 'fastmcp';
import type { ChartSlides } from '../charts/chartSlides.js';
import type { SlideBuilder } from '../presentation/slideBuilder.js';
import type { ThemeManager } from '../presentation/themeManager.js';

/** Services every tool registration receives; one instance per server. */
export interface ToolContext {
  slides: SlideBuilder;
  themes: ThemeManager;
  charts: ChartSlides;
}

/** The part of the server that tool registrations call. */
export type ToolServer = Pick<FastMCP, 'addTool'>;

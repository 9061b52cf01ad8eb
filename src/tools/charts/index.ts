import type { ToolContext, ToolServer } from '../context.js';

// Charts from caller data
import { register as createBarChart } from './createBarChart.js';
import { register as createLinePlot } from './createLinePlot.js';
import { register as createPieChart } from './createPieChart.js';
import { register as createScatterPlot } from './createScatterPlot.js';
import { register as createHeatmap } from './createHeatmap.js';
import { register as createHistogram } from './createHistogram.js';
import { register as createScatterMatrix } from './createScatterMatrix.js';

// Sample data
import { register as generateSampleData } from './generateSampleData.js';
import { register as createChartFromSampleData } from './createChartFromSampleData.js';

export function registerChartTools(server: ToolServer, context: ToolContext) {
  // Charts from caller data
  createBarChart(server, context);
  createLinePlot(server, context);
  createPieChart(server, context);
  createScatterPlot(server, context);
  createHeatmap(server, context);
  createHistogram(server, context);
  createScatterMatrix(server, context);

  // Sample data
  generateSampleData(server, context);
  createChartFromSampleData(server, context);
}

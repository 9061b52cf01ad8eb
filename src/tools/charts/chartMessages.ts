import type { ChartSlideResult, ChartSlideTarget } from '../../charts/chartSlides.js';

export function chartSlideMessage(result: ChartSlideResult, target: ChartSlideTarget): string {
  return `Added ${result.kind} slide '${target.slideTitle}' to presentation: ${target.presentationName}`;
}

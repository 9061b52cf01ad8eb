// src/text-transformer/contentToSlidesRequests.ts
import {
  buildCreateParagraphBulletsRequest,
  buildInsertTextRequest,
  type BulletPreset,
} from '../googleSlidesApiHelpers.js';
import type { SlidesRequest } from '../types.js';
import { computeBulletRanges, type BulletRange } from './bulletRanges.js';

export interface ContentConversionOptions {
  /**
   * Offset of the content inside the shape's text, when something (a column
   * heading, say) is inserted ahead of it in the same string. Default 0.
   */
  startIndex?: number;
  /** Leave the insertion to the caller and only produce bullet requests. */
  skipInsert?: boolean;
  bulletPreset?: BulletPreset;
}

export interface ContentRequests {
  /** Must be sent, and applied, before `formatRequests`. */
  insertRequests: SlidesRequest[];
  formatRequests: SlidesRequest[];
  ranges: BulletRange[];
}

/**
 * Converts a tab-indented content block into the requests that insert it into
 * a shape and bullet each non-blank line.
 */
export function convertContentToRequests(
  content: string,
  objectId: string,
  options: ContentConversionOptions = {}
): ContentRequests {
  const offset = options.startIndex ?? 0;
  const insertRequests: SlidesRequest[] = [];

  // Empty insertText is rejected by the API.
  if (!options.skipInsert && content.length > 0) {
    insertRequests.push(buildInsertTextRequest(objectId, content));
  }

  if (content.trim().length === 0) {
    return { insertRequests, formatRequests: [], ranges: [] };
  }

  const ranges = computeBulletRanges(content).map((range) => ({
    ...range,
    start: range.start + offset,
    end: range.end + offset,
  }));

  const formatRequests = ranges.map((range) =>
    buildCreateParagraphBulletsRequest(objectId, range.start, range.end, options.bulletPreset)
  );

  return { insertRequests, formatRequests, ranges };
}

export function maxNestingLevel(ranges: BulletRange[]): number {
  return ranges.reduce((max, range) => Math.max(max, range.level), 0);
}

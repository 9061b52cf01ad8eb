// src/googleSlidesApiHelpers.ts
import type { slides_v1 } from 'googleapis';
import { v4 as uuidv4 } from 'uuid';
import { RemoteFailureError, wrapRemoteError } from './types.js';
import type { SlidesApi, SlidesRequest } from './types.js';

export type PredefinedLayout =
  | 'TITLE'
  | 'SECTION_HEADER'
  | 'TITLE_AND_BODY'
  | 'TITLE_AND_TWO_COLUMNS'
  | 'TITLE_ONLY';

export type BulletPreset = 'BULLET_DISC_CIRCLE_SQUARE' | 'NUMBERED_DIGIT_ALPHA_ROMAN';

export interface CellLocation {
  rowIndex: number;
  columnIndex: number;
}

/** Position and size of a page element, all in points. */
export interface ElementBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface RgbColor {
  red: number;
  green: number;
  blue: number;
}

// Only the first twelve theme colors of a master's scheme can be written back.
export const EDITABLE_THEME_COLOR_TYPES: ReadonlySet<string> = new Set([
  'DARK1',
  'LIGHT1',
  'DARK2',
  'LIGHT2',
  'ACCENT1',
  'ACCENT2',
  'ACCENT3',
  'ACCENT4',
  'ACCENT5',
  'ACCENT6',
  'HYPERLINK',
  'FOLLOWED_HYPERLINK',
]);

// --- Object IDs ---

/**
 * Slides object IDs must be 5-50 characters from [A-Za-z0-9_-:] and unique
 * within the presentation.
 */
export function generateObjectId(prefix: string): string {
  return `${prefix}_${uuidv4().replace(/-/g, '').slice(0, 12)}`;
}

// --- Request Builders ---

export function buildInsertTextRequest(
  objectId: string,
  text: string,
  cellLocation?: CellLocation
): SlidesRequest {
  return {
    insertText: {
      objectId,
      text,
      insertionIndex: 0,
      ...(cellLocation ? { cellLocation } : {}),
    },
  };
}

export function buildCreateParagraphBulletsRequest(
  objectId: string,
  startIndex: number,
  endIndex: number,
  bulletPreset: BulletPreset = 'BULLET_DISC_CIRCLE_SQUARE'
): SlidesRequest {
  return {
    createParagraphBullets: {
      objectId,
      textRange: { type: 'FIXED_RANGE', startIndex, endIndex },
      bulletPreset,
    },
  };
}

/**
 * Bold for a whole shape, a table cell, or a fixed range inside a shape.
 */
export function buildBoldTextRequest(
  objectId: string,
  target: { cellLocation?: CellLocation; range?: { startIndex: number; endIndex: number } } = {}
): SlidesRequest {
  const textRange: slides_v1.Schema$Range = target.range
    ? { type: 'FIXED_RANGE', startIndex: target.range.startIndex, endIndex: target.range.endIndex }
    : { type: 'ALL' };

  return {
    updateTextStyle: {
      objectId,
      ...(target.cellLocation ? { cellLocation: target.cellLocation } : {}),
      textRange,
      style: { bold: true },
      fields: 'bold',
    },
  };
}

function buildElementProperties(
  pageObjectId: string,
  box: ElementBox
): slides_v1.Schema$PageElementProperties {
  return {
    pageObjectId,
    size: {
      width: { magnitude: box.width, unit: 'PT' },
      height: { magnitude: box.height, unit: 'PT' },
    },
    transform: {
      scaleX: 1,
      scaleY: 1,
      translateX: box.x,
      translateY: box.y,
      unit: 'PT',
    },
  };
}

export function buildCreateTableRequest(
  objectId: string,
  pageObjectId: string,
  rows: number,
  columns: number,
  box: ElementBox
): SlidesRequest {
  return {
    createTable: {
      objectId,
      elementProperties: buildElementProperties(pageObjectId, box),
      rows,
      columns,
    },
  };
}

export function buildCreateImageRequest(
  objectId: string,
  pageObjectId: string,
  url: string,
  box: ElementBox
): SlidesRequest {
  return {
    createImage: {
      objectId,
      url,
      elementProperties: buildElementProperties(pageObjectId, box),
    },
  };
}

export function buildCreateTextBoxRequest(
  objectId: string,
  pageObjectId: string,
  box: ElementBox
): SlidesRequest {
  return {
    createShape: {
      objectId,
      shapeType: 'TEXT_BOX',
      elementProperties: buildElementProperties(pageObjectId, box),
    },
  };
}

export function buildSolidBackgroundRequest(pageObjectId: string, color: RgbColor): SlidesRequest {
  return {
    updatePageProperties: {
      objectId: pageObjectId,
      pageProperties: {
        pageBackgroundFill: {
          solidFill: { color: { rgbColor: color } },
        },
      },
      fields: 'pageBackgroundFill.solidFill.color',
    },
  };
}

/**
 * Copies a source master's theme onto a target master. Returns null when the
 * source has nothing that can be written back.
 */
export function buildMasterThemeRequest(
  targetMasterId: string,
  sourceProperties: slides_v1.Schema$PageProperties
): SlidesRequest | null {
  const pageProperties: slides_v1.Schema$PageProperties = {};
  const fields: string[] = [];

  const colors = (sourceProperties.colorScheme?.colors ?? []).filter(
    (pair) => typeof pair.type === 'string' && EDITABLE_THEME_COLOR_TYPES.has(pair.type)
  );
  if (colors.length > 0) {
    pageProperties.colorScheme = { colors };
    fields.push('colorScheme');
  }

  const solidFill = sourceProperties.pageBackgroundFill?.solidFill;
  if (solidFill) {
    pageProperties.pageBackgroundFill = { solidFill };
    fields.push('pageBackgroundFill.solidFill');
  }

  if (fields.length === 0) return null;

  return {
    updatePageProperties: {
      objectId: targetMasterId,
      pageProperties,
      fields: fields.join(','),
    },
  };
}

// --- Remote Calls ---

export async function executeBatchUpdate(
  slides: SlidesApi,
  presentationId: string,
  requests: SlidesRequest[]
): Promise<slides_v1.Schema$BatchUpdatePresentationResponse> {
  if (requests.length === 0) return {};
  try {
    const response = await slides.presentations.batchUpdate({
      presentationId,
      requestBody: { requests },
    });
    return response.data;
  } catch (error: unknown) {
    throw wrapRemoteError(`updating presentation ${presentationId}`, error);
  }
}

export async function getPresentation(
  slides: SlidesApi,
  presentationId: string,
  fields?: string
): Promise<slides_v1.Schema$Presentation> {
  try {
    const response = await slides.presentations.get({ presentationId, fields });
    return response.data;
  } catch (error: unknown) {
    throw wrapRemoteError(`reading presentation ${presentationId}`, error);
  }
}

export async function createSlide(
  slides: SlidesApi,
  presentationId: string,
  objectId: string,
  layout: PredefinedLayout
): Promise<string> {
  const response = await executeBatchUpdate(slides, presentationId, [
    {
      createSlide: {
        objectId,
        slideLayoutReference: { predefinedLayout: layout },
      },
    },
  ]);
  return response.replies?.[0]?.createSlide?.objectId ?? objectId;
}

export interface SlidePlaceholders {
  title?: string;
  subtitle?: string;
  /** BODY placeholders in page order. */
  bodies: string[];
}

export async function getSlidePlaceholders(
  slides: SlidesApi,
  presentationId: string,
  slideId: string
): Promise<SlidePlaceholders> {
  let page: slides_v1.Schema$Page;
  try {
    const response = await slides.presentations.pages.get({
      presentationId,
      pageObjectId: slideId,
    });
    page = response.data;
  } catch (error: unknown) {
    throw wrapRemoteError(`reading slide ${slideId}`, error);
  }

  const placeholders: SlidePlaceholders = { bodies: [] };
  for (const element of page.pageElements ?? []) {
    const objectId = element.objectId;
    if (!objectId) continue;

    switch (element.shape?.placeholder?.type) {
      case 'TITLE':
      case 'CENTERED_TITLE':
        placeholders.title ??= objectId;
        break;
      case 'SUBTITLE':
        placeholders.subtitle ??= objectId;
        break;
      case 'BODY':
        placeholders.bodies.push(objectId);
        break;
      default:
        break;
    }
  }
  return placeholders;
}

export function requirePresentationId(presentation: slides_v1.Schema$Presentation): string {
  if (!presentation.presentationId) {
    throw new RemoteFailureError(
      'Google API error while creating presentation: response had no presentation ID',
      'missing presentationId'
    );
  }
  return presentation.presentationId;
}

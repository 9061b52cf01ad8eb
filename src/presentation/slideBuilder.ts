// src/presentation/slideBuilder.ts
import {
  buildBoldTextRequest,
  buildCreateImageRequest,
  buildCreateTableRequest,
  buildCreateTextBoxRequest,
  buildInsertTextRequest,
  createSlide,
  executeBatchUpdate,
  generateObjectId,
  getSlidePlaceholders,
  requirePresentationId,
  type ElementBox,
} from '../googleSlidesApiHelpers.js';
import { convertContentToRequests } from '../text-transformer/contentToSlidesRequests.js';
import { InvalidInputError, wrapRemoteError } from '../types.js';
import type { GoogleClientsProvider, SlideResult, SlidesRequest } from '../types.js';
import { imageFileName, uploadPublicImage } from './imageStore.js';
import type { PresentationSession } from './session.js';

const TABLE_BOX: ElementBox = { x: 100, y: 100, width: 400, height: 300 };
const IMAGE_BOX: ElementBox = { x: 100, y: 150, width: 400, height: 300 };
const CAPTION_BOX: ElementBox = { x: 100, y: 470, width: 400, height: 50 };

export type TableCellValue = string | number | boolean | null;

export type ImageSource = { url: string } | { data: Buffer; mimeType?: string };

export interface SlideBuilderOptions {
  session: PresentationSession;
  getClients: GoogleClientsProvider;
  /** Object ID factory; tests pin it for predictable requests. */
  createObjectId?: (prefix: string) => string;
}

export function presentationUrl(presentationId: string): string {
  return `https://docs.google.com/presentation/d/${presentationId}/edit`;
}

export function validateTable(headers: string[], rows: TableCellValue[][]): void {
  if (headers.length === 0) {
    throw new InvalidInputError('Table headers are required');
  }
  if (rows.length === 0) {
    throw new InvalidInputError('Table rows are required');
  }
  const badRow = rows.findIndex((row) => row.length !== headers.length);
  if (badRow !== -1) {
    throw new InvalidInputError(
      `All rows must have the same number of columns as headers (row ${badRow + 1} has ${rows[badRow].length}, expected ${headers.length})`
    );
  }
}

function cellText(value: TableCellValue): string {
  return value === null ? '' : String(value);
}

/**
 * Adds slides to presentations created in this session. Each method runs its
 * remote calls one after another; later batches address objects and text
 * offsets that earlier batches created.
 */
export class SlideBuilder {
  private readonly session: PresentationSession;
  private readonly getClients: GoogleClientsProvider;
  private readonly createObjectId: (prefix: string) => string;

  constructor(options: SlideBuilderOptions) {
    this.session = options.session;
    this.getClients = options.getClients;
    this.createObjectId = options.createObjectId ?? generateObjectId;
  }

  async createPresentation(name: string): Promise<string> {
    this.session.assertAvailable(name);
    const { slides } = await this.getClients();

    let presentationId: string;
    try {
      const response = await slides.presentations.create({ requestBody: { title: name } });
      presentationId = requirePresentationId(response.data);
    } catch (error: unknown) {
      throw wrapRemoteError(`creating presentation '${name}'`, error);
    }

    this.session.register(name, presentationId);
    return presentationId;
  }

  /** Resolves a presentation name without touching the API. */
  requirePresentation(name: string): string {
    return this.session.resolve(name);
  }

  getPresentationUrl(name: string): string {
    return presentationUrl(this.session.resolve(name));
  }

  async addTitleSlide(name: string, title: string, subtitle = ''): Promise<SlideResult> {
    const presentationId = this.session.resolve(name);
    const { slides } = await this.getClients();

    const slideId = await createSlide(slides, presentationId, this.createObjectId('title'), 'TITLE');
    const placeholders = await getSlidePlaceholders(slides, presentationId, slideId);

    const requests: SlidesRequest[] = [];
    if (placeholders.title && title) {
      requests.push(buildInsertTextRequest(placeholders.title, title));
    }
    if (placeholders.subtitle && subtitle) {
      requests.push(buildInsertTextRequest(placeholders.subtitle, subtitle));
    }
    await executeBatchUpdate(slides, presentationId, requests);

    return { presentationId, slideId };
  }

  async addSectionHeaderSlide(name: string, header: string, subtitle = ''): Promise<SlideResult> {
    const presentationId = this.session.resolve(name);
    const { slides } = await this.getClients();

    const slideId = await createSlide(
      slides,
      presentationId,
      this.createObjectId('section'),
      'SECTION_HEADER'
    );
    const placeholders = await getSlidePlaceholders(slides, presentationId, slideId);

    const requests: SlidesRequest[] = [];
    if (placeholders.title && header) {
      requests.push(buildInsertTextRequest(placeholders.title, header));
    }
    const body = placeholders.bodies[0];
    if (body && subtitle) {
      requests.push(buildInsertTextRequest(body, subtitle));
    }
    await executeBatchUpdate(slides, presentationId, requests);

    return { presentationId, slideId };
  }

  async addContentSlide(name: string, title: string, content: string): Promise<SlideResult> {
    const presentationId = this.session.resolve(name);
    const { slides } = await this.getClients();

    const slideId = await createSlide(
      slides,
      presentationId,
      this.createObjectId('content'),
      'TITLE_AND_BODY'
    );
    const placeholders = await getSlidePlaceholders(slides, presentationId, slideId);

    const textRequests: SlidesRequest[] = [];
    const bulletRequests: SlidesRequest[] = [];
    if (placeholders.title && title) {
      textRequests.push(buildInsertTextRequest(placeholders.title, title));
    }
    const body = placeholders.bodies[0];
    if (body) {
      const converted = convertContentToRequests(content, body);
      textRequests.push(...converted.insertRequests);
      bulletRequests.push(...converted.formatRequests);
    }

    // Bullet ranges are offsets into text the first batch inserts.
    await executeBatchUpdate(slides, presentationId, textRequests);
    await executeBatchUpdate(slides, presentationId, bulletRequests);

    return { presentationId, slideId };
  }

  async addTwoColumnSlide(
    name: string,
    title: string,
    leftTitle: string,
    leftContent: string,
    rightTitle: string,
    rightContent: string
  ): Promise<SlideResult> {
    const presentationId = this.session.resolve(name);
    const { slides } = await this.getClients();

    const slideId = await createSlide(
      slides,
      presentationId,
      this.createObjectId('twocol'),
      'TITLE_AND_TWO_COLUMNS'
    );
    const placeholders = await getSlidePlaceholders(slides, presentationId, slideId);

    const textRequests: SlidesRequest[] = [];
    const formatRequests: SlidesRequest[] = [];
    if (placeholders.title && title) {
      textRequests.push(buildInsertTextRequest(placeholders.title, title));
    }

    const columns: Array<[string | undefined, string, string]> = [
      [placeholders.bodies[0], leftTitle, leftContent],
      [placeholders.bodies[1], rightTitle, rightContent],
    ];
    for (const [objectId, heading, content] of columns) {
      if (!objectId) continue;
      textRequests.push(buildInsertTextRequest(objectId, `${heading}\n${content}`));
      if (heading.length > 0) {
        formatRequests.push(
          buildBoldTextRequest(objectId, { range: { startIndex: 0, endIndex: heading.length } })
        );
      }
      const converted = convertContentToRequests(content, objectId, {
        startIndex: heading.length + 1,
        skipInsert: true,
      });
      formatRequests.push(...converted.formatRequests);
    }

    await executeBatchUpdate(slides, presentationId, textRequests);
    await executeBatchUpdate(slides, presentationId, formatRequests);

    return { presentationId, slideId };
  }

  async addTableSlide(
    name: string,
    title: string,
    headers: string[],
    rows: TableCellValue[][]
  ): Promise<SlideResult> {
    validateTable(headers, rows);
    const presentationId = this.session.resolve(name);
    const { slides } = await this.getClients();

    const slideId = await createSlide(slides, presentationId, this.createObjectId('table'), 'TITLE_ONLY');
    await this.insertTitle(presentationId, slideId, title);

    const tableId = this.createObjectId('tbl');
    await executeBatchUpdate(slides, presentationId, [
      buildCreateTableRequest(tableId, slideId, rows.length + 1, headers.length, TABLE_BOX),
    ]);

    const headerRequests: SlidesRequest[] = [];
    headers.forEach((header, columnIndex) => {
      if (header.length === 0) return;
      const cellLocation = { rowIndex: 0, columnIndex };
      headerRequests.push(buildInsertTextRequest(tableId, header, cellLocation));
      headerRequests.push(buildBoldTextRequest(tableId, { cellLocation }));
    });
    await executeBatchUpdate(slides, presentationId, headerRequests);

    const dataRequests: SlidesRequest[] = [];
    rows.forEach((row, rowIndex) => {
      row.forEach((value, columnIndex) => {
        const text = cellText(value);
        if (text.length === 0) return;
        dataRequests.push(
          buildInsertTextRequest(tableId, text, { rowIndex: rowIndex + 1, columnIndex })
        );
      });
    });
    await executeBatchUpdate(slides, presentationId, dataRequests);

    return { presentationId, slideId };
  }

  async addImageSlide(
    name: string,
    title: string,
    image: ImageSource,
    caption = ''
  ): Promise<SlideResult> {
    const presentationId = this.session.resolve(name);
    const { slides, drive } = await this.getClients();

    let imageUrl: string;
    if ('url' in image) {
      imageUrl = image.url;
    } else {
      const mimeType = image.mimeType ?? 'image/png';
      const stored = await uploadPublicImage(drive, image.data, imageFileName(title, mimeType), mimeType);
      imageUrl = stored.url;
    }

    const slideId = await createSlide(slides, presentationId, this.createObjectId('img'), 'TITLE_ONLY');
    await this.insertTitle(presentationId, slideId, title);

    await executeBatchUpdate(slides, presentationId, [
      buildCreateImageRequest(this.createObjectId('image'), slideId, imageUrl, IMAGE_BOX),
    ]);

    if (caption) {
      const captionId = this.createObjectId('caption');
      await executeBatchUpdate(slides, presentationId, [
        buildCreateTextBoxRequest(captionId, slideId, CAPTION_BOX),
        buildInsertTextRequest(captionId, caption),
      ]);
    }

    return { presentationId, slideId };
  }

  private async insertTitle(presentationId: string, slideId: string, title: string): Promise<void> {
    const { slides } = await this.getClients();
    const placeholders = await getSlidePlaceholders(slides, presentationId, slideId);
    if (placeholders.title && title) {
      await executeBatchUpdate(slides, presentationId, [
        buildInsertTextRequest(placeholders.title, title),
      ]);
    }
  }
}

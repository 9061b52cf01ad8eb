// In-process stand-ins for the Slides and Drive clients used by the tests.
import type { drive_v3, slides_v1 } from 'googleapis';
import type { DriveApi, GoogleClientsProvider, SlidesApi, SlidesRequest } from '../types.js';

export interface RecordedBatch {
  presentationId: string;
  requests: SlidesRequest[];
}

type Placeholder = 'CENTERED_TITLE' | 'TITLE' | 'SUBTITLE' | 'BODY';

// Placeholder shapes each predefined layout gets, suffixed onto the slide ID.
const LAYOUT_PLACEHOLDERS: Record<string, Array<[string, Placeholder]>> = {
  TITLE: [
    ['title', 'CENTERED_TITLE'],
    ['subtitle', 'SUBTITLE'],
  ],
  SECTION_HEADER: [
    ['title', 'TITLE'],
    ['body0', 'BODY'],
  ],
  TITLE_AND_BODY: [
    ['title', 'TITLE'],
    ['body0', 'BODY'],
  ],
  TITLE_AND_TWO_COLUMNS: [
    ['title', 'TITLE'],
    ['body0', 'BODY'],
    ['body1', 'BODY'],
  ],
  TITLE_ONLY: [['title', 'TITLE']],
};

function apiError(message: string, code: number): Error {
  return Object.assign(new Error(message), { code });
}

export class FakeSlidesApi implements SlidesApi {
  readonly batches: RecordedBatch[] = [];
  readonly createdTitles: string[] = [];
  readonly reads: Array<{ presentationId: string; fields?: string }> = [];
  /** Documents returned by presentations.get, keyed by presentation ID. */
  readonly documents = new Map<string, slides_v1.Schema$Presentation>();
  /** Page elements returned by pages.get, keyed by slide ID. */
  readonly pageElements = new Map<string, slides_v1.Schema$PageElement[]>();
  nextPresentationId = 'pres-1';
  batchError: unknown = null;

  readonly presentations: SlidesApi['presentations'] = {
    create: async ({ requestBody }) => {
      this.createdTitles.push(requestBody.title ?? '');
      return { data: { presentationId: this.nextPresentationId, title: requestBody.title } };
    },
    get: async ({ presentationId, fields }) => {
      this.reads.push({ presentationId, fields });
      const data = this.documents.get(presentationId);
      if (!data) throw apiError('Requested entity was not found.', 404);
      return { data };
    },
    batchUpdate: async ({ presentationId, requestBody }) => {
      if (this.batchError !== null) throw this.batchError;
      const requests = requestBody.requests ?? [];
      this.batches.push({ presentationId, requests });
      const replies = requests.map((request) => this.apply(request));
      return { data: { presentationId, replies } };
    },
    pages: {
      get: async ({ pageObjectId }) => ({
        data: { objectId: pageObjectId, pageElements: this.pageElements.get(pageObjectId) ?? [] },
      }),
    },
  };

  /** Every request sent, in order, across all batches. */
  get allRequests(): SlidesRequest[] {
    return this.batches.flatMap((batch) => batch.requests);
  }

  private apply(request: SlidesRequest): slides_v1.Schema$Response {
    const createSlide = request.createSlide;
    if (!createSlide?.objectId) return {};

    const layout = createSlide.slideLayoutReference?.predefinedLayout ?? '';
    const slideId = createSlide.objectId;
    this.pageElements.set(
      slideId,
      (LAYOUT_PLACEHOLDERS[layout] ?? []).map(([suffix, type]) => ({
        objectId: `${slideId}_${suffix}`,
        shape: { placeholder: { type } },
      }))
    );
    return { createSlide: { objectId: slideId } };
  }
}

export interface RecordedUpload {
  name: string;
  mimeType: string;
}

export class FakeDriveApi implements DriveApi {
  readonly uploads: RecordedUpload[] = [];
  readonly grants: Array<{ fileId: string; type: string; role: string }> = [];
  readonly queries: Array<{ q: string; fields?: string; orderBy?: string }> = [];
  listedFiles: drive_v3.Schema$File[] = [];
  /** IDs handed out by files.create; null simulates a response without one. */
  nextFileId: string | null = 'file-1';

  readonly files: DriveApi['files'] = {
    create: async ({ requestBody, media }) => {
      this.uploads.push({ name: requestBody.name ?? '', mimeType: media.mimeType });
      return { data: { id: this.nextFileId } };
    },
    list: async (params) => {
      this.queries.push(params);
      return { data: { files: this.listedFiles } };
    },
  };

  readonly permissions: DriveApi['permissions'] = {
    create: async ({ fileId, requestBody }) => {
      this.grants.push({ fileId, type: requestBody.type ?? '', role: requestBody.role ?? '' });
      return { data: { id: 'perm-1' } };
    },
  };
}

export interface FakeClients {
  slides: FakeSlidesApi;
  drive: FakeDriveApi;
  getClients: GoogleClientsProvider;
}

export function createFakeClients(): FakeClients {
  const slides = new FakeSlidesApi();
  const drive = new FakeDriveApi();
  return { slides, drive, getClients: async () => ({ slides, drive }) };
}

/** Object ID factory yielding `<prefix>_1`, `<prefix>_2`, ... in call order. */
export function sequentialIds(): (prefix: string) => string {
  let count = 0;
  return (prefix) => `${prefix}_${++count}`;
}

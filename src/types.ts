// src/types.ts
import type { Readable } from 'node:stream';
import type { drive_v3, slides_v1 } from 'googleapis';
import { z } from 'zod';

// --- Errors ---

export type SlidesErrorKind = 'NotFound' | 'InvalidInput' | 'RemoteFailure';

export abstract class SlidesError extends Error {
  abstract readonly kind: SlidesErrorKind;
}

export class NotFoundError extends SlidesError {
  readonly kind = 'NotFound' as const;

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class InvalidInputError extends SlidesError {
  readonly kind = 'InvalidInput' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export class RemoteFailureError extends SlidesError {
  readonly kind = 'RemoteFailure' as const;

  constructor(
    message: string,
    public readonly detail: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'RemoteFailureError';
  }
}

export function isSlidesError(value: unknown): value is SlidesError {
  return value instanceof SlidesError;
}

interface GoogleApiErrorShape {
  message: string;
  code?: number | string;
  status?: number;
}

function isGoogleApiErrorShape(value: unknown): value is GoogleApiErrorShape {
  return (
    typeof value === 'object' &&
    value !== null &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

/**
 * Re-wraps anything thrown by a Google client call as a `RemoteFailureError`.
 * Errors that are already classified pass through untouched.
 */
export function wrapRemoteError(action: string, error: unknown): SlidesError {
  if (isSlidesError(error)) return error;

  let detail = String(error);
  let status: number | undefined;
  if (isGoogleApiErrorShape(error)) {
    detail = error.message;
    if (typeof error.status === 'number') status = error.status;
    else if (typeof error.code === 'number') status = error.code;
  }
  return new RemoteFailureError(`Google API error while ${action}: ${detail}`, detail, status);
}

// --- Google client surfaces ---
// Only the calls this server makes. googleapis' slides_v1.Slides and
// drive_v3.Drive satisfy these structurally; tests pass in-process fakes.

export interface ApiResponse<T> {
  data: T;
}

export interface SlidesApi {
  presentations: {
    create(params: {
      requestBody: slides_v1.Schema$Presentation;
    }): Promise<ApiResponse<slides_v1.Schema$Presentation>>;
    get(params: {
      presentationId: string;
      fields?: string;
    }): Promise<ApiResponse<slides_v1.Schema$Presentation>>;
    batchUpdate(params: {
      presentationId: string;
      requestBody: slides_v1.Schema$BatchUpdatePresentationRequest;
    }): Promise<ApiResponse<slides_v1.Schema$BatchUpdatePresentationResponse>>;
    pages: {
      get(params: {
        presentationId: string;
        pageObjectId: string;
      }): Promise<ApiResponse<slides_v1.Schema$Page>>;
    };
  };
}

export interface DriveApi {
  files: {
    create(params: {
      requestBody: drive_v3.Schema$File;
      media: { mimeType: string; body: Readable };
      fields?: string;
    }): Promise<ApiResponse<drive_v3.Schema$File>>;
    list(params: {
      q: string;
      fields?: string;
      orderBy?: string;
    }): Promise<ApiResponse<drive_v3.Schema$FileList>>;
  };
  permissions: {
    create(params: {
      fileId: string;
      requestBody: drive_v3.Schema$Permission;
    }): Promise<ApiResponse<drive_v3.Schema$Permission>>;
  };
}

export interface GoogleClients {
  slides: SlidesApi;
  drive: DriveApi;
}

export type GoogleClientsProvider = () => Promise<GoogleClients>;

// --- Shared domain types ---

export type SlidesRequest = slides_v1.Schema$Request;

export interface SlideResult {
  presentationId: string;
  slideId: string;
}

export interface ThemeSummary {
  id: string;
  name: string;
  modified: string;
}

// --- Tool parameter schemas ---

export const PresentationNameParameter = z.object({
  presentationName: z.string().min(1).describe('Name the presentation was created with.'),
});

export const ChartSizeParameters = z.object({
  width: z.number().int().positive().optional().describe('Width of the chart in pixels.'),
  height: z.number().int().positive().optional().describe('Height of the chart in pixels.'),
});

export const ChartSlideParameters = PresentationNameParameter.extend({
  slideTitle: z.string().describe('Title of the slide that will hold the chart.'),
}).merge(ChartSizeParameters);

export const SampleDataTypeSchema = z.enum(['sine_wave', 'categories', 'linear', 'normal']);
export type SampleDataType = z.infer<typeof SampleDataTypeSchema>;

export const SampleChartTypeSchema = z.enum(['line', 'scatter', 'bar', 'pie', 'histogram']);
export type SampleChartType = z.infer<typeof SampleChartTypeSchema>;

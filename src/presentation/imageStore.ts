import { Readable } from 'node:stream';
import { RemoteFailureError, wrapRemoteError } from '../types.js';
import type { DriveApi } from '../types.js';

export interface StoredImage {
  fileId: string;
  /** Public URL the Slides API fetches the image from. */
  url: string;
}

export function driveImageUrl(fileId: string): string {
  return `https://drive.google.com/uc?id=${fileId}`;
}

/**
 * Uploads image bytes to Drive and shares them with anyone holding the link,
 * which createImage needs in order to fetch them.
 */
export async function uploadPublicImage(
  drive: DriveApi,
  data: Buffer,
  fileName: string,
  mimeType = 'image/png'
): Promise<StoredImage> {
  let fileId: string | null | undefined;
  try {
    const upload = await drive.files.create({
      requestBody: { name: fileName, mimeType },
      media: { mimeType, body: Readable.from(data) },
      fields: 'id',
    });
    fileId = upload.data.id;
  } catch (error: unknown) {
    throw wrapRemoteError(`uploading image ${fileName}`, error);
  }

  if (!fileId) {
    throw new RemoteFailureError(
      `Google API error while uploading image ${fileName}: no file ID returned`,
      'missing file id'
    );
  }

  try {
    await drive.permissions.create({
      fileId,
      requestBody: { type: 'anyone', role: 'reader' },
    });
  } catch (error: unknown) {
    throw wrapRemoteError(`sharing image ${fileName}`, error);
  }

  return { fileId, url: driveImageUrl(fileId) };
}

const EXTENSIONS: Record<string, string> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/gif': 'gif',
};

export function imageFileName(title: string, mimeType = 'image/png'): string {
  const extension = EXTENSIONS[mimeType] ?? 'png';
  return `img_${title.replace(/ /g, '_').slice(0, 20)}.${extension}`;
}

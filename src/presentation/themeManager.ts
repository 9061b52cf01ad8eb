// src/presentation/themeManager.ts
import {
  buildMasterThemeRequest,
  buildSolidBackgroundRequest,
  executeBatchUpdate,
  getPresentation,
  type RgbColor,
} from '../googleSlidesApiHelpers.js';
import { NotFoundError, wrapRemoteError } from '../types.js';
import type { DriveApi, GoogleClientsProvider, SlidesRequest, ThemeSummary } from '../types.js';
import type { PresentationSession } from './session.js';

const PRESENTATION_MIME_TYPE = 'application/vnd.google-apps.presentation';

export const DEFAULT_BACKGROUND: RgbColor = { red: 0.97, green: 0.98, blue: 1.0 };

/** Escapes a value for use inside a single-quoted Drive query string. */
export function escapeDriveQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export class ThemeManager {
  constructor(
    private readonly session: PresentationSession,
    private readonly getClients: GoogleClientsProvider
  ) {}

  /**
   * Copies the color scheme and solid background of the source's first master
   * onto every master of the target presentation.
   */
  async applyThemeFromPresentation(name: string, sourcePresentationId: string): Promise<string> {
    const presentationId = this.session.resolve(name);
    const { slides } = await this.getClients();

    const source = await getPresentation(slides, sourcePresentationId, 'masters');
    const sourceMaster = source.masters?.[0];
    if (!sourceMaster) {
      throw new NotFoundError('Source presentation has no masters');
    }

    const target = await getPresentation(slides, presentationId, 'masters(objectId)');
    const requests: SlidesRequest[] = [];
    for (const master of target.masters ?? []) {
      if (!master.objectId) continue;
      const request = buildMasterThemeRequest(master.objectId, sourceMaster.pageProperties ?? {});
      if (request) requests.push(request);
    }
    await executeBatchUpdate(slides, presentationId, requests);

    return `Applied theme from ${sourcePresentationId} to ${name}`;
  }

  async applyThemeByName(name: string, themeName: string): Promise<string> {
    this.session.resolve(name);
    const { drive } = await this.getClients();

    const files = await this.searchPresentations(
      drive,
      `name contains '${escapeDriveQueryValue(themeName)}' and mimeType='${PRESENTATION_MIME_TYPE}'`,
      `searching for theme '${themeName}'`
    );
    const match = files[0];
    if (!match) {
      throw new NotFoundError(`No theme template found with name containing '${themeName}'`);
    }

    await this.applyThemeFromPresentation(name, match.id);
    return `Applied theme '${match.name}' to ${name}`;
  }

  async listAvailableThemes(): Promise<ThemeSummary[]> {
    const { drive } = await this.getClients();
    const files = await this.searchPresentations(
      drive,
      `mimeType='${PRESENTATION_MIME_TYPE}' and (name contains 'theme' or name contains 'template')`,
      'listing themes',
      'modifiedTime desc'
    );
    return files.map((file) => ({
      id: file.id,
      name: file.name,
      modified: file.modifiedTime ?? 'Unknown',
    }));
  }

  async applyDefaultStyling(name: string, background: RgbColor = DEFAULT_BACKGROUND): Promise<string> {
    const presentationId = this.session.resolve(name);
    const { slides } = await this.getClients();

    const presentation = await getPresentation(slides, presentationId, 'slides(objectId)');
    const requests: SlidesRequest[] = [];
    for (const slide of presentation.slides ?? []) {
      if (slide.objectId) {
        requests.push(buildSolidBackgroundRequest(slide.objectId, background));
      }
    }
    await executeBatchUpdate(slides, presentationId, requests);

    return `Applied default styling to ${name}`;
  }

  private async searchPresentations(
    drive: DriveApi,
    q: string,
    action: string,
    orderBy?: string
  ): Promise<Array<{ id: string; name: string; modifiedTime?: string }>> {
    try {
      const response = await drive.files.list({
        q,
        fields: 'files(id, name, modifiedTime)',
        ...(orderBy ? { orderBy } : {}),
      });
      const found: Array<{ id: string; name: string; modifiedTime?: string }> = [];
      for (const file of response.data.files ?? []) {
        if (!file.id) continue;
        found.push({
          id: file.id,
          name: file.name ?? file.id,
          ...(file.modifiedTime ? { modifiedTime: file.modifiedTime } : {}),
        });
      }
      return found;
    } catch (error: unknown) {
      throw wrapRemoteError(action, error);
    }
  }
}

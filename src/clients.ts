// src/clients.ts
import { google } from 'googleapis';
import { authorize } from './auth.js';
import { logger } from './logger.js';
import { wrapRemoteError } from './types.js';
import type { GoogleClients, GoogleClientsProvider } from './types.js';

/**
 * Returns a provider that authorizes on first use and reuses the clients
 * afterwards. A failed authorization is not cached, so the next tool call
 * tries again.
 */
export function createGoogleClientsProvider(tokenPath: string): GoogleClientsProvider {
  let pending: Promise<GoogleClients> | null = null;

  async function initialize(): Promise<GoogleClients> {
    logger.info('Attempting to authorize Google API client...');
    const auth = await authorize(tokenPath);
    logger.info('Google API client authorized successfully.');
    return {
      slides: google.slides({ version: 'v1', auth }),
      drive: google.drive({ version: 'v3', auth }),
    };
  }

  return () => {
    if (!pending) {
      pending = initialize().catch((error: unknown) => {
        pending = null;
        logger.error('Failed to initialize Google API client', error);
        throw wrapRemoteError('authorizing the Google API client', error);
      });
    }
    return pending;
  };
}

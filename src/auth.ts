// src/auth.ts
import * as fs from 'node:fs/promises';
import { OAuth2Client, type Credentials } from 'google-auth-library';
import { z } from 'zod';
import { logger } from './logger.js';

export const SCOPES = [
  'https://www.googleapis.com/auth/presentations',
  'https://www.googleapis.com/auth/drive',
];

// Accepts both the `authorized_user` JSON google-auth-library writes and the
// credentials JSON other OAuth clients save (access token under `token`).
const TokenFileSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().min(1),
  token: z.string().optional(),
  access_token: z.string().optional(),
  expiry: z.string().optional(),
  expiry_date: z.number().optional(),
  type: z.string().optional(),
});

export type TokenFile = z.infer<typeof TokenFileSchema>;

export function parseTokenFile(raw: string, tokenPath: string): TokenFile {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error: unknown) {
    throw new Error(
      `Token file at ${tokenPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  const parsed = TokenFileSchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Token file at ${tokenPath} is missing required fields: ${fields}`);
  }
  return parsed.data;
}

export function toCredentials(token: TokenFile): Credentials {
  const expiryDate = token.expiry_date ?? (token.expiry ? Date.parse(token.expiry) : undefined);
  return {
    refresh_token: token.refresh_token,
    access_token: token.access_token ?? token.token ?? null,
    expiry_date: expiryDate !== undefined && Number.isFinite(expiryDate) ? expiryDate : null,
    scope: SCOPES.join(' '),
  };
}

async function saveRefreshedToken(tokenPath: string, token: TokenFile, update: Credentials): Promise<void> {
  const next: TokenFile = {
    ...token,
    refresh_token: update.refresh_token ?? token.refresh_token,
    ...(update.access_token ? { token: update.access_token, access_token: update.access_token } : {}),
    ...(update.expiry_date ? { expiry_date: update.expiry_date, expiry: new Date(update.expiry_date).toISOString() } : {}),
  };
  await fs.writeFile(tokenPath, JSON.stringify(next, null, 2));
}

/**
 * Loads saved user credentials and returns an OAuth2 client. Tokens the
 * client refreshes are written back to the same file.
 */
export async function authorize(tokenPath: string): Promise<OAuth2Client> {
  let raw: string;
  try {
    raw = await fs.readFile(tokenPath, 'utf8');
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(`Token file not found at ${tokenPath}`);
    }
    throw new Error(
      `Could not read token file at ${tokenPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const token = parseTokenFile(raw, tokenPath);
  const client = new OAuth2Client(token.client_id, token.client_secret);
  client.setCredentials(toCredentials(token));

  client.on('tokens', (update: Credentials) => {
    saveRefreshedToken(tokenPath, token, update).then(
      () => logger.debug(`Saved refreshed token to ${tokenPath}`),
      (error: unknown) => logger.warn(`Could not save refreshed token to ${tokenPath}`, error)
    );
  });

  return client;
}

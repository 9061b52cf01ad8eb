import * as os from 'node:os';
import { describe, expect, it } from 'vitest';
import { SCOPES, authorize, parseTokenFile, toCredentials } from './auth.js';

const token = {
  client_id: 'test-client-id',
  client_secret: 'test-secret',
  refresh_token: 'test-refresh',
};

describe('parseTokenFile', () => {
  it('accepts a saved authorized-user token', () => {
    expect(parseTokenFile(JSON.stringify({ ...token, type: 'authorized_user' }), 'token.json')).toEqual({
      ...token,
      type: 'authorized_user',
    });
  });

  it('rejects malformed JSON', () => {
    expect(() => parseTokenFile('{nope', 'token.json')).toThrow(
      /^Token file at token\.json is not valid JSON: /
    );
  });

  it('names the missing fields', () => {
    expect(() =>
      parseTokenFile(JSON.stringify({ client_id: 'x', client_secret: 'y' }), 'token.json')
    ).toThrow('Token file at token.json is missing required fields: refresh_token');
  });
});

describe('toCredentials', () => {
  it('maps access tokens and expiry onto OAuth2 credentials', () => {
    expect(toCredentials({ ...token, token: 'test-access', expiry: '2024-01-01T00:00:00Z' })).toEqual({
      refresh_token: 'test-refresh',
      access_token: 'test-access',
      expiry_date: 1704067200000,
      scope: SCOPES.join(' '),
    });
  });

  it('leaves unknown values null', () => {
    expect(toCredentials(token)).toMatchObject({ access_token: null, expiry_date: null });
  });
});

describe('authorize', () => {
  it('reports a missing token file', async () => {
    await expect(authorize('/nonexistent/dir/token.json')).rejects.toThrow(
      'Token file not found at /nonexistent/dir/token.json'
    );
  });

  it('passes other read failures through', async () => {
    const dir = os.tmpdir();
    await expect(authorize(dir)).rejects.toThrow(`Could not read token file at ${dir}: EISDIR`);
  });
});

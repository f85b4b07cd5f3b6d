// ============================================================================
// Tests: Delegated Credential Exchange
// ============================================================================
//
// fetch is stubbed; the ambient credential is a fake. Covers the claim set,
// the signJwt and token requests, and how each failure is reported.

import { describe, test, expect, vi, beforeEach } from 'vitest';
import { CredentialError } from '../../errors.js';
import { CredentialExchanger, TOKEN_ENDPOINT, buildAssertionClaims } from '../credentials.js';
import type { DelegatedIdentity } from '../types.js';

const NOW = new Date('2026-03-02T10:00:00Z');
const IAT = Math.floor(NOW.getTime() / 1000);

const identity: DelegatedIdentity = {
  serviceAccountEmail: 'mailer@project.iam.gserviceaccount.com',
  impersonatedUser: 'rep@example.org',
  scopes: ['https://mail.google.com/', 'https://www.googleapis.com/auth/gmail.settings.basic'],
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('buildAssertionClaims', () => {
  test('builds the delegation claim set', () => {
    expect(buildAssertionClaims(identity, NOW)).toEqual({
      iss: 'mailer@project.iam.gserviceaccount.com',
      sub: 'rep@example.org',
      scope: 'https://mail.google.com/ https://www.googleapis.com/auth/gmail.settings.basic',
      aud: TOKEN_ENDPOINT,
      iat: IAT,
      exp: IAT + 3600,
    });
  });
});

describe('CredentialExchanger', () => {
  const fetchMock = vi.fn<typeof fetch>();
  const ambient = { getAccessToken: vi.fn(async () => 'ambient-token') };
  let exchanger: CredentialExchanger;

  beforeEach(() => {
    fetchMock.mockReset();
    ambient.getAccessToken.mockClear();
    vi.stubGlobal('fetch', fetchMock);
    exchanger = new CredentialExchanger({ ambient, now: () => NOW });
  });

  test('signs the claims then exchanges the assertion', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ keyId: 'k1', signedJwt: 'signed.jwt' }))
      .mockResolvedValueOnce(jsonResponse({ access_token: 'user-token', expires_in: 1800 }));

    const token = await exchanger.acquireDelegatedToken(identity);

    expect(token).toEqual({
      value: 'user-token',
      expiresAt: new Date(NOW.getTime() + 1800 * 1000),
    });

    const [signUrl, signInit] = fetchMock.mock.calls[0];
    expect(signUrl).toBe(
      'https://iamcredentials.googleapis.com/v1/projects/-/serviceAccounts/mailer%40project.iam.gserviceaccount.com:signJwt',
    );
    expect(signInit?.headers).toEqual({
      'Authorization': 'Bearer ambient-token',
      'Content-Type': 'application/json',
    });
    const signBody: unknown = JSON.parse(String(signInit?.body));
    expect(signBody).toEqual({ payload: JSON.stringify(buildAssertionClaims(identity, NOW)) });

    const [tokenUrl, tokenInit] = fetchMock.mock.calls[1];
    expect(tokenUrl).toBe(TOKEN_ENDPOINT);
    expect(tokenInit?.body).toBe(
      'grant_type=urn%3Aietf%3Aparams%3Aoauth%3Agrant-type%3Ajwt-bearer&assertion=signed.jwt',
    );
  });

  test('defaults the token lifetime to one hour when expires_in is missing', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ signedJwt: 'signed.jwt' }))
      .mockResolvedValueOnce(jsonResponse({ access_token: 'user-token' }));

    const token = await exchanger.acquireDelegatedToken(identity);

    expect(token.expiresAt).toEqual(new Date(NOW.getTime() + 3600 * 1000));
  });

  test('reports SigningFailed when the ambient credential is unavailable', async () => {
    ambient.getAccessToken.mockRejectedValueOnce(new Error('no default credentials'));

    const err = await exchanger.acquireDelegatedToken(identity).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CredentialError);
    expect(err).toMatchObject({
      kind: 'SigningFailed',
      code: 'GMAIL_AUTH_ERROR',
      message: 'Ambient credential unavailable: no default credentials',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  test('reports SigningFailed when signJwt is refused', async () => {
    fetchMock.mockResolvedValueOnce(new Response('permission denied', { status: 403 }));

    await expect(exchanger.acquireDelegatedToken(identity)).rejects.toMatchObject({
      kind: 'SigningFailed',
      message: 'signJwt returned 403: permission denied',
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test('reports SigningFailed when the signJwt response has no signature', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ keyId: 'k1' }));

    await expect(exchanger.acquireDelegatedToken(identity)).rejects.toMatchObject({
      kind: 'SigningFailed',
      message: 'signJwt response has no signedJwt',
    });
  });

  test('reports SigningFailed when signJwt answers 200 with a non-JSON body', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html>proxy error</html>', { status: 200 }));

    await expect(exchanger.acquireDelegatedToken(identity)).rejects.toMatchObject({
      kind: 'SigningFailed',
      status: 502,
      message: 'signJwt returned invalid JSON',
    });
  });

  test('reports ExchangeFailed when the token endpoint answers 200 with a non-JSON body', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ signedJwt: 'signed.jwt' }))
      .mockResolvedValueOnce(new Response('not json', { status: 200 }));

    const err = await exchanger.acquireDelegatedToken(identity).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CredentialError);
    expect(err).toMatchObject({
      kind: 'ExchangeFailed',
      status: 502,
      message: 'Token endpoint returned invalid JSON',
    });
  });

  test('reports ExchangeFailed when the token endpoint refuses the assertion', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ signedJwt: 'signed.jwt' }))
      .mockResolvedValueOnce(new Response('unauthorized_client', { status: 401 }));

    await expect(exchanger.acquireDelegatedToken(identity)).rejects.toMatchObject({
      kind: 'ExchangeFailed',
      message: 'Token endpoint returned 401: unauthorized_client',
      context: { operation: 'exchange_assertion' },
    });
  });

  test('reports ExchangeFailed when the token request cannot connect', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ signedJwt: 'signed.jwt' }))
      .mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(exchanger.acquireDelegatedToken(identity)).rejects.toMatchObject({
      kind: 'ExchangeFailed',
      message: 'Token request failed: fetch failed',
    });
  });

  test('reports ExchangeFailed when the token response has no access_token', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ signedJwt: 'signed.jwt' }))
      .mockResolvedValueOnce(jsonResponse({ token_type: 'Bearer' }));

    await expect(exchanger.acquireDelegatedToken(identity)).rejects.toMatchObject({
      kind: 'ExchangeFailed',
      message: 'Token response has no access_token',
    });
  });
});

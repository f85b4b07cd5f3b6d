/**
 * Delegated Credential Exchange
 *
 * Turns the identity the service runs as into an access token that
 * impersonates a Workspace mailbox user (domain-wide delegation), without a
 * private key on disk:
 *
 *   1. Ambient credential: google-auth-library resolves the runtime service
 *      account (metadata server, GOOGLE_APPLICATION_CREDENTIALS, gcloud ADC)
 *   2. Sign: IAM Credentials signJwt signs the delegation claim set
 *      (iss = service account, sub = mailbox user) as that service account
 *   3. Exchange: the signed assertion goes to the OAuth token endpoint with
 *      the jwt-bearer grant and comes back as a bearer token
 *
 * Error handling:
 * - Step 1 or 2 failing throws CredentialError{ kind: 'SigningFailed' }
 * - Step 3 failing throws CredentialError{ kind: 'ExchangeFailed' }
 * - Nothing is retried here; the mailbox client decides what to do
 *
 * Tokens and assertions are never logged.
 */

import { GoogleAuth } from 'google-auth-library';
import { CredentialError, errorMessage } from '../errors.js';
import type {
  AccessToken,
  AmbientCredentialProvider,
  DelegatedIdentity,
  SignedAssertionClaims,
  TokenSource,
} from './types.js';

export const TOKEN_ENDPOINT = 'https://oauth2.googleapis.com/token';
const IAM_CREDENTIALS_BASE = 'https://iamcredentials.googleapis.com/v1';
const JWT_BEARER_GRANT = 'urn:ietf:params:oauth:grant-type:jwt-bearer';

/** Nominal validity of the assertion, and the token lifetime when Google omits expires_in */
const ASSERTION_TTL_SECONDS = 3600;
const REQUEST_TIMEOUT_MS = 10_000;

// ---------------------------------------------------------------------------
// Ambient credential
// ---------------------------------------------------------------------------

/**
 * Ambient credential backed by Application Default Credentials.
 */
export class GoogleAmbientCredential implements AmbientCredentialProvider {
  private readonly auth = new GoogleAuth({
    scopes: ['https://www.googleapis.com/auth/cloud-platform'],
  });

  async getAccessToken(): Promise<string> {
    const token = await this.auth.getAccessToken();
    if (!token) {
      throw new Error('Application Default Credentials returned no access token');
    }
    return token;
  }
}

// ---------------------------------------------------------------------------
// Claim set
// ---------------------------------------------------------------------------

/**
 * Builds the delegation claim set for one acquisition attempt.
 */
export function buildAssertionClaims(identity: DelegatedIdentity, now: Date): SignedAssertionClaims {
  const iat = Math.floor(now.getTime() / 1000);
  return {
    iss: identity.serviceAccountEmail,
    sub: identity.impersonatedUser,
    scope: identity.scopes.join(' '),
    aud: TOKEN_ENDPOINT,
    iat,
    exp: iat + ASSERTION_TTL_SECONDS,
  };
}

// ---------------------------------------------------------------------------
// Exchanger
// ---------------------------------------------------------------------------

export interface CredentialExchangerOptions {
  ambient?: AmbientCredentialProvider;
  /** Clock, for tests */
  now?: () => Date;
}

export class CredentialExchanger implements TokenSource {
  private readonly ambient: AmbientCredentialProvider;
  private readonly now: () => Date;

  constructor(options: CredentialExchangerOptions = {}) {
    this.ambient = options.ambient ?? new GoogleAmbientCredential();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Runs the full sign-then-exchange sequence. Two round trips every call.
   */
  async acquireDelegatedToken(identity: DelegatedIdentity): Promise<AccessToken> {
    const issuedAt = this.now();
    const claims = buildAssertionClaims(identity, issuedAt);
    const signedJwt = await this.signAssertion(identity.serviceAccountEmail, claims);
    const token = await this.exchangeAssertion(signedJwt, issuedAt);

    console.log('[credentials] Delegated token acquired', {
      serviceAccount: identity.serviceAccountEmail,
      impersonatedDomain: identity.impersonatedUser.split('@')[1],
      expiresAt: token.expiresAt.toISOString(),
    });

    return token;
  }

  private async signAssertion(serviceAccountEmail: string, claims: SignedAssertionClaims): Promise<string> {
    let ambientToken: string;
    try {
      ambientToken = await this.ambient.getAccessToken();
    } catch (err) {
      throw new CredentialError('SigningFailed', `Ambient credential unavailable: ${errorMessage(err)}`, err);
    }

    const url = `${IAM_CREDENTIALS_BASE}/projects/-/serviceAccounts/${encodeURIComponent(serviceAccountEmail)}:signJwt`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${ambientToken}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ payload: JSON.stringify(claims) }),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    } catch (err) {
      throw new CredentialError('SigningFailed', `signJwt request failed: ${errorMessage(err)}`, err);
    }

    if (!response.ok) {
      throw new CredentialError(
        'SigningFailed',
        `signJwt returned ${response.status}: ${await safeText(response)}`,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new CredentialError('SigningFailed', 'signJwt returned invalid JSON', err);
    }
    if (!isRecord(body) || typeof body.signedJwt !== 'string' || !body.signedJwt) {
      throw new CredentialError('SigningFailed', 'signJwt response has no signedJwt');
    }
    return body.signedJwt;
  }

  private async exchangeAssertion(signedJwt: string, issuedAt: Date): Promise<AccessToken> {
    let response: Response;
    try {
      response = await fetch(TOKEN_ENDPOINT, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({ grant_type: JWT_BEARER_GRANT, assertion: signedJwt }).toString(),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    } catch (err) {
      throw new CredentialError('ExchangeFailed', `Token request failed: ${errorMessage(err)}`, err);
    }

    if (!response.ok) {
      throw new CredentialError(
        'ExchangeFailed',
        `Token endpoint returned ${response.status}: ${await safeText(response)}`,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new CredentialError('ExchangeFailed', 'Token endpoint returned invalid JSON', err);
    }
    if (!isRecord(body) || typeof body.access_token !== 'string' || !body.access_token) {
      throw new CredentialError('ExchangeFailed', 'Token response has no access_token');
    }

    const lifetime = typeof body.expires_in === 'number' ? body.expires_in : ASSERTION_TTL_SECONDS;
    return {
      value: body.access_token,
      expiresAt: new Date(issuedAt.getTime() + lifetime * 1000),
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Error bodies from Google are short JSON; cap them anyway */
async function safeText(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, 300);
  } catch {
    return response.statusText;
  }
}

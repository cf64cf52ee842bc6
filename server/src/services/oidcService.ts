import { randomBytes } from 'node:crypto';
import * as client from 'openid-client';

const STATE_TTL_MS = 10 * 60 * 1000;
const LOGIN_SCOPE = 'openid email profile';

/**
 * Identity claims taken from the ID token.
 * `hostedDomain` is the Google Workspace `hd` claim when the provider sends one.
 */
export interface OidcProfile {
  sub: string;
  email: string;
  name: string;
  picture: string | null;
  hostedDomain: string | null;
}

// Login attempts in flight: state -> where to send the user afterwards
const pendingLogins = new Map<string, { redirect: string; expiresAt: number }>();

// One provider per process; the key changes only if the settings do
let cached: { key: string; config: client.Configuration } | null = null;

/**
 * Drop the cached provider configuration and any pending states.
 */
export function resetCache(): void {
  cached = null;
  pendingLogins.clear();
}

/**
 * Fetch the provider's .well-known/openid-configuration once per issuer and
 * client ID.
 */
export async function discoverOidcConfig(
  issuerUrl: string,
  clientId: string,
  clientSecret: string,
): Promise<client.Configuration> {
  const key = `${issuerUrl} ${clientId}`;
  if (cached?.key === key) {
    return cached.config;
  }

  const issuer = new URL(issuerUrl);
  // openid-client rejects plain-HTTP issuers unless allowInsecureRequests is set
  const options =
    issuer.protocol === 'http:' ? { execute: [client.allowInsecureRequests] } : undefined;

  const config = await client.discovery(issuer, clientId, clientSecret, undefined, options);
  cached = { key, config };
  return config;
}

/**
 * Start a login: a fresh random state is remembered with `appRedirect` and
 * embedded in the provider URL.
 */
export function buildAuthorizationUrl(
  config: client.Configuration,
  redirectUri: string,
  appRedirect: string = '/',
): { authorizationUrl: string; state: string } {
  const state = randomBytes(32).toString('hex');

  const url = client.buildAuthorizationUrl(config, {
    redirect_uri: redirectUri,
    scope: LOGIN_SCOPE,
    state,
  });
  storeState(state, appRedirect);

  return { authorizationUrl: url.href, state };
}

/**
 * Exchange the authorization code and read the profile claims. Missing
 * string claims become '' (sub, email, name) or null (picture, hd); the
 * display name falls back to preferred_username.
 *
 * @throws Error if the exchange fails or the response has no ID token claims
 */
export async function handleCallback(
  config: client.Configuration,
  callbackUrl: URL,
  expectedState: string,
): Promise<OidcProfile> {
  const tokens = await client.authorizationCodeGrant(config, callbackUrl, { expectedState });
  const claims = tokens.claims();
  if (!claims) {
    throw new Error('No claims found in ID token');
  }

  const text = (value: unknown): string | null => (typeof value === 'string' ? value : null);

  return {
    sub: claims.sub,
    email: text(claims.email) ?? '',
    name: text(claims.name) ?? text(claims.preferred_username) ?? '',
    picture: text(claims.picture),
    hostedDomain: text(claims.hd),
  };
}

export function storeState(state: string, redirect: string): void {
  purgeExpiredStates();
  pendingLogins.set(state, { redirect, expiresAt: Date.now() + STATE_TTL_MS });
}

/**
 * One-shot lookup: returns the redirect path and forgets the state, or null
 * if the state is unknown or older than ten minutes.
 */
export function consumeState(state: string): string | null {
  purgeExpiredStates();
  const login = pendingLogins.get(state);
  pendingLogins.delete(state);
  return login ? login.redirect : null;
}

function purgeExpiredStates(): void {
  const now = Date.now();
  for (const [state, login] of pendingLogins) {
    if (now > login.expiresAt) {
      pendingLogins.delete(state);
    }
  }
}

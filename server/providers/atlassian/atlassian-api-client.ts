/**
 * Atlassian credential providers
 *
 * The request executor asks a credential provider for headers on every
 * request. Tokens are captured in closures here and never cached by the
 * executor, so a provider backed by a refreshing token source always hands
 * out the current token.
 *
 * Usage:
 *   const credentials = createApiTokenCredentialProvider(email, apiToken);
 *   const executor = createRequestExecutor({ baseUrl: getJiraBaseUrl({ siteUrl }), credentials });
 */

import type { CredentialProvider } from '../../dispatcher/types.js';

export type AccessTokenSource = () => string | Promise<string>;

export interface AtlassianCredentialProvider extends CredentialProvider {
  /**
   * Authentication type used by this provider
   */
  authType: 'oauth' | 'api-token';
}

/**
 * Create a credential provider for an Atlassian OAuth 2.0 (3LO) access token
 *
 * @param getAccessToken - Returns the current access token; called once per request
 *
 * @example
 * ```typescript
 * const credentials = createOAuthCredentialProvider(() => tokenStore.current());
 * const baseUrl = getJiraBaseUrl({ cloudId });
 * ```
 */
export function createOAuthCredentialProvider(getAccessToken: AccessTokenSource): AtlassianCredentialProvider {
  return {
    authType: 'oauth',
    getHeaders: async () => {
      const accessToken = await getAccessToken();
      if (!accessToken) {
        throw new Error('No Atlassian access token available');
      }
      return { Authorization: `Bearer ${accessToken}` };
    },
  };
}

/**
 * Create a credential provider for an Atlassian API token
 *
 * API tokens use Basic Authentication: base64(email:api_token).
 * Requests must go to the site URL (https://your-site.atlassian.net), not
 * to api.atlassian.com.
 */
export function createApiTokenCredentialProvider(email: string, apiToken: string): AtlassianCredentialProvider {
  const encoded = Buffer.from(`${email}:${apiToken}`).toString('base64');
  return {
    authType: 'api-token',
    getHeaders: async () => ({ Authorization: `Basic ${encoded}` }),
  };
}

export type JiraSite = { cloudId: string } | { siteUrl: string };

/**
 * Base URL that catalogue paths (`/rest/api/3/...`) are appended to
 *
 * OAuth tokens go through the API gateway keyed by cloud id; API tokens go
 * straight to the site.
 */
export function getJiraBaseUrl(site: JiraSite): string {
  if ('cloudId' in site) {
    return `https://api.atlassian.com/ex/jira/${site.cloudId}`;
  }
  return site.siteUrl.replace(/\/+$/, '');
}

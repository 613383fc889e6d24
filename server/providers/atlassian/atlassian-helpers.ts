/**
 * Atlassian site resolution helpers
 *
 * OAuth tokens reach Jira through api.atlassian.com, keyed by cloud id. When
 * only a site name is configured, the cloud id is looked up once at startup.
 */

import { logger } from '../../observability/logger.js';
import type { FetchFn } from '../../dispatcher/types.js';
import { type AtlassianCredentialProvider, getJiraBaseUrl } from './atlassian-api-client.js';

// Atlassian site information structure
export interface AtlassianSite {
  id: string;
  name: string;
  url: string;
  scopes?: string[];
  avatarUrl?: string;
}

// Resolved site information
export interface ResolvedSiteInfo {
  cloudId: string;
  siteName: string;
  siteUrl: string;
}

export const ACCESSIBLE_RESOURCES_URL = 'https://api.atlassian.com/oauth/token/accessible-resources';

/**
 * Resolve the cloud ID of the Jira site to talk to
 *
 * @param credentials - Credential provider used for the lookup request
 * @param cloudId - Explicit cloud ID; returned as-is without a request
 * @param siteName - Site name to search for ("mycompany" for mycompany.atlassian.net)
 * @param fetchImpl - fetch implementation (tests pass a stub)
 * @throws Error if no sites are accessible or the site name matches none
 */
export async function resolveCloudId(
  credentials: AtlassianCredentialProvider,
  cloudId?: string,
  siteName?: string,
  fetchImpl: FetchFn = (input, init) => fetch(input, init),
): Promise<ResolvedSiteInfo> {
  if (cloudId) {
    logger.info('Using provided cloudId', { cloudId });
    return { cloudId, siteName: siteName ?? 'unknown', siteUrl: siteName ? `https://${siteName}.atlassian.net` : 'unknown' };
  }

  // API tokens cannot call accessible-resources; tenant_info is public per site
  if (credentials.authType === 'api-token') {
    if (!siteName) {
      throw new Error('siteName is required when using API token authentication without an explicit cloudId');
    }
    const tenantInfoUrl = `https://${siteName}.atlassian.net/_edge/tenant_info`;
    logger.info('Using _edge/tenant_info for API token authentication', { siteName, tenantInfoUrl });

    const tenantRes = await fetchImpl(tenantInfoUrl, { method: 'GET', headers: { Accept: 'application/json' } });
    if (!tenantRes.ok) {
      throw new Error(`Fetch tenant info failed: ${tenantRes.status} ${tenantRes.statusText}`);
    }
    const tenantInfo: unknown = await tenantRes.json();
    if (!isTenantInfo(tenantInfo)) {
      throw new Error(`Tenant info for ${siteName} carries no cloudId`);
    }
    return { cloudId: tenantInfo.cloudId, siteName, siteUrl: `https://${siteName}.atlassian.net` };
  }

  logger.info('Fetching accessible sites from Atlassian API (OAuth)', {
    reason: siteName ? 'siteName lookup' : 'auto-detection',
    siteName: siteName || 'none',
  });

  const siteRes = await fetchImpl(ACCESSIBLE_RESOURCES_URL, {
    method: 'GET',
    headers: { ...(await credentials.getHeaders()), Accept: 'application/json' },
  });
  if (!siteRes.ok) {
    throw new Error(`Fetch accessible sites failed: ${siteRes.status} ${siteRes.statusText}`);
  }

  const body: unknown = await siteRes.json();
  const sites = Array.isArray(body) ? body.filter(isAtlassianSite) : [];
  logger.info('Retrieved accessible sites', {
    sitesCount: sites.length,
    siteNames: sites.map((s) => s.name),
  });

  if (!sites.length) {
    throw new Error('No accessible Jira sites found.');
  }

  if (siteName) {
    const wanted = siteName.toLowerCase();
    const matchingSite = sites.find((site) =>
      site.name.toLowerCase().includes(wanted) || wanted.includes(site.name.toLowerCase()),
    );
    if (!matchingSite) {
      const available = sites.map((s) => s.name).join(', ');
      throw new Error(`Jira site "${siteName}" not found. Available sites: ${available}`);
    }
    logger.info('Found matching site by name', { cloudId: matchingSite.id, siteName: matchingSite.name });
    return { cloudId: matchingSite.id, siteName: matchingSite.name, siteUrl: matchingSite.url };
  }

  const [firstSite] = sites;
  logger.info('Using first accessible site', { cloudId: firstSite.id, siteName: firstSite.name });
  return { cloudId: firstSite.id, siteName: firstSite.name, siteUrl: firstSite.url };
}

export interface JiraConnectionSettings {
  baseUrl?: string;
  cloudId?: string;
  siteName?: string;
}

/**
 * Work out the base URL catalogue paths are appended to
 *
 * An explicit base URL wins. API tokens otherwise talk to the site directly;
 * OAuth tokens go through the API gateway, looking the cloud id up when only
 * a site name is known.
 */
export async function resolveJiraBaseUrl(
  credentials: AtlassianCredentialProvider,
  settings: JiraConnectionSettings,
  fetchImpl?: FetchFn,
): Promise<string> {
  if (settings.baseUrl) {
    return getJiraBaseUrl({ siteUrl: settings.baseUrl });
  }
  if (credentials.authType === 'api-token' && settings.siteName && !settings.cloudId) {
    return getJiraBaseUrl({ siteUrl: `https://${settings.siteName}.atlassian.net` });
  }
  const { cloudId } = await resolveCloudId(credentials, settings.cloudId, settings.siteName, fetchImpl);
  return getJiraBaseUrl({ cloudId });
}

function isAtlassianSite(value: unknown): value is AtlassianSite {
  if (typeof value !== 'object' || value === null) return false;
  return 'id' in value && typeof value.id === 'string'
    && 'name' in value && typeof value.name === 'string'
    && 'url' in value && typeof value.url === 'string';
}

function isTenantInfo(value: unknown): value is { cloudId: string } {
  return typeof value === 'object' && value !== null && 'cloudId' in value && typeof value.cloudId === 'string';
}

/**
 * Unit tests for Atlassian helpers
 */

import { describe, test, expect } from '@jest/globals';
import { ACCESSIBLE_RESOURCES_URL, resolveCloudId, resolveJiraBaseUrl } from './atlassian-helpers.js';
import {
  createApiTokenCredentialProvider,
  createOAuthCredentialProvider,
  getJiraBaseUrl,
} from './atlassian-api-client.js';
import { createFakeFetch, jsonResponse } from '../../test-utils/fake-fetch.js';

const oauth = createOAuthCredentialProvider(() => 'test-token');
const apiToken = createApiTokenCredentialProvider('dev@example.com', 'test-secret');

const SITES = [
  { id: 'cloud-1', name: 'acme', url: 'https://acme.atlassian.net' },
  { id: 'cloud-2', name: 'acme-sandbox', url: 'https://acme-sandbox.atlassian.net' },
];

// ============================================================================
// Credential providers
// ============================================================================

describe('credential providers', () => {
  test('OAuth provider sends the current bearer token', async () => {
    let token = 'token-1';
    const credentials = createOAuthCredentialProvider(() => token);

    expect(await credentials.getHeaders()).toEqual({ Authorization: 'Bearer token-1' });
    token = 'token-2';
    expect(await credentials.getHeaders()).toEqual({ Authorization: 'Bearer token-2' });
  });

  test('OAuth provider fails without a token', async () => {
    const credentials = createOAuthCredentialProvider(() => '');

    await expect(credentials.getHeaders()).rejects.toThrow('No Atlassian access token available');
  });

  test('API token provider sends basic auth', async () => {
    const expected = Buffer.from('dev@example.com:test-secret').toString('base64');

    expect(await apiToken.getHeaders()).toEqual({ Authorization: `Basic ${expected}` });
    expect(apiToken.authType).toBe('api-token');
  });
});

describe('getJiraBaseUrl', () => {
  test('routes cloud ids through the API gateway', () => {
    expect(getJiraBaseUrl({ cloudId: 'cloud-1' })).toBe('https://api.atlassian.com/ex/jira/cloud-1');
  });

  test('strips trailing slashes from site URLs', () => {
    expect(getJiraBaseUrl({ siteUrl: 'https://acme.atlassian.net//' })).toBe('https://acme.atlassian.net');
  });
});

// ============================================================================
// resolveCloudId
// ============================================================================

describe('resolveCloudId', () => {
  test('returns an explicit cloud id without a request', async () => {
    const fake = createFakeFetch(() => jsonResponse([]));

    const site = await resolveCloudId(oauth, 'cloud-9', 'acme', fake.fetch);

    expect(site).toEqual({ cloudId: 'cloud-9', siteName: 'acme', siteUrl: 'https://acme.atlassian.net' });
    expect(fake.requests).toHaveLength(0);
  });

  test('matches an OAuth site by partial name', async () => {
    const fake = createFakeFetch(() => jsonResponse(SITES));

    const site = await resolveCloudId(oauth, undefined, 'sandbox', fake.fetch);

    expect(site).toEqual({ cloudId: 'cloud-2', siteName: 'acme-sandbox', siteUrl: 'https://acme-sandbox.atlassian.net' });
    expect(fake.requests[0].url).toBe(ACCESSIBLE_RESOURCES_URL);
    expect(fake.requests[0].headers.authorization).toBe('Bearer test-token');
  });

  test('falls back to the first accessible site', async () => {
    const fake = createFakeFetch(() => jsonResponse(SITES));

    const site = await resolveCloudId(oauth, undefined, undefined, fake.fetch);

    expect(site.cloudId).toBe('cloud-1');
  });

  test('lists the available sites when none matches', async () => {
    const fake = createFakeFetch(() => jsonResponse([SITES[1]]));

    await expect(resolveCloudId(oauth, undefined, 'globex', fake.fetch)).rejects.toThrow(
      'Jira site "globex" not found. Available sites: acme-sandbox',
    );
  });

  test('fails when no site is accessible', async () => {
    const fake = createFakeFetch(() => jsonResponse([]));

    await expect(resolveCloudId(oauth, undefined, undefined, fake.fetch)).rejects.toThrow('No accessible Jira sites found.');
  });

  test('uses tenant_info for API tokens', async () => {
    const fake = createFakeFetch(() => jsonResponse({ cloudId: 'cloud-7' }));

    const site = await resolveCloudId(apiToken, undefined, 'acme', fake.fetch);

    expect(site).toEqual({ cloudId: 'cloud-7', siteName: 'acme', siteUrl: 'https://acme.atlassian.net' });
    expect(fake.requests[0].url).toBe('https://acme.atlassian.net/_edge/tenant_info');
  });

  test('requires a site name for API tokens without a cloud id', async () => {
    await expect(resolveCloudId(apiToken)).rejects.toThrow(
      'siteName is required when using API token authentication without an explicit cloudId',
    );
  });
});

// ============================================================================
// resolveJiraBaseUrl
// ============================================================================

describe('resolveJiraBaseUrl', () => {
  test('prefers an explicit base URL', async () => {
    const baseUrl = await resolveJiraBaseUrl(oauth, { baseUrl: 'https://jira.example.com/', cloudId: 'cloud-1' });

    expect(baseUrl).toBe('https://jira.example.com');
  });

  test('talks to the site directly with an API token', async () => {
    const fake = createFakeFetch(() => jsonResponse({}));

    const baseUrl = await resolveJiraBaseUrl(apiToken, { siteName: 'acme' }, fake.fetch);

    expect(baseUrl).toBe('https://acme.atlassian.net');
    expect(fake.requests).toHaveLength(0);
  });

  test('looks the cloud id up for OAuth site names', async () => {
    const fake = createFakeFetch(() => jsonResponse(SITES));

    const baseUrl = await resolveJiraBaseUrl(oauth, { siteName: 'acme' }, fake.fetch);

    expect(baseUrl).toBe('https://api.atlassian.com/ex/jira/cloud-1');
  });
});

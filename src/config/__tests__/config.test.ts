import { describe, expect, it } from 'vitest';
import { loadConfig } from '..';

describe('loadConfig', () => {
  it('derives the token audience, issuer and key set from the tenant', () => {
    const config = loadConfig({ TENANT_ID: 'tenant-1', BACKEND_CLIENT_ID: 'client-1' });

    expect(config.auth).toEqual({
      tenantId: 'tenant-1',
      audience: 'api://client-1',
      issuer: 'https://sts.windows.net/tenant-1/',
      jwksUri: 'https://login.microsoftonline.com/tenant-1/discovery/v2.0/keys',
      clockToleranceSeconds: 60,
    });
  });

  it('applies sync defaults', () => {
    expect(loadConfig({}).sync).toEqual({ domainToken: 'primefire', autoSync: true, intervalHours: 24 });
  });

  it('parses sync overrides', () => {
    const config = loadConfig({
      DIRECTORY_DOMAIN_TOKEN: ' Contoso ',
      ENABLE_AUTO_SYNC: 'FALSE',
      SYNC_INTERVAL_HOURS: '6',
    });

    expect(config.sync).toEqual({ domainToken: 'contoso', autoSync: false, intervalHours: 6 });
  });

  it('enables Graph only when every credential is present', () => {
    expect(loadConfig({ MICROSOFT_TENANT_ID: 't', MICROSOFT_CLIENT_ID: 'c' }).graph.isConfigured).toBe(false);
    expect(
      loadConfig({ MICROSOFT_TENANT_ID: 't', MICROSOFT_CLIENT_ID: 'c', MICROSOFT_CLIENT_SECRET: 'test-secret' }).graph
        .isConfigured
    ).toBe(true);
  });

  it('requires tenant settings in production', () => {
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow('TENANT_ID is required in production');
  });

  it('requires a connection string for blob storage', () => {
    expect(() => loadConfig({ STORAGE_DRIVER: 'azure' })).toThrow('AZURE_STORAGE_CONNECTION_STRING is required');
  });
});

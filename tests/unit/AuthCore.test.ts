// tests/unit/AuthCore.test.ts

import { describe, it, expect, beforeEach } from 'vitest';
import nock from 'nock';
import { AuthCore } from '../../src/core/auth/AuthCore';
import { CatalogAuthError } from '../../src/utils/errors';
import { CATALOG_HOST, createTestDeps } from '../helpers/deps';

describe('AuthCore', () => {
  let auth: AuthCore;

  beforeEach(() => {
    const deps = createTestDeps();
    auth = new AuthCore(
      deps.http,
      `${CATALOG_HOST}/`,
      { clientId: 'test-client', clientSecret: 'test-secret' },
      deps.logger
    );
  });

  it('should exchange client credentials for an access token', async () => {
    const scope = nock(CATALOG_HOST)
      .post('/v1/auth/access_token', { clientId: 'test-client', clientSecret: 'test-secret' })
      .reply(200, { ok: true, accessToken: 'test-token', expiresIn: 3600, tokenType: 'Bearer' });

    await expect(auth.authenticate()).resolves.toBe('test-token');
    expect(scope.isDone()).toBe(true);
  });

  it('should reuse the token on later calls', async () => {
    nock(CATALOG_HOST).post('/v1/auth/access_token').once().reply(200, { accessToken: 'test-token' });

    await auth.authenticate();
    await expect(auth.authenticate()).resolves.toBe('test-token');
  });

  it('should fail when the endpoint rejects the credentials', async () => {
    nock(CATALOG_HOST).post('/v1/auth/access_token').reply(401, { ok: false });

    await expect(auth.authenticate()).rejects.toThrow(
      new CatalogAuthError('Catalog authentication failed: Client error: 401')
    );
  });

  it('should fail when the response has no token', async () => {
    nock(CATALOG_HOST).post('/v1/auth/access_token').reply(200, { ok: true });

    await expect(auth.authenticate()).rejects.toThrow('Catalog token response has no accessToken');
  });
});

// tests/unit/PaginatedFetcher.test.ts

import { describe, it, expect, beforeEach } from 'vitest';
import nock from 'nock';
import { PaginatedFetcher } from '../../src/core/pagination/PaginatedFetcher';
import type { CoreDeps } from '../../src/connectors/types';
import {
  ApiClientError,
  MalformedPageError,
  PaginationError,
} from '../../src/utils/errors';
import { API, BITBUCKET_HOST, TEST_RETRY, createTestDeps } from '../helpers/deps';

const PROJECTS_URL = `${BITBUCKET_HOST}${API}/projects`;

describe('PaginatedFetcher', () => {
  let deps: CoreDeps;
  let fetcher: PaginatedFetcher;

  beforeEach(() => {
    deps = createTestDeps();
    fetcher = new PaginatedFetcher(deps.http, deps.logger, deps.metrics, {
      upstream: 'bitbucket',
      auth: { username: 'sync-bot', password: 'test-password' },
      retry: TEST_RETRY,
    });
  });

  it('should concatenate every page in order, one request per page', async () => {
    const scope = nock(BITBUCKET_HOST)
      .get(`${API}/projects`)
      .query({ limit: 2 })
      .reply(200, { values: [{ key: 'A' }, { key: 'B' }], nextPageStart: 2, isLastPage: false })
      .get(`${API}/projects`)
      .query({ limit: 2, start: 2 })
      .reply(200, { values: [{ key: 'C' }], nextPageStart: 4, isLastPage: false })
      .get(`${API}/projects`)
      .query({ limit: 2, start: 4 })
      .reply(200, { values: [{ key: 'D' }], isLastPage: true });

    const records = await fetcher.fetch(PROJECTS_URL, 2);

    expect(records).toEqual([{ key: 'A' }, { key: 'B' }, { key: 'C' }, { key: 'D' }]);
    expect(scope.isDone()).toBe(true);
  });

  it('should omit start on the first request and default to 25 per page', async () => {
    const scope = nock(BITBUCKET_HOST)
      .get(`${API}/projects`)
      .query({ limit: 25 })
      .reply(200, { values: [{ key: 'ONLY' }] });

    const records = await fetcher.fetch(PROJECTS_URL);

    expect(records).toEqual([{ key: 'ONLY' }]);
    expect(scope.isDone()).toBe(true);
  });

  it('should send basic auth on every page', async () => {
    const scope = nock(BITBUCKET_HOST)
      .get(`${API}/projects`)
      .query({ limit: 25 })
      .basicAuth({ user: 'sync-bot', pass: 'test-password' })
      .reply(200, { values: [], nextPageStart: 25 })
      .get(`${API}/projects`)
      .query({ limit: 25, start: 25 })
      .basicAuth({ user: 'sync-bot', pass: 'test-password' })
      .reply(200, { values: [] });

    await fetcher.fetch(PROJECTS_URL);

    expect(scope.isDone()).toBe(true);
  });

  it('should keep going when an empty page still carries a cursor', async () => {
    const scope = nock(BITBUCKET_HOST)
      .get(`${API}/projects`)
      .query({ limit: 25 })
      .reply(200, { values: [], nextPageStart: 5 })
      .get(`${API}/projects`)
      .query({ limit: 25, start: 5 })
      .reply(200, { values: [{ key: 'X' }], nextPageStart: null });

    const records = await fetcher.fetch(PROJECTS_URL);

    expect(records).toEqual([{ key: 'X' }]);
    expect(scope.isDone()).toBe(true);
  });

  it('should treat a page without the data key as empty and log it', async () => {
    nock(BITBUCKET_HOST)
      .get(`${API}/projects`)
      .query({ limit: 25 })
      .reply(200, { size: 0, nextPageStart: 3 })
      .get(`${API}/projects`)
      .query({ limit: 25, start: 3 })
      .reply(200, { values: [{ key: 'Z' }] });

    const records = await fetcher.fetch(PROJECTS_URL);

    expect(records).toEqual([{ key: 'Z' }]);
    expect(deps.logger.warn).toHaveBeenCalledWith('Page has no data key, treating as empty', {
      url: PROJECTS_URL,
      dataKey: 'values',
    });
  });

  it('should skip a data value that is not a list', async () => {
    nock(BITBUCKET_HOST)
      .get(`${API}/projects`)
      .query({ limit: 25 })
      .reply(200, { values: { key: 'A' } });

    const records = await fetcher.fetch(PROJECTS_URL);

    expect(records).toEqual([]);
    expect(deps.logger.warn).toHaveBeenCalledWith('Page data is not a list, skipping', {
      url: PROJECTS_URL,
      dataKey: 'values',
      type: 'object',
    });
  });

  it('should read records from a custom data key', async () => {
    const url = `${BITBUCKET_HOST}${API}/projects/ENG/repos/svc-a/browse/README.md`;
    nock(BITBUCKET_HOST)
      .get(`${API}/projects/ENG/repos/svc-a/browse/README.md`)
      .query({ limit: 500 })
      .reply(200, { lines: [{ text: 'a' }, { text: 'b' }], size: 2, isLastPage: true });

    const lines = await fetcher.fetch(url, 500, 'lines');

    expect(lines).toEqual([{ text: 'a' }, { text: 'b' }]);
  });

  it('should retry a malformed page on the same cursor', async () => {
    const scope = nock(BITBUCKET_HOST)
      .get(`${API}/projects`)
      .query({ limit: 25 })
      .reply(200, { values: [{ key: 'A' }], nextPageStart: 1 })
      .get(`${API}/projects`)
      .query({ limit: 25, start: 1 })
      .reply(200, 'not-json')
      .get(`${API}/projects`)
      .query({ limit: 25, start: 1 })
      .reply(200, { values: [{ key: 'B' }] });

    const records = await fetcher.fetch(PROJECTS_URL);

    expect(records).toEqual([{ key: 'A' }, { key: 'B' }]);
    expect(scope.isDone()).toBe(true);
  });

  it('should retry a page whose cursor has the wrong type', async () => {
    const scope = nock(BITBUCKET_HOST)
      .get(`${API}/projects`)
      .query({ limit: 25 })
      .reply(200, { values: [{ key: 'A' }], nextPageStart: {} })
      .get(`${API}/projects`)
      .query({ limit: 25 })
      .reply(200, { values: [{ key: 'A' }], nextPageStart: null });

    const records = await fetcher.fetch(PROJECTS_URL);

    expect(records).toEqual([{ key: 'A' }]);
    expect(scope.isDone()).toBe(true);
  });

  it('should fail with a malformed cursor once attempts run out', async () => {
    nock(BITBUCKET_HOST)
      .get(`${API}/projects`)
      .query({ limit: 25 })
      .times(3)
      .reply(200, { values: [], nextPageStart: {} });

    const error = await fetcher.fetch(PROJECTS_URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PaginationError);
    expect(error).toHaveProperty('cause', expect.any(MalformedPageError));
  });

  it('should fail after the bounded number of attempts', async () => {
    nock(BITBUCKET_HOST)
      .get(`${API}/projects`)
      .query({ limit: 25 })
      .times(3)
      .reply(200, 'still-not-json');

    const error = await fetcher.fetch(PROJECTS_URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PaginationError);
    expect(error).toHaveProperty('cause', expect.any(MalformedPageError));
    expect(error).toHaveProperty('details', { url: PROJECTS_URL, cursor: undefined, attempts: 3 });
  });

  it('should recover from a transient server error', async () => {
    nock(BITBUCKET_HOST)
      .get(`${API}/projects`)
      .query({ limit: 25 })
      .reply(503)
      .get(`${API}/projects`)
      .query({ limit: 25 })
      .reply(200, { values: [{ key: 'A' }] });

    const records = await fetcher.fetch(PROJECTS_URL);

    expect(records).toEqual([{ key: 'A' }]);
  });

  it('should not retry client errors', async () => {
    nock(BITBUCKET_HOST)
      .get(`${API}/projects`)
      .query({ limit: 25 })
      .reply(401, { errors: [{ message: 'Authentication failed' }] });

    const error = await fetcher.fetch(PROJECTS_URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PaginationError);
    expect(error).toHaveProperty('cause', expect.any(ApiClientError));
    expect(error).toHaveProperty('cause.status', 401);
    expect(error).toHaveProperty('details.attempts', 1);
  });
});

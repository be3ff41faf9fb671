import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import nock from 'nock';

import {
  HttpClient,
  RegionLockedError,
  UnauthorizedError,
  UpstreamError,
  isNotFound,
} from '@app/providers-core';

import { BeatsourceClient } from '../src/beatsource.client.ts';

const baseUrl = 'https://api.beatsource.com';

const createClient = () => {
  const http = new HttpClient({
    baseUrl: `${baseUrl}/v4/`,
    retries: 0,
    getAuthHeader: async () => 'Bearer test-token',
  });
  return new BeatsourceClient(http, { perPage: 100 });
};

beforeEach(() => {
  nock.disableNetConnect();
});

afterEach(() => {
  nock.cleanAll();
  nock.enableNetConnect();
});

describe('BeatsourceClient', () => {
  it('fetches entities with the bearer token', async () => {
    nock(baseUrl)
      .matchHeader('authorization', 'Bearer test-token')
      .get('/v4/catalog/tracks/11')
      .reply(200, { id: 11, name: 'Song' });

    await expect(createClient().getTrack(11)).resolves.toEqual({ id: 11, name: 'Song' });
  });

  it('sends page and per_page for listings', async () => {
    const scope = nock(baseUrl)
      .get('/v4/catalog/releases/5/tracks')
      .query({ page: '2', per_page: '100' })
      .reply(200, { count: 0, results: [] });

    await createClient().getReleaseTracks(5, { page: 2 });

    expect(scope.isDone()).toBe(true);
  });

  it('searches by type', async () => {
    nock(baseUrl)
      .get('/v4/catalog/search')
      .query({ q: 'deep house', type: 'releases', per_page: '20' })
      .reply(200, { releases: [{ id: 1 }] });

    await expect(createClient().search('deep house', 'releases', 20)).resolves.toEqual({ releases: [{ id: 1 }] });
  });

  it('passes the upstream quality to the download endpoint', async () => {
    nock(baseUrl)
      .get('/v4/catalog/tracks/9/download')
      .query({ quality: 'lossless' })
      .reply(200, { location: 'https://cdn.test/9.flac' });

    await expect(createClient().getTrackDownload(9, 'lossless')).resolves.toEqual({
      location: 'https://cdn.test/9.flac',
    });
  });

  it('requests the preview stream', async () => {
    nock(baseUrl)
      .get('/v4/catalog/tracks/9/stream')
      .reply(200, { location: 'https://cdn.test/9.m3u8', stream_quality: '.128k.aac' });

    await expect(createClient().getTrackStream(9)).resolves.toEqual({
      location: 'https://cdn.test/9.m3u8',
      stream_quality: '.128k.aac',
    });
  });

  it('reads the account from introspection', async () => {
    nock(baseUrl).get('/v4/auth/o/introspect').reply(200, { subscription: 'bp_basic' });

    await expect(createClient().getAccount()).resolves.toEqual({ subscription: 'bp_basic' });
  });

  it('raises UnauthorizedError on 401', async () => {
    nock(baseUrl).get('/v4/catalog/tracks/1').reply(401, { detail: 'expired' });

    await expect(createClient().getTrack(1)).rejects.toBeInstanceOf(UnauthorizedError);
  });

  it('raises RegionLockedError for territory restrictions', async () => {
    nock(baseUrl).get('/v4/catalog/releases/3').reply(403, { detail: 'Territory restricted.' });

    const error = await createClient()
      .getRelease(3)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RegionLockedError);
    expect(error).toMatchObject({ detail: 'Territory restricted.', message: 'region locked' });
  });

  it('treats other 403s as upstream errors', async () => {
    nock(baseUrl).get('/v4/catalog/releases/3').reply(403, { detail: 'Forbidden' });

    await expect(createClient().getRelease(3)).rejects.toMatchObject({ status: 403, code: 'upstream' });
  });

  it('reports 404s as not found', async () => {
    nock(baseUrl).get('/v4/catalog/playlists/8').reply(404, { detail: 'Not found.' });

    const error = await createClient()
      .getPlaylist(8)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(isNotFound(error)).toBe(true);
    expect(error).toMatchObject({ message: 'HTTP 404: {"detail":"Not found."}' });
  });

  it('rejects bodies that are not JSON', async () => {
    nock(baseUrl).get('/v4/catalog/tracks/1').reply(200, 'oops');

    await expect(createClient().getTrack(1)).rejects.toThrow('HTTP 200: invalid JSON body: oops');
  });

  it('rejects a literal null body', async () => {
    nock(baseUrl).get('/v4/catalog/releases/5/tracks').query(true).reply(200, 'null');

    await expect(createClient().getReleaseTracks(5, { page: 1 })).rejects.toThrow('HTTP 200: invalid JSON body: null');
  });
});

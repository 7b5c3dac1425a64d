import { describe, expect, it } from 'vitest';

import { collectingSink, json, routedFetch, testConfig, testInvoker, type RecordedCall } from '../../__tests__/fixtures.js';
import type { CollectionInstance } from '../../shared/types.js';
import { CatalogClient, toRelease } from '../client.js';

const API = 'https://api.test';
const COLLECTION = `${API}/users/tester/collection`;

const FIELDS = {
  fields: [
    { id: 1, name: 'Media Condition', type: 'dropdown' },
    { id: 2, name: 'Sleeve Condition', type: 'dropdown' },
    { id: 3, name: 'Notes', type: 'textarea' },
  ],
};

function catalog(route: (call: RecordedCall) => Response | undefined) {
  const { fetchImpl, calls } = routedFetch(route);
  const events = collectingSink();
  const sleeps: number[] = [];
  const client = new CatalogClient(testConfig(), {
    invoker: testInvoker(fetchImpl),
    events,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  return { client, calls, events, sleeps };
}

describe('toRelease', () => {
  it('keeps tracks only and resolves the web URL', () => {
    expect(
      toRelease({
        id: 7,
        title: 'Album Y',
        year: 0,
        uri: '/release/7-Artist-X-Album-Y',
        country: ' US ',
        artists: [{ id: 1, name: 'Artist X' }],
        formats: [{ name: 'Vinyl' }, { name: 'CD' }],
        tracklist: [
          { position: 'A1', title: 'One', duration: '3:00' },
          { position: '', type_: 'heading', title: 'Side B', duration: '' },
          { position: 'B1', title: 'Two', duration: '' },
        ],
      })
    ).toEqual({
      id: 7,
      title: 'Album Y',
      artists: ['Artist X'],
      year: null,
      country: 'US',
      formats: ['Vinyl', 'CD'],
      tracklist: [
        { position: 'A1', title: 'One', duration: '3:00' },
        { position: 'B1', title: 'Two', duration: '' },
      ],
      url: 'https://www.discogs.com/release/7-Artist-X-Album-Y',
    });
  });
});

describe('CatalogClient', () => {
  it('identifies itself and memoises release lookups', async () => {
    const { client, calls, sleeps } = catalog((call) =>
      call.url === `${API}/releases/7` ? json({ id: 7, title: 'Album Y', formats: [{ name: 'Vinyl' }] }) : undefined
    );

    const first = await client.getRelease(7);
    const second = await client.getRelease(7);

    expect(first?.formats).toEqual(['Vinyl']);
    expect(first?.url).toBe('https://www.discogs.com/release/7');
    expect(second).toBe(first);
    expect(calls).toHaveLength(1);
    expect(calls[0].headers['user-agent']).toBe('sleevescan/0.1.0');
    expect(calls[0].headers.authorization).toBe('Discogs token=test-secret');
    expect(sleeps).toEqual([600]);
  });

  it('reports a failed lookup and returns null', async () => {
    const { client, events } = catalog(() => undefined);

    expect(await client.getRelease(8)).toBeNull();
    expect(events.events).toEqual([
      { type: 'lookup_failed', target: 'release 8', message: `HTTP 404 GET ${API}/releases/8: not found` },
    ]);
  });

  it('maps a master and its version pages', async () => {
    const { client } = catalog((call) => {
      if (call.url === `${API}/masters/10`) return json({ id: 10, title: 'Album Y', main_release: 11 });
      if (call.url === `${API}/masters/10/versions?page=2&per_page=100`) {
        return json({ pagination: { page: 2, pages: 3, per_page: 100, items: 201 }, versions: [{ id: 12, title: 'Album Y' }] });
      }
      return undefined;
    });

    expect(await client.getMaster(10)).toEqual({ id: 10, title: 'Album Y', mainReleaseId: 11 });
    expect(await client.getMasterVersions(10, 2)).toEqual({
      items: [{ id: 12, title: 'Album Y', country: '' }],
      page: 2,
      pages: 3,
    });
  });

  it('searches releases with format and country filters', async () => {
    const { client, calls } = catalog((call) =>
      call.url.startsWith(`${API}/database/search`)
        ? json({
            results: [
              { id: 5, type: 'release', title: 'Artist X - Album Y', uri: '/release/5-Album-Y' },
              { id: 6, type: 'release', title: 'Artist X - Album Y (Reissue)' },
            ],
          })
        : undefined
    );

    const hits = await client.searchReleases({ artist: 'Artist X', album: 'Album Y' });

    expect(calls[0].url).toBe(
      `${API}/database/search?type=release&format=Vinyl&country=US&per_page=10&artist=Artist+X&release_title=Album+Y`
    );
    expect(hits).toEqual([
      { id: 5, title: 'Artist X - Album Y', url: 'https://www.discogs.com/release/5-Album-Y' },
      { id: 6, title: 'Artist X - Album Y (Reissue)', url: 'https://www.discogs.com/release/6' },
    ]);
  });

  it('drains every page of a folder and reads conditions from the notes', async () => {
    const { client, calls, sleeps } = catalog((call) => {
      if (call.url === `${COLLECTION}/fields`) return json(FIELDS);
      if (call.url === `${COLLECTION}/folders/0/releases?page=1&per_page=100`) {
        return json({
          pagination: { page: 1, pages: 2, per_page: 100, items: 2 },
          releases: [
            {
              id: 5,
              instance_id: 900,
              folder_id: 1,
              basic_information: { id: 5, title: 'Album Y', year: 1977, artists: [{ id: 1, name: 'Artist X' }] },
              notes: [
                { field_id: 1, value: 'Mint (M)' },
                { field_id: 2, value: ' ' },
              ],
            },
          ],
        });
      }
      if (call.url === `${COLLECTION}/folders/0/releases?page=2&per_page=100`) {
        return json({
          pagination: { page: 2, pages: 2, per_page: 100, items: 2 },
          releases: [{ id: 6, instance_id: 901, folder_id: 3 }],
        });
      }
      return undefined;
    });

    const res = await client.listFolderInstances(0);

    const expected: CollectionInstance[] = [
      {
        releaseId: 5,
        instanceId: 900,
        folderId: 1,
        title: 'Album Y',
        artists: ['Artist X'],
        year: 1977,
        mediaCondition: 'Mint (M)',
        sleeveCondition: null,
      },
      {
        releaseId: 6,
        instanceId: 901,
        folderId: 3,
        title: '',
        artists: [],
        year: null,
        mediaCondition: null,
        sleeveCondition: null,
      },
    ];
    expect(res).toEqual({ ok: true, value: expected, status: 200 });
    expect(sleeps).toEqual([500]);

    const ids = await client.collectionReleaseIds();
    expect(ids.ok && [...ids.value]).toEqual([5, 6]);
    expect(calls.filter((c) => c.url === `${COLLECTION}/fields`)).toHaveLength(1);
  });

  it('caches missing condition fields as null', async () => {
    const { client, calls } = catalog((call) =>
      call.url === `${COLLECTION}/fields` ? json({ fields: [{ id: 3, name: 'Notes', type: 'textarea' }] }) : undefined
    );

    expect(await client.getConditionFieldIds()).toBeNull();
    expect(await client.getConditionFieldIds()).toBeNull();
    expect(calls).toHaveLength(1);
  });

  it('re-lists folders after creating one', async () => {
    const { client, calls } = catalog((call) => {
      if (call.url === `${COLLECTION}/folders` && call.method === 'GET') {
        return json({ folders: [{ id: 0, name: 'All', count: 2 }, { id: 1, name: 'Uncategorized', count: 2 }] });
      }
      if (call.url === `${COLLECTION}/folders` && call.method === 'POST') return json({ id: 10, name: 'Dad', count: 0 }, 201);
      return undefined;
    });

    await client.listFolders();
    await client.listFolders();
    const created = await client.createFolder('Dad');
    await client.listFolders();

    expect(created).toEqual({ ok: true, value: { id: 10, name: 'Dad', count: 0 }, status: 201 });
    expect(calls.map((c) => `${c.method} ${c.url}`)).toEqual([
      `GET ${COLLECTION}/folders`,
      `POST ${COLLECTION}/folders`,
      `GET ${COLLECTION}/folders`,
    ]);
    expect(calls[1].body).toBe('{"name":"Dad"}');
  });

  it('moves an instance by posting to its current folder', async () => {
    const { client, calls } = catalog(() => new Response(null, { status: 204 }));
    const instance: CollectionInstance = {
      releaseId: 5,
      instanceId: 900,
      folderId: 1,
      title: 'Album Y',
      artists: [],
      year: null,
      mediaCondition: null,
      sleeveCondition: null,
    };

    const res = await client.moveInstance(instance, 10);
    await client.setInstanceField(instance, 1, 'Very Good (VG)');

    expect(res).toEqual({ ok: true, value: null, status: 204 });
    expect(calls.map((c) => [c.url, c.body])).toEqual([
      [`${COLLECTION}/folders/1/releases/5/instances/900`, '{"folder_id":10}'],
      [`${COLLECTION}/folders/1/releases/5/instances/900/fields/1`, '{"value":"Very Good (VG)"}'],
    ]);
  });

  it('reports an add conflict as already satisfied', async () => {
    const { client } = catalog(() => json({ message: 'Release already in collection' }, 409));

    const res = await client.addToFolder(5, 1);

    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.kind).toBe('conflict');
  });
});

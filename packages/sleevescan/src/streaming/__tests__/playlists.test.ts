import { describe, expect, it } from 'vitest';

import type { HttpResult } from '../../http/invoker.js';
import { PermanentRemoteError } from '../../shared/errors.js';
import type { CatalogRelease, CollectionInstance, OwnerFolder } from '../../shared/types.js';
import type { CreatedPlaylist, StreamingAlbum } from '../client.js';
import {
  dedupeAlbums,
  parsePlaylistId,
  PlaylistBuilder,
  playlistName,
  type PlaylistCatalogPort,
  type PlaylistStreamingPort,
} from '../playlists.js';

const ok = <T>(value: T): HttpResult<T> => ({ ok: true, value, status: 200 });
const notFound = (url: string): HttpResult<never> => ({
  ok: false,
  error: new PermanentRemoteError('HTTP 404', url, 404),
});

class FakeStreaming implements PlaylistStreamingPort {
  albums = new Map<string, StreamingAlbum[]>();
  albumTracks = new Map<string, string[]>();
  trackHits = new Map<string, string>();
  existing = new Map<string, Set<string>>();
  created: Array<{ name: string; public: boolean; description: string }> = [];
  added: Array<{ playlistId: string; uris: string[] }> = [];
  trackQueries: string[] = [];

  async searchAlbums(query: string): Promise<HttpResult<StreamingAlbum[]>> {
    return ok(this.albums.get(query) ?? []);
  }

  async searchTrack(query: string): Promise<HttpResult<string | null>> {
    this.trackQueries.push(query);
    return ok(this.trackHits.get(query) ?? null);
  }

  async albumTrackUris(albumId: string): Promise<HttpResult<string[]>> {
    return ok(this.albumTracks.get(albumId) ?? []);
  }

  async playlistTrackUris(playlistId: string): Promise<HttpResult<Set<string>>> {
    const uris = this.existing.get(playlistId);
    return uris ? ok(uris) : notFound(`playlists/${playlistId}`);
  }

  async createPlaylist(name: string, opts: { public: boolean; description: string }): Promise<HttpResult<CreatedPlaylist>> {
    this.created.push({ name, ...opts });
    const id = `new-${this.created.length}`;
    return ok({ id, url: `https://open.spotify.com/playlist/${id}` });
  }

  async addTracks(playlistId: string, uris: string[]): Promise<HttpResult<number>> {
    this.added.push({ playlistId, uris });
    return ok(uris.length);
  }
}

class FakeCatalog implements PlaylistCatalogPort {
  folders: OwnerFolder[] = [
    { id: 0, name: 'All', count: 0 },
    { id: 1, name: 'Uncategorized', count: 0 },
    { id: 2, name: 'Dad', count: 0 },
    { id: 3, name: 'Mum', count: 0 },
  ];
  contents = new Map<number, CollectionInstance[]>();
  releases = new Map<number, CatalogRelease>();

  put(folderId: number, releaseId: number, title: string, artist: string, year: number | null): void {
    const list = this.contents.get(folderId) ?? [];
    list.push({
      releaseId,
      instanceId: releaseId + 1000,
      folderId,
      title,
      artists: [artist],
      year,
      mediaCondition: null,
      sleeveCondition: null,
    });
    this.contents.set(folderId, list);
  }

  async listFolders(): Promise<HttpResult<OwnerFolder[]>> {
    return ok(this.folders);
  }

  async listFolderInstances(folderId: number): Promise<HttpResult<CollectionInstance[]>> {
    return ok(this.contents.get(folderId) ?? []);
  }

  async getRelease(id: number): Promise<CatalogRelease | null> {
    return this.releases.get(id) ?? null;
  }
}

const today = () => new Date('2026-10-18T12:00:00Z');

function setup() {
  const streaming = new FakeStreaming();
  const catalog = new FakeCatalog();
  const sleeps: number[] = [];
  const builder = new PlaylistBuilder(streaming, catalog, {
    pauseMs: 300,
    today,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });

  streaming.albums.set('album:"Nevermind" artist:"Nirvana"', [
    { id: 'alb1', name: 'Nevermind', artists: ['Nirvana'], releaseYear: 1991 },
  ]);
  streaming.albumTracks.set('alb1', ['spotify:track:a', 'spotify:track:b']);

  return { streaming, catalog, builder, sleeps };
}

describe('parsePlaylistId', () => {
  it('accepts a URL, a URI or a bare id', () => {
    const id = '37i9dQZF1DXcBWIGoYBM5M';
    expect(parsePlaylistId(`https://open.spotify.com/playlist/${id}?si=abc`)).toBe(id);
    expect(parsePlaylistId(`https://open.spotify.com/intl-de/playlist/${id}`)).toBe(id);
    expect(parsePlaylistId(`spotify:playlist:${id}`)).toBe(id);
    expect(parsePlaylistId(` ${id} `)).toBe(id);
  });

  it('rejects anything else', () => {
    expect(parsePlaylistId('https://open.spotify.com/album/xyz')).toBeNull();
    expect(parsePlaylistId('short')).toBeNull();
  });
});

describe('playlistName', () => {
  it('names the folder and the date', () => {
    expect(playlistName('Dad', today())).toBe('Dad — Discogs albums (2026-10-18)');
  });
});

describe('dedupeAlbums', () => {
  it('keeps the first of each title and cleaned artist', () => {
    const a = { folder: 'Dad', releaseId: 1, title: 'Nevermind', artist: 'Nirvana', year: 1991 };
    const b = { folder: 'Mum', releaseId: 2, title: 'NEVERMIND', artist: 'Nirvana (2)', year: 2011 };
    const c = { folder: 'Mum', releaseId: 3, title: 'Bleach', artist: 'Nirvana', year: 1989 };
    expect(dedupeAlbums([a, b, c])).toEqual([a, c]);
  });
});

describe('PlaylistBuilder.selectFolders', () => {
  it('finds a named folder case-insensitively', async () => {
    const { builder } = setup();
    expect(await builder.selectFolders({ sourceFolder: 'dad' })).toEqual({
      ok: true,
      folders: [{ id: 2, name: 'Dad', count: 0 }],
    });
  });

  it('lists the available folders when the name is unknown', async () => {
    const { builder } = setup();
    expect(await builder.selectFolders({ sourceFolder: 'Nope' })).toEqual({
      ok: false,
      error: 'Folder "Nope" not found. Available: All, Uncategorized, Dad, Mum',
    });
  });

  it('narrows to owner folders', async () => {
    const { builder } = setup();
    const selection = await builder.selectFolders({ owners: ['Mum', 'Nobody'] });
    expect(selection.ok && selection.folders.map((f) => f.name)).toEqual(['Mum']);
  });

  it('defaults to every custom folder', async () => {
    const { builder } = setup();
    const selection = await builder.selectFolders({});
    expect(selection.ok && selection.folders.map((f) => f.name)).toEqual(['Dad', 'Mum']);
  });
});

describe('PlaylistBuilder.build', () => {
  it('creates one playlist per folder and falls back to track search', async () => {
    const { streaming, catalog, builder, sleeps } = setup();
    catalog.put(2, 1, 'Nevermind', 'Nirvana', 1991);
    catalog.put(2, 2, 'Demo Tape', 'Garage Band (3)', null);
    catalog.releases.set(2, {
      id: 2,
      title: 'Demo Tape',
      artists: ['Garage Band (3)'],
      year: null,
      country: 'US',
      formats: ['Vinyl'],
      tracklist: [
        { position: 'A1', title: 'Song One', duration: '' },
        { position: 'A2', title: 'Song Two', duration: '' },
      ],
      url: 'https://www.discogs.com/release/2',
    });
    streaming.trackHits.set('track:"Song One" artist:"Garage Band" album:"Demo Tape"', 'spotify:track:c');

    const result = await builder.build([catalog.folders[2], catalog.folders[3]], { mode: 'per-folder' });

    expect(streaming.created).toEqual([
      { name: 'Dad — Discogs albums (2026-10-18)', public: false, description: 'Albums from the Discogs folder "Dad"' },
    ]);
    expect(streaming.added).toEqual([
      { playlistId: 'new-1', uris: ['spotify:track:a', 'spotify:track:b', 'spotify:track:c'] },
    ]);
    expect(result.playlists).toEqual([
      {
        folder: 'Dad',
        playlistId: 'new-1',
        url: 'https://open.spotify.com/playlist/new-1',
        albums: 2,
        matchedAlbums: 2,
        tracksAdded: 3,
        tracksSkipped: 0,
      },
    ]);
    expect(result.unmatchedAlbums).toEqual([]);
    expect(result.unmatchedTracks).toEqual([
      {
        folder: 'Dad',
        releaseId: 2,
        album: 'Demo Tape',
        artist: 'Garage Band (3)',
        position: 'A2',
        track: 'Song Two',
        notes: 'no track match',
      },
    ]);
    expect(streaming.trackQueries).toEqual([
      'track:"Song One" artist:"Garage Band" album:"Demo Tape"',
      'track:"Song Two" artist:"Garage Band" album:"Demo Tape"',
      'track:"Song Two" artist:"Garage Band"',
    ]);
    expect(sleeps).toEqual([300, 300]);
    expect(result.errors).toEqual([]);
  });

  it('appends every folder into one playlist, skipping tracks already there', async () => {
    const { streaming, catalog, builder } = setup();
    catalog.put(2, 1, 'Nevermind', 'Nirvana', 1991);
    catalog.put(3, 11, 'Nevermind', 'Nirvana', 1991);
    catalog.put(3, 12, 'Lost Sessions', 'Nobody Known', 1970);
    streaming.existing.set('pl1', new Set(['spotify:track:a']));

    const result = await builder.build([catalog.folders[2], catalog.folders[3]], { mode: 'append', playlistId: 'pl1' });

    expect(streaming.created).toEqual([]);
    expect(streaming.added).toEqual([{ playlistId: 'pl1', uris: ['spotify:track:b'] }]);
    expect(result.playlists).toEqual([
      {
        folder: 'Dad, Mum',
        playlistId: 'pl1',
        url: null,
        albums: 2,
        matchedAlbums: 1,
        tracksAdded: 1,
        tracksSkipped: 1,
      },
    ]);
    expect(result.unmatchedAlbums).toEqual([
      {
        folder: 'Mum',
        releaseId: 12,
        title: 'Lost Sessions',
        artist: 'Nobody Known',
        year: 1970,
        notes: 'no album match; no tracklist',
      },
    ]);
  });

  it('stops when the target playlist cannot be read', async () => {
    const { streaming, catalog, builder } = setup();
    catalog.put(2, 1, 'Nevermind', 'Nirvana', 1991);

    const result = await builder.build([catalog.folders[2]], { mode: 'append', playlistId: 'missing' });

    expect(result.errors).toEqual(['playlist missing: HTTP 404']);
    expect(result.playlists).toEqual([]);
    expect(streaming.added).toEqual([]);
  });

  it('creates nothing for an empty folder', async () => {
    const { streaming, catalog, builder } = setup();

    const result = await builder.build([catalog.folders[3]], { mode: 'per-folder' });

    expect(streaming.created).toEqual([]);
    expect(result.playlists).toEqual([]);
  });
});

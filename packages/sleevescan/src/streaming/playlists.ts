/**
 * PlaylistBuilder: collection folders → streaming playlists.
 *
 * Two modes:
 *   append      every selected folder's albums go into one existing playlist;
 *               tracks already in it are skipped
 *   per-folder  one new private playlist per folder, named by date
 *
 * Unmatched albums and tracks are collected for the report, never retried.
 */

import type { HttpResult } from '../http/invoker.js';
import { nullSink, type EventSink } from '../shared/events.js';
import { noSleep, type Sleep } from '../shared/pacing.js';
import type { CatalogRelease, CollectionInstance, OwnerFolder } from '../shared/types.js';
import type { CreatedPlaylist, StreamingAlbum } from './client.js';
import { albumSearchQuery, cleanArtistName, pickAlbum, trackSearchQuery } from './matcher.js';

export interface PlaylistStreamingPort {
  searchAlbums(query: string, limit?: number): Promise<HttpResult<StreamingAlbum[]>>;
  searchTrack(query: string, limit?: number): Promise<HttpResult<string | null>>;
  albumTrackUris(albumId: string): Promise<HttpResult<string[]>>;
  playlistTrackUris(playlistId: string): Promise<HttpResult<Set<string>>>;
  createPlaylist(name: string, opts: { public: boolean; description: string }): Promise<HttpResult<CreatedPlaylist>>;
  addTracks(playlistId: string, uris: string[]): Promise<HttpResult<number>>;
}

export interface PlaylistCatalogPort {
  listFolders(): Promise<HttpResult<OwnerFolder[]>>;
  listFolderInstances(folderId: number): Promise<HttpResult<CollectionInstance[]>>;
  getRelease(id: number): Promise<CatalogRelease | null>;
}

export type PlaylistTarget = { mode: 'append'; playlistId: string } | { mode: 'per-folder' };

export interface AlbumEntry {
  folder: string;
  releaseId: number;
  title: string;
  artist: string;
  year: number | null;
}

export interface UnmatchedAlbum extends AlbumEntry {
  notes: string;
}

export interface UnmatchedTrack {
  folder: string;
  releaseId: number;
  album: string;
  artist: string;
  position: string;
  track: string;
  notes: string;
}

export interface PlaylistSummary {
  folder: string;
  playlistId: string;
  url: string | null;
  albums: number;
  matchedAlbums: number;
  tracksAdded: number;
  tracksSkipped: number;
}

export interface PlaylistBuildResult {
  playlists: PlaylistSummary[];
  unmatchedAlbums: UnmatchedAlbum[];
  unmatchedTracks: UnmatchedTrack[];
  errors: string[];
}

export type FolderSelection = { ok: true; folders: OwnerFolder[] } | { ok: false; error: string };

const FIRST_CUSTOM_FOLDER_ID = 2;   // 0 = All, 1 = Uncategorized
const PLAYLIST_ID = /^[A-Za-z0-9]{22}$/;

/** Playlist id from an open.spotify.com URL, a spotify: URI or a bare id. */
export function parsePlaylistId(ref: string): string | null {
  const trimmed = ref.trim();
  const fromUrl = /open\.spotify\.com\/(?:[\w-]+\/)?playlist\/([A-Za-z0-9]+)/.exec(trimmed);
  if (fromUrl) return fromUrl[1];
  const fromUri = /^spotify:playlist:([A-Za-z0-9]+)$/.exec(trimmed);
  if (fromUri) return fromUri[1];
  return PLAYLIST_ID.test(trimmed) ? trimmed : null;
}

export function playlistName(folder: string, today: Date): string {
  return `${folder} — Discogs albums (${today.toISOString().slice(0, 10)})`;
}

export class PlaylistBuilder {
  private readonly events: EventSink;
  private readonly sleep: Sleep;
  private readonly pauseMs: number;
  private readonly publicPlaylists: boolean;
  private readonly today: () => Date;

  constructor(
    private readonly streaming: PlaylistStreamingPort,
    private readonly catalog: PlaylistCatalogPort,
    opts: { publicPlaylists?: boolean; pauseMs?: number; sleep?: Sleep; events?: EventSink; today?: () => Date } = {}
  ) {
    this.events = opts.events ?? nullSink;
    this.sleep = opts.sleep ?? noSleep;
    this.pauseMs = opts.pauseMs ?? 0;
    this.publicPlaylists = opts.publicPlaylists ?? false;
    this.today = opts.today ?? (() => new Date());
  }

  /**
   * Named folder (case-insensitive) if given, else the folders named by
   * `owners`, else every custom folder.
   */
  async selectFolders(opts: { sourceFolder?: string; owners?: string[] }): Promise<FolderSelection> {
    const listed = await this.catalog.listFolders();
    if (!listed.ok) return { ok: false, error: listed.error.message };
    const folders = listed.value;

    if (opts.sourceFolder) {
      const wanted = opts.sourceFolder.toLowerCase();
      const found = folders.find((f) => f.name.toLowerCase() === wanted);
      if (!found) {
        const names = folders.map((f) => f.name).join(', ');
        return { ok: false, error: `Folder "${opts.sourceFolder}" not found. Available: ${names}` };
      }
      return { ok: true, folders: [found] };
    }

    if (opts.owners && opts.owners.length > 0) {
      const owners = new Set(opts.owners);
      return { ok: true, folders: folders.filter((f) => owners.has(f.name)) };
    }

    return { ok: true, folders: folders.filter((f) => f.id >= FIRST_CUSTOM_FOLDER_ID) };
  }

  async build(folders: OwnerFolder[], target: PlaylistTarget): Promise<PlaylistBuildResult> {
    const result: PlaylistBuildResult = { playlists: [], unmatchedAlbums: [], unmatchedTracks: [], errors: [] };

    if (target.mode === 'append') {
      const existing = await this.streaming.playlistTrackUris(target.playlistId);
      if (!existing.ok) {
        result.errors.push(`playlist ${target.playlistId}: ${existing.error.message}`);
        return result;
      }
      const albums = dedupeAlbums((await this.collectAlbums(folders, result)).flat());
      const label = folders.map((f) => f.name).join(', ');
      await this.fill(label, target.playlistId, null, albums, existing.value, result);
      return result;
    }

    const perFolder = await this.collectAlbums(folders, result);
    for (let i = 0; i < folders.length; i++) {
      const folder = folders[i];
      const albums = dedupeAlbums(perFolder[i] ?? []);
      if (albums.length === 0) continue;

      const created = await this.streaming.createPlaylist(playlistName(folder.name, this.today()), {
        public: this.publicPlaylists,
        description: `Albums from the Discogs folder "${folder.name}"`,
      });
      if (!created.ok) {
        result.errors.push(`create playlist for ${folder.name}: ${created.error.message}`);
        continue;
      }
      this.events.emit({ type: 'playlist', folder: folder.name, album: '', outcome: 'created', detail: created.value.url });
      await this.fill(folder.name, created.value.id, created.value.url, albums, new Set(), result);
    }
    return result;
  }

  // ──── Private helpers ─────────────────────────────────────────────

  private async collectAlbums(folders: OwnerFolder[], result: PlaylistBuildResult): Promise<AlbumEntry[][]> {
    const out: AlbumEntry[][] = [];
    for (const folder of folders) {
      const listing = await this.catalog.listFolderInstances(folder.id);
      if (!listing.ok) {
        result.errors.push(`folder ${folder.name}: ${listing.error.message}`);
        out.push([]);
        continue;
      }
      out.push(
        listing.value.map((i) => ({
          folder: folder.name,
          releaseId: i.releaseId,
          title: i.title,
          artist: i.artists[0] ?? '',
          year: i.year,
        }))
      );
    }
    return out;
  }

  private async fill(
    label: string,
    playlistId: string,
    url: string | null,
    albums: AlbumEntry[],
    existing: Set<string>,
    result: PlaylistBuildResult
  ): Promise<void> {
    const summary: PlaylistSummary = {
      folder: label,
      playlistId,
      url,
      albums: albums.length,
      matchedAlbums: 0,
      tracksAdded: 0,
      tracksSkipped: 0,
    };
    const pending: string[] = [];
    const queued = new Set<string>();

    for (const album of albums) {
      const uris = await this.tracksFor(album, result);
      if (uris.length > 0) summary.matchedAlbums++;
      for (const uri of uris) {
        if (existing.has(uri) || queued.has(uri)) {
          summary.tracksSkipped++;
          continue;
        }
        queued.add(uri);
        pending.push(uri);
      }
      await this.sleep(this.pauseMs);
    }

    if (pending.length > 0) {
      const added = await this.streaming.addTracks(playlistId, pending);
      if (added.ok) summary.tracksAdded = added.value;
      else result.errors.push(`add tracks to ${playlistId}: ${added.error.message}`);
    }
    result.playlists.push(summary);
  }

  /** Album match first; per-track search over the catalog tracklist otherwise. */
  private async tracksFor(album: AlbumEntry, result: PlaylistBuildResult): Promise<string[]> {
    const label = `${album.artist} - ${album.title}`;
    const search = await this.streaming.searchAlbums(albumSearchQuery(album));
    const picked = search.ok ? pickAlbum(search.value, album) : null;

    if (picked) {
      const tracks = await this.streaming.albumTrackUris(picked.id);
      if (tracks.ok && tracks.value.length > 0) {
        this.events.emit({ type: 'playlist', folder: album.folder, album: label, outcome: 'added', detail: `${tracks.value.length} tracks` });
        return tracks.value;
      }
    }

    const release = await this.catalog.getRelease(album.releaseId);
    const tracklist = release?.tracklist ?? [];
    if (tracklist.length === 0) {
      result.unmatchedAlbums.push({ ...album, notes: search.ok ? 'no album match; no tracklist' : `album search failed: ${search.error.message}` });
      this.events.emit({ type: 'playlist', folder: album.folder, album: label, outcome: 'skipped', detail: 'no album match' });
      return [];
    }

    const artist = cleanArtistName(album.artist);
    const uris: string[] = [];
    for (const track of tracklist) {
      const uri =
        (await this.firstTrack(trackSearchQuery(track.title, artist, album.title))) ??
        (await this.firstTrack(trackSearchQuery(track.title, artist)));
      if (uri) {
        uris.push(uri);
      } else {
        result.unmatchedTracks.push({
          folder: album.folder,
          releaseId: album.releaseId,
          album: album.title,
          artist: album.artist,
          position: track.position,
          track: track.title,
          notes: 'no track match',
        });
      }
    }

    if (uris.length === 0) {
      result.unmatchedAlbums.push({ ...album, notes: `no album match; 0/${tracklist.length} tracks found` });
      this.events.emit({ type: 'playlist', folder: album.folder, album: label, outcome: 'skipped', detail: 'no tracks found' });
    } else {
      this.events.emit({
        type: 'playlist',
        folder: album.folder,
        album: label,
        outcome: 'added',
        detail: `${uris.length}/${tracklist.length} tracks by track search`,
      });
    }
    return uris;
  }

  private async firstTrack(query: string): Promise<string | null> {
    const res = await this.streaming.searchTrack(query);
    return res.ok ? res.value : null;
  }
}

/** Drop repeats by lower-cased (title, artist); first occurrence wins. */
export function dedupeAlbums(albums: AlbumEntry[]): AlbumEntry[] {
  const seen = new Set<string>();
  return albums.filter((a) => {
    const key = `${a.title.toLowerCase()}\u0000${cleanArtistName(a.artist).toLowerCase()}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

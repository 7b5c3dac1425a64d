/**
 * Spotify Web API client
 * Refresh-token OAuth; every call goes through the resilient invoker.
 */

import type { HttpInvoker, HttpResult } from '../http/invoker.js';
import { noSleep, type Sleep } from '../shared/pacing.js';
import type { SleevescanConfig } from '../shared/types.js';
import type {
  SpotifyAlbum,
  SpotifyPaging,
  SpotifyPlaylist,
  SpotifyPlaylistItem,
  SpotifySearchResponse,
  SpotifyTokenResponse,
  SpotifyTrack,
  SpotifyUser,
} from './types.js';

export const ADD_BATCH_SIZE = 100;
const TOKEN_SLACK_MS = 60_000;

export interface StreamingAlbum {
  id: string;
  name: string;
  artists: string[];
  releaseYear: number | null;
}

export interface CreatedPlaylist {
  id: string;
  url: string;
}

export function releaseYear(releaseDate: string | undefined): number | null {
  const year = Number.parseInt((releaseDate ?? '').slice(0, 4), 10);
  return Number.isFinite(year) ? year : null;
}

function toAlbum(raw: SpotifyAlbum): StreamingAlbum {
  return {
    id: raw.id,
    name: raw.name ?? '',
    artists: (raw.artists ?? []).map((a) => a.name),
    releaseYear: releaseYear(raw.release_date),
  };
}

export class StreamingClient {
  private readonly apiUrl: string;
  private readonly accountsUrl: string;
  private readonly credentials: { clientId: string; clientSecret: string; refreshToken: string };
  private readonly batchPauseMs: number;
  private readonly invoker: HttpInvoker;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  private token: { value: string; expiresAt: number } | null = null;
  private userId: string | null = null;

  constructor(
    config: SleevescanConfig,
    opts: { invoker: HttpInvoker; sleep?: Sleep; now?: () => number }
  ) {
    const s = config.streaming;
    this.apiUrl = s.apiUrl;
    this.accountsUrl = s.accountsUrl;
    this.credentials = { clientId: s.clientId, clientSecret: s.clientSecret, refreshToken: s.refreshToken };
    this.batchPauseMs = config.pacing.playlistBatchMs;
    this.invoker = opts.invoker;
    this.sleep = opts.sleep ?? noSleep;
    this.now = opts.now ?? Date.now;
  }

  // ──── Search ──────────────────────────────────────────────────────

  async searchAlbums(query: string, limit = 20): Promise<HttpResult<StreamingAlbum[]>> {
    const res = await this.get<SpotifySearchResponse>('/search', { q: query, type: 'album', limit });
    if (!res.ok) return res;
    return { ok: true, value: (res.value.albums?.items ?? []).map(toAlbum), status: res.status };
  }

  /** URI of the top track hit, or null. */
  async searchTrack(query: string, limit = 5): Promise<HttpResult<string | null>> {
    const res = await this.get<SpotifySearchResponse>('/search', { q: query, type: 'track', limit });
    if (!res.ok) return res;
    const first = res.value.tracks?.items?.[0];
    return { ok: true, value: first?.uri ?? null, status: res.status };
  }

  async albumTrackUris(albumId: string): Promise<HttpResult<string[]>> {
    return this.drain<SpotifyTrack>(`${this.apiUrl}/albums/${encodeURIComponent(albumId)}/tracks?limit=50`, (t) => t.uri);
  }

  // ──── Playlists ───────────────────────────────────────────────────

  async playlistTrackUris(playlistId: string): Promise<HttpResult<Set<string>>> {
    const res = await this.drain<SpotifyPlaylistItem>(
      `${this.apiUrl}/playlists/${encodeURIComponent(playlistId)}/tracks?limit=100&fields=items(track(uri)),next`,
      (item) => item.track?.uri ?? null
    );
    if (!res.ok) return res;
    return { ok: true, value: new Set(res.value), status: res.status };
  }

  async createPlaylist(name: string, opts: { public: boolean; description: string }): Promise<HttpResult<CreatedPlaylist>> {
    const user = await this.currentUserId();
    if (!user.ok) return user;

    const auth = await this.authHeaders();
    if (!auth.ok) return auth;
    const res = await this.invoker.request<SpotifyPlaylist>({
      method: 'POST',
      url: `${this.apiUrl}/users/${encodeURIComponent(user.value)}/playlists`,
      headers: auth.value,
      json: { name, public: opts.public, description: opts.description },
    });
    if (!res.ok) return res;
    return {
      ok: true,
      value: { id: res.value.id, url: res.value.external_urls?.spotify ?? `https://open.spotify.com/playlist/${res.value.id}` },
      status: res.status,
    };
  }

  /** Appends in batches of 100, pausing between batches. Returns how many were sent. */
  async addTracks(playlistId: string, uris: string[]): Promise<HttpResult<number>> {
    let sent = 0;
    for (let i = 0; i < uris.length; i += ADD_BATCH_SIZE) {
      const batch = uris.slice(i, i + ADD_BATCH_SIZE);
      const auth = await this.authHeaders();
      if (!auth.ok) return auth;
      const res = await this.invoker.send({
        method: 'POST',
        url: `${this.apiUrl}/playlists/${encodeURIComponent(playlistId)}/tracks`,
        headers: auth.value,
        json: { uris: batch },
      });
      if (!res.ok) return res;
      sent += batch.length;
      if (i + ADD_BATCH_SIZE < uris.length) await this.sleep(this.batchPauseMs);
    }
    return { ok: true, value: sent, status: 201 };
  }

  async currentUserId(): Promise<HttpResult<string>> {
    if (this.userId) return { ok: true, value: this.userId, status: 200 };
    const res = await this.get<SpotifyUser>('/me');
    if (!res.ok) return res;
    this.userId = res.value.id;
    return { ok: true, value: res.value.id, status: res.status };
  }

  // ──── Private helpers ─────────────────────────────────────────────

  private async authHeaders(): Promise<HttpResult<Record<string, string>>> {
    if (!this.token || this.now() >= this.token.expiresAt) {
      const basic = Buffer.from(`${this.credentials.clientId}:${this.credentials.clientSecret}`).toString('base64');
      const res = await this.invoker.request<SpotifyTokenResponse>({
        method: 'POST',
        url: `${this.accountsUrl}/api/token`,
        headers: { Authorization: `Basic ${basic}` },
        form: { grant_type: 'refresh_token', refresh_token: this.credentials.refreshToken },
      });
      if (!res.ok) return res;
      this.token = {
        value: res.value.access_token,
        expiresAt: this.now() + res.value.expires_in * 1000 - TOKEN_SLACK_MS,
      };
    }
    return { ok: true, value: { Authorization: `Bearer ${this.token.value}` }, status: 200 };
  }

  private async get<T>(apiPath: string, query: Record<string, string | number> = {}): Promise<HttpResult<T>> {
    const auth = await this.authHeaders();
    if (!auth.ok) return auth;
    return this.invoker.request<T>({ url: `${this.apiUrl}${apiPath}`, query, headers: auth.value });
  }

  /** Follow `next` links until the listing is exhausted. */
  private async drain<T>(firstUrl: string, pick: (item: T) => string | null): Promise<HttpResult<string[]>> {
    const out: string[] = [];
    let url: string | null = firstUrl;
    while (url) {
      const auth = await this.authHeaders();
      if (!auth.ok) return auth;
      const res: HttpResult<SpotifyPaging<T>> = await this.invoker.request<SpotifyPaging<T>>({ url, headers: auth.value });
      if (!res.ok) return res;
      for (const item of res.value.items ?? []) {
        const value = pick(item);
        if (value) out.push(value);
      }
      url = res.value.next ?? null;
    }
    return { ok: true, value: out, status: 200 };
  }
}

/**
 * Spotify Web API shapes (only the fields we read).
 */

export interface SpotifyArtist {
  id?: string;
  name: string;
}

export interface SpotifyAlbum {
  id: string;
  name: string;
  uri?: string;
  album_type?: string;
  release_date?: string;
  artists: SpotifyArtist[];
}

export interface SpotifyTrack {
  id: string;
  name: string;
  uri: string;
}

export interface SpotifyPaging<T> {
  items: T[];
  next: string | null;
  total?: number;
}

export interface SpotifySearchResponse {
  albums?: SpotifyPaging<SpotifyAlbum>;
  tracks?: SpotifyPaging<SpotifyTrack>;
}

export interface SpotifyPlaylistItem {
  track: { uri?: string | null } | null;
}

export interface SpotifyPlaylist {
  id: string;
  name: string;
  external_urls?: { spotify?: string };
}

export interface SpotifyUser {
  id: string;
}

export interface SpotifyTokenResponse {
  access_token: string;
  token_type: string;
  expires_in: number;
}

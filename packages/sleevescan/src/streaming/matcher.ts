/**
 * Album matching heuristics for the streaming catalog.
 */

import type { StreamingAlbum } from './client.js';

const DISAMBIGUATION_SUFFIX = /\s*\(\d+\)\s*$/;
const DELUXE_TITLE = /deluxe|special|expanded|remastered/i;
const DELUXE_ALBUM = /deluxe|special edition|expanded/i;
const YEAR_WINDOW = 2;

export interface AlbumQuery {
  title: string;
  artist: string;
  year: number | null;
}

/** "Nirvana (2)" → "Nirvana" */
export function cleanArtistName(name: string): string {
  return name.replace(DISAMBIGUATION_SUFFIX, '').trim();
}

function quoted(value: string): string {
  return `"${value.replace(/"/g, '')}"`;
}

export function albumSearchQuery(q: AlbumQuery): string {
  return `album:${quoted(q.title)} artist:${quoted(cleanArtistName(q.artist))}`;
}

export function trackSearchQuery(track: string, artist: string, album?: string): string {
  const parts = [`track:${quoted(track)}`, `artist:${quoted(cleanArtistName(artist))}`];
  if (album) parts.push(`album:${quoted(album)}`);
  return parts.join(' ');
}

/**
 * Case-insensitive exact title match with the artist among the album's
 * artists. "Nevermind (Deluxe Edition)" is not a match for "Nevermind".
 * Ties: closest release year within ±2, then edition (plain unless the
 * catalog title itself names a deluxe/special/expanded edition), then search
 * order.
 */
export function pickAlbum(albums: StreamingAlbum[], q: AlbumQuery): StreamingAlbum | null {
  const title = q.title.trim().toLowerCase();
  const artist = cleanArtistName(q.artist).toLowerCase();

  const exact = albums.filter(
    (a) => a.name.trim().toLowerCase() === title && a.artists.some((n) => n.trim().toLowerCase() === artist)
  );
  if (exact.length <= 1) return exact[0] ?? null;

  if (q.year !== null) {
    const year = q.year;
    let best: StreamingAlbum | null = null;
    let bestDiff = Number.POSITIVE_INFINITY;
    for (const album of exact) {
      if (album.releaseYear === null) continue;
      const diff = Math.abs(album.releaseYear - year);
      if (diff <= YEAR_WINDOW && diff < bestDiff) {
        best = album;
        bestDiff = diff;
      }
    }
    if (best) return best;
  }

  const wantsDeluxe = DELUXE_TITLE.test(q.title);
  const edition = exact.find((a) => DELUXE_ALBUM.test(a.name) === wantsDeluxe);
  return edition ?? exact[0];
}

/**
 * CSV exports: records.csv (one row per image) and the playlist builder's
 * unmatched albums / tracks. Quoting follows RFC 4180.
 */

import fs from 'node:fs';
import path from 'node:path';

import type { UnmatchedAlbum, UnmatchedTrack } from '../streaming/playlists.js';
import type { MatchResult } from '../shared/types.js';

type Cell = string | number | boolean | null | undefined;

export const RECORD_COLUMNS = [
  'owner',
  'image_filename',
  'image_locator',
  'status',
  'confidence_level',
  'match_method',
  'release_id',
  'release_url',
  'candidate_source',
  'has_catalog_candidate',
  'catalog_candidates_top',
  'other_candidates_top',
  'artist_hint',
  'album_hint',
  'best_guess_label',
  'error_message',
  'match_reason',
  'already_in_collection',
] as const;

export type RecordColumn = (typeof RECORD_COLUMNS)[number];

const UNMATCHED_ALBUM_COLUMNS = ['folder_name', 'release_id', 'album_title', 'artist_name', 'year', 'notes'];
const UNMATCHED_TRACK_COLUMNS = ['folder_name', 'release_id', 'album_title', 'artist_name', 'track_position', 'track_title', 'notes'];

export function escapeCsv(value: Cell): string {
  if (value === null || value === undefined) return '';
  const str = String(value);
  if (/[",\r\n]/.test(str)) return `"${str.replace(/"/g, '""')}"`;
  return str;
}

export function toCsv(header: readonly string[], rows: Cell[][]): string {
  return [header, ...rows].map((row) => row.map(escapeCsv).join(',')).join('\r\n') + '\r\n';
}

/** RFC 4180 reader: quoted fields may hold commas, quotes ("") and newlines. */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        field += ch;
      }
      continue;
    }
    if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }
  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

export function matchResultToRow(m: MatchResult): Record<RecordColumn, Cell> {
  return {
    owner: m.owner,
    image_filename: m.filename,
    image_locator: m.locator,
    status: m.status,
    confidence_level: m.confidence,
    match_method: m.method,
    release_id: m.releaseId,
    release_url: m.releaseUrl,
    candidate_source: m.candidateSource,
    has_catalog_candidate: m.candidateSource === 'catalog',
    catalog_candidates_top: m.catalogCandidates.length ? m.catalogCandidates.join('; ') : null,
    other_candidates_top: m.otherCandidates.length ? m.otherCandidates.join('; ') : null,
    artist_hint: m.hint.artist,
    album_hint: m.hint.album,
    best_guess_label: m.bestGuessLabel,
    error_message: m.errorMessage,
    match_reason: m.releaseId !== null ? m.reason : null,
    already_in_collection: m.alreadyInCollection,
  };
}

export function recordsCsv(results: MatchResult[]): string {
  return toCsv(
    RECORD_COLUMNS,
    results.map((m) => {
      const row = matchResultToRow(m);
      return RECORD_COLUMNS.map((c) => row[c]);
    })
  );
}

export function unmatchedAlbumsCsv(albums: UnmatchedAlbum[]): string {
  return toCsv(
    UNMATCHED_ALBUM_COLUMNS,
    albums.map((a) => [a.folder, a.releaseId, a.title, a.artist, a.year, a.notes])
  );
}

export function unmatchedTracksCsv(tracks: UnmatchedTrack[]): string {
  return toCsv(
    UNMATCHED_TRACK_COLUMNS,
    tracks.map((t) => [t.folder, t.releaseId, t.album, t.artist, t.position, t.track, t.notes])
  );
}

export interface FilingEntry {
  releaseId: number;
  owner: string;
}

/**
 * Matched rows of a records.csv with a release id and an owner, one entry per
 * release (last row wins).
 */
export function filingPlanFromCsv(text: string): FilingEntry[] {
  const [header, ...rows] = parseCsv(text);
  if (!header) return [];
  const col = (name: RecordColumn): number => header.indexOf(name);
  const statusCol = col('status');
  const idCol = col('release_id');
  const ownerCol = col('owner');
  if (statusCol < 0 || idCol < 0 || ownerCol < 0) return [];

  const byRelease = new Map<number, string>();
  for (const row of rows) {
    if (row[statusCol] !== 'matched') continue;
    const id = Number.parseInt(row[idCol] ?? '', 10);
    const owner = row[ownerCol] ?? '';
    if (!Number.isFinite(id) || !owner) continue;
    byRelease.set(id, owner);
  }
  return [...byRelease].map(([releaseId, owner]) => ({ releaseId, owner }));
}

/** tmp file + rename; readers never see a partial file. */
export function writeFileAtomic(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp`;
  fs.writeFileSync(tmp, content, 'utf8');
  fs.renameSync(tmp, filePath);
}

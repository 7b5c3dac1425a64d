/**
 * sleevescan DB client
 * Typed wrappers around better-sqlite3 for runs and per-image resolutions.
 */

import fs from 'node:fs';
import path from 'node:path';

import BetterSqlite3 from 'better-sqlite3';
import type Database from 'better-sqlite3';

import type {
  CandidateSource,
  Confidence,
  MatchResult,
  MatchStatus,
  ResolutionMethod,
} from '../shared/types.js';
import { applySchema } from './schema.js';

export interface RunRow {
  id: number;
  command: string;
  prefix: string | null;
  started_at: string;
  finished_at: string | null;
  images: number;
  matched: number;
  needs_review: number;
  added: number;
  filed: number;
  failures: number;
}

export interface MatchRow {
  locator: string;
  run_id: number;
  filename: string;
  owner: string;
  status: string;
  confidence: string;
  method: string;
  release_id: number | null;
  release_url: string | null;
  is_target_format: number;
  is_preferred_region: number;
  candidate_source: string;
  catalog_candidates: string;
  other_candidates: string;
  artist_hint: string | null;
  album_hint: string | null;
  best_guess_label: string | null;
  reason: string;
  error_message: string | null;
  already_in_collection: number;
  updated_at: string;
}

export type RunCounts = Partial<Pick<RunRow, 'images' | 'matched' | 'needs_review' | 'added' | 'filed' | 'failures'>>;

const STATUSES: readonly MatchStatus[] = ['matched', 'needs_review'];
const CONFIDENCES: readonly Confidence[] = ['high', 'medium', 'low', 'very_low', 'unknown'];
const METHODS: readonly ResolutionMethod[] = ['direct-release-url', 'resolved-master-url', 'text-search-fallback', 'none'];
const SOURCES: readonly CandidateSource[] = ['catalog', 'other', 'none'];

function oneOf<T extends string>(allowed: readonly T[], value: string, fallback: T): T {
  return allowed.find((a) => a === value) ?? fallback;
}

function jsonList(value: string): string[] {
  const parsed: unknown = JSON.parse(value || '[]');
  return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : [];
}

export function rowToMatch(row: MatchRow): MatchResult {
  return {
    locator: row.locator,
    filename: row.filename,
    owner: row.owner,
    status: oneOf(STATUSES, row.status, 'needs_review'),
    confidence: oneOf(CONFIDENCES, row.confidence, 'unknown'),
    method: oneOf(METHODS, row.method, 'none'),
    releaseId: row.release_id,
    releaseUrl: row.release_url,
    isTargetFormat: row.is_target_format === 1,
    isPreferredRegion: row.is_preferred_region === 1,
    candidateSource: oneOf(SOURCES, row.candidate_source, 'none'),
    catalogCandidates: jsonList(row.catalog_candidates),
    otherCandidates: jsonList(row.other_candidates),
    hint: { artist: row.artist_hint, album: row.album_hint },
    bestGuessLabel: row.best_guess_label,
    reason: row.reason,
    errorMessage: row.error_message,
    alreadyInCollection: row.already_in_collection === 1,
  };
}

export class SleevescanDb {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    }
    this.db = new BetterSqlite3(dbPath);
    applySchema(this.db);
  }

  // ──────────────────────────────────────────────────────────────────
  // Runs
  // ──────────────────────────────────────────────────────────────────

  startRun(command: string, prefix: string | null = null): number {
    const result = this.db.prepare('INSERT INTO runs (command, prefix) VALUES (?, ?)').run(command, prefix);
    return Number(result.lastInsertRowid);
  }

  finishRun(id: number, counts: RunCounts): void {
    this.db.prepare(`
      UPDATE runs SET
        finished_at  = datetime('now'),
        images       = ?,
        matched      = ?,
        needs_review = ?,
        added        = ?,
        filed        = ?,
        failures     = ?
      WHERE id = ?
    `).run(
      counts.images ?? 0,
      counts.matched ?? 0,
      counts.needs_review ?? 0,
      counts.added ?? 0,
      counts.filed ?? 0,
      counts.failures ?? 0,
      id
    );
  }

  getRun(id: number): RunRow | undefined {
    return this.db.prepare<[number], RunRow>('SELECT * FROM runs WHERE id = ?').get(id);
  }

  /** Most recent run that produced resolutions. */
  latestIntakeRun(): RunRow | undefined {
    return this.db
      .prepare<[], RunRow>(
        `SELECT * FROM runs WHERE id IN (SELECT DISTINCT run_id FROM matches) ORDER BY id DESC LIMIT 1`
      )
      .get();
  }

  // ──────────────────────────────────────────────────────────────────
  // Matches
  // ──────────────────────────────────────────────────────────────────

  upsertMatch(runId: number, m: MatchResult): void {
    this.db.prepare(`
      INSERT INTO matches (
        locator, run_id, filename, owner, status, confidence, method,
        release_id, release_url, is_target_format, is_preferred_region,
        candidate_source, catalog_candidates, other_candidates,
        artist_hint, album_hint, best_guess_label, reason, error_message,
        already_in_collection
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(locator) DO UPDATE SET
        run_id                = excluded.run_id,
        filename              = excluded.filename,
        owner                 = excluded.owner,
        status                = excluded.status,
        confidence            = excluded.confidence,
        method                = excluded.method,
        release_id            = excluded.release_id,
        release_url           = excluded.release_url,
        is_target_format      = excluded.is_target_format,
        is_preferred_region   = excluded.is_preferred_region,
        candidate_source      = excluded.candidate_source,
        catalog_candidates    = excluded.catalog_candidates,
        other_candidates      = excluded.other_candidates,
        artist_hint           = excluded.artist_hint,
        album_hint            = excluded.album_hint,
        best_guess_label      = excluded.best_guess_label,
        reason                = excluded.reason,
        error_message         = excluded.error_message,
        already_in_collection = excluded.already_in_collection,
        updated_at            = datetime('now')
    `).run(
      m.locator,
      runId,
      m.filename,
      m.owner,
      m.status,
      m.confidence,
      m.method,
      m.releaseId,
      m.releaseUrl,
      m.isTargetFormat ? 1 : 0,
      m.isPreferredRegion ? 1 : 0,
      m.candidateSource,
      JSON.stringify(m.catalogCandidates),
      JSON.stringify(m.otherCandidates),
      m.hint.artist,
      m.hint.album,
      m.bestGuessLabel,
      m.reason,
      m.errorMessage,
      m.alreadyInCollection ? 1 : 0
    );
  }

  upsertMatches(runId: number, results: MatchResult[]): void {
    const tx = this.db.transaction((rows: MatchResult[]) => {
      for (const r of rows) this.upsertMatch(runId, r);
    });
    tx(results);
  }

  getMatches(filter: { runId?: number; status?: MatchStatus } = {}): MatchResult[] {
    const where: string[] = [];
    const params: Array<string | number> = [];
    if (filter.runId !== undefined) {
      where.push('run_id = ?');
      params.push(filter.runId);
    }
    if (filter.status) {
      where.push('status = ?');
      params.push(filter.status);
    }
    const sql = `SELECT * FROM matches ${where.length ? `WHERE ${where.join(' AND ')}` : ''} ORDER BY owner, filename`;
    return this.db.prepare<Array<string | number>, MatchRow>(sql).all(...params).map(rowToMatch);
  }

  countByStatus(runId?: number): Record<MatchStatus, number> {
    const rows = runId !== undefined
      ? this.db.prepare<[number], { status: string; n: number }>(
          'SELECT status, COUNT(*) as n FROM matches WHERE run_id = ? GROUP BY status'
        ).all(runId)
      : this.db.prepare<[], { status: string; n: number }>(
          'SELECT status, COUNT(*) as n FROM matches GROUP BY status'
        ).all();
    const out: Record<MatchStatus, number> = { matched: 0, needs_review: 0 };
    for (const r of rows) out[oneOf(STATUSES, r.status, 'needs_review')] += r.n;
    return out;
  }

  close(): void {
    this.db.close();
  }
}

/**
 * Console summaries for runs, review lists and playlist builds.
 */

import { dim, green, yellow } from 'colorette';

import type { RunRow, SleevescanDb } from '../db/client.js';
import type { MatchResult } from '../shared/types.js';
import type { PlaylistBuildResult } from '../streaming/playlists.js';

export function banner(title: string): string {
  return `\n── ${title} ${'─'.repeat(Math.max(4, 58 - title.length))}`;
}

function truncate(value: string, width: number): string {
  return value.length > width ? `${value.slice(0, width - 1)}…` : value;
}

// ──────────────────────────────────────────────────────────────────
// Runs
// ──────────────────────────────────────────────────────────────────

export function printRun(run: RunRow): void {
  console.log(banner(`Run #${run.id} (${run.command})`));
  console.log(`  Prefix       : ${run.prefix ?? '—'}`);
  console.log(`  Started      : ${run.started_at}`);
  console.log(`  Finished     : ${run.finished_at ?? 'running'}`);
  console.log(`  Images       : ${run.images}`);
  console.log(`  Matched      : ${run.matched}`);
  console.log(`  Needs review : ${run.needs_review}`);
  console.log(`  Added        : ${run.added}`);
  console.log(`  Filed        : ${run.filed}`);
  console.log(`  Failures     : ${run.failures}`);
}

export function printConfidence(results: MatchResult[]): void {
  const counts = new Map<string, number>();
  for (const r of results) counts.set(r.confidence, (counts.get(r.confidence) ?? 0) + 1);

  console.log(banner('Confidence'));
  for (const level of ['high', 'medium', 'low', 'very_low', 'unknown']) {
    const n = counts.get(level) ?? 0;
    const bar = '█'.repeat(Math.round((n / Math.max(1, results.length)) * 30));
    console.log(`  ${level.padEnd(9)} ${String(n).padStart(5)}  ${bar}`);
  }
}

export function printReviewList(results: MatchResult[], limit = 50): void {
  const review = results.filter((r) => r.status === 'needs_review');
  if (review.length === 0) {
    console.log(green('\n  Nothing needs review.'));
    return;
  }

  console.log(banner(`Needs Review (${review.length})`));
  console.log('  ' + 'Owner'.padEnd(14) + 'Image'.padEnd(30) + 'Hint'.padEnd(36) + 'Reason');
  console.log('  ' + '─'.repeat(110));
  for (const r of review.slice(0, limit)) {
    const hint = [r.hint.artist, r.hint.album].filter(Boolean).join(' / ') || r.bestGuessLabel || '';
    console.log(
      '  ' +
      truncate(r.owner || '—', 13).padEnd(14) +
      truncate(r.filename, 29).padEnd(30) +
      truncate(hint, 35).padEnd(36) +
      dim(r.errorMessage ?? r.reason)
    );
    const candidates = r.catalogCandidates.length ? r.catalogCandidates : r.otherCandidates;
    if (candidates.length) console.log(dim(`      ${candidates.join('  ')}`));
  }
  if (review.length > limit) console.log(dim(`  … ${review.length - limit} more (see the CSV report)`));
}

/** Dry-run listing: every resolution with its release, or its hints. */
export function printTestMatches(results: MatchResult[]): void {
  console.log(banner(`Match Preview (${results.length})`));
  results.forEach((r, i) => {
    console.log(`\n  ${i + 1}. ${r.filename}`);
    console.log(`     Status     : ${r.status === 'matched' ? green(r.status) : yellow(r.status)}`);
    console.log(`     Confidence : ${r.confidence}`);
    if (r.releaseId !== null) {
      console.log(`     Release    : ${r.releaseId}`);
      console.log(`     URL        : ${r.releaseUrl ?? '—'}`);
      console.log(`     Reason     : ${r.reason}`);
    } else {
      console.log(`     Artist hint: ${r.hint.artist ?? '—'}`);
      console.log(`     Album hint : ${r.hint.album ?? '—'}`);
      if (r.catalogCandidates.length) console.log(`     Candidates : ${r.catalogCandidates.join('; ')}`);
    }
  });
  console.log('');
}

export function printStoredRun(db: SleevescanDb, runId?: number): boolean {
  const run = runId !== undefined ? db.getRun(runId) : db.latestIntakeRun();
  if (!run) return false;
  const results = db.getMatches({ runId: run.id });
  printRun(run);
  printConfidence(results);
  printReviewList(results);
  console.log('');
  return true;
}

// ──────────────────────────────────────────────────────────────────
// Playlists
// ──────────────────────────────────────────────────────────────────

export function printPlaylistSummary(result: PlaylistBuildResult): void {
  console.log(banner('Playlists'));
  for (const p of result.playlists) {
    console.log(
      `  ${truncate(p.folder, 28).padEnd(30)} albums ${p.matchedAlbums}/${p.albums}` +
      `  tracks +${p.tracksAdded}` +
      (p.tracksSkipped ? dim(` (${p.tracksSkipped} already present)`) : '')
    );
    console.log(dim(`    ${p.url ?? `https://open.spotify.com/playlist/${p.playlistId}`}`));
  }
  console.log(`  Unmatched albums : ${result.unmatchedAlbums.length}`);
  console.log(`  Unmatched tracks : ${result.unmatchedTracks.length}`);
  for (const e of result.errors) console.log(yellow(`  ⚠ ${e}`));
  console.log('');
}

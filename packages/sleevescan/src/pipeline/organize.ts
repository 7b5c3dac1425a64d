/**
 * Folder organization: file each matched release into its owner's folder.
 * Re-runnable; releases already filed are left alone.
 */

import type { FileOutcome, ReconciliationEngine } from '../reconcile/engine.js';
import type { FilingEntry } from '../report/csv.js';
import { nullSink, type EventSink } from '../shared/events.js';
import type { MatchResult } from '../shared/types.js';

export type OrganizeSummary = Record<FileOutcome, number> & { releases: number };

/** One entry per matched release with an owner; a later row for the same release wins. */
export function filingPlan(results: MatchResult[]): FilingEntry[] {
  const byRelease = new Map<number, string>();
  for (const r of results) {
    if (r.status !== 'matched' || r.releaseId === null || !r.owner) continue;
    byRelease.set(r.releaseId, r.owner);
  }
  return [...byRelease].map(([releaseId, owner]) => ({ releaseId, owner }));
}

export async function organize(
  plan: FilingEntry[],
  engine: Pick<ReconciliationEngine, 'ensureFiled'>,
  events: EventSink = nullSink
): Promise<OrganizeSummary> {
  const summary: OrganizeSummary = {
    releases: plan.length,
    filed: 0,
    'already-filed': 0,
    'not-found': 0,
    skipped: 0,
    failed: 0,
  };

  const owners = [...new Set(plan.map((p) => p.owner))].sort();
  events.emit({ type: 'info', message: `Filing ${plan.length} releases for ${owners.length} owners: ${owners.join(', ')}` });

  for (const entry of plan) {
    const result = await engine.ensureFiled(entry.releaseId, entry.owner);
    summary[result.outcome]++;
  }
  return summary;
}

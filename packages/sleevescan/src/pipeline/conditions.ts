/**
 * Condition back-fill: every instance in the collection gets the default
 * media / sleeve condition where that field is blank.
 */

import type { HttpResult } from '../http/invoker.js';
import { ALL_FOLDERS_ID, type ConditionOutcome, type ReconciliationEngine } from '../reconcile/engine.js';
import { describeError } from '../shared/errors.js';
import { nullSink, type EventSink } from '../shared/events.js';
import { noSleep, type Sleep } from '../shared/pacing.js';
import type { CollectionInstance } from '../shared/types.js';

export type ConditionSummary = Record<ConditionOutcome, number> & { instances: number };

export interface ConditionDeps {
  collection: { listFolderInstances(folderId: number): Promise<HttpResult<CollectionInstance[]>> };
  engine: Pick<ReconciliationEngine, 'ensureConditionsSet'>;
  events?: EventSink;
  sleep?: Sleep;
  pauseMs?: number;
}

/** Returns null when the collection cannot be listed at all. */
export async function backfillConditions(deps: ConditionDeps): Promise<ConditionSummary | null> {
  const events = deps.events ?? nullSink;
  const sleep = deps.sleep ?? noSleep;

  const listing = await deps.collection.listFolderInstances(ALL_FOLDERS_ID);
  if (!listing.ok) {
    events.emit({ type: 'warn', message: `cannot list collection: ${listing.error.message}` });
    return null;
  }

  const instances = listing.value;
  const summary: ConditionSummary = { instances: instances.length, updated: 0, 'already-set': 0, skipped: 0, failed: 0 };
  events.emit({ type: 'info', message: `Checking conditions on ${instances.length} instances` });

  for (let i = 0; i < instances.length; i++) {
    const instance = instances[i];
    let outcome: ConditionOutcome;
    try {
      outcome = (await deps.engine.ensureConditionsSet(instance)).outcome;
    } catch (err) {
      outcome = 'failed';
      events.emit({ type: 'warn', message: `instance ${instance.instanceId}: ${describeError(err)}` });
    }
    summary[outcome]++;
    events.emit({ type: 'progress', phase: 'conditions', done: i + 1, total: instances.length });
    // pause after calls that wrote or tried to
    if ((outcome === 'updated' || outcome === 'failed') && i + 1 < instances.length) await sleep(deps.pauseMs ?? 0);
  }
  return summary;
}

/**
 * Intake workflow: images in storage → catalog releases in the collection.
 *
 *   list → label (cached) → resolve → dedup → persist report
 *        → ensureInCollection → ensureFiled → condition back-fill
 *
 * Per-image and per-release failures become report rows and events; only a
 * failed listing or a storage credential problem aborts the run.
 */

import type { HttpResult } from '../http/invoker.js';
import type { LabelCache } from '../labels/cache.js';
import type { ImageBytes, LabelService } from '../labels/vision.js';
import type { MatchResolver } from '../matching/resolver.js';
import type { ReconciliationEngine } from '../reconcile/engine.js';
import type { SleevescanDb } from '../db/client.js';
import { recordsCsv, writeFileAtomic, type FilingEntry } from '../report/csv.js';
import { describeError } from '../shared/errors.js';
import { nullSink, type EventSink } from '../shared/events.js';
import { noSleep, type Sleep } from '../shared/pacing.js';
import type { ImageRecord, LabelResult, MatchResult, SleevescanConfig } from '../shared/types.js';
import { toBlobStoreError, type BlobStore } from '../storage/blobStore.js';
import { toImageRecord } from '../storage/owner.js';
import { backfillConditions, type ConditionDeps, type ConditionSummary } from './conditions.js';

export interface IntakeDeps {
  config: SleevescanConfig;
  blobs: BlobStore;
  labels: LabelService;
  labelCache: LabelCache;
  resolver: Pick<MatchResolver, 'resolve'>;
  catalog: { collectionReleaseIds(): Promise<HttpResult<Set<number>>> };
  engine: Pick<ReconciliationEngine, 'ensureInCollection' | 'ensureFiled' | 'ensureConditionsSet'>;
  collection: ConditionDeps['collection'];
  db: SleevescanDb | null;
  events?: EventSink;
  sleep?: Sleep;
}

export interface IntakeOptions {
  prefix: string;
  limit?: number;
  dryRun?: boolean;
  skipConditions?: boolean;
}

export interface IntakeSummary {
  runId: number | null;
  images: number;
  matched: number;
  needsReview: number;
  alreadyOwned: number;
  added: number;
  present: number;
  filed: number;
  failures: number;
  cachedLabels: number;
  conditions: ConditionSummary | null;
  results: MatchResult[];
}

/**
 * Matched releases not yet owned, one per release (a later image wins the
 * owner). Rows without an owner are still added; filing skips them.
 */
export function addPlan(results: MatchResult[]): FilingEntry[] {
  const byRelease = new Map<number, string>();
  for (const r of results) {
    if (r.status !== 'matched' || r.releaseId === null || r.alreadyInCollection) continue;
    byRelease.set(r.releaseId, r.owner);
  }
  return [...byRelease].map(([releaseId, owner]) => ({ releaseId, owner }));
}

export class IntakeWorkflow {
  private readonly events: EventSink;
  private readonly sleep: Sleep;

  constructor(private readonly deps: IntakeDeps) {
    this.events = deps.events ?? nullSink;
    this.sleep = deps.sleep ?? noSleep;
  }

  async run(opts: IntakeOptions): Promise<IntakeSummary> {
    const { config, db } = this.deps;
    const dryRun = opts.dryRun ?? false;

    // a listing failure is fatal: BlobStoreError propagates
    let locators = await this.deps.blobs.list(opts.prefix);
    if (opts.limit !== undefined && opts.limit >= 0) locators = locators.slice(0, opts.limit);
    const images = locators.map((l) => toImageRecord(l, config.storage.root));
    this.events.emit({ type: 'info', message: `Found ${images.length} images under ${opts.prefix || '(bucket root)'}` });

    const { labels, cached } = await this.label(images);

    const results: MatchResult[] = [];
    for (let i = 0; i < images.length; i++) {
      const image = images[i];
      const label = labels.get(image.locator) ?? null;
      let result: MatchResult;
      try {
        result = await this.deps.resolver.resolve(image, label);
      } catch (err) {
        this.events.emit({ type: 'warn', message: `${image.filename}: resolution failed: ${describeError(err)}` });
        result = unresolved(image, label, describeError(err));
      }
      results.push(result);
      this.events.emit({
        type: 'image_resolved',
        index: i + 1,
        total: images.length,
        filename: image.filename,
        status: result.status,
        confidence: result.confidence,
        method: result.method,
        releaseId: result.releaseId,
        reason: result.errorMessage ?? result.reason,
      });
    }

    const summary: IntakeSummary = {
      runId: null,
      images: images.length,
      matched: results.filter((r) => r.status === 'matched').length,
      needsReview: results.filter((r) => r.status === 'needs_review').length,
      alreadyOwned: 0,
      added: 0,
      present: 0,
      filed: 0,
      failures: 0,
      cachedLabels: cached,
      conditions: null,
      results,
    };
    if (dryRun) return summary;

    const owned = await this.deps.catalog.collectionReleaseIds();
    if (owned.ok) {
      for (const r of results) r.alreadyInCollection = r.releaseId !== null && owned.value.has(r.releaseId);
      summary.alreadyOwned = results.filter((r) => r.alreadyInCollection).length;
      this.events.emit({ type: 'info', message: `${owned.value.size} releases already in the collection` });
    } else {
      this.events.emit({ type: 'warn', message: `cannot list collection for dedup: ${owned.error.message}` });
    }

    if (db) {
      summary.runId = db.startRun('intake', opts.prefix);
      db.upsertMatches(summary.runId, results);
    }
    writeFileAtomic(config.output.reportPath, recordsCsv(results));
    this.events.emit({ type: 'info', message: `Wrote ${results.length} rows to ${config.output.reportPath}` });

    const plan = addPlan(results);
    const skipped = new Set(results.filter((r) => r.status === 'matched').map((r) => r.releaseId)).size - plan.length;
    this.events.emit({ type: 'info', message: `Adding ${plan.length} releases (skipped ${skipped} already in the collection)` });

    for (const entry of plan) {
      try {
        await this.reconcile(entry, summary);
      } catch (err) {
        summary.failures++;
        this.events.emit({ type: 'warn', message: `release ${entry.releaseId}: ${describeError(err)}` });
      }
    }

    if (!opts.skipConditions) {
      summary.conditions = await backfillConditions({
        collection: this.deps.collection,
        engine: this.deps.engine,
        events: this.events,
        sleep: this.sleep,
        pauseMs: config.pacing.conditionMs,
      });
      if (summary.conditions) summary.failures += summary.conditions.failed;
    }

    if (db && summary.runId !== null) {
      db.finishRun(summary.runId, {
        images: summary.images,
        matched: summary.matched,
        needs_review: summary.needsReview,
        added: summary.added,
        filed: summary.filed,
        failures: summary.failures,
      });
    }
    return summary;
  }

  private async reconcile(entry: FilingEntry, summary: IntakeSummary): Promise<void> {
    const added = await this.deps.engine.ensureInCollection(entry.releaseId);
    if (added.outcome === 'failed') {
      summary.failures++;
      return;
    }
    if (added.outcome === 'added') summary.added++;
    else summary.present++;

    const filed = await this.deps.engine.ensureFiled(entry.releaseId, entry.owner);
    if (filed.outcome === 'filed' || filed.outcome === 'already-filed') summary.filed++;
    else if (filed.outcome === 'failed' || filed.outcome === 'not-found') summary.failures++;
  }

  // ──── Labels ──────────────────────────────────────────────────────

  /**
   * Cached results first; only the misses are read and annotated. A read
   * failure becomes that image's label error, except auth and permission
   * problems, which would fail every image the same way.
   */
  private async label(images: ImageRecord[]): Promise<{ labels: Map<string, LabelResult>; cached: number }> {
    const cache = this.deps.labelCache;
    const labels = new Map<string, LabelResult>();
    const missing = new Set(cache.missing(images.map((i) => i.locator)));

    for (const image of images) {
      const hit = cache.get(image.locator);
      if (hit) labels.set(image.locator, hit);
    }
    const cached = labels.size;
    if (missing.size === 0) return { labels, cached };

    this.events.emit({ type: 'info', message: `Labelling ${missing.size} images (${cached} cached)` });
    const bytes: ImageBytes[] = [];
    let done = 0;
    for (const locator of missing) {
      try {
        bytes.push({ locator, content: await this.deps.blobs.read(locator) });
      } catch (err) {
        const storeError = toBlobStoreError(err);
        if (storeError.kind === 'auth' || storeError.kind === 'permission') throw storeError;
        labels.set(locator, {
          locator,
          pageUrls: [],
          bestGuessLabel: null,
          ocrText: null,
          error: `read failed: ${describeError(storeError)}`,
        });
      }
      this.events.emit({ type: 'progress', phase: 'reading', done: ++done, total: missing.size });
    }

    const annotated = await this.deps.labels.annotate(bytes);
    for (const result of annotated) {
      labels.set(result.locator, result);
      cache.set(result);
    }
    cache.save();
    return { labels, cached };
  }
}

/** Review row for an image whose resolution threw. */
function unresolved(image: ImageRecord, label: LabelResult | null, message: string): MatchResult {
  return {
    ...image,
    status: 'needs_review',
    confidence: 'unknown',
    method: 'none',
    releaseId: null,
    releaseUrl: null,
    isTargetFormat: false,
    isPreferredRegion: false,
    candidateSource: 'none',
    catalogCandidates: [],
    otherCandidates: [],
    hint: { artist: null, album: null },
    bestGuessLabel: label?.bestGuessLabel ?? null,
    reason: 'resolution error',
    errorMessage: message,
    alreadyInCollection: false,
  };
}

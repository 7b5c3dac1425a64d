import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { collectingSink, matchResult, testConfig } from '../../__tests__/fixtures.js';
import { SleevescanDb } from '../../db/client.js';
import type { HttpResult } from '../../http/invoker.js';
import { LabelCache } from '../../labels/cache.js';
import type { ImageBytes, LabelService } from '../../labels/vision.js';
import { ReconciliationEngine } from '../../reconcile/engine.js';
import { FakeCollection } from '../../reconcile/__tests__/fakeCollection.js';
import { parseCsv } from '../../report/csv.js';
import { BlobStoreError } from '../../shared/errors.js';
import type { CollectionInstance, ImageRecord, LabelResult, MatchResult, SleevescanConfig } from '../../shared/types.js';
import type { BlobStore } from '../../storage/blobStore.js';
import { addPlan, IntakeWorkflow, type IntakeDeps } from '../intake.js';

const loc = (name: string) => `gs://covers-bucket/covers/${name}`;

class MemoryBlobStore implements BlobStore {
  objects = new Map<string, Buffer>();
  failures = new Map<string, BlobStoreError>();
  reads: string[] = [];

  async list(prefix: string): Promise<string[]> {
    const wanted = `gs://covers-bucket/${prefix}`;
    return [...this.objects.keys(), ...this.failures.keys()].filter((l) => l.startsWith(wanted)).sort();
  }

  async read(locator: string): Promise<Buffer> {
    this.reads.push(locator);
    const failure = this.failures.get(locator);
    if (failure) throw failure;
    const content = this.objects.get(locator);
    if (!content) throw new BlobStoreError('not_found', locator);
    return content;
  }
}

/** Each image's content is the release id its page URL points at. */
class FakeLabels implements LabelService {
  annotated: string[] = [];

  async annotate(images: ImageBytes[]): Promise<LabelResult[]> {
    return images.map((img) => {
      this.annotated.push(img.locator);
      return {
        locator: img.locator,
        pageUrls: [`https://www.discogs.com/release/${img.content.toString()}`],
        bestGuessLabel: null,
        ocrText: null,
        error: null,
      };
    });
  }
}

const resolver = {
  async resolve(image: ImageRecord, label: LabelResult | null): Promise<MatchResult> {
    const id = label && !label.error ? /release\/(\d+)/.exec(label.pageUrls[0] ?? '')?.[1] : undefined;
    if (!id) {
      return matchResult({
        ...image,
        status: 'needs_review',
        confidence: 'unknown',
        method: 'none',
        releaseId: null,
        releaseUrl: null,
        reason: 'label service error',
        errorMessage: label?.error ?? 'no label result for image',
      });
    }
    return matchResult({ ...image, releaseId: Number(id), releaseUrl: `https://www.discogs.com/release/${id}` });
  },
};

describe('addPlan', () => {
  it('adds each unowned matched release once, keeping rows without an owner', () => {
    expect(
      addPlan([
        matchResult({ releaseId: 1, owner: 'Dad' }),
        matchResult({ releaseId: 2, owner: '' }),
        matchResult({ releaseId: 3, alreadyInCollection: true }),
        matchResult({ releaseId: null, status: 'needs_review' }),
        matchResult({ releaseId: 1, owner: 'Mum' }),
      ])
    ).toEqual([
      { releaseId: 1, owner: 'Mum' },
      { releaseId: 2, owner: '' },
    ]);
  });
});

describe('IntakeWorkflow', () => {
  let dir: string;
  let config: SleevescanConfig;
  let blobs: MemoryBlobStore;
  let labels: FakeLabels;
  let cache: LabelCache;
  let collection: FakeCollection;
  let db: SleevescanDb;
  let sleeps: number[];

  function workflow(withDb: boolean, overrides: Partial<Pick<IntakeDeps, 'resolver' | 'engine'>> = {}) {
    const events = collectingSink();
    const engine = overrides.engine ?? new ReconciliationEngine(collection, { intakeFolderId: 1, conditions: config.conditions });
    const catalog = {
      async collectionReleaseIds(): Promise<HttpResult<Set<number>>> {
        const listing = await collection.listFolderInstances(0);
        if (!listing.ok) return listing;
        return { ok: true, value: new Set(listing.value.map((i) => i.releaseId)), status: 200 };
      },
    };
    const run = new IntakeWorkflow({
      config,
      blobs,
      labels,
      labelCache: cache,
      resolver: overrides.resolver ?? resolver,
      catalog,
      engine,
      collection,
      db: withDb ? db : null,
      events,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });
    return { run, events };
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sleevescan-intake-'));
    config = testConfig({ output: { dataDir: dir } });
    blobs = new MemoryBlobStore();
    blobs.objects.set(loc('Dad/a.jpg'), Buffer.from('101'));
    blobs.objects.set(loc('Dad/b.jpg'), Buffer.from('102'));
    blobs.objects.set(loc('Mum/c.jpg'), Buffer.from('103'));
    blobs.objects.set(loc('loose.jpg'), Buffer.from('104'));
    blobs.failures.set(loc('Mum/broken.jpg'), new BlobStoreError('not_found', 'gone'));
    labels = new FakeLabels();
    cache = new LabelCache(config.labels.cachePath).load();
    cache.set({ locator: loc('Dad/a.jpg'), pageUrls: ['https://www.discogs.com/release/101'], bestGuessLabel: null, ocrText: null, error: null });
    collection = new FakeCollection();
    collection.seed(103, 1);
    db = new SleevescanDb(':memory:');
    sleeps = [];
  });

  afterEach(() => {
    db.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('resolves, adds, files and back-fills in one pass', async () => {
    const { run } = workflow(true);

    const summary = await run.run({ prefix: 'covers/' });

    expect(summary).toMatchObject({
      images: 5,
      matched: 4,
      needsReview: 1,
      alreadyOwned: 1,
      added: 3,
      present: 0,
      filed: 2,
      failures: 0,
      cachedLabels: 1,
      conditions: { instances: 4, updated: 4, 'already-set': 0, skipped: 0, failed: 0 },
    });
    expect(labels.annotated).toEqual([loc('Dad/b.jpg'), loc('Mum/c.jpg'), loc('loose.jpg')]);
    expect(blobs.reads).not.toContain(loc('Dad/a.jpg'));

    const owners = new Map(collection.instances.map((i) => [i.releaseId, i.folderId]));
    expect(owners).toEqual(
      new Map([
        [103, 1],
        [101, 10],
        [102, 10],
        [104, 1],
      ])
    );
    expect(collection.folders.map((f) => f.name)).toEqual(['All', 'Uncategorized', 'Dad']);
    expect(sleeps).toEqual([1100, 1100, 1100]);
  });

  it('keeps an unreadable image as a review row with the read error', async () => {
    const { run, events } = workflow(true);

    const summary = await run.run({ prefix: 'covers/', skipConditions: true });

    const broken = summary.results.find((r) => r.filename === 'broken.jpg');
    expect(broken?.status).toBe('needs_review');
    expect(broken?.errorMessage).toBe(
      'read failed: Storage bucket or object not found. Check storage.bucket and the prefix. (gone)'
    );
    const resolved = events.events.find((e) => e.type === 'image_resolved' && e.filename === 'broken.jpg');
    expect(resolved).toMatchObject({ reason: broken?.errorMessage, releaseId: null });
    expect(summary.conditions).toBeNull();
  });

  it('turns an image whose resolution throws into a review row and carries on', async () => {
    const flaky = {
      async resolve(image: ImageRecord, label: LabelResult | null): Promise<MatchResult> {
        if (image.filename === 'b.jpg') throw new TypeError('formats.map is not a function');
        return resolver.resolve(image, label);
      },
    };
    const { run, events } = workflow(false, { resolver: flaky });

    const summary = await run.run({ prefix: 'covers/', skipConditions: true });

    expect(summary).toMatchObject({ images: 5, matched: 3, needsReview: 2, added: 2, failures: 0 });
    expect(summary.results.find((r) => r.filename === 'b.jpg')).toMatchObject({
      status: 'needs_review',
      releaseId: null,
      reason: 'resolution error',
      errorMessage: 'formats.map is not a function',
    });
    expect(events.events).toContainEqual({ type: 'warn', message: 'b.jpg: resolution failed: formats.map is not a function' });
  });

  it('counts a release whose reconciliation throws as a failure and carries on', async () => {
    const real = new ReconciliationEngine(collection, { intakeFolderId: 1, conditions: config.conditions });
    const engine = {
      ensureInCollection: (releaseId: number) => real.ensureInCollection(releaseId),
      ensureConditionsSet: (instance: CollectionInstance) => real.ensureConditionsSet(instance),
      async ensureFiled(releaseId: number, owner: string) {
        if (releaseId === 101) throw new TypeError('releases is not iterable');
        return real.ensureFiled(releaseId, owner);
      },
    };
    const { run, events } = workflow(false, { engine });

    const summary = await run.run({ prefix: 'covers/', skipConditions: true });

    expect(summary).toMatchObject({ added: 3, filed: 1, failures: 1 });
    expect(events.events).toContainEqual({ type: 'warn', message: 'release 101: releases is not iterable' });
    expect(collection.instancesOf(102)[0].folderId).toBe(10);
  });

  it('persists the run, the rows and the report', async () => {
    const { run } = workflow(true);

    const summary = await run.run({ prefix: 'covers/', skipConditions: true });

    expect(summary.runId).not.toBeNull();
    expect(db.getRun(summary.runId ?? -1)).toMatchObject({ images: 5, matched: 4, needs_review: 1, added: 3, filed: 2 });
    expect(db.getMatches({ runId: summary.runId ?? -1 })).toHaveLength(5);

    const rows = parseCsv(fs.readFileSync(config.output.reportPath, 'utf8'));
    expect(rows).toHaveLength(6);
    const owned = rows.find((r) => r[1] === 'c.jpg');
    expect(owned?.[17]).toBe('true');

    const reloaded = new LabelCache(config.labels.cachePath).load();
    expect(reloaded.size).toBe(4);
  });

  it('is idempotent: a second run adds nothing', async () => {
    await workflow(true).run.run({ prefix: 'covers/', skipConditions: true });
    const before = collection.instances.length;

    const second = await workflow(true).run.run({ prefix: 'covers/', skipConditions: true });

    expect(second.alreadyOwned).toBe(4);
    expect(second.added).toBe(0);
    expect(collection.instances).toHaveLength(before);
    expect(labels.annotated).toHaveLength(3);
  });

  it('touches nothing remote or on disk in a dry run', async () => {
    const { run } = workflow(false);

    const summary = await run.run({ prefix: 'covers/Dad/', dryRun: true });

    expect(summary.images).toBe(2);
    expect(summary.runId).toBeNull();
    expect(collection.calls).toEqual([]);
    expect(fs.existsSync(config.output.reportPath)).toBe(false);
  });

  it('honours the image limit', async () => {
    const { run } = workflow(false);
    const summary = await run.run({ prefix: 'covers/', limit: 2, dryRun: true });
    expect(summary.results.map((r) => r.filename)).toEqual(['a.jpg', 'b.jpg']);
  });

  it('aborts on a storage credential problem', async () => {
    blobs.failures.set(loc('Dad/zz.jpg'), new BlobStoreError('auth', 'no credentials'));
    const { run } = workflow(false);

    await expect(run.run({ prefix: 'covers/Dad/', dryRun: true })).rejects.toBeInstanceOf(BlobStoreError);
  });
});

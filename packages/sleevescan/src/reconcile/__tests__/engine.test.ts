import { beforeEach, describe, expect, it } from 'vitest';

import { collectingSink } from '../../__tests__/fixtures.js';
import type { CollectionInstance } from '../../shared/types.js';
import { ReconciliationEngine } from '../engine.js';
import { FakeCollection } from './fakeCollection.js';

const conditions = { media: 'Very Good (VG)', sleeve: 'Good Plus (G+)' };

describe('ReconciliationEngine', () => {
  let collection: FakeCollection;
  let sink: ReturnType<typeof collectingSink>;
  let engine: ReconciliationEngine;

  beforeEach(() => {
    collection = new FakeCollection();
    sink = collectingSink();
    engine = new ReconciliationEngine(collection, { intakeFolderId: 1, conditions, events: sink });
  });

  describe('ensureInCollection', () => {
    it('adds once; a second call finds the instance and adds nothing', async () => {
      const first = await engine.ensureInCollection(5);
      const second = await engine.ensureInCollection(5);

      expect(first).toEqual({ releaseId: 5, outcome: 'added', detail: 'instance 9000' });
      expect(second).toEqual({ releaseId: 5, outcome: 'present', detail: 'instance 9000' });
      expect(collection.instancesOf(5)).toHaveLength(1);
      expect(collection.calls).toEqual(['list:1', 'add:5:1', 'list:1']);
    });

    it('looks the release up in the intake folder only', async () => {
      collection.seed(5, 1);
      collection.seed(6, 12);

      await engine.ensureInCollection(5);
      await engine.ensureInCollection(7);
      await engine.ensureInCollection(8);

      expect(collection.calls).toEqual(['list:1', 'list:1', 'add:7:1', 'list:1', 'add:8:1']);
    });

    it('treats an "already in collection" answer as present', async () => {
      collection.conflictOnAdd = true;

      const result = await engine.ensureInCollection(5);

      expect(result).toEqual({ releaseId: 5, outcome: 'present', detail: 'already in collection' });
      expect(collection.instancesOf(5)).toEqual([]);
    });

    it('does not add when the collection cannot be listed', async () => {
      collection.failListing = true;

      const result = await engine.ensureInCollection(5);

      expect(result.outcome).toBe('failed');
      expect(collection.calls).toEqual(['list:1']);
    });

    it('reports each outcome as an event', async () => {
      await engine.ensureInCollection(5);

      expect(sink.events).toEqual([
        { type: 'reconcile', op: 'add', releaseId: 5, outcome: 'added', detail: 'instance 9000' },
      ]);
    });
  });

  describe('ensureFiled', () => {
    it('creates the owner folder and moves the instance out of intake', async () => {
      const instance = collection.seed(5, 1);

      const result = await engine.ensureFiled(5, 'Dad');

      expect(result).toEqual({ releaseId: 5, outcome: 'filed', detail: '→ Dad' });
      expect(collection.calls).toEqual(['listFolders', 'createFolder:Dad', 'list:1', `move:${instance.instanceId}:10`]);
      expect(collection.instancesOf(5)[0].folderId).toBe(10);
    });

    it('makes no move when the instance is already in the owner folder', async () => {
      collection.folders.push({ id: 10, name: 'Dad', count: 1 });
      collection.seed(5, 10);

      const result = await engine.ensureFiled(5, 'Dad');

      expect(result.outcome).toBe('already-filed');
      expect(collection.calls.filter((c) => c.startsWith('move:'))).toEqual([]);
      expect(collection.calls).toEqual(['listFolders', 'list:1', 'list:10']);
    });

    it('is a no-op the second time', async () => {
      collection.seed(5, 1);

      await engine.ensureFiled(5, 'Dad');
      const second = await engine.ensureFiled(5, 'Dad');

      expect(second.outcome).toBe('already-filed');
      expect(collection.calls.filter((c) => c.startsWith('move:'))).toHaveLength(1);
      expect(collection.calls.filter((c) => c.startsWith('createFolder:'))).toHaveLength(1);
    });

    it('skips releases without an owner', async () => {
      const result = await engine.ensureFiled(5, '');

      expect(result).toEqual({ releaseId: 5, outcome: 'skipped', detail: 'no owner' });
      expect(collection.calls).toEqual([]);
    });

    it('counts a move answered with a conflict as filed', async () => {
      collection.conflictOnMove = true;
      const instance = collection.seed(5, 1);

      const result = await engine.ensureFiled(5, 'Dad');

      expect(result).toEqual({ releaseId: 5, outcome: 'filed', detail: '→ Dad' });
      expect(collection.calls).toEqual(['listFolders', 'createFolder:Dad', 'list:1', `move:${instance.instanceId}:10`]);
    });

    it('reports a release found in neither folder', async () => {
      collection.folders.push({ id: 10, name: 'Dad', count: 0 });

      const result = await engine.ensureFiled(5, 'Dad');

      expect(result.outcome).toBe('not-found');
    });

    it('uses the folder someone else created between list and create', async () => {
      collection.raceOnCreate.add('Mum');
      collection.seed(5, 1);

      const result = await engine.ensureFiled(5, 'Mum');

      expect(result).toEqual({ releaseId: 5, outcome: 'filed', detail: '→ Mum' });
      expect(collection.calls.slice(0, 4)).toEqual(['listFolders', 'createFolder:Mum', 'invalidateFolders', 'listFolders']);
      expect(collection.folders.filter((f) => f.name === 'Mum')).toHaveLength(1);
    });
  });

  describe('ensureConditionsSet', () => {
    it('fills both blank conditions', async () => {
      const instance = collection.seed(5, 1);

      const result = await engine.ensureConditionsSet(instance);

      expect(result).toEqual({ releaseId: 5, outcome: 'updated', detail: 'media, sleeve' });
      expect(collection.instancesOf(5)[0]).toMatchObject({ mediaCondition: 'Very Good (VG)', sleeveCondition: 'Good Plus (G+)' });
    });

    it('only fills the blank one', async () => {
      const instance = collection.seed(5, 1, { sleeve: 'Mint (M)' });

      const result = await engine.ensureConditionsSet(instance);

      expect(result.detail).toBe('media');
      expect(collection.calls).toEqual(['fields', `field:${instance.instanceId}:1`]);
      expect(collection.instancesOf(5)[0].sleeveCondition).toBe('Mint (M)');
    });

    it('leaves set conditions alone without any call or event', async () => {
      const instance = collection.seed(5, 1, { media: 'Mint (M)', sleeve: 'Mint (M)' });

      const result = await engine.ensureConditionsSet(instance);

      expect(result).toEqual({ releaseId: 5, outcome: 'already-set' });
      expect(collection.calls).toEqual([]);
      expect(sink.events).toEqual([]);
    });

    it('skips an instance whose id equals its release id without any update', async () => {
      const aliased: CollectionInstance = {
        releaseId: 77,
        instanceId: 77,
        folderId: 1,
        title: 'Release 77',
        artists: [],
        year: null,
        mediaCondition: null,
        sleeveCondition: null,
      };

      const result = await engine.ensureConditionsSet(aliased);

      expect(result.outcome).toBe('skipped');
      expect(collection.calls).toEqual([]);
    });

    it('skips when the condition fields are missing', async () => {
      collection.fieldIds = null;
      const instance = collection.seed(5, 1);

      const result = await engine.ensureConditionsSet(instance);

      expect(result).toEqual({ releaseId: 5, outcome: 'skipped', detail: 'condition fields not found' });
    });

    it('skips an instance that disappeared (404)', async () => {
      const instance = collection.seed(5, 1);
      collection.vanished.add(instance.instanceId);

      const result = await engine.ensureConditionsSet(instance);

      expect(result).toEqual({ releaseId: 5, outcome: 'skipped', detail: 'instance no longer exists' });
    });
  });
});

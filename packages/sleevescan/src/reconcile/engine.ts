/**
 * ReconciliationEngine: idempotent writes against the remote collection.
 *
 *   ensureInCollection   add-if-absent in the intake folder
 *   ensureFiled          move-if-misplaced (owner folder, created on demand)
 *   ensureConditionsSet  set-if-blank (media / sleeve condition fields)
 *
 * The remote collection is the only source of truth: every call looks before
 * it writes, nothing is ever removed, and a conflict ("already there") counts
 * as success.
 */

import type { HttpResult } from '../http/invoker.js';
import { nullSink, type EventSink, type ReconcileOp } from '../shared/events.js';
import type { CollectionInstance, ConditionFieldIds, OwnerFolder } from '../shared/types.js';

export interface CollectionPort {
  listFolders(): Promise<HttpResult<OwnerFolder[]>>;
  createFolder(name: string): Promise<HttpResult<OwnerFolder>>;
  invalidateFolders(): void;
  listFolderInstances(folderId: number): Promise<HttpResult<CollectionInstance[]>>;
  addToFolder(releaseId: number, folderId: number): Promise<HttpResult<{ instanceId: number | null }>>;
  moveInstance(instance: CollectionInstance, targetFolderId: number): Promise<HttpResult<null>>;
  getConditionFieldIds(): Promise<ConditionFieldIds | null>;
  setInstanceField(instance: CollectionInstance, fieldId: number, value: string): Promise<HttpResult<null>>;
}

/** Folder 0 lists the whole collection. */
export const ALL_FOLDERS_ID = 0;

export type AddOutcome = 'added' | 'present' | 'failed';
export type FileOutcome = 'filed' | 'already-filed' | 'not-found' | 'skipped' | 'failed';
export type ConditionOutcome = 'updated' | 'already-set' | 'skipped' | 'failed';

export interface ReconcileResult<O extends string> {
  releaseId: number;
  outcome: O;
  detail?: string;
}

export type FolderLookup = { ok: true; folder: OwnerFolder; created: boolean } | { ok: false; error: string };

export interface ReconcileOptions {
  intakeFolderId: number;
  conditions: { media: string; sleeve: string };
  events?: EventSink;
}

export class ReconciliationEngine {
  private readonly events: EventSink;

  constructor(
    private readonly collection: CollectionPort,
    private readonly opts: ReconcileOptions
  ) {
    this.events = opts.events ?? nullSink;
  }

  // ──── Add ─────────────────────────────────────────────────────────

  async ensureInCollection(releaseId: number): Promise<ReconcileResult<AddOutcome>> {
    const listing = await this.collection.listFolderInstances(this.opts.intakeFolderId);
    if (!listing.ok) {
      // without a listing an add could duplicate the instance
      return this.report('add', { releaseId, outcome: 'failed', detail: listing.error.message });
    }

    const existing = listing.value.find((i) => i.releaseId === releaseId);
    if (existing) {
      return this.report('add', { releaseId, outcome: 'present', detail: `instance ${existing.instanceId}` });
    }

    const res = await this.collection.addToFolder(releaseId, this.opts.intakeFolderId);
    if (res.ok) {
      const detail = res.value.instanceId != null ? `instance ${res.value.instanceId}` : undefined;
      return this.report('add', { releaseId, outcome: 'added', detail });
    }
    if (res.error.kind === 'conflict') {
      return this.report('add', { releaseId, outcome: 'present', detail: 'already in collection' });
    }
    return this.report('add', { releaseId, outcome: 'failed', detail: res.error.message });
  }

  // ──── Folders ─────────────────────────────────────────────────────

  async getOrCreateFolder(name: string): Promise<FolderLookup> {
    const listed = await this.collection.listFolders();
    if (!listed.ok) return { ok: false, error: listed.error.message };

    const found = listed.value.find((f) => f.name === name);
    if (found) return { ok: true, folder: found, created: false };

    const created = await this.collection.createFolder(name);
    if (created.ok) {
      this.events.emit({ type: 'reconcile', op: 'folder', releaseId: created.value.id, outcome: 'created', detail: name });
      return { ok: true, folder: created.value, created: true };
    }

    if (created.error.kind === 'conflict') {
      // someone else created it between our list and create
      this.collection.invalidateFolders();
      const relisted = await this.collection.listFolders();
      const match = relisted.ok ? relisted.value.find((f) => f.name === name) : undefined;
      if (match) return { ok: true, folder: match, created: false };
    }
    return { ok: false, error: created.error.message };
  }

  // ──── File ────────────────────────────────────────────────────────

  async ensureFiled(releaseId: number, owner: string): Promise<ReconcileResult<FileOutcome>> {
    if (!owner) return this.report('file', { releaseId, outcome: 'skipped', detail: 'no owner' });

    const folder = await this.getOrCreateFolder(owner);
    if (!folder.ok) return this.report('file', { releaseId, outcome: 'failed', detail: folder.error });
    const target = folder.folder;

    const located = await this.locate(releaseId, [this.opts.intakeFolderId, target.id]);
    if (!located.ok) return this.report('file', { releaseId, outcome: 'failed', detail: located.error });
    const instance = located.instance;
    if (!instance) {
      return this.report('file', { releaseId, outcome: 'not-found', detail: 'not in intake or owner folder' });
    }

    if (instance.folderId === target.id) {
      return this.report('file', { releaseId, outcome: 'already-filed', detail: target.name });
    }

    const moved = await this.collection.moveInstance(instance, target.id);
    if (moved.ok || moved.error.kind === 'conflict') {
      return this.report('file', { releaseId, outcome: 'filed', detail: `→ ${target.name}` });
    }
    return this.report('file', { releaseId, outcome: 'failed', detail: moved.error.message });
  }

  // ──── Conditions ──────────────────────────────────────────────────

  async ensureConditionsSet(instance: CollectionInstance): Promise<ReconcileResult<ConditionOutcome>> {
    const releaseId = instance.releaseId;
    if (instance.instanceId === instance.releaseId) {
      // malformed listing row: the instance id is the release id
      return this.report('conditions', { releaseId, outcome: 'skipped', detail: 'instance id equals release id' });
    }

    const wantMedia = !instance.mediaCondition?.trim();
    const wantSleeve = !instance.sleeveCondition?.trim();
    if (!wantMedia && !wantSleeve) {
      return { releaseId, outcome: 'already-set' };
    }

    const fields = await this.collection.getConditionFieldIds();
    if (!fields) {
      return this.report('conditions', { releaseId, outcome: 'skipped', detail: 'condition fields not found' });
    }

    const updates: Array<{ name: string; fieldId: number; value: string }> = [];
    if (wantMedia) updates.push({ name: 'media', fieldId: fields.media, value: this.opts.conditions.media });
    if (wantSleeve) updates.push({ name: 'sleeve', fieldId: fields.sleeve, value: this.opts.conditions.sleeve });

    const done: string[] = [];
    for (const update of updates) {
      const res = await this.collection.setInstanceField(instance, update.fieldId, update.value);
      if (res.ok) {
        done.push(update.name);
        continue;
      }
      if (res.error.status === 404) {
        return this.report('conditions', { releaseId, outcome: 'skipped', detail: 'instance no longer exists' });
      }
      return this.report('conditions', { releaseId, outcome: 'failed', detail: res.error.message });
    }

    return this.report('conditions', { releaseId, outcome: 'updated', detail: done.join(', ') });
  }

  // ──── Private helpers ─────────────────────────────────────────────

  private async locate(
    releaseId: number,
    folderIds: number[]
  ): Promise<{ ok: true; instance: CollectionInstance | null } | { ok: false; error: string }> {
    for (const folderId of new Set(folderIds)) {
      const listing = await this.collection.listFolderInstances(folderId);
      if (!listing.ok) return { ok: false, error: listing.error.message };
      const instance = listing.value.find((i) => i.releaseId === releaseId);
      if (instance) return { ok: true, instance };
    }
    return { ok: true, instance: null };
  }

  private report<O extends string>(op: ReconcileOp, result: ReconcileResult<O>): ReconcileResult<O> {
    this.events.emit({ type: 'reconcile', op, releaseId: result.releaseId, outcome: result.outcome, detail: result.detail });
    return result;
  }
}

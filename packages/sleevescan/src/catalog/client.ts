/**
 * Discogs API client
 *
 * Typed lookups (release, master, versions, search) plus collection folder
 * and instance management. Lookups are memoised for the life of the client
 * (one run); folder listings are cached until a folder is created.
 *
 * Lookups degrade to null / [] on failure and emit a `lookup_failed` event.
 * Collection calls return HttpResult so callers can tell a conflict from a
 * real failure.
 */

import type { HttpInvoker, HttpResult } from '../http/invoker.js';
import { ALL_FOLDERS_ID } from '../reconcile/engine.js';
import { nullSink, type EventSink } from '../shared/events.js';
import { noSleep, type Sleep } from '../shared/pacing.js';
import type {
  CatalogMaster,
  CatalogRelease,
  CollectionInstance,
  ConditionFieldIds,
  MasterVersion,
  OwnerFolder,
  Page,
  PacingConfig,
  RetryPolicy,
  SearchHit,
  SleevescanConfig,
  TextHint,
} from '../shared/types.js';
import type {
  DiscogsAddResponse,
  DiscogsCollectionItem,
  DiscogsCollectionReleasesResponse,
  DiscogsFieldsResponse,
  DiscogsFolder,
  DiscogsFoldersResponse,
  DiscogsMaster,
  DiscogsMasterVersionsResponse,
  DiscogsRelease,
  DiscogsSearchResponse,
} from './types.js';

const WEB_BASE = 'https://www.discogs.com';
const COLLECTION_PAGE_SIZE = 100;

export interface CatalogClientOptions {
  invoker: HttpInvoker;
  events?: EventSink;
  sleep?: Sleep;
}

export class CatalogClient {
  private readonly baseUrl: string;
  private readonly username: string;
  private readonly headers: Record<string, string>;
  private readonly search: { format: string; country: string; perPage: number };
  private readonly versionsPageSize: number;
  private readonly retry: RetryPolicy;
  private readonly pacing: PacingConfig;
  private readonly invoker: HttpInvoker;
  private readonly events: EventSink;
  private readonly sleep: Sleep;

  // Run-scoped caches
  private readonly releases = new Map<number, CatalogRelease>();
  private readonly masters = new Map<number, CatalogMaster>();
  private readonly versionPages = new Map<string, Page<MasterVersion>>();
  private folders: OwnerFolder[] | null = null;
  private fieldIds: ConditionFieldIds | null | undefined;

  constructor(config: SleevescanConfig, opts: CatalogClientOptions) {
    const { catalog } = config;
    this.baseUrl = catalog.baseUrl;
    this.username = encodeURIComponent(catalog.username);
    const site = [catalog.app.url, catalog.app.contact].filter(Boolean).join('; ');
    this.headers = {
      'User-Agent': `${catalog.app.name}/${catalog.app.version}${site ? ` (+${site})` : ''}`,
      Authorization: `Discogs token=${catalog.token}`,
    };
    this.search = {
      format: config.matching.targetFormat,
      country: config.matching.preferredCountry,
      perPage: catalog.searchPageSize,
    };
    this.versionsPageSize = catalog.versionsPageSize;
    this.retry = config.retry;
    this.pacing = config.pacing;
    this.invoker = opts.invoker;
    this.events = opts.events ?? nullSink;
    this.sleep = opts.sleep ?? noSleep;
  }

  // ──── Lookups ─────────────────────────────────────────────────────

  async getRelease(id: number): Promise<CatalogRelease | null> {
    const cached = this.releases.get(id);
    if (cached) return cached;

    const res = await this.get<DiscogsRelease>(`/releases/${id}`, {}, this.retry.lookupAttempts);
    await this.sleep(this.pacing.lookupMs);
    if (!res.ok) {
      this.events.emit({ type: 'lookup_failed', target: `release ${id}`, message: res.error.message });
      return null;
    }

    const release = toRelease(res.value);
    this.releases.set(id, release);
    return release;
  }

  async getMaster(id: number): Promise<CatalogMaster | null> {
    const cached = this.masters.get(id);
    if (cached) return cached;

    const res = await this.get<DiscogsMaster>(`/masters/${id}`, {}, this.retry.lookupAttempts);
    if (!res.ok) {
      this.events.emit({ type: 'lookup_failed', target: `master ${id}`, message: res.error.message });
      return null;
    }

    const master: CatalogMaster = {
      id: res.value.id,
      title: res.value.title ?? '',
      mainReleaseId: res.value.main_release ?? null,
    };
    this.masters.set(id, master);
    return master;
  }

  async getMasterVersions(masterId: number, page: number): Promise<Page<MasterVersion> | null> {
    const key = `${masterId}:${page}`;
    const cached = this.versionPages.get(key);
    if (cached) return cached;

    const res = await this.get<DiscogsMasterVersionsResponse>(
      `/masters/${masterId}/versions`,
      { page, per_page: this.versionsPageSize },
      this.retry.lookupAttempts
    );
    await this.sleep(this.pacing.versionsPageMs);
    if (!res.ok) {
      this.events.emit({
        type: 'lookup_failed',
        target: `master ${masterId} versions page ${page}`,
        message: res.error.message,
      });
      return null;
    }

    const result: Page<MasterVersion> = {
      items: arrayOf(res.value.versions).map((v) => ({ id: v.id, title: v.title ?? '', country: v.country ?? '' })),
      page: res.value.pagination?.page ?? page,
      pages: res.value.pagination?.pages ?? page,
    };
    this.versionPages.set(key, result);
    return result;
  }

  /** Release search filtered to the target format and preferred country. */
  async searchReleases(hint: TextHint): Promise<SearchHit[]> {
    const res = await this.get<DiscogsSearchResponse>('/database/search', {
      type: 'release',
      format: this.search.format,
      country: this.search.country,
      per_page: this.search.perPage,
      artist: hint.artist ?? undefined,
      release_title: hint.album ?? undefined,
    });
    if (!res.ok) {
      const label = [hint.artist, hint.album].filter(Boolean).join(' / ');
      this.events.emit({ type: 'lookup_failed', target: `search "${label}"`, message: res.error.message });
      return [];
    }

    return arrayOf(res.value.results)
      .filter((r) => typeof r.id === 'number')
      .map((r) => ({
        id: r.id,
        title: r.title ?? '',
        url: webUrl(r.uri, `/release/${r.id}`),
      }));
  }

  // ──── Folders ─────────────────────────────────────────────────────

  async listFolders(): Promise<HttpResult<OwnerFolder[]>> {
    if (this.folders) return { ok: true, value: this.folders, status: 200 };

    const res = await this.get<DiscogsFoldersResponse>(`/users/${this.username}/collection/folders`);
    if (!res.ok) return res;

    this.folders = arrayOf(res.value.folders).map(toFolder);
    return { ok: true, value: this.folders, status: res.status };
  }

  async createFolder(name: string): Promise<HttpResult<OwnerFolder>> {
    const res = await this.invoker.request<DiscogsFolder>({
      method: 'POST',
      url: `${this.baseUrl}/users/${this.username}/collection/folders`,
      headers: this.headers,
      json: { name },
    });
    this.invalidateFolders();
    await this.sleep(this.pacing.folderMs);
    if (!res.ok) return res;
    return { ok: true, value: toFolder(res.value), status: res.status };
  }

  /** Folder listing changes underneath us when a folder is created elsewhere. */
  invalidateFolders(): void {
    this.folders = null;
  }

  // ──── Instances ───────────────────────────────────────────────────

  /** Every instance in a folder, all pages drained. Folder 0 is the whole collection. */
  async listFolderInstances(folderId: number): Promise<HttpResult<CollectionInstance[]>> {
    const fields = await this.getConditionFieldIds();
    const out: CollectionInstance[] = [];
    let page = 1;
    let pages = 1;

    do {
      const res = await this.get<DiscogsCollectionReleasesResponse>(
        `/users/${this.username}/collection/folders/${folderId}/releases`,
        { page, per_page: COLLECTION_PAGE_SIZE }
      );
      if (!res.ok) return res;

      for (const item of arrayOf(res.value.releases)) {
        out.push(toInstance(item, fields));
      }
      pages = res.value.pagination?.pages ?? page;
      page++;
      if (page <= pages) await this.sleep(this.pacing.versionsPageMs);
    } while (page <= pages);

    return { ok: true, value: out, status: 200 };
  }

  async collectionReleaseIds(): Promise<HttpResult<Set<number>>> {
    const res = await this.listFolderInstances(ALL_FOLDERS_ID);
    if (!res.ok) return res;
    return { ok: true, value: new Set(res.value.map((i) => i.releaseId)), status: res.status };
  }

  async addToFolder(releaseId: number, folderId: number): Promise<HttpResult<{ instanceId: number | null }>> {
    const res = await this.invoker.request<DiscogsAddResponse>({
      method: 'POST',
      url: `${this.baseUrl}/users/${this.username}/collection/folders/${folderId}/releases/${releaseId}`,
      headers: this.headers,
    });
    await this.sleep(this.pacing.addMs);
    if (!res.ok) return res;
    return { ok: true, value: { instanceId: res.value.instance_id ?? null }, status: res.status };
  }

  /** POST goes to the instance's current folder; the target travels in the body. */
  async moveInstance(instance: CollectionInstance, targetFolderId: number): Promise<HttpResult<null>> {
    const res = await this.invoker.send({
      method: 'POST',
      url: this.instanceUrl(instance),
      headers: this.headers,
      json: { folder_id: targetFolderId },
    });
    await this.sleep(this.pacing.moveMs);
    return res;
  }

  // ──── Custom fields ───────────────────────────────────────────────

  /** Media/sleeve condition field ids, discovered once. Null when the collection lacks them. */
  async getConditionFieldIds(): Promise<ConditionFieldIds | null> {
    if (this.fieldIds !== undefined) return this.fieldIds;

    const res = await this.get<DiscogsFieldsResponse>(`/users/${this.username}/collection/fields`);
    if (!res.ok) {
      this.events.emit({ type: 'lookup_failed', target: 'collection fields', message: res.error.message });
      return null;
    }

    let media: number | null = null;
    let sleeve: number | null = null;
    for (const field of arrayOf(res.value.fields)) {
      const name = (field.name ?? '').toLowerCase();
      if (media === null && name.includes('media condition')) media = field.id;
      if (sleeve === null && name.includes('sleeve condition')) sleeve = field.id;
    }

    this.fieldIds = media !== null && sleeve !== null ? { media, sleeve } : null;
    return this.fieldIds;
  }

  async setInstanceField(instance: CollectionInstance, fieldId: number, value: string): Promise<HttpResult<null>> {
    const res = await this.invoker.send({
      method: 'POST',
      url: `${this.instanceUrl(instance)}/fields/${fieldId}`,
      headers: this.headers,
      json: { value },
    });
    await this.sleep(this.pacing.fieldMs);
    return res;
  }

  clearCache(): void {
    this.releases.clear();
    this.masters.clear();
    this.versionPages.clear();
    this.folders = null;
    this.fieldIds = undefined;
  }

  // ──── Private helpers ─────────────────────────────────────────────

  private instanceUrl(instance: CollectionInstance): string {
    return (
      `${this.baseUrl}/users/${this.username}/collection/folders/${instance.folderId}` +
      `/releases/${instance.releaseId}/instances/${instance.instanceId}`
    );
  }

  private get<T>(
    apiPath: string,
    query: Record<string, string | number | undefined> = {},
    maxAttempts?: number
  ): Promise<HttpResult<T>> {
    return this.invoker.request<T>({
      url: `${this.baseUrl}${apiPath}`,
      query,
      headers: this.headers,
      maxAttempts,
    });
  }
}

// ──── Mapping ────────────────────────────────────────────────────────

/** Response arrays as sent, or [] for anything that is not an array. */
function arrayOf<T>(value: T[] | null | undefined): T[] {
  return Array.isArray(value) ? value : [];
}

function webUrl(uri: string | undefined, fallbackPath: string): string {
  if (!uri) return `${WEB_BASE}${fallbackPath}`;
  return uri.startsWith('http') ? uri : `${WEB_BASE}${uri.startsWith('/') ? '' : '/'}${uri}`;
}

export function toRelease(raw: DiscogsRelease): CatalogRelease {
  return {
    id: raw.id,
    title: raw.title ?? '',
    artists: arrayOf(raw.artists).map((a) => a.name),
    year: raw.year ? raw.year : null,
    country: (raw.country ?? '').trim(),
    formats: arrayOf(raw.formats).map((f) => f.name ?? ''),
    tracklist: arrayOf(raw.tracklist)
      .filter((t) => (t.type_ ?? 'track') === 'track' && t.title)
      .map((t) => ({ position: t.position ?? '', title: t.title, duration: t.duration ?? '' })),
    url: webUrl(raw.uri, `/release/${raw.id}`),
  };
}

function toFolder(raw: DiscogsFolder): OwnerFolder {
  return { id: raw.id, name: raw.name, count: raw.count ?? 0 };
}

function toInstance(item: DiscogsCollectionItem, fields: ConditionFieldIds | null): CollectionInstance {
  const note = (fieldId: number | undefined): string | null => {
    if (fieldId === undefined) return null;
    const value = arrayOf(item.notes).find((n) => n.field_id === fieldId)?.value ?? '';
    return value.trim() ? value : null;
  };
  const info = item.basic_information;
  return {
    releaseId: item.id,
    instanceId: item.instance_id,
    folderId: item.folder_id,
    title: info?.title ?? '',
    artists: arrayOf(info?.artists).map((a) => a.name),
    year: info?.year ? info.year : null,
    mediaCondition: note(fields?.media),
    sleeveCondition: note(fields?.sleeve),
  };
}

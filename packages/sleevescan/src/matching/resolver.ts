/**
 * MatchResolver: label signals → one catalog release.
 *
 * Single pass per image, strongest evidence first:
 *   1. release URLs   (first target-format + preferred-region wins outright)
 *   2. master URLs    (only when step 1 found no preferred-region release)
 *   3. text search    (only when nothing target-format was found at all)
 * A target-format release in the wrong region is remembered as a fallback;
 * the first one seen is kept. Lookup failures count as "no data".
 */

import type {
  CatalogMaster,
  CatalogRelease,
  ImageRecord,
  LabelResult,
  MasterVersion,
  MatchPreferences,
  MatchResult,
  Page,
  ResolutionMethod,
  SearchHit,
  TextHint,
  Validation,
} from '../shared/types.js';
import { extractCandidates, partitionRefs, type CandidateSet } from './candidates.js';
import { confidenceBucket, validateRelease } from './validate.js';

export interface CatalogLookup {
  getRelease(id: number): Promise<CatalogRelease | null>;
  getMaster(id: number): Promise<CatalogMaster | null>;
  getMasterVersions(masterId: number, page: number): Promise<Page<MasterVersion> | null>;
  searchReleases(hint: TextHint): Promise<SearchHit[]>;
}

interface Choice {
  releaseId: number;
  url: string | null;
  method: ResolutionMethod;
  validation: Validation;
}

export interface MasterResolution {
  choice: Choice | null;
  reason: string;
}

function qualifies(v: Validation): boolean {
  return v.isTargetFormat && v.isPreferredRegion;
}

/**
 * Artist/album hint: the first two non-empty OCR lines, taken only as a pair.
 * Otherwise a best-guess label of the form "Artist - Album". A lone OCR line
 * is never a hint.
 */
export function deriveTextHint(label: Pick<LabelResult, 'ocrText' | 'bestGuessLabel'>): TextHint {
  const lines = (label.ocrText ?? '')
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter(Boolean);

  let artist: string | null = null;
  let album: string | null = null;
  if (lines.length >= 2) [artist, album] = lines;

  const guess = label.bestGuessLabel ?? '';
  if (!album && guess.includes(' - ')) {
    const [head, ...rest] = guess.split(' - ');
    artist = head.trim() || null;
    album = rest.join(' - ').trim() || null;
  }
  return { artist, album };
}

export class MatchResolver {
  constructor(
    private readonly catalog: CatalogLookup,
    private readonly prefs: MatchPreferences
  ) {}

  async resolve(image: ImageRecord, label: LabelResult | null): Promise<MatchResult> {
    if (!label || label.error) {
      const message = label?.error ?? 'no label result for image';
      return this.result(image, label, emptyCandidates(), null, {
        reason: 'label service error',
        errorMessage: message,
      });
    }

    const candidates = extractCandidates(label.pageUrls, this.prefs.candidateLimit);
    const { releases, masters } = partitionRefs(candidates.catalog);
    let fallback: Choice | null = null;
    let lastReason: string | null = null;

    // Release pass
    for (const ref of releases) {
      const checked = await this.check(ref.id);
      if (!checked) continue;
      lastReason = checked.validation.reason;
      const choice: Choice = {
        releaseId: ref.id,
        url: checked.release.url,
        method: 'direct-release-url',
        validation: checked.validation,
      };
      if (qualifies(checked.validation)) {
        return this.finalize(image, label, candidates, choice);
      }
      if (checked.validation.isTargetFormat && !fallback) fallback = choice;
    }

    // Master pass
    for (const ref of masters) {
      const resolved = await this.resolveMaster(ref.id);
      lastReason = resolved.reason;
      const choice = resolved.choice;
      if (!choice || !choice.validation.isTargetFormat) continue;
      if (qualifies(choice.validation)) {
        return this.finalize(image, label, candidates, choice);
      }
      if (!fallback) fallback = choice;
    }

    // Text-search fallback
    if (!fallback) {
      const hint = deriveTextHint(label);
      if (hint.artist || hint.album) {
        const hits = await this.catalog.searchReleases(hint);
        if (hits.length === 0) lastReason = 'text search returned no results';
        for (const hit of hits) {
          const checked = await this.check(hit.id);
          if (!checked) continue;
          lastReason = checked.validation.reason;
          const choice: Choice = {
            releaseId: hit.id,
            url: checked.release.url,
            method: 'text-search-fallback',
            validation: checked.validation,
          };
          if (qualifies(checked.validation)) {
            return this.finalize(image, label, candidates, choice);
          }
          if (checked.validation.isTargetFormat && !fallback) fallback = choice;
        }
      } else if (candidates.catalog.length === 0) {
        lastReason = 'no catalog candidates and no text hint';
      }
    }

    return this.finalize(image, label, candidates, fallback, lastReason);
  }

  /**
   * Main release first, then every version page. First fully qualifying
   * release returns at once; otherwise the first target-format one seen.
   */
  async resolveMaster(masterId: number): Promise<MasterResolution> {
    const master = await this.catalog.getMaster(masterId);
    if (!master) return { choice: null, reason: `master ${masterId} unavailable` };

    const best: MasterResolution = { choice: null, reason: '' };

    const consider = async (releaseId: number, label: string): Promise<MasterResolution | null> => {
      const checked = await this.check(releaseId);
      if (!checked) return null;
      const choice: Choice = {
        releaseId,
        url: checked.release.url,
        method: 'resolved-master-url',
        validation: checked.validation,
      };
      const reason = `${label}: ${checked.validation.reason}`;
      if (qualifies(checked.validation)) return { choice, reason };
      if (checked.validation.isTargetFormat && !best.choice) {
        best.choice = choice;
        best.reason = reason;
      }
      return null;
    };

    if (master.mainReleaseId !== null) {
      const hit = await consider(master.mainReleaseId, 'main release');
      if (hit) return hit;
    }

    let page = 1;
    let pages = 1;
    do {
      const versions = await this.catalog.getMasterVersions(masterId, page);
      if (!versions) break;
      for (const version of versions.items) {
        if (version.id === master.mainReleaseId) continue;
        const hit = await consider(version.id, 'version');
        if (hit) return hit;
      }
      pages = versions.pages;
      page++;
    } while (page <= pages);

    if (best.choice) return best;
    return { choice: null, reason: `no ${this.prefs.targetFormat} release in master ${masterId}` };
  }

  // ──── Private helpers ─────────────────────────────────────────────

  private async check(releaseId: number): Promise<{ release: CatalogRelease; validation: Validation } | null> {
    const release = await this.catalog.getRelease(releaseId);
    if (!release) return null;
    return { release, validation: validateRelease(release, this.prefs) };
  }

  private finalize(
    image: ImageRecord,
    label: LabelResult,
    candidates: CandidateSet,
    choice: Choice | null,
    lastReason: string | null = null
  ): MatchResult {
    return this.result(image, label, candidates, choice, {
      reason: choice?.validation.reason ?? lastReason ?? 'no match found',
      errorMessage: null,
    });
  }

  private result(
    image: ImageRecord,
    label: LabelResult | null,
    candidates: CandidateSet,
    choice: Choice | null,
    text: { reason: string; errorMessage: string | null }
  ): MatchResult {
    const validation = choice?.validation ?? null;
    const isTargetFormat = validation?.isTargetFormat ?? false;
    const isPreferredRegion = validation?.isPreferredRegion ?? false;
    const method: ResolutionMethod = choice ? choice.method : 'none';
    const hasCatalogCandidates = candidates.catalog.length > 0;
    const status = isTargetFormat ? 'matched' : 'needs_review';

    let confidence = confidenceBucket({ method, hasCatalogCandidates, isTargetFormat, isPreferredRegion });
    // Something to go on, just nothing on the catalog's own site
    if (status === 'needs_review' && !hasCatalogCandidates && candidates.other.length > 0) {
      confidence = 'very_low';
    }

    const auditLimit = this.prefs.auditLimit;

    return {
      locator: image.locator,
      filename: image.filename,
      owner: image.owner,
      status,
      confidence,
      method,
      releaseId: choice ? choice.releaseId : null,
      releaseUrl: choice ? choice.url : null,
      isTargetFormat,
      isPreferredRegion,
      candidateSource: hasCatalogCandidates ? 'catalog' : candidates.other.length > 0 ? 'other' : 'none',
      catalogCandidates: candidates.catalog.slice(0, auditLimit),
      otherCandidates: hasCatalogCandidates ? [] : candidates.other.slice(0, auditLimit),
      hint: label && !label.error ? deriveTextHint(label) : { artist: null, album: null },
      bestGuessLabel: label?.bestGuessLabel ?? null,
      reason: text.reason,
      errorMessage: text.errorMessage,
      alreadyInCollection: false,
    };
  }
}

function emptyCandidates(): CandidateSet {
  return { catalog: [], other: [] };
}

/**
 * Candidate URLs from a label result.
 */

const CATALOG_HOST = 'discogs.com';

export interface CandidateSet {
  catalog: string[];   // URLs on the catalog's own site, original order
  other: string[];
}

export type CatalogRefKind = 'release' | 'master';

export interface CatalogRef {
  kind: CatalogRefKind;
  id: number;
  url: string;
}

export function isCatalogUrl(url: string): boolean {
  try {
    const host = new URL(url).hostname.toLowerCase();
    return host === CATALOG_HOST || host.endsWith(`.${CATALOG_HOST}`);
  } catch {
    return url.toLowerCase().includes(CATALOG_HOST);
  }
}

/**
 * Take the first `limit` page URLs, drop exact duplicates (first occurrence
 * wins) and split them by host.
 */
export function extractCandidates(pageUrls: string[], limit = Number.POSITIVE_INFINITY): CandidateSet {
  const seen = new Set<string>();
  const out: CandidateSet = { catalog: [], other: [] };

  for (const url of pageUrls.slice(0, limit)) {
    if (!url || seen.has(url)) continue;
    seen.add(url);
    (isCatalogUrl(url) ? out.catalog : out.other).push(url);
  }
  return out;
}

const RELEASE_PATH = /\/release\/(\d+)/;
const MASTER_PATH = /\/master\/(\d+)/;

/** `/release/{digits}` or `/master/{digits}` anywhere in the path. */
export function classifyUrl(url: string): CatalogRef | null {
  const release = RELEASE_PATH.exec(url);
  if (release) return { kind: 'release', id: Number(release[1]), url };
  const master = MASTER_PATH.exec(url);
  if (master) return { kind: 'master', id: Number(master[1]), url };
  return null;
}

/** Classified refs split by kind; repeated ids keep their first position. */
export function partitionRefs(catalogUrls: string[]): { releases: CatalogRef[]; masters: CatalogRef[] } {
  const releases: CatalogRef[] = [];
  const masters: CatalogRef[] = [];
  const seen = new Set<string>();

  for (const url of catalogUrls) {
    const ref = classifyUrl(url);
    if (!ref) continue;
    const key = `${ref.kind}:${ref.id}`;
    if (seen.has(key)) continue;
    seen.add(key);
    (ref.kind === 'release' ? releases : masters).push(ref);
  }
  return { releases, masters };
}

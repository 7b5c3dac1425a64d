/**
 * sleevescan shared types
 * Config, domain records and the outcomes the pipeline reports.
 */

// ============================================================================
// Configuration
// ============================================================================

export interface SleevescanConfig {
  // Blob storage holding the cover photos
  storage: {
    bucket: string;
    root: string;        // owner folders live directly under this prefix
    prefix: string;      // default listing prefix (may be deeper than root)
    extensions: string[];
  };

  // Image labelling + its on-disk response cache
  labels: {
    batchSize: number;   // requests per annotate call, clamped to 1..16
    cachePath: string;
  };

  // Discogs
  catalog: {
    baseUrl: string;
    username: string;
    token: string;
    app: {
      name: string;
      version: string;
      contact: string;
      url: string;
    };
    intakeFolderId: number;
    searchPageSize: number;
    versionsPageSize: number;
  };

  matching: MatchPreferences;

  // Defaults written by the condition back-fill
  conditions: {
    media: string;
    sleeve: string;
  };

  retry: RetryPolicy;
  pacing: PacingConfig;

  // Spotify
  streaming: {
    clientId: string;
    clientSecret: string;
    refreshToken: string;
    apiUrl: string;
    accountsUrl: string;
    playlistUrl: string;
    sourceFolder: string;
    publicPlaylists: boolean;
  };

  output: {
    dataDir: string;
    dbPath: string;
    reportPath: string;
    logDir: string;
  };
}

export interface MatchPreferences {
  targetFormat: string;
  preferredCountry: string;
  candidateLimit: number;  // candidate URLs considered for resolution
  auditLimit: number;      // candidate URLs kept in the report
}

export interface RetryPolicy {
  maxAttempts: number;
  lookupAttempts: number;  // release/master GETs get a longer leash
  baseDelayMs: number;
  timeoutMs: number;
}

export interface PacingConfig {
  lookupMs: number;
  versionsPageMs: number;
  addMs: number;
  moveMs: number;
  folderMs: number;
  fieldMs: number;
  conditionMs: number;
  streamingMs: number;
  playlistBatchMs: number;
}

// ============================================================================
// Images and labels
// ============================================================================

export interface ImageRecord {
  locator: string;   // gs://bucket/path/to/file.jpg
  filename: string;
  owner: string;     // '' when the image sits directly under the storage root
}

export interface LabelResult {
  locator: string;
  pageUrls: string[];          // service relevance order
  bestGuessLabel: string | null;
  ocrText: string | null;
  error: string | null;
}

// ============================================================================
// Catalog
// ============================================================================

export interface CatalogTrack {
  position: string;
  title: string;
  duration: string;
}

export interface CatalogRelease {
  id: number;
  title: string;
  artists: string[];
  year: number | null;
  country: string;
  formats: string[];
  tracklist: CatalogTrack[];
  url: string;
}

export interface CatalogMaster {
  id: number;
  title: string;
  mainReleaseId: number | null;
}

export interface MasterVersion {
  id: number;
  title: string;
  country: string;
}

export interface SearchHit {
  id: number;
  title: string;
  url: string;
}

export interface Page<T> {
  items: T[];
  page: number;
  pages: number;
}

export interface CollectionInstance {
  releaseId: number;
  instanceId: number;
  folderId: number;
  title: string;
  artists: string[];
  year: number | null;
  mediaCondition: string | null;
  sleeveCondition: string | null;
}

export interface OwnerFolder {
  id: number;
  name: string;
  count: number;
}

export interface ConditionFieldIds {
  media: number;
  sleeve: number;
}

// ============================================================================
// Matching
// ============================================================================

export type ResolutionMethod =
  | 'direct-release-url'
  | 'resolved-master-url'
  | 'text-search-fallback'
  | 'none';

export type Confidence = 'high' | 'medium' | 'low' | 'very_low' | 'unknown';

export type MatchStatus = 'matched' | 'needs_review';

export type CandidateSource = 'catalog' | 'other' | 'none';

export interface Validation {
  isTargetFormat: boolean;
  isPreferredRegion: boolean;
  reason: string;
}

export interface TextHint {
  artist: string | null;
  album: string | null;
}

export interface MatchResult {
  locator: string;
  filename: string;
  owner: string;
  status: MatchStatus;
  confidence: Confidence;
  method: ResolutionMethod;
  releaseId: number | null;
  releaseUrl: string | null;
  isTargetFormat: boolean;
  isPreferredRegion: boolean;
  candidateSource: CandidateSource;
  catalogCandidates: string[];   // audit: top same-service URLs
  otherCandidates: string[];     // audit: top other URLs (only when no same-service ones)
  hint: TextHint;
  bestGuessLabel: string | null;
  reason: string;
  errorMessage: string | null;
  alreadyInCollection: boolean;
}

import type {
  CatalogRelease,
  Confidence,
  MatchPreferences,
  ResolutionMethod,
  Validation,
} from '../shared/types.js';

/**
 * Format first, then region. Region is only judged for target-format releases.
 */
export function validateRelease(
  release: Pick<CatalogRelease, 'formats' | 'country'>,
  prefs: Pick<MatchPreferences, 'targetFormat' | 'preferredCountry'>
): Validation {
  const target = prefs.targetFormat.toLowerCase();
  const isTargetFormat = release.formats.some((f) => f.trim().toLowerCase() === target);

  if (!isTargetFormat) {
    const list = release.formats.length > 0 ? release.formats.join(', ') : 'none listed';
    return {
      isTargetFormat: false,
      isPreferredRegion: false,
      reason: `not target format ${prefs.targetFormat} (formats: ${list})`,
    };
  }

  const country = release.country.trim();
  if (!country) {
    return { isTargetFormat: true, isPreferredRegion: false, reason: `${prefs.targetFormat}, country not specified` };
  }
  if (country.toLowerCase() === prefs.preferredCountry.toLowerCase()) {
    return { isTargetFormat: true, isPreferredRegion: true, reason: `${prefs.targetFormat}, ${country}` };
  }
  return {
    isTargetFormat: true,
    isPreferredRegion: false,
    reason: `${prefs.targetFormat}, ${country} (not ${prefs.preferredCountry})`,
  };
}

export interface ConfidenceInput {
  method: ResolutionMethod;
  hasCatalogCandidates: boolean;
  isTargetFormat: boolean;
  isPreferredRegion: boolean;
}

export function confidenceBucket(input: ConfidenceInput): Confidence {
  const { method, hasCatalogCandidates, isTargetFormat, isPreferredRegion } = input;
  if (method === 'none' || !isTargetFormat) return 'unknown';

  switch (method) {
    case 'direct-release-url':
      // a direct hit pressed elsewhere falls outside the table
      return isPreferredRegion ? 'high' : 'unknown';
    case 'resolved-master-url':
      return 'medium';
    case 'text-search-fallback':
      return hasCatalogCandidates && isPreferredRegion ? 'low' : 'very_low';
  }
}

/**
 * Discogs API response shapes (only the fields we read).
 */

export interface DiscogsPagination {
  page: number;
  pages: number;
  per_page: number;
  items: number;
}

export interface DiscogsArtistCredit {
  id: number;
  name: string;
}

export interface DiscogsFormat {
  name: string;
  qty?: string;
  descriptions?: string[];
}

export interface DiscogsTrack {
  position: string;
  type_?: string;
  title: string;
  duration: string;
}

export interface DiscogsRelease {
  id: number;
  title: string;
  year?: number;
  uri?: string;
  country?: string;
  master_id?: number;
  artists?: DiscogsArtistCredit[];
  formats?: DiscogsFormat[];
  tracklist?: DiscogsTrack[];
}

export interface DiscogsMaster {
  id: number;
  title: string;
  main_release?: number;
  year?: number;
  versions_url?: string;
}

export interface DiscogsMasterVersion {
  id: number;
  title: string;
  country?: string;
  format?: string;
  major_formats?: string[];
}

export interface DiscogsMasterVersionsResponse {
  pagination: DiscogsPagination;
  versions: DiscogsMasterVersion[];
}

export interface DiscogsSearchResult {
  id: number;
  type: 'release' | 'master' | 'artist' | 'label';
  title: string;
  uri?: string;
  country?: string;
  format?: string[];
}

export interface DiscogsSearchResponse {
  pagination: DiscogsPagination;
  results: DiscogsSearchResult[];
}

export interface DiscogsFolder {
  id: number;
  name: string;
  count: number;
}

export interface DiscogsFoldersResponse {
  folders: DiscogsFolder[];
}

export interface DiscogsNote {
  field_id: number;
  value: string;
}

export interface DiscogsCollectionItem {
  id: number;
  instance_id: number;
  folder_id: number;
  basic_information?: {
    id: number;
    title: string;
    year?: number;
    artists?: DiscogsArtistCredit[];
  };
  notes?: DiscogsNote[];
}

export interface DiscogsCollectionReleasesResponse {
  pagination: DiscogsPagination;
  releases: DiscogsCollectionItem[];
}

export interface DiscogsField {
  id: number;
  name: string;
  type: string;
  options?: string[];
}

export interface DiscogsFieldsResponse {
  fields: DiscogsField[];
}

export interface DiscogsAddResponse {
  instance_id: number;
  resource_url?: string;
}

/**
 * Owner attribution from storage paths.
 *
 * One rule everywhere: the folder segments between the storage root and the
 * filename, joined with "_". The listing prefix plays no part, so
 * covers/Dad/Shed/a.jpg is owner "Dad_Shed" whether the run listed
 * covers/ or covers/Dad/. Objects outside the root use their full folder path.
 */

import type { ImageRecord } from '../shared/types.js';

export interface BlobLocation {
  bucket: string;
  name: string;
}

export function parseLocator(locator: string): BlobLocation | null {
  const match = /^gs:\/\/([^/]+)\/(.+)$/.exec(locator);
  if (!match) return null;
  return { bucket: match[1], name: match[2] };
}

export function toLocator(bucket: string, name: string): string {
  return `gs://${bucket}/${name}`;
}

function objectName(locator: string): string {
  return parseLocator(locator)?.name ?? locator;
}

export function filenameOf(locator: string): string {
  const name = objectName(locator);
  return name.slice(name.lastIndexOf('/') + 1);
}

export function ownerFromLocator(locator: string, root: string): string {
  const name = objectName(locator);
  const rel = root && name.startsWith(root) ? name.slice(root.length) : name;
  const segments = rel.split('/').filter(Boolean);
  segments.pop();
  return segments.join('_');
}

export function toImageRecord(locator: string, root: string): ImageRecord {
  return {
    locator,
    filename: filenameOf(locator),
    owner: ownerFromLocator(locator, root),
  };
}

/** Owner labels of the folders a prefix covers (used to pick playlist folders). */
export function ownersUnderPrefix(locators: string[], root: string): string[] {
  const owners = new Set<string>();
  for (const locator of locators) {
    const owner = ownerFromLocator(locator, root);
    if (owner) owners.add(owner);
  }
  return [...owners].sort();
}

import { Storage } from '@google-cloud/storage';

import { BlobStoreError, type BlobErrorKind } from '../shared/errors.js';
import { parseLocator, toLocator } from './owner.js';

export interface BlobStore {
  /** Image locators under `prefix`, sorted. */
  list(prefix: string): Promise<string[]>;
  read(locator: string): Promise<Buffer>;
}

export function hasImageExtension(name: string, extensions: string[]): boolean {
  const lower = name.toLowerCase();
  return extensions.some((ext) => lower.endsWith(ext));
}

function errorCode(err: unknown): number | null {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const code = err.code;
    if (typeof code === 'number') return code;
    if (typeof code === 'string' && /^\d+$/.test(code)) return Number(code);
  }
  return null;
}

export function toBlobStoreError(err: unknown): BlobStoreError {
  if (err instanceof BlobStoreError) return err;
  const message = err instanceof Error ? err.message : String(err);
  const code = errorCode(err);

  let kind: BlobErrorKind = 'unknown';
  if (code === 401 || /default credentials|invalid_grant|unauthenticated/i.test(message)) kind = 'auth';
  else if (code === 403) kind = 'permission';
  else if (code === 404) kind = 'not_found';
  return new BlobStoreError(kind, message);
}

/** Google Cloud Storage; credentials come from the environment (ADC). */
export class GcsBlobStore implements BlobStore {
  private readonly storage: Storage;

  constructor(
    private readonly bucketName: string,
    private readonly extensions: string[],
    storage?: Storage
  ) {
    this.storage = storage ?? new Storage();
  }

  async list(prefix: string): Promise<string[]> {
    try {
      const [files] = await this.storage.bucket(this.bucketName).getFiles({ prefix });
      return files
        .map((f) => f.name)
        .filter((name) => !name.endsWith('/') && hasImageExtension(name, this.extensions))
        .sort()
        .map((name) => toLocator(this.bucketName, name));
    } catch (err) {
      throw toBlobStoreError(err);
    }
  }

  async read(locator: string): Promise<Buffer> {
    const location = parseLocator(locator);
    if (!location) throw new BlobStoreError('not_found', `not a gs:// locator: ${locator}`);
    try {
      const [content] = await this.storage.bucket(location.bucket).file(location.name).download();
      return content;
    } catch (err) {
      throw toBlobStoreError(err);
    }
  }
}

/**
 * Error taxonomy
 *
 * Only ConfigurationError and BlobStoreError are meant to reach the CLI.
 * Remote errors travel inside HttpResult values; per-image and per-instance
 * failures become outcomes, not throws.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type BlobErrorKind = 'auth' | 'not_found' | 'permission' | 'unknown';

const BLOB_MESSAGES: Record<BlobErrorKind, string> = {
  auth: 'Storage authentication failed. Check GOOGLE_APPLICATION_CREDENTIALS or run `gcloud auth application-default login`.',
  not_found: 'Storage bucket or object not found. Check storage.bucket and the prefix.',
  permission: 'Storage permission denied. The credentials need read access to the bucket.',
  unknown: 'Storage request failed.',
};

export class BlobStoreError extends Error {
  readonly kind: BlobErrorKind;
  readonly detail: string;

  constructor(kind: BlobErrorKind, detail: string) {
    super(`${BLOB_MESSAGES[kind]} (${detail})`);
    this.name = 'BlobStoreError';
    this.kind = kind;
    this.detail = detail;
  }
}

// ──── Remote (HTTP) ───────────────────────────────────────────────

export type RemoteErrorKind = 'transient' | 'permanent' | 'conflict';

export abstract class RemoteError extends Error {
  abstract readonly kind: RemoteErrorKind;
  readonly status: number | null;   // null for network failures and timeouts
  readonly url: string;

  constructor(message: string, url: string, status: number | null) {
    super(message);
    this.url = url;
    this.status = status;
  }
}

export class TransientRemoteError extends RemoteError {
  readonly kind = 'transient';
  readonly retryAfterSec: number | null;

  constructor(message: string, url: string, status: number | null, retryAfterSec: number | null = null) {
    super(message, url, status);
    this.name = 'TransientRemoteError';
    this.retryAfterSec = retryAfterSec;
  }
}

export class PermanentRemoteError extends RemoteError {
  readonly kind = 'permanent';

  constructor(message: string, url: string, status: number | null) {
    super(message, url, status);
    this.name = 'PermanentRemoteError';
  }
}

/** 409, or a body that says the thing is already there. */
export class ConflictAlreadySatisfied extends RemoteError {
  readonly kind = 'conflict';

  constructor(message: string, url: string, status: number | null) {
    super(message, url, status);
    this.name = 'ConflictAlreadySatisfied';
  }
}

export function isAlreadySatisfied(status: number, body: string): boolean {
  return status === 409 || /already/i.test(body);
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

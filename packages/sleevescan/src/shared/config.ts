/**
 * Configuration loader for sleevescan
 * Loads from YAML config file with environment variable expansion
 */

import fs from 'node:fs';
import path from 'node:path';

import { parse } from 'yaml';

import { ConfigurationError } from './errors.js';
import type { PacingConfig, RetryPolicy, SleevescanConfig } from './types.js';

type Raw = Record<string, unknown>;

const DEFAULT_RETRY: RetryPolicy = {
  maxAttempts: 4,
  lookupAttempts: 6,
  baseDelayMs: 800,
  timeoutMs: 20_000,
};

const DEFAULT_PACING: PacingConfig = {
  lookupMs: 600,
  versionsPageMs: 500,
  addMs: 1100,
  moveMs: 800,
  folderMs: 500,
  fieldMs: 600,
  conditionMs: 1100,
  streamingMs: 300,
  playlistBatchMs: 200,
};

const ENV_OVERRIDES: Array<[string, [string, string]]> = [
  ['DISCOGS_USER', ['catalog', 'username']],
  ['DISCOGS_TOKEN', ['catalog', 'token']],
  ['SLEEVESCAN_BUCKET', ['storage', 'bucket']],
  ['SPOTIFY_CLIENT_ID', ['streaming', 'clientId']],
  ['SPOTIFY_CLIENT_SECRET', ['streaming', 'clientSecret']],
  ['SPOTIFY_REFRESH_TOKEN', ['streaming', 'refreshToken']],
];

function isRecord(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Expand environment variables in a string
 * Supports ${VAR} syntax
 */
function expandEnv(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value !== 'string') return value;
  return value.replace(/\$\{([^}]+)\}/g, (_, name: string) => env[name] ?? '');
}

/**
 * Recursively expand environment variables in an object
 */
export function deepExpand(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (Array.isArray(obj)) return obj.map((v) => deepExpand(v, env));
  if (isRecord(obj)) {
    const out: Raw = {};
    for (const [k, v] of Object.entries(obj)) {
      out[k] = deepExpand(v, env);
    }
    return out;
  }
  return expandEnv(obj, env);
}

/**
 * Deep merge two objects (secrets override config)
 */
export function deepMerge(target: Raw, source: Raw): Raw {
  const result: Raw = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined && sourceValue !== null && sourceValue !== '') {
      result[key] = sourceValue;
    }
  }

  return result;
}

function firstExisting(candidates: Array<string | undefined>): string | null {
  for (const candidate of candidates) {
    if (candidate && fs.existsSync(candidate)) return candidate;
  }
  return null;
}

/**
 * Find config file from multiple candidate locations
 */
function findConfigFile(baseDir: string, explicit?: string): string | null {
  return firstExisting([
    explicit,
    process.env.SLEEVESCAN_CONFIG,
    path.join(baseDir, 'config/config.yaml'),
    path.join(baseDir, 'config.yaml'),
    path.join(process.cwd(), 'sleevescan.yaml'),
    path.join(process.cwd(), 'config/sleevescan.yaml'),
  ]);
}

function findSecretsFile(baseDir: string, configPath: string | null): string | null {
  return firstExisting([
    process.env.SLEEVESCAN_SECRETS,
    configPath ? path.join(path.dirname(configPath), 'secrets.yaml') : undefined,
    path.join(baseDir, 'config/secrets.yaml'),
    path.join(process.cwd(), 'secrets.yaml'),
  ]);
}

function readYaml(filePath: string): Raw {
  const parsed: unknown = parse(fs.readFileSync(filePath, 'utf-8'));
  const expanded = deepExpand(parsed);
  return isRecord(expanded) ? expanded : {};
}

// ──── Typed readers ───────────────────────────────────────────────

function section(raw: Raw, key: string): Raw {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function str(raw: Raw, key: string, fallback: string): string {
  const value = raw[key];
  if (typeof value === 'string' && value !== '') return value;
  if (typeof value === 'number') return String(value);
  return fallback;
}

function num(raw: Raw, key: string, fallback: number): number {
  const value = raw[key];
  const n = typeof value === 'string' ? Number(value) : value;
  return typeof n === 'number' && Number.isFinite(n) ? n : fallback;
}

function bool(raw: Raw, key: string, fallback: boolean): boolean {
  const value = raw[key];
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return fallback;
}

function strList(raw: Raw, key: string, fallback: string[]): string[] {
  const value = raw[key];
  if (!Array.isArray(value)) return fallback;
  return value.filter((v): v is string => typeof v === 'string');
}

function withTrailingSlash(prefix: string): string {
  return prefix === '' || prefix.endsWith('/') ? prefix : `${prefix}/`;
}

function applyEnvOverrides(raw: Raw, env: NodeJS.ProcessEnv): Raw {
  let out = raw;
  for (const [name, [sect, key]] of ENV_OVERRIDES) {
    const value = env[name];
    if (value) out = deepMerge(out, { [sect]: { [key]: value } });
  }
  return out;
}

/**
 * Validate a merged raw config and fill defaults.
 * Relative paths resolve against baseDir.
 */
export function parseConfig(input: Raw, baseDir: string, env: NodeJS.ProcessEnv = process.env): SleevescanConfig {
  const raw = applyEnvOverrides(input, env);

  const storage = section(raw, 'storage');
  const labels = section(raw, 'labels');
  const catalog = section(raw, 'catalog');
  const app = section(catalog, 'app');
  const matching = section(raw, 'matching');
  const conditions = section(raw, 'conditions');
  const retry = section(raw, 'retry');
  const pacing = section(raw, 'pacing');
  const streaming = section(raw, 'streaming');
  const output = section(raw, 'output');

  const username = str(catalog, 'username', '');
  const token = str(catalog, 'token', '');
  if (!username || !token) {
    throw new ConfigurationError(
      'catalog.username and catalog.token are required (or set DISCOGS_USER / DISCOGS_TOKEN)'
    );
  }

  const dataDir = path.resolve(baseDir, str(output, 'dataDir', 'data'));
  const root = withTrailingSlash(str(storage, 'root', 'covers/'));

  return {
    storage: {
      bucket: str(storage, 'bucket', ''),
      root,
      prefix: withTrailingSlash(str(storage, 'prefix', root)),
      extensions: strList(storage, 'extensions', ['.jpg', '.jpeg', '.png']).map((e) => e.toLowerCase()),
    },
    labels: {
      batchSize: Math.min(16, Math.max(1, num(labels, 'batchSize', 8))),
      cachePath: path.resolve(dataDir, str(labels, 'cachePath', 'label-cache.json')),
    },
    catalog: {
      baseUrl: str(catalog, 'baseUrl', 'https://api.discogs.com').replace(/\/+$/, ''),
      username,
      token,
      app: {
        name: str(app, 'name', 'sleevescan'),
        version: str(app, 'version', '0.1.0'),
        contact: str(app, 'contact', ''),
        url: str(app, 'url', ''),
      },
      intakeFolderId: num(catalog, 'intakeFolderId', 1),
      searchPageSize: num(catalog, 'searchPageSize', 10),
      versionsPageSize: num(catalog, 'versionsPageSize', 100),
    },
    matching: {
      targetFormat: str(matching, 'targetFormat', 'Vinyl'),
      preferredCountry: str(matching, 'preferredCountry', 'US'),
      candidateLimit: num(matching, 'candidateLimit', 10),
      auditLimit: num(matching, 'auditLimit', 3),
    },
    conditions: {
      media: str(conditions, 'media', 'Very Good (VG)'),
      sleeve: str(conditions, 'sleeve', 'Good Plus (G+)'),
    },
    retry: {
      maxAttempts: num(retry, 'maxAttempts', DEFAULT_RETRY.maxAttempts),
      lookupAttempts: num(retry, 'lookupAttempts', DEFAULT_RETRY.lookupAttempts),
      baseDelayMs: num(retry, 'baseDelayMs', DEFAULT_RETRY.baseDelayMs),
      timeoutMs: num(retry, 'timeoutMs', DEFAULT_RETRY.timeoutMs),
    },
    pacing: {
      lookupMs: num(pacing, 'lookupMs', DEFAULT_PACING.lookupMs),
      versionsPageMs: num(pacing, 'versionsPageMs', DEFAULT_PACING.versionsPageMs),
      addMs: num(pacing, 'addMs', DEFAULT_PACING.addMs),
      moveMs: num(pacing, 'moveMs', DEFAULT_PACING.moveMs),
      folderMs: num(pacing, 'folderMs', DEFAULT_PACING.folderMs),
      fieldMs: num(pacing, 'fieldMs', DEFAULT_PACING.fieldMs),
      conditionMs: num(pacing, 'conditionMs', DEFAULT_PACING.conditionMs),
      streamingMs: num(pacing, 'streamingMs', DEFAULT_PACING.streamingMs),
      playlistBatchMs: num(pacing, 'playlistBatchMs', DEFAULT_PACING.playlistBatchMs),
    },
    streaming: {
      clientId: str(streaming, 'clientId', ''),
      clientSecret: str(streaming, 'clientSecret', ''),
      refreshToken: str(streaming, 'refreshToken', ''),
      apiUrl: str(streaming, 'apiUrl', 'https://api.spotify.com/v1').replace(/\/+$/, ''),
      accountsUrl: str(streaming, 'accountsUrl', 'https://accounts.spotify.com').replace(/\/+$/, ''),
      playlistUrl: str(streaming, 'playlistUrl', ''),
      sourceFolder: str(streaming, 'sourceFolder', ''),
      publicPlaylists: bool(streaming, 'publicPlaylists', false),
    },
    output: {
      dataDir,
      dbPath: path.resolve(dataDir, str(output, 'dbPath', 'sleevescan.sqlite')),
      reportPath: path.resolve(dataDir, str(output, 'reportPath', 'records.csv')),
      logDir: path.resolve(dataDir, str(output, 'logDir', 'logs')),
    },
  };
}

/**
 * Load and validate configuration
 */
export function loadConfig(baseDir: string, explicitPath?: string): SleevescanConfig {
  const configPath = findConfigFile(baseDir, explicitPath);
  if (explicitPath && !configPath) {
    throw new ConfigurationError(`Config file not found: ${explicitPath}`);
  }

  // A config file is optional: env vars alone can carry the credentials
  let merged: Raw = configPath ? readYaml(configPath) : {};

  const secretsPath = findSecretsFile(baseDir, configPath);
  if (secretsPath) {
    merged = deepMerge(merged, readYaml(secretsPath));
  }

  return parseConfig(merged, baseDir);
}

export function requireStorage(config: SleevescanConfig): void {
  if (!config.storage.bucket) {
    throw new ConfigurationError('storage.bucket is required (or set SLEEVESCAN_BUCKET)');
  }
}

export function requireStreaming(config: SleevescanConfig): void {
  const s = config.streaming;
  if (!s.clientId || !s.clientSecret || !s.refreshToken) {
    throw new ConfigurationError(
      'streaming.clientId, streaming.clientSecret and streaming.refreshToken are required for playlists'
    );
  }
}

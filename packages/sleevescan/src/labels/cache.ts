/**
 * Label response cache: a pretty-printed JSON object keyed by image locator.
 * Read once per run, written back after new entries land. Not safe for
 * concurrent writers. Error results are never stored.
 */

import fs from 'node:fs';
import path from 'node:path';

import type { LabelResult } from '../shared/types.js';

function isStringOrNull(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

export function isLabelResult(value: unknown): value is LabelResult {
  if (typeof value !== 'object' || value === null) return false;
  if (!('locator' in value) || !('pageUrls' in value)) return false;
  const { locator, pageUrls } = value;
  return (
    typeof locator === 'string' &&
    Array.isArray(pageUrls) &&
    pageUrls.every((u) => typeof u === 'string') &&
    (!('bestGuessLabel' in value) || isStringOrNull(value.bestGuessLabel)) &&
    (!('ocrText' in value) || isStringOrNull(value.ocrText))
  );
}

export class LabelCache {
  private entries = new Map<string, LabelResult>();
  private dirty = false;

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  get size(): number {
    return this.entries.size;
  }

  load(): this {
    this.entries.clear();
    if (!fs.existsSync(this.filePath)) return this;

    const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return this;

    for (const [locator, value] of Object.entries(parsed)) {
      if (isLabelResult(value)) {
        this.entries.set(locator, {
          locator,
          pageUrls: value.pageUrls,
          bestGuessLabel: value.bestGuessLabel ?? null,
          ocrText: value.ocrText ?? null,
          error: null,
        });
      }
    }
    return this;
  }

  get(locator: string): LabelResult | undefined {
    return this.entries.get(locator);
  }

  /** Locators with no cached result, in input order. */
  missing(locators: string[]): string[] {
    return locators.filter((l) => !this.entries.has(l));
  }

  set(result: LabelResult): boolean {
    if (result.error) return false;
    this.entries.set(result.locator, result);
    this.dirty = true;
    return true;
  }

  save(): void {
    if (!this.dirty) return;
    const out: Record<string, LabelResult> = {};
    for (const [locator, result] of this.entries) out[locator] = result;

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(out, null, 2));
    fs.renameSync(tmpPath, this.filePath);
    this.dirty = false;
  }

  clear(): void {
    this.entries.clear();
    if (fs.existsSync(this.filePath)) fs.rmSync(this.filePath);
    this.dirty = false;
  }
}

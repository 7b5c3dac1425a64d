import fs from 'node:fs';
import path from 'node:path';

import type { EventSink, RunEvent } from './events.js';

export interface RunLogEntry {
  at: string;
  event: RunEvent;
}

export interface RunStatus {
  runId: string;
  command: string;
  startedAt: string;
  finishedAt: string | null;
  counts: Record<string, number>;
  fatal: string | null;
}

/**
 * JSON checkpoint log of one run.
 * Entries are flushed atomically every `flushEvery` events or
 * `flushIntervalMs`, whichever comes first, and always on finish().
 */
export class RunLog implements EventSink {
  readonly runId: string;
  private readonly logPath: string;
  private readonly statusPath: string;
  private readonly entries: RunLogEntry[] = [];
  private readonly counts: Record<string, number> = {};
  private readonly startedAt = new Date().toISOString();
  private lastFlushedCount = 0;
  private lastFlushedAt = 0;
  private readonly flushEvery: number;
  private readonly flushIntervalMs: number;

  constructor(
    logDir: string,
    private readonly command: string,
    opts?: { flushEvery?: number; flushIntervalMs?: number; runId?: string }
  ) {
    this.runId = opts?.runId ?? this.startedAt.replace(/[:.]/g, '-');
    this.logPath = path.join(logDir, `run-${this.runId}.json`);
    this.statusPath = path.join(logDir, 'last-run.json');
    this.flushEvery = opts?.flushEvery ?? 10;
    this.flushIntervalMs = opts?.flushIntervalMs ?? 15000;
  }

  get path(): string {
    return this.logPath;
  }

  emit(event: RunEvent): void {
    if (event.type === 'progress') return;
    this.entries.push({ at: new Date().toISOString(), event });
    const key = event.type === 'reconcile' ? `${event.op}:${event.outcome}` : event.type;
    this.counts[key] = (this.counts[key] ?? 0) + 1;
    this.checkpoint();
  }

  private checkpoint(): void {
    const since = this.entries.length - this.lastFlushedCount;
    if (since >= this.flushEvery || Date.now() - this.lastFlushedAt >= this.flushIntervalMs) {
      this.writeAtomic(this.logPath, this.entries);
      this.lastFlushedCount = this.entries.length;
      this.lastFlushedAt = Date.now();
    }
  }

  finish(fatal: string | null = null): RunStatus {
    this.writeAtomic(this.logPath, this.entries);
    const status: RunStatus = {
      runId: this.runId,
      command: this.command,
      startedAt: this.startedAt,
      finishedAt: new Date().toISOString(),
      counts: { ...this.counts },
      fatal,
    };
    this.writeAtomic(this.statusPath, status);
    return status;
  }

  private writeAtomic(filePath: string, data: unknown): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const tmpPath = `${filePath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2));
    fs.renameSync(tmpPath, filePath);
  }
}

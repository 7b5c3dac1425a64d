/**
 * Structured run events.
 * Core modules emit these; the CLI decides how (and whether) to show them.
 */

import { cyan, dim, green, red, yellow } from 'colorette';

import type { Confidence, MatchStatus, ResolutionMethod } from './types.js';

export type ReconcileOp = 'add' | 'file' | 'folder' | 'conditions';

export type RunEvent =
  | { type: 'retry'; url: string; attempt: number; maxAttempts: number; delayMs: number; reason: string }
  | { type: 'lookup_failed'; target: string; message: string }
  | {
      type: 'image_resolved';
      index: number;
      total: number;
      filename: string;
      status: MatchStatus;
      confidence: Confidence;
      method: ResolutionMethod;
      releaseId: number | null;
      reason: string;
    }
  | { type: 'reconcile'; op: ReconcileOp; releaseId: number; outcome: string; detail?: string }
  | { type: 'playlist'; folder: string; album: string; outcome: string; detail?: string }
  | { type: 'progress'; phase: string; done: number; total: number }
  | { type: 'info'; message: string }
  | { type: 'warn'; message: string };

export interface EventSink {
  emit(event: RunEvent): void;
}

export const nullSink: EventSink = {
  emit() {},
};

export function fanOut(...sinks: EventSink[]): EventSink {
  return {
    emit(event) {
      for (const sink of sinks) sink.emit(event);
    },
  };
}

// ──── Console rendering ─────────────────────────────────────────────

const OUTCOME_COLOURS: Record<string, (s: string) => string> = {
  added: green,
  filed: green,
  updated: green,
  created: green,
  present: dim,
  'already-filed': dim,
  'already-set': dim,
  skipped: yellow,
  'not-found': yellow,
  failed: red,
};

export class ConsoleSink implements EventSink {
  private lastProgress = 0;

  constructor(private readonly opts: { verbose?: boolean } = {}) {}

  emit(event: RunEvent): void {
    switch (event.type) {
      case 'retry':
        if (this.opts.verbose) {
          console.log(dim(`  ↻ ${event.reason} — retry ${event.attempt}/${event.maxAttempts} in ${(event.delayMs / 1000).toFixed(1)}s`));
        }
        break;
      case 'lookup_failed':
        console.log(yellow(`  ⚠ ${event.target}: ${event.message}`));
        break;
      case 'image_resolved': {
        const mark = event.status === 'matched' ? green('✓') : yellow('?');
        const id = event.releaseId != null ? `#${event.releaseId}` : '—';
        console.log(
          `  ${mark} [${event.index}/${event.total}] ${event.filename.padEnd(32)} ${id.padEnd(10)} ${event.confidence.padEnd(8)} ${dim(event.reason)}`
        );
        break;
      }
      case 'reconcile': {
        const colour = OUTCOME_COLOURS[event.outcome] ?? ((s: string) => s);
        const detail = event.detail ? dim(` ${event.detail}`) : '';
        console.log(`  ${event.op.padEnd(10)} #${String(event.releaseId).padEnd(10)} ${colour(event.outcome)}${detail}`);
        break;
      }
      case 'playlist': {
        const colour = OUTCOME_COLOURS[event.outcome] ?? ((s: string) => s);
        const detail = event.detail ? dim(` ${event.detail}`) : '';
        console.log(`  ${cyan(event.folder)} ${event.album} → ${colour(event.outcome)}${detail}`);
        break;
      }
      case 'progress': {
        const now = Date.now();
        if (event.done < event.total && now - this.lastProgress < 500) return;
        this.lastProgress = now;
        process.stdout.write(`\r  ${event.phase} ${event.done}/${event.total}   `);
        if (event.done >= event.total) process.stdout.write('\n');
        break;
      }
      case 'info':
        console.log(`  ${event.message}`);
        break;
      case 'warn':
        console.log(yellow(`  ⚠ ${event.message}`));
        break;
    }
  }
}

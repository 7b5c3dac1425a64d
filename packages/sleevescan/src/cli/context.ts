/**
 * Wiring shared by the subcommands: config, sinks, HTTP and catalog clients.
 */

import { CatalogClient } from '../catalog/client.js';
import { HttpInvoker } from '../http/invoker.js';
import { ReconciliationEngine } from '../reconcile/engine.js';
import { loadConfig } from '../shared/config.js';
import { describeError } from '../shared/errors.js';
import { ConsoleSink, fanOut, type EventSink } from '../shared/events.js';
import { sleep } from '../shared/pacing.js';
import { RunLog } from '../shared/runLog.js';
import type { SleevescanConfig } from '../shared/types.js';

export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

export interface CliContext {
  config: SleevescanConfig;
  events: EventSink;
  runLog: RunLog;
  invoker: HttpInvoker;
  catalog: CatalogClient;
  engine: ReconciliationEngine;
}

export function createContext(baseDir: string, command: string, opts: GlobalOptions): CliContext {
  const config = loadConfig(baseDir, opts.config);
  const runLog = new RunLog(config.output.logDir, command);
  const events = fanOut(new ConsoleSink({ verbose: opts.verbose }), runLog);

  const invoker = new HttpInvoker({ policy: config.retry, sleep, events });
  const catalog = new CatalogClient(config, { invoker, events, sleep });
  const engine = new ReconciliationEngine(catalog, {
    intakeFolderId: config.catalog.intakeFolderId,
    conditions: config.conditions,
    events,
  });

  return { config, events, runLog, invoker, catalog, engine };
}

/**
 * Print, close the run log if there is one, and mark the process failed.
 * Callers' finally blocks still run; the process exits 1 once they have.
 */
export function fail(err: unknown, runLog?: RunLog): void {
  const message = describeError(err);
  runLog?.finish(message);
  console.error(message);
  process.exitCode = 1;
}

export function parseCount(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n) || n < 0) throw new Error(`${name} must be a non-negative integer (got "${value}")`);
  return n;
}

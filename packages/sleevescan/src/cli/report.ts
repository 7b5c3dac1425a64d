/**
 * sleevescan report
 * Print a recorded intake run and its review list.
 */

import { Command } from 'commander';

import { SleevescanDb } from '../db/client.js';
import { printStoredRun } from '../report/report.js';
import { loadConfig } from '../shared/config.js';
import { fail, parseCount } from './context.js';

interface ReportCliOptions {
  config?: string;
  run?: string;
}

export function reportCommand(baseDir: string): Command {
  return new Command('report')
    .description('Print the summary and review list of an intake run')
    .option('-c, --config <path>', 'Config file')
    .option('-r, --run <id>', 'Run id (default: latest intake run)')
    .action((opts: ReportCliOptions) => {
      let db: SleevescanDb | null = null;
      try {
        const config = loadConfig(baseDir, opts.config);
        const runId = parseCount(opts.run, '--run');
        db = new SleevescanDb(config.output.dbPath);
        if (!printStoredRun(db, runId)) {
          fail(runId !== undefined ? `Run #${runId} not found` : 'No intake run recorded yet.');
        }
      } catch (err) {
        fail(err);
      } finally {
        db?.close();
      }
    });
}

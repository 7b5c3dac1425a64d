/**
 * sleevescan organize
 * File matched releases from an earlier intake run into owner folders.
 */

import fs from 'node:fs';

import { Command } from 'commander';

import { SleevescanDb } from '../db/client.js';
import { filingPlan, organize } from '../pipeline/organize.js';
import { filingPlanFromCsv, type FilingEntry } from '../report/csv.js';
import { banner } from '../report/report.js';
import { createContext, fail, parseCount, type CliContext } from './context.js';

interface OrganizeCliOptions {
  config?: string;
  verbose?: boolean;
  run?: string;
  csv?: string;
}

export function organizeCommand(baseDir: string): Command {
  return new Command('organize')
    .description('Move matched releases from the intake folder into per-owner folders')
    .option('-c, --config <path>', 'Config file')
    .option('-r, --run <id>', 'Intake run to organize (default: latest)')
    .option('--csv <path>', 'Read matches from a records.csv instead of the run store')
    .option('-v, --verbose', 'Show retries')
    .action(async (opts: OrganizeCliOptions) => {
      let ctx: CliContext | undefined;
      try {
        ctx = createContext(baseDir, 'organize', opts);
        const plan = opts.csv ? planFromCsv(opts.csv) : planFromStore(ctx.config.output.dbPath, parseCount(opts.run, '--run'));
        if (plan.length === 0) {
          console.log('No matched releases with an owner. Nothing to organize.');
          ctx.runLog.finish();
          return;
        }

        console.log(banner(`Organize (${plan.length} releases)`));
        const summary = await organize(plan, ctx.engine, ctx.events);

        console.log(banner('Organize complete'));
        console.log(`  Filed         : ${summary.filed}`);
        console.log(`  Already filed : ${summary['already-filed']}`);
        console.log(`  Not found     : ${summary['not-found']}`);
        console.log(`  Failed        : ${summary.failed}`);
        ctx.runLog.finish();
      } catch (err) {
        fail(err, ctx?.runLog);
      }
    });
}

function planFromCsv(csvPath: string): FilingEntry[] {
  if (!fs.existsSync(csvPath)) throw new Error(`${csvPath} not found. Run intake first to generate it.`);
  return filingPlanFromCsv(fs.readFileSync(csvPath, 'utf-8'));
}

function planFromStore(dbPath: string, runId: number | undefined): FilingEntry[] {
  const db = new SleevescanDb(dbPath);
  try {
    const run = runId !== undefined ? db.getRun(runId) : db.latestIntakeRun();
    if (!run) throw new Error(runId !== undefined ? `Run #${runId} not found` : 'No intake run recorded yet. Run intake first.');
    console.log(`Loading matches from run #${run.id} (${run.started_at})`);
    return filingPlan(db.getMatches({ runId: run.id, status: 'matched' }));
  } finally {
    db.close();
  }
}

/**
 * sleevescan conditions
 * Fill blank media / sleeve conditions across the whole collection.
 */

import { Command } from 'commander';

import { backfillConditions } from '../pipeline/conditions.js';
import { banner } from '../report/report.js';
import { sleep } from '../shared/pacing.js';
import { createContext, fail, type CliContext } from './context.js';

interface ConditionsCliOptions {
  config?: string;
  verbose?: boolean;
}

export function conditionsCommand(baseDir: string): Command {
  return new Command('conditions')
    .description('Set default media / sleeve conditions where they are blank')
    .option('-c, --config <path>', 'Config file')
    .option('-v, --verbose', 'Show retries')
    .action(async (opts: ConditionsCliOptions) => {
      let ctx: CliContext | undefined;
      try {
        ctx = createContext(baseDir, 'conditions', opts);
        const { config } = ctx;
        console.log(banner('Condition back-fill'));
        console.log(`  Media  : ${config.conditions.media}`);
        console.log(`  Sleeve : ${config.conditions.sleeve}`);
        console.log('');

        const summary = await backfillConditions({
          collection: ctx.catalog,
          engine: ctx.engine,
          events: ctx.events,
          sleep,
          pauseMs: config.pacing.conditionMs,
        });
        if (!summary) throw new Error('Could not list the collection.');

        console.log(banner('Conditions complete'));
        console.log(`  Instances   : ${summary.instances}`);
        console.log(`  Updated     : ${summary.updated}`);
        console.log(`  Already set : ${summary['already-set']}`);
        console.log(`  Skipped     : ${summary.skipped}`);
        console.log(`  Failed      : ${summary.failed}`);
        ctx.runLog.finish();
      } catch (err) {
        fail(err, ctx?.runLog);
      }
    });
}

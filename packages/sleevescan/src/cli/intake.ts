/**
 * sleevescan intake / test-match
 * Label cover images, resolve them to catalog releases, add and file them.
 */

import { Command } from 'commander';

import { SleevescanDb } from '../db/client.js';
import { LabelCache } from '../labels/cache.js';
import { VisionLabelService } from '../labels/vision.js';
import { MatchResolver } from '../matching/resolver.js';
import { IntakeWorkflow, type IntakeSummary } from '../pipeline/intake.js';
import { banner, printReviewList, printTestMatches } from '../report/report.js';
import { requireStorage } from '../shared/config.js';
import { sleep } from '../shared/pacing.js';
import { GcsBlobStore } from '../storage/blobStore.js';
import { createContext, fail, parseCount, type CliContext } from './context.js';

interface IntakeCliOptions {
  config?: string;
  verbose?: boolean;
  prefix?: string;
  limit?: string;
  dryRun?: boolean;
  skipConditions?: boolean;
}

const TEST_MATCH_LIMIT = 10;

export function intakeCommand(baseDir: string): Command {
  return new Command('intake')
    .description('Label cover images, match them to releases, add them to the collection and file them by owner')
    .option('-c, --config <path>', 'Config file')
    .option('-p, --prefix <prefix>', 'Storage prefix to scan (default: storage.prefix)')
    .option('-n, --limit <n>', 'Only process the first n images')
    .option('--dry-run', 'Resolve and print matches; no report, no collection changes')
    .option('--skip-conditions', 'Do not back-fill media / sleeve conditions afterwards')
    .option('-v, --verbose', 'Show retries')
    .action(async (opts: IntakeCliOptions) => {
      await runIntake(baseDir, 'intake', opts);
    });
}

export function testMatchCommand(baseDir: string): Command {
  return new Command('test-match')
    .description(`Resolve the first ${TEST_MATCH_LIMIT} images and print the matches; changes nothing`)
    .option('-c, --config <path>', 'Config file')
    .option('-p, --prefix <prefix>', 'Storage prefix to scan (default: storage.prefix)')
    .option('-v, --verbose', 'Show retries')
    .action(async (opts: IntakeCliOptions) => {
      await runIntake(baseDir, 'test-match', { ...opts, limit: String(TEST_MATCH_LIMIT), dryRun: true });
    });
}

async function runIntake(baseDir: string, command: string, opts: IntakeCliOptions): Promise<void> {
  let ctx: CliContext | undefined;
  let db: SleevescanDb | null = null;
  try {
    ctx = createContext(baseDir, command, opts);
    const { config, events, catalog, engine } = ctx;
    requireStorage(config);

    const dryRun = Boolean(opts.dryRun);
    const prefix = opts.prefix ?? config.storage.prefix;
    const limit = parseCount(opts.limit, '--limit');

    console.log(banner(dryRun ? 'Match preview (dry run)' : 'Intake'));
    console.log(`  Bucket  : ${config.storage.bucket}`);
    console.log(`  Prefix  : ${prefix}`);
    console.log(`  Target  : ${config.matching.targetFormat} / ${config.matching.preferredCountry}`);
    if (limit !== undefined) console.log(`  Limit   : ${limit}`);
    console.log('');

    db = dryRun ? null : new SleevescanDb(config.output.dbPath);
    const workflow = new IntakeWorkflow({
      config,
      blobs: new GcsBlobStore(config.storage.bucket, config.storage.extensions),
      labels: new VisionLabelService({ batchSize: config.labels.batchSize, events }),
      labelCache: new LabelCache(config.labels.cachePath).load(),
      resolver: new MatchResolver(catalog, config.matching),
      catalog,
      engine,
      collection: catalog,
      db,
      events,
      sleep,
    });

    const summary = await workflow.run({ prefix, limit, dryRun, skipConditions: Boolean(opts.skipConditions) });

    if (dryRun) {
      printTestMatches(summary.results);
      console.log('Dry run complete. No report written, no collection changes.');
    } else {
      printSummary(summary, ctx);
      printReviewList(summary.results);
    }

    const status = ctx.runLog.finish();
    console.log(`\nRun log: ${ctx.runLog.path} (${status.runId})`);
  } catch (err) {
    fail(err, ctx?.runLog);
  } finally {
    db?.close();
  }
}

function printSummary(s: IntakeSummary, ctx: CliContext): void {
  console.log(banner('Intake complete'));
  console.log(`  Images        : ${s.images} (${s.cachedLabels} labels from cache)`);
  console.log(`  Matched       : ${s.matched}`);
  console.log(`  Needs review  : ${s.needsReview}`);
  console.log(`  Already owned : ${s.alreadyOwned}`);
  console.log(`  Added         : ${s.added} (+${s.present} already present)`);
  console.log(`  Filed         : ${s.filed}`);
  console.log(`  Failures      : ${s.failures}`);
  if (s.conditions) {
    console.log(`  Conditions    : ${s.conditions.updated} updated, ${s.conditions['already-set']} already set, ${s.conditions.skipped} skipped`);
  }
  if (s.runId !== null) console.log(`  Run           : #${s.runId} → ${ctx.config.output.dbPath}`);
  console.log(`  Report        : ${ctx.config.output.reportPath}`);
}

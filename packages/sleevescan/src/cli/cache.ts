/**
 * Label cache commands
 */

import { Command } from 'commander';

import { LabelCache } from '../labels/cache.js';
import { loadConfig } from '../shared/config.js';
import { fail } from './context.js';

interface CacheCliOptions {
  config?: string;
  confirm?: boolean;
}

export function cacheCommand(baseDir: string): Command {
  const cmd = new Command('cache')
    .description('Inspect or clear the label cache');

  cmd
    .command('stats')
    .description('Show label cache statistics')
    .option('-c, --config <path>', 'Config file')
    .action((opts: CacheCliOptions) => {
      try {
        const config = loadConfig(baseDir, opts.config);
        const cache = new LabelCache(config.labels.cachePath).load();
        console.log(`Label cache : ${cache.path}`);
        console.log(`Entries     : ${cache.size}`);
      } catch (err) {
        fail(err);
      }
    });

  cmd
    .command('clear')
    .description('Delete the label cache (every image is annotated again on the next run)')
    .option('-c, --config <path>', 'Config file')
    .option('--confirm', 'Confirm cache clear')
    .action((opts: CacheCliOptions) => {
      try {
        if (!opts.confirm) {
          fail('Error: --confirm flag is required to clear the cache');
          return;
        }

        const config = loadConfig(baseDir, opts.config);
        const cache = new LabelCache(config.labels.cachePath).load();
        const entries = cache.size;
        cache.clear();
        console.log(`Cleared ${entries} entries from ${cache.path}`);
      } catch (err) {
        fail(err);
      }
    });

  return cmd;
}

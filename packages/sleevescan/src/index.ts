#!/usr/bin/env node
/**
 * sleevescan - identify photographed vinyl covers and reconcile them into a
 * Discogs collection, filed by owner.
 */

import { fileURLToPath } from 'node:url';

import { Command } from 'commander';

import { cacheCommand } from './cli/cache.js';
import { conditionsCommand } from './cli/conditions.js';
import { intakeCommand, testMatchCommand } from './cli/intake.js';
import { organizeCommand } from './cli/organize.js';
import { playlistsCommand } from './cli/playlists.js';
import { reportCommand } from './cli/report.js';

const baseDir = fileURLToPath(new URL('..', import.meta.url));

const program = new Command();

program
  .name('sleevescan')
  .description('Identify photographed vinyl covers and file them into a Discogs collection')
  .version('0.1.0');

program.addCommand(intakeCommand(baseDir));
program.addCommand(testMatchCommand(baseDir));
program.addCommand(organizeCommand(baseDir));
program.addCommand(conditionsCommand(baseDir));
program.addCommand(playlistsCommand(baseDir));
program.addCommand(reportCommand(baseDir));
program.addCommand(cacheCommand(baseDir));

await program.parseAsync(process.argv);

/**
 * sleevescan playlists
 * Turn collection folders into streaming playlists.
 */

import path from 'node:path';

import { Command } from 'commander';

import { unmatchedAlbumsCsv, unmatchedTracksCsv, writeFileAtomic } from '../report/csv.js';
import { banner, printPlaylistSummary } from '../report/report.js';
import { requireStorage, requireStreaming } from '../shared/config.js';
import { sleep } from '../shared/pacing.js';
import { GcsBlobStore } from '../storage/blobStore.js';
import { ownersUnderPrefix } from '../storage/owner.js';
import { StreamingClient } from '../streaming/client.js';
import { parsePlaylistId, PlaylistBuilder, type PlaylistTarget } from '../streaming/playlists.js';
import { createContext, fail, type CliContext } from './context.js';

interface PlaylistsCliOptions {
  config?: string;
  verbose?: boolean;
  folder?: string;
  prefix?: string;
  playlist?: string;
}

export function playlistsCommand(baseDir: string): Command {
  return new Command('playlists')
    .description('Build streaming playlists from collection folders')
    .option('-c, --config <path>', 'Config file')
    .option('-f, --folder <name>', 'Only this collection folder (default: streaming.sourceFolder)')
    .option('-p, --prefix <prefix>', 'Only the owner folders found under this storage prefix')
    .option('--playlist <ref>', 'Append to this playlist (URL, URI or id) instead of creating one per folder')
    .option('-v, --verbose', 'Show retries')
    .action(async (opts: PlaylistsCliOptions) => {
      let ctx: CliContext | undefined;
      try {
        ctx = createContext(baseDir, 'playlists', opts);
        const { config, events, catalog, invoker } = ctx;
        requireStreaming(config);

        const ref = opts.playlist ?? config.streaming.playlistUrl;
        let target: PlaylistTarget = { mode: 'per-folder' };
        if (ref) {
          const playlistId = parsePlaylistId(ref);
          if (!playlistId) throw new Error(`Not a playlist URL, URI or id: ${ref}`);
          target = { mode: 'append', playlistId };
        }

        let owners: string[] | undefined;
        if (opts.prefix) {
          requireStorage(config);
          const blobs = new GcsBlobStore(config.storage.bucket, config.storage.extensions);
          owners = ownersUnderPrefix(await blobs.list(opts.prefix), config.storage.root);
          console.log(`Owners under ${opts.prefix}: ${owners.join(', ') || '(none)'}`);
        }

        const builder = new PlaylistBuilder(new StreamingClient(config, { invoker, sleep }), catalog, {
          publicPlaylists: config.streaming.publicPlaylists,
          pauseMs: config.pacing.streamingMs,
          sleep,
          events,
        });

        const selection = await builder.selectFolders({ sourceFolder: opts.folder ?? config.streaming.sourceFolder, owners });
        if (!selection.ok) throw new Error(selection.error);
        if (selection.folders.length === 0) {
          console.log('No collection folders selected. Nothing to do.');
          ctx.runLog.finish();
          return;
        }

        console.log(banner(target.mode === 'append' ? `Append to playlist ${target.playlistId}` : 'One playlist per folder'));
        console.log(`  Folders : ${selection.folders.map((f) => `${f.name} (${f.count})`).join(', ')}`);
        console.log('');

        const result = await builder.build(selection.folders, target);
        printPlaylistSummary(result);

        const dataDir = config.output.dataDir;
        if (result.unmatchedAlbums.length) {
          const file = path.join(dataDir, 'unmatched_albums.csv');
          writeFileAtomic(file, unmatchedAlbumsCsv(result.unmatchedAlbums));
          console.log(`Wrote ${result.unmatchedAlbums.length} unmatched albums to ${file}`);
        }
        if (result.unmatchedTracks.length) {
          const file = path.join(dataDir, 'unmatched_tracks.csv');
          writeFileAtomic(file, unmatchedTracksCsv(result.unmatchedTracks));
          console.log(`Wrote ${result.unmatchedTracks.length} unmatched tracks to ${file}`);
        }
        ctx.runLog.finish(result.errors.length ? result.errors.join('; ') : null);
      } catch (err) {
        fail(err, ctx?.runLog);
      }
    });
}

/**
 * history command - List stored analyses
 */

import { Command } from 'commander';
import path from 'node:path';

import { JsonAnalysisStore } from '../../storage/json-store.js';
import { resolveConfig } from './shared.js';

interface HistoryCommandOptions {
  config?: string;
  directory?: string;
  json: boolean;
}

export const historyCommand = new Command('history')
  .description('List stored analyses, newest first')
  .option('-c, --config <path>', 'Path to config file')
  .option('-d, --directory <path>', 'Snapshot directory (overrides config)')
  .option('--json', 'Output as JSON', false)
  .action(async (options: HistoryCommandOptions) => {
    try {
      const config = await resolveConfig(options.config, process.cwd());
      const store = new JsonAnalysisStore(path.resolve(options.directory ?? config.storage.directory));
      const snapshots = await store.list();

      if (options.json) {
        console.log(JSON.stringify(snapshots, null, 2));
        return;
      }

      if (snapshots.length === 0) {
        console.log(`No stored analyses in ${store.getDirectory()}`);
        return;
      }

      console.log(`Stored analyses (${snapshots.length})\n`);
      for (const snapshot of snapshots) {
        console.log(`  ${snapshot.id}`);
        console.log(`    Source:   ${snapshot.source}`);
        console.log(`    Analyzed: ${snapshot.analyzedAt}`);
        console.log(`    Files: ${snapshot.fileCount}  Nodes: ${snapshot.nodeCount}  Edges: ${snapshot.edgeCount}`);
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

/**
 * graph command - Print the knowledge graph of a codebase
 */

import { Command } from 'commander';

import { CodebaseAnalyzer } from '../../analyzer/index.js';
import { buildKnowledgeGraph, getGraphStats } from '../../graph/knowledge-graph.js';
import { buildRequest, parseInteger, resolveConfig, type SourceCommandOptions } from './shared.js';

interface GraphCommandOptions extends SourceCommandOptions {
  stats: boolean;
}

export const graphCommand = new Command('graph')
  .description('Build the knowledge graph of a codebase')
  .argument('[directory]', 'Local directory to analyze (defaults to the current directory)')
  .option('-r, --repo <url>', 'Git repository to clone and analyze')
  .option('-c, --config <path>', 'Path to config file')
  .option('--include <patterns...>', 'Glob patterns to include')
  .option('--exclude <patterns...>', 'Glob patterns to exclude')
  .option('--max-file-size <bytes>', 'Skip files larger than this many bytes', parseInteger)
  .option('--stats', 'Print node and edge counts instead of the graph', false)
  .option('--verbose', 'Log skipped files', false)
  .action(async (directory: string | undefined, options: GraphCommandOptions) => {
    try {
      const request = buildRequest(directory, options);
      const config = await resolveConfig(options.config, request.localPath ?? process.cwd());
      const analyzer = CodebaseAnalyzer.fromConfig(config, { verbose: options.verbose });

      const analysis = await analyzer.analyze(request);
      const graph = buildKnowledgeGraph(analysis.structure, analysis.dependencies);

      if (!options.stats) {
        console.log(JSON.stringify(graph, null, 2));
        return;
      }

      const stats = getGraphStats(graph);
      console.log('Knowledge graph\n');
      console.log(`  Nodes:      ${stats.nodes}`);
      for (const [type, count] of Object.entries(stats.byNodeType)) {
        if (count > 0) {
          console.log(`    ${type}: ${count}`);
        }
      }
      console.log(`  Edges:      ${stats.edges}`);
      for (const [relationship, count] of Object.entries(stats.byRelationship)) {
        if (count > 0) {
          console.log(`    ${relationship}: ${count}`);
        }
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

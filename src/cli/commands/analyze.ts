/**
 * analyze command - Analyze a codebase
 */

import { Command } from 'commander';
import path from 'node:path';

import { CodebaseAnalyzer } from '../../analyzer/index.js';
import { buildKnowledgeGraph } from '../../graph/knowledge-graph.js';
import { JsonAnalysisStore } from '../../storage/json-store.js';
import { buildRequest, describeTarget, parseInteger, resolveConfig, type SourceCommandOptions } from './shared.js';

interface AnalyzeCommandOptions extends SourceCommandOptions {
  json: boolean;
  save: boolean;
}

export const analyzeCommand = new Command('analyze')
  .description('Analyze a codebase and summarize its structure')
  .argument('[directory]', 'Local directory to analyze (defaults to the current directory)')
  .option('-r, --repo <url>', 'Git repository to clone and analyze')
  .option('-c, --config <path>', 'Path to config file')
  .option('--include <patterns...>', 'Glob patterns to include')
  .option('--exclude <patterns...>', 'Glob patterns to exclude')
  .option('--max-file-size <bytes>', 'Skip files larger than this many bytes', parseInteger)
  .option('--json', 'Print the full analysis as JSON', false)
  .option('--save', 'Store the analysis and its knowledge graph', false)
  .option('--verbose', 'List skipped files', false)
  .action(async (directory: string | undefined, options: AnalyzeCommandOptions) => {
    try {
      const request = buildRequest(directory, options);
      const config = await resolveConfig(options.config, request.localPath ?? process.cwd());
      const analyzer = CodebaseAnalyzer.fromConfig(config);

      if (!options.json) {
        console.log(`Analyzing ${describeTarget(request)}...\n`);
      }

      const { analysis, skipped, durationMs } = await analyzer.analyzeWithReport(request);

      let snapshotId: string | null = null;
      if (options.save) {
        const store = new JsonAnalysisStore(path.resolve(config.storage.directory));
        snapshotId = await store.save({
          analysis,
          source: describeTarget(request),
          knowledgeGraph: buildKnowledgeGraph(analysis.structure, analysis.dependencies),
        });
      }

      if (options.json) {
        console.log(JSON.stringify(analysis, null, 2));
        return;
      }

      console.log(`${analysis.summary}\n`);
      console.log('Analysis complete!\n');
      console.log(`  Files:      ${analysis.files.length}`);
      console.log(`  Modules:    ${Object.keys(analysis.structure.modules).length}`);
      console.log(`  Classes:    ${Object.keys(analysis.structure.classes).length}`);
      console.log(`  Functions:  ${Object.keys(analysis.structure.functions).length}`);
      console.log(`  Skipped:    ${skipped.length}`);
      console.log(`  Duration:   ${durationMs}ms`);

      if (snapshotId) {
        console.log(`  Saved as:   ${snapshotId}`);
      }
      console.log('');

      if (skipped.length > 0 && options.verbose) {
        console.log('Skipped files:');
        for (const entry of skipped) {
          console.log(`  ${entry.path} (${entry.reason})${entry.detail ? `: ${entry.detail}` : ''}`);
        }
        console.log('');
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

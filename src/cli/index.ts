#!/usr/bin/env node

/**
 * repo-onboard CLI
 */

import { Command } from 'commander';
import { analyzeCommand } from './commands/analyze.js';
import { graphCommand } from './commands/graph.js';
import { historyCommand } from './commands/history.js';

const program = new Command();

program
  .name('repo-onboard')
  .description('Analyze a codebase and build a knowledge graph for onboarding')
  .version('0.1.0');

// Register commands
program.addCommand(analyzeCommand);
program.addCommand(graphCommand);
program.addCommand(historyCommand);

await program.parseAsync(process.argv);

/**
 * Option handling shared by the analysis commands
 */

import path from 'node:path';
import { InvalidArgumentError } from 'commander';

import type { AnalysisRequest } from '../../types/index.js';
import type { Config } from '../../config/schema.js';
import { loadConfig, loadConfigOrDefault } from '../../config/loader.js';

export interface SourceCommandOptions {
  repo?: string;
  config?: string;
  include?: string[];
  exclude?: string[];
  maxFileSize?: number;
  verbose: boolean;
}

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/**
 * A local directory defaults to the working directory when no repository is given.
 */
export function buildRequest(directory: string | undefined, options: SourceCommandOptions): AnalysisRequest {
  const localPath = directory ?? (options.repo ? undefined : '.');

  return {
    repoUrl: options.repo,
    localPath: localPath ? path.resolve(localPath) : undefined,
    include: options.include,
    exclude: options.exclude,
    maxFileSize: options.maxFileSize,
  };
}

export async function resolveConfig(configPath: string | undefined, startDir: string): Promise<Config> {
  return configPath ? loadConfig(configPath) : loadConfigOrDefault(startDir);
}

export function describeTarget(request: AnalysisRequest): string {
  return request.repoUrl ?? request.localPath ?? '(none)';
}

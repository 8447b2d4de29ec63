/**
 * Main analysis orchestration
 */

import { createRecord, type AnalysisRequest, type CodebaseAnalysis, type SkippedFile } from '../types/index.js';
import { analysisRequestSchema, type Config } from '../config/schema.js';
import { getDefaultConfig, resolveAccessToken } from '../config/loader.js';
import { InvalidRequestError } from '../errors.js';
import { createDefaultRegistry, type ExtractorRegistry } from './parsers/index.js';
import { withAcquiredSource } from './source-acquirer.js';
import { collectFiles } from './file-collector.js';
import { buildStructureIndex, type FileExtraction } from './structure-index.js';
import { buildDependencyGraph } from './dependency-graph.js';
import { composeSummary } from './summary.js';

export interface AnalyzerConfig {
  include: string[];
  exclude: string[];
  maxFileSize: number;
  concurrency: number;
  accessToken?: string;
  cloneTimeoutMs: number;
  /** Log skipped files with console.warn */
  verbose: boolean;
}

export interface AnalyzeOptions {
  signal?: AbortSignal;
  onSkip?: (skipped: SkippedFile) => void;
}

export interface AnalysisReport {
  analysis: CodebaseAnalysis;
  skipped: SkippedFile[];
  durationMs: number;
}

export class CodebaseAnalyzer {
  private config: AnalyzerConfig;
  private registry: ExtractorRegistry | null = null;

  constructor(config: Partial<AnalyzerConfig> = {}) {
    const defaults = getDefaultConfig();

    this.config = {
      include: config.include && config.include.length > 0 ? config.include : defaults.include,
      exclude: config.exclude && config.exclude.length > 0 ? config.exclude : defaults.exclude,
      maxFileSize: config.maxFileSize ?? defaults.maxFileSize,
      concurrency: config.concurrency ?? defaults.concurrency.fileReads,
      accessToken: config.accessToken,
      cloneTimeoutMs: config.cloneTimeoutMs ?? defaults.clone.timeoutMs,
      verbose: config.verbose ?? false,
    };
  }

  /**
   * Build an analyzer from a loaded configuration file
   */
  static fromConfig(config: Config, overrides: Partial<AnalyzerConfig> = {}): CodebaseAnalyzer {
    return new CodebaseAnalyzer({
      include: config.include,
      exclude: config.exclude,
      maxFileSize: config.maxFileSize,
      concurrency: config.concurrency.fileReads,
      accessToken: resolveAccessToken(config),
      cloneTimeoutMs: config.clone.timeoutMs,
      ...overrides,
    });
  }

  async initialize(): Promise<ExtractorRegistry> {
    if (!this.registry) {
      this.registry = await createDefaultRegistry();
    }
    return this.registry;
  }

  async analyze(request: AnalysisRequest, options: AnalyzeOptions = {}): Promise<CodebaseAnalysis> {
    const report = await this.analyzeWithReport(request, options);
    return report.analysis;
  }

  /**
   * Analyze a codebase and also return the files that were skipped.
   * A cloned source is removed before this resolves or rejects.
   */
  async analyzeWithReport(request: AnalysisRequest, options: AnalyzeOptions = {}): Promise<AnalysisReport> {
    const parsed = analysisRequestSchema.safeParse(request);
    if (!parsed.success) {
      const issues = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`);
      throw new InvalidRequestError(`Invalid analysis request:\n  - ${issues.join('\n  - ')}`, issues);
    }

    const startTime = Date.now();
    const { signal } = options;
    const registry = await this.initialize();
    const skipped: SkippedFile[] = [];

    const onSkip = (entry: SkippedFile) => {
      skipped.push(entry);
      if (this.config.verbose) {
        console.warn(`Skipped ${entry.path} (${entry.reason})${entry.detail ? `: ${entry.detail}` : ''}`);
      }
      options.onSkip?.(entry);
    };

    const sourceOptions = {
      accessToken: this.config.accessToken,
      timeoutMs: this.config.cloneTimeoutMs,
      signal,
    };

    const analysis = await withAcquiredSource(parsed.data, sourceOptions, async source => {
      signal?.throwIfAborted();

      const files = await collectFiles(source.root, {
        include: parsed.data.include && parsed.data.include.length > 0 ? parsed.data.include : this.config.include,
        exclude: parsed.data.exclude && parsed.data.exclude.length > 0 ? parsed.data.exclude : this.config.exclude,
        maxFileSize: parsed.data.maxFileSize ?? this.config.maxFileSize,
        concurrency: this.config.concurrency,
        onSkip,
      });

      signal?.throwIfAborted();

      const extractions: FileExtraction[] = files.map(file => {
        const result = registry.extract(file);
        if (result.status === 'failed') {
          onSkip({ path: file.path, reason: 'parse-failed', detail: result.reason });
        }
        return { path: file.path, result };
      });

      const paths = files.map(file => file.path);
      const fileContents: Record<string, string> = createRecord();
      for (const file of files) {
        fileContents[file.path] = file.content;
      }

      const structure = buildStructureIndex(extractions);
      const dependencies = buildDependencyGraph(paths, structure);

      return {
        files: paths,
        fileContents,
        structure,
        dependencies,
        summary: composeSummary(structure),
        rootPath: source.root,
      };
    });

    return { analysis, skipped, durationMs: Date.now() - startTime };
  }

  getConfig(): Readonly<AnalyzerConfig> {
    return this.config;
  }
}

export { compilePattern, createPathFilter, globToRegExp, type PatternMatcher, type PathFilter } from './pattern-matcher.js';
export {
  acquireSource,
  resolveSource,
  withAcquiredSource,
  withAccessToken,
  type AcquiredSource,
  type AcquireOptions,
  type ResolvedSource,
  type SourceSpec,
} from './source-acquirer.js';
export { collectFiles, listFiles, comparePaths, type CollectOptions } from './file-collector.js';
export { buildStructureIndex, createStructureIndex, type FileExtraction } from './structure-index.js';
export { buildDependencyGraph, moduleRoot } from './dependency-graph.js';
export { composeSummary, SUMMARY_MODULE_LIMIT } from './summary.js';

/**
 * repo-onboard - codebase analysis and knowledge graphs for onboarding
 *
 * Collects the source files of a local directory or a cloned repository,
 * extracts imports, classes and functions, and derives a dependency graph,
 * a knowledge graph and a short text summary.
 */

// Types
export * from './types/index.js';

// Errors
export { InvalidRequestError, AcquisitionError } from './errors.js';

// Analyzer
export {
  CodebaseAnalyzer,
  compilePattern,
  createPathFilter,
  globToRegExp,
  acquireSource,
  resolveSource,
  withAcquiredSource,
  withAccessToken,
  collectFiles,
  listFiles,
  comparePaths,
  buildStructureIndex,
  createStructureIndex,
  buildDependencyGraph,
  moduleRoot,
  composeSummary,
  SUMMARY_MODULE_LIMIT,
  type AnalyzerConfig,
  type AnalyzeOptions,
  type AnalysisReport,
  type PatternMatcher,
  type PathFilter,
  type AcquiredSource,
  type AcquireOptions,
  type ResolvedSource,
  type SourceSpec,
  type CollectOptions,
  type FileExtraction,
} from './analyzer/index.js';

// Parsers
export {
  ExtractorRegistry,
  PythonExtractor,
  EcmaScriptExtractor,
  createDefaultRegistry,
  type LanguageExtractor,
  type ExtractionResult,
} from './analyzer/parsers/index.js';

// Knowledge graph
export {
  buildKnowledgeGraph,
  getGraphStats,
  resolveDependencyTarget,
  fileNodeId,
  classNodeId,
  functionNodeId,
  type GraphStats,
} from './graph/index.js';

// Storage
export {
  JsonAnalysisStore,
  sourceName,
  formatTimestamp,
  analysisSnapshotSchema,
  type AnalysisStore,
  type AnalysisSnapshot,
  type SaveSnapshotInput,
  type SnapshotMetadata,
} from './storage/index.js';

// Config
export {
  configSchema,
  analysisRequestSchema,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  resolveAccessToken,
  DEFAULT_INCLUDE_PATTERNS,
  DEFAULT_EXCLUDE_PATTERNS,
  DEFAULT_MAX_FILE_SIZE,
  type Config,
} from './config/index.js';

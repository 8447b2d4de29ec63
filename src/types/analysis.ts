/**
 * Core analysis types for the repo-onboard pipeline
 */

export type LanguageFamily = 'python' | 'ecmascript' | 'unsupported';
export type ParsedLanguage = Exclude<LanguageFamily, 'unsupported'>;

/**
 * A collected source file. `path` is relative to the analysis root and
 * always uses `/` separators.
 */
export interface FileRecord {
  path: string;
  content: string;
  size: number;
}

export interface ImportRef {
  /** Dotted (python) or slash (ecmascript) module path, relative markers kept */
  module: string;
  name: string | null;
  alias: string | null;
}

export interface ClassRecord {
  name: string;
  /** Method names in declaration order */
  methods: string[];
  /** Unresolved symbolic base references, e.g. `Base` or `abc.ABC` */
  bases: string[];
  line: number;
}

export interface FunctionRecord {
  name: string;
  parameters: string[];
  line: number;
}

export interface ModuleStructure {
  filePath: string;
  language: ParsedLanguage;
  imports: ImportRef[];
  classes: Record<string, ClassRecord>;
  functions: Record<string, FunctionRecord>;
}

/**
 * Aggregate structure of one analysis run.
 * `classes` and `functions` are keyed by qualified key (`{filePath}::{name}`).
 */
export interface StructureIndex {
  modules: Record<string, ModuleStructure>;
  classes: Record<string, ClassRecord>;
  functions: Record<string, FunctionRecord>;
  imports: Record<string, ImportRef[]>;
}

/** file path -> deduplicated, sorted module identifiers */
export type DependencyGraph = Record<string, string[]>;

export interface AnalysisRequest {
  repoUrl?: string;
  localPath?: string;
  include?: string[];
  exclude?: string[];
  maxFileSize?: number;
}

export interface CodebaseAnalysis {
  files: string[];
  fileContents: Record<string, string>;
  structure: StructureIndex;
  dependencies: DependencyGraph;
  summary: string;
  rootPath: string;
}

export type SkipReason = 'stat-failed' | 'too-large' | 'unreadable' | 'parse-failed';

export interface SkippedFile {
  path: string;
  reason: SkipReason;
  detail?: string;
}

/**
 * Empty record keyed by file paths or symbol names. It has no prototype, so
 * names such as `constructor` or `__proto__` are ordinary entries.
 */
export function createRecord<T>(): Record<string, T> {
  return Object.create(null);
}

export const QUALIFIED_KEY_SEPARATOR = '::';

export function qualifiedKey(filePath: string, name: string): string {
  return `${filePath}${QUALIFIED_KEY_SEPARATOR}${name}`;
}

/**
 * Split a qualified key into its file path and symbol name.
 * Symbol names never contain the separator, so the last occurrence wins.
 */
export function splitQualifiedKey(key: string): { filePath: string; name: string } {
  const index = key.lastIndexOf(QUALIFIED_KEY_SEPARATOR);
  if (index === -1) {
    return { filePath: '', name: key };
  }
  return {
    filePath: key.slice(0, index),
    name: key.slice(index + QUALIFIED_KEY_SEPARATOR.length),
  };
}

/**
 * File -> external module dependency graph
 */

import { createRecord, type DependencyGraph, type ImportRef, type ParsedLanguage, type StructureIndex } from '../types/index.js';
import { comparePaths } from './file-collector.js';

/**
 * Reduce an import to its root module identifier, or null when it names
 * no external module.
 *
 * - python: first dot-separated segment (`a.b.c` -> `a`); relative
 *   modules such as `.utils` produce an empty segment and are dropped
 * - ecmascript: first slash-separated segment, relative specifiers
 *   (starting with `.`) excluded
 */
export function moduleRoot(ref: ImportRef, language: ParsedLanguage): string | null {
  if (language === 'python') {
    const [root] = ref.module.split('.');
    return root ? root : null;
  }

  if (ref.module.startsWith('.')) {
    return null;
  }
  const [root] = ref.module.split('/');
  return root ? root : null;
}

/**
 * Map every collected file to its sorted, deduplicated dependency list.
 * Files without an indexed module map to an empty list.
 */
export function buildDependencyGraph(files: Iterable<string>, structure: StructureIndex): DependencyGraph {
  const graph: DependencyGraph = createRecord();

  for (const filePath of files) {
    const module = Object.hasOwn(structure.modules, filePath) ? structure.modules[filePath] : undefined;
    if (!module) {
      graph[filePath] = [];
      continue;
    }

    const dependencies = new Set<string>();
    for (const ref of module.imports) {
      const root = moduleRoot(ref, module.language);
      if (root) {
        dependencies.add(root);
      }
    }

    graph[filePath] = Array.from(dependencies).sort(comparePaths);
  }

  return graph;
}

/**
 * Assemble per-file extraction results into a StructureIndex
 */

import { createRecord, qualifiedKey, type StructureIndex } from '../types/index.js';
import type { ExtractionResult } from './parsers/index.js';

export interface FileExtraction {
  path: string;
  result: ExtractionResult;
}

export function createStructureIndex(): StructureIndex {
  return { modules: createRecord(), classes: createRecord(), functions: createRecord(), imports: createRecord() };
}

/**
 * Only parsed files enter the index. Unsupported and unparsable files stay
 * out of `modules`, so every qualified key points at an indexed module.
 */
export function buildStructureIndex(extractions: Iterable<FileExtraction>): StructureIndex {
  const index = createStructureIndex();

  for (const { path: filePath, result } of extractions) {
    if (result.status !== 'parsed') continue;

    const { structure } = result;
    index.modules[filePath] = structure;

    for (const [name, record] of Object.entries(structure.classes)) {
      index.classes[qualifiedKey(filePath, name)] = record;
    }
    for (const [name, record] of Object.entries(structure.functions)) {
      index.functions[qualifiedKey(filePath, name)] = record;
    }
    index.imports[filePath] = structure.imports;
  }

  return index;
}

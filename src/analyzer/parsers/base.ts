/**
 * Shared contract for language extractors
 */

import { createRecord, type LanguageFamily, type ModuleStructure, type ParsedLanguage } from '../../types/index.js';

export type ExtractionResult =
  | { status: 'parsed'; structure: ModuleStructure }
  | { status: 'unsupported'; language: 'unsupported' }
  | { status: 'failed'; language: ParsedLanguage; reason: string };

export interface LanguageExtractor {
  readonly language: ParsedLanguage;
  /** Lowercase file extensions without the dot */
  readonly extensions: readonly string[];
  extract(filePath: string, content: string): ExtractionResult;
}

export const UNSUPPORTED: ExtractionResult = { status: 'unsupported', language: 'unsupported' };

export function emptyStructure(filePath: string, language: ParsedLanguage): ModuleStructure {
  return {
    filePath,
    language,
    imports: [],
    classes: createRecord(),
    functions: createRecord(),
  };
}

export function languageOf(result: ExtractionResult): LanguageFamily {
  return result.status === 'parsed' ? result.structure.language : result.language;
}

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filePath: string): string {
  const match = filePath.match(/\.([^./]+)$/);
  return match?.[1]?.toLowerCase() ?? '';
}

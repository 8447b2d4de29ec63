/**
 * Extractor registry keyed by file extension
 */

import type { FileRecord, LanguageFamily, ParsedLanguage } from '../../types/index.js';
import { getExtension, UNSUPPORTED, type ExtractionResult, type LanguageExtractor } from './base.js';

export class ExtractorRegistry {
  private extractors: Map<ParsedLanguage, LanguageExtractor> = new Map();
  private extensionMap: Map<string, LanguageExtractor> = new Map();

  /**
   * Register an extractor for a language family
   */
  register(extractor: LanguageExtractor): void {
    this.extractors.set(extractor.language, extractor);

    for (const ext of extractor.extensions) {
      this.extensionMap.set(ext.toLowerCase(), extractor);
    }
  }

  getByLanguage(language: ParsedLanguage): LanguageExtractor | undefined {
    return this.extractors.get(language);
  }

  getByFilePath(filePath: string): LanguageExtractor | undefined {
    return this.extensionMap.get(getExtension(filePath));
  }

  detectLanguage(filePath: string): LanguageFamily {
    return this.getByFilePath(filePath)?.language ?? 'unsupported';
  }

  /**
   * Extract one file's structure. Files with no registered extractor
   * produce an unsupported result.
   */
  extract(file: FileRecord): ExtractionResult {
    const extractor = this.getByFilePath(file.path);
    if (!extractor) {
      return UNSUPPORTED;
    }
    return extractor.extract(file.path, file.content);
  }

  getLanguages(): ParsedLanguage[] {
    return Array.from(this.extractors.keys());
  }

  getExtensions(): string[] {
    return Array.from(this.extensionMap.keys());
  }
}

/**
 * Create a registry with the python and ecmascript extractors
 */
export async function createDefaultRegistry(): Promise<ExtractorRegistry> {
  const registry = new ExtractorRegistry();

  // Dynamically import extractors to avoid loading unused dependencies
  const [{ PythonExtractor }, { EcmaScriptExtractor }] = await Promise.all([
    import('./python.js'),
    import('./ecmascript.js'),
  ]);

  registry.register(new PythonExtractor());
  registry.register(new EcmaScriptExtractor());

  return registry;
}

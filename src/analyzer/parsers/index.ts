/**
 * Extractor exports
 */

export {
  emptyStructure,
  getExtension,
  languageOf,
  UNSUPPORTED,
  type ExtractionResult,
  type LanguageExtractor,
} from './base.js';
export { ExtractorRegistry, createDefaultRegistry } from './registry.js';
export { PythonExtractor } from './python.js';
export { EcmaScriptExtractor, parameterNames } from './ecmascript.js';

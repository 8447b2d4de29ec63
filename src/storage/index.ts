/**
 * Storage exports
 */

export {
  JsonAnalysisStore,
  sourceName,
  formatTimestamp,
  type AnalysisStore,
  type SaveSnapshotInput,
  type SnapshotMetadata,
} from './json-store.js';
export { analysisSnapshotSchema, codebaseAnalysisSchema, knowledgeGraphSchema, type AnalysisSnapshot } from './schema.js';

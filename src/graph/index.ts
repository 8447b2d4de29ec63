/**
 * Knowledge graph exports
 */

export {
  buildKnowledgeGraph,
  resolveDependencyTarget,
  getGraphStats,
  fileNodeId,
  classNodeId,
  functionNodeId,
  type GraphStats,
} from './knowledge-graph.js';

/**
 * Knowledge graph construction from a StructureIndex and DependencyGraph.
 *
 * Pure and deterministic: node and edge order follows the insertion order
 * of the input maps. Edges are only added when both endpoints exist.
 */

import {
  splitQualifiedKey,
  type ClassRecord,
  type DependencyGraph,
  type FunctionRecord,
  type KnowledgeGraph,
  type KnowledgeGraphEdge,
  type KnowledgeGraphNode,
  type Relationship,
  type StructureIndex,
} from '../types/index.js';

/**
 * Mutable state threaded through one build. The seen-id set enforces node
 * id uniqueness; duplicate insertions are skipped.
 */
interface GraphBuildState {
  nodes: KnowledgeGraphNode[];
  edges: KnowledgeGraphEdge[];
  seen: Set<string>;
}

export const fileNodeId = (filePath: string): string => `file:${filePath}`;
export const classNodeId = (filePath: string, name: string): string => `class:${filePath}::${name}`;
export const functionNodeId = (filePath: string, name: string): string => `function:${filePath}::${name}`;

function addNode(state: GraphBuildState, node: KnowledgeGraphNode): void {
  if (state.seen.has(node.id)) return;
  state.seen.add(node.id);
  state.nodes.push(node);
}

function addEdge(state: GraphBuildState, source: string, target: string, relationship: Relationship): boolean {
  if (!state.seen.has(source) || !state.seen.has(target)) {
    return false;
  }
  state.edges.push({ source, target, relationship });
  return true;
}

function addFileNodes(state: GraphBuildState, structure: StructureIndex): void {
  for (const filePath of Object.keys(structure.modules)) {
    addNode(state, {
      id: fileNodeId(filePath),
      label: filePath.split('/').pop() ?? filePath,
      type: 'file',
      filePath,
      metadata: { path: filePath },
    });
  }
}

function addClassNode(state: GraphBuildState, key: string, record: ClassRecord): void {
  const { filePath, name } = splitQualifiedKey(key);
  const nodeId = classNodeId(filePath, name);

  addNode(state, {
    id: nodeId,
    label: name,
    type: 'class',
    filePath,
    metadata: { methods: [...record.methods], bases: [...record.bases] },
  });

  addEdge(state, fileNodeId(filePath), nodeId, 'contains');

  // Bases only resolve to classes already added from the same file
  for (const base of record.bases) {
    addEdge(state, nodeId, classNodeId(filePath, base), 'inherits');
  }
}

function addFunctionNode(state: GraphBuildState, key: string, record: FunctionRecord): void {
  const { filePath, name } = splitQualifiedKey(key);
  const nodeId = functionNodeId(filePath, name);

  addNode(state, {
    id: nodeId,
    label: name,
    type: 'function',
    filePath,
    metadata: { parameters: [...record.parameters] },
  });

  addEdge(state, fileNodeId(filePath), nodeId, 'contains');
}

/**
 * Find the module a dependency name refers to: the first module path (in
 * `modules` order) containing the name, or ending in `/{name}.py`.
 * This is a substring heuristic and can pick an unrelated file.
 */
export function resolveDependencyTarget(dependency: string, modulePaths: readonly string[]): string | null {
  for (const modulePath of modulePaths) {
    if (modulePath.includes(dependency) || modulePath.endsWith(`/${dependency}.py`)) {
      return modulePath;
    }
  }
  return null;
}

function addImportEdges(state: GraphBuildState, structure: StructureIndex, dependencies: DependencyGraph): void {
  const modulePaths = Object.keys(structure.modules);

  for (const [filePath, fileDependencies] of Object.entries(dependencies)) {
    const sourceId = fileNodeId(filePath);
    if (!state.seen.has(sourceId)) continue;

    for (const dependency of fileDependencies) {
      const target = resolveDependencyTarget(dependency, modulePaths);
      if (target !== null) {
        addEdge(state, sourceId, fileNodeId(target), 'imports');
      }
    }
  }
}

export function buildKnowledgeGraph(structure: StructureIndex, dependencies: DependencyGraph): KnowledgeGraph {
  const state: GraphBuildState = { nodes: [], edges: [], seen: new Set() };

  addFileNodes(state, structure);

  for (const [key, record] of Object.entries(structure.classes)) {
    addClassNode(state, key, record);
  }

  for (const [key, record] of Object.entries(structure.functions)) {
    addFunctionNode(state, key, record);
  }

  addImportEdges(state, structure, dependencies);

  return { nodes: state.nodes, edges: state.edges };
}

export interface GraphStats {
  nodes: number;
  edges: number;
  byNodeType: Record<KnowledgeGraphNode['type'], number>;
  byRelationship: Record<Relationship, number>;
}

export function getGraphStats(graph: KnowledgeGraph): GraphStats {
  const byNodeType: GraphStats['byNodeType'] = { file: 0, class: 0, function: 0, module: 0 };
  const byRelationship: GraphStats['byRelationship'] = { contains: 0, inherits: 0, imports: 0 };

  for (const node of graph.nodes) {
    byNodeType[node.type]++;
  }
  for (const edge of graph.edges) {
    byRelationship[edge.relationship]++;
  }

  return { nodes: graph.nodes.length, edges: graph.edges.length, byNodeType, byRelationship };
}

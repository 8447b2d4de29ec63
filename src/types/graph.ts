/**
 * Knowledge graph types
 */

export type NodeType = 'file' | 'class' | 'function' | 'module';
export type Relationship = 'contains' | 'inherits' | 'imports';

export interface KnowledgeGraphNode {
  id: string;
  label: string;
  type: NodeType;
  filePath: string | null;
  metadata: Record<string, unknown>;
}

export interface KnowledgeGraphEdge {
  source: string;
  target: string;
  relationship: Relationship;
}

export interface KnowledgeGraph {
  nodes: KnowledgeGraphNode[];
  edges: KnowledgeGraphEdge[];
}

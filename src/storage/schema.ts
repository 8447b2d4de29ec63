/**
 * Zod schemas for persisted analysis snapshots
 */

import { z } from 'zod';

export const importRefSchema = z.object({
  module: z.string(),
  name: z.string().nullable(),
  alias: z.string().nullable(),
});

export const classRecordSchema = z.object({
  name: z.string(),
  methods: z.array(z.string()),
  bases: z.array(z.string()),
  line: z.number().int(),
});

export const functionRecordSchema = z.object({
  name: z.string(),
  parameters: z.array(z.string()),
  line: z.number().int(),
});

export const moduleStructureSchema = z.object({
  filePath: z.string(),
  language: z.enum(['python', 'ecmascript']),
  imports: z.array(importRefSchema),
  classes: z.record(z.string(), classRecordSchema),
  functions: z.record(z.string(), functionRecordSchema),
});

export const structureIndexSchema = z.object({
  modules: z.record(z.string(), moduleStructureSchema),
  classes: z.record(z.string(), classRecordSchema),
  functions: z.record(z.string(), functionRecordSchema),
  imports: z.record(z.string(), z.array(importRefSchema)),
});

export const codebaseAnalysisSchema = z.object({
  files: z.array(z.string()),
  fileContents: z.record(z.string(), z.string()),
  structure: structureIndexSchema,
  dependencies: z.record(z.string(), z.array(z.string())),
  summary: z.string(),
  rootPath: z.string(),
});

export const knowledgeGraphSchema = z.object({
  nodes: z.array(z.object({
    id: z.string(),
    label: z.string(),
    type: z.enum(['file', 'class', 'function', 'module']),
    filePath: z.string().nullable(),
    metadata: z.record(z.string(), z.unknown()),
  })),
  edges: z.array(z.object({
    source: z.string(),
    target: z.string(),
    relationship: z.enum(['contains', 'inherits', 'imports']),
  })),
});

export const analysisSnapshotSchema = z.object({
  id: z.string(),
  source: z.string(),
  analyzedAt: z.string(),
  analysis: codebaseAnalysisSchema,
  knowledgeGraph: knowledgeGraphSchema,
});

export type AnalysisSnapshot = z.infer<typeof analysisSnapshotSchema>;

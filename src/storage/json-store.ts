/**
 * Flat-file JSON store for analysis snapshots.
 *
 * One `{sourceName}_{YYYYMMDD_HHMMSS}.json` document per saved analysis.
 * This is a best-effort cache, not a system of record.
 */

import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';

import type { CodebaseAnalysis, KnowledgeGraph } from '../types/index.js';
import { buildKnowledgeGraph } from '../graph/knowledge-graph.js';
import { analysisSnapshotSchema, type AnalysisSnapshot } from './schema.js';

export interface SaveSnapshotInput {
  analysis: CodebaseAnalysis;
  /** Repository URL or local path the analysis was run against */
  source: string;
  knowledgeGraph?: KnowledgeGraph;
  analyzedAt?: Date;
}

export interface SnapshotMetadata {
  id: string;
  source: string;
  analyzedAt: string;
  fileCount: number;
  nodeCount: number;
  edgeCount: number;
}

export interface AnalysisStore {
  save(input: SaveSnapshotInput): Promise<string>;
  get(id: string): Promise<AnalysisSnapshot | null>;
  getLatest(source: string): Promise<AnalysisSnapshot | null>;
  list(): Promise<SnapshotMetadata[]>;
}

const ID_SUFFIX = /^_\d{8}_\d{6}$/;

/**
 * `https://github.com/owner/repo.git` -> `owner_repo`. Sources with fewer
 * than two path segments fall back to a short md5 digest.
 */
export function sourceName(source: string): string {
  const parts = source.replace(/\/+$/, '').split('/').filter(part => part.length > 0);
  if (parts.length >= 2) {
    const name = `${parts[parts.length - 2]}_${parts[parts.length - 1]}`.split('.git').join('');
    return name.replace(/[^A-Za-z0-9._-]/g, '_');
  }
  return crypto.createHash('md5').update(source).digest('hex').slice(0, 12);
}

export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class JsonAnalysisStore implements AnalysisStore {
  constructor(private readonly directory: string) {}

  getDirectory(): string {
    return this.directory;
  }

  async save(input: SaveSnapshotInput): Promise<string> {
    const analyzedAt = input.analyzedAt ?? new Date();
    const id = `${sourceName(input.source)}_${formatTimestamp(analyzedAt)}`;

    const snapshot: AnalysisSnapshot = {
      id,
      source: input.source,
      analyzedAt: analyzedAt.toISOString(),
      analysis: input.analysis,
      knowledgeGraph: input.knowledgeGraph
        ?? buildKnowledgeGraph(input.analysis.structure, input.analysis.dependencies),
    };

    await fs.promises.mkdir(this.directory, { recursive: true });
    await fs.promises.writeFile(this.snapshotPath(id), JSON.stringify(snapshot, null, 2), 'utf-8');

    return id;
  }

  async get(id: string): Promise<AnalysisSnapshot | null> {
    if (path.basename(id) !== id) {
      return null;
    }

    const snapshotPath = this.snapshotPath(id);
    if (!fs.existsSync(snapshotPath)) {
      return null;
    }

    return this.readSnapshot(snapshotPath);
  }

  async getLatest(source: string): Promise<AnalysisSnapshot | null> {
    const name = sourceName(source);
    const ids = (await this.listIds())
      .filter(id => id.startsWith(`${name}_`) && ID_SUFFIX.test(id.slice(name.length)))
      .sort()
      .reverse();

    const latest = ids[0];
    return latest ? this.get(latest) : null;
  }

  async list(): Promise<SnapshotMetadata[]> {
    const entries: SnapshotMetadata[] = [];

    for (const id of await this.listIds()) {
      try {
        const snapshot = await this.readSnapshot(this.snapshotPath(id));
        entries.push({
          id: snapshot.id,
          source: snapshot.source,
          analyzedAt: snapshot.analyzedAt,
          fileCount: snapshot.analysis.files.length,
          nodeCount: snapshot.knowledgeGraph.nodes.length,
          edgeCount: snapshot.knowledgeGraph.edges.length,
        });
      } catch (error) {
        console.warn(`Error reading snapshot ${id}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    return entries.sort((a, b) => b.analyzedAt.localeCompare(a.analyzedAt));
  }

  private snapshotPath(id: string): string {
    return path.join(this.directory, `${id}.json`);
  }

  private async listIds(): Promise<string[]> {
    if (!fs.existsSync(this.directory)) {
      return [];
    }
    const names = await fs.promises.readdir(this.directory);
    return names.filter(name => name.endsWith('.json')).map(name => name.slice(0, -'.json'.length));
  }

  private async readSnapshot(snapshotPath: string): Promise<AnalysisSnapshot> {
    const content = await fs.promises.readFile(snapshotPath, 'utf-8');

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      throw new Error(`Invalid JSON in snapshot: ${snapshotPath}`);
    }

    const result = analysisSnapshotSchema.safeParse(raw);
    if (!result.success) {
      const errors = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('; ');
      throw new Error(`Invalid snapshot ${snapshotPath}: ${errors}`);
    }
    return result.data;
  }
}

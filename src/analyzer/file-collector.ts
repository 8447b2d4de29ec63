/**
 * Walk an analysis root and read every in-scope file.
 */

import fs from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';
import pLimit from 'p-limit';

import type { FileRecord, SkippedFile } from '../types/index.js';
import { createPathFilter } from './pattern-matcher.js';

export interface CollectOptions {
  include: string[];
  exclude: string[];
  maxFileSize: number;
  /** Concurrent stat/read operations */
  concurrency?: number;
  onSkip?: (skipped: SkippedFile) => void;
}

export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * List candidate files under `root` as `/`-separated relative paths.
 */
export async function listFiles(root: string): Promise<string[]> {
  return fg('**/*', {
    cwd: root,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: true,
    suppressErrors: true,
  });
}

/**
 * Collect in-scope files, sorted by relative path. Files that cannot be
 * stat'ed or read, and files above `maxFileSize` bytes, are left out.
 */
export async function collectFiles(root: string, options: CollectOptions): Promise<FileRecord[]> {
  const filter = createPathFilter(options.include, options.exclude);
  const limit = pLimit(options.concurrency ?? 16);
  const skip = options.onSkip ?? (() => {});

  const candidates = (await listFiles(root)).filter(relativePath => filter.accepts(relativePath));

  const records = await Promise.all(
    candidates.map(relativePath => limit(() => readFileRecord(root, relativePath, options.maxFileSize, skip)))
  );

  return records
    .filter((record): record is FileRecord => record !== null)
    .sort((a, b) => comparePaths(a.path, b.path));
}

async function readFileRecord(
  root: string,
  relativePath: string,
  maxFileSize: number,
  skip: (skipped: SkippedFile) => void
): Promise<FileRecord | null> {
  const absolutePath = path.join(root, relativePath);

  let size: number;
  try {
    const stats = await fs.promises.stat(absolutePath);
    size = stats.size;
  } catch (error) {
    skip({ path: relativePath, reason: 'stat-failed', detail: errorMessage(error) });
    return null;
  }

  if (size > maxFileSize) {
    skip({ path: relativePath, reason: 'too-large', detail: `${size} bytes exceeds ${maxFileSize}` });
    return null;
  }

  let buffer: Buffer;
  try {
    buffer = await fs.promises.readFile(absolutePath);
  } catch (error) {
    skip({ path: relativePath, reason: 'unreadable', detail: errorMessage(error) });
    return null;
  }

  // Invalid UTF-8 sequences decode to U+FFFD instead of throwing
  return { path: relativePath, content: buffer.toString('utf8'), size };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

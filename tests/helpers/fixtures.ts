/**
 * Test fixture utilities
 */

import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { fileURLToPath } from 'node:url';

import { createRecord, type ModuleStructure, type ParsedLanguage } from '../../src/types/index.js';
import type { FileExtraction } from '../../src/analyzer/structure-index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(...parts: string[]): string {
  return path.join(__dirname, '../fixtures', ...parts);
}

/**
 * Read a fixture file's contents
 */
export async function readFixture(...parts: string[]): Promise<string> {
  const fixturePath = getFixturePath(...parts);
  return fs.promises.readFile(fixturePath, 'utf-8');
}

export interface TempProjectResult {
  rootDir: string;
  cleanup: () => void;
  addFile: (relativePath: string, content: string | Buffer) => string;
  getFilePath: (relativePath: string) => string;
}

/**
 * Create a temporary project directory with files
 */
export function createTempProject(files: Record<string, string> = {}): TempProjectResult {
  const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'repo-onboard-project-'));

  const addFile = (relativePath: string, content: string | Buffer): string => {
    const filePath = path.join(rootDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  for (const [relativePath, content] of Object.entries(files)) {
    addFile(relativePath, content);
  }

  const cleanup = () => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  };

  const getFilePath = (relativePath: string): string => {
    return path.join(rootDir, relativePath);
  };

  return { rootDir, cleanup, addFile, getFilePath };
}

/**
 * Sample Python module for testing
 */
export const SAMPLE_PYTHON = `import os
from .utils import helper


class UserService:
    def __init__(self, repo):
        self.repo = repo

    async def find(self, user_id, *, strict=False):
        return self.repo.get(user_id)


def greet(name, greeting="Hello"):
    return f"{greeting}, {name}!"
`;

/**
 * Sample TypeScript module for testing
 */
export const SAMPLE_TYPESCRIPT = `import { readFile } from 'node:fs/promises';
import express from 'express';
import { helper } from './utils';

export class UserController extends BaseController {
  list() {
    return [];
  }
}

export function handle(req: Request, res: Response) {
  return res;
}

export const format = (value: string) => value.trim();
`;

/**
 * Build a parsed module structure from class and function names
 */
export function makeModule(
  filePath: string,
  options: {
    language?: ParsedLanguage;
    imports?: string[];
    classes?: Record<string, string[]>;
    functions?: Record<string, string[]>;
  } = {}
): ModuleStructure {
  const structure: ModuleStructure = {
    filePath,
    language: options.language ?? 'python',
    imports: (options.imports ?? []).map(module => ({ module, name: null, alias: null })),
    classes: createRecord(),
    functions: createRecord(),
  };

  for (const [name, bases] of Object.entries(options.classes ?? {})) {
    structure.classes[name] = { name, methods: [], bases, line: 1 };
  }
  for (const [name, parameters] of Object.entries(options.functions ?? {})) {
    structure.functions[name] = { name, parameters, line: 1 };
  }

  return structure;
}

export function parsed(structure: ModuleStructure): FileExtraction {
  return { path: structure.filePath, result: { status: 'parsed', structure } };
}

/**
 * JavaScript/TypeScript structure extraction over raw text.
 *
 * There is no syntax tree here: imports, classes and functions are found
 * with regular expressions. Unusual syntax is missed, methods are never
 * reported, and a `function` declared inside another scope is indistinguishable
 * from a top-level one. That imprecision is accepted.
 */

import type { ImportRef } from '../../types/index.js';
import { emptyStructure, type ExtractionResult, type LanguageExtractor } from './base.js';

const IMPORT_PATTERN =
  /import\s+(?:type\s+)?(?:(?:\{[^}]*\}|\*\s+as\s+\w+|\w+)(?:\s*,\s*(?:\{[^}]*\}|\*\s+as\s+\w+|\w+))*\s+from\s+)?['"]([^'"]+)['"]/g;

const CLASS_PATTERN = /\bclass\s+([A-Za-z_$][\w$]*)(?:\s+extends\s+([A-Za-z_$][\w$.]*))?/g;

const FUNCTION_PATTERN =
  /(?:export\s+)?(?:async\s+)?\bfunction\s+([A-Za-z_$][\w$]*)\s*(?:<[^>]*>)?\s*\(([^)]*)\)|(?:export\s+)?(?:async\s+)?\bconst\s+([A-Za-z_$][\w$]*)\s*=\s*(?:async\s+)?\(([^)]*)\)\s*=>/g;

const IDENTIFIER_START = /^(?:\.\.\.)?\s*([A-Za-z_$][\w$]*)/;

export class EcmaScriptExtractor implements LanguageExtractor {
  readonly language = 'ecmascript' as const;
  readonly extensions = ['js', 'jsx', 'ts', 'tsx', 'mjs', 'cjs'] as const;

  extract(filePath: string, content: string): ExtractionResult {
    const structure = emptyStructure(filePath, 'ecmascript');
    const lineAt = createLineLocator(content);

    for (const match of content.matchAll(IMPORT_PATTERN)) {
      const module = match[1];
      if (module) {
        structure.imports.push(importRef(module));
      }
    }

    for (const match of content.matchAll(CLASS_PATTERN)) {
      const name = match[1];
      if (!name) continue;
      const base = match[2];
      structure.classes[name] = {
        name,
        methods: [],
        bases: base ? [base] : [],
        line: lineAt(match.index ?? 0),
      };
    }

    for (const match of content.matchAll(FUNCTION_PATTERN)) {
      const name = match[1] ?? match[3];
      if (!name) continue;
      structure.functions[name] = {
        name,
        parameters: parameterNames(match[2] ?? match[4] ?? ''),
        line: lineAt(match.index ?? 0),
      };
    }

    return { status: 'parsed', structure };
  }
}

function importRef(module: string): ImportRef {
  return { module, name: null, alias: null };
}

/**
 * Leading identifiers of a parameter list. Destructured parameters have no
 * single name and are skipped.
 */
export function parameterNames(parameterText: string): string[] {
  const names: string[] = [];
  for (const part of splitTopLevel(parameterText)) {
    const match = part.trim().match(IDENTIFIER_START);
    if (match?.[1]) {
      names.push(match[1]);
    }
  }
  return names;
}

/**
 * Split on commas that are not nested inside brackets, braces or generics.
 */
function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';

  for (const char of text) {
    if (char === '{' || char === '[' || char === '(' || char === '<') {
      depth++;
    } else if (char === '}' || char === ']' || char === ')' || char === '>') {
      depth = Math.max(0, depth - 1);
    } else if (char === ',' && depth === 0) {
      parts.push(current);
      current = '';
      continue;
    }
    current += char;
  }

  if (current.trim()) {
    parts.push(current);
  }
  return parts;
}

/**
 * Map a character offset to its 1-based line number.
 */
function createLineLocator(content: string): (offset: number) => number {
  const lineStarts = [0];
  for (let i = 0; i < content.length; i++) {
    if (content[i] === '\n') {
      lineStarts.push(i + 1);
    }
  }

  return (offset: number) => {
    let low = 0;
    let high = lineStarts.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if ((lineStarts[mid] ?? 0) <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low + 1;
  };
}

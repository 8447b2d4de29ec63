/**
 * Python structure extraction using tree-sitter
 */

import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';

import type { ClassRecord, FunctionRecord, ImportRef, ModuleStructure } from '../../types/index.js';
import { emptyStructure, type ExtractionResult, type LanguageExtractor } from './base.js';

type SyntaxNode = Parser.SyntaxNode;
type Scope = 'module' | 'class' | 'function';

const PARAMETER_STOPS = new Set(['list_splat_pattern', 'dictionary_splat_pattern', 'keyword_separator']);

export class PythonExtractor implements LanguageExtractor {
  readonly language = 'python' as const;
  readonly extensions = ['py', 'pyi'] as const;
  private parser: Parser;

  constructor() {
    this.parser = new Parser();
    this.parser.setLanguage(Python);
  }

  extract(filePath: string, content: string): ExtractionResult {
    let tree: Parser.Tree;
    try {
      // The default 32KB buffer rejects larger inputs
      tree = this.parser.parse(content, undefined, { bufferSize: Math.max(32 * 1024, content.length * 2) });
    } catch (error) {
      return {
        status: 'failed',
        language: 'python',
        reason: error instanceof Error ? error.message : String(error),
      };
    }

    const root = tree.rootNode;
    if (root.hasError) {
      return { status: 'failed', language: 'python', reason: this.describeSyntaxError(root) };
    }

    const structure = emptyStructure(filePath, 'python');
    this.walk(root, structure, 'module');
    return { status: 'parsed', structure };
  }

  private describeSyntaxError(root: SyntaxNode): string {
    const errorNode = root.descendantsOfType('ERROR')[0];
    return errorNode ? `Syntax error at line ${errorNode.startPosition.row + 1}` : 'Syntax error';
  }

  /**
   * Depth-first walk over the tree. Imports and classes are recorded at any
   * depth; functions only while still at module scope.
   */
  private walk(node: SyntaxNode, structure: ModuleStructure, scope: Scope): void {
    for (const child of node.namedChildren) {
      switch (child.type) {
        case 'import_statement':
          structure.imports.push(...this.parseImport(child));
          break;
        case 'import_from_statement':
        case 'future_import_statement':
          structure.imports.push(...this.parseFromImport(child));
          break;
        case 'class_definition': {
          const record = this.parseClass(child);
          if (record) {
            structure.classes[record.name] = record;
          }
          this.walk(child, structure, 'class');
          break;
        }
        case 'function_definition': {
          if (scope === 'module') {
            const record = this.parseFunction(child);
            if (record) {
              structure.functions[record.name] = record;
            }
          }
          this.walk(child, structure, 'function');
          break;
        }
        default:
          this.walk(child, structure, scope);
      }
    }
  }

  private parseImport(node: SyntaxNode): ImportRef[] {
    return node.childrenForFieldName('name').map(nameNode => {
      if (nameNode.type === 'aliased_import') {
        return {
          module: nameNode.childForFieldName('name')?.text ?? '',
          name: null,
          alias: nameNode.childForFieldName('alias')?.text ?? null,
        };
      }
      return { module: nameNode.text, name: null, alias: null };
    });
  }

  private parseFromImport(node: SyntaxNode): ImportRef[] {
    const module = node.type === 'future_import_statement'
      ? '__future__'
      : node.childForFieldName('module_name')?.text ?? '';

    const refs: ImportRef[] = node.childrenForFieldName('name').map(nameNode => {
      if (nameNode.type === 'aliased_import') {
        return {
          module,
          name: nameNode.childForFieldName('name')?.text ?? '',
          alias: nameNode.childForFieldName('alias')?.text ?? null,
        };
      }
      return { module, name: nameNode.text, alias: null };
    });

    if (node.namedChildren.some(child => child.type === 'wildcard_import')) {
      refs.push({ module, name: '*', alias: null });
    }

    return refs;
  }

  private parseClass(node: SyntaxNode): ClassRecord | null {
    const name = node.childForFieldName('name')?.text;
    if (!name) return null;

    const methods: string[] = [];
    const body = node.childForFieldName('body');
    for (const statement of body?.namedChildren ?? []) {
      const definition = unwrapDecorated(statement);
      const methodName = definition?.type === 'function_definition'
        ? definition.childForFieldName('name')?.text
        : undefined;
      if (methodName) {
        methods.push(methodName);
      }
    }

    return {
      name,
      methods,
      bases: this.parseBases(node),
      line: node.startPosition.row + 1,
    };
  }

  private parseBases(node: SyntaxNode): string[] {
    const superclasses = node.childForFieldName('superclasses');
    if (!superclasses) return [];

    const bases: string[] = [];
    for (const argument of superclasses.namedChildren) {
      const dotted = dottedName(argument);
      if (dotted) {
        bases.push(dotted);
      }
    }
    return bases;
  }

  private parseFunction(node: SyntaxNode): FunctionRecord | null {
    const name = node.childForFieldName('name')?.text;
    if (!name) return null;

    return {
      name,
      parameters: this.parseParameters(node),
      line: node.startPosition.row + 1,
    };
  }

  /**
   * Positional parameter names, stopping at the first `*`, `*args` or `**kwargs`.
   */
  private parseParameters(node: SyntaxNode): string[] {
    const parameters = node.childForFieldName('parameters');
    if (!parameters) return [];

    const names: string[] = [];
    for (const param of parameters.namedChildren) {
      if (PARAMETER_STOPS.has(param.type)) break;

      switch (param.type) {
        case 'identifier':
          names.push(param.text);
          break;
        case 'default_parameter':
        case 'typed_default_parameter': {
          const paramName = param.childForFieldName('name');
          if (paramName?.type === 'identifier') {
            names.push(paramName.text);
          }
          break;
        }
        case 'typed_parameter': {
          // `*args: int` is a typed parameter wrapping a splat
          const inner = param.namedChildren[0];
          if (!inner || PARAMETER_STOPS.has(inner.type)) {
            return names;
          }
          if (inner.type === 'identifier') {
            names.push(inner.text);
          }
          break;
        }
        default:
          // positional_separator, comments
          break;
      }
    }

    return names;
  }
}

function unwrapDecorated(node: SyntaxNode): SyntaxNode | null {
  if (node.type === 'decorated_definition') {
    return node.childForFieldName('definition');
  }
  return node;
}

/**
 * `Name` and `a.b.Name` references as dotted strings; anything else is null.
 */
function dottedName(node: SyntaxNode): string | null {
  if (node.type === 'identifier') {
    return node.text;
  }
  if (node.type === 'attribute') {
    const object = node.childForFieldName('object');
    const attribute = node.childForFieldName('attribute');
    const prefix = object ? dottedName(object) : null;
    return prefix && attribute ? `${prefix}.${attribute.text}` : null;
  }
  return null;
}

import { describe, it, expect } from 'vitest';
import { buildStructureIndex } from '../../../src/analyzer/structure-index.js';
import { splitQualifiedKey } from '../../../src/types/index.js';
import { makeModule, parsed } from '../../helpers/fixtures.js';

describe('buildStructureIndex', () => {
  it('qualifies class and function names by file path', () => {
    const index = buildStructureIndex([
      parsed(makeModule('a.py', { classes: { Model: [] }, functions: { run: ['x'] } })),
      parsed(makeModule('b.py', { classes: { Model: [] } })),
    ]);

    expect(Object.keys(index.modules)).toEqual(['a.py', 'b.py']);
    expect(Object.keys(index.classes)).toEqual(['a.py::Model', 'b.py::Model']);
    expect(index.functions['a.py::run']).toEqual({ name: 'run', parameters: ['x'], line: 1 });
  });

  it('indexes imports per file', () => {
    const index = buildStructureIndex([parsed(makeModule('a.py', { imports: ['os'] }))]);

    expect(index.imports).toEqual({ 'a.py': [{ module: 'os', name: null, alias: null }] });
  });

  it('leaves unsupported and failed files out', () => {
    const index = buildStructureIndex([
      { path: 'notes.txt', result: { status: 'unsupported', language: 'unsupported' } },
      { path: 'broken.py', result: { status: 'failed', language: 'python', reason: 'Syntax error' } },
      parsed(makeModule('ok.py')),
    ]);

    expect(Object.keys(index.modules)).toEqual(['ok.py']);
    expect(index.imports).toEqual({ 'ok.py': [] });
  });

  it('only produces keys whose file path is an indexed module', () => {
    const index = buildStructureIndex([
      parsed(makeModule('pkg/a.py', { classes: { A: [] }, functions: { f: [] } })),
      parsed(makeModule('web/app.ts', { language: 'ecmascript', functions: { handler: [] } })),
    ]);

    for (const key of [...Object.keys(index.classes), ...Object.keys(index.functions)]) {
      expect(index.modules[splitQualifiedKey(key).filePath]).toBeDefined();
    }
  });

  it('keeps symbols named after object prototype members', () => {
    const index = buildStructureIndex([
      parsed(makeModule('toString', { classes: { ['__proto__']: [] }, functions: { constructor: [] } })),
    ]);

    expect(Object.keys(index.modules)).toEqual(['toString']);
    expect(Object.keys(index.classes)).toEqual(['toString::__proto__']);
    expect(Object.keys(index.functions)).toEqual(['toString::constructor']);
  });

  describe('splitQualifiedKey', () => {
    it('splits on the last separator', () => {
      expect(splitQualifiedKey('dir::x/a.py::Model')).toEqual({ filePath: 'dir::x/a.py', name: 'Model' });
      expect(splitQualifiedKey('Model')).toEqual({ filePath: '', name: 'Model' });
    });
  });
});

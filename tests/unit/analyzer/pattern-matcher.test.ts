import { describe, it, expect } from 'vitest';
import { compilePattern, createPathFilter, globToRegExp } from '../../../src/analyzer/pattern-matcher.js';
import { DEFAULT_EXCLUDE_PATTERNS, DEFAULT_INCLUDE_PATTERNS } from '../../../src/config/schema.js';

describe('Pattern Matcher', () => {
  describe('globToRegExp', () => {
    it('lets a leading **/ match zero or more directories', () => {
      const regex = globToRegExp('**/*.py');

      expect(regex.test('main.py')).toBe(true);
      expect(regex.test('src/pkg/main.py')).toBe(true);
      expect(regex.test('main.ts')).toBe(false);
    });

    it('keeps a single * inside one path segment', () => {
      const regex = globToRegExp('*.py');

      expect(regex.test('main.py')).toBe(true);
      expect(regex.test('src/main.py')).toBe(false);
    });

    it('matches a trailing ** across segments', () => {
      const regex = globToRegExp('**/node_modules/**');

      expect(regex.test('node_modules/pkg/index.js')).toBe(true);
      expect(regex.test('web/node_modules/pkg/index.js')).toBe(true);
      expect(regex.test('node_modules_backup/index.js')).toBe(false);
    });

    it('matches ? against exactly one character', () => {
      const regex = globToRegExp('file?.ts');

      expect(regex.test('file1.ts')).toBe(true);
      expect(regex.test('file.ts')).toBe(false);
    });

    it('escapes regular expression metacharacters', () => {
      const regex = globToRegExp('a+b(1).py');

      expect(regex.test('a+b(1).py')).toBe(true);
      expect(regex.test('aab1.py')).toBe(false);
    });

    it('anchors at the start of the path only', () => {
      expect(globToRegExp('src').test('src/app.py')).toBe(true);
      expect(globToRegExp('*.py').test('main.pyc')).toBe(true);
      expect(globToRegExp('src').test('lib/src/app.py')).toBe(false);
    });

    it('lets an extension pattern match longer extensions by prefix', () => {
      expect(globToRegExp('**/*.js').test('repo-onboard.config.json')).toBe(true);
      expect(globToRegExp('**/*.ts').test('src/App.tsx')).toBe(true);
    });
  });

  describe('compilePattern', () => {
    it('keeps the source pattern next to the matcher', () => {
      const matcher = compilePattern('**/*.ts');

      expect(matcher.pattern).toBe('**/*.ts');
      expect(matcher.matches('src/index.ts')).toBe(true);
      expect(matcher.matches('src/index.js')).toBe(false);
    });
  });

  describe('createPathFilter', () => {
    it('accepts paths matching an include pattern', () => {
      const filter = createPathFilter(['**/*.py'], []);

      expect(filter.accepts('pkg/module.py')).toBe(true);
      expect(filter.accepts('README.md')).toBe(false);
    });

    it('lets exclude patterns win over include patterns', () => {
      const filter = createPathFilter(['**/*.py'], ['tests/**']);

      expect(filter.isIncluded('tests/test_app.py')).toBe(true);
      expect(filter.isExcluded('tests/test_app.py')).toBe(true);
      expect(filter.accepts('tests/test_app.py')).toBe(false);
      expect(filter.accepts('src/app.py')).toBe(true);
    });

    it('applies the default patterns', () => {
      const filter = createPathFilter(DEFAULT_INCLUDE_PATTERNS, DEFAULT_EXCLUDE_PATTERNS);

      expect(filter.accepts('src/app.tsx')).toBe(true);
      expect(filter.accepts('node_modules/react/index.js')).toBe(false);
      expect(filter.accepts('pkg/__pycache__/mod.py')).toBe(false);
      expect(filter.accepts('.git/hooks/pre-commit.py')).toBe(false);
      expect(filter.accepts('docs/guide.md')).toBe(false);
    });

    it('accepts nothing without include patterns', () => {
      const filter = createPathFilter([], []);

      expect(filter.accepts('main.py')).toBe(false);
    });
  });
});

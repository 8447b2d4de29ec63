import { describe, it, expect, vi, beforeEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';

const { cloneMock } = vi.hoisted(() => ({
  cloneMock: vi.fn(),
}));

vi.mock('simple-git', () => ({
  simpleGit: vi.fn(() => ({ clone: cloneMock })),
}));

import { simpleGit } from 'simple-git';
import {
  acquireSource,
  resolveSource,
  withAccessToken,
  withAcquiredSource,
} from '../../../src/analyzer/source-acquirer.js';
import { AcquisitionError, InvalidRequestError } from '../../../src/errors.js';

describe('Source Acquirer', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    cloneMock.mockImplementation(async (_url: string, target: string) => {
      fs.writeFileSync(path.join(target, 'main.py'), 'print("hi")\n');
    });
  });

  describe('resolveSource', () => {
    it('resolves a repository URL', () => {
      expect(resolveSource({ repoUrl: 'https://example.com/org/repo.git' })).toEqual({
        kind: 'remote',
        repoUrl: 'https://example.com/org/repo.git',
      });
    });

    it('resolves a local path', () => {
      expect(resolveSource({ localPath: '/work/project' })).toEqual({ kind: 'local', localPath: '/work/project' });
    });

    it('returns a local path verbatim', () => {
      expect(resolveSource({ localPath: ' /work/my project ' })).toEqual({
        kind: 'local',
        localPath: ' /work/my project ',
      });
    });

    it('rejects both sources', () => {
      expect(() => resolveSource({ repoUrl: 'https://example.com/r.git', localPath: '/work' })).toThrow(
        InvalidRequestError
      );
      expect(() => resolveSource({ repoUrl: 'https://example.com/r.git', localPath: '/work' })).toThrow(
        'Cannot specify both repoUrl and localPath'
      );
    });

    it('rejects neither source, treating blank strings as absent', () => {
      expect(() => resolveSource({})).toThrow('Must specify either repoUrl or localPath');
      expect(() => resolveSource({ repoUrl: '  ', localPath: '' })).toThrow(InvalidRequestError);
    });
  });

  describe('withAccessToken', () => {
    it('injects the token as the URL username', () => {
      expect(withAccessToken('https://github.com/org/repo.git', 'test-token')).toBe(
        'https://test-token@github.com/org/repo.git'
      );
    });

    it('leaves the URL unchanged without a token', () => {
      expect(withAccessToken('https://github.com/org/repo.git')).toBe('https://github.com/org/repo.git');
    });

    it('does not touch non-https or credentialed URLs', () => {
      expect(withAccessToken('git@github.com:org/repo.git', 'test-token')).toBe('git@github.com:org/repo.git');
      expect(withAccessToken('http://example.com/repo.git', 'test-token')).toBe('http://example.com/repo.git');
      expect(withAccessToken('https://user@example.com/repo.git', 'test-token')).toBe(
        'https://user@example.com/repo.git'
      );
    });
  });

  describe('acquireSource', () => {
    it('uses a local path as is and never removes it', async () => {
      const source = await acquireSource({ localPath: '/work/project' });

      expect(source.root).toBe('/work/project');
      expect(source.owned).toBe(false);
      await source.release();
      expect(simpleGit).not.toHaveBeenCalled();
    });

    it('clones into a temporary directory that release removes', async () => {
      const source = await acquireSource({ repoUrl: 'https://example.com/org/repo.git' });

      expect(source.owned).toBe(true);
      expect(fs.existsSync(path.join(source.root, 'main.py'))).toBe(true);
      expect(cloneMock).toHaveBeenCalledWith('https://example.com/org/repo.git', source.root);

      await source.release();
      expect(fs.existsSync(source.root)).toBe(false);
      await source.release();
    });

    it('passes the timeout to simple-git', async () => {
      const source = await acquireSource({ repoUrl: 'https://example.com/org/repo.git' }, { timeoutMs: 5000 });
      await source.release();

      expect(simpleGit).toHaveBeenCalledWith({ baseDir: source.root, timeout: { block: 5000 } });
    });

    it('removes the directory and raises AcquisitionError when the clone fails', async () => {
      let target = '';
      cloneMock.mockImplementation(async (_url: string, dir: string) => {
        target = dir;
        throw new Error('fatal: could not read from https://test-token@example.com/org/repo.git');
      });

      const attempt = acquireSource(
        { repoUrl: 'https://example.com/org/repo.git' },
        { accessToken: 'test-token' }
      );

      await expect(attempt).rejects.toBeInstanceOf(AcquisitionError);
      await expect(attempt).rejects.toThrow(
        'Failed to clone https://example.com/org/repo.git: fatal: could not read from https://***@example.com/org/repo.git'
      );
      expect(target).not.toBe('');
      expect(fs.existsSync(target)).toBe(false);
    });
  });

  describe('withAcquiredSource', () => {
    it('releases the clone after the body resolves', async () => {
      const root = await withAcquiredSource({ repoUrl: 'https://example.com/org/repo.git' }, {}, async source => {
        expect(fs.existsSync(source.root)).toBe(true);
        return source.root;
      });

      expect(fs.existsSync(root)).toBe(false);
    });

    it('releases the clone when the body throws', async () => {
      let root = '';
      const run = withAcquiredSource({ repoUrl: 'https://example.com/org/repo.git' }, {}, async source => {
        root = source.root;
        throw new Error('analysis failed');
      });

      await expect(run).rejects.toThrow('analysis failed');
      expect(root).not.toBe('');
      expect(fs.existsSync(root)).toBe(false);
    });
  });
});

/**
 * Resolve a codebase to a local directory, cloning remote sources into a
 * scoped temporary directory.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { simpleGit, type SimpleGitOptions } from 'simple-git';

import { AcquisitionError, InvalidRequestError } from '../errors.js';

export interface SourceSpec {
  repoUrl?: string;
  localPath?: string;
}

export type ResolvedSource =
  | { kind: 'remote'; repoUrl: string }
  | { kind: 'local'; localPath: string };

export interface AcquireOptions {
  accessToken?: string;
  signal?: AbortSignal;
  /** Block timeout for the clone in milliseconds, 0 disables it */
  timeoutMs?: number;
  tempPrefix?: string;
}

export interface AcquiredSource {
  root: string;
  /** True when `root` is a temporary directory that `release()` removes */
  owned: boolean;
  release(): Promise<void>;
}

/**
 * Validate that exactly one source is given. Blank strings count as absent;
 * a local path is otherwise returned verbatim.
 */
export function resolveSource(spec: SourceSpec): ResolvedSource {
  const repoUrl = spec.repoUrl?.trim();
  const hasLocalPath = Boolean(spec.localPath?.trim());

  if (repoUrl && hasLocalPath) {
    throw new InvalidRequestError('Cannot specify both repoUrl and localPath');
  }
  if (repoUrl) {
    return { kind: 'remote', repoUrl };
  }
  if (spec.localPath && hasLocalPath) {
    return { kind: 'local', localPath: spec.localPath };
  }
  throw new InvalidRequestError('Must specify either repoUrl or localPath');
}

/**
 * Inject an access token as the user-info of an https clone URL.
 * URLs that already carry credentials or are not https are returned as is.
 */
export function withAccessToken(repoUrl: string, token?: string): string {
  if (!token) return repoUrl;

  let url: URL;
  try {
    url = new URL(repoUrl);
  } catch {
    return repoUrl;
  }

  if (url.protocol !== 'https:' || url.username) {
    return repoUrl;
  }

  url.username = token;
  return url.toString();
}

function redact(text: string, secret?: string): string {
  return secret ? text.split(secret).join('***') : text;
}

export async function acquireSource(spec: SourceSpec, options: AcquireOptions = {}): Promise<AcquiredSource> {
  const source = resolveSource(spec);

  if (source.kind === 'local') {
    return {
      root: source.localPath,
      owned: false,
      release: async () => {},
    };
  }

  return cloneRepository(source.repoUrl, options);
}

async function cloneRepository(repoUrl: string, options: AcquireOptions): Promise<AcquiredSource> {
  const tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), options.tempPrefix ?? 'repo-onboard-'));

  let released = false;
  const release = async (): Promise<void> => {
    if (released) return;
    released = true;
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  };

  const gitOptions: Partial<SimpleGitOptions> = { baseDir: tempDir };
  if (options.signal) {
    gitOptions.abort = options.signal;
  }
  if (options.timeoutMs && options.timeoutMs > 0) {
    gitOptions.timeout = { block: options.timeoutMs };
  }

  try {
    await simpleGit(gitOptions).clone(withAccessToken(repoUrl, options.accessToken), tempDir);
  } catch (error) {
    await release();
    const reason = error instanceof Error ? error.message : String(error);
    throw new AcquisitionError(
      `Failed to clone ${repoUrl}: ${redact(reason, options.accessToken)}`,
      repoUrl,
      { cause: error }
    );
  }

  return { root: tempDir, owned: true, release };
}

/**
 * Run `body` against an acquired source and release it on every exit path.
 */
export async function withAcquiredSource<T>(
  spec: SourceSpec,
  options: AcquireOptions,
  body: (source: AcquiredSource) => Promise<T>
): Promise<T> {
  const source = await acquireSource(spec, options);
  try {
    return await body(source);
  } finally {
    await source.release();
  }
}

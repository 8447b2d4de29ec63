/**
 * Configuration file loader
 */

import fs from 'node:fs';
import path from 'node:path';
import { configSchema, type Config } from './schema.js';

const CONFIG_NAMES = ['repo-onboard.config.json', '.repo-onboardrc.json', '.repo-onboardrc'];

export async function loadConfig(configPath: string): Promise<Config> {
  const absolutePath = path.resolve(configPath);

  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${absolutePath}`);
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  return result.data;
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

export async function findConfig(startDir: string): Promise<Config | null> {
  let currentDir = path.resolve(startDir);
  const root = path.parse(currentDir).root;

  while (currentDir !== root) {
    for (const configName of CONFIG_NAMES) {
      const configPath = path.join(currentDir, configName);
      if (fs.existsSync(configPath)) {
        return loadConfig(configPath);
      }
    }

    // package.json may carry a "repoOnboard" key
    const packagePath = path.join(currentDir, 'package.json');
    if (fs.existsSync(packagePath)) {
      const embedded = await readPackageConfig(packagePath);
      if (embedded) {
        return embedded;
      }
    }

    currentDir = path.dirname(currentDir);
  }

  return null;
}

async function readPackageConfig(packagePath: string): Promise<Config | null> {
  let packageContent: unknown;
  try {
    packageContent = JSON.parse(await fs.promises.readFile(packagePath, 'utf-8'));
  } catch {
    // Not our file to validate
    return null;
  }

  if (typeof packageContent !== 'object' || packageContent === null || !('repoOnboard' in packageContent)) {
    return null;
  }

  const result = configSchema.safeParse(packageContent.repoOnboard);
  return result.success ? result.data : null;
}

export async function loadConfigOrDefault(startDir: string): Promise<Config> {
  const config = await findConfig(startDir);
  return config ?? getDefaultConfig();
}

/**
 * Token used for authenticated clones: config first, then GITHUB_TOKEN.
 */
export function resolveAccessToken(config: Config, env: NodeJS.ProcessEnv = process.env): string | undefined {
  return config.clone.accessToken ?? (env.GITHUB_TOKEN || undefined);
}

export { configSchema, type Config } from './schema.js';

/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const DEFAULT_INCLUDE_PATTERNS = ['**/*.py', '**/*.js', '**/*.ts', '**/*.jsx', '**/*.tsx'];
export const DEFAULT_EXCLUDE_PATTERNS = ['**/node_modules/**', '**/__pycache__/**', '**/.git/**'];
export const DEFAULT_MAX_FILE_SIZE = 100_000; // 100KB

export const cloneConfigSchema = z.object({
  timeoutMs: z.number().int().min(0).default(0), // 0 = no block timeout
  accessToken: z.string().min(1).optional(),
});

export const concurrencyConfigSchema = z.object({
  fileReads: z.number().int().min(1).max(256).default(16),
});

export const storageConfigSchema = z.object({
  directory: z.string().default('.repo-onboard/analyses'),
});

export const configSchema = z.object({
  include: z.array(z.string()).default(() => [...DEFAULT_INCLUDE_PATTERNS]),
  exclude: z.array(z.string()).default(() => [...DEFAULT_EXCLUDE_PATTERNS]),
  maxFileSize: z.number().int().min(0).default(DEFAULT_MAX_FILE_SIZE),
  clone: cloneConfigSchema.default({}),
  concurrency: concurrencyConfigSchema.default({}),
  storage: storageConfigSchema.default({}),
});

export const analysisRequestSchema = z.object({
  repoUrl: z.string().optional(),
  localPath: z.string().optional(),
  include: z.array(z.string()).optional(),
  exclude: z.array(z.string()).optional(),
  maxFileSize: z.number().int().min(0).optional(),
});

export type Config = z.infer<typeof configSchema>;
export type CloneConfig = z.infer<typeof cloneConfigSchema>;
export type ConcurrencyConfig = z.infer<typeof concurrencyConfigSchema>;
export type StorageConfig = z.infer<typeof storageConfigSchema>;

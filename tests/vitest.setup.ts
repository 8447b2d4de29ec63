/**
 * Vitest setup file
 * This file runs before each test file
 */

import { beforeAll, vi } from 'vitest';

// Tests never see a token from the developer's shell
vi.stubEnv('GITHUB_TOKEN', '');

// Increase default timeout for slow tests
if (process.env.CI) {
  // Longer timeouts in CI environment
  beforeAll(() => {
    vi.setConfig({ testTimeout: 30000, hookTimeout: 30000 });
  });
}

import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { ConfigService, type ConfigOverrides } from '../../src/core/services/config.service';
import { LoggerService } from '../../src/core/services/logger.service';

export function testConfig(projectDir: string, overrides: ConfigOverrides = {}): ConfigService {
  return ConfigService.fromEnv(
    {},
    {
      deployment: overrides.deployment,
      settings: {
        projectDir,
        healthMaxRetries: 3,
        healthIntervalMs: 1_000,
        healthSettleDelayMs: 5_000,
        ...overrides.settings,
      },
    },
  );
}

// Warn and above would only add noise to test output
export const quietLogger = () => new LoggerService({ level: 'error' });

export async function makeTempDir(prefix = 'lean-deploy-'): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

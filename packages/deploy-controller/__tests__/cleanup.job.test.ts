import { mkdir, readdir, utimes, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { BackupManager } from '../src/backup/backupManager.service';
import type { PruneReport } from '../src/infra/runtime/containerRuntime.port';
import { CleanupService } from '../src/maintenance/cleanup.job';
import { ClockStub } from './helpers/clock.stub';
import { makeTempDir, quietLogger, removeTempDir, testConfig } from './helpers/config';
import { RuntimeStub } from './helpers/runtime.stub';
import { SamplerStub } from './helpers/sampler.stub';

class UnavailableRuntime extends RuntimeStub {
  async prune(): Promise<PruneReport> {
    throw new Error('engine unavailable');
  }
}

describe('CleanupService', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  const createService = (runtime: RuntimeStub = new RuntimeStub()) => {
    const config = testConfig(dir);
    const clock = new ClockStub();
    const logger = quietLogger();
    const backups = new BackupManager(config, new SamplerStub(), clock, logger);
    return new CleanupService(runtime, backups, config, clock, logger);
  };

  async function writeLog(name: string, mtime: string) {
    const file = path.join(dir, 'logs', name);
    await writeFile(file, 'line\n');
    await utimes(file, new Date(mtime), new Date(mtime));
  }

  it('prunes runtime resources, old backups and stale rotated logs', async () => {
    await mkdir(path.join(dir, 'logs'));
    await writeLog('app.log', '2024-01-01T00:00:00.000Z');
    await writeLog('app.log.1', '2024-02-29T00:00:00.000Z');
    await writeLog('app.log.2', '2024-02-20T00:00:00.000Z');
    await writeLog('error.log.2024-02-01', '2024-02-01T00:00:00.000Z');
    for (const id of ['20240225_080000', '20240226_080000', '20240227_080000', '20240228_080000', '20240229_080000']) {
      await mkdir(path.join(dir, 'backups', id), { recursive: true });
    }

    const report = await createService().clean();

    expect(report.runtime).toMatchObject({ containersDeleted: 2, imagesDeleted: 3, errors: [] });
    expect(report.backupsRemoved).toEqual(['20240226_080000', '20240225_080000']);
    expect(report.logsRemoved).toEqual(['app.log.2', 'error.log.2024-02-01']);
    expect((await readdir(path.join(dir, 'logs'))).sort()).toEqual(['app.log', 'app.log.1']);
  });

  it('continues when the runtime cannot be pruned', async () => {
    const report = await createService(new UnavailableRuntime()).clean();

    expect(report).toEqual({ runtime: null, backupsRemoved: [], logsRemoved: [] });
  });
});

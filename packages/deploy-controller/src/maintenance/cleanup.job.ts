import { readdir, rm, stat } from 'node:fs/promises';
import path from 'node:path';

import { Inject, Injectable } from '@nestjs/common';
import pLimit from 'p-limit';

import { BackupManager } from '../backup/backupManager.service';
import { CLOCK, type Clock } from '../core/clock';
import { LOGS_DIR } from '../core/constants';
import { errorMessage } from '../core/errors';
import { ConfigService } from '../core/services/config.service';
import { LoggerService } from '../core/services/logger.service';
import { CONTAINER_RUNTIME, type ContainerRuntime, type PruneReport } from '../infra/runtime/containerRuntime.port';

export type CleanupReport = {
  runtime: PruneReport | null;
  backupsRemoved: string[];
  logsRemoved: string[];
};

const DAY_MS = 24 * 60 * 60 * 1000;
// Rotated logs: app.log.1, app.log.2024-01-01
const ROTATED_LOG_RE = /\.log\./;

@Injectable()
export class CleanupService {
  private readonly logger: LoggerService;

  constructor(
    @Inject(CONTAINER_RUNTIME) private readonly runtime: ContainerRuntime,
    @Inject(BackupManager) private readonly backups: BackupManager,
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(LoggerService) logger: LoggerService,
  ) {
    this.logger = logger.child(CleanupService.name);
  }

  /** Reclaim runtime resources, enforce backup retention and drop stale rotated logs. */
  async clean(): Promise<CleanupReport> {
    this.logger.info('Cleanup started');
    let runtime: PruneReport | null = null;
    try {
      runtime = await this.runtime.prune();
    } catch (error) {
      this.logger.warn('Runtime prune failed', { error: errorMessage(error) });
    }

    const backupsRemoved = await this.backups.prune(this.configService.settings.backupRetention);
    const logsRemoved = await this.pruneLogs(this.clock.now());

    this.logger.info('Cleanup finished', {
      backupsRemoved: backupsRemoved.length,
      logsRemoved: logsRemoved.length,
    });
    return { runtime, backupsRemoved, logsRemoved };
  }

  async pruneLogs(now: Date): Promise<string[]> {
    const dir = this.configService.resolvePath(LOGS_DIR);
    const cutoff = now.getTime() - this.configService.settings.logRetentionDays * DAY_MS;

    let names: string[];
    try {
      names = (await readdir(dir, { withFileTypes: true }))
        .filter((entry) => entry.isFile() && ROTATED_LOG_RE.test(entry.name))
        .map((entry) => entry.name);
    } catch (error) {
      this.logger.debug('Log directory not readable', { dir, error: errorMessage(error) });
      return [];
    }

    const limit = pLimit(5);
    const outcomes = await Promise.allSettled(
      names.map((name) =>
        limit(async () => {
          const file = path.join(dir, name);
          const { mtimeMs } = await stat(file);
          if (mtimeMs >= cutoff) return undefined;
          await rm(file, { force: true });
          return name;
        }),
      ),
    );

    const removed: string[] = [];
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        if (outcome.value) removed.push(outcome.value);
      } else {
        this.logger.warn(`Could not remove log ${names[index]}`, { error: errorMessage(outcome.reason) });
      }
    });
    return removed.sort();
  }
}

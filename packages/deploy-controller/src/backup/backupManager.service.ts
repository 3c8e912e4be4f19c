import type { Dirent } from 'node:fs';
import { cp, mkdir, readdir, rm, stat, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { Inject, Injectable } from '@nestjs/common';

import { CLOCK, type Clock } from '../core/clock';
import {
  BACKUP_INFO_FILE,
  BACKUPS_DIR,
  BUILD_DESCRIPTOR_FILE,
  DESCRIPTOR_FILE,
  ENV_FILE,
  LOGS_DIR,
} from '../core/constants';
import { errorMessage } from '../core/errors';
import { ConfigService, formatMemoryBytes, type DeploymentConfig } from '../core/services/config.service';
import { LoggerService } from '../core/services/logger.service';
import { RESOURCE_SAMPLER, type ResourceSampler, type ResourceSnapshot } from '../infra/resources/resourceSampler';

export const BACKUP_ID_RE = /^\d{8}_\d{6}$/;

export type HostFacts = {
  hostname: string;
  platform: string;
  release: string;
  arch: string;
};

export type BackupMetadata = {
  host: HostFacts;
  resources: ResourceSnapshot;
  config: Record<string, string | number | boolean>;
};

export type BackupRecord = {
  id: string;
  createdAt: string;
  path: string;
  files: string[];
  metadata: BackupMetadata;
};

export type SnapshotSkipReason = 'backup_disabled' | 'development_environment';

export type SnapshotResult =
  | { kind: 'created'; record: BackupRecord }
  | { kind: 'skipped'; reason: SnapshotSkipReason }
  | { kind: 'failed'; error: string };

// Artifacts copied into each backup, when present
const BACKUP_SOURCES = [LOGS_DIR, BUILD_DESCRIPTOR_FILE, DESCRIPTOR_FILE, ENV_FILE];

const pad = (n: number) => String(n).padStart(2, '0');

/** UTC timestamp id, `YYYYMMDD_HHMMSS`; lexical order is chronological order. */
export function formatBackupId(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

const hostFacts = (): HostFacts => ({
  hostname: os.hostname(),
  platform: os.platform(),
  release: os.release(),
  arch: os.arch(),
});

const configSnapshot = (config: DeploymentConfig): BackupMetadata['config'] => ({
  environment: config.environment,
  registry: config.registry,
  imageName: config.imageName,
  version: config.version,
  maxMemory: formatMemoryBytes(config.maxMemoryBytes),
  maxCpus: config.maxCpus,
  workerProcesses: config.workerProcesses,
  workerThreads: config.workerThreads,
  maxRequests: config.maxRequests,
});

const isMissing = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

@Injectable()
export class BackupManager {
  private readonly logger: LoggerService;

  constructor(
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(RESOURCE_SAMPLER) private readonly sampler: ResourceSampler,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(LoggerService) logger: LoggerService,
  ) {
    this.logger = logger.child(BackupManager.name);
  }

  private get backupsRoot(): string {
    return this.configService.resolvePath(BACKUPS_DIR);
  }

  async snapshot(config: DeploymentConfig): Promise<SnapshotResult> {
    if (!config.backupEnabled) {
      this.logger.info('Backups are disabled');
      return { kind: 'skipped', reason: 'backup_disabled' };
    }
    if (config.environment === 'development') {
      this.logger.warn('Backups are not taken in the development environment');
      return { kind: 'skipped', reason: 'development_environment' };
    }

    const createdAt = this.clock.now();
    const id = formatBackupId(createdAt);
    const target = path.join(this.backupsRoot, id);
    this.logger.info(`Creating backup ${id}`);

    let created = false;
    try {
      await mkdir(this.backupsRoot, { recursive: true });
      // Not recursive: an existing id means two snapshots in the same second
      await mkdir(target);
      created = true;

      const files: string[] = [];
      for (const name of BACKUP_SOURCES) {
        const source = this.configService.resolvePath(name);
        if (!(await this.exists(source))) continue;
        await cp(source, path.join(target, name), { recursive: true });
        files.push(name);
      }

      const metadata: BackupMetadata = {
        host: hostFacts(),
        resources: await this.sampler.sample(),
        config: configSnapshot(config),
      };
      await writeFile(
        path.join(target, BACKUP_INFO_FILE),
        JSON.stringify({ id, createdAt: createdAt.toISOString(), files, ...metadata }, null, 2),
      );

      const record: BackupRecord = { id, createdAt: createdAt.toISOString(), path: target, files, metadata };
      this.logger.info(`Backup ${id} created`, { files });
      await this.prune(this.configService.settings.backupRetention);
      return { kind: 'created', record };
    } catch (error) {
      this.logger.error(`Backup ${id} failed`, { error: errorMessage(error) });
      // A partial directory would otherwise outrank complete backups in retention
      if (created) await this.discard(target);
      return { kind: 'failed', error: errorMessage(error) };
    }
  }

  /** Backup ids on disk, newest first. A missing backups directory is empty. */
  async list(): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(this.backupsRoot, { withFileTypes: true });
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
    return entries
      .filter((entry) => entry.isDirectory() && BACKUP_ID_RE.test(entry.name))
      .map((entry) => entry.name)
      .sort()
      .reverse();
  }

  /**
   * Delete every backup beyond the newest `keep`. Never throws: listing and
   * deletion failures are logged and skipped. Returns the removed ids.
   */
  async prune(keep = 3): Promise<string[]> {
    let ids: string[];
    try {
      ids = await this.list();
    } catch (error) {
      this.logger.warn('Could not list backups for pruning', { error: errorMessage(error) });
      return [];
    }

    const removed: string[] = [];
    for (const id of ids.slice(Math.max(0, keep))) {
      try {
        await rm(path.join(this.backupsRoot, id), { recursive: true, force: true });
        removed.push(id);
      } catch (error) {
        this.logger.warn(`Could not remove backup ${id}`, { error: errorMessage(error) });
      }
    }
    if (removed.length > 0) {
      this.logger.info(`Pruned ${removed.length} old backup(s)`, { removed, keep });
    }
    return removed;
  }

  private async discard(target: string): Promise<void> {
    try {
      await rm(target, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(`Could not remove incomplete backup ${target}`, { error: errorMessage(error) });
    }
  }

  private async exists(target: string): Promise<boolean> {
    try {
      await stat(target);
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }
}

import { access } from 'node:fs/promises';
import path from 'node:path';

import { Inject, Injectable } from '@nestjs/common';

import { BACKUPS_DIR, BUILD_CPUS, BUILD_DESCRIPTOR_FILE, BUILD_MEMORY_BYTES, LOGS_DIR } from '../core/constants';
import { BuildError, errorMessage } from '../core/errors';
import { ConfigService, type DeploymentConfig } from '../core/services/config.service';
import { LoggerService } from '../core/services/logger.service';
import { CONTAINER_RUNTIME, type ArtifactRef, type ContainerRuntime } from '../infra/runtime/containerRuntime.port';

export type BuildResult = { ok: true; artifact: ArtifactRef } | { ok: false; error: BuildError };

// Host-side state that never belongs in the image
const CONTEXT_EXCLUDES = ['.git', 'node_modules', BACKUPS_DIR, LOGS_DIR];

export function buildArgsFor(config: DeploymentConfig): Record<string, string> {
  return {
    WORKER_PROCESSES: String(config.workerProcesses),
    WORKER_THREADS: String(config.workerThreads),
    MAX_REQUESTS: String(config.maxRequests),
  };
}

export function imageTagFor(config: DeploymentConfig): string {
  return `${config.registry}/${config.imageName}:${config.version}`;
}

@Injectable()
export class ArtifactBuilder {
  private readonly logger: LoggerService;

  constructor(
    @Inject(CONTAINER_RUNTIME) private readonly runtime: ContainerRuntime,
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(LoggerService) logger: LoggerService,
  ) {
    this.logger = logger.child(ArtifactBuilder.name);
  }

  /**
   * Build the service image under the build-time cap. Never retried: a missing
   * Dockerfile or a failed build step is returned as a BuildError.
   */
  async build(config: DeploymentConfig): Promise<BuildResult> {
    const contextDir = this.configService.projectDir;
    const dockerfile = path.join(contextDir, BUILD_DESCRIPTOR_FILE);
    try {
      await access(dockerfile);
    } catch {
      const error = new BuildError('descriptor_missing', `${BUILD_DESCRIPTOR_FILE} not found in ${contextDir}`);
      this.logger.error(error.message);
      return { ok: false, error };
    }

    const tag = imageTagFor(config);
    this.logger.info('Build configuration', {
      tag,
      buildMemoryBytes: BUILD_MEMORY_BYTES,
      buildCpus: BUILD_CPUS,
      workerProcesses: config.workerProcesses,
      workerThreads: config.workerThreads,
    });

    try {
      const artifact = await this.runtime.buildImage({
        contextDir,
        dockerfile: BUILD_DESCRIPTOR_FILE,
        tag,
        buildArgs: buildArgsFor(config),
        caps: { memoryBytes: BUILD_MEMORY_BYTES, cpus: BUILD_CPUS },
        exclude: CONTEXT_EXCLUDES,
      });
      this.logger.info('Image built', {
        tag: artifact.tag,
        imageId: artifact.imageId,
        sizeMiB: Math.round((artifact.sizeBytes / (1024 * 1024)) * 10) / 10,
      });
      return { ok: true, artifact };
    } catch (cause) {
      const error = new BuildError('build_failed', `Image build failed: ${errorMessage(cause)}`, { cause });
      this.logger.error(error.message);
      return { ok: false, error };
    }
  }
}

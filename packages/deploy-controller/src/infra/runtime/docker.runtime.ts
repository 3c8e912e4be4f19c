import { mkdir, readdir } from 'node:fs/promises';
import path from 'node:path';
import { Readable } from 'node:stream';

import { Inject, Injectable } from '@nestjs/common';
import Docker from 'dockerode';

import { MANAGED_LABEL } from '../../core/constants';
import { RuntimeError, errorMessage, extractStatusCode } from '../../core/errors';
import { ConfigService } from '../../core/services/config.service';
import { LoggerService } from '../../core/services/logger.service';
import type { Descriptor } from '../../descriptor/descriptor.types';
import type {
  ArtifactRef,
  BuildImageRequest,
  ContainerRuntime,
  LogsOptions,
  PruneReport,
  ResourceUsage,
  RuntimeHandle,
  RuntimeStatus,
  StopOutcome,
} from './containerRuntime.port';
import { demuxLogBuffer, mergeDemuxed } from './runtimeStream.util';

const NANOS_PER_SECOND = 1_000_000_000;
const CPU_PERIOD_US = 100_000;

type BuildEvent = {
  stream?: string;
  status?: string;
  error?: string;
  errorDetail?: { message?: string };
};

const shortId = (id: string) => id.substring(0, 12);

/**
 * ContainerRuntime over the local Docker engine (dockerode).
 *
 * Stop and remove are idempotent: 304 (not running), 404 (missing) and 409
 * (removal in progress) are logged and treated as already stopped.
 */
@Injectable()
export class DockerRuntime implements ContainerRuntime {
  private readonly logger: LoggerService;
  private readonly docker: Docker;

  constructor(
    @Inject(ConfigService) private readonly config: ConfigService,
    @Inject(LoggerService) logger: LoggerService,
    docker?: Docker,
  ) {
    this.logger = logger.child(DockerRuntime.name);
    const socketPath = config.settings.dockerSocket;
    this.docker = docker ?? new Docker(socketPath ? { socketPath } : {});
  }

  async buildImage(request: BuildImageRequest, onProgress?: (line: string) => void): Promise<ArtifactRef> {
    const exclude = new Set(request.exclude ?? []);
    const src = (await readdir(request.contextDir)).filter((entry) => !exclude.has(entry)).sort();
    this.logger.info(`Building image '${request.tag}'`, {
      contextDir: request.contextDir,
      entries: src.length,
      memoryBytes: request.caps.memoryBytes,
      cpus: request.caps.cpus,
    });

    let stream: NodeJS.ReadableStream;
    try {
      stream = await this.docker.buildImage(
        { context: request.contextDir, src },
        {
          t: request.tag,
          dockerfile: request.dockerfile,
          buildargs: request.buildArgs,
          memory: request.caps.memoryBytes,
          cpuperiod: CPU_PERIOD_US,
          cpuquota: Math.round(request.caps.cpus * CPU_PERIOD_US),
          labels: { [MANAGED_LABEL]: 'true' },
        },
      );
    } catch (error) {
      throw new RuntimeError('build_failed', `Image build request failed: ${errorMessage(error)}`, extractStatusCode(error), {
        cause: error,
      });
    }

    const failure = await new Promise<string | undefined>((resolve, reject) => {
      let buildError: string | undefined;
      this.docker.modem.followProgress(
        stream,
        (err: Error | null) => {
          if (err) return reject(new RuntimeError('build_failed', `Image build stream failed: ${err.message}`));
          resolve(buildError);
        },
        (event: BuildEvent) => {
          if (event.error || event.errorDetail?.message) {
            buildError = event.errorDetail?.message ?? event.error;
            return;
          }
          const line = (event.stream ?? event.status ?? '').trimEnd();
          if (line) {
            this.logger.debug(line);
            onProgress?.(line);
          }
        },
      );
    });
    if (failure) {
      throw new RuntimeError('build_failed', failure.trim());
    }

    const inspect = await this.docker.getImage(request.tag).inspect();
    this.logger.info(`Finished building image '${request.tag}'`, { imageId: shortId(inspect.Id), sizeBytes: inspect.Size });
    return {
      tag: request.tag,
      imageId: inspect.Id,
      sizeBytes: inspect.Size,
      builtAt: inspect.Created,
    };
  }

  async applyDescriptor(descriptor: Descriptor): Promise<RuntimeHandle> {
    await this.ensureNetwork(descriptor.network, descriptor.labels);
    await this.removeContainer(descriptor.service);

    const binds: string[] = [];
    for (const volume of descriptor.volumes) {
      const source = path.resolve(this.config.projectDir, volume.source);
      await mkdir(source, { recursive: true });
      binds.push(`${source}:${volume.target}${volume.readOnly ? ':ro' : ''}`);
    }

    const exposedPorts: Record<string, Record<string, never>> = {};
    const portBindings: Record<string, Array<{ HostPort: string }>> = {};
    for (const port of descriptor.ports) {
      const key = `${port.container}/${port.protocol}`;
      exposedPorts[key] = {};
      portBindings[key] = [{ HostPort: String(port.host) }];
    }

    const { limits, reservations } = descriptor.resources;
    const { healthCheck } = descriptor;
    const createOptions: Docker.ContainerCreateOptions = {
      name: descriptor.service,
      Image: descriptor.image,
      Env: Object.entries(descriptor.env).map(([k, v]) => `${k}=${v}`),
      Labels: descriptor.labels,
      ExposedPorts: exposedPorts,
      StopTimeout: descriptor.stopGracePeriodSeconds,
      Healthcheck: {
        Test: healthCheck.test,
        Interval: healthCheck.intervalSeconds * NANOS_PER_SECOND,
        Timeout: healthCheck.timeoutSeconds * NANOS_PER_SECOND,
        Retries: healthCheck.retries,
        StartPeriod: healthCheck.startPeriodSeconds * NANOS_PER_SECOND,
      },
      HostConfig: {
        NanoCpus: Math.round(limits.cpus * NANOS_PER_SECOND),
        Memory: limits.memoryBytes,
        MemoryReservation: reservations.memoryBytes,
        CpuShares: Math.round(reservations.cpus * 1024),
        PortBindings: portBindings,
        Binds: binds,
        NetworkMode: descriptor.network,
        RestartPolicy: { Name: descriptor.restartPolicy },
        SecurityOpt: descriptor.securityOpt,
      },
    };

    this.logger.info(`Creating container '${descriptor.service}' from '${descriptor.image}'`);
    try {
      const container = await this.docker.createContainer(createOptions);
      await container.start();
      const inspect = await container.inspect();
      this.logger.info(`Container started cid=${shortId(inspect.Id)} status=${inspect.State?.Status}`);
      return { id: inspect.Id, name: descriptor.service };
    } catch (error) {
      throw new RuntimeError(
        'apply_failed',
        `Failed to start '${descriptor.service}': ${errorMessage(error)}`,
        extractStatusCode(error),
        { cause: error },
      );
    }
  }

  async stop(name: string, timeoutSec = 30): Promise<StopOutcome> {
    this.logger.info(`Stopping container '${name}' (timeout=${timeoutSec}s)`);
    const container = this.docker.getContainer(name);
    let outcome: StopOutcome = 'stopped';
    try {
      await container.stop({ t: timeoutSec });
    } catch (error) {
      const sc = extractStatusCode(error);
      if (sc !== 304 && sc !== 404 && sc !== 409) throw this.wrap('stop_failed', error);
      this.logger.debug(`Benign stop error status=${sc} name=${name}`);
      outcome = 'already_stopped';
    }
    await this.removeContainer(name);
    return outcome;
  }

  async queryStatus(name: string): Promise<RuntimeStatus> {
    const container = this.docker.getContainer(name);
    let inspect: Docker.ContainerInspectInfo;
    try {
      inspect = await container.inspect();
    } catch (error) {
      if (extractStatusCode(error) === 404) {
        return { name, exists: false, running: false, state: 'missing' };
      }
      throw this.wrap('status_failed', error);
    }

    const running = inspect.State?.Running === true;
    const ports = Object.entries(inspect.NetworkSettings?.Ports ?? {}).flatMap(([containerPort, bindings]) =>
      (bindings ?? []).map((b) => `${b.HostIp || '0.0.0.0'}:${b.HostPort}->${containerPort}`),
    );
    return {
      name,
      exists: true,
      running,
      state: inspect.State?.Status ?? 'unknown',
      health: inspect.State?.Health?.Status,
      startedAt: inspect.State?.StartedAt,
      ports,
      resourceUsage: running ? await this.readUsage(container) : undefined,
    };
  }

  async logs(name: string, options: LogsOptions = {}): Promise<Readable> {
    const tail = options.tail ?? 100;
    if (options.follow === false) {
      return Readable.from([await this.tailLogs(name, tail)]);
    }
    try {
      const stream = await this.docker.getContainer(name).logs({ follow: true, stdout: true, stderr: true, tail });
      return mergeDemuxed(stream, (s, out, err) => this.docker.modem.demuxStream(s, out, err));
    } catch (error) {
      throw this.wrap(extractStatusCode(error) === 404 ? 'not_found' : 'logs_failed', error);
    }
  }

  async tailLogs(name: string, tail: number): Promise<string> {
    try {
      const payload = await this.docker.getContainer(name).logs({ follow: false, stdout: true, stderr: true, tail });
      return demuxLogBuffer(payload);
    } catch (error) {
      if (extractStatusCode(error) === 404) return '';
      throw this.wrap('logs_failed', error);
    }
  }

  async prune(): Promise<PruneReport> {
    const report: PruneReport = {
      containersDeleted: 0,
      networksDeleted: 0,
      volumesDeleted: 0,
      imagesDeleted: 0,
      spaceReclaimedBytes: 0,
      errors: [],
    };
    const attempt = async (what: string, run: () => Promise<void>) => {
      try {
        await run();
      } catch (error) {
        this.logger.warn(`Prune ${what} failed`, { error: errorMessage(error) });
        report.errors.push(`${what}: ${errorMessage(error)}`);
      }
    };

    await attempt('containers', async () => {
      const res = await this.docker.pruneContainers();
      report.containersDeleted += res.ContainersDeleted?.length ?? 0;
      report.spaceReclaimedBytes += res.SpaceReclaimed ?? 0;
    });
    await attempt('networks', async () => {
      const res = await this.docker.pruneNetworks();
      report.networksDeleted += res.NetworksDeleted?.length ?? 0;
    });
    await attempt('volumes', async () => {
      const res = await this.docker.pruneVolumes();
      report.volumesDeleted += res.VolumesDeleted?.length ?? 0;
      report.spaceReclaimedBytes += res.SpaceReclaimed ?? 0;
    });
    await attempt('images', async () => {
      const res = await this.docker.pruneImages();
      report.imagesDeleted += res.ImagesDeleted?.length ?? 0;
      report.spaceReclaimedBytes += res.SpaceReclaimed ?? 0;
    });
    this.logger.info('Runtime prune finished', { ...report });
    return report;
  }

  private async ensureNetwork(name: string, labels: Record<string, string>): Promise<void> {
    const existing = await this.docker.listNetworks({ filters: { name: [name] } });
    if (existing.some((n) => n.Name === name)) return;
    this.logger.info(`Creating network '${name}'`);
    try {
      await this.docker.createNetwork({ Name: name, Driver: 'bridge', Labels: labels });
    } catch (error) {
      // Another caller created it between list and create
      if (extractStatusCode(error) !== 409) throw this.wrap('network_failed', error);
    }
  }

  private async removeContainer(name: string): Promise<void> {
    try {
      await this.docker.getContainer(name).remove({ force: true });
      this.logger.debug(`Removed container '${name}'`);
    } catch (error) {
      const sc = extractStatusCode(error);
      if (sc !== 404 && sc !== 409) throw this.wrap('remove_failed', error);
    }
  }

  private async readUsage(container: Docker.Container): Promise<ResourceUsage | undefined> {
    try {
      const stats = await container.stats({ stream: false });
      const cpuDelta = stats.cpu_stats.cpu_usage.total_usage - stats.precpu_stats.cpu_usage.total_usage;
      const systemDelta = (stats.cpu_stats.system_cpu_usage ?? 0) - (stats.precpu_stats.system_cpu_usage ?? 0);
      const onlineCpus = stats.cpu_stats.online_cpus ?? stats.cpu_stats.cpu_usage.percpu_usage?.length ?? 1;
      const cpuPercent = systemDelta > 0 && cpuDelta > 0 ? (cpuDelta / systemDelta) * onlineCpus * 100 : 0;
      return {
        cpuPercent: Math.round(cpuPercent * 100) / 100,
        memoryUsageBytes: stats.memory_stats.usage ?? 0,
        memoryLimitBytes: stats.memory_stats.limit ?? 0,
      };
    } catch (error) {
      this.logger.debug('Container stats unavailable', { error: errorMessage(error) });
      return undefined;
    }
  }

  private wrap(code: string, error: unknown): RuntimeError {
    return new RuntimeError(code, errorMessage(error), extractStatusCode(error), { cause: error });
  }
}

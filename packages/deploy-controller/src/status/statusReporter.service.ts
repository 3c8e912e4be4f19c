import { Inject, Injectable } from '@nestjs/common';

import { CLOCK, type Clock } from '../core/clock';
import { errorMessage } from '../core/errors';
import { ConfigService } from '../core/services/config.service';
import { LoggerService } from '../core/services/logger.service';
import { HealthMonitor, type HealthCheckResult } from '../health/healthMonitor.service';
import { HEALTH_PROBE, type HealthProbe } from '../infra/health/healthProbe';
import { RESOURCE_SAMPLER, type ResourceSampler, type ResourceSnapshot } from '../infra/resources/resourceSampler';
import { assessSystem, type SystemAssessment } from '../infra/resources/systemAssessment';
import { CONTAINER_RUNTIME, type ContainerRuntime, type RuntimeStatus } from '../infra/runtime/containerRuntime.port';

export type StatusSnapshot = {
  takenAt: string;
  resources: ResourceSnapshot;
  container: RuntimeStatus;
  health: HealthCheckResult;
  system: SystemAssessment;
};

export type StatusStreamOptions = {
  intervalMs?: number;
  signal?: AbortSignal;
};

@Injectable()
export class StatusReporter {
  private readonly logger: LoggerService;

  constructor(
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(RESOURCE_SAMPLER) private readonly sampler: ResourceSampler,
    @Inject(CONTAINER_RUNTIME) private readonly runtime: ContainerRuntime,
    @Inject(HEALTH_PROBE) private readonly probe: HealthProbe,
    @Inject(HealthMonitor) private readonly healthMonitor: HealthMonitor,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(LoggerService) logger: LoggerService,
  ) {
    this.logger = logger.child(StatusReporter.name);
  }

  /** One sample of host resources, runtime status and a single health probe. */
  async capture(signal?: AbortSignal): Promise<StatusSnapshot> {
    const takenAt = this.clock.now().toISOString();
    const resources = await this.sampler.sample();
    const container = await this.containerStatus();
    const url = this.configService.healthUrl;
    const health = await this.healthMonitor.once(() => this.probe.probe(url, signal));
    return { takenAt, resources, container, health, system: assessSystem(resources) };
  }

  /**
   * Poll until `signal` aborts. Aborting wakes a pending sleep and cancels a
   * probe in flight; a tick cut short that way is not yielded.
   */
  async *stream(options: StatusStreamOptions = {}): AsyncGenerator<StatusSnapshot, void, undefined> {
    const intervalMs = options.intervalMs ?? this.configService.settings.monitorIntervalMs;
    const { signal } = options;
    this.logger.debug(`Status stream started (interval=${intervalMs}ms)`);
    try {
      while (!signal?.aborted) {
        const snapshot = await this.capture(signal);
        if (signal?.aborted) break;
        yield snapshot;
        if (signal?.aborted) break;
        await this.clock.sleep(intervalMs, signal);
      }
    } finally {
      this.logger.debug('Status stream stopped');
    }
  }

  private async containerStatus(): Promise<RuntimeStatus> {
    const name = this.configService.serviceName;
    try {
      return await this.runtime.queryStatus(name);
    } catch (error) {
      this.logger.warn('Container status unavailable', { name, error: errorMessage(error) });
      return { name, exists: false, running: false, state: 'unreachable' };
    }
  }
}

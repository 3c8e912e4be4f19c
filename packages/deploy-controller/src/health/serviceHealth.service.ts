import { Inject, Injectable } from '@nestjs/common';

import { errorMessage } from '../core/errors';
import { ConfigService } from '../core/services/config.service';
import { LoggerService } from '../core/services/logger.service';
import { HEALTH_PROBE, type HealthProbe, type ProbeOutcome } from '../infra/health/healthProbe';
import { RESOURCE_SAMPLER, type ResourceSampler } from '../infra/resources/resourceSampler';
import { assessSystem, type SystemAssessment } from '../infra/resources/systemAssessment';
import { CONTAINER_RUNTIME, type ContainerRuntime } from '../infra/runtime/containerRuntime.port';

export type ServiceHealthReport = {
  /** API answered 2xx and the container is running */
  ok: boolean;
  api: ProbeOutcome & { url: string };
  container: { name: string; running: boolean; state: string };
  system: SystemAssessment;
};

@Injectable()
export class ServiceHealthCheck {
  private readonly logger: LoggerService;

  constructor(
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(HEALTH_PROBE) private readonly probe: HealthProbe,
    @Inject(CONTAINER_RUNTIME) private readonly runtime: ContainerRuntime,
    @Inject(RESOURCE_SAMPLER) private readonly sampler: ResourceSampler,
    @Inject(LoggerService) logger: LoggerService,
  ) {
    this.logger = logger.child(ServiceHealthCheck.name);
  }

  async check(): Promise<ServiceHealthReport> {
    const url = this.configService.healthUrl;
    const api = { url, ...(await this.probe.probe(url)) };
    if (api.success) this.logger.info('API is healthy', { latencyMs: api.latencyMs });
    else this.logger.error('API is not healthy', { url, statusCode: api.statusCode, error: api.error });

    const name = this.configService.serviceName;
    let container: ServiceHealthReport['container'];
    try {
      const status = await this.runtime.queryStatus(name);
      container = { name, running: status.running, state: status.state };
    } catch (error) {
      this.logger.warn('Container status unavailable', { name, error: errorMessage(error) });
      container = { name, running: false, state: 'unreachable' };
    }
    if (container.running) this.logger.info(`Container '${name}' is running`);
    else this.logger.error(`Container '${name}' is not running`, { state: container.state });

    const system = assessSystem(await this.sampler.sample());
    for (const warning of system.warnings) this.logger.warn(warning);

    return { ok: api.success && container.running, api, container, system };
  }
}

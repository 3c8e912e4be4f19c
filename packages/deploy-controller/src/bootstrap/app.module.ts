import { Module, type DynamicModule } from '@nestjs/common';

import { BackupManager } from '../backup/backupManager.service';
import { ArtifactBuilder } from '../build/artifactBuilder.service';
import { CoreModule } from '../core/core.module';
import { ConfigService } from '../core/services/config.service';
import { LoggerService } from '../core/services/logger.service';
import { DescriptorGenerator } from '../descriptor/descriptorGenerator.service';
import { ResourceGate, USER_GROUPS, lookupUserGroups } from '../gate/resourceGate.service';
import { HealthMonitor } from '../health/healthMonitor.service';
import { ServiceHealthCheck } from '../health/serviceHealth.service';
import { HEALTH_PROBE, HttpHealthProbe } from '../infra/health/healthProbe';
import { NodeResourceSampler, RESOURCE_SAMPLER } from '../infra/resources/resourceSampler';
import { CONTAINER_RUNTIME } from '../infra/runtime/containerRuntime.port';
import { DockerRuntime } from '../infra/runtime/docker.runtime';
import { LifecycleController } from '../lifecycle/lifecycleController.service';
import { CleanupService } from '../maintenance/cleanup.job';
import { StatusReporter } from '../status/statusReporter.service';

@Module({})
export class AppModule {
  static register(config: ConfigService): DynamicModule {
    return {
      module: AppModule,
      imports: [CoreModule.register(config)],
      providers: [
        {
          provide: RESOURCE_SAMPLER,
          useFactory: (configService: ConfigService) => new NodeResourceSampler({}, configService.projectDir),
          inject: [ConfigService],
        },
        {
          provide: HEALTH_PROBE,
          useFactory: (configService: ConfigService) =>
            new HttpHealthProbe({ timeoutMs: configService.settings.healthProbeTimeoutMs }),
          inject: [ConfigService],
        },
        {
          provide: CONTAINER_RUNTIME,
          useFactory: (configService: ConfigService, logger: LoggerService) => new DockerRuntime(configService, logger),
          inject: [ConfigService, LoggerService],
        },
        { provide: USER_GROUPS, useValue: lookupUserGroups },
        ResourceGate,
        ArtifactBuilder,
        DescriptorGenerator,
        HealthMonitor,
        BackupManager,
        StatusReporter,
        ServiceHealthCheck,
        CleanupService,
        LifecycleController,
      ],
      exports: [
        LifecycleController,
        StatusReporter,
        ServiceHealthCheck,
        BackupManager,
        CleanupService,
        CONTAINER_RUNTIME,
      ],
    };
  }
}

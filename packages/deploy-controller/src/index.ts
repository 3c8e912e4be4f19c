export * from './backup/backupManager.service';
export * from './bootstrap/app.module';
export * from './build/artifactBuilder.service';
export * from './cli/program';
export * from './core/clock';
export * from './core/constants';
export * from './core/errors';
export * from './core/services/config.service';
export * from './core/services/logger.service';
export * from './descriptor/descriptor.types';
export * from './descriptor/descriptorGenerator.service';
export * from './env';
export * from './gate/resourceGate.service';
export * from './health/healthMonitor.service';
export * from './health/serviceHealth.service';
export * from './infra/health/healthProbe';
export * from './infra/resources/resourceSampler';
export * from './infra/resources/systemAssessment';
export * from './infra/runtime/containerRuntime.port';
export * from './infra/runtime/docker.runtime';
export * from './lifecycle/lifecycle.state';
export * from './lifecycle/lifecycleController.service';
export * from './maintenance/cleanup.job';
export * from './status/statusReporter.service';

import { writeFile } from 'node:fs/promises';

import { Inject, Injectable } from '@nestjs/common';

import { BackupManager, type SnapshotResult } from '../backup/backupManager.service';
import { ArtifactBuilder } from '../build/artifactBuilder.service';
import { CLOCK, type Clock } from '../core/clock';
import { DESCRIPTOR_FILE, DIAGNOSTIC_LOG_LINES, STOP_GRACE_PERIOD_SECONDS } from '../core/constants';
import { IllegalTransitionError, errorMessage } from '../core/errors';
import { ConfigService, type DeploymentConfig } from '../core/services/config.service';
import { LoggerService } from '../core/services/logger.service';
import { DescriptorGenerator } from '../descriptor/descriptorGenerator.service';
import { ResourceGate, type GateWarning } from '../gate/resourceGate.service';
import { HealthMonitor, type HealthCheckResult } from '../health/healthMonitor.service';
import { HEALTH_PROBE, type HealthProbe } from '../infra/health/healthProbe';
import { CONTAINER_RUNTIME, type ArtifactRef, type ContainerRuntime, type StopOutcome } from '../infra/runtime/containerRuntime.port';
import { IDLE_STATES, INITIAL_STATE, transition, type LifecycleEvent, type ServiceState } from './lifecycle.state';

export type LifecycleFailureReason =
  | 'InsufficientMemory'
  | 'descriptor_missing'
  | 'build_failed'
  | 'apply_failed'
  | 'health_exhausted'
  | 'stop_failed'
  | 'illegal_transition'
  | 'aborted';

export type LifecycleDetails = {
  warnings?: GateWarning[];
  artifact?: ArtifactRef;
  health?: HealthCheckResult;
  backup?: SnapshotResult;
  stop?: StopOutcome;
  /** Tail of the service log, captured when the service never became healthy */
  diagnostics?: string;
};

export type LifecycleResult =
  | ({ ok: true; state: ServiceState } & LifecycleDetails)
  | ({ ok: false; state: ServiceState; reason: LifecycleFailureReason; message: string } & LifecycleDetails);

export type TransitionRecord = {
  at: string;
  from: ServiceState;
  event: LifecycleEvent;
  to: ServiceState;
};

/**
 * Owns the single authoritative ServiceState. Public operations never throw;
 * every path ends in a LifecycleResult. Deploy is not transactional: a failed
 * step leaves the state where the attempt stopped and nothing is rolled back.
 */
@Injectable()
export class LifecycleController {
  private readonly logger: LoggerService;
  private state: ServiceState = INITIAL_STATE;
  private readonly history: TransitionRecord[] = [];

  constructor(
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(ResourceGate) private readonly gate: ResourceGate,
    @Inject(ArtifactBuilder) private readonly builder: ArtifactBuilder,
    @Inject(DescriptorGenerator) private readonly descriptors: DescriptorGenerator,
    @Inject(CONTAINER_RUNTIME) private readonly runtime: ContainerRuntime,
    @Inject(HealthMonitor) private readonly healthMonitor: HealthMonitor,
    @Inject(HEALTH_PROBE) private readonly probe: HealthProbe,
    @Inject(BackupManager) private readonly backups: BackupManager,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(LoggerService) logger: LoggerService,
  ) {
    this.logger = logger.child(LifecycleController.name);
  }

  getState(): ServiceState {
    return this.state;
  }

  getHistory(): readonly TransitionRecord[] {
    return [...this.history];
  }

  async deploy(config: DeploymentConfig = this.configService.deployment): Promise<LifecycleResult> {
    if (!IDLE_STATES.has(this.state)) {
      return this.illegal(new IllegalTransitionError(this.state, 'Deploy'));
    }
    this.logger.info(`Deploying ${config.imageName}:${config.version} (${config.environment})`);

    try {
      const gate = await this.gate.check();
      const warnings = gate.warnings;
      if (!gate.ok) {
        return this.fail('GateFailed', 'InsufficientMemory', gate.message, { warnings });
      }
      const building = this.fire('GatePassed');
      if (building) return this.illegal(building, { warnings });

      const build = await this.builder.build(config);
      if (!build.ok) {
        return this.fail('BuildFailed', build.error.code, build.error.message, { warnings });
      }
      const { artifact } = build;
      const descriptor = this.descriptors.render(config, artifact);
      const starting = this.fire('BuildSucceeded');
      if (starting) return this.illegal(starting, { warnings, artifact });

      try {
        await this.runtime.stop(descriptor.service, STOP_GRACE_PERIOD_SECONDS);
        await writeFile(this.configService.resolvePath(DESCRIPTOR_FILE), descriptor.serialized);
        await this.runtime.applyDescriptor(descriptor);
      } catch (error) {
        return this.fail('ApplyFailed', 'apply_failed', errorMessage(error), { warnings, artifact });
      }

      const { healthMaxRetries, healthIntervalMs, healthSettleDelayMs } = this.configService.settings;
      const url = this.configService.healthUrl;
      const health = await this.healthMonitor.waitHealthy(() => this.probe.probe(url), {
        maxRetries: healthMaxRetries,
        intervalMs: healthIntervalMs,
        settleDelayMs: healthSettleDelayMs,
      });
      if (!health.success) {
        const diagnostics = await this.collectDiagnostics(descriptor.service);
        return this.fail(
          'HealthExhausted',
          'health_exhausted',
          `Service did not become healthy after ${health.attempt} attempts`,
          { warnings, artifact, health, diagnostics },
        );
      }
      const healthy = this.fire('HealthPassed');
      if (healthy) return this.illegal(healthy, { warnings, artifact, health });

      const backup = await this.backups.snapshot(config);
      this.logger.info('Deployment complete', { image: artifact.tag, state: this.state });
      return { ok: true, state: this.state, warnings, artifact, health, backup };
    } catch (error) {
      return this.abort(error);
    }
  }

  /** Tear down the runtime instance. Already stopped (or never started) counts as success. */
  async stop(): Promise<LifecycleResult> {
    if (!IDLE_STATES.has(this.state)) {
      return this.illegal(new IllegalTransitionError(this.state, 'Stop'));
    }
    const name = this.configService.serviceName;
    let outcome: StopOutcome;
    try {
      outcome = await this.runtime.stop(name, STOP_GRACE_PERIOD_SECONDS);
    } catch (error) {
      const message = `Failed to stop '${name}': ${errorMessage(error)}`;
      this.logger.error(message);
      return { ok: false, state: this.state, reason: 'stop_failed', message };
    }
    const illegal = this.fire('StopCompleted');
    if (illegal) return this.illegal(illegal, { stop: outcome });
    this.logger.info(outcome === 'stopped' ? `Service '${name}' stopped` : `Service '${name}' was not running`);
    return { ok: true, state: this.state, stop: outcome };
  }

  /** Stop then deploy with the same config. Not atomic: a failed deploy leaves the service stopped. */
  async restart(config: DeploymentConfig = this.configService.deployment): Promise<LifecycleResult> {
    const stopped = await this.stop();
    if (!stopped.ok) return stopped;
    return this.deploy(config);
  }

  private fire(event: LifecycleEvent): IllegalTransitionError | undefined {
    const result = transition(this.state, event);
    if (!result.ok) return result.error;
    const record: TransitionRecord = { at: this.clock.now().toISOString(), from: this.state, event, to: result.state };
    this.history.push(record);
    this.state = result.state;
    this.logger.debug(`State ${record.from} -> ${record.to}`, { event });
    return undefined;
  }

  private fail(
    event: LifecycleEvent,
    reason: LifecycleFailureReason,
    message: string,
    details: LifecycleDetails = {},
  ): LifecycleResult {
    const illegal = this.fire(event);
    if (illegal) return this.illegal(illegal, details);
    this.logger.error(message, { reason, state: this.state });
    return { ok: false, state: this.state, reason, message, ...details };
  }

  private illegal(error: IllegalTransitionError, details: LifecycleDetails = {}): LifecycleResult {
    this.logger.error(error.message);
    return { ok: false, state: this.state, reason: 'illegal_transition', message: error.message, ...details };
  }

  // Unexpected throw mid-deploy: settle in Failed so the operator can retry
  private abort(error: unknown): LifecycleResult {
    const message = `Deployment aborted: ${errorMessage(error)}`;
    if (this.state === 'Building') return this.fail('BuildFailed', 'build_failed', message);
    if (this.state === 'Starting') return this.fail('ApplyFailed', 'apply_failed', message);
    this.logger.error(message);
    return { ok: false, state: this.state, reason: 'aborted', message };
  }

  private async collectDiagnostics(name: string): Promise<string> {
    try {
      const lines = await this.runtime.tailLogs(name, DIAGNOSTIC_LOG_LINES);
      this.logger.error(`Last ${DIAGNOSTIC_LOG_LINES} log lines of '${name}'`, { logs: lines });
      return lines;
    } catch (error) {
      this.logger.warn('Could not collect service logs', { error: errorMessage(error) });
      return '';
    }
  }
}

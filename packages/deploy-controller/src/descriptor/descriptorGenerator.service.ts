import { Injectable } from '@nestjs/common';
import { stringify } from 'yaml';

import {
  MANAGED_LABEL,
  NETWORK_NAME,
  RESERVED_CPUS,
  RESERVED_MEMORY_BYTES,
  SERVICE_LABEL,
  SERVICE_PORT,
  STOP_GRACE_PERIOD_SECONDS,
} from '../core/constants';
import { formatMemoryBytes, type DeploymentConfig } from '../core/services/config.service';
import type { ArtifactRef } from '../infra/runtime/containerRuntime.port';
import type { Descriptor, DescriptorSpec, HealthCheckPolicy } from './descriptor.types';

export const HEALTH_CHECK_POLICY: HealthCheckPolicy = {
  test: ['CMD', 'curl', '-f', `http://localhost:${SERVICE_PORT}/health`],
  intervalSeconds: 60,
  timeoutSeconds: 15,
  retries: 3,
  startPeriodSeconds: 45,
};

export const IMAGE_ID_LABEL = 'lean-deploy/image-id';

/** Environment passed to the service, one variable per DeploymentConfig field, in fixed order. */
export function serviceEnvironment(config: DeploymentConfig): Record<string, string> {
  return {
    ENVIRONMENT: config.environment,
    DOCKER_REGISTRY: config.registry,
    IMAGE_NAME: config.imageName,
    VERSION: config.version,
    MAX_MEMORY: formatMemoryBytes(config.maxMemoryBytes),
    MAX_CPUS: String(config.maxCpus),
    WORKER_PROCESSES: String(config.workerProcesses),
    WORKER_THREADS: String(config.workerThreads),
    MAX_REQUESTS: String(config.maxRequests),
    BACKUP_ENABLED: String(config.backupEnabled),
  };
}

const seconds = (n: number) => `${n}s`;

/**
 * Renders the declarative run specification. Pure: the output depends only on
 * (config, artifact), so redeploying an unchanged config yields the same text.
 */
@Injectable()
export class DescriptorGenerator {
  render(config: DeploymentConfig, artifact: ArtifactRef): Descriptor {
    const spec: DescriptorSpec = {
      service: config.imageName,
      image: artifact.tag,
      imageId: artifact.imageId,
      environment: config.environment,
      resources: {
        limits: { cpus: config.maxCpus, memoryBytes: config.maxMemoryBytes },
        reservations: { cpus: RESERVED_CPUS, memoryBytes: RESERVED_MEMORY_BYTES },
      },
      ports: [{ host: SERVICE_PORT, container: SERVICE_PORT, protocol: 'tcp' }],
      env: serviceEnvironment(config),
      volumes: [
        { source: './logs', target: '/app/logs', readOnly: false },
        { source: './models', target: '/app/models', readOnly: true },
        { source: './data', target: '/app/data', readOnly: false },
      ],
      healthCheck: { ...HEALTH_CHECK_POLICY, test: [...HEALTH_CHECK_POLICY.test] },
      restartPolicy: 'unless-stopped',
      stopGracePeriodSeconds: STOP_GRACE_PERIOD_SECONDS,
      securityOpt: ['no-new-privileges:true'],
      network: NETWORK_NAME,
      labels: {
        [MANAGED_LABEL]: 'true',
        [SERVICE_LABEL]: config.imageName,
        [IMAGE_ID_LABEL]: artifact.imageId,
      },
    };
    return { ...spec, serialized: serialize(spec) };
  }
}

function serialize(spec: DescriptorSpec): string {
  const { limits, reservations } = spec.resources;
  const document = {
    services: {
      [spec.service]: {
        image: spec.image,
        container_name: spec.service,
        restart: spec.restartPolicy,
        deploy: {
          resources: {
            limits: { cpus: String(limits.cpus), memory: formatMemoryBytes(limits.memoryBytes) },
            reservations: { cpus: String(reservations.cpus), memory: formatMemoryBytes(reservations.memoryBytes) },
          },
        },
        ports: spec.ports.map((p) => `${p.host}:${p.container}${p.protocol === 'tcp' ? '' : `/${p.protocol}`}`),
        environment: Object.entries(spec.env).map(([k, v]) => `${k}=${v}`),
        volumes: spec.volumes.map((v) => `${v.source}:${v.target}${v.readOnly ? ':ro' : ''}`),
        healthcheck: {
          test: spec.healthCheck.test,
          interval: seconds(spec.healthCheck.intervalSeconds),
          timeout: seconds(spec.healthCheck.timeoutSeconds),
          retries: spec.healthCheck.retries,
          start_period: seconds(spec.healthCheck.startPeriodSeconds),
        },
        security_opt: spec.securityOpt,
        stop_grace_period: seconds(spec.stopGracePeriodSeconds),
        labels: spec.labels,
        networks: [spec.network],
      },
    },
    networks: {
      [spec.network]: { name: spec.network, driver: 'bridge' },
    },
  };
  return stringify(document, { lineWidth: 0 });
}

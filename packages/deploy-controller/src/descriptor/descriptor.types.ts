import type { Environment } from '../core/constants';

export type PortBinding = {
  host: number;
  container: number;
  protocol: 'tcp' | 'udp';
};

export type VolumeMount = {
  /** Host path relative to the project directory */
  source: string;
  target: string;
  readOnly: boolean;
};

export type ResourceBounds = {
  cpus: number;
  memoryBytes: number;
};

export type HealthCheckPolicy = {
  test: string[];
  intervalSeconds: number;
  timeoutSeconds: number;
  retries: number;
  startPeriodSeconds: number;
};

export type RestartPolicy = 'unless-stopped';

export type DescriptorSpec = {
  service: string;
  image: string;
  imageId: string;
  environment: Environment;
  resources: {
    limits: ResourceBounds;
    reservations: ResourceBounds;
  };
  ports: PortBinding[];
  env: Record<string, string>;
  volumes: VolumeMount[];
  healthCheck: HealthCheckPolicy;
  restartPolicy: RestartPolicy;
  stopGracePeriodSeconds: number;
  securityOpt: string[];
  network: string;
  labels: Record<string, string>;
};

export type Descriptor = DescriptorSpec & {
  /** YAML rendering of the spec; identical input yields identical text */
  serialized: string;
};

import path from 'node:path';

import { Injectable } from '@nestjs/common';
import { z } from 'zod';

import { ENVIRONMENTS, MIB, SERVICE_PORT } from '../constants';
import { LOG_LEVELS, type LogLevel } from './logger.service';

const numberWithDefault = (fallback: number, accept: (n: number) => boolean = () => true) =>
  z
    .union([z.string(), z.number()])
    .default(String(fallback))
    .transform((v) => {
      if (typeof v === 'string' && !v.trim()) return fallback;
      const n = typeof v === 'number' ? v : Number(v.trim());
      return Number.isFinite(n) && accept(n) ? n : fallback;
    });

const positiveInt = (fallback: number) => numberWithDefault(fallback, (n) => Number.isInteger(n) && n > 0);
const nonNegativeInt = (fallback: number) => numberWithDefault(fallback, (n) => Number.isInteger(n) && n >= 0);

const booleanFlag = (defaultValue: boolean) =>
  z
    .union([z.boolean(), z.string()])
    .default(defaultValue ? 'true' : 'false')
    .transform((value) => {
      if (typeof value === 'boolean') return value;
      const normalized = value.trim().toLowerCase();
      if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) return true;
      if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) return false;
      return defaultValue;
    });

const enumWithDefault = <T extends readonly [string, ...string[]]>(values: T, fallback: T[number]) =>
  z
    .string()
    .default(fallback)
    .transform((v): T[number] => {
      const normalized = v.trim().toLowerCase();
      const match = values.find((candidate) => candidate === normalized);
      return match ?? fallback;
    });

const stringWithDefault = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) => v.trim() || fallback);

const MEMORY_UNITS: Record<string, number> = { b: 1, k: 1024, m: 1024 ** 2, g: 1024 ** 3 };

/**
 * Parse a container-engine memory string ("1536m", "1g", "524288k", "1073741824").
 * Returns undefined for anything that is not a positive amount.
 */
export function parseMemoryString(raw: string): number | undefined {
  const match = /^(\d+(?:\.\d+)?)\s*([bkmg])?b?$/i.exec(raw.trim());
  if (!match) return undefined;
  const amount = Number(match[1]);
  const unit = MEMORY_UNITS[(match[2] ?? 'b').toLowerCase()];
  const bytes = Math.floor(amount * unit);
  return bytes > 0 ? bytes : undefined;
}

export function formatMemoryBytes(bytes: number): string {
  for (const [suffix, size] of [
    ['g', 1024 ** 3],
    ['m', 1024 ** 2],
    ['k', 1024],
  ] as const) {
    if (bytes % size === 0) return `${bytes / size}${suffix}`;
  }
  return String(bytes);
}

export const DEFAULT_MAX_MEMORY = '1536m';
const DEFAULT_MAX_MEMORY_BYTES = 1536 * MIB;

export const deploymentConfigSchema = z.object({
  environment: enumWithDefault(ENVIRONMENTS, 'production'),
  registry: stringWithDefault('localhost:5000'),
  imageName: stringWithDefault('text-classifier'),
  version: stringWithDefault('latest'),
  maxMemoryBytes: z
    .string()
    .default(DEFAULT_MAX_MEMORY)
    .transform((v) => parseMemoryString(v) ?? DEFAULT_MAX_MEMORY_BYTES),
  maxCpus: numberWithDefault(1.5, (n) => n > 0),
  workerProcesses: positiveInt(1),
  workerThreads: positiveInt(2),
  maxRequests: positiveInt(1000),
  backupEnabled: booleanFlag(false),
});

export type DeploymentConfig = Readonly<z.infer<typeof deploymentConfigSchema>>;
type DeploymentConfigInput = z.input<typeof deploymentConfigSchema>;

export const controllerSettingsSchema = z.object({
  projectDir: z.string().default('.'),
  servicePort: positiveInt(SERVICE_PORT),
  healthUrl: z.string().optional(),
  dockerSocket: z.string().optional(),
  logLevel: enumWithDefault(LOG_LEVELS, 'info'),
  healthMaxRetries: positiveInt(10),
  healthIntervalMs: nonNegativeInt(10_000),
  healthSettleDelayMs: nonNegativeInt(45_000),
  healthProbeTimeoutMs: positiveInt(15_000),
  monitorIntervalMs: positiveInt(5_000),
  backupRetention: positiveInt(3),
  logRetentionDays: positiveInt(7),
});

export type ControllerSettings = z.infer<typeof controllerSettingsSchema>;
type ControllerSettingsInput = z.input<typeof controllerSettingsSchema>;

export type ConfigParams = {
  deployment: DeploymentConfig;
  settings: ControllerSettings;
};

export type ConfigOverrides = {
  deployment?: Partial<DeploymentConfigInput>;
  settings?: Partial<ControllerSettingsInput>;
};

export function buildDeploymentConfig(input: Partial<DeploymentConfigInput> = {}): DeploymentConfig {
  return Object.freeze(deploymentConfigSchema.parse(input));
}

/**
 * Read-only view over the parsed deployment config and controller settings.
 * `deployment` is frozen; every component receives the same instance.
 */
@Injectable()
export class ConfigService {
  private _params?: ConfigParams;

  private get params(): ConfigParams {
    if (!this._params) {
      throw new Error('ConfigService not initialized with parameters');
    }
    return this._params;
  }

  init(params: ConfigParams): this {
    this._params = params;
    return this;
  }

  get deployment(): DeploymentConfig {
    return this.params.deployment;
  }

  get settings(): ControllerSettings {
    return this.params.settings;
  }

  get projectDir(): string {
    return path.resolve(this.params.settings.projectDir);
  }

  get serviceName(): string {
    return this.deployment.imageName;
  }

  get healthUrl(): string {
    return this.params.settings.healthUrl ?? `http://localhost:${this.params.settings.servicePort}/health`;
  }

  get logLevel(): LogLevel {
    return this.params.settings.logLevel;
  }

  resolvePath(...segments: string[]): string {
    return path.join(this.projectDir, ...segments);
  }

  /** Absolute project directory named by `PROJECT_DIR`, parsed the same way `fromEnv` does. */
  static projectDirFrom(env: NodeJS.ProcessEnv = process.env): string {
    return path.resolve(controllerSettingsSchema.shape.projectDir.parse(env.PROJECT_DIR));
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): ConfigService {
    const deployment = buildDeploymentConfig({
      environment: env.ENVIRONMENT,
      registry: env.DOCKER_REGISTRY,
      imageName: env.IMAGE_NAME,
      version: env.VERSION,
      maxMemoryBytes: env.MAX_MEMORY,
      maxCpus: env.MAX_CPUS,
      workerProcesses: env.WORKER_PROCESSES,
      workerThreads: env.WORKER_THREADS,
      maxRequests: env.MAX_REQUESTS,
      backupEnabled: env.BACKUP_ENABLED,
      ...stripUndefined(overrides.deployment ?? {}),
    });
    const settings = controllerSettingsSchema.parse({
      projectDir: env.PROJECT_DIR,
      servicePort: env.SERVICE_PORT,
      healthUrl: env.HEALTH_URL,
      dockerSocket: env.DOCKER_SOCKET,
      logLevel: env.LOG_LEVEL,
      healthMaxRetries: env.HEALTH_MAX_RETRIES,
      healthIntervalMs: env.HEALTH_INTERVAL_MS,
      healthSettleDelayMs: env.HEALTH_SETTLE_DELAY_MS,
      healthProbeTimeoutMs: env.HEALTH_PROBE_TIMEOUT_MS,
      monitorIntervalMs: env.MONITOR_INTERVAL_MS,
      backupRetention: env.BACKUP_RETENTION,
      logRetentionDays: env.LOG_RETENTION_DAYS,
      ...stripUndefined(overrides.settings ?? {}),
    });
    return new ConfigService().init({ deployment, settings });
  }
}

function stripUndefined<T extends object>(value: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in value) {
    if (value[key] !== undefined) out[key] = value[key];
  }
  return out;
}

import { describe, it, expect } from 'vitest';

import { GIB, MIB } from '../src/core/constants';
import {
  ConfigService,
  buildDeploymentConfig,
  formatMemoryBytes,
  parseMemoryString,
} from '../src/core/services/config.service';

describe('ConfigService.fromEnv', () => {
  it('uses the documented defaults when nothing is set', () => {
    const config = ConfigService.fromEnv({});
    expect(config.deployment).toEqual({
      environment: 'production',
      registry: 'localhost:5000',
      imageName: 'text-classifier',
      version: 'latest',
      maxMemoryBytes: 1536 * MIB,
      maxCpus: 1.5,
      workerProcesses: 1,
      workerThreads: 2,
      maxRequests: 1000,
      backupEnabled: false,
    });
    expect(config.settings.healthMaxRetries).toBe(10);
    expect(config.settings.healthIntervalMs).toBe(10_000);
    expect(config.settings.healthSettleDelayMs).toBe(45_000);
    expect(config.settings.backupRetention).toBe(3);
    expect(config.healthUrl).toBe('http://localhost:8000/health');
    expect(config.logLevel).toBe('info');
  });

  it('reads external inputs', () => {
    const config = ConfigService.fromEnv({
      ENVIRONMENT: 'Development',
      DOCKER_REGISTRY: 'registry.local:5000',
      IMAGE_NAME: 'classifier',
      VERSION: '1.2.0',
      MAX_MEMORY: '2g',
      MAX_CPUS: '0.75',
      WORKER_PROCESSES: '2',
      WORKER_THREADS: '4',
      MAX_REQUESTS: '500',
      BACKUP_ENABLED: 'yes',
      SERVICE_PORT: '9000',
    });
    expect(config.deployment.environment).toBe('development');
    expect(config.deployment.maxMemoryBytes).toBe(2 * GIB);
    expect(config.deployment.maxCpus).toBe(0.75);
    expect(config.deployment.workerThreads).toBe(4);
    expect(config.deployment.backupEnabled).toBe(true);
    expect(config.serviceName).toBe('classifier');
    expect(config.healthUrl).toBe('http://localhost:9000/health');
  });

  it('falls back to defaults for unparsable values', () => {
    const config = ConfigService.fromEnv({
      ENVIRONMENT: 'staging',
      MAX_MEMORY: 'lots',
      MAX_CPUS: 'abc',
      WORKER_PROCESSES: '2.5',
      MAX_REQUESTS: '',
      BACKUP_ENABLED: 'maybe',
      LOG_LEVEL: 'verbose',
      HEALTH_MAX_RETRIES: '-3',
    });
    expect(config.deployment.environment).toBe('production');
    expect(config.deployment.maxMemoryBytes).toBe(1536 * MIB);
    expect(config.deployment.maxCpus).toBe(1.5);
    expect(config.deployment.workerProcesses).toBe(1);
    expect(config.deployment.maxRequests).toBe(1000);
    expect(config.deployment.backupEnabled).toBe(false);
    expect(config.logLevel).toBe('info');
    expect(config.settings.healthMaxRetries).toBe(10);
  });

  it('lets overrides win over the environment', () => {
    const config = ConfigService.fromEnv(
      { ENVIRONMENT: 'production', HEALTH_URL: 'http://svc:8000/health' },
      { deployment: { environment: 'development' }, settings: { projectDir: '/srv/app' } },
    );
    expect(config.deployment.environment).toBe('development');
    expect(config.projectDir).toBe('/srv/app');
    expect(config.resolvePath('backups')).toBe('/srv/app/backups');
    expect(config.healthUrl).toBe('http://svc:8000/health');
  });

  it('freezes the deployment config', () => {
    const config = buildDeploymentConfig({ version: '2.0.0' });
    expect(Object.isFrozen(config)).toBe(true);
    expect(config.version).toBe('2.0.0');
  });

  it('refuses access before init', () => {
    expect(() => new ConfigService().deployment).toThrow('ConfigService not initialized with parameters');
  });
});

describe('memory strings', () => {
  it('parses engine memory notation', () => {
    expect(parseMemoryString('1536m')).toBe(1536 * MIB);
    expect(parseMemoryString('1g')).toBe(GIB);
    expect(parseMemoryString('1.5g')).toBe(1536 * MIB);
    expect(parseMemoryString('524288k')).toBe(512 * MIB);
    expect(parseMemoryString('1073741824')).toBe(GIB);
    expect(parseMemoryString('')).toBeUndefined();
    expect(parseMemoryString('-1m')).toBeUndefined();
    expect(parseMemoryString('0')).toBeUndefined();
  });

  it('formats with the largest exact unit', () => {
    expect(formatMemoryBytes(1536 * MIB)).toBe('1536m');
    expect(formatMemoryBytes(GIB)).toBe('1g');
    expect(formatMemoryBytes(256 * MIB)).toBe('256m');
    expect(formatMemoryBytes(1000)).toBe('1000');
  });
});

#!/usr/bin/env node
import 'reflect-metadata';

import { NestFactory } from '@nestjs/core';
import { CommanderError } from 'commander';

import { BackupManager } from './backup/backupManager.service';
import { AppModule } from './bootstrap/app.module';
import { createProgram, type CliContext } from './cli/program';
import { errorMessage } from './core/errors';
import { ConfigService, type ConfigOverrides } from './core/services/config.service';
import { loadEnvFile } from './env';
import { ServiceHealthCheck } from './health/serviceHealth.service';
import { CONTAINER_RUNTIME, type ContainerRuntime } from './infra/runtime/containerRuntime.port';
import { LifecycleController } from './lifecycle/lifecycleController.service';
import { CleanupService } from './maintenance/cleanup.job';
import { StatusReporter } from './status/statusReporter.service';

async function openContext(overrides: ConfigOverrides): Promise<CliContext> {
  const config = ConfigService.fromEnv(process.env, overrides);
  const app = await NestFactory.createApplicationContext(AppModule.register(config), { logger: false });
  return {
    config,
    lifecycle: app.get(LifecycleController),
    status: app.get(StatusReporter),
    health: app.get(ServiceHealthCheck),
    backups: app.get(BackupManager),
    cleanup: app.get(CleanupService),
    runtime: app.get<ContainerRuntime>(CONTAINER_RUNTIME),
    close: () => app.close(),
  };
}

loadEnvFile();

createProgram(openContext)
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return;
    }
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  });

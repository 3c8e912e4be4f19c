import { Command, InvalidArgumentError } from 'commander';

import type { BackupManager } from '../backup/backupManager.service';
import { ENVIRONMENTS, type Environment } from '../core/constants';
import { errorMessage } from '../core/errors';
import type { ConfigOverrides, ConfigService } from '../core/services/config.service';
import type { ServiceHealthCheck } from '../health/serviceHealth.service';
import type { ContainerRuntime } from '../infra/runtime/containerRuntime.port';
import type { LifecycleController, LifecycleResult } from '../lifecycle/lifecycleController.service';
import type { CleanupService } from '../maintenance/cleanup.job';
import type { StatusReporter } from '../status/statusReporter.service';
import {
  formatCleanupReport,
  formatHealthReport,
  formatLifecycleResult,
  formatSnapshotResult,
  formatStatus,
} from './format';

export type CliContext = {
  config: ConfigService;
  lifecycle: LifecycleController;
  status: StatusReporter;
  health: ServiceHealthCheck;
  backups: BackupManager;
  cleanup: CleanupService;
  runtime: ContainerRuntime;
  close(): Promise<void>;
};

export type OpenContext = (overrides: ConfigOverrides) => Promise<CliContext>;

export type CliIO = {
  out(text: string): void;
  err(text: string): void;
  stdout: NodeJS.WritableStream;
  /** Registers a Ctrl-C handler; returns the unregister function. */
  onInterrupt(handler: () => void): () => void;
  setExitCode(code: number): void;
};

export const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
  stdout: process.stdout,
  onInterrupt: (handler) => {
    process.once('SIGINT', handler);
    return () => process.off('SIGINT', handler);
  },
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

function parseEnvironment(value: string): Environment {
  const match = ENVIRONMENTS.find((env) => env === value.trim().toLowerCase());
  if (!match) throw new InvalidArgumentError(`Expected one of: ${ENVIRONMENTS.join(', ')}.`);
  return match;
}

function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('Expected a positive integer.');
  return n;
}

const exitCodeOf = (result: { ok: boolean }) => (result.ok ? 0 : 1);

export function createProgram(open: OpenContext, io: CliIO = consoleIO): Command {
  const print = (lines: string[]) => io.out(lines.join('\n'));

  const withContext =
    (overrides: ConfigOverrides, task: (ctx: CliContext) => Promise<number>) =>
    async (): Promise<void> => {
      let ctx: CliContext | undefined;
      try {
        ctx = await open(overrides);
        io.setExitCode(await task(ctx));
      } catch (error) {
        io.err(`Error: ${errorMessage(error)}`);
        io.setExitCode(1);
      } finally {
        await ctx?.close();
      }
    };

  const lifecycleTask = (run: (ctx: CliContext) => Promise<LifecycleResult>) => async (ctx: CliContext) => {
    const result = await run(ctx);
    print(formatLifecycleResult(result));
    return exitCodeOf(result);
  };

  const program = new Command()
    .name('lean-deploy')
    .description('Deploy and supervise a resource-bounded containerized service')
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    })
    .showHelpAfterError()
    // Parse errors and help surface as CommanderError; the caller decides the exit code
    .exitOverride();

  program
    .command('deploy')
    .description('Check resources, build the image, start the service and wait until healthy')
    .argument('[env]', `target environment (${ENVIRONMENTS.join('|')})`, parseEnvironment)
    .action((env: Environment | undefined) =>
      withContext(
        env ? { deployment: { environment: env } } : {},
        lifecycleTask((ctx) => ctx.lifecycle.deploy()),
      )(),
    );

  program
    .command('status')
    .description('Show container, resource and API status')
    .action(
      withContext({}, async (ctx) => {
        print(formatStatus(await ctx.status.capture()));
        return 0;
      }),
    );

  program
    .command('logs')
    .description('Stream service logs until interrupted')
    .argument('[service]', 'container name (defaults to the configured image name)')
    .option('-n, --tail <lines>', 'lines of history to show', parsePositiveInt, 100)
    .option('--no-follow', 'print recent lines and exit')
    .action((service: string | undefined, options: { tail: number; follow: boolean }) =>
      withContext({}, async (ctx) => {
        const stream = await ctx.runtime.logs(service ?? ctx.config.serviceName, {
          tail: options.tail,
          follow: options.follow,
        });
        await new Promise<void>((resolve, reject) => {
          const off = io.onInterrupt(() => {
            stream.unpipe(io.stdout);
            stream.destroy();
            resolve();
          });
          stream.on('end', () => {
            off();
            resolve();
          });
          stream.on('error', (error) => {
            off();
            reject(error);
          });
          stream.pipe(io.stdout, { end: false });
        });
        return 0;
      })(),
    );

  program
    .command('stop')
    .description('Stop the running service')
    .action(withContext({}, lifecycleTask((ctx) => ctx.lifecycle.stop())));

  program
    .command('restart')
    .description('Stop, then deploy again with the same configuration')
    .action(withContext({}, lifecycleTask((ctx) => ctx.lifecycle.restart())));

  program
    .command('backup')
    .description('Snapshot logs and deployment files (production with backups enabled only)')
    .action(
      withContext({}, async (ctx) => {
        const result = await ctx.backups.snapshot(ctx.config.deployment);
        io.out(formatSnapshotResult(result));
        return result.kind === 'failed' ? 1 : 0;
      }),
    );

  program
    .command('health')
    .description('Probe the API, the container and host pressure once')
    .action(
      withContext({}, async (ctx) => {
        const report = await ctx.health.check();
        print(formatHealthReport(report));
        return exitCodeOf(report);
      }),
    );

  program
    .command('clean')
    .description('Reclaim runtime resources, old backups and rotated logs')
    .action(
      withContext({}, async (ctx) => {
        print(formatCleanupReport(await ctx.cleanup.clean()));
        return 0;
      }),
    );

  program
    .command('monitor')
    .description('Print status continuously until interrupted')
    .option('-i, --interval <ms>', 'poll interval in milliseconds', parsePositiveInt)
    .action((options: { interval?: number }) =>
      withContext({}, async (ctx) => {
        const controller = new AbortController();
        const off = io.onInterrupt(() => controller.abort());
        try {
          for await (const snapshot of ctx.status.stream({ intervalMs: options.interval, signal: controller.signal })) {
            print([...formatStatus(snapshot), '']);
          }
        } finally {
          off();
        }
        return 0;
      })(),
    );

  return program;
}

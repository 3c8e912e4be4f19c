import { MIB } from '../core/constants';
import type { SnapshotResult } from '../backup/backupManager.service';
import type { ServiceHealthReport } from '../health/serviceHealth.service';
import type { LifecycleResult } from '../lifecycle/lifecycleController.service';
import type { CleanupReport } from '../maintenance/cleanup.job';
import type { StatusSnapshot } from '../status/statusReporter.service';

const mib = (bytes: number) => `${Math.round(bytes / MIB)}MiB`;
const mark = (ok: boolean) => (ok ? 'OK  ' : 'FAIL');

export function formatLifecycleResult(result: LifecycleResult): string[] {
  const lines = [`state: ${result.state}`];
  for (const warning of result.warnings ?? []) lines.push(`warning: ${warning.message}`);
  if (result.artifact) lines.push(`image: ${result.artifact.tag} (${result.artifact.imageId.slice(0, 19)})`);
  if (result.health) {
    lines.push(`health: ${result.health.success ? 'healthy' : 'unhealthy'} after ${result.health.attempt} attempt(s)`);
  }
  if (result.stop) lines.push(`stop: ${result.stop}`);
  if (result.backup?.kind === 'created') lines.push(`backup: ${result.backup.record.id}`);
  if (!result.ok) {
    lines.push(`error [${result.reason}]: ${result.message}`);
    if (result.diagnostics) lines.push('--- service logs ---', result.diagnostics.trimEnd());
  }
  return lines;
}

export function formatStatus(snapshot: StatusSnapshot): string[] {
  const { resources, container, health, system } = snapshot;
  const lines = [
    `time: ${snapshot.takenAt}`,
    `container: ${container.name} ${container.state}${container.health ? ` (${container.health})` : ''}`,
  ];
  if (container.ports?.length) lines.push(`ports: ${container.ports.join(', ')}`);
  if (container.resourceUsage) {
    const usage = container.resourceUsage;
    lines.push(
      `container usage: cpu ${usage.cpuPercent}% mem ${mib(usage.memoryUsageBytes)} / ${mib(usage.memoryLimitBytes)}`,
    );
  }
  lines.push(
    `memory: ${mib(resources.availableMemoryBytes)} available of ${mib(resources.totalMemoryBytes)}` +
      (system.memoryUsagePercent === null ? '' : ` (${system.memoryUsagePercent}% used)`),
    `load: ${system.loadAverage1m === null ? 'unknown' : system.loadAverage1m.toFixed(2)} (${resources.cpuCores} cores)`,
  );
  if (system.diskUsagePercent !== null) lines.push(`disk: ${system.diskUsagePercent}% used`);
  lines.push(`api: ${health.success ? `healthy (${health.latencyMs}ms)` : `unhealthy${health.error ? `: ${health.error}` : ''}`}`);
  return lines;
}

export function formatHealthReport(report: ServiceHealthReport): string[] {
  const lines = [
    `${mark(report.api.success)} api ${report.api.url}` +
      (report.api.success ? ` ${report.api.latencyMs}ms` : ` ${report.api.error ?? 'unhealthy'}`),
    `${mark(report.container.running)} container ${report.container.name} ${report.container.state}`,
    `${mark(report.system.healthy)} system`,
  ];
  for (const warning of report.system.warnings) lines.push(`  warning: ${warning}`);
  return lines;
}

export function formatSnapshotResult(result: SnapshotResult): string {
  switch (result.kind) {
    case 'created':
      return `backup created: ${result.record.path} (${result.record.files.join(', ') || 'metadata only'})`;
    case 'skipped':
      return result.reason === 'backup_disabled'
        ? 'backup skipped: backups are disabled'
        : 'backup skipped: not taken in development';
    case 'failed':
      return `backup failed: ${result.error}`;
  }
}

export function formatCleanupReport(report: CleanupReport): string[] {
  const lines: string[] = [];
  if (report.runtime) {
    const r = report.runtime;
    lines.push(
      `runtime: ${r.containersDeleted} containers, ${r.networksDeleted} networks, ${r.volumesDeleted} volumes, ` +
        `${r.imagesDeleted} images removed (${mib(r.spaceReclaimedBytes)} reclaimed)`,
    );
    for (const error of r.errors) lines.push(`  warning: ${error}`);
  } else {
    lines.push('runtime: prune unavailable');
  }
  lines.push(`backups removed: ${report.backupsRemoved.length}`, `logs removed: ${report.logsRemoved.length}`);
  return lines;
}

import { LOAD_AVERAGE_WARN, MEMORY_USAGE_WARN_PERCENT } from '../../core/constants';
import type { ResourceSnapshot } from './resourceSampler';

export type SignalState = 'ok' | 'high' | 'unknown';

export type SystemAssessment = {
  memory: SignalState;
  memoryUsagePercent: number | null;
  load: SignalState;
  loadAverage1m: number | null;
  diskUsagePercent: number | null;
  warnings: string[];
  /** true only when every signal is known and within bounds */
  healthy: boolean;
};

const round1 = (n: number) => Math.round(n * 10) / 10;

/**
 * Judge host pressure from a snapshot. A load figure that is missing or not a
 * finite number is reported as `unknown` with a warning, never as healthy.
 */
export function assessSystem(snapshot: ResourceSnapshot): SystemAssessment {
  const warnings: string[] = [];

  let memory: SignalState = 'unknown';
  let memoryUsagePercent: number | null = null;
  if (snapshot.totalMemoryBytes > 0) {
    memoryUsagePercent = round1(((snapshot.totalMemoryBytes - snapshot.availableMemoryBytes) / snapshot.totalMemoryBytes) * 100);
    memory = memoryUsagePercent > MEMORY_USAGE_WARN_PERCENT ? 'high' : 'ok';
    if (memory === 'high') warnings.push(`Memory usage is high: ${memoryUsagePercent}%`);
  } else {
    warnings.push('Memory usage is unknown: total memory not reported');
  }

  let load: SignalState = 'unknown';
  const loadAverage1m = snapshot.loadAverage?.[0];
  if (typeof loadAverage1m === 'number' && Number.isFinite(loadAverage1m)) {
    load = loadAverage1m > LOAD_AVERAGE_WARN ? 'high' : 'ok';
    if (load === 'high') warnings.push(`CPU load is high: ${loadAverage1m.toFixed(2)}`);
  } else {
    warnings.push('CPU load is unknown: load average not available');
  }

  const diskUsagePercent =
    snapshot.disk && snapshot.disk.totalBytes > 0 ? round1((snapshot.disk.usedBytes / snapshot.disk.totalBytes) * 100) : null;

  return {
    memory,
    memoryUsagePercent,
    load,
    loadAverage1m: load === 'unknown' ? null : (loadAverage1m ?? null),
    diskUsagePercent,
    warnings,
    healthy: memory === 'ok' && load === 'ok',
  };
}

import { readFile, statfs } from 'node:fs/promises';
import os from 'node:os';

export const RESOURCE_SAMPLER = Symbol('RESOURCE_SAMPLER');

export type DiskUsage = {
  path: string;
  totalBytes: number;
  usedBytes: number;
};

export type ResourceSnapshot = {
  takenAt: string;
  totalMemoryBytes: number;
  availableMemoryBytes: number;
  cpuCores: number;
  /** 1, 5 and 15 minute load averages; null where the platform does not report them */
  loadAverage: [number, number, number] | null;
  disk: DiskUsage | null;
};

export interface ResourceSampler {
  /** Always reads the host; results are never cached. */
  sample(): Promise<ResourceSnapshot>;
}

export type HostProbes = {
  platform: () => NodeJS.Platform;
  totalMemory: () => number;
  freeMemory: () => number;
  cpuCount: () => number;
  loadAverage: () => number[];
  readMeminfo: () => Promise<string>;
  statDisk: (path: string) => Promise<{ blocks: number; bsize: number; bfree: number }>;
};

const defaultProbes: HostProbes = {
  platform: () => process.platform,
  totalMemory: () => os.totalmem(),
  freeMemory: () => os.freemem(),
  cpuCount: () => os.availableParallelism(),
  loadAverage: () => os.loadavg(),
  readMeminfo: () => readFile('/proc/meminfo', 'utf8'),
  statDisk: (p) => statfs(p),
};

/** Extract MemAvailable (kB) from /proc/meminfo, in bytes. */
export function parseMemAvailable(meminfo: string): number | undefined {
  const match = /^MemAvailable:\s+(\d+)\s*kB$/m.exec(meminfo);
  return match ? Number(match[1]) * 1024 : undefined;
}

export class NodeResourceSampler implements ResourceSampler {
  private readonly probes: HostProbes;

  constructor(
    probes: Partial<HostProbes> = {},
    private readonly diskPath = '/',
  ) {
    this.probes = { ...defaultProbes, ...probes };
  }

  async sample(): Promise<ResourceSnapshot> {
    return {
      takenAt: new Date().toISOString(),
      totalMemoryBytes: this.probes.totalMemory(),
      availableMemoryBytes: await this.readAvailableMemory(),
      cpuCores: this.probes.cpuCount(),
      loadAverage: this.readLoadAverage(),
      disk: await this.readDisk(),
    };
  }

  // MemAvailable counts reclaimable cache; os.freemem() does not
  private async readAvailableMemory(): Promise<number> {
    if (this.probes.platform() === 'linux') {
      try {
        const available = parseMemAvailable(await this.probes.readMeminfo());
        if (available !== undefined) return available;
      } catch {
        // /proc unavailable (container sandbox); fall through to freemem
      }
    }
    return this.probes.freeMemory();
  }

  private readLoadAverage(): [number, number, number] | null {
    // Windows reports [0, 0, 0]
    if (this.probes.platform() === 'win32') return null;
    const [one, five, fifteen] = this.probes.loadAverage();
    if (![one, five, fifteen].every((n) => typeof n === 'number' && Number.isFinite(n))) return null;
    return [one, five, fifteen];
  }

  private async readDisk(): Promise<DiskUsage | null> {
    try {
      const stats = await this.probes.statDisk(this.diskPath);
      const totalBytes = stats.blocks * stats.bsize;
      return { path: this.diskPath, totalBytes, usedBytes: totalBytes - stats.bfree * stats.bsize };
    } catch {
      return null;
    }
  }
}

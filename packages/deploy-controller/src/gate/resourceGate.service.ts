import { readFile } from 'node:fs/promises';
import os from 'node:os';

import { Inject, Injectable } from '@nestjs/common';

import {
  MIB,
  MIN_TOTAL_MEMORY_BYTES,
  RECOMMENDED_AVAILABLE_MEMORY_BYTES,
  RECOMMENDED_CPU_CORES,
  RUNTIME_GROUP,
} from '../core/constants';
import { LoggerService } from '../core/services/logger.service';
import { RESOURCE_SAMPLER, type ResourceSampler, type ResourceSnapshot } from '../infra/resources/resourceSampler';

export type GateThresholds = {
  minTotalMemoryBytes: number;
  minAvailableMemoryBytes: number;
  minCpuCores: number;
};

export const DEFAULT_GATE_THRESHOLDS: GateThresholds = {
  minTotalMemoryBytes: MIN_TOTAL_MEMORY_BYTES,
  minAvailableMemoryBytes: RECOMMENDED_AVAILABLE_MEMORY_BYTES,
  minCpuCores: RECOMMENDED_CPU_CORES,
};

export type GateWarningCode = 'LowAvailableMemory' | 'InsufficientCPU' | 'RuntimeGroupMissing';

export type GateWarning = {
  code: GateWarningCode;
  message: string;
};

export type GateResult =
  | { ok: true; snapshot: ResourceSnapshot; warnings: GateWarning[] }
  | { ok: false; failure: 'InsufficientMemory'; message: string; snapshot: ResourceSnapshot; warnings: GateWarning[] };

export const USER_GROUPS = Symbol('USER_GROUPS');

/** Answers whether the invoking user may talk to the container engine. */
export type UserGroupLookup = () => Promise<{ privileged: boolean; groups: string[] } | null>;

export const lookupUserGroups: UserGroupLookup = async () => {
  if (process.platform !== 'linux') return null;
  const user = os.userInfo();
  if (user.uid === 0) return { privileged: true, groups: [] };
  let content: string;
  try {
    content = await readFile('/etc/group', 'utf8');
  } catch {
    return null;
  }
  const groups = content
    .split('\n')
    .map((line) => line.split(':'))
    .filter(([, , gid, members]) => Number(gid) === user.gid || (members ?? '').split(',').includes(user.username))
    .map(([name]) => name);
  return { privileged: false, groups };
};

const toMib = (bytes: number) => Math.floor(bytes / MIB);

/**
 * One-shot admission check. Total memory under the absolute floor is fatal;
 * low available memory, few cores and a missing runtime group only warn.
 */
@Injectable()
export class ResourceGate {
  private readonly logger: LoggerService;

  constructor(
    @Inject(RESOURCE_SAMPLER) private readonly sampler: ResourceSampler,
    @Inject(LoggerService) logger: LoggerService,
    @Inject(USER_GROUPS) private readonly userGroups: UserGroupLookup = lookupUserGroups,
  ) {
    this.logger = logger.child(ResourceGate.name);
  }

  async check(overrides: Partial<GateThresholds> = {}): Promise<GateResult> {
    const thresholds = { ...DEFAULT_GATE_THRESHOLDS, ...overrides };
    const snapshot = await this.sampler.sample();
    this.logger.info('Host resources', {
      cpuCores: snapshot.cpuCores,
      totalMemoryMiB: toMib(snapshot.totalMemoryBytes),
      availableMemoryMiB: toMib(snapshot.availableMemoryBytes),
    });

    const warnings: GateWarning[] = [];
    if (snapshot.cpuCores < thresholds.minCpuCores) {
      warnings.push({
        code: 'InsufficientCPU',
        message: `CPU cores (${snapshot.cpuCores}) below recommended ${thresholds.minCpuCores}; performance may suffer`,
      });
    }

    if (snapshot.totalMemoryBytes < thresholds.minTotalMemoryBytes) {
      const message = `Total memory ${toMib(snapshot.totalMemoryBytes)}MiB is below the ${toMib(
        thresholds.minTotalMemoryBytes,
      )}MiB floor; the service cannot start safely`;
      this.logger.error(message);
      return { ok: false, failure: 'InsufficientMemory', message, snapshot, warnings };
    }

    if (snapshot.availableMemoryBytes < thresholds.minAvailableMemoryBytes) {
      warnings.push({
        code: 'LowAvailableMemory',
        message: `Available memory ${toMib(snapshot.availableMemoryBytes)}MiB below recommended ${toMib(
          thresholds.minAvailableMemoryBytes,
        )}MiB; free memory or add swap`,
      });
    }

    const membership = await this.userGroups();
    if (membership && !membership.privileged && !membership.groups.includes(RUNTIME_GROUP)) {
      warnings.push({
        code: 'RuntimeGroupMissing',
        message: `Current user is not in the '${RUNTIME_GROUP}' group; engine access may be denied`,
      });
    }

    for (const warning of warnings) {
      this.logger.warn(warning.message, { code: warning.code });
    }
    this.logger.info('Resource check passed');
    return { ok: true, snapshot, warnings };
  }
}

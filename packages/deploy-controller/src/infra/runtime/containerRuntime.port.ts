import type { Readable } from 'node:stream';

import type { Descriptor } from '../../descriptor/descriptor.types';

export const CONTAINER_RUNTIME = Symbol('CONTAINER_RUNTIME');

export type ArtifactRef = {
  /** registry/image:version */
  tag: string;
  imageId: string;
  sizeBytes: number;
  builtAt: string;
};

export type BuildImageRequest = {
  contextDir: string;
  dockerfile: string;
  tag: string;
  buildArgs: Record<string, string>;
  caps: { memoryBytes: number; cpus: number };
  /** Excluded from the build context by top-level name */
  exclude?: string[];
};

export type RuntimeHandle = {
  id: string;
  name: string;
};

export type StopOutcome = 'stopped' | 'already_stopped';

export type ResourceUsage = {
  cpuPercent: number;
  memoryUsageBytes: number;
  memoryLimitBytes: number;
};

export type RuntimeStatus = {
  name: string;
  exists: boolean;
  running: boolean;
  /** Engine state string ("running", "exited", ...) or "missing" */
  state: string;
  /** Engine health-check state, when the container declares one */
  health?: string;
  startedAt?: string;
  ports?: string[];
  resourceUsage?: ResourceUsage;
};

export type LogsOptions = {
  tail?: number;
  follow?: boolean;
};

export type PruneReport = {
  containersDeleted: number;
  networksDeleted: number;
  volumesDeleted: number;
  imagesDeleted: number;
  spaceReclaimedBytes: number;
  errors: string[];
};

/**
 * Container engine collaborator. Implementations must treat stopping a missing
 * or stopped instance as `already_stopped`, never as an error.
 */
export interface ContainerRuntime {
  buildImage(request: BuildImageRequest, onProgress?: (line: string) => void): Promise<ArtifactRef>;
  applyDescriptor(descriptor: Descriptor): Promise<RuntimeHandle>;
  stop(name: string, timeoutSec?: number): Promise<StopOutcome>;
  queryStatus(name: string): Promise<RuntimeStatus>;
  logs(name: string, options?: LogsOptions): Promise<Readable>;
  /** Collect the last `tail` lines as text; empty when the instance is missing. */
  tailLogs(name: string, tail: number): Promise<string>;
  prune(): Promise<PruneReport>;
}

import { MIB } from '../../src/core/constants';
import type { ResourceSampler, ResourceSnapshot } from '../../src/infra/resources/resourceSampler';

export const healthySnapshot = (overrides: Partial<ResourceSnapshot> = {}): ResourceSnapshot => ({
  takenAt: '2024-03-01T10:00:00.000Z',
  totalMemoryBytes: 4096 * MIB,
  availableMemoryBytes: 2048 * MIB,
  cpuCores: 4,
  loadAverage: [0.5, 0.4, 0.3],
  disk: { path: '/', totalBytes: 100 * 1024 * MIB, usedBytes: 40 * 1024 * MIB },
  ...overrides,
});

export class SamplerStub implements ResourceSampler {
  public calls = 0;

  constructor(public snapshot: ResourceSnapshot = healthySnapshot()) {}

  async sample(): Promise<ResourceSnapshot> {
    this.calls += 1;
    return { ...this.snapshot };
  }
}

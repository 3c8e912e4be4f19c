import { describe, it, expect } from 'vitest';

import { MIB } from '../src/core/constants';
import { ResourceGate, type UserGroupLookup } from '../src/gate/resourceGate.service';
import { quietLogger } from './helpers/config';
import { SamplerStub, healthySnapshot } from './helpers/sampler.stub';

const noGroupInfo: UserGroupLookup = async () => null;

const gateFor = (sampler: SamplerStub, userGroups: UserGroupLookup = noGroupInfo) =>
  new ResourceGate(sampler, quietLogger(), userGroups);

describe('ResourceGate', () => {
  it('passes a healthy host without warnings', async () => {
    const result = await gateFor(new SamplerStub()).check();
    expect(result.ok).toBe(true);
    expect(result.warnings).toEqual([]);
  });

  it('fails when total memory is under the 1536 MiB floor', async () => {
    const sampler = new SamplerStub(healthySnapshot({ totalMemoryBytes: 1024 * MIB, availableMemoryBytes: 900 * MIB }));
    const result = await gateFor(sampler).check();
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure).toBe('InsufficientMemory');
    expect(result.message).toBe('Total memory 1024MiB is below the 1536MiB floor; the service cannot start safely');
  });

  it('treats exactly the floor as sufficient', async () => {
    const sampler = new SamplerStub(healthySnapshot({ totalMemoryBytes: 1536 * MIB, availableMemoryBytes: 1200 * MIB }));
    expect((await gateFor(sampler).check()).ok).toBe(true);
  });

  it('warns but continues on low available memory and few cores', async () => {
    const sampler = new SamplerStub(
      healthySnapshot({ totalMemoryBytes: 2048 * MIB, availableMemoryBytes: 512 * MIB, cpuCores: 1 }),
    );
    const result = await gateFor(sampler).check();
    expect(result.ok).toBe(true);
    expect(result.warnings.map((w) => w.code)).toEqual(['InsufficientCPU', 'LowAvailableMemory']);
  });

  it('warns when the user is outside the runtime group', async () => {
    const result = await gateFor(new SamplerStub(), async () => ({ privileged: false, groups: ['staff'] })).check();
    expect(result.warnings).toEqual([
      {
        code: 'RuntimeGroupMissing',
        message: "Current user is not in the 'docker' group; engine access may be denied",
      },
    ]);
  });

  it('does not warn for root or docker group members', async () => {
    const root = await gateFor(new SamplerStub(), async () => ({ privileged: true, groups: [] })).check();
    const member = await gateFor(new SamplerStub(), async () => ({ privileged: false, groups: ['docker'] })).check();
    expect(root.warnings).toEqual([]);
    expect(member.warnings).toEqual([]);
  });

  it('honours threshold overrides and samples on every call', async () => {
    const sampler = new SamplerStub();
    const gate = gateFor(sampler);
    const strict = await gate.check({ minTotalMemoryBytes: 8192 * MIB });
    const relaxed = await gate.check();
    expect(strict.ok).toBe(false);
    expect(relaxed.ok).toBe(true);
    expect(sampler.calls).toBe(2);
  });
});

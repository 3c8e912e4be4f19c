import { describe, it, expect } from 'vitest';

import { HealthMonitor } from '../src/health/healthMonitor.service';
import { ClockStub } from './helpers/clock.stub';
import { quietLogger } from './helpers/config';
import { ProbeStub } from './helpers/probe.stub';

const URL = 'http://localhost:8000/health';

function setup(probe: ProbeStub) {
  const clock = new ClockStub();
  const monitor = new HealthMonitor(clock, quietLogger());
  return { clock, monitor, run: () => probe.probe(URL) };
}

describe('HealthMonitor.waitHealthy', () => {
  it('gives up after exactly maxRetries attempts of a failing probe', async () => {
    const probe = ProbeStub.failing();
    const { clock, monitor, run } = setup(probe);

    const result = await monitor.waitHealthy(run, { maxRetries: 10, intervalMs: 10_000, settleDelayMs: 45_000 });

    expect(result.success).toBe(false);
    expect(result.attempt).toBe(10);
    expect(result.error).toBe('connect ECONNREFUSED 127.0.0.1:8000');
    expect(probe.calls).toBe(10);
    expect(clock.elapsedMs).toBe(45_000 + 9 * 10_000);
    expect(clock.sleeps).toEqual([45_000, ...Array.from({ length: 9 }, () => 10_000)]);
  });

  it('uses the documented defaults', async () => {
    const probe = ProbeStub.failing();
    const { clock, monitor, run } = setup(probe);

    await monitor.waitHealthy(run);

    expect(probe.calls).toBe(10);
    expect(clock.elapsedMs).toBe(135_000);
  });

  it('returns as soon as the probe succeeds', async () => {
    const probe = ProbeStub.succeedsOn(3);
    const { clock, monitor, run } = setup(probe);

    const result = await monitor.waitHealthy(run, { maxRetries: 10, intervalMs: 10_000, settleDelayMs: 45_000 });

    expect(result).toEqual({
      timestamp: '2024-03-01T10:01:05.000Z',
      attempt: 3,
      success: true,
      latencyMs: 12,
      statusCode: 200,
    });
    expect(probe.calls).toBe(3);
    expect(clock.elapsedMs).toBe(65_000);
  });

  it('does not sleep after a single failed attempt', async () => {
    const probe = ProbeStub.failing();
    const { clock, monitor, run } = setup(probe);

    await monitor.waitHealthy(run, { maxRetries: 1, intervalMs: 10_000, settleDelayMs: 0 });

    expect(probe.calls).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('counts a rejecting probe as a failed attempt', async () => {
    const { monitor } = setup(ProbeStub.healthy());

    const result = await monitor.waitHealthy(
      async () => {
        throw new Error('socket hang up');
      },
      { maxRetries: 2, intervalMs: 1, settleDelayMs: 0 },
    );

    expect(result).toMatchObject({ success: false, attempt: 2, latencyMs: 0, error: 'socket hang up' });
  });

  it('stops retrying once aborted', async () => {
    const probe = ProbeStub.failing();
    const { clock, monitor, run } = setup(probe);
    const controller = new AbortController();
    controller.abort();

    const result = await monitor.waitHealthy(run, { signal: controller.signal });

    expect(result.success).toBe(false);
    expect(probe.calls).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });
});

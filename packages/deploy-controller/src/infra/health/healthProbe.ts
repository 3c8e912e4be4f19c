import { performance } from 'node:perf_hooks';

import { fetch as undiciFetch } from 'undici';

import { errorMessage } from '../../core/errors';

export const HEALTH_PROBE = Symbol('HEALTH_PROBE');

export type ProbeOutcome = {
  success: boolean;
  latencyMs: number;
  statusCode?: number;
  error?: string;
};

/** One liveness attempt against a fixed target. */
export type Probe = () => Promise<ProbeOutcome>;

export interface HealthProbe {
  /** Aborting `signal` cancels the request in flight; the outcome reads `cancelled`. */
  probe(url: string, signal?: AbortSignal): Promise<ProbeOutcome>;
}

type HttpHealthProbeOptions = {
  timeoutMs?: number;
  fetchImpl?: typeof undiciFetch;
};

/**
 * Single bounded GET. Only a 2xx counts as healthy; timeouts, transport errors
 * and every other status are reported as unhealthy, never thrown.
 */
export class HttpHealthProbe implements HealthProbe {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof undiciFetch;

  constructor(options: HttpHealthProbeOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.fetchImpl = options.fetchImpl ?? undiciFetch;
  }

  async probe(url: string, signal?: AbortSignal): Promise<ProbeOutcome> {
    const started = performance.now();
    const elapsed = () => Math.round(performance.now() - started);
    const timeout = AbortSignal.timeout(this.timeoutMs);
    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
      await response.arrayBuffer();
      return {
        success: response.ok,
        latencyMs: elapsed(),
        statusCode: response.status,
        ...(response.ok ? {} : { error: `unexpected status ${response.status}` }),
      };
    } catch (error) {
      const timedOut = error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
      return {
        success: false,
        latencyMs: elapsed(),
        error: signal?.aborted ? 'cancelled' : timedOut ? `timed out after ${this.timeoutMs}ms` : errorMessage(error),
      };
    }
  }
}

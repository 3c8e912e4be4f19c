import { Inject, Injectable } from '@nestjs/common';

import { CLOCK, type Clock } from '../core/clock';
import { errorMessage } from '../core/errors';
import { LoggerService } from '../core/services/logger.service';
import type { Probe } from '../infra/health/healthProbe';

export type HealthCheckResult = {
  timestamp: string;
  success: boolean;
  latencyMs: number;
  /** 1-based */
  attempt: number;
  statusCode?: number;
  error?: string;
};

export type WaitHealthyOptions = {
  maxRetries?: number;
  intervalMs?: number;
  settleDelayMs?: number;
  signal?: AbortSignal;
};

export const DEFAULT_WAIT_OPTIONS = {
  maxRetries: 10,
  intervalMs: 10_000,
  settleDelayMs: 45_000,
} as const;

@Injectable()
export class HealthMonitor {
  private readonly logger: LoggerService;

  constructor(
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(LoggerService) logger: LoggerService,
  ) {
    this.logger = logger.child(HealthMonitor.name);
  }

  /**
   * Settle, then probe at a fixed interval until success or `maxRetries`
   * consecutive failures. Returns the last result; never sleeps after the
   * final attempt, so an always-failing probe costs
   * settleDelay + (maxRetries - 1) * interval.
   */
  async waitHealthy(probe: Probe, options: WaitHealthyOptions = {}): Promise<HealthCheckResult> {
    const maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_WAIT_OPTIONS.maxRetries);
    const intervalMs = options.intervalMs ?? DEFAULT_WAIT_OPTIONS.intervalMs;
    const settleDelayMs = options.settleDelayMs ?? DEFAULT_WAIT_OPTIONS.settleDelayMs;

    if (settleDelayMs > 0) {
      this.logger.info(`Waiting ${settleDelayMs}ms for the service to settle`);
      await this.clock.sleep(settleDelayMs, options.signal);
    }

    let attempt = 1;
    let result = await this.attempt(probe, attempt);
    while (!result.success && attempt < maxRetries && !options.signal?.aborted) {
      this.logger.warn(`Health check attempt ${attempt}/${maxRetries} failed; retrying in ${intervalMs}ms`, {
        statusCode: result.statusCode,
        error: result.error,
      });
      await this.clock.sleep(intervalMs, options.signal);
      attempt += 1;
      result = await this.attempt(probe, attempt);
    }

    if (result.success) {
      this.logger.info('Service is healthy', { attempt, latencyMs: result.latencyMs });
    } else {
      this.logger.error(`Health check failed after ${attempt} attempts`, { error: result.error });
    }
    return result;
  }

  /** One probe, never thrown: a rejecting probe counts as a failed attempt. */
  async once(probe: Probe): Promise<HealthCheckResult> {
    return this.attempt(probe, 1);
  }

  private async attempt(probe: Probe, attempt: number): Promise<HealthCheckResult> {
    const timestamp = this.clock.now().toISOString();
    try {
      const outcome = await probe();
      return { timestamp, attempt, ...outcome };
    } catch (error) {
      return {
        timestamp,
        attempt,
        success: false,
        latencyMs: 0,
        error: errorMessage(error),
      };
    }
  }
}

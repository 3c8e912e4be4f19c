import type { ServiceState } from '../lifecycle/lifecycle.state';

export type BuildErrorCode = 'descriptor_missing' | 'build_failed';

export class BuildError extends Error {
  constructor(
    public readonly code: BuildErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'BuildError';
  }
}

export class RuntimeError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'RuntimeError';
  }
}

export class IllegalTransitionError extends Error {
  readonly code = 'illegal_transition';

  constructor(
    public readonly from: ServiceState,
    public readonly event: string,
  ) {
    super(`Event '${event}' is not allowed in state '${from}'`);
    this.name = 'IllegalTransitionError';
  }
}

/** Status code attached by dockerode to failed engine requests. */
export const extractStatusCode = (error: unknown): number | undefined => {
  if (!error || typeof error !== 'object' || !('statusCode' in error)) return undefined;
  const status = error.statusCode;
  return typeof status === 'number' && Number.isFinite(status) ? status : undefined;
};

const engineMessage = (error: Error): string | undefined => {
  if (!('json' in error) || !error.json || typeof error.json !== 'object') return undefined;
  const { json } = error;
  if (!('message' in json) || typeof json.message !== 'string') return undefined;
  return json.message.trim() || undefined;
};

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    const reason = 'reason' in error && typeof error.reason === 'string' ? error.reason : undefined;
    return engineMessage(error) || error.message || reason || error.name;
  }
  return typeof error === 'string' ? error : String(error);
};

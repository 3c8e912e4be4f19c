import { IllegalTransitionError } from '../core/errors';

export const SERVICE_STATES = [
  'Stopped',
  'ResourceCheckFailed',
  'Building',
  'Starting',
  'Healthy',
  'Unhealthy',
  'Failed',
] as const;
export type ServiceState = (typeof SERVICE_STATES)[number];

export type LifecycleEvent =
  | 'GatePassed'
  | 'GateFailed'
  | 'BuildSucceeded'
  | 'BuildFailed'
  | 'ApplyFailed'
  | 'HealthPassed'
  | 'HealthExhausted'
  | 'StopCompleted';

/** States from which an operator may start a new deploy or stop the service. */
export const IDLE_STATES: ReadonlySet<ServiceState> = new Set<ServiceState>([
  'Stopped',
  'ResourceCheckFailed',
  'Failed',
  'Healthy',
  'Unhealthy',
]);

export const INITIAL_STATE: ServiceState = 'Stopped';

export type TransitionResult = { ok: true; state: ServiceState } | { ok: false; error: IllegalTransitionError };

type TransitionTable = Record<LifecycleEvent, (from: ServiceState) => ServiceState | undefined>;

const fromIdle = (to: ServiceState) => (from: ServiceState) => (IDLE_STATES.has(from) ? to : undefined);
const fromState = (expected: ServiceState, to: ServiceState) => (from: ServiceState) =>
  from === expected ? to : undefined;

const TRANSITIONS: TransitionTable = {
  GatePassed: fromIdle('Building'),
  GateFailed: fromIdle('ResourceCheckFailed'),
  BuildSucceeded: fromState('Building', 'Starting'),
  BuildFailed: fromState('Building', 'Failed'),
  ApplyFailed: fromState('Starting', 'Failed'),
  HealthPassed: fromState('Starting', 'Healthy'),
  HealthExhausted: fromState('Starting', 'Unhealthy'),
  StopCompleted: fromIdle('Stopped'),
};

export function transition(state: ServiceState, event: LifecycleEvent): TransitionResult {
  const next = TRANSITIONS[event](state);
  if (next === undefined) {
    return { ok: false, error: new IllegalTransitionError(state, event) };
  }
  return { ok: true, state: next };
}

export type SessionState =
  | 'idle'
  | 'connecting'
  | 'charging'
  | 'derating'
  | 'stopping'
  | 'stopped'
  | 'faulted';

export const SESSION_STATES: readonly SessionState[] = [
  'idle',
  'connecting',
  'charging',
  'derating',
  'stopping',
  'stopped',
  'faulted',
];

export type TransitionTrigger =
  | 'start'
  | 'handshake_ok'
  | 'handshake_failed'
  | 'thermal_derate'
  | 'thermal_normal'
  | 'thermal_critical'
  | 'stop_requested'
  | 'duration_elapsed'
  | 'cleanup_complete'
  | 'adapter_failure'
  | 'anomaly';

/** Why a session left the charging states. */
export type StopReason =
  | 'duration_elapsed'
  | 'thermal_critical'
  | 'stop_requested'
  | 'handshake_failed'
  | 'adapter_failure';

export interface SessionTransition {
  readonly from: SessionState;
  readonly to: SessionState;
  readonly trigger: TransitionTrigger;
  readonly atMs: number;
}

/**
 * Every (from, to) pair the state machine accepts. Anything else is an
 * invalid transition and is recorded, never applied.
 */
export const ALLOWED_TRANSITIONS: Readonly<Record<SessionState, readonly SessionState[]>> = {
  idle: ['connecting'],
  connecting: ['charging', 'faulted'],
  charging: ['derating', 'stopping', 'faulted'],
  derating: ['charging', 'stopping', 'faulted'],
  stopping: ['stopped'],
  stopped: [],
  faulted: [],
};

export function isAllowedTransition(from: SessionState, to: SessionState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isTerminalState(state: SessionState): boolean {
  return state === 'stopped' || state === 'faulted';
}

/** States in which current flows and per-tick traffic is exchanged. */
export function isChargingState(state: SessionState): boolean {
  return state === 'charging' || state === 'derating';
}

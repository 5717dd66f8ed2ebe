import type { AnomalyKind } from './anomaly.js';
import type { ProtocolName } from './protocol-unit.js';
import type { SessionState, SessionTransition } from './session-state.js';

export interface ProtocolCounters {
  readonly sent: number;
  readonly received: number;
  readonly synthesized: number;
  readonly dropped: number;
  readonly delayed: number;
  readonly rejected: number;
}

export type ProtocolCounterName = keyof ProtocolCounters;

export type IncidentType =
  | 'invalid_state_transition'
  | 'adapter_failure'
  | 'thermal_critical'
  | 'energy_mismatch';

export interface SessionIncident {
  readonly type: IncidentType;
  readonly atMs: number;
  readonly message: string;
  readonly protocol?: ProtocolName;
  readonly from?: SessionState;
  readonly to?: SessionState;
  readonly temperatureC?: number;
  readonly resistanceOhm?: number;
}

export interface EffectiveAnomalies {
  /** Distinct events that changed at least one unit or the connector. */
  readonly total: number;
  readonly byKind: Readonly<Record<AnomalyKind, number>>;
  /** Every individual change, across all events. */
  readonly occurrences: number;
}

/** Immutable view of a session's statistics as of the last tick boundary. */
export interface SessionStatisticsSnapshot {
  readonly elapsedSeconds: number;
  readonly ticks: number;
  readonly messages: Readonly<Record<ProtocolName, ProtocolCounters>>;
  readonly anomalies: {
    readonly totalInjected: number;
    readonly byKind: Readonly<Record<AnomalyKind, number>>;
  };
  readonly effectiveAnomalies: EffectiveAnomalies;
  readonly errors: number;
  readonly incidents: readonly SessionIncident[];
  readonly transitions: readonly SessionTransition[];
  readonly peakTemperatureC: number;
  readonly finalState: SessionState;
}

/** Flat, snake-case report for operators and the console. */
export interface StatisticsReport {
  readonly elapsed_time: number;
  readonly ticks: number;
  readonly messages: Readonly<Record<string, number>>;
  readonly anomalies: {
    readonly total_injected: number;
    readonly by_kind: Readonly<Record<AnomalyKind, number>>;
    readonly effective: number;
    readonly effective_by_kind: Readonly<Record<AnomalyKind, number>>;
  };
  readonly errors: number;
  readonly incidents: number;
  readonly peak_temperature_c: number;
  readonly final_state: SessionState;
}

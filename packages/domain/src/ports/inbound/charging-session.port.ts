import type { AnomalyEvent, AnomalyKind, TargetProtocol } from '../../entities/anomaly.js';
import type { AttackScenario } from '../../entities/attack-scenario.js';
import type { SessionState } from '../../entities/session-state.js';
import type { SessionStatisticsSnapshot } from '../../entities/session-statistics.js';
import type { SessionSummary } from '../../entities/session-summary.js';
import type { ThermalState } from '../../entities/thermal-state.js';

export interface SimulateSessionOptions {
  durationSeconds: number;
  anomalyKinds?: readonly AnomalyKind[];
  anomalySeverity?: number;
  anomalyTarget?: TargetProtocol;
  /** Seconds after start at which the requested anomalies are injected. Defaults to 60% of the duration. */
  anomalyOnsetSeconds?: number;
}

/** Operator-facing commands on one charging session. */
export interface ChargingSessionPort {
  readonly state: SessionState;
  simulateChargingSession(opts: SimulateSessionOptions): Promise<SessionSummary>;
  stop(): boolean;
  statistics(): SessionStatisticsSnapshot;
  thermalState(): ThermalState;
  injectAnomaly(kind: AnomalyKind, targetProtocol: TargetProtocol, severity: number): AnomalyEvent;
  removeAnomaly(eventId: string): boolean;
  activeAnomalies(): readonly AnomalyEvent[];
  runScenario(scenario: AttackScenario): Promise<readonly AnomalyEvent[]>;
  summary(): SessionSummary;
}

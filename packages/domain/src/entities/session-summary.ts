import type { AnomalyKind } from './anomaly.js';
import type { SessionState, StopReason } from './session-state.js';
import type { SessionStatisticsSnapshot } from './session-statistics.js';
import type { ThermalState } from './thermal-state.js';
import type { BusAdapterStatistics } from '../ports/outbound/bus-adapter.port.js';
import type { ControlAdapterStatistics } from '../ports/outbound/control-adapter.port.js';
import type { SessionAdapterStatistics } from '../ports/outbound/session-adapter.port.js';

export interface EnergyAuditResult {
  readonly isAnomaly: boolean;
  readonly riskScore: number; // 0, or 50..100 when anomalous
  readonly expectedEnergyWh: number;
  readonly reportedEnergyWh: number;
  readonly relativeError: number;
  readonly reason: string;
}

export interface SessionSummary {
  readonly elapsedSeconds: number;
  readonly finalState: SessionState;
  readonly reason: StopReason | null;
  readonly statistics: SessionStatisticsSnapshot;
  readonly anomalies: {
    readonly requested: readonly AnomalyKind[];
    readonly effective: number;
    readonly effectiveByKind: Readonly<Record<AnomalyKind, number>>;
  };
  readonly thermal: ThermalState;
  readonly energyAudit: EnergyAuditResult;
  readonly adapters: {
    readonly bus: BusAdapterStatistics;
    readonly control: ControlAdapterStatistics;
    readonly session: SessionAdapterStatistics;
  };
}

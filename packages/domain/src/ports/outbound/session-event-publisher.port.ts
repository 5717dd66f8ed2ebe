import type { AnomalyEvent } from '../../entities/anomaly.js';
import type { SessionState, SessionTransition } from '../../entities/session-state.js';
import type { StatisticsReport } from '../../entities/session-statistics.js';
import type { SessionSummary } from '../../entities/session-summary.js';

export interface SessionEventPublisherPort {
  publishState(sessionId: string, state: SessionState, transition: SessionTransition): Promise<void>;
  publishStatistics(sessionId: string, report: StatisticsReport): Promise<void>;
  publishAnomaly(sessionId: string, event: AnomalyEvent): Promise<void>;
  publishSummary(sessionId: string, summary: SessionSummary): Promise<void>;
}

import { PROTOCOL_ORDER, type SessionStatisticsSnapshot, type StatisticsReport } from '@evsim/domain';

/** Flattens a snapshot into the snake-case report operators read. */
export function toStatisticsReport(snapshot: SessionStatisticsSnapshot): StatisticsReport {
  const messages: Record<string, number> = {};
  for (const protocol of PROTOCOL_ORDER) {
    const counters = snapshot.messages[protocol];
    messages[`${protocol}_sent`] = counters.sent;
    messages[`${protocol}_received`] = counters.received;
    messages[`${protocol}_synthesized`] = counters.synthesized;
    messages[`${protocol}_dropped`] = counters.dropped;
    messages[`${protocol}_delayed`] = counters.delayed;
    messages[`${protocol}_rejected`] = counters.rejected;
  }

  return {
    elapsed_time: snapshot.elapsedSeconds,
    ticks: snapshot.ticks,
    messages,
    anomalies: {
      total_injected: snapshot.anomalies.totalInjected,
      by_kind: snapshot.anomalies.byKind,
      effective: snapshot.effectiveAnomalies.total,
      effective_by_kind: snapshot.effectiveAnomalies.byKind,
    },
    errors: snapshot.errors,
    incidents: snapshot.incidents.length,
    peak_temperature_c: snapshot.peakTemperatureC,
    final_state: snapshot.finalState,
  };
}

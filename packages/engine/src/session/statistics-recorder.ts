import {
  PROTOCOL_ORDER,
  emptyKindCounts,
  type AnomalyEffect,
  type AnomalyInjectorStatistics,
  type AnomalyKind,
  type ProtocolCounterName,
  type ProtocolCounters,
  type ProtocolName,
  type SessionIncident,
  type SessionState,
  type SessionStatisticsSnapshot,
  type SessionTransition,
} from '@evsim/domain';

type MutableCounters = { -readonly [K in keyof ProtocolCounters]: number };

interface Draft {
  elapsedSeconds: number;
  ticks: number;
  messages: Record<ProtocolName, MutableCounters>;
  injected: AnomalyInjectorStatistics | null;
  effectiveEvents: Map<string, AnomalyKind>;
  effectOccurrences: number;
  errors: number;
  incidents: SessionIncident[];
  transitions: SessionTransition[];
  peakTemperatureC: number;
  finalState: SessionState;
}

function zeroCounters(): MutableCounters {
  return { sent: 0, received: 0, synthesized: 0, dropped: 0, delayed: 0, rejected: 0 };
}

/**
 * Session statistics, written only by the orchestrator. Updates go to a
 * draft during a tick; `commit` publishes a frozen copy at the boundary and
 * readers only ever see committed copies.
 */
export class SessionStatisticsRecorder {
  private readonly draft: Draft;
  private committed: SessionStatisticsSnapshot;

  constructor(initialState: SessionState, ambientC: number) {
    this.draft = {
      elapsedSeconds: 0,
      ticks: 0,
      messages: { bus: zeroCounters(), control: zeroCounters(), session: zeroCounters() },
      injected: null,
      effectiveEvents: new Map(),
      effectOccurrences: 0,
      errors: 0,
      incidents: [],
      transitions: [],
      peakTemperatureC: ambientC,
      finalState: initialState,
    };
    this.committed = this.freeze();
  }

  count(protocol: ProtocolName, counter: ProtocolCounterName, by = 1): void {
    this.draft.messages[protocol][counter] += by;
  }

  recordEffects(effects: readonly AnomalyEffect[]): void {
    for (const effect of effects) {
      this.draft.effectiveEvents.set(effect.eventId, effect.kind);
      this.draft.effectOccurrences++;
    }
  }

  /** Incidents of these types are errors; thermal and audit incidents are not. */
  recordIncident(incident: SessionIncident): void {
    this.draft.incidents.push(incident);
    if (incident.type === 'adapter_failure' || incident.type === 'invalid_state_transition') {
      this.draft.errors++;
    }
  }

  recordTransition(transition: SessionTransition): void {
    this.draft.transitions.push(transition);
    this.draft.finalState = transition.to;
  }

  recordTick(elapsedSeconds: number, temperatureC: number): void {
    this.draft.ticks++;
    this.draft.elapsedSeconds = elapsedSeconds;
    this.draft.peakTemperatureC = Math.max(this.draft.peakTemperatureC, temperatureC);
  }

  setElapsed(elapsedSeconds: number): void {
    this.draft.elapsedSeconds = elapsedSeconds;
  }

  setInjected(stats: AnomalyInjectorStatistics): void {
    this.draft.injected = stats;
  }

  commit(): SessionStatisticsSnapshot {
    this.committed = this.freeze();
    return this.committed;
  }

  snapshot(): SessionStatisticsSnapshot {
    return this.committed;
  }

  private freeze(): SessionStatisticsSnapshot {
    const d = this.draft;

    const messages = {
      bus: Object.freeze({ ...d.messages.bus }),
      control: Object.freeze({ ...d.messages.control }),
      session: Object.freeze({ ...d.messages.session }),
    };
    const effectiveByKind = emptyKindCounts();
    for (const kind of d.effectiveEvents.values()) effectiveByKind[kind]++;

    return Object.freeze({
      elapsedSeconds: d.elapsedSeconds,
      ticks: d.ticks,
      messages: Object.freeze(messages),
      anomalies: Object.freeze({
        totalInjected: d.injected?.totalInjected ?? 0,
        byKind: Object.freeze({ ...(d.injected?.injectedByKind ?? emptyKindCounts()) }),
      }),
      effectiveAnomalies: Object.freeze({
        total: d.effectiveEvents.size,
        byKind: Object.freeze(effectiveByKind),
        occurrences: d.effectOccurrences,
      }),
      errors: d.errors,
      incidents: Object.freeze(d.incidents.map((i) => Object.freeze({ ...i }))),
      transitions: Object.freeze(d.transitions.map((t) => Object.freeze({ ...t }))),
      peakTemperatureC: d.peakTemperatureC,
      finalState: d.finalState,
    });
  }
}

export function totalSent(snapshot: SessionStatisticsSnapshot): number {
  return PROTOCOL_ORDER.reduce((sum, p) => sum + snapshot.messages[p].sent, 0);
}

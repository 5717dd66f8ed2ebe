import {
  ANOMALY_KINDS,
  InvalidParameterError,
  emptyKindCounts,
  type AnomalyEffect,
  type AnomalyEvent,
  type AnomalyInjectorStatistics,
  type AnomalyKind,
  type ClockPort,
  type LoggerPort,
  type ProtocolName,
  type ProtocolUnit,
  type RandomSource,
  type RoutedUnit,
  type TargetProtocol,
} from '@evsim/domain';
import { silentLogger } from '@evsim/adapters';
import { parseSessionConfig, type InjectorLimits } from '../config/session-config.js';
import { ANOMALY_TRANSFORMS, type TransformContext } from './transforms.js';
import { cloneUnit } from './units.js';

export type Direction = 'outbound' | 'inbound';

export interface InjectionResult {
  readonly units: readonly RoutedUnit[];
  readonly effects: readonly AnomalyEffect[];
}

const DEFAULT_LIMITS: InjectorLimits = parseSessionConfig().injector;

function targets(event: AnomalyEvent, protocol: ProtocolName): boolean {
  return event.targetProtocol === 'all' || event.targetProtocol === protocol;
}

/**
 * Holds the active anomaly set and rewrites protocol units as they pass.
 *
 * Active events apply in the order they were injected; every unit one
 * transform emits is fed to the next. All randomness comes from `rng`.
 */
export class AnomalyInjector {
  private readonly active: AnomalyEvent[] = [];
  private readonly injected: AnomalyEvent[] = [];
  private readonly captured: Record<Direction, Record<ProtocolName, ProtocolUnit[]>> = {
    outbound: { bus: [], control: [], session: [] },
    inbound: { bus: [], control: [], session: [] },
  };
  private sequence = 0;
  private readonly limits: InjectorLimits;

  constructor(
    private readonly rng: RandomSource,
    private readonly clock: Pick<ClockPort, 'nowMs'>,
    limits: Partial<InjectorLimits> = {},
    private readonly logger: LoggerPort = silentLogger,
  ) {
    this.limits = { ...DEFAULT_LIMITS, ...limits };
  }

  inject(kind: AnomalyKind, targetProtocol: TargetProtocol, severity: number): AnomalyEvent {
    if (!ANOMALY_KINDS.includes(kind)) throw new InvalidParameterError(`Unknown anomaly kind ${String(kind)}`);
    if (!Number.isFinite(severity) || severity < 0 || severity > 1) {
      throw new InvalidParameterError(`Severity must be within [0, 1], got ${severity}`);
    }

    const event: AnomalyEvent = Object.freeze({
      id: `${kind}_${this.sequence++}`,
      kind,
      targetProtocol,
      severity,
      createdAtMs: this.clock.nowMs(),
      description: `${kind} on ${targetProtocol} at severity ${severity.toFixed(2)}`,
    });
    this.active.push(event);
    this.injected.push(event);
    this.logger.info(`Injected ${event.id}`, { targetProtocol, severity });
    return event;
  }

  remove(eventId: string): boolean {
    const idx = this.active.findIndex((e) => e.id === eventId);
    if (idx === -1) return false;
    this.active.splice(idx, 1);
    this.logger.info(`Removed ${eventId}`);
    return true;
  }

  activeEvents(): readonly AnomalyEvent[] {
    return [...this.active];
  }

  history(): readonly AnomalyEvent[] {
    return [...this.injected];
  }

  applyOutbound(unit: ProtocolUnit): InjectionResult {
    return this.apply(unit, 'outbound');
  }

  applyInbound(unit: ProtocolUnit): InjectionResult {
    return this.apply(unit, 'inbound');
  }

  statistics(): AnomalyInjectorStatistics {
    const injectedByKind = emptyKindCounts();
    for (const event of this.injected) injectedByKind[event.kind]++;
    return {
      totalInjected: this.injected.length,
      activeCount: this.active.length,
      injectedByKind,
    };
  }

  private apply(unit: ProtocolUnit, direction: Direction): InjectionResult {
    const protocol = unit.protocol;
    const ctx: TransformContext = {
      rng: this.rng,
      nowMs: this.clock.nowMs(),
      limits: this.limits,
      history: [...this.captured[direction][protocol]],
    };

    let routed: RoutedUnit[] = [
      { unit: cloneUnit(unit), origin: 'legitimate', deliverAtMs: ctx.nowMs, outOfOrder: false, tags: [] },
    ];
    const effects: AnomalyEffect[] = [];

    for (const event of this.active) {
      if (!targets(event, protocol)) continue;
      const transform = ANOMALY_TRANSFORMS[event.kind];
      const next: RoutedUnit[] = [];
      for (const current of routed) {
        const result = transform(current, event, ctx);
        next.push(...result.units);
        if (result.effective) {
          effects.push({ eventId: event.id, kind: event.kind, channel: protocol, detail: result.detail });
        }
      }
      routed = next;
    }

    this.capture(direction, protocol, routed);
    return { units: routed, effects };
  }

  private capture(direction: Direction, protocol: ProtocolName, routed: readonly RoutedUnit[]): void {
    const store = this.captured[direction][protocol];
    for (const r of routed) store.push(cloneUnit(r.unit));
    if (store.length > this.limits.replayHistorySize) {
      store.splice(0, store.length - this.limits.replayHistorySize);
    }
  }
}

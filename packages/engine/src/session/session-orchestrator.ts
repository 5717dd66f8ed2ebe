import { setImmediate as nextTurn } from 'timers/promises';
import {
  ANOMALY_KINDS,
  AnomalySeverity,
  InvalidParameterError,
  SESSION_STATES,
  SessionClosedError,
  describeError,
  isAllowedTransition,
  isChargingState,
  isTerminalState,
  type AnomalyEffect,
  type AnomalyEvent,
  type AnomalyKind,
  type AttackScenario,
  type BusAdapterPort,
  type ChargingSessionPort,
  type ClockPort,
  type ControlAdapterPort,
  type EnergyAuditResult,
  type FieldMap,
  type ForcedTransition,
  type LoggerPort,
  type ProtocolName,
  type ProtocolUnit,
  type RoutedUnit,
  type SessionAdapterPort,
  type SessionEventPublisherPort,
  type SessionMessage,
  type SessionMessageType,
  type SessionState,
  type SessionStatisticsSnapshot,
  type SessionSummary,
  type SimulateSessionOptions,
  type StopReason,
  type TargetProtocol,
  type ThermalParameters,
  type ThermalState,
  type ThermalVerdict,
  type TransitionTrigger,
  type ControlAction,
  type ControlMessage,
  type SessionTransition,
} from '@evsim/domain';
import { EvBusFrames, silentLogger } from '@evsim/adapters';
import type { SessionConfig } from '../config/session-config.js';
import type { AnomalyInjector, Direction } from '../anomalies/anomaly-injector.js';
import { executeScenario } from '../scenarios/attack-scenario.js';
import { ThermalModel } from '../thermal/thermal-model.js';
import { auditEnergy } from '../metering/energy-audit.js';
import { CurrentLimiter } from './current-limiter.js';
import { SessionStatisticsRecorder } from './statistics-recorder.js';
import { toStatisticsReport } from './statistics-report.js';

export interface SessionOrchestratorDeps {
  readonly id?: string;
  readonly config: SessionConfig;
  readonly bus: BusAdapterPort;
  readonly control: ControlAdapterPort;
  readonly session: SessionAdapterPort;
  readonly injector: AnomalyInjector;
  readonly clock: ClockPort;
  readonly logger?: LoggerPort;
  readonly publisher?: SessionEventPublisherPort;
  /** Awaited after every tick. Defaults to a single event-loop turn. */
  readonly pace?: (tickIntervalMs: number) => Promise<void>;
}

type FinishReason = Extract<StopReason, 'duration_elapsed' | 'thermal_critical' | 'stop_requested'>;

const FINISH_TRIGGER: Record<FinishReason, TransitionTrigger> = {
  duration_elapsed: 'duration_elapsed',
  thermal_critical: 'thermal_critical',
  stop_requested: 'stop_requested',
};

interface PendingUnit {
  readonly routed: RoutedUnit;
  readonly seq: number;
}

async function yieldTurn(): Promise<void> {
  await nextTurn();
}

function thermalParameters(config: SessionConfig): ThermalParameters {
  const { rateWarnCPerS, ...rest } = config.thermal;
  return rateWarnCPerS === null ? rest : { ...rest, rateWarnCPerS };
}

function isErrorResponse(unit: ProtocolUnit): boolean {
  return (
    (unit.protocol === 'control' && unit.messageType === 'CALL_ERROR') ||
    (unit.protocol === 'session' && unit.messageType === 'ErrorRes')
  );
}

export function validateSimulateOptions(opts: SimulateSessionOptions): void {
  const problems: string[] = [];
  if (!Number.isFinite(opts.durationSeconds) || opts.durationSeconds <= 0) {
    problems.push('durationSeconds must be a positive number');
  }
  const severity = opts.anomalySeverity;
  if (severity !== undefined && (!Number.isFinite(severity) || severity < 0 || severity > 1)) {
    problems.push('anomalySeverity must be within [0, 1]');
  }
  const onset = opts.anomalyOnsetSeconds;
  if (onset !== undefined && (!Number.isFinite(onset) || onset < 0)) {
    problems.push('anomalyOnsetSeconds must not be negative');
  }
  for (const kind of opts.anomalyKinds ?? []) {
    if (!ANOMALY_KINDS.includes(kind)) problems.push(`unknown anomaly kind ${String(kind)}`);
  }
  if (problems.length > 0) throw new InvalidParameterError('Invalid session options', problems);
}

/**
 * Drives one charging session: the state machine, the thermal safety check,
 * and one round of bus, control and session traffic per tick, every unit
 * routed through the anomaly injector.
 *
 * Protocol and anomaly trouble never escapes `simulateChargingSession`; it
 * is recorded as incidents and ends in a summary.
 */
export class SessionOrchestrator implements ChargingSessionPort {
  readonly id: string;

  private currentState: SessionState = 'idle';
  private readonly config: SessionConfig;
  private readonly clock: ClockPort;
  private readonly injector: AnomalyInjector;
  private readonly logger: LoggerPort;
  private readonly pace: (tickIntervalMs: number) => Promise<void>;
  private readonly thermal: ThermalModel;
  private readonly limiter: CurrentLimiter;
  private readonly recorder: SessionStatisticsRecorder;

  private readonly pending: Record<Direction, PendingUnit[]> = { outbound: [], inbound: [] };
  private pendingSeq = 0;
  private messageSeq = 0;

  private startedAtMs: number | null = null;
  private stopRequest: FinishReason | null = null;
  private stopReason: StopReason | null = null;
  private failuresThisTick = 0;
  private failingTicks = 0;
  private deliveredEnergyWh = 0;
  private socPct: number;
  private transactionId: number | null = null;
  private vehicleSessionId: string | null = null;
  private requested: readonly AnomalyKind[] = [];
  private audit: EnergyAuditResult | null = null;

  constructor(private readonly deps: SessionOrchestratorDeps) {
    this.id = deps.id ?? 'local';
    this.config = deps.config;
    this.clock = deps.clock;
    this.injector = deps.injector;
    this.logger = deps.logger ?? silentLogger;
    this.pace = deps.pace ?? yieldTurn;
    this.thermal = new ThermalModel(thermalParameters(deps.config));
    this.limiter = new CurrentLimiter(deps.config.nominalCurrentAmp, deps.config.derateStepsAmp);
    this.recorder = new SessionStatisticsRecorder(this.currentState, deps.config.thermal.ambientC);
    this.socPct = deps.config.initialSocPct;
  }

  get state(): SessionState {
    return this.currentState;
  }

  // ─── Session lifecycle ──────────────────────────────────────────────────────

  async simulateChargingSession(opts: SimulateSessionOptions): Promise<SessionSummary> {
    validateSimulateOptions(opts);
    const startedAt = this.clock.nowMs();
    const durationMs = opts.durationSeconds * 1_000;
    const onsetMs = startedAt + (opts.anomalyOnsetSeconds ?? opts.durationSeconds * 0.6) * 1_000;
    this.requested = [...(opts.anomalyKinds ?? [])];
    let toInject = this.requested;

    await this.start();

    while (isChargingState(this.currentState)) {
      const now = this.clock.nowMs();
      if (now - startedAt >= durationMs) this.stopRequest ??= 'duration_elapsed';

      if (toInject.length > 0 && now >= onsetMs && this.stopRequest === null) {
        for (const kind of toInject) {
          this.injectAnomaly(kind, opts.anomalyTarget ?? 'all', opts.anomalySeverity ?? AnomalySeverity.MEDIUM);
        }
        toInject = [];
      }

      await this.tick();
      await this.pace(this.config.tickIntervalMs);
    }

    const summary = this.summary();
    this.logger.info(`Session ${this.id} finished in ${summary.finalState}`, {
      reason: summary.reason,
      elapsedSeconds: summary.elapsedSeconds,
    });
    this.publish((p) => p.publishSummary(this.id, summary));
    return summary;
  }

  /** Runs the handshake. Takes one tick interval of simulated time. */
  async start(): Promise<SessionState> {
    if (this.currentState !== 'idle') throw new SessionClosedError(this.id, this.currentState);

    this.startedAtMs = this.clock.nowMs();
    this.transition('connecting', 'start');
    this.failuresThisTick = 0;

    if (await this.handshake()) {
      this.transition('charging', 'handshake_ok');
    } else {
      this.logger.error('Handshake failed');
      this.stopReason = 'handshake_failed';
      this.limiter.open();
      this.transition('faulted', 'handshake_failed');
    }

    this.clock.advance(this.config.tickIntervalMs);
    this.commit();
    return this.currentState;
  }

  async tick(): Promise<SessionState> {
    if (!isChargingState(this.currentState)) return this.currentState;

    if (this.stopRequest !== null) {
      await this.finish(this.stopRequest);
      this.commit();
      return this.currentState;
    }

    const dtSeconds = this.config.tickIntervalMs / 1_000;
    const resistanceOhm = this.effectiveResistance();
    const currentAmp = this.limiter.currentAmp;
    const thermal = this.thermal.advance(dtSeconds, currentAmp, resistanceOhm);

    const tickEnergyWh = (this.config.nominalVoltageV * currentAmp * dtSeconds) / 3_600;
    this.deliveredEnergyWh += tickEnergyWh;
    this.socPct = Math.min(100, this.socPct + (tickEnergyWh / this.config.batteryCapacityWh) * 100);

    const verdict = this.thermal.verdict();
    if (verdict === 'critical') {
      this.recorder.recordIncident({
        type: 'thermal_critical',
        atMs: this.clock.nowMs(),
        temperatureC: thermal.temperatureC,
        resistanceOhm,
        message: `Contact reached ${thermal.temperatureC.toFixed(1)} °C at ${resistanceOhm} Ω`,
      });
      this.logger.error(`Thermal critical at ${thermal.temperatureC.toFixed(1)} °C, opening contactor`);
      this.clock.advance(this.config.tickIntervalMs);
      this.recorder.recordTick(this.elapsedSeconds(), thermal.temperatureC);
      await this.finish('thermal_critical');
      this.commit();
      return this.currentState;
    }

    this.applyVerdict(verdict, thermal);

    this.failuresThisTick = 0;
    await this.trafficRound(thermal, currentAmp);
    this.trackFailures();

    this.clock.advance(this.config.tickIntervalMs);
    this.recorder.recordTick(this.elapsedSeconds(), thermal.temperatureC);
    this.commit();
    return this.currentState;
  }

  /** Cooperative stop, honoured at the next tick boundary. */
  stop(): boolean {
    if (!isChargingState(this.currentState) && this.currentState !== 'connecting') return false;
    this.stopRequest ??= 'stop_requested';
    return true;
  }

  // ─── Queries ────────────────────────────────────────────────────────────────

  statistics(): SessionStatisticsSnapshot {
    return this.recorder.snapshot();
  }

  thermalState(): ThermalState {
    return this.thermal.snapshot();
  }

  summary(): SessionSummary {
    const statistics = this.recorder.snapshot();
    return {
      elapsedSeconds: this.elapsedSeconds(),
      finalState: this.currentState,
      reason: this.stopReason,
      statistics,
      anomalies: {
        requested: this.requested,
        effective: statistics.effectiveAnomalies.total,
        effectiveByKind: statistics.effectiveAnomalies.byKind,
      },
      thermal: this.thermal.snapshot(),
      energyAudit: this.audit ?? this.auditNow(),
      adapters: {
        bus: this.deps.bus.statistics(),
        control: this.deps.control.statistics(),
        session: this.deps.session.statistics(),
      },
    };
  }

  // ─── Anomalies ──────────────────────────────────────────────────────────────

  injectAnomaly(kind: AnomalyKind, targetProtocol: TargetProtocol, severity: number): AnomalyEvent {
    const event = this.injector.inject(kind, targetProtocol, severity);
    this.publish((p) => p.publishAnomaly(this.id, event));
    return event;
  }

  removeAnomaly(eventId: string): boolean {
    return this.injector.remove(eventId);
  }

  activeAnomalies(): readonly AnomalyEvent[] {
    return this.injector.activeEvents();
  }

  async runScenario(scenario: AttackScenario): Promise<readonly AnomalyEvent[]> {
    if (isTerminalState(this.currentState)) throw new SessionClosedError(this.id, this.currentState);
    return executeScenario(
      scenario,
      {
        inject: (kind, target, severity) => this.injectAnomaly(kind, target, severity),
        remove: (eventId) => this.removeAnomaly(eventId),
      },
      this.clock,
      this.logger,
      () => !isTerminalState(this.currentState),
    );
  }

  // ─── State machine ──────────────────────────────────────────────────────────

  private transition(to: SessionState, trigger: TransitionTrigger): boolean {
    const from = this.currentState;
    const atMs = this.clock.nowMs();

    if (!isAllowedTransition(from, to)) {
      this.recorder.recordIncident({
        type: 'invalid_state_transition',
        atMs,
        from,
        to,
        message: `Rejected ${from} -> ${to} (${trigger})`,
      });
      this.logger.warn(`Rejected transition ${from} -> ${to}`, { trigger });
      return false;
    }

    const transition: SessionTransition = { from, to, trigger, atMs };
    this.currentState = to;
    this.recorder.recordTransition(transition);
    this.logger.info(`${from} -> ${to}`, { trigger });
    this.publish((p) => p.publishState(this.id, to, transition));
    if (isTerminalState(to)) this.settle();
    return true;
  }

  private forceTransition(forced: ForcedTransition, channel: ProtocolName): void {
    const from = this.currentState;
    const candidates = SESSION_STATES.filter((s) => s !== from && !isAllowedTransition(from, s));
    const to = candidates[forced.seed % candidates.length];
    if (to === undefined) return;
    this.recorder.recordEffects([
      { eventId: forced.eventId, kind: 'invalid_state_transition', channel, detail: `requested ${from} -> ${to}` },
    ]);
    this.transition(to, 'anomaly');
  }

  private applyVerdict(verdict: Exclude<ThermalVerdict, 'critical'>, thermal: ThermalState): void {
    if (verdict === 'derate' && this.currentState === 'charging') {
      if (this.transition('derating', 'thermal_derate')) {
        const amp = this.limiter.stepDown();
        this.logger.warn(`Derating to ${amp} A at ${thermal.temperatureC.toFixed(1)} °C`);
      }
    } else if (verdict === 'normal' && this.currentState === 'derating') {
      this.transition('charging', 'thermal_normal');
    }
  }

  private async finish(reason: FinishReason): Promise<void> {
    this.stopReason = reason;
    this.transition('stopping', FINISH_TRIGGER[reason]);
    this.limiter.open();
    // After a thermal trip the contactor opens without any further traffic.
    if (reason !== 'thermal_critical') await this.disconnect();
    this.transition('stopped', 'cleanup_complete');
  }

  private trackFailures(): void {
    if (this.failuresThisTick === 0) {
      this.failingTicks = 0;
      return;
    }
    this.failingTicks++;
    if (this.failingTicks >= this.config.adapterFailureThreshold) {
      this.logger.error(`${this.failingTicks} consecutive ticks with adapter failures, faulting session`);
      this.stopReason = 'adapter_failure';
      this.limiter.open();
      this.transition('faulted', 'adapter_failure');
    }
  }

  /** Runs once, when the session reaches a terminal state. */
  private settle(): void {
    this.discardPending();
    // the clock stops here; scenarios parked on it find the session closed
    this.clock.releaseWaiters();
    this.audit = this.auditNow();
    if (this.audit.isAnomaly) {
      this.recorder.recordIncident({
        type: 'energy_mismatch',
        atMs: this.clock.nowMs(),
        protocol: 'control',
        message: this.audit.reason,
      });
      this.logger.warn(`Energy audit: ${this.audit.reason}`, { riskScore: this.audit.riskScore });
    }
  }

  private auditNow(): EnergyAuditResult {
    const reported = this.deps.control.statistics().reportedEnergyWh ?? 0;
    return auditEnergy(this.deliveredEnergyWh, reported, this.config.energyErrorThreshold);
  }

  private effectiveResistance(): number {
    const base = this.config.contactResistanceOhm;
    const fault = this.config.faultResistanceOhm;
    const faults = this.injector.activeEvents().filter((e) => e.kind === 'power_anomaly');
    if (faults.length === 0 || fault <= base) return base;
    this.recorder.recordEffects(
      faults.map((e): AnomalyEffect => ({ eventId: e.id, kind: e.kind, channel: 'physical', detail: `contact at ${fault} Ω` })),
    );
    return fault;
  }

  // ─── Traffic ────────────────────────────────────────────────────────────────

  private async handshake(): Promise<boolean> {
    const { chargePointId, vehicleId, idTag } = this.config.identity;

    await this.exchange(this.sessionMessage('DiscoveryReq', { evccId: vehicleId }));
    for (const unit of await this.exchange(this.sessionMessage('SessionStartReq', { evccId: vehicleId }))) {
      if (unit.protocol !== 'session' || unit.messageType !== 'SessionStartRes') continue;
      const sessionId = unit.fields['sessionId'];
      if (typeof sessionId === 'string') this.vehicleSessionId = sessionId;
    }

    const boot = await this.exchange(
      this.call('BootNotification', { chargePointId, chargePointModel: 'SIM-AC-22', chargePointVendor: 'evsim' }),
    );
    const booted = boot.some(
      (u) => u.protocol === 'control' && u.messageType === 'CALL_RESULT' && u.payload['status'] === 'Accepted',
    );

    for (const unit of await this.exchange(
      this.call('StartTransaction', { chargePointId, connectorId: 1, idTag, meterStart: 0 }),
    )) {
      if (unit.protocol !== 'control' || unit.messageType !== 'CALL_RESULT') continue;
      const transactionId = unit.payload['transactionId'];
      if (typeof transactionId === 'number') this.transactionId = transactionId;
    }

    const powerW = this.limiter.currentAmp * this.config.nominalVoltageV;
    await this.exchange(EvBusFrames.chargingState(1, this.limiter.currentAmp, powerW));

    return this.vehicleSessionId !== null && booted && this.transactionId !== null;
  }

  private async trafficRound(thermal: ThermalState, currentAmp: number): Promise<void> {
    const { chargePointId } = this.config.identity;
    const powerW = currentAmp * this.config.nominalVoltageV;

    await this.exchange(EvBusFrames.batteryStatus(this.socPct, thermal.temperatureC, this.config.nominalVoltageV));
    await this.exchange(
      this.call('MeterValues', {
        chargePointId,
        connectorId: 1,
        transactionId: this.transactionId,
        energyWh: this.deliveredEnergyWh,
        powerW,
        currentA: currentAmp,
        temperatureC: thermal.temperatureC,
      }),
    );
    await this.exchange(
      this.sessionMessage('ChargingStatusReq', { sessionId: this.vehicleSessionId, requestedPower: powerW }),
    );
  }

  private async disconnect(): Promise<void> {
    const { chargePointId } = this.config.identity;
    await this.exchange(
      this.call('StopTransaction', {
        chargePointId,
        transactionId: this.transactionId,
        meterStop: this.deliveredEnergyWh,
        reason: 'Local',
      }),
    );
    await this.exchange(this.sessionMessage('SessionStopReq', { sessionId: this.vehicleSessionId }));
    await this.exchange(EvBusFrames.chargingState(0, 0, 0));
  }

  /**
   * Sends one unit through the injector and the adapter, and returns the
   * responses that arrived by now. New units go out before earlier delayed
   * ones that have come due.
   */
  private async exchange(unit: ProtocolUnit): Promise<ProtocolUnit[]> {
    const protocol = unit.protocol;
    const now = this.clock.nowMs();

    const outbound = this.injector.applyOutbound(unit);
    this.recorder.recordEffects(outbound.effects);
    if (!outbound.units.some((r) => r.origin === 'legitimate')) this.recorder.count(protocol, 'dropped');

    const responses: ProtocolUnit[] = [];
    for (const routed of [...this.schedule('outbound', outbound.units, now), ...this.takeDue('outbound', protocol, now)]) {
      responses.push(...(await this.deliver(routed)));
    }
    if (protocol === 'bus') responses.push(...(await this.receiveBus()));

    const arrived: RoutedUnit[] = [];
    for (const response of responses) {
      const inbound = this.injector.applyInbound(response);
      this.recorder.recordEffects(inbound.effects);
      arrived.push(...this.schedule('inbound', inbound.units, now));
    }
    return [...arrived, ...this.takeDue('inbound', protocol, now)].map((routed) => this.accept(routed));
  }

  private schedule(direction: Direction, units: readonly RoutedUnit[], now: number): RoutedUnit[] {
    const immediate: RoutedUnit[] = [];
    for (const routed of units) {
      if (routed.deliverAtMs > now) {
        this.pending[direction].push({ routed, seq: this.pendingSeq++ });
        this.recorder.count(routed.unit.protocol, 'delayed');
      } else {
        immediate.push(routed);
      }
    }
    return immediate;
  }

  /** Units still in flight when the session ends never arrive. */
  private discardPending(): void {
    for (const direction of ['outbound', 'inbound'] as const) {
      const queue = this.pending[direction];
      if (queue.length === 0) continue;
      for (const { routed } of queue) this.recorder.count(routed.unit.protocol, 'dropped');
      this.logger.warn(`Dropped ${queue.length} ${direction} unit(s) still in flight at session end`);
      this.pending[direction] = [];
    }
  }

  private takeDue(direction: Direction, protocol: ProtocolName, now: number): RoutedUnit[] {
    const queue = this.pending[direction];
    const due = queue.filter((p) => p.routed.unit.protocol === protocol && p.routed.deliverAtMs <= now);
    if (due.length === 0) return [];
    this.pending[direction] = queue.filter((p) => !due.includes(p));
    return due
      .sort((a, b) => a.routed.deliverAtMs - b.routed.deliverAtMs || a.seq - b.seq)
      .map((p) => p.routed);
  }

  private async deliver(routed: RoutedUnit): Promise<ProtocolUnit[]> {
    const { unit } = routed;
    this.recorder.count(unit.protocol, routed.origin === 'legitimate' ? 'sent' : 'synthesized');
    if (routed.forcedTransition) this.forceTransition(routed.forcedTransition, unit.protocol);

    try {
      const { accepted, responses } = await this.transmit(unit);
      if (!accepted) {
        if (routed.origin === 'legitimate') this.adapterFailure(unit.protocol, 'legitimate unit refused');
        else this.recorder.count(unit.protocol, 'rejected');
      }
      return responses;
    } catch (err) {
      this.adapterFailure(unit.protocol, describeError(err));
      return [];
    }
  }

  private async transmit(unit: ProtocolUnit): Promise<{ accepted: boolean; responses: ProtocolUnit[] }> {
    switch (unit.protocol) {
      case 'bus':
        return { accepted: await this.deps.bus.send(unit), responses: [] };
      case 'control': {
        const response = await this.deps.control.send(unit);
        return { accepted: true, responses: response ? [response] : [] };
      }
      case 'session':
        return { accepted: true, responses: [await this.deps.session.handle(unit)] };
    }
  }

  private async receiveBus(): Promise<ProtocolUnit[]> {
    try {
      return await this.deps.bus.receive(this.config.busReceiveTimeoutMs);
    } catch (err) {
      this.adapterFailure('bus', describeError(err));
      return [];
    }
  }

  private accept(routed: RoutedUnit): ProtocolUnit {
    const { unit } = routed;
    this.recorder.count(unit.protocol, 'received');
    if (routed.forcedTransition) this.forceTransition(routed.forcedTransition, unit.protocol);
    if (isErrorResponse(unit)) this.recorder.count(unit.protocol, 'rejected');
    return unit;
  }

  private adapterFailure(protocol: ProtocolName, message: string): void {
    this.failuresThisTick++;
    this.recorder.recordIncident({ type: 'adapter_failure', atMs: this.clock.nowMs(), protocol, message });
    this.logger.warn(`${protocol} adapter failure: ${message}`);
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  private call(action: ControlAction, payload: FieldMap): ControlMessage {
    return {
      protocol: 'control',
      messageType: 'CALL',
      messageId: `${this.id}-${++this.messageSeq}`,
      action,
      payload,
    };
  }

  private sessionMessage(messageType: SessionMessageType, fields: FieldMap): SessionMessage {
    return { protocol: 'session', messageType, fields };
  }

  private elapsedSeconds(): number {
    return this.startedAtMs === null ? 0 : (this.clock.nowMs() - this.startedAtMs) / 1_000;
  }

  private commit(): void {
    this.recorder.setElapsed(this.elapsedSeconds());
    this.recorder.setInjected(this.injector.statistics());
    const snapshot = this.recorder.commit();
    this.publish((p) => p.publishStatistics(this.id, toStatisticsReport(snapshot)));
  }

  private publish(send: (publisher: SessionEventPublisherPort) => Promise<void>): void {
    const publisher = this.deps.publisher;
    if (!publisher) return;
    send(publisher).catch((err: unknown) => {
      this.logger.warn(`Publish failed: ${describeError(err)}`);
    });
  }
}

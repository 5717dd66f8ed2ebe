import type {
  AnomalyEvent,
  AnomalyKind,
  FieldValue,
  ProtocolUnit,
  RandomSource,
  RoutedUnit,
} from '@evsim/domain';
import { MAX_FRAME_BYTES, MAX_STANDARD_ID } from '@evsim/adapters';
import type { InjectorLimits } from '../config/session-config.js';
import {
  busFrame,
  cloneUnit,
  fieldsOf,
  mapFields,
  pickIndices,
  randomBytes,
  synthesized,
  touched,
  withFields,
} from './units.js';

export interface TransformContext {
  readonly rng: RandomSource;
  readonly nowMs: number;
  readonly limits: InjectorLimits;
  /** Units already seen on this protocol and direction, oldest first. */
  readonly history: readonly ProtocolUnit[];
}

export interface TransformResult {
  readonly units: readonly RoutedUnit[];
  readonly effective: boolean;
  readonly detail: string;
}

export type AnomalyTransform = (routed: RoutedUnit, event: AnomalyEvent, ctx: TransformContext) => TransformResult;

function unchanged(routed: RoutedUnit, detail: string): TransformResult {
  return { units: [routed], effective: false, detail };
}

// ─── Frame injection ──────────────────────────────────────────────────────────

function malformed(unit: ProtocolUnit, rng: RandomSource, tag: string): ProtocolUnit {
  switch (unit.protocol) {
    case 'bus':
      return rng.next() < 0.5
        ? busFrame(MAX_STANDARD_ID + 1 + rng.nextInt(0, MAX_STANDARD_ID), randomBytes(rng, MAX_FRAME_BYTES))
        : busFrame(rng.nextInt(0, MAX_STANDARD_ID), randomBytes(rng, MAX_FRAME_BYTES), MAX_FRAME_BYTES + 7);
    case 'control':
      return {
        protocol: 'control',
        messageType: 'CALL',
        messageId: tag,
        action: 'InjectedCommand',
        payload: { command: 'UnlockConnector', nonce: rng.nextInt(0, 0xffff) },
      };
    case 'session':
      return { protocol: 'session', messageType: 'UnknownReq', fields: { nonce: rng.nextInt(0, 0xffff) } };
  }
}

const injectFrames: AnomalyTransform = (routed, event, ctx) => {
  const count = Math.max(1, Math.round(3 * event.severity));
  const forged = Array.from({ length: count }, (_, i) =>
    synthesized(malformed(routed.unit, ctx.rng, `inj-${ctx.nowMs}-${i}`), routed.deliverAtMs, event.kind),
  );
  return { units: [routed, ...forged], effective: true, detail: `${count} malformed unit(s) injected` };
};

// ─── Fuzzing ──────────────────────────────────────────────────────────────────

function fuzzValue(value: FieldValue, rng: RandomSource): FieldValue {
  if (typeof value === 'number') return Math.trunc(value) ^ rng.nextInt(1, 0xff);
  if (typeof value === 'boolean') return !value;
  if (value === null) return rng.nextInt(0, 0xff);
  if (value.length === 0) return String.fromCharCode(rng.nextInt(0x21, 0x7e));
  const at = rng.nextInt(0, value.length - 1);
  const flipped = String.fromCharCode(value.charCodeAt(at) ^ rng.nextInt(1, 0x1f));
  return value.slice(0, at) + flipped + value.slice(at + 1);
}

const fuzz: AnomalyTransform = (routed, event, ctx) => {
  const { unit } = routed;
  if (unit.protocol === 'bus') {
    const n = unit.payload.length;
    if (n === 0) return unchanged(routed, 'empty payload');
    const payload = unit.payload.slice();
    const indices = pickIndices(ctx.rng, n, Math.max(1, Math.floor(n * event.severity)));
    for (const i of indices) payload[i] = (payload[i] ?? 0) ^ ctx.rng.nextInt(1, 0xff);
    return {
      units: [touched(routed, event.kind, { unit: { ...unit, payload } })],
      effective: true,
      detail: `flipped byte(s) ${indices.join(',')}`,
    };
  }

  const fields = fieldsOf(unit) ?? {};
  const keys = Object.keys(fields).sort();
  if (keys.length === 0) return unchanged(routed, 'no fields');
  const chosen = new Set(
    pickIndices(ctx.rng, keys.length, Math.max(1, Math.floor(keys.length * event.severity)))
      .map((i) => keys[i])
      .filter((key): key is string => key !== undefined),
  );
  const fuzzed = mapFields(fields, (key, value) => (chosen.has(key) ? fuzzValue(value, ctx.rng) : value));
  return {
    units: [touched(routed, event.kind, { unit: withFields(unit, fuzzed) })],
    effective: true,
    detail: `fuzzed field(s) ${[...chosen].join(',')}`,
  };
};

// ─── Delay, timing ────────────────────────────────────────────────────────────

const delay: AnomalyTransform = (routed, event, ctx) => {
  const delayMs = Math.round(event.severity * ctx.limits.maxDelayMs);
  if (delayMs === 0) return unchanged(routed, 'zero delay');
  return {
    units: [touched(routed, event.kind, { deliverAtMs: routed.deliverAtMs + delayMs })],
    effective: true,
    detail: `delayed ${delayMs} ms`,
  };
};

const jitter: AnomalyTransform = (routed, event, ctx) => {
  const jitterMs = Math.max(1, Math.round(ctx.rng.next() * event.severity * ctx.limits.maxJitterMs));
  return {
    units: [touched(routed, event.kind, { deliverAtMs: routed.deliverAtMs + jitterMs, outOfOrder: true })],
    effective: true,
    detail: `reordered by ${jitterMs} ms`,
  };
};

// ─── Duplication ──────────────────────────────────────────────────────────────

const duplicate: AnomalyTransform = (routed, event) => {
  const copies = 1 + Math.floor(2 * event.severity);
  const clones = Array.from({ length: copies }, () =>
    synthesized(cloneUnit(routed.unit), routed.deliverAtMs, event.kind),
  );
  return { units: [routed, ...clones], effective: true, detail: `${copies} duplicate(s)` };
};

// ─── Modification ─────────────────────────────────────────────────────────────

// transactionId, connectorId and the like are not measurements
const IDENTIFIER_KEY = /Id$/;

const modify: AnomalyTransform = (routed, event) => {
  const factor = 1 - event.severity;
  const { unit } = routed;
  let changed = false;

  let next: ProtocolUnit;
  if (unit.protocol === 'bus') {
    const payload = Uint8Array.from(unit.payload, (b) => Math.floor(b * factor));
    changed = payload.some((b, i) => b !== unit.payload[i]);
    next = { ...unit, payload };
  } else {
    const scaled = mapFields(fieldsOf(unit) ?? {}, (key, value) => {
      if (typeof value !== 'number' || value === 0 || IDENTIFIER_KEY.test(key)) return value;
      const scaledValue = value * factor;
      if (scaledValue !== value) changed = true;
      return scaledValue;
    });
    next = withFields(unit, scaled);
  }

  if (!changed) return unchanged(routed, 'no measurement to scale');
  return {
    units: [touched(routed, event.kind, { unit: next })],
    effective: true,
    detail: `measurements scaled by ${factor.toFixed(2)}`,
  };
};

// ─── Spoofing, replay ─────────────────────────────────────────────────────────

function forge(unit: ProtocolUnit, rng: RandomSource, identity: string): ProtocolUnit {
  switch (unit.protocol) {
    case 'bus':
      return busFrame(unit.identifier, randomBytes(rng, unit.payload.length));
    case 'control':
      return {
        ...unit,
        messageId: `spoof-${unit.messageId}`,
        payload: { ...unit.payload, chargePointId: identity },
      };
    case 'session':
      return { ...unit, fields: { ...unit.fields, sessionId: identity, evccId: identity } };
  }
}

const spoof: AnomalyTransform = (routed, event, ctx) => {
  const forged = forge(routed.unit, ctx.rng, ctx.limits.spoofIdentity);
  return {
    units: [routed, synthesized(forged, routed.deliverAtMs, event.kind)],
    effective: true,
    detail: `forged ${routed.unit.protocol} unit as ${ctx.limits.spoofIdentity}`,
  };
};

const replay: AnomalyTransform = (routed, event, ctx) => {
  if (ctx.history.length === 0) return unchanged(routed, 'nothing captured yet');
  const captured = ctx.history[ctx.rng.nextInt(0, ctx.history.length - 1)];
  if (captured === undefined) return unchanged(routed, 'nothing captured yet');
  const delayMs = Math.round(event.severity * ctx.limits.maxDelayMs);
  return {
    units: [routed, synthesized(cloneUnit(captured), ctx.nowMs + delayMs, event.kind)],
    effective: true,
    detail: `replayed a captured unit after ${delayMs} ms`,
  };
};

// ─── Denial of service ────────────────────────────────────────────────────────

function floodUnit(unit: ProtocolUnit, rng: RandomSource, messageId: string): ProtocolUnit {
  switch (unit.protocol) {
    case 'bus':
      return busFrame(rng.nextInt(0, MAX_STANDARD_ID), randomBytes(rng, MAX_FRAME_BYTES));
    case 'control':
      return { protocol: 'control', messageType: 'CALL', messageId, action: 'Heartbeat', payload: {} };
    case 'session':
      return {
        protocol: 'session',
        messageType: 'ChargingStatusReq',
        fields: { requestedPower: rng.nextInt(0, 350_000) },
      };
  }
}

const flood: AnomalyTransform = (routed, event, ctx) => {
  const count = Math.max(1, Math.round(event.severity * ctx.limits.floodBurstSize));
  const burst = Array.from({ length: count }, (_, i) =>
    synthesized(floodUnit(routed.unit, ctx.rng, `flood-${ctx.nowMs}-${i}`), routed.deliverAtMs, event.kind),
  );
  const keep = ctx.limits.dosMode === 'flood';
  return {
    units: keep ? [routed, ...burst] : burst,
    effective: true,
    detail: keep ? `${count} flood unit(s)` : `${count} flood unit(s), original dropped`,
  };
};

// ─── State machine, physical ──────────────────────────────────────────────────

// The orchestrator counts the effect when it acts on the attached seed.
const forceTransition: AnomalyTransform = (routed, event, ctx) => ({
  units: [touched(routed, event.kind, { forcedTransition: { seed: ctx.rng.nextInt(0, 0x7fffffff), eventId: event.id } })],
  effective: false,
  detail: 'forced transition attached',
});

// Raises contact resistance in the orchestrator; protocol units are untouched.
const powerFault: AnomalyTransform = (routed) => unchanged(routed, 'physical-layer fault');

export const ANOMALY_TRANSFORMS: Readonly<Record<AnomalyKind, AnomalyTransform>> = {
  frame_injection: injectFrames,
  frame_fuzzing: fuzz,
  message_delay: delay,
  message_duplication: duplicate,
  message_modification: modify,
  spoofing: spoof,
  replay_attack: replay,
  denial_of_service: flood,
  timing_attack: jitter,
  invalid_state_transition: forceTransition,
  power_anomaly: powerFault,
};

import type {
  AnomalyKind,
  BusFrame,
  FieldMap,
  FieldValue,
  ProtocolUnit,
  RandomSource,
  RoutedUnit,
} from '@evsim/domain';

export function cloneUnit(unit: ProtocolUnit): ProtocolUnit {
  switch (unit.protocol) {
    case 'bus':
      return { ...unit, payload: unit.payload.slice() };
    case 'control':
      return { ...unit, payload: { ...unit.payload } };
    case 'session':
      return { ...unit, fields: { ...unit.fields } };
  }
}

export function randomBytes(rng: RandomSource, count: number): Uint8Array {
  return Uint8Array.from({ length: count }, () => rng.nextInt(0, 0xff));
}

export function busFrame(identifier: number, payload: Uint8Array, length = payload.length): BusFrame {
  return { protocol: 'bus', identifier, payload, length };
}

/** `count` distinct indices out of [0, length), ascending. */
export function pickIndices(rng: RandomSource, length: number, count: number): number[] {
  const pool = Array.from({ length }, (_, i) => i);
  const take = Math.min(count, length);
  for (let i = 0; i < take; i++) {
    const j = rng.nextInt(i, length - 1);
    const held = pool[i];
    const swap = pool[j];
    if (held === undefined || swap === undefined) continue;
    pool[i] = swap;
    pool[j] = held;
  }
  return pool.slice(0, take).sort((a, b) => a - b);
}

export function fieldsOf(unit: ProtocolUnit): FieldMap | null {
  switch (unit.protocol) {
    case 'bus':
      return null;
    case 'control':
      return unit.payload;
    case 'session':
      return unit.fields;
  }
}

/** Replaces the field map of a control or session unit; bus frames pass through. */
export function withFields(unit: ProtocolUnit, fields: FieldMap): ProtocolUnit {
  switch (unit.protocol) {
    case 'bus':
      return unit;
    case 'control':
      return { ...unit, payload: fields };
    case 'session':
      return { ...unit, fields };
  }
}

export function mapFields(fields: FieldMap, fn: (key: string, value: FieldValue) => FieldValue): FieldMap {
  const out: Record<string, FieldValue> = {};
  for (const key of Object.keys(fields).sort()) {
    const value = fields[key];
    if (value !== undefined) out[key] = fn(key, value);
  }
  return out;
}

export function touched(routed: RoutedUnit, kind: AnomalyKind, patch: Partial<RoutedUnit> = {}): RoutedUnit {
  return { ...routed, ...patch, tags: [...routed.tags, kind] };
}

export function synthesized(unit: ProtocolUnit, deliverAtMs: number, kind: AnomalyKind): RoutedUnit {
  return { unit, origin: 'synthesized', deliverAtMs, outOfOrder: false, tags: [kind] };
}

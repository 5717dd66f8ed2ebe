import type { AnomalyKind } from './anomaly.js';

export type ProtocolName = 'bus' | 'control' | 'session';

/** Fixed service order within a tick. */
export const PROTOCOL_ORDER: readonly ProtocolName[] = ['bus', 'control', 'session'];

export type FieldValue = string | number | boolean | null;
export type FieldMap = Readonly<Record<string, FieldValue>>;

// ─── Vehicle bus ──────────────────────────────────────────────────────────────

export interface BusFrame {
  readonly protocol: 'bus';
  readonly identifier: number; // 11-bit on a well-formed frame
  readonly payload: Uint8Array; // at most 8 bytes
  readonly length: number;
}

// ─── Charge-point control protocol ────────────────────────────────────────────

export type ControlMessageType = 'CALL' | 'CALL_RESULT' | 'CALL_ERROR';

export type ControlAction =
  | 'BootNotification'
  | 'Heartbeat'
  | 'MeterValues'
  | 'StatusNotification'
  | 'StartTransaction'
  | 'StopTransaction'
  | 'Authorize';

export interface ControlMessage {
  readonly protocol: 'control';
  readonly messageType: ControlMessageType;
  readonly messageId: string;
  readonly action: string;
  readonly payload: FieldMap;
}

// ─── Vehicle-to-grid session protocol ─────────────────────────────────────────

export type SessionMessageType =
  | 'DiscoveryReq'
  | 'DiscoveryRes'
  | 'ServiceDiscoveryReq'
  | 'ServiceDiscoveryRes'
  | 'SessionStartReq'
  | 'SessionStartRes'
  | 'ChargingStatusReq'
  | 'ChargingStatusRes'
  | 'PowerDeliveryReq'
  | 'PowerDeliveryRes'
  | 'SessionStopReq'
  | 'SessionStopRes'
  | 'ErrorRes'
  | 'UnknownReq';

export interface SessionMessage {
  readonly protocol: 'session';
  readonly messageType: SessionMessageType;
  readonly fields: FieldMap;
}

export type ProtocolUnit = BusFrame | ControlMessage | SessionMessage;

export type UnitOrigin = 'legitimate' | 'synthesized';

export interface ForcedTransition {
  readonly seed: number;
  readonly eventId: string;
}

/** A unit on its way through the injector, with its delivery schedule. */
export interface RoutedUnit {
  readonly unit: ProtocolUnit;
  readonly origin: UnitOrigin;
  readonly deliverAtMs: number;
  readonly outOfOrder: boolean;
  readonly tags: readonly AnomalyKind[];
  readonly forcedTransition?: ForcedTransition;
}

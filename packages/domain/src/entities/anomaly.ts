import type { ProtocolName } from './protocol-unit.js';

export type AnomalyKind =
  | 'frame_injection'
  | 'frame_fuzzing'
  | 'message_delay'
  | 'message_duplication'
  | 'message_modification'
  | 'spoofing'
  | 'replay_attack'
  | 'denial_of_service'
  | 'timing_attack'
  | 'invalid_state_transition'
  | 'power_anomaly';

export const ANOMALY_KINDS: readonly AnomalyKind[] = [
  'frame_injection',
  'frame_fuzzing',
  'message_delay',
  'message_duplication',
  'message_modification',
  'spoofing',
  'replay_attack',
  'denial_of_service',
  'timing_attack',
  'invalid_state_transition',
  'power_anomaly',
];

export type TargetProtocol = ProtocolName | 'all';

export const TARGET_PROTOCOLS: readonly TargetProtocol[] = ['bus', 'control', 'session', 'all'];

export const AnomalySeverity = {
  LOW: 0.1,
  MEDIUM: 0.5,
  HIGH: 0.9,
} as const;

export type SeverityPreset = keyof typeof AnomalySeverity;

export interface AnomalyEvent {
  readonly id: string; // <kind>_<sequence>
  readonly kind: AnomalyKind;
  readonly targetProtocol: TargetProtocol;
  readonly severity: number; // 0..1
  readonly createdAtMs: number; // simulated clock
  readonly description: string;
}

/** Where an effect landed: one of the protocols, or the connector itself. */
export type EffectChannel = ProtocolName | 'physical';

/** One observed change an active event made. */
export interface AnomalyEffect {
  readonly eventId: string;
  readonly kind: AnomalyKind;
  readonly channel: EffectChannel;
  readonly detail: string;
}

export interface AnomalyInjectorStatistics {
  readonly totalInjected: number;
  readonly activeCount: number;
  readonly injectedByKind: Readonly<Record<AnomalyKind, number>>;
}

export function isAnomalyKind(value: string): value is AnomalyKind {
  return ANOMALY_KINDS.some((kind) => kind === value);
}

export function emptyKindCounts(): Record<AnomalyKind, number> {
  return {
    frame_injection: 0,
    frame_fuzzing: 0,
    message_delay: 0,
    message_duplication: 0,
    message_modification: 0,
    spoofing: 0,
    replay_attack: 0,
    denial_of_service: 0,
    timing_attack: 0,
    invalid_state_transition: 0,
    power_anomaly: 0,
  };
}

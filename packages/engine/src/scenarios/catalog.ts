import { AnomalySeverity, type AttackScenario } from '@evsim/domain';
import { defineScenario } from './attack-scenario.js';

const { MEDIUM, HIGH } = AnomalySeverity;

export const ATTACK_SCENARIOS: readonly AttackScenario[] = Object.freeze([
  defineScenario({
    id: 'dos-flood',
    name: 'Denial of service',
    description: 'Floods the vehicle bus, then the control channel, with bursts of traffic.',
    durationSeconds: 30,
    steps: [
      { offsetSeconds: 0, kind: 'denial_of_service', targetProtocol: 'bus', severity: HIGH },
      { offsetSeconds: 2, kind: 'denial_of_service', targetProtocol: 'control', severity: MEDIUM },
    ],
  }),
  defineScenario({
    id: 'replay',
    name: 'Replay attack',
    description: 'Forges control traffic, then replays captured control and session messages.',
    durationSeconds: 30,
    steps: [
      { offsetSeconds: 0, kind: 'spoofing', targetProtocol: 'control', severity: MEDIUM },
      { offsetSeconds: 2, kind: 'replay_attack', targetProtocol: 'control', severity: MEDIUM },
      { offsetSeconds: 5, kind: 'replay_attack', targetProtocol: 'session', severity: MEDIUM },
    ],
  }),
  defineScenario({
    id: 'spoofing',
    name: 'Identity spoofing',
    description: 'Impersonates bus nodes and the charge point towards the central system.',
    durationSeconds: 30,
    steps: [
      { offsetSeconds: 0, kind: 'spoofing', targetProtocol: 'bus', severity: HIGH },
      { offsetSeconds: 1, kind: 'spoofing', targetProtocol: 'control', severity: HIGH },
    ],
  }),
  defineScenario({
    id: 'frame-injection',
    name: 'Bus frame injection',
    description: 'Injects malformed frames onto the vehicle bus and fuzzes legitimate ones.',
    durationSeconds: 20,
    steps: [
      { offsetSeconds: 0, kind: 'frame_injection', targetProtocol: 'bus', severity: HIGH },
      { offsetSeconds: 1, kind: 'frame_fuzzing', targetProtocol: 'bus', severity: HIGH },
    ],
  }),
  defineScenario({
    id: 'thermal-runaway',
    name: 'Thermal runaway',
    description: 'Degrades the connector contact until the session derates or trips.',
    steps: [{ offsetSeconds: 5, kind: 'power_anomaly', targetProtocol: 'all', severity: HIGH }],
  }),
]);

export function findScenario(id: string): AttackScenario | undefined {
  return ATTACK_SCENARIOS.find((s) => s.id === id);
}

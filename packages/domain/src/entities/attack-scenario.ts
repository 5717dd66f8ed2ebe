import type { AnomalyKind, TargetProtocol } from './anomaly.js';

export interface AttackScenarioStep {
  readonly offsetSeconds: number;
  readonly kind: AnomalyKind;
  readonly targetProtocol: TargetProtocol;
  readonly severity: number;
}

/**
 * Named, timed sequence of anomaly injections. Immutable once defined; the
 * same template can be executed any number of times.
 */
export interface AttackScenario {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  /** Events injected by the scenario are removed once this much time has passed. */
  readonly durationSeconds?: number;
  readonly steps: readonly AttackScenarioStep[];
}

import {
  ANOMALY_KINDS,
  InvalidParameterError,
  TARGET_PROTOCOLS,
  type AnomalyEvent,
  type AttackScenario,
  type AttackScenarioStep,
  type ClockPort,
  type LoggerPort,
} from '@evsim/domain';
import { silentLogger } from '@evsim/adapters';
import type { AnomalyInjector } from '../anomalies/anomaly-injector.js';

export type ScenarioInjector = Pick<AnomalyInjector, 'inject' | 'remove'>;

/** Validates a scenario template and freezes it, steps included. */
export function defineScenario(input: AttackScenario): AttackScenario {
  const problems: string[] = [];
  if (input.id.trim() === '') problems.push('id must not be empty');
  if (input.durationSeconds !== undefined && !(input.durationSeconds > 0)) {
    problems.push('durationSeconds must be positive');
  }

  let previousOffset = 0;
  input.steps.forEach((step, i) => {
    if (!Number.isFinite(step.offsetSeconds) || step.offsetSeconds < previousOffset) {
      problems.push(`steps[${i}].offsetSeconds must be non-negative and non-decreasing`);
    }
    if (!Number.isFinite(step.severity) || step.severity < 0 || step.severity > 1) {
      problems.push(`steps[${i}].severity must be within [0, 1]`);
    }
    if (!ANOMALY_KINDS.includes(step.kind)) problems.push(`steps[${i}].kind is not a known anomaly`);
    if (!TARGET_PROTOCOLS.includes(step.targetProtocol)) problems.push(`steps[${i}].targetProtocol is not known`);
    if (input.durationSeconds !== undefined && step.offsetSeconds > input.durationSeconds) {
      problems.push(`steps[${i}] starts after the scenario ends`);
    }
    previousOffset = Math.max(previousOffset, step.offsetSeconds);
  });

  if (problems.length > 0) {
    throw new InvalidParameterError(`Invalid attack scenario ${input.id}`, problems);
  }

  const steps: readonly AttackScenarioStep[] = Object.freeze(input.steps.map((step) => Object.freeze({ ...step })));
  return Object.freeze({ ...input, steps });
}

/**
 * Plays a scenario against an injector on the simulated clock. Each step
 * waits until its offset from the moment execution began, then injects.
 * With a duration, the injected events are removed once it has passed.
 * Stops early, without injecting, once `isLive` turns false.
 */
export async function executeScenario(
  scenario: AttackScenario,
  injector: ScenarioInjector,
  clock: Pick<ClockPort, 'nowMs' | 'waitUntil'>,
  logger: LoggerPort = silentLogger,
  isLive: () => boolean = () => true,
): Promise<AnomalyEvent[]> {
  const startMs = clock.nowMs();
  const injected: AnomalyEvent[] = [];
  logger.info(`Scenario ${scenario.id} started`, { steps: scenario.steps.length });

  for (const step of scenario.steps) {
    await clock.waitUntil(startMs + step.offsetSeconds * 1_000);
    if (!isLive()) {
      logger.info(`Scenario ${scenario.id} cut short after ${injected.length} step(s)`);
      return injected;
    }
    injected.push(injector.inject(step.kind, step.targetProtocol, step.severity));
  }

  if (scenario.durationSeconds !== undefined) {
    await clock.waitUntil(startMs + scenario.durationSeconds * 1_000);
    for (const event of injected) injector.remove(event.id);
    logger.info(`Scenario ${scenario.id} completed`);
  }
  return injected;
}

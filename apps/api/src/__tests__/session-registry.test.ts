import { jest, describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { SessionNotFoundError } from '@evsim/domain';
import { findScenario } from '@evsim/engine';
import { SessionRegistry } from '../services/session-registry.js';

const previousLogLevel = process.env['LOG_LEVEL'];

beforeAll(() => {
  process.env['LOG_LEVEL'] = 'silent';
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterAll(() => {
  if (previousLogLevel === undefined) delete process.env['LOG_LEVEL'];
  else process.env['LOG_LEVEL'] = previousLogLevel;
  jest.restoreAllMocks();
});

describe('SessionRegistry', () => {
  it('evicts the oldest finished sessions beyond the limit', async () => {
    const registry = new SessionRegistry({}, undefined, 1);
    const first = registry.create({ durationSeconds: 2, speedFactor: 0 });
    const second = registry.create({ durationSeconds: 2, speedFactor: 0 });
    await Promise.all([first.completion, second.completion]);

    const third = registry.create({ durationSeconds: 2, speedFactor: 0 });
    expect(() => registry.get(first.id)).toThrow(SessionNotFoundError);
    expect(registry.get(second.id)).toBe(second);
    expect(registry.size).toBe(2);
    await third.completion;
  });

  it('never evicts a running session', async () => {
    const registry = new SessionRegistry({}, undefined, 0);
    const running = registry.create({ durationSeconds: 3_600, speedFactor: 0 });
    const next = registry.create({ durationSeconds: 3_600, speedFactor: 0 });
    expect(registry.get(running.id)).toBe(running);
    expect(registry.size).toBe(2);

    running.orchestrator.stop();
    next.orchestrator.stop();
    await Promise.all([running.completion, next.completion]);
  });

  it('releases a scenario still waiting when its session ends', async () => {
    const registry = new SessionRegistry();
    const scenario = findScenario('dos-flood');
    if (!scenario) throw new Error('dos-flood missing from catalogue');

    const session = registry.create({ durationSeconds: 3_600, speedFactor: 0 });
    const run = session.orchestrator.runScenario(scenario);
    expect(session.orchestrator.stop()).toBe(true);

    const summary = await session.completion;
    expect(summary?.reason).toBe('stop_requested');
    const events = await run;
    expect(events.map((e) => e.id)).toEqual(['denial_of_service_0']);
  });
});

import { describe, it, expect, jest } from '@jest/globals';
import { Response } from 'undici';
import { InvalidParameterError } from '@evsim/domain';
import { silentLogger } from '@evsim/adapters';
import { ApiRequestError, SimulatorApiClient, type FetchLike } from '../api-client.js';
import { parseArgs, runCommand, runLocalSimulation } from '../commands.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Argument parsing
// ═══════════════════════════════════════════════════════════════════════════════

describe('parseArgs', () => {
  it('parses a local simulation with defaults', () => {
    expect(parseArgs(['simulate'])).toEqual({
      command: 'simulate',
      durationSeconds: 60,
      anomalyKinds: [],
      target: 'all',
    });
  });

  it('parses anomaly lists, presets and numbers', () => {
    const cmd = parseArgs([
      'simulate',
      '--duration',
      '120',
      '--anomaly',
      'power_anomaly, spoofing',
      '--severity',
      'HIGH',
      '--target',
      'control',
      '--seed',
      '7',
    ]);
    expect(cmd).toEqual({
      command: 'simulate',
      durationSeconds: 120,
      anomalyKinds: ['power_anomaly', 'spoofing'],
      severity: 0.9,
      target: 'control',
      seed: 7,
    });
  });

  it('accepts a numeric severity', () => {
    const cmd = parseArgs(['inject', 'abc', 'message_delay', '--severity', '0.25']);
    expect(cmd).toEqual({
      command: 'inject',
      sessionId: 'abc',
      kind: 'message_delay',
      target: 'all',
      severity: 0.25,
    });
  });

  it('defaults an injection to medium severity', () => {
    const cmd = parseArgs(['inject', 'abc', 'spoofing']);
    expect(cmd.command === 'inject' && cmd.severity).toBe(0.5);
  });

  it('rejects unknown commands and kinds', () => {
    expect(() => parseArgs(['explode'])).toThrow(InvalidParameterError);
    expect(() => parseArgs([])).toThrow(InvalidParameterError);
    expect(() => parseArgs(['simulate', '--anomaly', 'meltdown'])).toThrow(InvalidParameterError);
    expect(() => parseArgs(['show'])).toThrow(InvalidParameterError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Local simulation
// ═══════════════════════════════════════════════════════════════════════════════

describe('runLocalSimulation', () => {
  it('reports a clean session', async () => {
    const cmd = parseArgs(['simulate', '--duration', '10']);
    if (cmd.command !== 'simulate') throw new Error('expected a simulate command');
    const result = await runLocalSimulation(cmd, silentLogger);

    expect(result.finalState).toBe('stopped');
    expect(result.reason).toBe('duration_elapsed');
    expect(result.report.ticks).toBe(9);
    expect(result.report.messages['control_sent']).toBe(12);
    expect(result.messagesSent).toBe(11 + 12 + 12);
    expect(result.energyAudit.isAnomaly).toBe(false);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Remote commands
// ═══════════════════════════════════════════════════════════════════════════════

describe('runCommand against the API', () => {
  it('posts an injection', async () => {
    const fetchImpl = jest.fn<FetchLike>().mockResolvedValue(jsonResponse({ id: 'spoofing_0' }, 201));
    const client = new SimulatorApiClient('http://sim.test', fetchImpl);

    const output = await runCommand(parseArgs(['inject', 's-1', 'spoofing', '--target', 'bus']), {
      client,
      logger: silentLogger,
    });

    expect(output).toEqual({ id: 'spoofing_0' });
    expect(fetchImpl).toHaveBeenCalledWith('http://sim.test/api/sessions/s-1/anomalies', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ kind: 'spoofing', targetProtocol: 'bus', severity: 0.5 }),
    });
  });

  it('runs a scenario without a body', async () => {
    const fetchImpl = jest.fn<FetchLike>().mockResolvedValue(jsonResponse({ steps: 2 }, 202));
    const client = new SimulatorApiClient('http://sim.test', fetchImpl);

    await runCommand(parseArgs(['scenario', 's-1', 'dos-flood']), { client, logger: silentLogger });
    expect(fetchImpl).toHaveBeenCalledWith('http://sim.test/api/sessions/s-1/scenarios/dos-flood/run', {
      method: 'POST',
      headers: undefined,
      body: undefined,
    });
  });

  it('surfaces API errors', async () => {
    const fetchImpl = jest.fn<FetchLike>().mockResolvedValue(jsonResponse({ error: 'Session s-9 not found' }, 404));
    const client = new SimulatorApiClient('http://sim.test', fetchImpl);

    const attempt = client.getSession('s-9');
    await expect(attempt).rejects.toThrow(ApiRequestError);
    await expect(attempt).rejects.toMatchObject({ status: 404, message: 'Session s-9 not found' });
  });
});

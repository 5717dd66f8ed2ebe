/**
 * Domain entity tests: the session state machine table, anomaly catalogue
 * helpers and error classes.
 */

import { describe, it, expect } from '@jest/globals';

import {
  ALLOWED_TRANSITIONS,
  ANOMALY_KINDS,
  AnomalySeverity,
  InvalidParameterError,
  PROTOCOL_ORDER,
  ProtocolAdapterError,
  SESSION_STATES,
  SessionClosedError,
  SessionNotFoundError,
  SimulatorError,
  describeError,
  emptyKindCounts,
  isAllowedTransition,
  isAnomalyKind,
  isChargingState,
  isTerminalState,
} from '../index.js';
import type { SessionState } from '../index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// Session state machine
// ═══════════════════════════════════════════════════════════════════════════════

describe('session state machine', () => {
  it('has an entry for every state', () => {
    expect(Object.keys(ALLOWED_TRANSITIONS).sort()).toEqual([...SESSION_STATES].sort());
  });

  it.each<[SessionState, SessionState]>([
    ['idle', 'connecting'],
    ['connecting', 'charging'],
    ['connecting', 'faulted'],
    ['charging', 'derating'],
    ['charging', 'stopping'],
    ['derating', 'charging'],
    ['derating', 'faulted'],
    ['stopping', 'stopped'],
  ])('allows %s -> %s', (from, to) => {
    expect(isAllowedTransition(from, to)).toBe(true);
  });

  it.each<[SessionState, SessionState]>([
    ['idle', 'charging'],
    ['charging', 'stopped'],
    ['charging', 'idle'],
    ['stopping', 'charging'],
    ['stopped', 'charging'],
    ['faulted', 'connecting'],
  ])('rejects %s -> %s', (from, to) => {
    expect(isAllowedTransition(from, to)).toBe(false);
  });

  it('treats stopped and faulted as terminal', () => {
    expect(SESSION_STATES.filter(isTerminalState)).toEqual(['stopped', 'faulted']);
    expect(ALLOWED_TRANSITIONS.stopped).toHaveLength(0);
    expect(ALLOWED_TRANSITIONS.faulted).toHaveLength(0);
  });

  it('only charging and derating carry current', () => {
    expect(SESSION_STATES.filter(isChargingState)).toEqual(['charging', 'derating']);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Anomalies
// ═══════════════════════════════════════════════════════════════════════════════

describe('anomaly catalogue', () => {
  it('lists eleven distinct kinds', () => {
    expect(ANOMALY_KINDS).toHaveLength(11);
    expect(new Set(ANOMALY_KINDS).size).toBe(11);
  });

  it('recognises kinds by name', () => {
    expect(isAnomalyKind('spoofing')).toBe(true);
    expect(isAnomalyKind('Spoofing')).toBe(false);
    expect(isAnomalyKind('meltdown')).toBe(false);
  });

  it('starts every kind count at zero', () => {
    const counts = emptyKindCounts();
    expect(Object.keys(counts).sort()).toEqual([...ANOMALY_KINDS].sort());
    expect(Object.values(counts).every((n) => n === 0)).toBe(true);
  });

  it('severity presets are ordered within [0, 1]', () => {
    expect(AnomalySeverity.LOW).toBe(0.1);
    expect(AnomalySeverity.MEDIUM).toBe(0.5);
    expect(AnomalySeverity.HIGH).toBe(0.9);
  });

  it('fixes the protocol report order', () => {
    expect(PROTOCOL_ORDER).toEqual(['bus', 'control', 'session']);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Errors
// ═══════════════════════════════════════════════════════════════════════════════

describe('errors', () => {
  it('carries an HTTP status and the subclass name', () => {
    const err = new InvalidParameterError('bad input', ['durationSeconds: must be positive']);
    expect(err).toBeInstanceOf(SimulatorError);
    expect(err.status).toBe(400);
    expect(err.name).toBe('InvalidParameterError');
    expect(err.details).toEqual(['durationSeconds: must be positive']);
  });

  it('prefixes adapter errors with the protocol', () => {
    const err = new ProtocolAdapterError('bus', 'negative timeout');
    expect(err.message).toBe('bus adapter: negative timeout');
    expect(err.status).toBe(502);
  });

  it('maps lookup and lifecycle errors to 404 and 409', () => {
    expect(new SessionNotFoundError('abc').status).toBe(404);
    const closed = new SessionClosedError('abc', 'stopped');
    expect(closed.status).toBe(409);
    expect(closed.message).toBe('Session abc is stopped');
  });

  it('describes any thrown value', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
    expect(describeError(7)).toBe('7');
  });
});

import { describe, it, expect } from '@jest/globals';
import { auditEnergy } from '../metering/energy-audit.js';

describe('auditEnergy', () => {
  it('accepts a matching report', () => {
    expect(auditEnergy(100, 100)).toEqual({
      isAnomaly: false,
      riskScore: 0,
      expectedEnergyWh: 100,
      reportedEnergyWh: 100,
      relativeError: 0,
      reason: 'Reported energy consistent with delivered power',
    });
  });

  it('tolerates deviations up to the threshold', () => {
    const result = auditEnergy(100, 110);
    expect(result.isAnomaly).toBe(false);
    expect(result.relativeError).toBeCloseTo(0.1, 10);
  });

  it('scores an under-report from 50 upwards', () => {
    const result = auditEnergy(100, 50);
    expect(result.isAnomaly).toBe(true);
    expect(result.riskScore).toBe(70);
    expect(result.reason).toBe('Reported energy deviates by 50.0% (threshold 15.0%)');
  });

  it('caps the score at 100', () => {
    expect(auditEnergy(100, 0).riskScore).toBe(100);
    expect(auditEnergy(100, 300).riskScore).toBe(100);
  });

  it('honours a custom threshold', () => {
    expect(auditEnergy(100, 70, 0.5).isAnomaly).toBe(false);
  });

  it('treats an idle session with no report as consistent', () => {
    expect(auditEnergy(0, 0).isAnomaly).toBe(false);
  });
});

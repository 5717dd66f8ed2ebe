import type { EnergyAuditResult } from '@evsim/domain';

export const DEFAULT_ENERGY_ERROR_THRESHOLD = 0.15;

const pct = (value: number): string => `${(value * 100).toFixed(1)}%`;

/**
 * Compares the energy the charge point reported for billing with the energy
 * integrated from delivered power. A relative error above `errorThreshold` is
 * an anomaly, scored 50 at the threshold up to 100 at total mismatch.
 */
export function auditEnergy(
  expectedWh: number,
  reportedWh: number,
  errorThreshold = DEFAULT_ENERGY_ERROR_THRESHOLD,
): EnergyAuditResult {
  const expected = Math.max(expectedWh, 0);
  const reported = Math.max(reportedWh, 0);
  const relativeError = Math.abs(reported - expected) / Math.max(expected, 1e-6);

  if (relativeError <= errorThreshold) {
    return {
      isAnomaly: false,
      riskScore: 0,
      expectedEnergyWh: expected,
      reportedEnergyWh: reported,
      relativeError,
      reason: 'Reported energy consistent with delivered power',
    };
  }

  const over = Math.min(Math.max((relativeError - errorThreshold) / (1 - errorThreshold), 0), 1);
  return {
    isAnomaly: true,
    riskScore: Math.trunc(50 + 50 * over),
    expectedEnergyWh: expected,
    reportedEnergyWh: reported,
    relativeError,
    reason: `Reported energy deviates by ${pct(relativeError)} (threshold ${pct(errorThreshold)})`,
  };
}

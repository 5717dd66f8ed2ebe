export type ThermalVerdict = 'normal' | 'derate' | 'critical';

/** Connector physics, fixed for the lifetime of one model. */
export interface ThermalParameters {
  readonly ambientC: number;
  /** Heat loss to ambient per degree above it (W/°C), the inverse of thermal resistance. */
  readonly lossCoefficientWPerC: number;
  /** Effective thermal mass of the contact (J/°C). */
  readonly thermalMassJPerC: number;
  readonly derateThresholdC: number;
  readonly criticalThresholdC: number;
  /** Temperature rise rate that counts as a derate condition on its own. */
  readonly rateWarnCPerS?: number;
  readonly initialTemperatureC?: number;
}

export interface ThermalState {
  readonly temperatureC: number;
  readonly contactResistanceOhm: number;
  readonly appliedCurrentAmp: number;
  readonly elapsedSeconds: number;
  readonly powerLossW: number;
  readonly temperatureRateCPerS: number;
}

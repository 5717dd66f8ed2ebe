import {
  InvalidParameterError,
  type ThermalParameters,
  type ThermalState,
  type ThermalVerdict,
} from '@evsim/domain';

export const DEFAULT_THERMAL_PARAMETERS: ThermalParameters = {
  ambientC: 25,
  lossCoefficientWPerC: 2.5,
  thermalMassJPerC: 120,
  derateThresholdC: 80,
  criticalThresholdC: 100,
  rateWarnCPerS: 0.08,
};

function requireFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) throw new InvalidParameterError(`${name} must be finite, got ${value}`);
}

/**
 * Lumped Joule-heating model of one connector contact.
 *
 *   P     = I² · R
 *   dT/dt = (P - k · (T - T_ambient)) / C
 *
 * integrated with forward Euler. Steps where dt · k / C >= 1 are refused, as
 * the integration would overshoot ambient and stop being monotone in I and R.
 */
export class ThermalModel {
  private temperatureC: number;
  private elapsedSeconds = 0;
  private last: ThermalState;
  private criticalLatched = false;

  constructor(private readonly params: ThermalParameters = DEFAULT_THERMAL_PARAMETERS) {
    requireFinite('ambientC', params.ambientC);
    requireFinite('lossCoefficientWPerC', params.lossCoefficientWPerC);
    requireFinite('thermalMassJPerC', params.thermalMassJPerC);
    requireFinite('derateThresholdC', params.derateThresholdC);
    requireFinite('criticalThresholdC', params.criticalThresholdC);
    if (params.thermalMassJPerC <= 0) throw new InvalidParameterError('thermalMassJPerC must be positive');
    if (params.lossCoefficientWPerC < 0) throw new InvalidParameterError('lossCoefficientWPerC must not be negative');
    if (params.derateThresholdC >= params.criticalThresholdC) {
      throw new InvalidParameterError('derateThresholdC must be below criticalThresholdC');
    }
    if (params.rateWarnCPerS !== undefined && !(params.rateWarnCPerS > 0)) {
      throw new InvalidParameterError('rateWarnCPerS must be positive');
    }

    this.temperatureC = params.initialTemperatureC ?? params.ambientC;
    requireFinite('initialTemperatureC', this.temperatureC);
    this.last = Object.freeze({
      temperatureC: this.temperatureC,
      contactResistanceOhm: 0,
      appliedCurrentAmp: 0,
      elapsedSeconds: 0,
      powerLossW: 0,
      temperatureRateCPerS: 0,
    });
  }

  get parameters(): ThermalParameters {
    return this.params;
  }

  advance(dtSeconds: number, currentAmp: number, resistanceOhm: number): ThermalState {
    requireFinite('dtSeconds', dtSeconds);
    requireFinite('currentAmp', currentAmp);
    requireFinite('resistanceOhm', resistanceOhm);
    if (dtSeconds < 0) throw new InvalidParameterError(`dtSeconds must not be negative, got ${dtSeconds}`);
    if (resistanceOhm < 0) throw new InvalidParameterError(`resistanceOhm must not be negative, got ${resistanceOhm}`);

    const { ambientC, lossCoefficientWPerC: k, thermalMassJPerC: c } = this.params;
    if ((dtSeconds * k) / c >= 1) {
      throw new InvalidParameterError(
        `Time step of ${dtSeconds}s is too coarse for a contact with k=${k} W/°C and C=${c} J/°C`,
      );
    }

    const powerLossW = currentAmp * currentAmp * resistanceOhm;
    const rate = (powerLossW - k * (this.temperatureC - ambientC)) / c;
    this.temperatureC += rate * dtSeconds;
    this.elapsedSeconds += dtSeconds;

    if (this.classify(this.temperatureC) === 'critical') this.criticalLatched = true;

    this.last = Object.freeze({
      temperatureC: this.temperatureC,
      contactResistanceOhm: resistanceOhm,
      appliedCurrentAmp: currentAmp,
      elapsedSeconds: this.elapsedSeconds,
      powerLossW,
      temperatureRateCPerS: rate,
    });
    return this.last;
  }

  classify(temperatureC: number): ThermalVerdict {
    if (temperatureC >= this.params.criticalThresholdC) return 'critical';
    if (temperatureC >= this.params.derateThresholdC) return 'derate';
    return 'normal';
  }

  /** Verdict for the current state. Once critical, always critical. */
  verdict(): ThermalVerdict {
    if (this.criticalLatched) return 'critical';
    const verdict = this.classify(this.temperatureC);
    const warnRate = this.params.rateWarnCPerS;
    if (verdict === 'normal' && warnRate !== undefined && this.last.temperatureRateCPerS > warnRate) {
      return 'derate';
    }
    return verdict;
  }

  snapshot(): ThermalState {
    return this.last;
  }
}

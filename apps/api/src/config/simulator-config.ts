import { InvalidParameterError } from '@evsim/domain';
import type { SessionConfigInput } from '@evsim/engine';

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new InvalidParameterError(`${name} must be a number, got "${raw}"`);
  return value;
}

function readDosMode(env: Env): 'flood' | 'drop' | undefined {
  const raw = env['SIM_DOS_MODE'];
  switch (raw) {
    case undefined:
    case '':
      return undefined;
    case 'flood':
    case 'drop':
      return raw;
    default:
      throw new InvalidParameterError(`SIM_DOS_MODE must be "flood" or "drop", got "${raw}"`);
  }
}

/**
 * Session defaults taken from the environment. Anything unset falls back to
 * the engine's own defaults when the session config is parsed.
 */
export function sessionDefaultsFromEnv(env: Env = process.env): SessionConfigInput {
  return {
    tickIntervalMs: readNumber(env, 'SIM_TICK_INTERVAL_MS'),
    nominalCurrentAmp: readNumber(env, 'SIM_NOMINAL_CURRENT_A'),
    contactResistanceOhm: readNumber(env, 'SIM_CONTACT_RESISTANCE_OHM'),
    faultResistanceOhm: readNumber(env, 'SIM_FAULT_RESISTANCE_OHM'),
    seed: readNumber(env, 'SIM_SEED'),
    thermal: {
      ambientC: readNumber(env, 'SIM_AMBIENT_C'),
      derateThresholdC: readNumber(env, 'SIM_DERATE_C'),
      criticalThresholdC: readNumber(env, 'SIM_CRITICAL_C'),
    },
    injector: {
      dosMode: readDosMode(env),
      floodBurstSize: readNumber(env, 'SIM_FLOOD_BURST'),
    },
    identity: {
      chargePointId: env['SIM_CHARGE_POINT_ID'],
    },
  };
}

export interface ApiConfig {
  port: number;
  corsOrigin: string;
  /** Finished sessions kept for inspection; older ones are evicted. */
  maxFinishedSessions: number;
}

export function apiConfigFromEnv(env: Env = process.env): ApiConfig {
  return {
    port: readNumber(env, 'PORT') ?? 3001,
    corsOrigin: env['CORS_ORIGIN'] ?? '*',
    maxFinishedSessions: readNumber(env, 'MAX_FINISHED_SESSIONS') ?? 100,
  };
}

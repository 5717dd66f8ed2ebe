import type {
  BusAdapterPort,
  ControlAdapterPort,
  LoggerPort,
  RandomSource,
  SessionAdapterPort,
  SessionEventPublisherPort,
} from '@evsim/domain';
import {
  ChargePointControlAdapter,
  SeededRng,
  SimulationClock,
  VehicleSessionAdapter,
  VirtualBusAdapter,
  silentLogger,
} from '@evsim/adapters';
import { parseSessionConfig, type SessionConfig, type SessionConfigInput } from '../config/session-config.js';
import { AnomalyInjector } from '../anomalies/anomaly-injector.js';
import { SessionOrchestrator } from './session-orchestrator.js';

export interface ChargingSessionOverrides {
  id?: string;
  clock?: SimulationClock;
  rng?: RandomSource;
  bus?: BusAdapterPort;
  control?: ControlAdapterPort;
  session?: SessionAdapterPort;
  logger?: LoggerPort;
  publisher?: SessionEventPublisherPort;
  pace?: (tickIntervalMs: number) => Promise<void>;
}

/** Wires a session on the simulated adapters, seeded from the configuration. */
export function createChargingSession(
  input: SessionConfigInput | SessionConfig = {},
  overrides: ChargingSessionOverrides = {},
): SessionOrchestrator {
  const config = parseSessionConfig(input);
  const clock = overrides.clock ?? new SimulationClock();
  const logger = overrides.logger ?? silentLogger;
  const injector = new AnomalyInjector(overrides.rng ?? new SeededRng(config.seed), clock, config.injector, logger);

  return new SessionOrchestrator({
    id: overrides.id,
    config,
    clock,
    injector,
    logger,
    publisher: overrides.publisher,
    pace: overrides.pace,
    bus: overrides.bus ?? new VirtualBusAdapter(),
    control: overrides.control ?? new ChargePointControlAdapter({ now: () => clock.nowMs() }),
    session:
      overrides.session ??
      new VehicleSessionAdapter({ maxCurrentAcA: config.nominalCurrentAmp }),
  });
}

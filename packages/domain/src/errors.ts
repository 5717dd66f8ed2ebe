import type { ProtocolName } from './entities/protocol-unit.js';

/** Base class for every error the simulator raises on purpose. */
export class SimulatorError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad configuration or physical input. Raised before a session starts. */
export class InvalidParameterError extends SimulatorError {
  constructor(
    message: string,
    readonly details: readonly string[] = [],
  ) {
    super(message, 400);
  }
}

export class ProtocolAdapterError extends SimulatorError {
  constructor(
    readonly protocol: ProtocolName,
    message: string,
  ) {
    super(`${protocol} adapter: ${message}`, 502);
  }
}

export class SessionNotFoundError extends SimulatorError {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} not found`, 404);
  }
}

export class ScenarioNotFoundError extends SimulatorError {
  constructor(readonly scenarioId: string) {
    super(`Scenario ${scenarioId} not found`, 404);
  }
}

/** The session exists but is past the point where it accepts the command. */
export class SessionClosedError extends SimulatorError {
  constructor(sessionId: string, state: string) {
    super(`Session ${sessionId} is ${state}`, 409);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

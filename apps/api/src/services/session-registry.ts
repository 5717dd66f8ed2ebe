import { v4 as uuidv4 } from 'uuid';
import {
  SessionNotFoundError,
  describeError,
  isTerminalState,
  type SessionEventPublisherPort,
  type SessionSummary,
  type SimulateSessionOptions,
} from '@evsim/domain';
import { createConsoleLogger } from '@evsim/adapters';
import {
  createChargingSession,
  mergeSessionConfig,
  parseSessionConfig,
  validateSimulateOptions,
  type SessionConfigInput,
  type SessionOrchestrator,
} from '@evsim/engine';
import { setTimeout as sleep } from 'timers/promises';

export interface CreateSessionOptions extends SimulateSessionOptions {
  /** Simulated seconds per wall-clock second; 0 runs as fast as possible. */
  speedFactor: number;
  config?: SessionConfigInput;
}

export interface ManagedSession {
  readonly id: string;
  readonly createdAt: Date;
  readonly speedFactor: number;
  readonly orchestrator: SessionOrchestrator;
  /** Settles when the session run ends; never rejects. */
  readonly completion: Promise<SessionSummary | null>;
  summary: SessionSummary | null;
  error: string | null;
}

function pacer(speedFactor: number): ((tickIntervalMs: number) => Promise<void>) | undefined {
  if (speedFactor <= 0) return undefined;
  return async (tickIntervalMs) => {
    await sleep(tickIntervalMs / speedFactor);
  };
}

let _instance: SessionRegistry | null = null;

/** In-memory home of every session the API has started. */
export class SessionRegistry {
  private readonly sessions = new Map<string, ManagedSession>();

  constructor(
    private readonly defaults: SessionConfigInput = {},
    private readonly publisher?: SessionEventPublisherPort,
    private readonly maxFinishedSessions = 100,
  ) {}

  static getInstance(): SessionRegistry | null {
    return _instance;
  }

  static init(
    defaults: SessionConfigInput = {},
    publisher?: SessionEventPublisherPort,
    maxFinishedSessions?: number,
  ): SessionRegistry {
    _instance = new SessionRegistry(defaults, publisher, maxFinishedSessions);
    return _instance;
  }

  create(opts: CreateSessionOptions): ManagedSession {
    validateSimulateOptions(opts);
    const config = parseSessionConfig(mergeSessionConfig(this.defaults, opts.config));

    this.evictFinished();

    const id = uuidv4();
    const orchestrator = createChargingSession(config, {
      id,
      logger: createConsoleLogger(`session:${id.slice(0, 8)}`),
      publisher: this.publisher,
      pace: pacer(opts.speedFactor),
    });

    const completion = orchestrator
      .simulateChargingSession({
        durationSeconds: opts.durationSeconds,
        anomalyKinds: opts.anomalyKinds,
        anomalySeverity: opts.anomalySeverity,
        anomalyTarget: opts.anomalyTarget,
        anomalyOnsetSeconds: opts.anomalyOnsetSeconds,
      })
      .then((summary) => {
        managed.summary = summary;
        return summary;
      })
      .catch((err: unknown) => {
        managed.error = describeError(err);
        console.error(`[session-registry] session ${id} aborted`, err);
        return null;
      });

    const managed: ManagedSession = {
      id,
      createdAt: new Date(),
      speedFactor: opts.speedFactor,
      orchestrator,
      completion,
      summary: null,
      error: null,
    };
    this.sessions.set(id, managed);
    console.log(`[session-registry] started session ${id} for ${opts.durationSeconds}s`);
    return managed;
  }

  /** Drops the oldest finished sessions beyond `maxFinishedSessions`. */
  private evictFinished(): void {
    const finished = [...this.sessions.values()].filter((s) => isTerminalState(s.orchestrator.state));
    for (const session of finished.slice(0, Math.max(0, finished.length - this.maxFinishedSessions))) {
      this.sessions.delete(session.id);
      console.log(`[session-registry] evicted finished session ${session.id}`);
    }
  }

  get(id: string): ManagedSession {
    const session = this.sessions.get(id);
    if (!session) throw new SessionNotFoundError(id);
    return session;
  }

  list(): ManagedSession[] {
    return [...this.sessions.values()];
  }

  get size(): number {
    return this.sessions.size;
  }
}

export function requireRegistry(): SessionRegistry {
  return SessionRegistry.getInstance() ?? SessionRegistry.init();
}

import { z } from 'zod';
import {
  ANOMALY_KINDS,
  AnomalySeverity,
  InvalidParameterError,
  TARGET_PROTOCOLS,
  type AnomalyKind,
  type EnergyAuditResult,
  type LoggerPort,
  type SessionState,
  type StatisticsReport,
  type StopReason,
  type TargetProtocol,
} from '@evsim/domain';
import { createChargingSession, toStatisticsReport, totalSent } from '@evsim/engine';
import type { SimulatorApiClient } from './api-client.js';

export const USAGE = `Usage:
  simulate [--duration 60] [--anomaly kind,kind] [--severity LOW|MEDIUM|HIGH|0..1]
           [--target bus|control|session|all] [--onset seconds] [--seed n] [--resistance ohm]
  scenarios
  start [--duration 60] [--anomaly kind,kind] [--speed 1]
  show <sessionId>
  inject <sessionId> <kind> [--target all] [--severity MEDIUM]
  scenario <sessionId> <scenarioId>
  stop <sessionId>`;

const kindSchema = z.custom<AnomalyKind>(
  (value) => typeof value === 'string' && ANOMALY_KINDS.some((k) => k === value),
  { message: 'unknown anomaly kind' },
);
const targetSchema = z.custom<TargetProtocol>(
  (value) => typeof value === 'string' && TARGET_PROTOCOLS.some((t) => t === value),
  { message: 'unknown target protocol' },
);
const severitySchema = z.union([
  z.enum(['LOW', 'MEDIUM', 'HIGH']).transform((preset) => AnomalySeverity[preset]),
  z.coerce.number().min(0).max(1),
]);
const sessionIdSchema = z.string().min(1);

const commandSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('simulate'),
    durationSeconds: z.coerce.number().positive(),
    anomalyKinds: z.array(kindSchema),
    severity: severitySchema.optional(),
    target: targetSchema.default('all'),
    onsetSeconds: z.coerce.number().min(0).optional(),
    seed: z.coerce.number().int().optional(),
    resistanceOhm: z.coerce.number().nonnegative().optional(),
  }),
  z.object({ command: z.literal('scenarios') }),
  z.object({
    command: z.literal('start'),
    durationSeconds: z.coerce.number().positive(),
    anomalyKinds: z.array(kindSchema),
    speedFactor: z.coerce.number().min(0),
  }),
  z.object({ command: z.literal('show'), sessionId: sessionIdSchema }),
  z.object({
    command: z.literal('inject'),
    sessionId: sessionIdSchema,
    kind: kindSchema,
    target: targetSchema.default('all'),
    severity: severitySchema.default('MEDIUM'),
  }),
  z.object({ command: z.literal('scenario'), sessionId: sessionIdSchema, scenarioId: z.string().min(1) }),
  z.object({ command: z.literal('stop'), sessionId: sessionIdSchema }),
]);

export type ConsoleCommand = z.infer<typeof commandSchema>;
export type SimulateCommand = Extract<ConsoleCommand, { command: 'simulate' }>;

function splitArgs(argv: readonly string[]): { positional: string[]; flags: Map<string, string> } {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg.startsWith('--')) {
      const value = argv[i + 1];
      if (value !== undefined && !value.startsWith('--')) {
        flags.set(arg.slice(2), value);
        i++;
      } else {
        flags.set(arg.slice(2), '');
      }
    } else {
      positional.push(arg);
    }
  }
  return { positional, flags };
}

function list(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s !== '');
}

export function parseArgs(argv: readonly string[]): ConsoleCommand {
  const { positional, flags } = splitArgs(argv);
  const [command, first, second] = positional;

  let raw: Record<string, unknown>;
  switch (command) {
    case 'simulate':
      raw = {
        command,
        durationSeconds: flags.get('duration') ?? '60',
        anomalyKinds: list(flags.get('anomaly')),
        severity: flags.get('severity'),
        target: flags.get('target'),
        onsetSeconds: flags.get('onset'),
        seed: flags.get('seed'),
        resistanceOhm: flags.get('resistance'),
      };
      break;
    case 'start':
      raw = {
        command,
        durationSeconds: flags.get('duration') ?? '60',
        anomalyKinds: list(flags.get('anomaly')),
        speedFactor: flags.get('speed') ?? '1',
      };
      break;
    case 'inject':
      raw = { command, sessionId: first, kind: second, target: flags.get('target'), severity: flags.get('severity') };
      break;
    case 'scenario':
      raw = { command, sessionId: first, scenarioId: second };
      break;
    case 'show':
    case 'stop':
      raw = { command, sessionId: first };
      break;
    case 'scenarios':
      raw = { command };
      break;
    default:
      throw new InvalidParameterError(`Unknown command ${command ?? '(none)'}`);
  }

  const parsed = commandSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidParameterError(
      `Invalid arguments for ${command}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export interface LocalSimulationResult {
  finalState: SessionState;
  reason: StopReason | null;
  peakTemperatureC: number;
  messagesSent: number;
  energyAudit: EnergyAuditResult;
  report: StatisticsReport;
}

/** Runs one session in process, as fast as the event loop allows. */
export async function runLocalSimulation(cmd: SimulateCommand, logger: LoggerPort): Promise<LocalSimulationResult> {
  const orchestrator = createChargingSession(
    { seed: cmd.seed, contactResistanceOhm: cmd.resistanceOhm },
    { logger },
  );
  const summary = await orchestrator.simulateChargingSession({
    durationSeconds: cmd.durationSeconds,
    anomalyKinds: cmd.anomalyKinds,
    anomalySeverity: cmd.severity,
    anomalyTarget: cmd.target,
    anomalyOnsetSeconds: cmd.onsetSeconds,
  });
  return {
    finalState: summary.finalState,
    reason: summary.reason,
    peakTemperatureC: summary.statistics.peakTemperatureC,
    messagesSent: totalSent(summary.statistics),
    energyAudit: summary.energyAudit,
    report: toStatisticsReport(summary.statistics),
  };
}

export interface CommandDeps {
  client: SimulatorApiClient;
  logger: LoggerPort;
}

export async function runCommand(cmd: ConsoleCommand, deps: CommandDeps): Promise<unknown> {
  switch (cmd.command) {
    case 'simulate':
      return runLocalSimulation(cmd, deps.logger);
    case 'scenarios':
      return deps.client.listScenarios();
    case 'start':
      return deps.client.startSession({
        durationSeconds: cmd.durationSeconds,
        anomalyKinds: cmd.anomalyKinds,
        speedFactor: cmd.speedFactor,
      });
    case 'show':
      return deps.client.getSession(cmd.sessionId);
    case 'inject':
      return deps.client.injectAnomaly(cmd.sessionId, {
        kind: cmd.kind,
        targetProtocol: cmd.target,
        severity: cmd.severity,
      });
    case 'scenario':
      return deps.client.runScenario(cmd.sessionId, cmd.scenarioId);
    case 'stop':
      return deps.client.stopSession(cmd.sessionId);
  }
}

import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import {
  ANOMALY_KINDS,
  AnomalySeverity,
  ScenarioNotFoundError,
  SessionClosedError,
  TARGET_PROTOCOLS,
  describeError,
  isTerminalState,
  type AnomalyKind,
  type TargetProtocol,
} from '@evsim/domain';
import { findScenario, toStatisticsReport } from '@evsim/engine';
import { requireRegistry, type ManagedSession } from '../services/session-registry.js';

export const sessionsRouter = Router();

const anomalyKindSchema = z.custom<AnomalyKind>(
  (value) => typeof value === 'string' && ANOMALY_KINDS.some((kind) => kind === value),
  { message: 'unknown anomaly kind' },
);
const targetSchema = z.custom<TargetProtocol>(
  (value) => typeof value === 'string' && TARGET_PROTOCOLS.some((t) => t === value),
  { message: 'unknown target protocol' },
);

const configOverrideSchema = z
  .object({
    tickIntervalMs: z.number().int().positive(),
    nominalCurrentAmp: z.number().positive(),
    contactResistanceOhm: z.number().nonnegative(),
    faultResistanceOhm: z.number().nonnegative(),
    adapterFailureThreshold: z.number().int().positive(),
    seed: z.number().int(),
    thermal: z
      .object({
        ambientC: z.number(),
        lossCoefficientWPerC: z.number().nonnegative(),
        thermalMassJPerC: z.number().positive(),
        derateThresholdC: z.number(),
        criticalThresholdC: z.number(),
      })
      .partial(),
    injector: z
      .object({
        maxDelayMs: z.number().int().nonnegative(),
        maxJitterMs: z.number().int().nonnegative(),
        floodBurstSize: z.number().int().positive(),
        dosMode: z.enum(['flood', 'drop']),
      })
      .partial(),
  })
  .partial();

const createBodySchema = z.object({
  durationSeconds: z.number().positive().max(86_400),
  anomalyKinds: z.array(anomalyKindSchema).default([]),
  anomalySeverity: z.number().min(0).max(1).optional(),
  anomalyTarget: targetSchema.optional(),
  anomalyOnsetSeconds: z.number().min(0).optional(),
  speedFactor: z.number().min(0).max(1_000).default(0),
  config: configOverrideSchema.optional(),
});

const injectBodySchema = z
  .object({
    kind: anomalyKindSchema,
    targetProtocol: targetSchema.default('all'),
    severity: z.number().min(0).max(1).optional(),
    preset: z.enum(['LOW', 'MEDIUM', 'HIGH']).optional(),
  })
  .refine((body) => body.severity === undefined || body.preset === undefined, {
    message: 'give either severity or preset, not both',
  });

const sessionParamsSchema = z.object({ sessionId: z.string().min(1) });
const eventParamsSchema = sessionParamsSchema.extend({ eventId: z.string().min(1) });
const scenarioParamsSchema = sessionParamsSchema.extend({ scenarioId: z.string().min(1) });

function describeSession(session: ManagedSession) {
  const { orchestrator } = session;
  return {
    id: session.id,
    state: orchestrator.state,
    createdAt: session.createdAt.toISOString(),
    speedFactor: session.speedFactor,
    statistics: toStatisticsReport(orchestrator.statistics()),
    thermal: orchestrator.thermalState(),
    activeAnomalies: orchestrator.activeAnomalies(),
    summary: session.summary,
    error: session.error,
  };
}

function requireOpen(session: ManagedSession): void {
  const state = session.orchestrator.state;
  if (isTerminalState(state)) throw new SessionClosedError(session.id, state);
}

/** POST /api/sessions — create a session and run it in the background */
sessionsRouter.post('/', (req: Request, res: Response, next: NextFunction) => {
  try {
    const body = createBodySchema.parse(req.body);
    const session = requireRegistry().create(body);
    res.status(202).json({ id: session.id, state: session.orchestrator.state });
  } catch (err) {
    next(err);
  }
});

/** GET /api/sessions */
sessionsRouter.get('/', (_req: Request, res: Response, next: NextFunction) => {
  try {
    const data = requireRegistry()
      .list()
      .map((s) => ({ id: s.id, state: s.orchestrator.state, createdAt: s.createdAt.toISOString() }));
    res.json({ data });
  } catch (err) {
    next(err);
  }
});

/** GET /api/sessions/:sessionId */
sessionsRouter.get('/:sessionId', (req: Request, res: Response, next: NextFunction) => {
  try {
    const { sessionId } = sessionParamsSchema.parse(req.params);
    res.json(describeSession(requireRegistry().get(sessionId)));
  } catch (err) {
    next(err);
  }
});

/** POST /api/sessions/:sessionId/stop — cooperative stop at the next tick */
sessionsRouter.post('/:sessionId/stop', (req: Request, res: Response, next: NextFunction) => {
  try {
    const { sessionId } = sessionParamsSchema.parse(req.params);
    const session = requireRegistry().get(sessionId);
    const accepted = session.orchestrator.stop();
    res.status(202).json({ id: session.id, accepted, state: session.orchestrator.state });
  } catch (err) {
    next(err);
  }
});

/** GET /api/sessions/:sessionId/anomalies — active events */
sessionsRouter.get('/:sessionId/anomalies', (req: Request, res: Response, next: NextFunction) => {
  try {
    const { sessionId } = sessionParamsSchema.parse(req.params);
    res.json({ data: requireRegistry().get(sessionId).orchestrator.activeAnomalies() });
  } catch (err) {
    next(err);
  }
});

/** POST /api/sessions/:sessionId/anomalies */
sessionsRouter.post('/:sessionId/anomalies', (req: Request, res: Response, next: NextFunction) => {
  try {
    const { sessionId } = sessionParamsSchema.parse(req.params);
    const body = injectBodySchema.parse(req.body);
    const session = requireRegistry().get(sessionId);
    requireOpen(session);

    const severity = body.severity ?? AnomalySeverity[body.preset ?? 'MEDIUM'];
    const event = session.orchestrator.injectAnomaly(body.kind, body.targetProtocol, severity);
    res.status(201).json(event);
  } catch (err) {
    next(err);
  }
});

/** DELETE /api/sessions/:sessionId/anomalies/:eventId */
sessionsRouter.delete('/:sessionId/anomalies/:eventId', (req: Request, res: Response, next: NextFunction) => {
  try {
    const { sessionId, eventId } = eventParamsSchema.parse(req.params);
    const removed = requireRegistry().get(sessionId).orchestrator.removeAnomaly(eventId);
    res.json({ removed });
  } catch (err) {
    next(err);
  }
});

/** POST /api/sessions/:sessionId/scenarios/:scenarioId/run */
sessionsRouter.post('/:sessionId/scenarios/:scenarioId/run', (req: Request, res: Response, next: NextFunction) => {
  try {
    const { sessionId, scenarioId } = scenarioParamsSchema.parse(req.params);
    const session = requireRegistry().get(sessionId);
    const scenario = findScenario(scenarioId);
    if (!scenario) throw new ScenarioNotFoundError(scenarioId);
    requireOpen(session);

    session.orchestrator.runScenario(scenario).catch((err: unknown) => {
      console.error(`[sessions] scenario ${scenarioId} on ${sessionId} failed: ${describeError(err)}`);
    });
    res.status(202).json({ sessionId, scenarioId, steps: scenario.steps.length });
  } catch (err) {
    next(err);
  }
});

import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { ATTACK_SCENARIOS, findScenario } from '@evsim/engine';

export const scenariosRouter = Router();

/** GET /api/scenarios — list the attack scenario catalog */
scenariosRouter.get('/', (_req: Request, res: Response) => {
  res.json({ data: ATTACK_SCENARIOS });
});

/** GET /api/scenarios/:scenarioId */
scenariosRouter.get('/:scenarioId', (req: Request, res: Response, next: NextFunction) => {
  try {
    const scenario = findScenario(req.params['scenarioId'] ?? '');
    if (!scenario) {
      res.status(404).json({ error: 'scenario not found' });
      return;
    }
    res.json(scenario);
  } catch (err) {
    next(err);
  }
});

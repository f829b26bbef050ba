import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { intakeRequestSchema } from '@intake-desk/shared';
import type { IntakeResponse } from '@intake-desk/shared';
import { validate } from '../middleware/validate.js';
import type { IntakeDesk } from '../services/index.js';

export function intakeRoutes(desk: IntakeDesk): Router {
  const router = Router();

  // POST /intake - customer, vehicle, order and visit in one unit
  router.post('/', validate({ body: intakeRequestSchema }), async (req: Request, res: Response, next: NextFunction) => {
    // A client that hangs up before the response rolls its flow back
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const data = await desk.intake.createCompleteFlow(req.body, { signal: controller.signal });
      const body: IntakeResponse = { success: true, data };
      res.status(201).json(body);
    } catch (err) {
      next(err);
    }
  });

  return router;
}

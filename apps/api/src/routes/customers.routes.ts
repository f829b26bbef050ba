import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { candidateIdentitySchema, customerIdParamSchema } from '@intake-desk/shared';
import type { CustomerOrdersResponse, ResolveCustomerResponse } from '@intake-desk/shared';
import { validate } from '../middleware/validate.js';
import type { IntakeDesk } from '../services/index.js';
import { NotFound } from '../utils/httpError.js';

export function customersRoutes(desk: IntakeDesk): Router {
  const router = Router();

  // POST /customers/resolve - find or create by identity tuple
  router.post('/resolve', validate({ body: candidateIdentitySchema }), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = await desk.customers.resolve(desk.store, req.body);
      const body: ResolveCustomerResponse = { success: true, data };
      res.status(data.created ? 201 : 200).json(body);
    } catch (err) {
      next(err);
    }
  });

  // GET /customers/:id/orders
  router.get('/:id/orders', validate({ params: customerIdParamSchema }), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const customerId = Number(req.params.id);
      const customer = await desk.store.customers.findById(customerId);
      if (!customer) throw NotFound(`Customer ${customerId} not found`);

      const body: CustomerOrdersResponse = { success: true, data: await desk.store.orders.listByCustomer(customerId) };
      res.json(body);
    } catch (err) {
      next(err);
    }
  });

  return router;
}

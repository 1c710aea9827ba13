import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import {
  DEFAULT_DISTANCE_WEIGHT,
  DEFAULT_SINCE_HOURS,
  DEFAULT_URGENCY_WEIGHT,
  DEFAULT_VEHICLE_CAPACITY,
} from '@relief-router/domain';
import type { RoutePlanningPort } from '@relief-router/domain';

// Weights are not range-checked and need not sum to 1.
const generateBodySchema = z.object({
  depot_lat: z.number().min(-90).max(90),
  depot_lon: z.number().min(-180).max(180),
  vehicle_capacity: z.number().int().positive().default(DEFAULT_VEHICLE_CAPACITY),
  since_hours: z.number().int().min(1).max(24 * 30).default(DEFAULT_SINCE_HOURS),
  urgency_weight: z.number().default(DEFAULT_URGENCY_WEIGHT),
  distance_weight: z.number().default(DEFAULT_DISTANCE_WEIGHT),
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(10),
});

export function createRoutesRouter(planning: RoutePlanningPort): Router {
  const router = Router();

  /** POST /api/routes/generate: plan every mode over the active requests */
  router.post('/generate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = generateBodySchema.parse(req.body);
      const data = await planning.generateAndStore({
        depotLat: body.depot_lat,
        depotLon: body.depot_lon,
        vehicleCapacity: body.vehicle_capacity,
        sinceHours: body.since_hours,
        urgencyWeight: body.urgency_weight,
        distanceWeight: body.distance_weight,
      });
      res.json({ data });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/routes: recently generated plans */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const data = await planning.listRecent(query.limit);
      res.json({ data });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

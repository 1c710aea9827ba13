import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { MAX_PAYLOAD_LENGTH, MESSAGE_TYPES } from '@relief-router/domain';
import type { MessageRepositoryPort, NewMeshMessage } from '@relief-router/domain';

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

const urgentQuerySchema = z.object({
  min_urgency: z.coerce.number().int().min(1).max(3).default(2),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

const messageBodySchema = z.object({
  node_id: z.string().min(1).max(64),
  timestamp: z.number().int().nonnegative(),
  message_type: z.enum(MESSAGE_TYPES),
  urgency: z.number().int().min(1).max(3),
  lat: z.number().min(-90).max(90).nullable().default(null),
  lon: z.number().min(-180).max(180).nullable().default(null),
  resource_type: z.string().min(1).max(64).nullable().default(null),
  quantity: z.number().int().nonnegative().nullable().default(null),
  payload: z.string().max(MAX_PAYLOAD_LENGTH).nullable().default(null),
});

export function createMessagesRouter(messages: MessageRepositoryPort): Router {
  const router = Router();

  /** GET /api/messages: newest first */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const data = await messages.listRecent(query.limit);
      res.json({ data });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/messages/urgent: triage view */
  router.get('/urgent', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = urgentQuerySchema.parse(req.query);
      const data = await messages.listUrgent(query.min_urgency, query.limit);
      res.json({ data });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/messages: store one field message */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const message: NewMeshMessage = messageBodySchema.parse(req.body);
      const id = await messages.insert(message);
      res.status(201).json({ id });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

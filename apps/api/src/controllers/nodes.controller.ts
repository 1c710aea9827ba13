import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { MessageRepositoryPort } from '@relief-router/domain';

export function createNodesRouter(messages: MessageRepositoryPort): Router {
  const router = Router();

  /** GET /api/nodes: last message of every node, most recently seen first */
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const data = await messages.listNodeStatus();
      res.json({ data });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

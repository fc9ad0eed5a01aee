import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { HttpError } from '../errors.js';
import { failedListQuerySchema } from '../middleware/validation.js';
import type { QueueAdminService } from '../services/queue-admin.service.js';

export function createQueueRouter(admin: QueueAdminService): Router {
  const router = Router();

  // GET /queue/stats
  router.get('/stats', (_req: Request, res: Response) => {
    res.json(admin.stats());
  });

  // GET /queue/failed?limit=
  router.get('/failed', (req: Request, res: Response) => {
    const query = failedListQuerySchema.safeParse(req.query);
    if (!query.success) {
      throw new HttpError(400, 'limit must be an integer between 1 and 500');
    }

    res.json({ jobs: admin.listFailed(query.data.limit) });
  });

  // POST /queue/failed/:id/retry
  router.post('/failed/:id/retry', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await admin.requeue(req.params.id);

      switch (result.outcome) {
        case 'requeued':
          return res.status(202).json({ id: result.id, status: 'pending' });
        case 'not_found':
          throw new HttpError(404, result.message);
        case 'not_failed':
        case 'corrupt':
          throw new HttpError(409, result.message);
      }
    } catch (error) {
      next(error);
    }
  });

  // DELETE /queue/failed/:id
  router.delete('/failed/:id', (req: Request, res: Response) => {
    if (!admin.discard(req.params.id)) {
      throw new HttpError(404, 'Failed job not found');
    }
    res.status(204).end();
  });

  return router;
}

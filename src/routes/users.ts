import { Router } from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { validate, verificationEmailRequestSchema } from '../middleware/validation.js';
import type { JobDispatcher } from '../queue/dispatcher.js';
import { SEND_VERIFICATION_EMAIL } from '../queue/jobs/index.js';
import type { JobRegistry } from '../queue/registry.js';

export interface UserRouterDeps {
  registry: JobRegistry;
  dispatcher: JobDispatcher;
  limiter?: RequestHandler;
}

export function createUserRouter({ registry, dispatcher, limiter }: UserRouterDeps): Router {
  const router = Router();
  const guards: RequestHandler[] = limiter ? [limiter] : [];

  // POST /users/:userId/verification-email
  // Express 4 does not forward async rejections, hence the explicit next().
  router.post(
    '/:userId/verification-email',
    ...guards,
    validate(verificationEmailRequestSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { email, priority, delay_seconds } = verificationEmailRequestSchema.parse(req.body);

        // Constructing the job validates the payload; a ValidationError never reaches the queue.
        const job = registry.create(SEND_VERIFICATION_EMAIL, {
          user_id: req.params.userId,
          email,
          ip_address: req.ip ?? null,
        });

        const jobId = await dispatcher.dispatch(job, { priority, delaySeconds: delay_seconds });
        res.status(202).json({ jobId });
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}

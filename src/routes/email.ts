import { Router } from 'express';
import type { Request, Response } from 'express';
import { HttpError } from '../errors.js';
import { validate, verifyEmailSchema } from '../middleware/validation.js';
import type { EmailVerificationService } from '../services/email-verification.service.js';

export function createEmailRouter(verification: EmailVerificationService): Router {
  const router = Router();

  // POST /email/verify
  router.post('/verify', validate(verifyEmailSchema), (req: Request, res: Response) => {
    const { token } = verifyEmailSchema.parse(req.body);
    const result = verification.verifyToken(token);

    if (result.outcome !== 'verified') {
      throw new HttpError(result.outcome === 'already_verified' ? 409 : 400, result.message);
    }

    res.json({ verified: true, user_id: result.userId, email: result.email });
  });

  // GET /email/status/:userId
  router.get('/status/:userId', (req: Request, res: Response) => {
    const { userId } = req.params;
    res.json({ user_id: userId, verified: verification.isEmailVerified(userId) });
  });

  // DELETE /email/verifications/expired
  // Maintenance: drops unused tokens past their expiry.
  router.delete('/verifications/expired', (_req: Request, res: Response) => {
    res.json({ purged: verification.purgeExpired() });
  });

  return router;
}

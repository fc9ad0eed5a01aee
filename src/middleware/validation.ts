import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { ZodSchema } from 'zod';

export function validate(schema: ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (result.success) {
      req.body = result.data;
      next();
      return;
    }

    res.status(400).json({
      error: 'Validation failed',
      details: result.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  };
}

export const verificationEmailRequestSchema = z.object({
  email: z.string().email('A valid email is required'),
  priority: z.enum(['high', 'default', 'low']).optional(),
  delay_seconds: z.number().int().min(0).max(86_400).optional(),
});

export const verifyEmailSchema = z.object({
  token: z.string().regex(/^[0-9a-f]{64}$/, 'Token must be 64 hex characters'),
});

export const failedListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

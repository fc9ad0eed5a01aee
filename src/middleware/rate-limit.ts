import rateLimit from 'express-rate-limit';

// Global limiter, applied to all routes.
// Broad safety net: 100 requests per minute per IP.
export const globalLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 100,
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Too many requests, please try again later.' },
});

// Each accepted request ends in an outgoing email; 5 per minute per IP.
export const verificationEmailLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 5,
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Verification email rate limit exceeded. Please wait before requesting another.' },
});

import rateLimit from 'express-rate-limit';
import type { Request, Response } from 'express';

export interface RateLimitOptions {
  windowMs: number;
  limit: number;
}

// Every accepted request fans out into topics x categories model calls
export const createGenerationRateLimiter = ({ windowMs, limit }: RateLimitOptions) =>
  rateLimit({
    windowMs,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req: Request) => req.ip || 'unknown',
    handler: (_req: Request, res: Response) => {
      res.status(429).json({
        success: false,
        error: 'Rate limit exceeded',
        message: 'Too many generation requests. Please try again later.',
        retryAfter: res.get('Retry-After'),
      });
    },
  });

export const DEFAULT_GENERATION_LIMIT: RateLimitOptions = {
  windowMs: 15 * 60 * 1000, // 15 minutes
  limit: 30,
};

import rateLimit from 'express-rate-limit';
import { AI_RATE_LIMIT_PER_MINUTE } from '@flowscribe/shared';

/**
 * Create an `express-rate-limit` middleware for the endpoints that call
 * the instruction interpreter.
 *
 * Limits each IP address to `limit` requests per 60-second window. Uses
 * `RateLimit-*` standard headers and disables legacy `X-RateLimit-*`
 * headers. When the limit is exceeded the response is
 * `429 Too Many Requests` with a JSON error body.
 *
 * @param limit - Requests per minute, defaults to {@link AI_RATE_LIMIT_PER_MINUTE}.
 *
 * @example
 * router.post('/add', createRateLimiter(), addHandler);
 */
export function createRateLimiter(limit: number = AI_RATE_LIMIT_PER_MINUTE): ReturnType<typeof rateLimit> {
  return rateLimit({
    windowMs: 60 * 1000,
    max: limit,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later' },
  });
}

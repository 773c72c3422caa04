import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { GatewayContext } from '../../core/gateway-context.js';
import { applyRateLimitHeaders } from '../../middleware/rate-limiter.js';
import type { ChatOutcomeStatus } from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';

const chatRequestSchema = z.object({
  // A missing or non-string message goes through admission and is rejected as empty
  message: z.unknown().transform((value) => (typeof value === 'string' ? value : '')),
  sessionId: z.string({ invalid_type_error: 'sessionId must be a string' }).optional(),
});

const STATUS_CODES: Record<ChatOutcomeStatus, number> = {
  ok: 200,
  invalid: 400,
  throttled: 429,
  failed: 500,
};

/**
 * Create chat routes
 */
export function createChatRoutes(context: GatewayContext): Router {
  const router = Router();

  /**
   * Handle one chat message. The X-Session-ID header wins over the body's sessionId.
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const parsed = chatRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map((issue) => issue.message).join('; '));
      }

      const outcome = await context.handleChat({
        message: parsed.data.message,
        sessionId: parsed.data.sessionId,
        headerSessionId: req.get('X-Session-ID'),
      });

      if (outcome.rateLimit) {
        applyRateLimitHeaders(res, outcome.rateLimit);
      }
      res.set('X-Session-ID', outcome.body.sessionId);
      res.status(STATUS_CODES[outcome.status]).json(outcome.body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}

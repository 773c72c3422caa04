import { Router, Request, Response, NextFunction } from 'express';
import type { GatewayContext } from '../../core/gateway-context.js';
import { NotFoundError } from '../../utils/errors.js';

/**
 * Create session routes
 */
export function createSessionRoutes(context: GatewayContext): Router {
  const router = Router();

  /**
   * Full message history of a live session
   */
  router.get('/:sessionId/history', (req: Request, res: Response, next: NextFunction): void => {
    const history = context.sessions.history(req.params['sessionId']);
    if (!history) {
      next(new NotFoundError('Session'));
      return;
    }
    res.json(history);
  });

  /**
   * Clear a session. Clearing an unknown session succeeds too.
   */
  router.delete('/:sessionId', (req: Request, res: Response): void => {
    const sessionId = req.params['sessionId'];
    const existed = context.deleteSession(sessionId);
    if (existed) {
      console.log(`🗑️ Session cleared: ${sessionId}`);
    }
    res.json({ message: 'Session cleared successfully', sessionId });
  });

  return router;
}

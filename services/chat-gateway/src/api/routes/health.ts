import { Router, Request, Response } from 'express';
import type { GatewayContext } from '../../core/gateway-context.js';

/**
 * Create health check routes
 */
export function createHealthRoutes(context: GatewayContext): Router {
  const router = Router();

  /**
   * Liveness and current load
   */
  router.get('/', (req: Request, res: Response): void => {
    const health = context.healthMonitor.getHealthMetrics();
    res.json(health);
  });

  /**
   * Error statistics with the most recent records
   */
  router.get('/errors', (req: Request, res: Response): void => {
    res.json({
      stats: context.errorHandler.getErrorStats(),
      recent: context.errorHandler.getRecentErrors(10),
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}

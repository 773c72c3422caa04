import { Router, Request, Response, NextFunction } from 'express';
import type { GatewayContext } from '../../core/gateway-context.js';
import { NotFoundError } from '../../utils/errors.js';
import { formatFileTimestamp } from '../../utils/result-format.js';

/**
 * Create chart image routes
 */
export function createChartRoutes(context: GatewayContext): Router {
  const router = Router();

  router.get('/:filename', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const filename = req.params['filename'];
      const chart = await context.charts.readChart(filename);

      res.set({
        'Content-Type': chart.contentType,
        'Content-Disposition': `inline; filename="${filename}"`,
        'Cache-Control': 'no-cache',
      });
      res.send(chart.data);
    } catch (error) {
      next(error);
    }
  });

  return router;
}

/**
 * Create summary download routes
 */
export function createDownloadRoutes(context: GatewayContext): Router {
  const router = Router();

  router.get('/summary/:bundleId', (req: Request, res: Response, next: NextFunction): void => {
    const now = Date.now();
    const exported = context.presenter.export(req.params['bundleId'], now);
    if (exported === null) {
      next(new NotFoundError('Summary'));
      return;
    }

    res.set({
      'Content-Type': 'text/plain; charset=utf-8',
      'Content-Disposition': `attachment; filename="query_results_${formatFileTimestamp(new Date(now))}.txt"`,
    });
    res.send(exported);
  });

  return router;
}

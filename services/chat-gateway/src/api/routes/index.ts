import { Application, Request, Response } from 'express';
import type { GatewayContext } from '../../core/gateway-context.js';
import { createChatRoutes } from './chat.js';
import { createChartRoutes, createDownloadRoutes } from './downloads.js';
import { createHealthRoutes } from './health.js';
import { createSessionRoutes } from './sessions.js';

/**
 * Mount every API route under the configured URL prefix
 */
export function setupRoutes(app: Application, context: GatewayContext): void {
  const urlPrefix = context.config.urlPrefix;
  console.log('Setting up chat gateway API routes...');

  app.use(`${urlPrefix}/chat`, createChatRoutes(context));
  app.use(`${urlPrefix}/chart`, createChartRoutes(context));
  app.use(`${urlPrefix}/download`, createDownloadRoutes(context));
  app.use(`${urlPrefix}/session`, createSessionRoutes(context));
  app.use(`${urlPrefix}/health`, createHealthRoutes(context));

  const endpoints = {
    chat: `${urlPrefix}/chat`,
    chart: `${urlPrefix}/chart/:filename`,
    summaryDownload: `${urlPrefix}/download/summary/:bundleId`,
    history: `${urlPrefix}/session/:sessionId/history`,
    clearSession: `${urlPrefix}/session/:sessionId`,
    health: `${urlPrefix}/health`,
  };

  // Root endpoint
  app.get(urlPrefix || '/', (req: Request, res: Response) => {
    res.json({
      service: 'Issue Chat Gateway',
      version: '1.0.0',
      status: 'running',
      description: 'Routes issue-tracker questions to defect and query agents',
      endpoints,
      timestamp: new Date().toISOString(),
    });
  });

  // 404 handler for undefined routes
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Not Found',
      message: `Route ${req.method} ${req.originalUrl} not found`,
      availableEndpoints: Object.values(endpoints),
      timestamp: new Date().toISOString(),
    });
  });

  console.log('All API routes configured successfully');
}

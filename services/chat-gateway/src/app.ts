import type { Server } from 'http';
import express, { Application } from 'express';
import { setupRoutes } from './api/routes/index.js';
import type { GatewayContext } from './core/gateway-context.js';
import type { GracefulShutdown } from './monitoring/graceful-shutdown.js';

/**
 * Build the Express application around a gateway context
 */
export function createApp(context: GatewayContext): Application {
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  // Coarse per-client guard; the per-session limit is applied by the orchestrator
  if (context.clientLimiter) {
    app.use(context.clientLimiter.middleware());
  }

  setupRoutes(app, context);

  // Error handling middleware (must be last)
  app.use(context.errorHandler.middleware());

  return app;
}

/**
 * Shutdown order for a running server: stop accepting connections, give chats
 * in flight up to `drainTimeoutMs` to finish, then drop the connections left.
 */
export function registerServerShutdown(
  shutdown: GracefulShutdown,
  server: Server,
  context: GatewayContext,
  drainTimeoutMs: number
): void {
  let serverClosed: Promise<void> = Promise.resolve();

  shutdown.addCleanupTask(async () => {
    console.log('🛑 Closing HTTP server...');
    serverClosed = new Promise<void>((resolve) => {
      server.close(() => {
        console.log('✅ HTTP server closed');
        resolve();
      });
    });
  });

  shutdown.addCleanupTask(async () => {
    console.log('🧹 Stopping gateway context...');
    await context.stop(drainTimeoutMs);
  });

  shutdown.addCleanupTask(async () => {
    // Drained chats write their response on the turn they settle
    await new Promise<void>((resolve) => setImmediate(resolve));
    server.closeAllConnections();
    await serverClosed;
  });
}

import 'dotenv/config';
import type { Server } from 'http';
import { createApp, registerServerShutdown } from './src/app.js';
import { ConfigError, loadConfig } from './src/config/environment.js';
import { createGatewayContext } from './src/core/gateway-context.js';
import { GracefulShutdown } from './src/monitoring/graceful-shutdown.js';

async function startService(): Promise<void> {
  const config = loadConfig();

  console.log('🚀 Starting Issue Chat Gateway...');
  console.log(`Environment: ${config.nodeEnv}`);
  console.log(`Port: ${config.port}`);
  console.log(`URL Prefix: ${config.urlPrefix || '/'}`);
  console.log(`Agent service: ${config.agents.serviceUrl}`);
  console.log(`Query service: ${config.queryService.url}`);

  const context = createGatewayContext(config);
  const gracefulShutdown = new GracefulShutdown(context.healthMonitor, {
    timeout: config.shutdown.timeoutMs,
    forceExit: config.shutdown.forceExit,
  });

  context.start();

  const app = createApp(context);
  const server: Server = await new Promise<Server>((resolve, reject) => {
    const instance = app.listen(config.port, () => resolve(instance));
    instance.once('error', reject);
  });

  console.log('🌐 Chat gateway running on port', config.port);
  console.log(`📡 API endpoints available at: http://localhost:${config.port}${config.urlPrefix}`);
  console.log(`🔍 Health check available at: http://localhost:${config.port}${config.urlPrefix}/health`);

  registerServerShutdown(gracefulShutdown, server, context, config.shutdown.timeoutMs);

  const initialHealth = context.healthMonitor.getHealthMetrics();
  console.log(`💚 Initial health status: ${initialHealth.status}`);
  console.log('🎉 Issue Chat Gateway started successfully!');
}

startService().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`❌ ${error.message}`);
  } else {
    console.error('💥 Failed to start service:', error);
  }
  process.exit(1);
});

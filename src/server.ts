import { createApp } from './app';
import { ServerConfig, WarehouseConfig, loadPipelineConfig } from './config';
import { FileWarehouse } from './load/FileWarehouse';
import { validateWriteToken } from './middleware/auth';
import { logger } from './utils/logger';

import type { Server } from 'node:http';

let server: Server | undefined;

// Graceful shutdown handler
const gracefulShutdown = (signal: string) => {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  if (!server) {
    process.exit(0);
  }
  server.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });

  // Force exit after the timeout (unref to not block process exit)
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, ServerConfig.shutdownTimeoutMs).unref();
};

try {
  // Validate environment before starting
  validateWriteToken();

  const baseConfig = await loadPipelineConfig({ path: process.env.PIPELINE_CONFIG });
  const warehouse = new FileWarehouse(WarehouseConfig.dataDir, logger);
  await warehouse.init();

  const app = createApp({ baseConfig, warehouse });
  server = app.listen(ServerConfig.port, ServerConfig.host, () => {
    logger.info('Server started', {
      dataDir: WarehouseConfig.dataDir,
      host: ServerConfig.host,
      localTimezone: baseConfig.localTimezone,
      nodeEnv: process.env.NODE_ENV ?? 'development',
      port: ServerConfig.port,
    });
  });

  process.on('SIGTERM', () => {
    gracefulShutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    gracefulShutdown('SIGINT');
  });
} catch (error) {
  logger.error('Failed to initialize server', error);
  process.exit(1);
}

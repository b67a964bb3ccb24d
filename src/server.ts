import { AuthConfig, ServerConfig } from './config';
import { createApp } from './app';
import { logger } from './utils/logger';

import type { Server } from 'node:http';

/**
 * Validate required environment variables at startup.
 * Fails fast if critical configuration is missing.
 */
function validateEnv(): void {
  const token = process.env[AuthConfig.tokenEnvVar];
  if (!token) {
    throw new Error(`${AuthConfig.tokenEnvVar} environment variable is required`);
  }
  if (!token.startsWith(AuthConfig.tokenPrefix)) {
    throw new Error(`${AuthConfig.tokenEnvVar} must start with "${AuthConfig.tokenPrefix}"`);
  }
}

let server: Server | undefined;

const gracefulShutdown = (signal: string) => {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  if (!server) {
    // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Nothing to close
    process.exit(0);
  }
  server.close(() => {
    logger.info('Server closed');
    // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Intentional server shutdown
    process.exit(0);
  });

  // Force exit after the timeout (unref to not block process exit)
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Intentional forced shutdown
    process.exit(1);
  }, ServerConfig.shutdownTimeoutMs).unref();
};

try {
  validateEnv();

  const app = createApp(logger);
  server = app.listen(ServerConfig.port, ServerConfig.host, () => {
    logger.info('Server started', {
      host: ServerConfig.host,
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
  // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Fatal startup error
  process.exit(1);
}

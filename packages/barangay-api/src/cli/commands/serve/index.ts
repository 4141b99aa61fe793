/**
 * Barangay API Serve Command
 *
 * Start the HTTP API server
 */

import { createBarangayAPI } from '../../../serving/api.js';
import { loadConfig, type ConfigOverrides } from '../../../core/config.js';
import { logger } from '../../../core/utils/logger.js';

export interface ServeOptions extends ConfigOverrides {
  readonly config?: string;
}

export async function serveCommand(options: ServeOptions): Promise<void> {
  const { config: configPath, ...overrides } = options;
  const config = loadConfig({ configPath, overrides });

  logger.info('Starting Barangay API server...', {
    port: config.server.port,
    host: config.server.host,
    dataset: config.dataset.path,
    corsOrigins: config.server.corsOrigins,
    rateLimitPerMinute: config.server.rateLimitPerMinute,
    configPath: config.configPath,
  });

  const api = await createBarangayAPI(config);
  await api.start();

  const shutdown = (signal: string) => {
    logger.info('Received shutdown signal, stopping server...', { signal });
    api.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Failed to stop server cleanly', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      }
    );
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  const base = `http://${config.server.host}:${config.server.port}`;
  logger.info('Server started successfully', {
    url: base,
    endpoints: {
      regions: `${base}/regions`,
      search: `POST ${base}/search_barangay`,
      health: `${base}/health`,
      metrics: `${base}/metrics`,
    },
  });
}

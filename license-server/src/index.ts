/**
 * Plugin License Server
 *
 * Issues license keys, binds them to client domains, answers heartbeats
 * and hands out signed download URLs for plugin updates.
 * Deploy behind a TLS-terminating proxy (Caddy / nginx).
 *
 * Public endpoints (called by installed plugins):
 *   POST /v1/license/activate
 *   POST /v1/license/validate
 *   POST /v1/license/deactivate
 *   POST /v1/updates/check
 *   GET  /v1/updates/download
 *
 * Admin endpoints: see routes/admin.ts
 */

import type { Server } from 'http';
import { createApp } from './app';
import { loadConfigFromEnvironment } from './config';
import { closeDatabase, openDatabase } from './db';
import { ConfigurationError, SecretProvisioningError } from './errors';
import { provisionSecrets } from './secrets';
import { createServices } from './services/container';
import { MemoryRateLimitStore } from './services/rate-limiter';
import { ensureAdminUser } from './seed';
import { logger } from './utils/logger';

async function main(): Promise<void> {
  const config = loadConfigFromEnvironment();
  logger.info({ version: config.version, env: config.env }, 'Starting license server');

  // ─── Secrets & storage ────────────────────────────────────
  const secrets = provisionSecrets(config);
  const db = openDatabase(config.paths.db);

  const services = createServices({ config, secrets, db });
  ensureAdminUser(services.adminUsers, config.admin);

  // Expired windows and blocks are otherwise only dropped when read again.
  const { rateLimitStore } = services;
  const sweeper =
    rateLimitStore instanceof MemoryRateLimitStore
      ? setInterval(() => {
          const removed = rateLimitStore.sweep();
          if (removed > 0) logger.debug({ removed }, 'Swept expired rate-limit entries');
        }, 60_000)
      : null;
  sweeper?.unref();

  // ─── HTTP ─────────────────────────────────────────────────
  const app = createApp(services, config, secrets);

  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(config.port, config.host, () => resolve(s));
  });
  logger.info(`Listening on http://${config.host}:${config.port}`);
  logger.info(`Activate: http://${config.host}:${config.port}/v1/license/activate`);

  // ─── Graceful Shutdown ────────────────────────────────────
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    if (sweeper) clearInterval(sweeper);
    server.close((err) => {
      closeDatabase(db);
      if (err) {
        logger.error({ err }, 'Error during shutdown');
        process.exit(1);
      }
      logger.info('Shutdown complete');
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
  });
}

main().catch((err) => {
  if (err instanceof ConfigurationError || err instanceof SecretProvisioningError) {
    logger.fatal({ err, context: err.context }, err.message);
  } else {
    logger.fatal({ err }, 'Failed to start license server');
  }
  process.exit(1);
});

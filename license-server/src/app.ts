import cors from 'cors';
import express, { type Express } from 'express';
import helmet from 'helmet';
import type { Config } from './config';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { adminRoutes } from './routes/admin';
import { licenseRoutes } from './routes/license';
import { updateRoutes } from './routes/updates';
import type { Secrets } from './secrets';
import type { Services } from './services/container';

export function createApp(services: Services, config: Config, secrets: Secrets): Express {
  const app = express();

  // ─── Security ─────────────────────────────────────────────

  app.use(helmet());
  app.set('trust proxy', 1); // first proxy (nginx/Caddy) terminates TLS

  // Plugins call from servers, so requests usually carry no Origin at all.
  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin) return callback(null, true);
        if (config.allowedOrigins.includes('*') || config.allowedOrigins.includes(origin)) {
          return callback(null, true);
        }
        callback(new Error('CORS policy: origin not allowed'));
      },
    })
  );

  app.use(express.json({ limit: '100kb' }));

  // ─── Routes ───────────────────────────────────────────────

  app.use('/v1/license', licenseRoutes(services, config));
  app.use('/v1/updates', updateRoutes(services, config));
  app.use('/admin', adminRoutes(services, config, secrets));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', version: config.version, timestamp: services.clock().toISOString() });
  });

  app.use(notFoundHandler);
  app.use(errorHandler(config.isDev));

  return app;
}

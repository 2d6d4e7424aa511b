import express, { type Application } from 'express';
import { pinoHttp } from 'pino-http';
import type { IncomingMessage, Server, ServerResponse } from 'http';
import type { Config } from '../config.js';
import { logger } from '../utils/logger.js';
import { metricsMiddleware } from '../utils/metrics.js';
import type { RegistryService } from '../services/registry.js';
import { createAlertRouter } from './alerts.routes.js';
import { createUserRouter } from './users.routes.js';
import { createNeighborhoodRouter } from './neighborhoods.routes.js';
import { createPublicRouter } from './public.routes.js';
import {
  createRateLimiter,
  errorHandler,
  notFoundHandler,
  requestIdMiddleware,
} from './middleware.js';

export interface AppOptions {
  /** Requests per minute per caller; omit to disable rate limiting */
  rateLimitPerMinute?: number;
  /** Log each request through pino-http */
  requestLogging?: boolean;
}

/**
 * Create and configure the Express application around a registry
 */
export function createApp(registry: RegistryService, options: AppOptions = {}): Application {
  const app = express();

  // Trust proxy for X-Forwarded-For headers (rate limiting behind a gateway)
  app.set('trust proxy', 1);

  app.use(requestIdMiddleware);

  if (options.requestLogging ?? true) {
    app.use(
      pinoHttp({
        logger,
        // Don't log health checks to reduce noise
        autoLogging: {
          ignore: (req: IncomingMessage) => req.url === '/health',
        },
        serializers: {
          req: (req: IncomingMessage) => ({
            method: req.method,
            url: req.url,
          }),
          res: (res: ServerResponse) => ({
            statusCode: res.statusCode,
          }),
        },
      })
    );
  }

  app.use(metricsMiddleware());
  app.use(express.json({ limit: '10kb' }));

  app.use('/', createPublicRouter(registry));

  if (options.rateLimitPerMinute !== undefined) {
    app.use('/api', createRateLimiter(options.rateLimitPerMinute));
  }

  app.use('/api', createUserRouter(registry));
  app.use('/api/alerts', createAlertRouter(registry));
  app.use('/api/neighborhoods', createNeighborhoodRouter(registry));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/**
 * Start listening with the configured host and port
 */
export async function startServer(registry: RegistryService, config: Config): Promise<Server> {
  const app = createApp(registry, { rateLimitPerMinute: config.api.rateLimitPerMinute });
  const { port, host } = config.api;

  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ port, host }, 'API server started');
      resolve(server);
    });
    server.on('error', reject);
  });
}

/**
 * Stop accepting connections and wait for in-flight requests
 */
export async function stopServer(server: Server): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => {
      if (err) {
        reject(err);
        return;
      }
      logger.info('API server stopped');
      resolve();
    });
  });
}

/**
 * Express application: security headers, body parsing, request ids,
 * Prometheus metrics, health probes and the /v1 API.
 */

import express, { Express, Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import compression from 'compression';
import type { Services } from '../container';
import { metricsRegistry } from '../metrics';
import { errorMessage } from '../errors';
import { createRoutes } from './routes';
import { requestId, httpMetrics, notFoundHandler, errorHandler } from './middleware';

export interface AppOptions {
  corsOrigins: string[];
  /** Include internal error messages in 500 responses */
  exposeInternalErrors: boolean;
  metricsEnabled: boolean;
  metricsPath: string;
  version?: string;
}

export function createApp(services: Services, options: AppOptions): Express {
  const app = express();

  // ---------------------------------------------------------------------------
  // MIDDLEWARE
  // ---------------------------------------------------------------------------

  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        objectSrc: ["'none'"],
        frameSrc: ["'none'"],
      },
    },
    crossOriginResourcePolicy: { policy: 'same-origin' },
    frameguard: { action: 'deny' },
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
  }));

  app.use(cors({
    origin: options.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-Id'],
    exposedHeaders: ['X-Request-Id'],
    maxAge: 86400,
  }));

  app.use(compression());
  app.use(requestId());
  app.use(express.json({ limit: '1mb' }));
  app.use(httpMetrics());

  // ---------------------------------------------------------------------------
  // OPERATIONS
  // ---------------------------------------------------------------------------

  if (options.metricsEnabled) {
    app.get(options.metricsPath, async (_req: Request, res: Response) => {
      res.set('Content-Type', metricsRegistry.contentType);
      res.send(await metricsRegistry.metrics());
    });
  }

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: options.version ?? process.env.npm_package_version ?? '1.0.0',
    });
  });

  app.get('/health/ready', async (_req: Request, res: Response) => {
    try {
      await services.repository.ping();
      res.json({
        status: 'ready',
        timestamp: new Date().toISOString(),
        components: { postgres: { status: 'healthy' } },
      });
    } catch (error) {
      console.error('[Application] Readiness check failed:', errorMessage(error));
      res.status(503).json({
        status: 'not_ready',
        error: 'One or more health checks failed',
      });
    }
  });

  app.get('/health/live', (_req: Request, res: Response) => {
    res.json({ status: 'alive' });
  });

  app.use('/v1', createRoutes(services));

  // ---------------------------------------------------------------------------
  // ERROR HANDLING
  // ---------------------------------------------------------------------------

  app.use(notFoundHandler);
  app.use(errorHandler(options.exposeInternalErrors));

  return app;
}

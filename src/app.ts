import os from 'os';
import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';

// Types and Configuration
import { Request, Response, NextFunction } from './config/http';
import logger from '@/lib/logger';

// Middleware and Handlers
import { errorHandler } from '@/common/middleware/errorHandler';
import { jsendMiddleware } from '@/common/middleware/JSend';

import type { Container } from './container';
import { AuthRouter } from '@/modules/auth/auth.routes';
import { HealthRouter } from '@/modules/health/health.routes';

// HTTP Errors
import { NotFoundError } from '@/common/errors/httpErrors';

// Constants
const HOSTNAME = os.hostname();

/**
 * Builds the Express application around an already wired container.
 */
export function createApp(container: Container): Express {
  const { config } = container;
  const app: Express = express();

  // --- Essential Middleware Configuration ---

  app.disable('x-powered-by'); // Security: Hide technology stack
  // req.ip feeds the per-address limits: trust only the first proxy hop
  app.set('trust proxy', 1);
  app.use(helmet()); // Security: Set various HTTP headers

  // CORS (Cross-Origin Resource Sharing)
  app.use(
    cors({
      origin: config.CORS_ORIGIN,
      methods: ['GET', 'POST', 'OPTIONS'],
      // IMPORTANT: 'Authorization' must be allowed for Bearer tokens
      allowedHeaders: ['Content-Type', 'Authorization'],
      exposedHeaders: ['X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset', 'Retry-After'],
    }),
  );

  // Response Standardization (JSend), before anything that can fail
  app.use(jsendMiddleware);

  // Request Body Parsing
  app.use(express.json({ limit: '100kb' }));

  // HTTP Request Logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const { method, originalUrl } = req;

    res.on('finish', () => {
      const duration = Date.now() - start;
      const { statusCode } = res;
      const logMessage = `${req.ip} - "${method} ${originalUrl} HTTP/${req.httpVersion}" ${statusCode} ${duration}ms`;

      if (statusCode >= 500) {
        logger.error(logMessage);
      } else if (statusCode >= 400) {
        logger.warn(logMessage);
      } else {
        logger.info(logMessage);
      }
    });
    next();
  });

  // --- Route Definitions ---

  // Root Route (Health Check / Status)
  app.get('/', (req: Request, res: Response) => {
    res.status(200).jsend.success({
      message: `API is running in ${config.NODE_ENV} mode`,
      timestamp: new Date().toISOString(),
      server: HOSTNAME,
    });
  });

  app.use('/health', new HealthRouter(container.health).router);

  if (config.METRICS_ENABLED) {
    app.get('/metrics', async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = await container.metrics.render();
        res.setHeader('Content-Type', container.metrics.contentType);
        res.status(200).send(body);
      } catch (error) {
        next(error);
      }
    });
  }

  const authRouter = new AuthRouter({
    gate: container.gate,
    loginService: container.loginService,
    tokenService: container.tokenService,
    permissionResolver: container.permissionResolver,
  });
  app.use('/api/v1/auth', authRouter.router);

  // --- Final Error Handling ---

  // 404 Handler: Catches requests that didn't match any previous route
  app.use((req: Request, res: Response, next: NextFunction) => {
    next(new NotFoundError(`Not found: ${req.method} ${req.originalUrl}`));
  });

  // Global Error Handler: The very last middleware
  app.use(errorHandler);

  return app;
}

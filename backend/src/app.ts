/**
 * Express application
 * Built from its dependencies so tests can supply fakes
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { createDebateRoutes } from './routes/debate-routes.js';
import { errorLogger, requestLogger } from './middleware/request-logger.js';
import type { DebateRegistry, RoundScheduler } from './services/debate/index.js';
import { debateRegistry } from './services/debate/index.js';

export interface AppDeps {
  scheduler: RoundScheduler;
  registry?: DebateRegistry;
}

export function createApp(deps: AppDeps): Express {
  const registry = deps.registry ?? debateRegistry;
  const app = express();

  // Enable CORS for all routes
  app.use((req, res, next) => {
    res.setHeader('Access-Control-Allow-Origin', process.env.FRONTEND_URL || '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }

    next();
  });

  app.use(express.json());
  app.use(requestLogger);

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      activeDebates: registry.getCount(),
    });
  });

  app.use('/api', createDebateRoutes({ scheduler: deps.scheduler, registry }));

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Not found',
      path: req.path,
    });
  });

  app.use(errorLogger);

  // Error handler; malformed JSON bodies arrive here with a 400 status
  app.use((err: Error & { status?: number }, _req: Request, res: Response, _next: NextFunction) => {
    const status = err.status === 400 ? 400 : 500;
    res.status(status).json({
      success: false,
      error: status === 400 ? 'Invalid request body' : 'Internal server error',
      message: process.env.NODE_ENV === 'development' ? err.message : undefined,
    });
  });

  return app;
}

/**
 * HTTP Server
 *
 * Express application hosting the API router, with CORS headers and
 * error mapping from application errors to status codes.
 */

import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import type { Server } from 'http';
import { logger } from '../core/logger.js';
import { AppError, toError } from '../errors/index.js';
import { corsMiddleware } from './cors.js';
import { createApiRouter } from './routes.js';
import type { ApiDeps } from './routes.js';

/**
 * Maps thrown errors to JSON responses
 *
 * AppErrors keep their status code; anything else is a 500.
 */
function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.error({ err, path: req.path }, 'Request failed');
    }
    res.status(err.statusCode).json({ error: err.message, code: err.code });
    return;
  }

  logger.error({ err: toError(err), path: req.path }, 'Unhandled request error');
  res.status(500).json({ error: 'Internal server error' });
}

export interface AppOptions {
  /** Origins allowed to call the API; empty allows any */
  corsOrigins?: string[];
}

export function createApp(deps: ApiDeps, options: AppOptions = {}): Express {
  const app = express();
  app.use(corsMiddleware(options.corsOrigins ?? []));
  app.use(express.json());
  app.use('/api', createApiRouter(deps));
  app.use(errorHandler);
  return app;
}

/**
 * Starts listening on `port` (0 picks a free port)
 */
export function startServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once('listening', () => {
      logger.info({ port: server.address() }, 'API server listening');
      resolve(server);
    });
    server.once('error', reject);
  });
}

/**
 * Stops accepting connections and waits for open ones to finish
 */
export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
  });
}

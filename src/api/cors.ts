/**
 * CORS Middleware
 *
 * Lets a separately hosted frontend call the API. With no allowlist every
 * origin is accepted; otherwise only listed origins are echoed back.
 * Preflight requests end here with 204.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';

export function corsMiddleware(allowedOrigins: string[]): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const origin = req.headers.origin || '';

    if (allowedOrigins.length === 0) {
      res.setHeader('Access-Control-Allow-Origin', '*');
    } else {
      res.setHeader('Vary', 'Origin');
      if (allowedOrigins.includes(origin)) {
        res.setHeader('Access-Control-Allow-Origin', origin);
      }
    }

    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    res.setHeader('Access-Control-Max-Age', '86400');

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }

    next();
  };
}

/**
 * API Authentication and CORS Middleware
 *
 * Optional shared-key authentication using Node.js crypto.
 */

import { timingSafeEqual } from 'node:crypto';
import type { IncomingMessage, ServerResponse } from 'node:http';

/**
 * Constant-time comparison of API keys
 */
export function verifyApiKey(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

export type RequestHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  next: () => void
) => void;

/**
 * Create an API key authentication middleware. The key is read from a
 * `Bearer` authorization header or the `api_key` query parameter.
 */
export function createAuthMiddleware(apiKey: string): RequestHandler {
  return (req, res, next) => {
    const url = new URL(req.url || '/', 'http://localhost');

    // Health checks and preflight requests stay open
    if (url.pathname === '/api/health' || req.method === 'OPTIONS') {
      return next();
    }

    const authHeader = req.headers.authorization;
    const providedKey = authHeader?.startsWith('Bearer ')
      ? authHeader.slice(7)
      : url.searchParams.get('api_key');

    if (!providedKey || !verifyApiKey(providedKey, apiKey)) {
      res.writeHead(401, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Unauthorized', code: 'INVALID_API_KEY' }));
      return;
    }

    next();
  };
}

/**
 * Create CORS middleware. With credentials allowed, the request origin is
 * echoed back instead of `*`.
 */
export function createCorsMiddleware(origins: string[] = ['*'], allowCredentials = false): RequestHandler {
  const allowAll = origins.includes('*');

  return (req, res, next) => {
    const origin = req.headers.origin;

    if (origin && (allowAll || origins.includes(origin))) {
      res.setHeader('Access-Control-Allow-Origin', allowAll && !allowCredentials ? '*' : origin);
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PATCH, DELETE, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
      if (allowCredentials) {
        res.setHeader('Access-Control-Allow-Credentials', 'true');
      }
      res.setHeader('Vary', 'Origin');
    }

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    next();
  };
}

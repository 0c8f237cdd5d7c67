import { Request, NextFunction } from 'express';
import { Counter } from 'prom-client';
import { logger } from '../config';

// Metric for tracking auth failures
const authFailures = new Counter({
  name: 'auth_failures_total',
  help: 'Total number of authentication failures',
  labelNames: ['type', 'endpoint'],
});

// Middleware only reads these parts of the request and response
export type KeyedRequest = Pick<Request, 'headers' | 'path'>;
export type ClientRequest = Pick<Request, 'ip'>;

export interface JsonResponse {
  status(code: number): { json(body: unknown): unknown };
}

export type Middleware<R> = (req: R, res: JsonResponse, next: NextFunction) => void;

function headerValue(req: KeyedRequest, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * API key authentication through the `x-api-key` header.
 * With no keys configured every request is rejected.
 */
export function requireApiKey(apiKeys: string[]): Middleware<KeyedRequest> {
  const accepted = new Set(apiKeys);

  return (req, res, next) => {
    const apiKey = headerValue(req, 'x-api-key');

    if (!apiKey) {
      authFailures.labels({ type: 'missing_api_key', endpoint: req.path }).inc();
      res.status(401).json({ error: 'No API key provided' });
      return;
    }

    if (!accepted.has(apiKey)) {
      authFailures.labels({ type: 'invalid_api_key', endpoint: req.path }).inc();
      logger.warn({ path: req.path, apiKey: `${apiKey.substring(0, 4)}...` }, 'Invalid API key');
      res.status(401).json({ error: 'Invalid API key' });
      return;
    }

    next();
  };
}

// Fixed-window request limiter keyed by client address
export function rateLimit(windowMs: number = 60000, max: number = 100): Middleware<ClientRequest> {
  const requests = new Map<string, number[]>();

  return (req, res, next) => {
    const key = req.ip || 'unknown';
    const now = Date.now();

    const recentRequests = (requests.get(key) ?? []).filter((time) => now - time < windowMs);

    if (recentRequests.length >= max) {
      logger.warn({ ip: key, requests: recentRequests.length }, 'Rate limit exceeded');
      res.status(429).json({
        error: 'Too many requests',
        retryAfter: Math.ceil(windowMs / 1000),
      });
      return;
    }

    recentRequests.push(now);
    requests.set(key, recentRequests);

    if (requests.size > 1000) {
      for (const [ip, history] of requests.entries()) {
        if (history.every((time) => now - time >= windowMs)) {
          requests.delete(ip);
        }
      }
    }

    next();
  };
}

/**
 * Request Logging Middleware
 *
 * Logs HTTP requests with method, path, duration, and status code.
 * Uses pino-http for automatic request/response logging with timing.
 *
 * Log format includes:
 * - method: HTTP method (GET, POST, etc.)
 * - url: Request path
 * - statusCode: Response status code
 * - responseTime: Request duration in milliseconds
 * - requestId: Unique identifier for request tracing
 */

import pinoHttp from 'pino-http';
import { randomUUID } from 'crypto';
import type { Request, Response } from 'express';
import type { IncomingMessage, ServerResponse } from 'http';
import { loggers } from '../logger';
import { config } from '../config';

/**
 * Reuse the request ID of a load balancer or proxy when present
 */
function genReqId(req: Request): string {
  const existingId = req.headers['x-request-id'] || req.headers['x-correlation-id'];
  if (typeof existingId === 'string') {
    return existingId;
  }
  return randomUUID();
}

const serializers = {
  req(req: IncomingMessage & { id?: string; raw?: Request }) {
    return {
      id: req.id,
      method: req.method,
      url: req.url,
      userId: req.raw?.user?.id,
      headers: {
        host: req.headers.host,
        'user-agent': req.headers['user-agent'],
        'content-type': req.headers['content-type'],
        'content-length': req.headers['content-length'],
        'if-modified-since': req.headers['if-modified-since'],
      },
    };
  },
  res(res: ServerResponse) {
    return {
      statusCode: res.statusCode,
    };
  },
};

function customLogLevel(req: Request, res: Response, err?: Error): 'error' | 'warn' | 'debug' | 'info' {
  if (err || res.statusCode >= 500) {
    return 'error';
  }
  if (res.statusCode >= 400) {
    return 'warn';
  }
  // Health checks and content fetches are too frequent for info
  if (req.url === '/api/health' || /\/content$/.test(req.path)) {
    return 'debug';
  }
  return 'info';
}

function customSuccessMessage(req: Request, res: Response, responseTime: number): string {
  return `${req.method} ${req.url} ${res.statusCode} ${responseTime.toFixed(0)}ms`;
}

function customErrorMessage(req: Request, res: Response, err: Error): string {
  return `${req.method} ${req.url} ${res.statusCode} - ${err.message}`;
}

export const requestLogger = pinoHttp<Request, Response>({
  logger: loggers.http,
  genReqId,
  serializers,
  customLogLevel,
  customSuccessMessage,
  customErrorMessage,
  autoLogging: {
    ignore: (req) => config.server.isProduction && req.url === '/api/health',
  },
  customAttributeKeys: {
    req: 'req',
    res: 'res',
    err: 'err',
    responseTime: 'responseTime',
    reqId: 'requestId',
  },
  // Element payloads carry base64 files; only their size is logged
  customProps: (req) => {
    if (req.method === 'GET' || !req.body) {
      return {};
    }
    return { bodySize: JSON.stringify(req.body).length };
  },
});

export default requestLogger;

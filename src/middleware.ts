import type { ErrorRequestHandler, RequestHandler } from 'express';
import { ApiError } from './errors.js';
import type { Logger } from './logger.js';

export function requestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const startedAt = process.hrtime.bigint();
    res.on('finish', () => {
      const elapsedMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      logger.debug(`${req.method} ${req.originalUrl} ${res.statusCode} ${elapsedMs.toFixed(1)}ms`);
    });
    next();
  };
}

export function cors(): RequestHandler {
  return (req, res, next) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }
    next();
  };
}

export const notFound: RequestHandler = (_req, res) => {
  res.status(404).json({ error: 'Not Found: No such route', code: 'NOT_FOUND' });
};

// body-parser rejects malformed JSON with a SyntaxError tagged with its type
function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

const clientErrors: Record<number, { reason: string; code: string }> = {
  400: { reason: 'Bad Request', code: 'INVALID_INPUT' },
  413: { reason: 'Payload Too Large', code: 'PAYLOAD_TOO_LARGE' },
  415: { reason: 'Unsupported Media Type', code: 'UNSUPPORTED_MEDIA_TYPE' },
};

// body-parser and express tag client errors with a 4xx status
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    if (err instanceof ApiError) {
      res.status(err.status).json({ error: err.message, code: err.code });
      return;
    }

    if (isBodyParseError(err)) {
      res.status(400).json({ error: 'Bad Request: Malformed JSON body', code: 'INVALID_INPUT' });
      return;
    }

    const status = clientErrorStatus(err);
    if (status !== undefined) {
      const { reason, code } = clientErrors[status] ?? { reason: 'Client Error', code: 'CLIENT_ERROR' };
      const detail = err instanceof Error ? err.message : 'Invalid request';
      res.status(status).json({ error: `${reason}: ${detail}`, code });
      return;
    }

    logger.error(`Unhandled error on ${req.method} ${req.originalUrl}`, err);
    res.status(500).json({ error: 'Internal Server Error', code: 'INTERNAL_ERROR' });
  };
}

/**
 * Request plumbing shared by every route: request ids, HTTP metrics and the
 * error envelope { error: { code, message, details?, requestId } }.
 */

import crypto from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AppError } from '../errors';
import { httpRequestsTotal, httpRequestDuration } from '../metrics';

const REQUEST_ID = /^[A-Za-z0-9_.-]{1,64}$/;

export function requestId(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const inbound = req.get('X-Request-Id');
    req.id = inbound && REQUEST_ID.test(inbound)
      ? inbound
      : `req_${Date.now()}_${crypto.randomBytes(4).toString('hex')}`;
    res.setHeader('X-Request-Id', req.id);
    next();
  };
}

export function httpMetrics(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const stopTimer = httpRequestDuration.startTimer({ method: req.method });
    res.on('finish', () => {
      const routePath: unknown = req.route?.path;
      const endpoint = typeof routePath === 'string' ? `${req.baseUrl}${routePath}` : 'unmatched';
      httpRequestsTotal.inc({ method: req.method, endpoint, status: String(res.statusCode) });
      stopTimer({ endpoint });
    });
    next();
  };
}

/** Forwards rejections of async handlers to the error middleware. */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: {
      code: 'NOT_FOUND',
      message: `Endpoint ${req.method} ${req.path} not found`,
      requestId: req.id,
    },
  });
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(exposeInternalErrors: boolean) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof AppError) {
      if (err.httpStatus >= 500) {
        console.error(`[HTTP] ${req.method} ${req.path} failed: ${err.message}`);
      }
      res.status(err.httpStatus).json({
        error: {
          code: err.code,
          message: err.message,
          details: err.details,
          requestId: req.id,
        },
      });
      return;
    }

    if (isBodyParseError(err)) {
      res.status(400).json({
        error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body', requestId: req.id },
      });
      return;
    }

    console.error('[HTTP] Unhandled error:', err);
    res.status(500).json({
      error: {
        code: 'INTERNAL_ERROR',
        message: exposeInternalErrors && err instanceof Error ? err.message : 'An internal error occurred',
        requestId: req.id,
      },
    });
  };
}

// =============================================================================
// TYPE EXTENSIONS
// =============================================================================

declare global {
  namespace Express {
    interface Request {
      id: string;
    }
  }
}

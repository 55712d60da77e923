import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { errorMessage, isRecord } from '@mqtt-dashboard/shared';
import { SERVICE } from './config.js';

export type ApiErrorCode =
  | 'invalid_request'
  | 'missing_topic'
  | 'invalid_topic'
  | 'invalid_topic_wildcards'
  | 'invalid_qos'
  | 'invalid_retain'
  | 'invalid_topic_filter'
  | 'broker_disconnected'
  | 'sys_not_subscribed'
  | 'topic_tracker_not_subscribed'
  | 'topic_not_found'
  | 'not_found'
  | 'publish_failed'
  | 'publish_error'
  | 'bridge_timeout'
  | 'bridge_unavailable'
  | 'internal_error';

export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: ApiErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/** Lets async route handlers hand rejections to the error middleware. */
export function asyncRoute(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

export function notFound(req: Request, _res: Response, next: NextFunction): void {
  next(new ApiError(404, 'not_found', `Endpoint not found: ${req.method} ${req.path}`));
}

function isJsonParseError(err: unknown): boolean {
  return isRecord(err) && err.type === 'entity.parse.failed';
}

// Express recognises error middleware by its four parameters.
export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof ApiError) {
    res.status(err.status).json({ success: false, error: err.message, code: err.code });
    return;
  }
  if (isJsonParseError(err)) {
    res.status(400).json({ success: false, error: 'Request body must be JSON', code: 'invalid_request' });
    return;
  }
  console.error(`[${SERVICE}] unhandled route error:`, errorMessage(err));
  res.status(500).json({ success: false, error: 'Internal server error', code: 'internal_error' });
}

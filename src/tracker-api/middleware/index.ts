import type { NextFunction, Request, RequestHandler, Response } from 'express';
import morgan from 'morgan';
import type { ZodType, ZodTypeDef } from 'zod';
import { ProcessEngine, ERROR_STATUS, type OperationResult } from '@core/index';
import type { ApiResponse } from '@shared/types';

export const requestLogger = morgan('dev');

/** Forwards a rejected handler promise to the error handler. */
export function asyncRoute(handler: (req: Request, res: Response) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function engineOf(req: Request): ProcessEngine {
  const engine: unknown = req.app.locals.engine;
  if (!(engine instanceof ProcessEngine)) {
    throw new Error('Process engine is not configured');
  }
  return engine;
}

/** Parses a request body, answering 400 itself when it does not fit. */
export function parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, req: Request, res: Response): T | null {
  const parsed = schema.safeParse(req.body);
  if (parsed.success) return parsed.data;

  const error = parsed.error.issues
    .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
    .join('; ');
  const response: ApiResponse = { success: false, error };
  res.status(400).json(response);
  return null;
}

export function sendResult<T>(res: Response, result: OperationResult<T>, status = 200) {
  if (result.ok) {
    const response: ApiResponse<T> = { success: true, data: result.data, warnings: result.warnings };
    return res.status(status).json(response);
  }
  const response: ApiResponse = {
    success: false,
    error: result.error.message,
    code: result.error.reason,
    departments: result.error.departments,
  };
  return res.status(ERROR_STATUS[result.error.type]).json(response);
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof SyntaxError) {
    return res.status(400).json({ success: false, error: 'Malformed JSON body' });
  }
  console.error('[ERROR]', err.message);
  res.status(500).json({ success: false, error: err.message });
}

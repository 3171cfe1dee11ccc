import { Request, Response, NextFunction } from '@/config/http';

export interface IJSendHelper {
  success(data?: unknown): void;
  fail(data: unknown): void;
  error(errorData: { message: string; code?: string; data?: unknown }): void;
}

// Middleware qui attache l'helper `jsend` à `res`
export function jsendMiddleware(req: Request, res: Response, next: NextFunction): void {
  const helper: IJSendHelper = {
    success(data: unknown = null): void {
      if (res.headersSent) return;
      res.json({ status: 'success', data });
    },

    fail(data: unknown): void {
      if (res.headersSent) return;
      if (res.statusCode < 400) {
        res.status(400);
      }
      res.json({ status: 'fail', data });
    },

    error(errorData): void {
      if (res.headersSent) return;
      if (res.statusCode < 500) {
        res.status(500);
      }
      res.json({
        status: 'error',
        message: errorData.message,
        code: errorData.code,
        data: errorData.data,
      });
    },
  };

  res.jsend = helper;

  next();
}

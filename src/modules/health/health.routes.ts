import { requestSignal } from '@/common/middleware/authGate';
import { BaseRouter } from '@/common/routing/BaseRouter';
import { Request, Response, NextFunction } from '@/config/http';

import type { HealthService } from './services/health.services';

/**
 * /health endpoints for orchestrators. Neither is rate limited nor needs a
 * token.
 */
export class HealthRouter extends BaseRouter {
  constructor(private readonly health: HealthService) {
    super();
    this.router.get('/live', (req, res, next) => this.live(req, res, next));
    this.router.get('/ready', (req, res, next) => this.ready(req, res, next));
  }

  /**
   * GET /live - The process is up.
   */
  async live(req: Request, res: Response, next: NextFunction): Promise<void> {
    await this.pipe(req, res, next, async () => ({ status: 'alive' }));
  }

  /**
   * GET /ready - Every dependency answers. 503 with the report otherwise.
   */
  async ready(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const report = await this.health.checkAll(requestSignal(req, res));
      if (report.status === 'healthy') {
        res.status(200).jsend.success(report);
        return;
      }
      res.status(503).jsend.error({
        message: 'Service unhealthy',
        code: 'ERR_SERVICE_UNAVAILABLE',
        data: report,
      });
    } catch (error) {
      next(error);
    }
  }
}

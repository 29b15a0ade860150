import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import { CartService } from '../services/cart.service.js';
import { CartSweeper } from '../services/cart.sweeper.js';
import { CartMonitor } from '../services/cart.monitor.js';
import { AuthEnv, requireRole } from '../lib/auth.js';
import { jsonError } from './cart.routes.js';

/**
 * Operational endpoints for cart cleanup, restricted to admins
 */
export function createAdminRoutes(
  service: CartService,
  sweeper: CartSweeper,
  monitor: CartMonitor,
  auth: MiddlewareHandler<AuthEnv>
): Hono<AuthEnv> {
  const app = new Hono<AuthEnv>();

  app.use('*', auth, requireRole('admin'));

  /**
   * GET /admin/carts/stats - Cart counts and sweeper metrics
   */
  app.get('/stats', async (c) => {
    try {
      const carts = await service.getStatistics();
      return c.json({
        carts,
        sweeper: { running: sweeper.isRunning(), ...sweeper.getMetrics() },
      });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * GET /admin/carts/health - Run the health check now
   */
  app.get('/health', async (c) => {
    const report = await monitor.check();
    if (!report) {
      return c.json(
        { error: { code: 'HEALTH_CHECK_FAILED', message: 'Cart health check failed' } },
        500
      );
    }
    return c.json({ healthy: report.warnings.length === 0, ...report });
  });

  /**
   * POST /admin/carts/cleanup - Run a sweep now (?dryRun=true only counts)
   */
  app.post('/cleanup', async (c) => {
    try {
      if (c.req.query('dryRun') === 'true') {
        const expired = await service.countExpiredCarts();
        return c.json({ dryRun: true, expired });
      }

      const result = await sweeper.runOnce();
      if (!result) {
        return c.json({ error: { code: 'CLEANUP_FAILED', message: 'Cart cleanup failed' } }, 500);
      }
      return c.json({ dryRun: false, ...result });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  return app;
}

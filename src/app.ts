import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { CartService } from './services/cart.service.js';
import { CartSweeper } from './services/cart.sweeper.js';
import { CartMonitor } from './services/cart.monitor.js';
import { CartConfig } from './config/cart.js';
import { Authenticator, AuthEnv, createAuthMiddleware } from './lib/auth.js';
import { createCartRoutes } from './routes/cart.routes.js';
import { createAdminRoutes } from './routes/admin.routes.js';

export interface AppDependencies {
  service: CartService;
  sweeper: CartSweeper;
  monitor: CartMonitor;
  authenticator: Authenticator;
  config: CartConfig;
  requestLogging?: boolean;
}

export function createApp(deps: AppDependencies): Hono<AuthEnv> {
  const app = new Hono<AuthEnv>();

  if (deps.requestLogging ?? true) {
    app.use('*', logger());
  }

  // Health check
  app.get('/health', (c) => {
    return c.json({ status: 'ok' });
  });

  const auth = createAuthMiddleware(deps.authenticator);
  app.route('/cart', createCartRoutes(deps.service, deps.config, auth));
  app.route('/admin/carts', createAdminRoutes(deps.service, deps.sweeper, deps.monitor, auth));

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Route not found',
        },
      },
      404
    );
  });

  return app;
}

import { Hono } from 'hono';
import type { Context, MiddlewareHandler } from 'hono';
import { CartService } from '../services/cart.service.js';
import { CartConfig } from '../config/cart.js';
import { AuthEnv, requireRole } from '../lib/auth.js';
import { InvalidParameterError, toErrorResponse, toErrorStatus } from '../lib/errors.js';
import {
  validateAddItemRequest,
  validateArticleIdParam,
  validateStatusParam,
  validateUpdateItemRequest,
} from '../lib/validation.js';

export const CART_ROLES = ['client', 'auxiliar'];

/**
 * Helper to return JSON error responses with proper status codes
 */
export function jsonError(c: Context, error: unknown) {
  if (toErrorStatus(error) === 500) {
    console.error(`${c.req.method} ${c.req.path} failed:`, error);
  }
  return c.json(toErrorResponse(error), toErrorStatus(error));
}

export async function readJson(c: Context): Promise<unknown> {
  try {
    const body: unknown = await c.req.json();
    return body;
  } catch {
    throw new InvalidParameterError('Request body must be valid JSON');
  }
}

/**
 * Create cart routes for the authenticated user
 */
export function createCartRoutes(
  service: CartService,
  config: CartConfig,
  auth: MiddlewareHandler<AuthEnv>
): Hono<AuthEnv> {
  const app = new Hono<AuthEnv>();

  app.use('*', auth, requireRole(...CART_ROLES));

  /**
   * POST /cart - Create a new cart
   */
  app.post('/', async (c) => {
    try {
      const cart = await service.createCart(c.get('user').userId);
      return c.json(service.toResponse(cart), 201);
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * GET /cart - Get the active cart
   */
  app.get('/', async (c) => {
    try {
      const cart = await service.getActiveCart(c.get('user').userId);
      return c.json(service.toResponse(cart));
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * GET /cart/status/:status - Latest cart in a status
   */
  app.get('/status/:status', async (c) => {
    try {
      const status = validateStatusParam(c.req.param('status'));
      const cart = await service.getCartByStatus(c.get('user').userId, status);
      return c.json(service.toResponse(cart));
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * POST /cart/items - Add an item to the cart
   */
  app.post('/items', async (c) => {
    try {
      const input = validateAddItemRequest(await readJson(c), config.maxQuantity);
      const cart = await service.addItem(c.get('user').userId, input);
      return c.json(service.toResponse(cart), 201);
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * PUT /cart/items - Change the quantity of an item
   */
  app.put('/items', async (c) => {
    try {
      const { articleId, quantity } = validateUpdateItemRequest(
        await readJson(c),
        config.maxQuantity
      );
      const cart = await service.updateItemQuantity(c.get('user').userId, articleId, quantity);
      return c.json(service.toResponse(cart));
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * DELETE /cart/items/:articleId - Remove an item from the cart
   */
  app.delete('/items/:articleId', async (c) => {
    try {
      const articleId = validateArticleIdParam(c.req.param('articleId'));
      const cart = await service.removeItem(c.get('user').userId, articleId);
      return c.json(service.toResponse(cart));
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * DELETE /cart - Remove all items
   */
  app.delete('/', async (c) => {
    try {
      const cart = await service.clearCart(c.get('user').userId);
      return c.json(service.toResponse(cart));
    } catch (error) {
      return jsonError(c, error);
    }
  });

  app.post('/abandon', async (c) => {
    try {
      const cart = await service.abandonCart(c.get('user').userId);
      return c.json(service.toResponse(cart));
    } catch (error) {
      return jsonError(c, error);
    }
  });

  app.post('/complete', async (c) => {
    try {
      const cart = await service.completeCart(c.get('user').userId);
      return c.json(service.toResponse(cart));
    } catch (error) {
      return jsonError(c, error);
    }
  });

  return app;
}

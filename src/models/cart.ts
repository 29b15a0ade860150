import { randomUUID } from 'crypto';
import {
  AddItemInput,
  Cart,
  CART_STATUSES,
  CartItem,
  CartRules,
  SessionInfo,
} from './types.js';
import {
  DuplicateArticleError,
  InvalidOperationError,
  InvalidParameterError,
  ItemNotFoundError,
  LimitExceededError,
} from '../lib/errors.js';

const TOTAL_EPSILON = 1e-9;

/**
 * Sum of price × quantity over all items
 */
export function calculateTotal(items: CartItem[]): number {
  return items.reduce((sum, item) => sum + item.price * item.quantity, 0);
}

/**
 * Create a new, not yet persisted, active cart for a user
 */
export function createCart(userId: string, now: Date = new Date()): Cart {
  if (typeof userId !== 'string' || userId.trim().length === 0) {
    throw new InvalidParameterError('User ID cannot be empty');
  }

  return {
    id: null,
    userId,
    sessionId: randomUUID().replace(/-/g, ''),
    items: [],
    total: 0,
    status: 'ACTIVE',
    lastActivity: now,
    createdAt: now,
    version: 0,
  };
}

export function isStale(cart: Cart, now: Date, ttlMs: number): boolean {
  return now.getTime() - cart.lastActivity.getTime() > ttlMs;
}

export function isApproachingExpiry(
  cart: Cart,
  now: Date,
  ttlMs: number,
  warningMs: number
): boolean {
  const elapsed = now.getTime() - cart.lastActivity.getTime();
  return elapsed <= ttlMs && elapsed >= ttlMs - warningMs;
}

export function getSessionInfo(
  cart: Cart,
  now: Date,
  ttlMs: number,
  warningMs: number
): SessionInfo {
  return {
    expiresAt: new Date(cart.lastActivity.getTime() + ttlMs),
    approachingExpiry: isApproachingExpiry(cart, now, ttlMs, warningMs),
    stale: isStale(cart, now, ttlMs),
  };
}

function assertMutable(cart: Cart, rules: CartRules): void {
  if (cart.status !== 'ACTIVE') {
    throw new InvalidOperationError('Cart is not active');
  }
  if (isStale(cart, rules.now, rules.ttlMs)) {
    throw new InvalidOperationError('Cart session has expired');
  }
}

function assertArticleId(articleId: unknown): asserts articleId is number {
  if (typeof articleId !== 'number' || !Number.isInteger(articleId) || articleId <= 0) {
    throw new InvalidParameterError('Article ID is required');
  }
}

function assertQuantity(quantity: unknown, maxQuantity: number): asserts quantity is number {
  if (typeof quantity !== 'number' || !Number.isInteger(quantity) || quantity <= 0) {
    throw new InvalidParameterError('Quantity must be greater than zero');
  }
  if (quantity > maxQuantity) {
    throw new InvalidParameterError(`Quantity cannot exceed ${maxQuantity}`);
  }
}

function assertPrice(price: unknown): asserts price is number {
  if (typeof price !== 'number' || !Number.isFinite(price)) {
    throw new InvalidParameterError('Invalid price value');
  }
  if (price < 0) {
    throw new InvalidParameterError('Price must be greater than or equal to zero');
  }
}

function withItems(cart: Cart, items: CartItem[], now: Date): Cart {
  return {
    ...cart,
    items,
    total: calculateTotal(items),
    lastActivity: now,
    version: cart.version + 1,
  };
}

/**
 * Add a new article to the cart; an article may appear at most once
 */
export function addItem(cart: Cart, input: AddItemInput, rules: CartRules): Cart {
  assertMutable(cart, rules);
  assertArticleId(input.articleId);
  if (typeof input.articleName !== 'string' || input.articleName.trim().length === 0) {
    throw new InvalidParameterError('Article name cannot be empty');
  }
  assertQuantity(input.quantity, rules.maxQuantity);
  assertPrice(input.price);

  if (cart.items.length >= rules.maxItems) {
    throw new LimitExceededError(`Cart cannot hold more than ${rules.maxItems} items`);
  }
  if (cart.items.some((item) => item.articleId === input.articleId)) {
    throw new DuplicateArticleError(`Article ${input.articleId} already exists in cart`);
  }

  const item: CartItem = {
    articleId: input.articleId,
    articleName: input.articleName,
    quantity: input.quantity,
    price: input.price,
    subtotal: input.price * input.quantity,
  };

  return withItems(cart, [...cart.items, item], rules.now);
}

export function updateItemQuantity(
  cart: Cart,
  articleId: number,
  quantity: number,
  rules: CartRules
): Cart {
  assertMutable(cart, rules);
  assertQuantity(quantity, rules.maxQuantity);

  const index = cart.items.findIndex((item) => item.articleId === articleId);
  if (index < 0) {
    throw new ItemNotFoundError(`Article ${articleId} not found in cart`);
  }

  const items = [...cart.items];
  items[index] = {
    ...items[index],
    quantity,
    subtotal: items[index].price * quantity,
  };

  return withItems(cart, items, rules.now);
}

export function removeItem(cart: Cart, articleId: number, rules: CartRules): Cart {
  assertMutable(cart, rules);

  const items = cart.items.filter((item) => item.articleId !== articleId);
  if (items.length === cart.items.length) {
    throw new ItemNotFoundError(`Article ${articleId} not found in cart`);
  }

  return withItems(cart, items, rules.now);
}

export function clearCart(cart: Cart, rules: CartRules): Cart {
  assertMutable(cart, rules);
  return withItems(cart, [], rules.now);
}

export function abandonCart(cart: Cart, now: Date): Cart {
  if (cart.status !== 'ACTIVE') {
    throw new InvalidOperationError(`Cannot abandon a ${cart.status.toLowerCase()} cart`);
  }
  return { ...cart, status: 'ABANDONED', lastActivity: now, version: cart.version + 1 };
}

export function completeCart(cart: Cart, now: Date): Cart {
  if (cart.status !== 'ACTIVE') {
    throw new InvalidOperationError(`Cannot complete a ${cart.status.toLowerCase()} cart`);
  }
  if (cart.items.length === 0) {
    throw new InvalidOperationError('Cannot complete an empty cart');
  }
  return { ...cart, status: 'COMPLETED', lastActivity: now, version: cart.version + 1 };
}

/**
 * Structural self-check run before a cart is persisted
 */
export function validateCart(cart: Cart, maxQuantity: number): void {
  if (typeof cart.userId !== 'string' || cart.userId.trim().length === 0) {
    throw new InvalidOperationError('Cart has no owner');
  }
  if (!CART_STATUSES.includes(cart.status)) {
    throw new InvalidOperationError(`Cart has unknown status '${cart.status}'`);
  }

  const seen = new Set<number>();
  for (const item of cart.items) {
    if (seen.has(item.articleId)) {
      throw new InvalidOperationError(`Article ${item.articleId} appears more than once`);
    }
    seen.add(item.articleId);

    try {
      assertArticleId(item.articleId);
      assertQuantity(item.quantity, maxQuantity);
      assertPrice(item.price);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidOperationError(`Article ${item.articleId} is invalid: ${reason}`);
    }

    if (Math.abs(item.subtotal - item.price * item.quantity) > TOTAL_EPSILON) {
      throw new InvalidOperationError(`Article ${item.articleId} has an inconsistent subtotal`);
    }
  }

  if (Math.abs(cart.total - calculateTotal(cart.items)) > TOTAL_EPSILON) {
    throw new InvalidOperationError('Cart total does not match its items');
  }
}

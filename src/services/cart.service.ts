import { CartStore } from '../clients/cartStore.js';
import { CartConfig, DEFAULT_CART_CONFIG, ttlMs, warningMs } from '../config/cart.js';
import {
  abandonCart,
  addItem,
  clearCart,
  completeCart,
  createCart,
  getSessionInfo,
  isStale,
  removeItem,
  updateItemQuantity,
  validateCart,
} from '../models/cart.js';
import {
  AddItemInput,
  Cart,
  CartResponse,
  CartRules,
  CartStatistics,
  CartStatus,
  SweepResult,
} from '../models/types.js';
import {
  CartError,
  CartNotFoundError,
  InvalidOperationError,
  InvalidParameterError,
  StorageError,
  VersionConflictError,
} from '../lib/errors.js';
import { retryOnConflict, sleep, Sleep } from '../lib/retry.js';

export type CartLogger = Pick<Console, 'info' | 'warn' | 'error'>;

export interface CartServiceOptions {
  now?: () => Date;
  sleep?: Sleep;
  logger?: CartLogger;
}

type Mutation = (cart: Cart, rules: CartRules) => Cart;

interface ActiveCartLookup {
  cart: Cart | null;
  expired: boolean;
}

function assertUserId(userId: string): void {
  if (typeof userId !== 'string' || userId.trim().length === 0) {
    throw new InvalidParameterError('User ID cannot be empty');
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Orders duplicate active carts: most recent activity first, lowest id on ties
 */
function survivorOrder(a: Cart, b: Cart): number {
  const byActivity = b.lastActivity.getTime() - a.lastActivity.getTime();
  if (byActivity !== 0) {
    return byActivity;
  }
  return (a.id ?? Number.MAX_SAFE_INTEGER) - (b.id ?? Number.MAX_SAFE_INTEGER);
}

/**
 * Cart service: read-modify-write cycles against a versioned store.
 *
 * Each mutation reads the user's active cart, applies one aggregate
 * operation in memory and writes it back with a compare-and-swap on the
 * version it read. A lost race re-runs the whole cycle against fresh data.
 */
export class CartService {
  private readonly now: () => Date;
  private readonly sleep: Sleep;
  private readonly logger: CartLogger;
  private readonly ttlMs: number;
  private readonly warningMs: number;

  constructor(
    private readonly store: CartStore,
    private readonly config: CartConfig = DEFAULT_CART_CONFIG,
    options: CartServiceOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? console;
    this.ttlMs = ttlMs(config);
    this.warningMs = warningMs(config);
  }

  /**
   * Create an active cart; an expired one is abandoned and replaced
   */
  async createCart(userId: string): Promise<Cart> {
    assertUserId(userId);
    return this.withRetry(userId, 'createCart', async () => {
      const { cart } = await this.findActiveCart(userId);
      if (cart) {
        throw new InvalidOperationError('User already has an active cart');
      }
      return this.persist(createCart(userId, this.now()), null);
    });
  }

  async getActiveCart(userId: string): Promise<Cart> {
    assertUserId(userId);
    return this.withRetry(userId, 'getActiveCart', () => this.requireActiveCart(userId));
  }

  /**
   * Add an item, creating the cart when the user has none
   */
  async addItem(userId: string, input: AddItemInput): Promise<Cart> {
    assertUserId(userId);
    return this.withRetry(userId, 'addItem', async () => {
      const { cart } = await this.findActiveCart(userId);
      const rules = this.rules();

      if (!cart) {
        return this.persist(addItem(createCart(userId, rules.now), input, rules), null);
      }
      return this.persist(addItem(cart, input, rules), cart.version);
    });
  }

  async updateItemQuantity(userId: string, articleId: number, quantity: number): Promise<Cart> {
    return this.mutate(userId, 'updateItemQuantity', (cart, rules) =>
      updateItemQuantity(cart, articleId, quantity, rules)
    );
  }

  async removeItem(userId: string, articleId: number): Promise<Cart> {
    return this.mutate(userId, 'removeItem', (cart, rules) => removeItem(cart, articleId, rules));
  }

  async clearCart(userId: string): Promise<Cart> {
    return this.mutate(userId, 'clearCart', (cart, rules) => clearCart(cart, rules));
  }

  async abandonCart(userId: string): Promise<Cart> {
    return this.mutate(userId, 'abandonCart', (cart, rules) => abandonCart(cart, rules.now));
  }

  async completeCart(userId: string): Promise<Cart> {
    return this.mutate(userId, 'completeCart', (cart, rules) => completeCart(cart, rules.now));
  }

  /**
   * Most recent cart of the user in a given status
   */
  async getCartByStatus(userId: string, status: CartStatus): Promise<Cart> {
    if (status === 'ACTIVE') {
      return this.getActiveCart(userId);
    }

    assertUserId(userId);
    const carts = await this.callStore(() => this.store.findByStatus(userId, status));
    if (carts.length === 0) {
      throw new CartNotFoundError(`No cart found for user with status: ${status}`);
    }
    return carts[0];
  }

  /**
   * Abandon active carts idle for longer than the TTL. A cart that changed
   * since the scan is re-read and skipped when it is no longer stale.
   * Failures on single carts are logged and counted; the sweep carries on.
   */
  async sweepExpiredCarts(): Promise<SweepResult> {
    const startedAt = Date.now();
    const cutoff = new Date(this.now().getTime() - this.ttlMs);
    const expired = await this.callStore(() =>
      this.store.findAllActive(cutoff, this.config.sweep.batchSize)
    );

    let abandoned = 0;
    let skipped = 0;
    let failed = 0;
    for (const cart of expired) {
      try {
        if (await this.abandonIfExpired(cart)) {
          abandoned++;
        } else {
          skipped++;
        }
      } catch (error) {
        failed++;
        this.logger.warn(`Could not abandon expired cart ${cart.id}: ${describeError(error)}`);
      }
    }

    const result: SweepResult = {
      scanned: expired.length,
      abandoned,
      skipped,
      failed,
      durationMs: Date.now() - startedAt,
    };
    this.logger.info(
      `Cart sweep finished: ${abandoned} abandoned, ${skipped} skipped, ${failed} failed, ${result.scanned} scanned in ${result.durationMs}ms`
    );
    return result;
  }

  /**
   * Number of carts the next sweep would abandon
   */
  async countExpiredCarts(): Promise<number> {
    const cutoff = new Date(this.now().getTime() - this.ttlMs);
    const expired = await this.callStore(() =>
      this.store.findAllActive(cutoff, this.config.sweep.batchSize)
    );
    return expired.length;
  }

  async getStatistics(): Promise<CartStatistics> {
    const recentSince = new Date(this.now().getTime() - this.ttlMs);
    return this.callStore(() => this.store.countByStatus(recentSince));
  }

  /**
   * Attach the session view clients use for expiry warnings
   */
  toResponse(cart: Cart): CartResponse {
    return {
      cart,
      session: getSessionInfo(cart, this.now(), this.ttlMs, this.warningMs),
    };
  }

  private async mutate(userId: string, operation: string, mutation: Mutation): Promise<Cart> {
    assertUserId(userId);
    return this.withRetry(userId, operation, async () => {
      const cart = await this.requireActiveCart(userId);
      return this.persist(mutation(cart, this.rules()), cart.version);
    });
  }

  private withRetry<T>(userId: string, operation: string, attempt: () => Promise<T>): Promise<T> {
    return retryOnConflict(attempt, {
      maxAttempts: this.config.retry.maxAttempts,
      baseDelayMs: this.config.retry.baseDelayMs,
      sleep: this.sleep,
      onRetry: (attemptNumber, delayMs) => {
        this.logger.warn(
          `Version conflict on ${operation} for user ${userId} (attempt ${attemptNumber}), retrying in ${delayMs}ms`
        );
      },
    });
  }

  private async requireActiveCart(userId: string): Promise<Cart> {
    const { cart, expired } = await this.findActiveCart(userId);
    if (!cart) {
      throw new CartNotFoundError(
        expired ? 'Cart session expired' : 'No active cart found for user'
      );
    }
    return cart;
  }

  /**
   * Load the user's active cart, repairing duplicates and abandoning it when
   * it has gone stale
   */
  private async findActiveCart(userId: string): Promise<ActiveCartLookup> {
    const carts = await this.callStore(() => this.store.findActiveCarts(userId));
    if (carts.length === 0) {
      return { cart: null, expired: false };
    }

    const cart = carts.length > 1 ? await this.reconcile(userId, carts) : carts[0];

    if (isStale(cart, this.now(), this.ttlMs)) {
      await this.callStore(() => this.store.markStatus(cart, 'ABANDONED'));
      this.logger.info(`Abandoned expired cart ${cart.id} for user ${userId}`);
      return { cart: null, expired: true };
    }

    return { cart, expired: false };
  }

  /**
   * Mark a scanned cart ABANDONED. On a version conflict the cart is read
   * again: it is abandoned only if it is still active and still stale.
   */
  private async abandonIfExpired(scanned: Cart): Promise<boolean> {
    try {
      await this.callStore(() => this.store.markStatus(scanned, 'ABANDONED'));
      return true;
    } catch (error) {
      if (!(error instanceof VersionConflictError)) {
        throw error;
      }
    }

    const carts = await this.callStore(() => this.store.findActiveCarts(scanned.userId));
    const current = carts.find((cart) => cart.id === scanned.id);
    if (!current || !isStale(current, this.now(), this.ttlMs)) {
      return false;
    }

    await this.callStore(() => this.store.markStatus(current, 'ABANDONED'));
    return true;
  }

  private async reconcile(userId: string, carts: Cart[]): Promise<Cart> {
    const [survivor, ...duplicates] = [...carts].sort(survivorOrder);
    this.logger.warn(
      `User ${userId} has ${carts.length} active carts; keeping cart ${survivor.id}`
    );

    for (const duplicate of duplicates) {
      await this.callStore(() => this.store.markStatus(duplicate, 'ABANDONED'));
    }
    return survivor;
  }

  private persist(cart: Cart, expectedVersion: number | null): Promise<Cart> {
    validateCart(cart, this.config.maxQuantity);
    return this.callStore(() => this.store.save(cart, expectedVersion));
  }

  private async callStore<T>(call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof CartError) {
        throw error;
      }
      throw new StorageError(`Cart storage failure: ${describeError(error)}`, error);
    }
  }

  private rules(): CartRules {
    return {
      now: this.now(),
      ttlMs: this.ttlMs,
      maxItems: this.config.maxItems,
      maxQuantity: this.config.maxQuantity,
    };
  }
}

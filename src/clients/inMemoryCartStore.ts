import { Cart, CartStatistics, CartStatus } from '../models/types.js';
import { CartNotFoundError, VersionConflictError } from '../lib/errors.js';
import { CartStore } from './cartStore.js';

function byLastActivityDesc(a: Cart, b: Cart): number {
  return b.lastActivity.getTime() - a.lastActivity.getTime();
}

/**
 * In-memory versioned cart store.
 *
 * Each method reads and writes the map without awaiting in between, so the
 * version check and the write happen in the same tick of the event loop.
 */
export class InMemoryCartStore implements CartStore {
  private carts = new Map<number, Cart>();
  private nextId = 1;

  async findActiveCarts(userId: string): Promise<Cart[]> {
    return this.select((cart) => cart.userId === userId && cart.status === 'ACTIVE');
  }

  async findByStatus(userId: string, status: CartStatus): Promise<Cart[]> {
    return this.select((cart) => cart.userId === userId && cart.status === status).sort(
      byLastActivityDesc
    );
  }

  async save(cart: Cart, expectedVersion: number | null): Promise<Cart> {
    if (expectedVersion === null) {
      return this.insert(cart);
    }

    if (cart.id === null) {
      throw new CartNotFoundError('Cannot update a cart that was never saved');
    }

    const existing = this.carts.get(cart.id);
    if (!existing) {
      throw new CartNotFoundError(`Cart not found with ID: ${cart.id}`);
    }

    if (existing.version !== expectedVersion) {
      throw new VersionConflictError(
        `Cart ${cart.id} is at version ${existing.version}, expected ${expectedVersion}`
      );
    }

    const stored: Cart = { ...structuredClone(cart), version: expectedVersion + 1 };
    this.carts.set(cart.id, stored);
    return structuredClone(stored);
  }

  async findAllActive(olderThan: Date, limit?: number): Promise<Cart[]> {
    const expired = this.select(
      (cart) =>
        cart.status === 'ACTIVE' && cart.lastActivity.getTime() < olderThan.getTime()
    ).sort((a, b) => a.lastActivity.getTime() - b.lastActivity.getTime());

    return limit === undefined ? expired : expired.slice(0, limit);
  }

  async markStatus(cart: Cart, status: CartStatus): Promise<Cart> {
    if (cart.id === null) {
      throw new CartNotFoundError('Cannot update a cart that was never saved');
    }

    const existing = this.carts.get(cart.id);
    if (!existing) {
      throw new CartNotFoundError(`Cart not found with ID: ${cart.id}`);
    }

    if (existing.version !== cart.version) {
      throw new VersionConflictError(
        `Cart ${cart.id} is at version ${existing.version}, expected ${cart.version}`
      );
    }

    const stored: Cart = { ...existing, status, version: existing.version + 1 };
    this.carts.set(cart.id, stored);
    return structuredClone(stored);
  }

  async countByStatus(recentSince: Date): Promise<CartStatistics> {
    const stats: CartStatistics = { active: 0, abandoned: 0, completed: 0, recentActive: 0 };

    for (const cart of this.carts.values()) {
      if (cart.status === 'ACTIVE') {
        stats.active++;
        if (cart.lastActivity.getTime() >= recentSince.getTime()) {
          stats.recentActive++;
        }
      } else if (cart.status === 'ABANDONED') {
        stats.abandoned++;
      } else {
        stats.completed++;
      }
    }

    return stats;
  }

  /**
   * Write rows as-is, bypassing version checks (for testing and imports)
   */
  load(carts: Cart[]): Cart[] {
    return carts.map((cart) => {
      const id = cart.id ?? this.nextId;
      this.nextId = Math.max(this.nextId, id + 1);
      const stored: Cart = { ...structuredClone(cart), id };
      this.carts.set(id, stored);
      return structuredClone(stored);
    });
  }

  /**
   * Get current cart count (for testing/monitoring)
   */
  size(): number {
    return this.carts.size;
  }

  /**
   * Clear all carts (for testing)
   */
  clear(): void {
    this.carts.clear();
    this.nextId = 1;
  }

  private insert(cart: Cart): Cart {
    for (const existing of this.carts.values()) {
      if (existing.userId === cart.userId && existing.status === 'ACTIVE') {
        throw new VersionConflictError(`User ${cart.userId} already has an active cart`);
      }
    }

    const id = this.nextId++;
    const stored: Cart = { ...structuredClone(cart), id, version: 0 };
    this.carts.set(id, stored);
    return structuredClone(stored);
  }

  private select(predicate: (cart: Cart) => boolean): Cart[] {
    const rows: Cart[] = [];
    for (const cart of this.carts.values()) {
      if (predicate(cart)) {
        rows.push(structuredClone(cart));
      }
    }
    return rows;
  }
}

import { Cart, CartStatistics, CartStatus } from '../models/types.js';

/**
 * Versioned cart persistence.
 *
 * Every write is a compare-and-swap on `version`: implementations must check
 * the stored version and write the new row in one atomic step (a transaction
 * with a version predicate, a KV CAS, or a synchronous section in memory).
 */
export interface CartStore {
  /**
   * All ACTIVE carts of a user. More than one row is an anomaly the caller
   * reconciles.
   */
  findActiveCarts(userId: string): Promise<Cart[]>;

  /**
   * Carts of a user in the given status, most recently active first
   */
  findByStatus(userId: string, status: CartStatus): Promise<Cart[]>;

  /**
   * Persist a cart.
   *
   * With `expectedVersion === null` the cart is inserted: the store assigns
   * its id and version 0, and throws VersionConflictError when the user
   * already has an ACTIVE cart. Otherwise the write is accepted only if the
   * stored version equals `expectedVersion`; the stored row then gets version
   * `expectedVersion + 1`. Throws CartNotFoundError for an unknown id and
   * VersionConflictError on a version mismatch.
   */
  save(cart: Cart, expectedVersion: number | null): Promise<Cart>;

  /**
   * ACTIVE carts whose last activity precedes `olderThan`, oldest first
   */
  findAllActive(olderThan: Date, limit?: number): Promise<Cart[]>;

  /**
   * Set the status of a stored cart, compare-and-swap on `cart.version`
   */
  markStatus(cart: Cart, status: CartStatus): Promise<Cart>;

  countByStatus(recentSince: Date): Promise<CartStatistics>;
}

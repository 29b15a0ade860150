import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryCartStore } from '../src/clients/inMemoryCartStore.js';
import { createCart } from '../src/models/cart.js';
import { Cart } from '../src/models/types.js';
import { CartNotFoundError, VersionConflictError } from '../src/lib/errors.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');
const HOUR = 3_600_000;

function hoursAgo(hours: number): Date {
  return new Date(NOW.getTime() - hours * HOUR);
}

function cartFor(userId: string, overrides: Partial<Cart> = {}): Cart {
  return { ...createCart(userId, NOW), ...overrides };
}

describe('InMemoryCartStore', () => {
  let store: InMemoryCartStore;

  beforeEach(() => {
    store = new InMemoryCartStore();
  });

  describe('save', () => {
    it('inserts a new cart with an id and version 0', async () => {
      const saved = await store.save(cartFor('user-1', { version: 1 }), null);

      expect(saved.id).toBe(1);
      expect(saved.version).toBe(0);
      expect(store.size()).toBe(1);
    });

    it('rejects an insert when the user already has an active cart', async () => {
      await store.save(cartFor('user-1'), null);

      await expect(store.save(cartFor('user-1'), null)).rejects.toThrow(VersionConflictError);
      expect(store.size()).toBe(1);
    });

    it('allows an insert when the earlier cart is no longer active', async () => {
      store.load([cartFor('user-1', { id: 5, status: 'COMPLETED' })]);

      const saved = await store.save(cartFor('user-1'), null);

      expect(saved.id).toBe(6);
      expect(store.size()).toBe(2);
    });

    it('updates when the expected version matches and bumps it', async () => {
      const saved = await store.save(cartFor('user-1'), null);

      const updated = await store.save({ ...saved, total: 10 }, 0);

      expect(updated.version).toBe(1);
      expect(updated.total).toBe(10);
    });

    it('rejects an update against a stale version', async () => {
      const saved = await store.save(cartFor('user-1'), null);
      await store.save({ ...saved, total: 10 }, 0);

      await expect(store.save({ ...saved, total: 20 }, 0)).rejects.toThrow(VersionConflictError);
      const [current] = await store.findActiveCarts('user-1');
      expect(current.total).toBe(10);
    });

    it('rejects an update for an unknown cart', async () => {
      await expect(store.save(cartFor('user-1', { id: 42 }), 0)).rejects.toThrow(
        CartNotFoundError
      );
      await expect(store.save(cartFor('user-1'), 0)).rejects.toThrow(CartNotFoundError);
    });

    it('lets exactly one of two writers with the same version win', async () => {
      const saved = await store.save(cartFor('user-1'), null);

      const results = await Promise.allSettled([
        store.save({ ...saved, total: 1 }, saved.version),
        store.save({ ...saved, total: 2 }, saved.version),
      ]);

      expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
    });

    it('does not share objects with callers', async () => {
      const saved = await store.save(cartFor('user-1'), null);
      saved.items.push({ articleId: 1, articleName: 'X', quantity: 1, price: 1, subtotal: 1 });

      const [stored] = await store.findActiveCarts('user-1');
      expect(stored.items).toEqual([]);
    });
  });

  describe('findByStatus', () => {
    it('returns matching carts with the most recent first', async () => {
      store.load([
        cartFor('user-1', { id: 1, status: 'COMPLETED', lastActivity: hoursAgo(10) }),
        cartFor('user-1', { id: 2, status: 'COMPLETED', lastActivity: hoursAgo(2) }),
        cartFor('user-1', { id: 3, status: 'ABANDONED', lastActivity: hoursAgo(1) }),
        cartFor('user-2', { id: 4, status: 'COMPLETED', lastActivity: hoursAgo(1) }),
      ]);

      const carts = await store.findByStatus('user-1', 'COMPLETED');

      expect(carts.map((c) => c.id)).toEqual([2, 1]);
    });
  });

  describe('findAllActive', () => {
    beforeEach(() => {
      store.load([
        cartFor('user-1', { id: 1, lastActivity: hoursAgo(30) }),
        cartFor('user-2', { id: 2, lastActivity: hoursAgo(48) }),
        cartFor('user-3', { id: 3, lastActivity: hoursAgo(1) }),
        cartFor('user-4', { id: 4, lastActivity: hoursAgo(40), status: 'ABANDONED' }),
      ]);
    });

    it('returns active carts idle since before the cutoff, oldest first', async () => {
      const carts = await store.findAllActive(hoursAgo(24));

      expect(carts.map((c) => c.id)).toEqual([2, 1]);
    });

    it('honours the limit', async () => {
      const carts = await store.findAllActive(hoursAgo(24), 1);

      expect(carts.map((c) => c.id)).toEqual([2]);
    });
  });

  describe('markStatus', () => {
    it('changes the status and version but keeps last activity', async () => {
      const [loaded] = store.load([cartFor('user-1', { id: 1, lastActivity: hoursAgo(30) })]);

      const marked = await store.markStatus(loaded, 'ABANDONED');

      expect(marked.status).toBe('ABANDONED');
      expect(marked.version).toBe(1);
      expect(marked.lastActivity).toEqual(hoursAgo(30));
    });

    it('rejects a stale version', async () => {
      const [loaded] = store.load([cartFor('user-1', { id: 1 })]);
      await store.save({ ...loaded, total: 5 }, 0);

      await expect(store.markStatus(loaded, 'ABANDONED')).rejects.toThrow(VersionConflictError);
    });

    it('rejects unknown carts', async () => {
      await expect(store.markStatus(cartFor('user-1', { id: 9 }), 'ABANDONED')).rejects.toThrow(
        CartNotFoundError
      );
    });
  });

  describe('countByStatus', () => {
    it('counts carts per status and recently active ones', async () => {
      store.load([
        cartFor('user-1', { id: 1, lastActivity: hoursAgo(1) }),
        cartFor('user-2', { id: 2, lastActivity: hoursAgo(30) }),
        cartFor('user-3', { id: 3, status: 'ABANDONED' }),
        cartFor('user-4', { id: 4, status: 'COMPLETED' }),
        cartFor('user-5', { id: 5, status: 'COMPLETED' }),
      ]);

      await expect(store.countByStatus(hoursAgo(24))).resolves.toEqual({
        active: 2,
        abandoned: 1,
        completed: 2,
        recentActive: 1,
      });
    });
  });

  describe('clear', () => {
    it('removes all carts and restarts ids', async () => {
      await store.save(cartFor('user-1'), null);
      store.clear();

      const saved = await store.save(cartFor('user-2'), null);

      expect(store.size()).toBe(1);
      expect(saved.id).toBe(1);
    });
  });
});

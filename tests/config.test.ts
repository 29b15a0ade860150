import { describe, it, expect } from 'vitest';
import { DEFAULT_CART_CONFIG, loadCartConfig, ttlMs, warningMs } from '../src/config/cart.js';

describe('loadCartConfig', () => {
  it('falls back to defaults', () => {
    expect(loadCartConfig({})).toEqual(DEFAULT_CART_CONFIG);
  });

  it('reads overrides from the environment', () => {
    const config = loadCartConfig({
      CART_TTL_HOURS: '12',
      CART_WARNING_HOURS: '0',
      CART_MAX_ITEMS: '10',
      CART_MAX_QUANTITY: '5',
      CART_RETRY_MAX_ATTEMPTS: '5',
      CART_RETRY_BASE_DELAY_MS: '0',
      CART_SWEEP_ENABLED: 'false',
      CART_SWEEP_INTERVAL_MS: '60000',
      CART_SWEEP_BATCH_SIZE: '25',
      CART_MONITOR_ENABLED: '0',
      CART_MONITOR_INTERVAL_MS: '120000',
    });

    expect(config).toEqual({
      ttlHours: 12,
      warningHours: 0,
      maxItems: 10,
      maxQuantity: 5,
      retry: { maxAttempts: 5, baseDelayMs: 0 },
      sweep: { enabled: false, intervalMs: 60_000, batchSize: 25 },
      monitor: { enabled: false, intervalMs: 120_000 },
    });
  });

  it('treats blank values as unset', () => {
    expect(loadCartConfig({ CART_MAX_ITEMS: ' ' }).maxItems).toBe(50);
  });

  it('rejects values that are not positive integers', () => {
    expect(() => loadCartConfig({ CART_MAX_ITEMS: 'ten' })).toThrow(
      "CART_MAX_ITEMS must be a positive integer, got 'ten'"
    );
    expect(() => loadCartConfig({ CART_TTL_HOURS: '0' })).toThrow();
    expect(() => loadCartConfig({ CART_MAX_QUANTITY: '2.5' })).toThrow();
  });

  it('rejects an unknown boolean', () => {
    expect(() => loadCartConfig({ CART_SWEEP_ENABLED: 'maybe' })).toThrow(
      "CART_SWEEP_ENABLED must be true or false, got 'maybe'"
    );
  });

  it('runs the health check every 30 minutes by default', () => {
    expect(loadCartConfig({}).monitor).toEqual({ enabled: true, intervalMs: 1_800_000 });
  });

  it('requires the warning window to be shorter than the TTL', () => {
    expect(() => loadCartConfig({ CART_TTL_HOURS: '4', CART_WARNING_HOURS: '4' })).toThrow(
      'CART_WARNING_HOURS must be smaller than CART_TTL_HOURS'
    );
  });

  it('converts hours to milliseconds', () => {
    expect(ttlMs(DEFAULT_CART_CONFIG)).toBe(86_400_000);
    expect(warningMs(DEFAULT_CART_CONFIG)).toBe(14_400_000);
  });
});

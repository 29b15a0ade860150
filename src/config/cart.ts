const HOUR_MS = 3_600_000;

export interface CartConfig {
  ttlHours: number;
  warningHours: number;
  maxItems: number;
  maxQuantity: number;
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
  };
  sweep: {
    enabled: boolean;
    intervalMs: number;
    batchSize: number;
  };
  monitor: {
    enabled: boolean;
    intervalMs: number;
  };
}

export const DEFAULT_CART_CONFIG: CartConfig = {
  ttlHours: 24,
  warningHours: 4,
  maxItems: 50,
  maxQuantity: 999,
  retry: {
    maxAttempts: 3,
    baseDelayMs: 100,
  },
  sweep: {
    enabled: true,
    intervalMs: 6 * HOUR_MS,
    batchSize: 100,
  },
  monitor: {
    enabled: true,
    intervalMs: 30 * 60_000,
  },
};

function readPositiveInt(
  env: NodeJS.ProcessEnv,
  name: keyof NodeJS.ProcessEnv,
  fallback: number
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = parseInt(raw, 10);
  if (!Number.isInteger(value) || value <= 0 || String(value) !== raw.trim()) {
    throw new Error(`${String(name)} must be a positive integer, got '${raw}'`);
  }
  return value;
}

function readNonNegativeInt(
  env: NodeJS.ProcessEnv,
  name: keyof NodeJS.ProcessEnv,
  fallback: number
): number {
  const raw = env[name];
  if (raw !== undefined && raw.trim() === '0') {
    return 0;
  }
  return readPositiveInt(env, name, fallback);
}

function readBoolean(
  env: NodeJS.ProcessEnv,
  name: keyof NodeJS.ProcessEnv,
  fallback: boolean
): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (raw === 'true' || raw === '1') {
    return true;
  }
  if (raw === 'false' || raw === '0') {
    return false;
  }
  throw new Error(`${String(name)} must be true or false, got '${env[name]}'`);
}

/**
 * Load cart settings from environment variables, falling back to defaults
 */
export function loadCartConfig(env: NodeJS.ProcessEnv = process.env): CartConfig {
  const config: CartConfig = {
    ttlHours: readPositiveInt(env, 'CART_TTL_HOURS', DEFAULT_CART_CONFIG.ttlHours),
    warningHours: readNonNegativeInt(
      env,
      'CART_WARNING_HOURS',
      DEFAULT_CART_CONFIG.warningHours
    ),
    maxItems: readPositiveInt(env, 'CART_MAX_ITEMS', DEFAULT_CART_CONFIG.maxItems),
    maxQuantity: readPositiveInt(
      env,
      'CART_MAX_QUANTITY',
      DEFAULT_CART_CONFIG.maxQuantity
    ),
    retry: {
      maxAttempts: readPositiveInt(
        env,
        'CART_RETRY_MAX_ATTEMPTS',
        DEFAULT_CART_CONFIG.retry.maxAttempts
      ),
      baseDelayMs: readNonNegativeInt(
        env,
        'CART_RETRY_BASE_DELAY_MS',
        DEFAULT_CART_CONFIG.retry.baseDelayMs
      ),
    },
    sweep: {
      enabled: readBoolean(env, 'CART_SWEEP_ENABLED', DEFAULT_CART_CONFIG.sweep.enabled),
      intervalMs: readPositiveInt(
        env,
        'CART_SWEEP_INTERVAL_MS',
        DEFAULT_CART_CONFIG.sweep.intervalMs
      ),
      batchSize: readPositiveInt(
        env,
        'CART_SWEEP_BATCH_SIZE',
        DEFAULT_CART_CONFIG.sweep.batchSize
      ),
    },
    monitor: {
      enabled: readBoolean(env, 'CART_MONITOR_ENABLED', DEFAULT_CART_CONFIG.monitor.enabled),
      intervalMs: readPositiveInt(
        env,
        'CART_MONITOR_INTERVAL_MS',
        DEFAULT_CART_CONFIG.monitor.intervalMs
      ),
    },
  };

  if (config.warningHours >= config.ttlHours) {
    throw new Error('CART_WARNING_HOURS must be smaller than CART_TTL_HOURS');
  }

  return config;
}

export function ttlMs(config: CartConfig): number {
  return config.ttlHours * HOUR_MS;
}

export function warningMs(config: CartConfig): number {
  return config.warningHours * HOUR_MS;
}

declare namespace NodeJS {
  interface ProcessEnv {
    PORT?: string;
    JWT_SECRET?: string;
    CART_TTL_HOURS?: string;
    CART_WARNING_HOURS?: string;
    CART_MAX_ITEMS?: string;
    CART_MAX_QUANTITY?: string;
    CART_RETRY_MAX_ATTEMPTS?: string;
    CART_RETRY_BASE_DELAY_MS?: string;
    CART_SWEEP_ENABLED?: string;
    CART_SWEEP_INTERVAL_MS?: string;
    CART_SWEEP_BATCH_SIZE?: string;
    CART_MONITOR_ENABLED?: string;
    CART_MONITOR_INTERVAL_MS?: string;
  }
}

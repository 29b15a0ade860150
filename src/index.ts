import { serve } from '@hono/node-server';
import { InMemoryCartStore } from './clients/inMemoryCartStore.js';
import { CartService } from './services/cart.service.js';
import { CartSweeper } from './services/cart.sweeper.js';
import { CartMonitor } from './services/cart.monitor.js';
import { JwtAuthenticator } from './lib/auth.js';
import { loadCartConfig } from './config/cart.js';
import { createApp } from './app.js';

// Environment configuration with defaults
const PORT = parseInt(process.env.PORT || '3000', 10);
const JWT_SECRET = process.env.JWT_SECRET || 'dev-secret-change-me';
const config = loadCartConfig();

// Initialize components
const store = new InMemoryCartStore();
const service = new CartService(store, config);
const sweeper = new CartSweeper(service, config.sweep.intervalMs);
const monitor = new CartMonitor(service, sweeper, config.monitor.intervalMs);

if (config.sweep.enabled) {
  sweeper.start();
}
if (config.monitor.enabled) {
  monitor.start();
}

const app = createApp({
  service,
  sweeper,
  monitor,
  authenticator: new JwtAuthenticator(JWT_SECRET),
  config,
});

// Start server
console.log(`Server starting on port ${PORT}...`);
serve({
  fetch: app.fetch,
  port: PORT,
});

console.log(`✓ Server running at http://localhost:${PORT}`);
console.log(`  Cart TTL: ${config.ttlHours}h (warning ${config.warningHours}h before expiry)`);
console.log(`  Max items per cart: ${config.maxItems}`);
console.log(
  `  Retries on version conflict: ${config.retry.maxAttempts} attempts, ${config.retry.baseDelayMs}ms base delay`
);
console.log(
  config.sweep.enabled
    ? `  Sweeper interval: ${config.sweep.intervalMs}ms (batch ${config.sweep.batchSize})`
    : '  Sweeper disabled'
);
console.log(
  config.monitor.enabled
    ? `  Health check interval: ${config.monitor.intervalMs}ms`
    : '  Health check disabled'
);

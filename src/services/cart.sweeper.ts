import { SweepResult } from '../models/types.js';
import { CartLogger, CartService } from './cart.service.js';

const SLOW_SWEEP_MS = 30_000;

export interface SweeperMetrics {
  totalRuns: number;
  totalAbandoned: number;
  totalFailures: number;
  totalErrors: number;
  lastRunAt: Date | null;
  lastAbandoned: number;
}

/**
 * Periodic cleanup of expired carts
 */
export class CartSweeper {
  private sweepInterval: NodeJS.Timeout | null = null;
  private inFlight: Promise<SweepResult | null> | null = null;
  private readonly createdAt = new Date();
  private metrics: SweeperMetrics = {
    totalRuns: 0,
    totalAbandoned: 0,
    totalFailures: 0,
    totalErrors: 0,
    lastRunAt: null,
    lastAbandoned: 0,
  };

  constructor(
    private readonly service: CartService,
    private readonly intervalMs: number,
    private readonly logger: CartLogger = console
  ) {}

  /**
   * Run one sweep. Never rejects: a crashed sweep is logged and counted.
   * While a sweep is pending, callers join it instead of starting another.
   */
  runOnce(): Promise<SweepResult | null> {
    if (!this.inFlight) {
      this.inFlight = this.sweep().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async sweep(): Promise<SweepResult | null> {
    try {
      const result = await this.service.sweepExpiredCarts();

      this.metrics.totalRuns++;
      this.metrics.totalAbandoned += result.abandoned;
      this.metrics.totalFailures += result.failed;
      this.metrics.lastAbandoned = result.abandoned;
      this.metrics.lastRunAt = new Date();

      if (result.durationMs > SLOW_SWEEP_MS) {
        this.logger.warn(`Cart sweep took longer than expected: ${result.durationMs}ms`);
      }
      return result;
    } catch (error) {
      this.metrics.totalErrors++;
      this.logger.error('Cart sweep failed:', error);
      return null;
    }
  }

  start(): void {
    if (this.sweepInterval) {
      return;
    }

    this.sweepInterval = setInterval(() => {
      void this.runOnce();
    }, this.intervalMs);

    // Don't keep process alive just for sweeper
    this.sweepInterval.unref();
  }

  stop(): void {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
    }
  }

  isRunning(): boolean {
    return this.sweepInterval !== null;
  }

  getMetrics(): SweeperMetrics {
    return { ...this.metrics };
  }

  /**
   * Time of the last successful sweep, or construction time before the first
   */
  lastCompletedAt(): Date {
    return this.metrics.lastRunAt ?? this.createdAt;
  }
}

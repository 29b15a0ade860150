import { CartStatistics } from '../models/types.js';
import { CartLogger, CartService } from './cart.service.js';
import { CartSweeper, SweeperMetrics } from './cart.sweeper.js';

export const HEALTH_THRESHOLDS = {
  maxActiveCarts: 10_000,
  maxAbandonedRatio: 0.8,
  maxCleanupErrorRate: 0.05,
  maxCleanupAgeMs: 8 * 3_600_000,
};

export interface HealthReport {
  carts: CartStatistics;
  sweeper: SweeperMetrics;
  warnings: string[];
  checkedAt: Date;
}

function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

/**
 * Periodic health check: logs cart counts and sweeper totals, and warns when
 * they drift past the thresholds above
 */
export class CartMonitor {
  private checkInterval: NodeJS.Timeout | null = null;
  private lastReport: HealthReport | null = null;

  constructor(
    private readonly service: CartService,
    private readonly sweeper: CartSweeper,
    private readonly intervalMs: number,
    private readonly logger: CartLogger = console
  ) {}

  /**
   * Run one check. Never rejects: a failed check is logged and yields null.
   */
  async check(): Promise<HealthReport | null> {
    try {
      const carts = await this.service.getStatistics();
      const sweeper = this.sweeper.getMetrics();
      const checkedAt = new Date();

      this.logger.info(
        `Cart metrics: ${carts.active} active (${carts.recentActive} recent), ${carts.abandoned} abandoned, ${carts.completed} completed; ` +
          `sweeper abandoned ${sweeper.totalAbandoned} in ${sweeper.totalRuns} runs, ${sweeper.totalFailures} failures, ${sweeper.totalErrors} errors`
      );

      const warnings = this.evaluate(carts, sweeper, checkedAt);
      for (const warning of warnings) {
        this.logger.warn(warning);
      }

      this.lastReport = { carts, sweeper, warnings, checkedAt };
      return this.lastReport;
    } catch (error) {
      this.logger.warn(
        `Cart health check failed: ${error instanceof Error ? error.message : String(error)}`
      );
      return null;
    }
  }

  start(): void {
    if (this.checkInterval) {
      return;
    }

    this.checkInterval = setInterval(() => {
      void this.check();
    }, this.intervalMs);

    this.checkInterval.unref();
  }

  stop(): void {
    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
    }
  }

  isRunning(): boolean {
    return this.checkInterval !== null;
  }

  getLastReport(): HealthReport | null {
    return this.lastReport;
  }

  private evaluate(carts: CartStatistics, sweeper: SweeperMetrics, now: Date): string[] {
    const warnings: string[] = [];

    if (carts.active > HEALTH_THRESHOLDS.maxActiveCarts) {
      warnings.push(`High number of active carts: ${carts.active}`);
    }

    const total = carts.active + carts.abandoned + carts.completed;
    if (total > 0 && carts.abandoned / total > HEALTH_THRESHOLDS.maxAbandonedRatio) {
      warnings.push(`High cart abandonment ratio: ${percent(carts.abandoned / total)}`);
    }

    const errors = sweeper.totalFailures + sweeper.totalErrors;
    const attempts = sweeper.totalAbandoned + errors;
    if (attempts > 0 && errors / attempts > HEALTH_THRESHOLDS.maxCleanupErrorRate) {
      warnings.push(`High cleanup error rate: ${percent(errors / attempts)}`);
    }

    // Only meaningful while the sweeper is scheduled
    const lastSweep = this.sweeper.lastCompletedAt();
    if (
      this.sweeper.isRunning() &&
      now.getTime() - lastSweep.getTime() > HEALTH_THRESHOLDS.maxCleanupAgeMs
    ) {
      warnings.push(`Cart cleanup has not run since ${lastSweep.toISOString()}`);
    }

    return warnings;
  }
}

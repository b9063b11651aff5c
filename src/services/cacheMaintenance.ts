import { createChildLogger, errorMessage, type Logger } from "../utils/logger.js";
import type { RecipeCacheService } from "./recipeCache.js";

export type CacheMaintenanceOptions = {
  cache: RecipeCacheService;
  intervalMs?: number;
  detailLimit?: number;
  logger?: Logger;
};

const DEFAULT_INTERVAL_MS = 5 * 60_000;
const DEFAULT_DETAIL_LIMIT = 10;

export class CacheMaintenance {
  private readonly cache: RecipeCacheService;
  private readonly intervalMs: number;
  private readonly detailLimit: number;
  private readonly log: Logger;
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<void> | null = null;

  constructor(options: CacheMaintenanceOptions) {
    this.cache = options.cache;
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.detailLimit = options.detailLimit ?? DEFAULT_DETAIL_LIMIT;
    this.log = options.logger ?? createChildLogger({ service: "cache-maintenance" });
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /** Runs one pass immediately, then one per interval. */
  start(): void {
    if (this.timer) {
      return;
    }

    this.log.info({ msg: "Starting cache maintenance", intervalMs: this.intervalMs });
    this.timer = setInterval(() => {
      this.trigger();
    }, this.intervalMs);
    this.timer.unref();
    this.trigger();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.log.info({ msg: "Stopped cache maintenance" });
    }
    await this.current;
  }

  /** A pass already in flight is shared rather than started twice. */
  runOnce(): Promise<void> {
    if (!this.current) {
      this.current = this.maintain().finally(() => {
        this.current = null;
      });
    }
    return this.current;
  }

  private trigger(): void {
    this.runOnce().catch((error: unknown) => {
      this.log.error({ msg: "Cache maintenance pass failed", error: errorMessage(error) });
    });
  }

  private async maintain(): Promise<void> {
    try {
      const stats = await this.cache.getCacheStats();
      this.log.info({ msg: "Cache stats", ...stats });

      if (stats.basicOnly > 0) {
        const filled = await this.cache.fillMissingDetails(this.detailLimit);
        this.log.info({ msg: "Filled missing recipe details", filled });
      }
    } catch (error) {
      this.log.warn({ msg: "Cache maintenance error", error: errorMessage(error) });
    }
  }
}

import { SALES_DATA_LOAD_POLICY } from "../config/app.config.js";
import { RetryExhaustedError } from "../errors/app.errors.js";
import {
  describeError,
  isTransientConnectionError,
} from "../errors/connection.errors.js";
import { ReadThroughCache } from "../lib/read-through-cache.js";
import { retry } from "../lib/retry.js";
import type { SalesRecord } from "../models/sales-record.model.js";
import type { SalesRecordSource } from "../repositories/sales-data.repository.js";

export const CONNECTION_WARNING =
  "Unable to connect to the database after multiple attempts.";

export interface SalesDataSnapshot {
  records: SalesRecord[];
  refreshedAt: Date | null;
  warning: string | null;
}

export interface SalesDataServiceOptions {
  ttlMs?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => number;
}

export class SalesDataService {
  private readonly cache: ReadThroughCache<SalesRecord[]>;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly sleep?: (ms: number) => Promise<unknown>;

  constructor(
    private readonly source: SalesRecordSource,
    options: SalesDataServiceOptions = {},
  ) {
    this.maxAttempts = options.maxAttempts ?? SALES_DATA_LOAD_POLICY.maxAttempts;
    this.retryDelayMs =
      options.retryDelayMs ?? SALES_DATA_LOAD_POLICY.retryDelayMs;
    this.sleep = options.sleep;
    this.cache = new ReadThroughCache({
      ttlMs: options.ttlMs ?? SALES_DATA_LOAD_POLICY.ttlMs,
      load: () => this.fetchWithRetry(),
      now: options.now,
    });
  }

  /**
   * Returns the cached sales records, loading them when the cache is empty or
   * stale. When the database stays unreachable the snapshot is empty and
   * carries a warning instead of failing.
   */
  async load(): Promise<SalesDataSnapshot> {
    try {
      const entry = await this.cache.get();
      return {
        records: entry.value,
        refreshedAt: new Date(entry.refreshedAt),
        warning: null,
      };
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        return { records: [], refreshedAt: null, warning: CONNECTION_WARNING };
      }
      throw error;
    }
  }

  private async fetchWithRetry(): Promise<SalesRecord[]> {
    try {
      return await retry(() => this.source.findAll(), {
        maxAttempts: this.maxAttempts,
        delayMs: this.retryDelayMs,
        isRetryable: isTransientConnectionError,
        sleep: this.sleep,
        onRetry: (attempt, error) => {
          console.log(
            `🔁 Database unavailable (attempt ${attempt}/${this.maxAttempts}): ${describeError(error)}`,
          );
        },
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        console.warn(`⚠️  ${CONNECTION_WARNING} ${describeError(error.cause)}`);
      }
      throw error;
    }
  }
}

import { LogBatch } from "../../domain/entities/LogBatch";
import { LogRecord } from "../../domain/entities/LogRecord";
import { LogBackend } from "../../domain/services/LogBackend";
import { ShippingMetrics } from "../../domain/services/ShippingMetrics";
import {
  ShipperState,
  ShipperStateValidator,
} from "../../domain/value-objects/ShipperState";
import { Logger } from "../interfaces/Logger";

export interface LogShipperOptions {
  batchSize: number;
  flushIntervalMs: number;
  shutdownTimeoutMs: number;
  /**
   * Upper bound on queued records, evicting the oldest when exceeded. Unbounded when unset.
   */
  maxQueueSize?: number;
  /**
   * Receives records enqueued after the shipper has stopped.
   */
  fallback?: (record: LogRecord) => void;
}

export interface ShutdownResult {
  drained: boolean;
  dropped: number;
}

export interface LogShipperStats {
  state: ShipperState;
  queued: number;
  workerStarted: boolean;
  oldestEnqueuedAt?: Date;
}

interface QueuedRecord {
  record: LogRecord;
  enqueuedAt: number;
}

export const DEFAULT_SHIPPER_OPTIONS: LogShipperOptions = {
  batchSize: 10,
  flushIntervalMs: 5000,
  shutdownTimeoutMs: 10000,
};

/**
 * Queues log records and ships them to a {@link LogBackend} in batches.
 *
 * Producers call {@link enqueue} synchronously. A single worker started by
 * {@link start} sends a batch once `batchSize` records are waiting or the oldest
 * record has waited `flushIntervalMs`. Failed batches are dropped, never retried.
 * {@link shutdown} drains what is left within a time budget.
 */
export class LogShipper {
  private readonly queue: QueuedRecord[] = [];
  private readonly options: LogShipperOptions;
  private state = ShipperState.RUNNING;
  private worker?: Promise<void>;
  private wakeUp?: () => void;
  private shutdownPromise?: Promise<ShutdownResult>;
  private overflowWarned = false;

  constructor(
    private readonly backend: LogBackend,
    private readonly metrics: ShippingMetrics,
    private readonly logger: Logger,
    options: Partial<LogShipperOptions> = {}
  ) {
    this.options = { ...DEFAULT_SHIPPER_OPTIONS, ...options };

    if (!Number.isInteger(this.options.batchSize) || this.options.batchSize < 1) {
      throw new Error("batchSize must be a positive integer");
    }
    if (this.options.flushIntervalMs <= 0) {
      throw new Error("flushIntervalMs must be greater than zero");
    }
    if (
      this.options.maxQueueSize !== undefined &&
      this.options.maxQueueSize < this.options.batchSize
    ) {
      throw new Error("maxQueueSize cannot be smaller than batchSize");
    }
  }

  public get currentState(): ShipperState {
    return this.state;
  }

  public enqueue(record: LogRecord): void {
    if (!ShipperStateValidator.acceptsRecords(this.state)) {
      this.handOff(record);
      return;
    }

    this.queue.push({ record, enqueuedAt: Date.now() });
    this.enforceQueueBound();

    // The worker sleeps without a timer while the queue is empty
    if (this.queue.length === 1 || this.queue.length >= this.options.batchSize) {
      this.wakeUp?.();
    }
  }

  public start(): void {
    if (this.state !== ShipperState.RUNNING) {
      this.logger.warn("Log shipper cannot be started after shutdown", {
        state: this.state,
      });
      return;
    }
    if (this.worker) {
      this.logger.warn("Log shipper is already running");
      return;
    }

    this.logger.debug("Starting log shipper", {
      backend: this.backend.describe(),
      batchSize: this.options.batchSize,
      flushIntervalMs: this.options.flushIntervalMs,
    });
    this.worker = this.runWorker();
  }

  public shutdown(
    timeoutMs: number = this.options.shutdownTimeoutMs
  ): Promise<ShutdownResult> {
    if (!this.shutdownPromise) {
      this.transition(ShipperState.SHUTTING_DOWN);
      this.wakeUp?.();
      this.shutdownPromise = this.coordinateShutdown(timeoutMs);
    }
    return this.shutdownPromise;
  }

  public getStats(): LogShipperStats {
    const oldest = this.queue[0];
    return {
      state: this.state,
      queued: this.queue.length,
      workerStarted: this.worker !== undefined,
      oldestEnqueuedAt: oldest ? new Date(oldest.enqueuedAt) : undefined,
    };
  }

  private async runWorker(): Promise<void> {
    while (this.state === ShipperState.RUNNING) {
      try {
        await this.waitForTrigger();
        if (this.state !== ShipperState.RUNNING) {
          break;
        }
        await this.flushDue();
      } catch (error) {
        this.logger.error("Log shipper worker cycle failed", {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  private waitForTrigger(): Promise<void> {
    if (this.hasFullBatch() || this.isOldestDue()) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const done = (): void => {
        if (timer) {
          clearTimeout(timer);
        }
        this.wakeUp = undefined;
        resolve();
      };

      const oldest = this.queue[0];
      if (oldest) {
        const remaining = Math.max(
          0,
          oldest.enqueuedAt + this.options.flushIntervalMs - Date.now()
        );
        timer = setTimeout(done, remaining);
        timer.unref();
      }
      this.wakeUp = done;
    });
  }

  private async flushDue(): Promise<void> {
    while (this.state === ShipperState.RUNNING) {
      if (this.hasFullBatch() || this.isOldestDue()) {
        await this.sendBatch(this.takeBatch());
      } else {
        return;
      }
    }
  }

  private async coordinateShutdown(timeoutMs: number): Promise<ShutdownResult> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), timeoutMs);
    });

    const outcome = await Promise.race([
      this.drainAll().then(() => "drained" as const),
      timedOut,
    ]);
    clearTimeout(timer);

    const dropped = this.queue.splice(0, this.queue.length).length;
    if (this.state === ShipperState.SHUTTING_DOWN) {
      this.transition(ShipperState.STOPPED);
    }
    if (dropped > 0) {
      this.metrics.recordDropped(dropped, "shutdown-timeout");
    }

    if (outcome === "timeout") {
      this.logger.warn("Log shipper shutdown timed out, dropping queued records", {
        timeoutMs,
        dropped,
      });
    } else {
      this.logger.debug("Log shipper stopped after draining the queue");
    }

    return { drained: outcome === "drained", dropped };
  }

  private async drainAll(): Promise<void> {
    if (this.worker) {
      await this.worker;
    }
    while (this.queue.length > 0 && this.state === ShipperState.SHUTTING_DOWN) {
      await this.sendBatch(this.takeBatch());
    }
    // Stop in the same tick the queue is seen empty, so later records go to the fallback
    if (this.state === ShipperState.SHUTTING_DOWN) {
      this.transition(ShipperState.STOPPED);
    }
  }

  private takeBatch(): LogBatch {
    const taken = this.queue.splice(0, this.options.batchSize);
    if (this.queue.length < (this.options.maxQueueSize ?? Infinity)) {
      this.overflowWarned = false;
    }
    return LogBatch.of(
      taken.map((queued) => queued.record),
      this.options.batchSize
    );
  }

  private async sendBatch(batch: LogBatch): Promise<void> {
    try {
      const result = await this.backend.push(batch);
      const sent = batch.size - result.rejected;

      if (result.rejected > 0) {
        this.metrics.recordDropped(result.rejected, "malformed");
      }

      if (result.success) {
        if (sent > 0) {
          this.metrics.recordSendSuccess(sent);
        }
        this.logger.debug("Shipped log batch", {
          backend: this.backend.describe(),
          records: sent,
        });
        return;
      }

      this.metrics.recordSendFailure(sent);
      this.logger.warn("Failed to ship log batch, dropping it", {
        backend: this.backend.describe(),
        status: result.status,
        error: result.error,
        records: sent,
      });
    } catch (error) {
      this.metrics.recordSendFailure(batch.size);
      this.logger.warn("Failed to ship log batch, dropping it", {
        backend: this.backend.describe(),
        error: error instanceof Error ? error.message : String(error),
        records: batch.size,
      });
    }
  }

  private enforceQueueBound(): void {
    const max = this.options.maxQueueSize;
    if (max === undefined || this.queue.length <= max) {
      return;
    }

    const evicted = this.queue.splice(0, this.queue.length - max).length;
    this.metrics.recordDropped(evicted, "overflow");

    if (!this.overflowWarned) {
      this.overflowWarned = true;
      this.logger.warn("Log queue is full, dropping oldest records", {
        maxQueueSize: max,
      });
    }
  }

  private handOff(record: LogRecord): void {
    if (this.options.fallback) {
      this.options.fallback(record);
      return;
    }

    const meta = { logger: record.logger, timestamp: record.timestamp.toISOString() };
    switch (record.level) {
      case "error":
        this.logger.error(record.message, meta);
        break;
      case "warn":
        this.logger.warn(record.message, meta);
        break;
      case "info":
      case "http":
        this.logger.info(record.message, meta);
        break;
      default:
        this.logger.debug(record.message, meta);
    }
  }

  private hasFullBatch(): boolean {
    return this.queue.length >= this.options.batchSize;
  }

  private isOldestDue(): boolean {
    const oldest = this.queue[0];
    return (
      oldest !== undefined &&
      Date.now() - oldest.enqueuedAt >= this.options.flushIntervalMs
    );
  }

  private transition(to: ShipperState): void {
    if (!ShipperStateValidator.isValidTransition(this.state, to)) {
      throw new Error(`Cannot move log shipper from ${this.state} to ${to}`);
    }
    this.state = to;
  }
}

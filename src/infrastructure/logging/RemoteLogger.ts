import { Logger, LogMeta } from "../../application/interfaces/Logger";
import {
  LogShipper,
  LogShipperStats,
  ShutdownResult,
} from "../../application/services/LogShipper";
import { LogBackend } from "../../domain/services/LogBackend";
import { AppConfig } from "../config/Config";
import {
  InMemoryShippingMetrics,
  ShippingMetricsSnapshot,
} from "../metrics/InMemoryShippingMetrics";
import { LokiPushClient } from "./LokiPushClient";
import { LokiTransport } from "./LokiTransport";
import {
  ROOT_LOGGER_NAME,
  WinstonLogger,
  createConsoleLogger,
  createWinstonLogger,
} from "./WinstonLogger";

export interface RemoteLoggerDependencies {
  backend?: LogBackend;
  metrics?: InMemoryShippingMetrics;
  diagnostics?: Logger;
  silentConsole?: boolean;
}

export interface RemoteLoggerStats {
  enabled: boolean;
  shipper?: LogShipperStats;
  metrics: ShippingMetricsSnapshot;
}

/**
 * Application logger: always writes to the console, optionally to a rotating file,
 * and ships every entry to Loki when it is enabled.
 *
 * Built once at boot and handed to whoever needs it; call {@link start} once the
 * process is up and {@link shutdown} when it terminates.
 */
export class RemoteLogger implements Logger {
  private readonly root: WinstonLogger;
  private readonly logger: WinstonLogger;
  private readonly shipper?: LogShipper;
  private readonly backend?: LogBackend;
  private readonly metrics: InMemoryShippingMetrics;
  private readonly enabled: boolean;

  constructor(
    private readonly config: AppConfig,
    dependencies: RemoteLoggerDependencies = {}
  ) {
    const { loki, logging } = config;
    const diagnostics =
      dependencies.diagnostics ?? createConsoleLogger(logging.level, dependencies.silentConsole);
    this.metrics = dependencies.metrics ?? new InMemoryShippingMetrics();
    this.enabled = loki.enabled && Boolean(loki.url) && Boolean(loki.job);

    let transport: LokiTransport | undefined;
    if (this.enabled) {
      const backend =
        dependencies.backend ??
        new LokiPushClient(
          {
            url: loki.url,
            requestTimeoutMs: loki.requestTimeoutMs,
            tenantId: loki.tenantId,
          },
          diagnostics
        );

      this.backend = backend;

      const shipper = new LogShipper(backend, this.metrics, diagnostics, {
        batchSize: loki.batchSize,
        flushIntervalMs: loki.flushIntervalMs,
        shutdownTimeoutMs: loki.shutdownTimeoutMs,
        maxQueueSize: loki.maxQueueSize > 0 ? loki.maxQueueSize : undefined,
        // the console transport has already printed the entry
        fallback: () => undefined,
      });
      this.shipper = shipper;

      transport = new LokiTransport({
        sink: shipper,
        labels: {
          job: loki.job,
          application: loki.application,
          environment: config.environment,
        },
        diagnostics,
      });
    }

    this.root = new WinstonLogger(
      createWinstonLogger({
        level: logging.level,
        file: logging.file,
        silentConsole: dependencies.silentConsole,
        transports: transport ? [transport] : [],
      })
    );
    this.logger = this.root.child(ROOT_LOGGER_NAME);

    this.announce();
  }

  public info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  public warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  public error(message: string, meta?: LogMeta): void {
    this.logger.error(message, meta);
  }

  public debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }

  /**
   * Logger for one part of the application (`database`, `api`, `service`, ...)
   */
  public child(name: string): WinstonLogger {
    return this.root.child(name);
  }

  public start(): void {
    this.shipper?.start();
  }

  /**
   * Flushes queued entries to Loki within `timeoutMs` and stops shipping.
   * Later log calls still reach the console.
   */
  public async shutdown(timeoutMs?: number): Promise<ShutdownResult | undefined> {
    if (!this.shipper) {
      return undefined;
    }
    return this.shipper.shutdown(timeoutMs);
  }

  public getStats(): RemoteLoggerStats {
    return {
      enabled: this.enabled,
      shipper: this.shipper?.getStats(),
      metrics: this.metrics.snapshot(),
    };
  }

  private announce(): void {
    const { loki } = this.config;

    if (!loki.enabled) {
      this.logger.info("Loki shipping disabled");
      return;
    }
    if (!this.enabled) {
      this.logger.warn("Loki shipping not configured (URL or job missing)");
      return;
    }

    this.logger.info("Loki shipping configured", {
      endpoint: this.backend?.describe(),
      job: loki.job,
      application: loki.application,
      batchSize: loki.batchSize,
      flushIntervalMs: loki.flushIntervalMs,
    });
  }
}

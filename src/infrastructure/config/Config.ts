import * as dotenv from "dotenv";
import { LogLevel, parseLogLevel } from "../../domain/value-objects/LogLevel";

// Load environment variables
dotenv.config();

export interface LokiConfig {
  enabled: boolean;
  url: string;
  job: string;
  application: string;
  tenantId?: string;
  batchSize: number;
  flushIntervalMs: number;
  requestTimeoutMs: number;
  shutdownTimeoutMs: number;
  /** 0 keeps the queue unbounded */
  maxQueueSize: number;
}

export interface AppConfig {
  logging: {
    level: LogLevel;
    file?: string;
  };
  loki: LokiConfig;
  environment: string;
}

export type Environment = Record<string, string | undefined>;

export class Config {
  private static instance?: Config;
  private readonly config: AppConfig;
  private readonly errors: string[] = [];

  constructor(private readonly env: Environment = process.env) {
    this.config = this.loadConfig();
    this.validate();
  }

  /**
   * Configuration read from `process.env` (and `.env`), built on first use.
   */
  public static getInstance(): Config {
    if (!Config.instance) {
      Config.instance = new Config();
    }
    return Config.instance;
  }

  public get(): AppConfig {
    return this.config;
  }

  private loadConfig(): AppConfig {
    return {
      logging: {
        level: this.getLogLevel("LOG_LEVEL", "info"),
        file: this.getOptionalEnvVar("LOG_FILE"),
      },
      loki: {
        enabled: this.getBoolean("LOKI_ENABLED", true),
        url: this.getEnvVar("LOKI_URL", "http://localhost:3100"),
        job: this.getEnvVar("LOKI_JOB", "MONITORAMENTO_PRODUTO"),
        application: this.getEnvVar("LOKI_APPLICATION", "produto-api"),
        tenantId: this.getOptionalEnvVar("LOKI_TENANT_ID"),
        batchSize: this.getInteger("LOKI_BATCH_SIZE", 10),
        flushIntervalMs: this.getInteger("LOKI_FLUSH_INTERVAL_MS", 5000),
        requestTimeoutMs: this.getInteger("LOKI_REQUEST_TIMEOUT_MS", 5000),
        shutdownTimeoutMs: this.getInteger("LOKI_SHUTDOWN_TIMEOUT_MS", 10000),
        maxQueueSize: this.getInteger("LOKI_MAX_QUEUE_SIZE", 0),
      },
      environment: this.getEnvVar("NODE_ENV", "development"),
    };
  }

  private getEnvVar(key: string, defaultValue: string): string {
    const value = this.env[key];
    if (value === undefined || value.trim() === "") {
      return defaultValue;
    }
    return value.trim();
  }

  private getOptionalEnvVar(key: string): string | undefined {
    const value = this.env[key]?.trim();
    return value ? value : undefined;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    return this.getEnvVar(key, String(defaultValue)).toLowerCase() === "true";
  }

  private getInteger(key: string, defaultValue: number): number {
    const raw = this.getEnvVar(key, String(defaultValue));
    const value = Number(raw);
    if (!Number.isInteger(value)) {
      this.errors.push(`${key} must be an integer (got '${raw}')`);
      return defaultValue;
    }
    return value;
  }

  private getLogLevel(key: string, defaultValue: LogLevel): LogLevel {
    const raw = this.getEnvVar(key, defaultValue);
    try {
      return parseLogLevel(raw);
    } catch {
      this.errors.push(`${key} must be a winston level (got '${raw}')`);
      return defaultValue;
    }
  }

  private validate(): void {
    const errors = [...this.errors];
    const loki = this.config.loki;

    if (loki.enabled) {
      if (!/^https?:\/\/.+/i.test(loki.url)) {
        errors.push("LOKI_URL must start with http:// or https://");
      }
      if (loki.batchSize < 1) {
        errors.push("LOKI_BATCH_SIZE must be at least 1");
      }
      if (loki.flushIntervalMs < 1) {
        errors.push("LOKI_FLUSH_INTERVAL_MS must be at least 1");
      }
      if (loki.requestTimeoutMs < 1) {
        errors.push("LOKI_REQUEST_TIMEOUT_MS must be at least 1");
      }
      if (loki.shutdownTimeoutMs < 0) {
        errors.push("LOKI_SHUTDOWN_TIMEOUT_MS cannot be negative");
      }
      if (loki.maxQueueSize < 0) {
        errors.push("LOKI_MAX_QUEUE_SIZE cannot be negative");
      } else if (loki.maxQueueSize > 0 && loki.maxQueueSize < loki.batchSize) {
        errors.push("LOKI_MAX_QUEUE_SIZE cannot be smaller than LOKI_BATCH_SIZE");
      }
    }

    if (errors.length > 0) {
      throw new Error(`Configuration validation failed: ${errors.join(", ")}`);
    }
  }
}

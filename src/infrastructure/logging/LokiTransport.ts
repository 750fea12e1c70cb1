import TransportStream from "winston-transport";
import { Logger } from "../../application/interfaces/Logger";
import { LogRecord } from "../../domain/entities/LogRecord";
import { ROOT_LOGGER_NAME, stringifyMeta } from "./WinstonLogger";

export interface LogRecordSink {
  enqueue(record: LogRecord): void;
}

export interface LokiTransportOptions extends TransportStream.TransportStreamOptions {
  sink: LogRecordSink;
  labels: Record<string, string>;
  diagnostics: Logger;
}

type LogInfo = Record<string | symbol, unknown>;

const RESERVED_KEYS = new Set(["level", "message", "timestamp", "logger"]);

/**
 * Turns winston log calls into {@link LogRecord}s and hands them to the shipper.
 * Never blocks the caller on the network.
 */
export class LokiTransport extends TransportStream {
  private readonly sink: LogRecordSink;
  private readonly labels: Record<string, string>;
  private readonly diagnostics: Logger;

  constructor(options: LokiTransportOptions) {
    const { sink, labels, diagnostics, ...transportOptions } = options;
    super(transportOptions);
    this.sink = sink;
    this.labels = { ...labels };
    this.diagnostics = diagnostics;
  }

  public log(info: LogInfo, next: () => void): void {
    setImmediate(() => this.emit("logged", info));

    try {
      this.sink.enqueue(this.toRecord(info));
    } catch (error) {
      this.diagnostics.error("Dropping log call that cannot be shipped", {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    next();
  }

  private toRecord(info: LogInfo): LogRecord {
    const logger = typeof info.logger === "string" ? info.logger : ROOT_LOGGER_NAME;
    const timestamp =
      typeof info.timestamp === "string" ? new Date(info.timestamp) : new Date();

    return LogRecord.create({
      level: String(info.level),
      logger,
      message: this.render(info),
      timestamp,
      labels: this.labels,
    });
  }

  private render(info: LogInfo): string {
    const meta: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(info)) {
      if (!RESERVED_KEYS.has(key)) {
        meta[key] = value;
      }
    }

    const message = String(info.message);
    return Object.keys(meta).length > 0
      ? `${message} ${stringifyMeta(meta)}`
      : message;
  }
}

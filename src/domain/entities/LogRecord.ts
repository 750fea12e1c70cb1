import { LogLevel, isLogLevel } from "../value-objects/LogLevel";

export type LogLabels = Readonly<Record<string, string>>;

export interface LogRecordProps {
  level: LogLevel;
  logger: string;
  message: string;
  timestamp: Date;
  labels: LogLabels;
}

export interface CreateLogRecordInput {
  level: string;
  logger: string;
  message: string;
  timestamp?: Date;
  labels?: Record<string, unknown>;
}

/**
 * Snapshot of one log event. Frozen on creation; the shipper only ever reads it.
 */
export class LogRecord {
  private constructor(private readonly props: Readonly<LogRecordProps>) {
    Object.freeze(this);
  }

  public static create(input: CreateLogRecordInput): LogRecord {
    if (!isLogLevel(input.level)) {
      throw new Error(`Invalid log level: ${input.level}`);
    }

    if (!input.logger || input.logger.trim().length === 0) {
      throw new Error("Logger name cannot be empty");
    }

    const labels: Record<string, string> = {};
    for (const [key, value] of Object.entries(input.labels ?? {})) {
      if (typeof value !== "string") {
        throw new Error(`Label "${key}" must be a string`);
      }
      labels[key] = value;
    }

    return new LogRecord(
      Object.freeze({
        level: input.level,
        logger: input.logger,
        message: input.message,
        // copied so a caller mutating its Date cannot change the record
        timestamp: new Date((input.timestamp ?? new Date()).getTime()),
        labels: Object.freeze(labels),
      })
    );
  }

  public get level(): LogLevel {
    return this.props.level;
  }

  public get logger(): string {
    return this.props.logger;
  }

  public get message(): string {
    return this.props.message;
  }

  public get timestamp(): Date {
    return new Date(this.props.timestamp.getTime());
  }

  public get labels(): LogLabels {
    return this.props.labels;
  }

  /**
   * Labels as the backend indexes them: the record's own labels plus level and logger.
   */
  public streamLabels(): Record<string, string> {
    return {
      ...this.props.labels,
      level: this.props.level,
      logger: this.props.logger,
    };
  }
}

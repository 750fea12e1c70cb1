import { configure } from "safe-stable-stringify";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import TransportStream from "winston-transport";
import { Logger, LogMeta } from "../../application/interfaces/Logger";
import { LogLevel } from "../../domain/value-objects/LogLevel";

export const ROOT_LOGGER_NAME = "main";

/**
 * Renders log metadata the way winston's own JSON format does: circular references
 * become "[Circular]" and values with no JSON form are left out instead of throwing.
 * Keys keep their insertion order.
 */
export const stringifyMeta = configure({ deterministic: false });

export interface WinstonLoggerOptions {
  level: LogLevel;
  file?: string;
  silentConsole?: boolean;
  transports?: TransportStream[];
}

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, logger, ...meta }) => {
    let line = `${String(timestamp)} [${level}]`;
    if (logger) line += ` [${String(logger)}]`;
    line += `: ${String(message)}`;

    if (Object.keys(meta).length > 0) {
      line += ` ${stringifyMeta(meta)}`;
    }

    return line;
  })
);

export function createWinstonLogger(options: WinstonLoggerOptions): winston.Logger {
  const transports: TransportStream[] = [
    new winston.transports.Console({
      format: consoleFormat,
      silent: options.silentConsole,
    }),
  ];

  if (options.file) {
    transports.push(
      new DailyRotateFile({
        filename: options.file.replace(/\.log$/, "") + "-%DATE%.log",
        datePattern: "YYYY-MM-DD",
        maxSize: "20m",
        maxFiles: "7d",
        format: winston.format.json(),
      })
    );
  }

  transports.push(...(options.transports ?? []));

  return winston.createLogger({
    level: options.level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true })
    ),
    transports,
  });
}

/**
 * {@link Logger} on top of a winston logger. Children share transports and tag
 * their entries with their own logger name.
 */
export class WinstonLogger implements Logger {
  constructor(private readonly logger: winston.Logger) {}

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

  public child(name: string): WinstonLogger {
    return new WinstonLogger(this.logger.child({ logger: name }));
  }

  public setLevel(level: LogLevel): void {
    this.logger.level = level;
  }

  public getLogger(): winston.Logger {
    return this.logger;
  }
}

/**
 * Console-only logger for the shipper's own diagnostics, so they never feed back into shipping.
 */
export function createConsoleLogger(level: LogLevel, silent = false): WinstonLogger {
  return new WinstonLogger(createWinstonLogger({ level, silentConsole: silent })).child(
    "log-shipper"
  );
}

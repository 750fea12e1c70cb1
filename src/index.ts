export { Logger, LogMeta } from "./application/interfaces/Logger";
export {
  LogShipper,
  LogShipperOptions,
  LogShipperStats,
  ShutdownResult,
  DEFAULT_SHIPPER_OPTIONS,
} from "./application/services/LogShipper";
export { LogBatch } from "./domain/entities/LogBatch";
export { LogRecord, LogLabels, CreateLogRecordInput } from "./domain/entities/LogRecord";
export { LogBackend, LogShippingResult } from "./domain/services/LogBackend";
export { DropReason, ShippingMetrics } from "./domain/services/ShippingMetrics";
export { LogLevel, LOG_LEVELS, isLogLevel, parseLogLevel } from "./domain/value-objects/LogLevel";
export { ShipperState, ShipperStateValidator } from "./domain/value-objects/ShipperState";
export { AppConfig, Config, LokiConfig } from "./infrastructure/config/Config";
export {
  GracefulShutdownOptions,
  ShutdownTarget,
  registerGracefulShutdown,
} from "./infrastructure/lifecycle/GracefulShutdown";
export { LokiPushClient, LokiPushClientOptions, LOKI_PUSH_PATH } from "./infrastructure/logging/LokiPushClient";
export { LokiTransport, LogRecordSink } from "./infrastructure/logging/LokiTransport";
export { RemoteLogger, RemoteLoggerStats } from "./infrastructure/logging/RemoteLogger";
export {
  WinstonLogger,
  createConsoleLogger,
  createWinstonLogger,
} from "./infrastructure/logging/WinstonLogger";
export {
  InMemoryShippingMetrics,
  ShippingMetricsSnapshot,
} from "./infrastructure/metrics/InMemoryShippingMetrics";

export type DropReason = "overflow" | "shutdown-timeout" | "malformed";

export interface ShippingMetrics {
  recordSendSuccess(recordCount: number): void;
  recordSendFailure(recordCount: number): void;
  recordDropped(recordCount: number, reason: DropReason): void;
}

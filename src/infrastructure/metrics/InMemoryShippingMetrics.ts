import { DropReason, ShippingMetrics } from "../../domain/services/ShippingMetrics";

export interface ShippingMetricsSnapshot {
  sendsSucceeded: number;
  sendsFailed: number;
  recordsSent: number;
  recordsFailed: number;
  recordsDropped: Record<DropReason, number>;
}

export class InMemoryShippingMetrics implements ShippingMetrics {
  private sendsSucceeded = 0;
  private sendsFailed = 0;
  private recordsSent = 0;
  private recordsFailed = 0;
  private readonly recordsDropped: Record<DropReason, number> = {
    overflow: 0,
    "shutdown-timeout": 0,
    malformed: 0,
  };

  public recordSendSuccess(recordCount: number): void {
    this.sendsSucceeded++;
    this.recordsSent += recordCount;
  }

  public recordSendFailure(recordCount: number): void {
    this.sendsFailed++;
    this.recordsFailed += recordCount;
  }

  public recordDropped(recordCount: number, reason: DropReason): void {
    this.recordsDropped[reason] += recordCount;
  }

  public snapshot(): ShippingMetricsSnapshot {
    return {
      sendsSucceeded: this.sendsSucceeded,
      sendsFailed: this.sendsFailed,
      recordsSent: this.recordsSent,
      recordsFailed: this.recordsFailed,
      recordsDropped: { ...this.recordsDropped },
    };
  }
}

import { LogBatch } from "../entities/LogBatch";

export interface LogShippingResult {
  readonly success: boolean;
  readonly status?: number;
  readonly error?: string;
  /**
   * Records left out of the request because they could not be serialized.
   */
  readonly rejected: number;
}

export interface LogBackend {
  /**
   * Push one batch in a single request. Failures are reported in the result, never thrown.
   */
  push(batch: LogBatch): Promise<LogShippingResult>;

  /**
   * Human readable destination, used in diagnostics
   */
  describe(): string;
}

import { Logger } from "../../application/interfaces/Logger";
import { LogBatch } from "../../domain/entities/LogBatch";
import { LogRecord } from "../../domain/entities/LogRecord";
import { LogBackend, LogShippingResult } from "../../domain/services/LogBackend";
import { LokiEntry, LokiStream, SerializedBatch } from "./types/LogTypes";

export const LOKI_PUSH_PATH = "/loki/api/v1/push";

const LABEL_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export interface LokiPushClientOptions {
  url: string;
  requestTimeoutMs: number;
  tenantId?: string;
}

function labelSetKey(labels: Record<string, string>): string {
  const names = Object.keys(labels).sort();
  return JSON.stringify(names.map((name) => [name, labels[name]]));
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export class LokiPushClient implements LogBackend {
  private readonly endpoint: string;

  constructor(
    private readonly options: LokiPushClientOptions,
    private readonly logger: Logger,
    private readonly fetchFn: FetchFn = fetch
  ) {
    this.endpoint = `${options.url.replace(/\/+$/, "")}${LOKI_PUSH_PATH}`;
  }

  public describe(): string {
    return this.endpoint;
  }

  public async push(batch: LogBatch): Promise<LogShippingResult> {
    const { payload, accepted, rejected } = this.serialize(batch.records);
    if (accepted === 0) {
      return { success: true, rejected };
    }

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.options.tenantId) {
      headers["X-Scope-OrgID"] = this.options.tenantId;
    }

    try {
      const response = await this.fetchFn(this.endpoint, {
        method: "POST",
        headers,
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });

      if (!response.ok) {
        const body = await response.text().catch(() => "");
        return {
          success: false,
          status: response.status,
          error: `HTTP ${response.status}: ${body.slice(0, 100) || response.statusText}`,
          rejected,
        };
      }

      // an unread body keeps the connection checked out
      await response.body?.cancel().catch(() => undefined);
      return { success: true, status: response.status, rejected };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : "Unknown error";
      return { success: false, error: errorMessage, rejected };
    }
  }

  /**
   * Groups records into Loki streams by label set, keeping batch order inside each stream.
   * Records that cannot be encoded are left out and counted as rejected.
   */
  public serialize(records: readonly LogRecord[]): SerializedBatch {
    const streams = new Map<string, LokiStream>();
    let rejected = 0;

    for (const record of records) {
      try {
        const labels = this.toLabels(record);
        const entry: LokiEntry = [this.toNanoseconds(record), record.message];
        const key = labelSetKey(labels);

        const stream = streams.get(key);
        if (stream) {
          stream.values.push(entry);
        } else {
          streams.set(key, { stream: labels, values: [entry] });
        }
      } catch (error) {
        rejected++;
        this.logger.error("Dropping log record that cannot be serialized", {
          logger: record.logger,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return {
      payload: { streams: [...streams.values()] },
      accepted: records.length - rejected,
      rejected,
    };
  }

  private toLabels(record: LogRecord): Record<string, string> {
    const labels = record.streamLabels();
    for (const name of Object.keys(labels)) {
      if (!LABEL_NAME_PATTERN.test(name)) {
        throw new Error(`Invalid label name '${name}'`);
      }
    }
    return labels;
  }

  private toNanoseconds(record: LogRecord): string {
    const millis = record.timestamp.getTime();
    if (!Number.isInteger(millis) || millis < 0) {
      throw new Error("Invalid timestamp");
    }
    return `${millis}000000`;
  }
}

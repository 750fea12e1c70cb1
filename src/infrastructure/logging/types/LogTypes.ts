/** `[<unix epoch in nanoseconds>, <log line>]` */
export type LokiEntry = [string, string];

export interface LokiStream {
  stream: Record<string, string>;
  values: LokiEntry[];
}

export interface LokiPushPayload {
  streams: LokiStream[];
}

export interface SerializedBatch {
  payload: LokiPushPayload;
  accepted: number;
  rejected: number;
}

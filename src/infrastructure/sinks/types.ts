import type { HealthNotification } from "@/types/health";

export type SinkKind = "stdout" | "file" | "webhook";

export type SinkResult = { ok: true } | { ok: false; error: Error };

export type HealthReportEvent = HealthNotification & {
  type: "health_report";
  timestamp: string;
};

export interface NotificationSink {
  readonly kind: SinkKind;

  send(event: HealthReportEvent): Promise<SinkResult>;
}

export type FileSinkOptions = {
  /** Absolute path to file; will be created if missing */
  path: string;
};

export type WebhookSinkOptions = {
  url: string;
  headers?: Record<string, string>;
  /** max retries on 5xx/network errors */
  maxRetries?: number;
  /** backoff in ms function of attempt number starting from 1 */
  backoffMs?: (attempt: number) => number;
  timeoutMs?: number;
};

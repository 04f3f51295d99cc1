import {
  buildServiceAuthHeaders,
  type EventWriteStatus,
  type RecordTraceEventRequest,
  type TraceEvent,
} from "@wildtrace/shared";

export interface TraceLogPublisher {
  publish(event: TraceEvent): Promise<EventWriteStatus>;
}

/**
 * Posts traceability events to the transfer/traceability log service.
 * Publishing is best-effort: a failure is reported, never thrown.
 */
export class HttpTraceLogPublisher implements TraceLogPublisher {
  private readonly baseUrl: string | undefined;
  private readonly serviceAuthToken: string | undefined;
  private readonly timeoutMs: number;

  constructor(baseUrl: string | undefined, serviceAuthToken?: string, timeoutMs = 5000) {
    this.baseUrl = baseUrl ? baseUrl.replace(/\/$/, "") : undefined;
    this.serviceAuthToken = serviceAuthToken;
    this.timeoutMs = timeoutMs;
  }

  async publish(event: TraceEvent): Promise<EventWriteStatus> {
    if (!this.baseUrl) {
      return "SKIPPED";
    }

    const body: RecordTraceEventRequest = { event };
    try {
      const response = await fetch(`${this.baseUrl}/events/record`, {
        method: "POST",
        headers: {
          ...buildServiceAuthHeaders(this.serviceAuthToken),
          "content-type": "application/json",
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return response.ok ? "RECORDED" : "FAILED";
    } catch {
      return "FAILED";
    }
  }
}

import type { RequestRecordPayload, RequestStatistics } from "@speakercheck/shared";
import { createLogger } from "../lib/logger.js";

const logger = createLogger("stats");

export interface RequestRecord {
  timestamp: number;
  endpoint: string;
  method: string;
  status: number;
  durationMs: number;
  success: boolean;
  error: string | null;
  clientIp: string;
}

/**
 * Running totals plus a bounded log of the most recent requests.
 * Everything is updated synchronously, so concurrent handlers never
 * interleave inside an update.
 */
export class RequestStatsCollector {
  private total = 0;
  private successes = 0;
  private failures = 0;
  private totalDurationMs = 0;
  private readonly recent: RequestRecord[] = [];
  private readonly startedAt: number;

  constructor(
    private readonly capacity: number,
    private readonly now: () => number = Date.now,
  ) {
    this.startedAt = now();
  }

  /** Never throws: statistics must not fail a request. */
  record(entry: Omit<RequestRecord, "timestamp">): void {
    try {
      this.total++;
      if (entry.success) {
        this.successes++;
      } else {
        this.failures++;
      }
      this.totalDurationMs += entry.durationMs;

      if (this.capacity > 0) {
        this.recent.push({ ...entry, timestamp: this.now() });
        if (this.recent.length > this.capacity) {
          this.recent.shift();
        }
      }
    } catch (err) {
      logger.warn("failed to record request", err);
    }
  }

  uptimeSeconds(): number {
    return Math.round((this.now() - this.startedAt) / 1000);
  }

  snapshot(): RequestStatistics {
    return {
      total_requests: this.total,
      success_count: this.successes,
      error_count: this.failures,
      success_rate: this.total === 0 ? 0 : round((this.successes / this.total) * 100, 2),
      avg_response_time_ms: this.total === 0 ? 0 : round(this.totalDurationMs / this.total, 2),
      recent_requests: this.recent.map(toPayload),
    };
  }
}

function toPayload(record: RequestRecord): RequestRecordPayload {
  return {
    timestamp: new Date(record.timestamp).toISOString(),
    endpoint: record.endpoint,
    method: record.method,
    status: record.status,
    duration_ms: round(record.durationMs, 2),
    success: record.success,
    error: record.error,
    client_ip: record.clientIp,
  };
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

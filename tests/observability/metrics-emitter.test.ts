import { beforeEach, describe, expect, it, vi } from "vitest";
import { logEvent } from "../../packages/core/src/observability/logger";
import {
  clearRecentMetrics,
  emitMetric,
  emitMetricBestEffort,
  recentMetrics,
  startLatencyTimer,
} from "../../packages/core/src/observability/metrics";
import {
  METRIC_CATALOG,
  validateMetricCatalog,
} from "../../packages/core/src/observability/metrics-catalog";

describe("metrics emitter", () => {
  beforeEach(() => {
    clearRecentMetrics();
  });

  it("rejects unknown metric names", () => {
    expect(() => emitMetric({ metric: "unknown.metric", value: 1 })).toThrow("Unknown metric 'unknown.metric'.");
    expect(emitMetricBestEffort({ metric: "unknown.metric", value: 1 })).toBeNull();
  });

  it("validates the canonical metrics catalog", () => {
    expect(validateMetricCatalog(METRIC_CATALOG)).toEqual({ valid: true });
  });

  it("rejects catalogs with duplicate names", () => {
    const entry = { metric_name: "a.b", type: "counter", description: "x", tags: [], unit: "count" } as const;
    expect(() => validateMetricCatalog([entry, entry])).toThrow("Duplicate metric_name 'a.b'.");
  });

  it("drops PII-like tags from emitted payloads", () => {
    const emitted = emitMetric({
      metric: "system.error.count",
      value: 1,
      correlation_id: "update:1",
      tags: {
        component: "unit_test",
        phone: "+998901234567",
        search_text: "teacher",
        phase: "test@example.com",
        error_name: "DbError",
      },
    });

    expect(emitted.tags).toEqual({ component: "unit_test", error_name: "DbError" });
    expect(emitted.correlation_id).toBe("update:1");
  });

  it("rounds counters to whole numbers", () => {
    const emitted = emitMetric({ metric: "ingestion.update.dispatched", value: 1.6 });
    expect(emitted.value).toBe(2);
    expect(emitted.type).toBe("counter");
  });

  it("emits latency histogram metrics with millisecond values", () => {
    const emitted = emitMetric({
      metric: "system.request.latency",
      value: startLatencyTimer()(),
      tags: { component: "unit_test", operation: "handle_update", outcome: "success" },
    });

    expect(emitted.type).toBe("histogram");
    expect(emitted.unit).toBe("ms");
    expect(emitted.value).toBeGreaterThanOrEqual(0);
  });

  it("derives failure counters from structured logs", () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    logEvent({
      event: "ingestion.poll_failed",
      level: "warn",
      correlation_id: "poll:1",
      payload: { failure: "timeout", error_code: null, delay_ms: 2000 },
    });

    const [metric] = recentMetrics();
    expect(metric?.metric).toBe("ingestion.poll.failure");
    expect(metric?.correlation_id).toBe("poll:1");
    expect(metric?.tags).toEqual({ component: "polling_loop", failure: "timeout", error_code: "none" });
  });
});

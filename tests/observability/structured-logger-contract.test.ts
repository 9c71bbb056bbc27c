import fs from "fs";
import { afterEach, describe, expect, it, vi } from "vitest";
import { EVENT_CATALOG_BY_NAME } from "../../packages/core/src/observability/event-catalog";
import { createLogger, isKnownEventName, logEvent } from "../../packages/core/src/observability/logger";
import { clearRegisteredSecrets, registerSecret } from "../../packages/core/src/observability/redaction";
import { productionSources } from "../support/source-files";

const REQUIRED_CANONICAL_EVENTS = [
  "system.startup",
  "system.shutdown",
  "system.unhandled_error",
  "ingestion.poll_failed",
  "ingestion.conflict_detected",
  "ingestion.auth_failed",
  "ingestion.worker_failed",
  "ingestion.loop_stopped",
  "transport.retry_scheduled",
  "transport.request_failed",
  "session.mirror_failed",
  "conversation.state_transition",
  "application.submitted",
  "application.persist_failed",
  "application.reviewer_notify_failed",
  "admin.query_performed",
  "admin.store_unavailable",
] as const;

function captureLines() {
  return vi.spyOn(console, "info").mockImplementation(() => undefined);
}

function parseLine(line: unknown): { payload: Record<string, unknown>; user_id: string | null; correlation_id: string | null } {
  return JSON.parse(String(line));
}

describe("structured logger contract", () => {
  afterEach(() => {
    clearRegisteredSecrets();
  });

  it("includes all required canonical events in the catalog", () => {
    const missing = REQUIRED_CANONICAL_EVENTS.filter((eventName) => !EVENT_CATALOG_BY_NAME[eventName]);
    expect(missing).toEqual([]);
  });

  it("recognizes only cataloged event names", () => {
    expect(isKnownEventName("ingestion.poll_failed")).toBe(true);
    expect(isKnownEventName("unknown.event")).toBe(false);
  });

  it("enforces required event payload fields", () => {
    expect(() =>
      logEvent({
        event: "ingestion.loop_stopped",
        payload: { reason: "signal" },
      })).toThrow("Missing required field 'offset' for log event 'ingestion.loop_stopped'.");
  });

  it("treats blank strings as missing", () => {
    expect(() =>
      logEvent({
        event: "conversation.input_rejected",
        payload: { step: "  " },
      })).toThrow("Missing required field 'step'");
  });

  it("redacts applicant text and contact details", () => {
    const infoSpy = captureLines();
    logEvent({
      event: "conversation.input_rejected",
      user_id: 42,
      payload: {
        step: "phone",
        text: "Aziza Karimova",
        note: "reach me at test@example.com or +998 90 123 45 67",
      },
    });

    expect(infoSpy).toHaveBeenCalledTimes(1);
    const parsed = parseLine(infoSpy.mock.calls[0]?.[0]);
    expect(parsed.user_id).toBe("42");
    expect(parsed.payload).toEqual({
      step: "phone",
      text: "[REDACTED_USER_TEXT]",
      note: "reach me at [REDACTED_EMAIL] or [REDACTED_PHONE]",
    });
  });

  it("masks registered secrets inside logged strings", () => {
    registerSecret("test-token");
    const infoSpy = captureLines();
    logEvent({
      event: "transport.request_failed",
      level: "warn",
      payload: { method: "getMe", failure: "connection", url: "https://api.telegram.org/bottest-token/getMe" },
    });

    const parsed = parseLine(infoSpy.mock.calls[0]?.[0]);
    expect(parsed.payload.url).toBe("https://api.telegram.org/bot[REDACTED_SECRET]/getMe");
  });

  it("binds correlation and user ids through createLogger", () => {
    const infoSpy = captureLines();
    const log = createLogger({ correlation_id: "update:7", user_id: 501 });
    log({ event: "conversation.input_rejected", payload: { step: "name" } });

    const parsed = parseLine(infoSpy.mock.calls[0]?.[0]);
    expect(parsed.correlation_id).toBe("update:7");
    expect(parsed.user_id).toBe("501");
  });

  it("ensures literal event names in sources exist in the catalog", () => {
    const literalEvents = new Set<string>();
    for (const file of productionSources()) {
      const source = fs.readFileSync(file, "utf8");
      const pattern = /\b(?:logEvent|log)\(\s*\{[\s\S]{0,500}?event:\s*"([^"]+)"/g;
      for (const match of source.matchAll(pattern)) {
        if (match[1]) {
          literalEvents.add(match[1]);
        }
      }
    }

    expect(literalEvents.size).toBeGreaterThan(0);
    const missing = Array.from(literalEvents)
      .filter((eventName) => !EVENT_CATALOG_BY_NAME[eventName])
      .sort();
    expect(missing).toEqual([]);
  });
});

import {
  EVENT_CATALOG_BY_NAME,
  type CanonicalEventName,
  type EventCatalogEntry,
} from "./event-catalog.ts";
import { emitMetricBestEffort } from "./metrics.ts";
import { redactPII } from "./redaction.ts";
import { detectRuntimeEnv, normalizeRuntimeEnv } from "./runtime-env.ts";
import { reportLogToSentry } from "./sentry.ts";

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export type StructuredLogEventInput = {
  event: CanonicalEventName;
  user_id?: string | number | null;
  correlation_id?: string | null;
  payload: Record<string, unknown>;
  level?: LogLevel;
};

export type StructuredLogEvent = {
  ts: string;
  level: LogLevel;
  event: string;
  category: string;
  env: string;
  correlation_id: string | null;
  user_id: string | null;
  payload: Record<string, unknown>;
};

export type LoggerContext = {
  env?: string;
  correlation_id?: string | null;
  user_id?: string | number | null;
};

export type Logger = (input: StructuredLogEventInput) => StructuredLogEvent;

export function isKnownEventName(event: string): event is CanonicalEventName {
  return Boolean(EVENT_CATALOG_BY_NAME[event]);
}

/** Binds correlation and user ids so call sites only pass the event and payload. */
export function createLogger(context: LoggerContext = {}): Logger {
  return (input) => logEvent({
    ...input,
    correlation_id: normalizeString(input.correlation_id) ??
      normalizeString(context.correlation_id) ??
      null,
    user_id: normalizeId(input.user_id) ?? normalizeId(context.user_id) ?? null,
  }, context.env);
}

export function logEvent(input: StructuredLogEventInput, explicitEnv?: string): StructuredLogEvent {
  const eventDef = resolveEventDefinition(input.event);
  const payload = ensurePayloadObject(input.payload);
  assertRequiredFields(eventDef, payload);

  const redactedPayload = redactPII(payload);
  const env = explicitEnv ? normalizeRuntimeEnv(explicitEnv) : detectRuntimeEnv();

  const event: StructuredLogEvent = {
    ts: new Date().toISOString(),
    level: input.level ?? "info",
    event: eventDef.event_name,
    category: eventDef.category,
    env,
    correlation_id: normalizeString(input.correlation_id),
    user_id: normalizeId(input.user_id),
    payload: redactedPayload,
  };

  emitDerivedMetricsFromLog(event);
  console.info(JSON.stringify(event, serializeErrors));
  reportLogToSentry(event);
  return event;
}

export function errorFields(error: unknown): { error_name: string; error_message: string } {
  if (error instanceof Error) {
    return { error_name: error.name, error_message: error.message };
  }
  return { error_name: "NonError", error_message: String(error) };
}

function serializeErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function resolveEventDefinition(event: string): EventCatalogEntry {
  const normalized = event.trim();
  const eventDef = EVENT_CATALOG_BY_NAME[normalized];
  if (!eventDef) {
    throw new Error(`Unknown structured log event: '${event}'.`);
  }
  return eventDef;
}

function ensurePayloadObject(payload: Record<string, unknown>): Record<string, unknown> {
  if (!payload || typeof payload !== "object" || Array.isArray(payload)) {
    throw new Error("Structured log payload must be an object.");
  }
  return payload;
}

function assertRequiredFields(
  eventDef: EventCatalogEntry,
  payload: Record<string, unknown>,
): void {
  for (const requiredField of eventDef.required_fields) {
    const value = payload[requiredField];
    if (isPresent(value)) {
      continue;
    }
    throw new Error(
      `Missing required field '${requiredField}' for log event '${eventDef.event_name}'.`,
    );
  }
}

function isPresent(value: unknown): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  if (typeof value === "string") {
    return value.trim().length > 0;
  }
  return true;
}

function normalizeString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function normalizeId(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return normalizeString(value);
}

function emitDerivedMetricsFromLog(event: StructuredLogEvent): void {
  const payload = event.payload;
  switch (event.event) {
    case "system.unhandled_error":
      emitMetricBestEffort({
        metric: "system.error.count",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "structured_logger",
          phase: safeTagValue(payload.phase) ?? "unknown",
          error_name: safeTagValue(payload.error_name) ?? "Error",
        },
      });
      return;

    case "ingestion.worker_failed":
      emitMetricBestEffort({
        metric: "system.error.count",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "worker_pool",
          phase: "handle_update",
          error_name: safeTagValue(payload.error_name) ?? "Error",
        },
      });
      return;

    case "ingestion.poll_failed":
      emitMetricBestEffort({
        metric: "ingestion.poll.failure",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "polling_loop",
          failure: safeTagValue(payload.failure) ?? "unknown",
          error_code: safeTagValue(payload.error_code) ?? "none",
        },
      });
      return;

    case "transport.retry_scheduled":
      emitMetricBestEffort({
        metric: "transport.retry.count",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "telegram_client",
          method: safeTagValue(payload.method) ?? "unknown",
          failure: safeTagValue(payload.failure) ?? "unknown",
        },
      });
      return;

    case "transport.request_failed":
      emitMetricBestEffort({
        metric: "transport.request.failure",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "telegram_client",
          method: safeTagValue(payload.method) ?? "unknown",
          failure: safeTagValue(payload.failure) ?? "unknown",
        },
      });
      return;

    case "conversation.state_transition":
      emitMetricBestEffort({
        metric: "conversation.step.transition",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "conversation_router",
          previous_step: safeTagValue(payload.previous_step) ?? "none",
          next_step: safeTagValue(payload.next_step) ?? "none",
          reason: safeTagValue(payload.reason) ?? "unknown",
        },
      });
      return;

    case "application.submitted":
      emitMetricBestEffort({
        metric: "application.submitted",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "conversation_router",
          saved: safeTagValue(payload.saved) ?? "false",
          notified: safeTagValue(payload.notified) ?? "false",
        },
      });
      return;

    case "admin.query_performed":
    case "admin.store_unavailable":
      emitMetricBestEffort({
        metric: "admin.query.count",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "admin_flow",
          query: safeTagValue(payload.query) ?? "unknown",
          outcome: event.event === "admin.query_performed" ? "ok" : "unavailable",
        },
      });
      return;

    default:
      return;
  }
}

function safeTagValue(value: unknown): string | null {
  if (typeof value === "string") {
    const normalized = value.trim();
    return normalized.length > 0 ? normalized : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  return null;
}

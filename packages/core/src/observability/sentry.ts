import type { LogLevel, StructuredLogEvent } from "./logger.ts";

export type SentryContext = {
  correlation_id?: string | null;
  user_id?: string | null;
  category?: string | null;
};

export type SentryCaptureInput = {
  level: LogLevel;
  event: string;
  context: SentryContext;
  payload: Record<string, unknown>;
};

export type SentrySpanOptions = {
  name: string;
  op: string;
  attributes?: Record<string, string | number | boolean>;
};

/** What core needs from an error tracker. The process entry point installs one; tests install fakes. */
export type SentryBridge = {
  captureException: (error: Error, input: SentryCaptureInput) => void;
  captureMessage: (message: string, input: SentryCaptureInput) => void;
  startSpan: <T>(options: SentrySpanOptions, callback: () => T) => T;
  withScope: <T>(context: SentryContext, callback: () => T) => T;
  flush: (timeoutMs: number) => Promise<boolean>;
};

let bridge: SentryBridge | null = null;

export function registerSentryBridge(next: SentryBridge | null): void {
  bridge = next;
}

/** Runs `callback` inside a scope tagged with the update's ids; without a bridge it just runs. */
export function withSentryContext<T>(context: SentryContext, callback: () => T): T {
  if (!bridge) {
    return callback();
  }
  try {
    return bridge.withScope(context, callback);
  } catch {
    return callback();
  }
}

export function startSentrySpan<T>(options: SentrySpanOptions, callback: () => T): T {
  if (!bridge) {
    return callback();
  }
  try {
    return bridge.startSpan(options, callback);
  } catch {
    return callback();
  }
}

export async function flushSentry(timeoutMs: number): Promise<boolean> {
  return bridge ? bridge.flush(timeoutMs) : true;
}

/**
 * Forwards error and fatal log lines. A payload carrying `error_message`
 * becomes an exception named after `error_name`; anything else is sent as a
 * `structured_log.<event>` message.
 */
export function reportLogToSentry(event: StructuredLogEvent): void {
  if (!bridge || (event.level !== "error" && event.level !== "fatal")) {
    return;
  }

  const input: SentryCaptureInput = {
    level: event.level,
    event: event.event,
    context: {
      category: event.category,
      correlation_id: event.correlation_id,
      user_id: event.user_id,
    },
    payload: event.payload,
  };

  try {
    const error = errorFromPayload(event.payload);
    if (error) {
      bridge.captureException(error, input);
    } else {
      bridge.captureMessage(`structured_log.${event.event}`, input);
    }
  } catch {
    // Reporting must not break update handling.
  }
}

function errorFromPayload(payload: Record<string, unknown>): Error | null {
  if (payload.error instanceof Error) {
    return payload.error;
  }
  const message = typeof payload.error_message === "string" ? payload.error_message.trim() : "";
  if (!message) {
    return null;
  }
  const error = new Error(message);
  error.name = typeof payload.error_name === "string" && payload.error_name.trim()
    ? payload.error_name.trim()
    : "StructuredLogError";
  return error;
}

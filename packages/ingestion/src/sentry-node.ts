import * as Sentry from "@sentry/node";
import { redactPII } from "../../core/src/observability/redaction.ts";
import { normalizeRuntimeEnv, type RuntimeEnv } from "../../core/src/observability/runtime-env.ts";
import {
  registerSentryBridge,
  type SentryBridge,
  type SentryCaptureInput,
  type SentryContext,
} from "../../core/src/observability/sentry.ts";
import type { RuntimeConfig } from "./config.ts";

const SERVICE_NAME = "intake-bot";

export type NodeSentryOptions = {
  dsn: string | null;
  environment: RuntimeEnv;
  release: string | null;
  enabled: boolean;
  tracesSampleRate: number;
};

let initialized = false;

/** Reporting needs a DSN and a non-local environment; staging traces every update. */
export function resolveNodeSentryOptions(sentry: RuntimeConfig["sentry"]): NodeSentryOptions {
  const environment = normalizeRuntimeEnv(sentry.environment);
  return {
    dsn: sentry.dsn,
    environment,
    release: sentry.release,
    enabled: sentry.dsn !== null && environment !== "local",
    tracesSampleRate: environment === "staging" ? 1.0 : 0.2,
  };
}

/** Masks applicant answers, phone numbers, emails and the bot token before an event leaves the process. */
export function redactSentryEvent<T>(event: T): T {
  return redactPII(event);
}

/** Initializes @sentry/node once and routes the core bridge through it. Returns whether events will be sent. */
export function initializeNodeSentry(sentry: RuntimeConfig["sentry"]): boolean {
  const options = resolveNodeSentryOptions(sentry);
  if (initialized) {
    return options.enabled;
  }

  Sentry.init({
    dsn: options.dsn ?? undefined,
    environment: options.environment,
    release: options.release ?? undefined,
    enabled: options.enabled,
    tracesSampleRate: options.tracesSampleRate,
    beforeSend: redactSentryEvent,
    sendDefaultPii: false,
    initialScope: { tags: { runtime: "node", service: SERVICE_NAME } },
  });

  registerSentryBridge(createNodeSentryBridge());
  initialized = true;
  return options.enabled;
}

function createNodeSentryBridge(): SentryBridge {
  return {
    captureException(error, input) {
      Sentry.withScope((scope) => {
        applyCaptureInput(scope, input);
        Sentry.captureException(error);
      });
    },
    captureMessage(message, input) {
      Sentry.withScope((scope) => {
        applyCaptureInput(scope, input);
        Sentry.captureMessage(message, toSeverity(input.level));
      });
    },
    startSpan: (options, callback) =>
      Sentry.startSpan({ name: options.name, op: options.op, attributes: options.attributes }, callback),
    withScope: (context, callback) =>
      Sentry.withScope((scope) => {
        applyContext(scope, context);
        return callback();
      }),
    flush: (timeoutMs) => Sentry.flush(timeoutMs),
  };
}

function applyCaptureInput(scope: Sentry.Scope, input: SentryCaptureInput): void {
  applyContext(scope, input.context);
  scope.setLevel(toSeverity(input.level));
  scope.setTag("event", input.event);
  scope.setContext("payload", flattenPayload(input.payload));
}

function applyContext(scope: Sentry.Scope, context: SentryContext): void {
  if (context.category) {
    scope.setTag("category", context.category);
  }
  if (context.correlation_id) {
    scope.setTag("correlation_id", context.correlation_id);
  }
  if (context.user_id) {
    scope.setUser({ id: context.user_id });
  }
}

function flattenPayload(payload: Record<string, unknown>): Record<string, string | number | boolean | null> {
  const flat: Record<string, string | number | boolean | null> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      flat[key] = value;
    } else {
      flat[key] = value === null || value === undefined ? null : JSON.stringify(value);
    }
  }
  return flat;
}

function toSeverity(level: SentryCaptureInput["level"]): Sentry.SeverityLevel {
  return level === "warn" ? "warning" : level;
}

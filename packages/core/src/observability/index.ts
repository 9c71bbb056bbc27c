export * from "./event-catalog.ts";
export * from "./logger.ts";
export * from "./metrics.ts";
export * from "./metrics-catalog.ts";
export * from "./redaction.ts";
export * from "./runtime-env.ts";
export * from "./sentry.ts";

import { METRIC_CATALOG_BY_NAME, type MetricType } from "./metrics-catalog.ts";
import { detectRuntimeEnv, type RuntimeEnv } from "./runtime-env.ts";

export type MetricTags = Record<string, string | number | boolean | null | undefined>;

export type MetricSample = {
  metric: string;
  value: number;
  correlation_id?: string | null;
  tags?: MetricTags;
};

export type EmittedMetric = {
  ts: string;
  metric: string;
  type: MetricType;
  unit: string;
  value: number;
  env: RuntimeEnv;
  correlation_id: string | null;
  tags: Record<string, string>;
};

const RECENT_METRICS_LIMIT = 2_000;
const MAX_TAG_VALUE_LENGTH = 96;
const TAG_KEY_PATTERN = /^[a-z][a-z0-9_]*$/;
// Keys that would carry form answers or chat text.
const APPLICANT_TAG_KEY_PATTERN =
  /^name$|(^|_)(phone|email|full_name|message|text|contact|experience)($|_)/i;
const EMAIL_PATTERN = /\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/i;
const MIN_PHONE_DIGITS = 9;

const recent: EmittedMetric[] = [];

/**
 * Validates a sample against the metric catalog and appends it to the
 * process-local ring of recent metrics. Unknown names and non-finite values
 * throw; tags that could identify an applicant are dropped.
 */
export function emitMetric(sample: MetricSample): EmittedMetric {
  const name = sample.metric.trim();
  const definition = METRIC_CATALOG_BY_NAME.get(name);
  if (!definition) {
    throw new Error(`Unknown metric '${sample.metric}'.`);
  }
  if (!Number.isFinite(sample.value)) {
    throw new Error("Metric value must be a finite number.");
  }

  const metric: EmittedMetric = {
    ts: new Date().toISOString(),
    metric: name,
    type: definition.type,
    unit: definition.unit,
    value: definition.unit === "count" ? Math.round(sample.value) : roundMs(sample.value),
    env: detectRuntimeEnv(),
    correlation_id: sample.correlation_id?.trim() || null,
    tags: sanitizeTags(sample.tags),
  };

  recent.push(metric);
  if (recent.length > RECENT_METRICS_LIMIT) {
    recent.splice(0, recent.length - RECENT_METRICS_LIMIT);
  }
  return metric;
}

export function emitMetricBestEffort(sample: MetricSample): EmittedMetric | null {
  try {
    return emitMetric(sample);
  } catch {
    return null;
  }
}

export function recentMetrics(): EmittedMetric[] {
  return [...recent];
}

export function clearRecentMetrics(): void {
  recent.length = 0;
}

/** Starts a monotonic clock; the returned function reads the elapsed milliseconds. */
export function startLatencyTimer(): () => number {
  const startedAt = performance.now();
  return () => Math.max(0, roundMs(performance.now() - startedAt));
}

function sanitizeTags(tags: MetricTags | undefined): Record<string, string> {
  const output: Record<string, string> = {};
  for (const [rawKey, rawValue] of Object.entries(tags ?? {})) {
    const key = rawKey.trim().toLowerCase();
    if (!TAG_KEY_PATTERN.test(key) || APPLICANT_TAG_KEY_PATTERN.test(key)) {
      continue;
    }
    const value = tagValue(rawValue);
    if (value === null || looksLikeContact(value)) {
      continue;
    }
    output[key] = value.slice(0, MAX_TAG_VALUE_LENGTH);
  }
  return output;
}

function tagValue(value: MetricTags[string]): string | null {
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : null;
  }
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function looksLikeContact(value: string): boolean {
  return EMAIL_PATTERN.test(value) || value.replace(/\D/g, "").length >= MIN_PHONE_DIGITS;
}

function roundMs(value: number): number {
  return Math.round(value * 1_000) / 1_000;
}

export type MetricType = "counter" | "histogram" | "gauge";

export type MetricCatalogEntry = {
  metric_name: string;
  type: MetricType;
  description: string;
  tags: readonly string[];
  unit: string;
};

export const METRIC_CATALOG = [
  {
    metric_name: "system.error.count",
    type: "counter",
    description: "Unhandled runtime errors across the poller, workers and bootstrap.",
    tags: ["component", "phase", "error_name"],
    unit: "count",
  },
  {
    metric_name: "system.request.latency",
    type: "histogram",
    description: "Latency of platform calls and per-update handling.",
    tags: ["component", "operation", "outcome"],
    unit: "ms",
  },
  {
    metric_name: "ingestion.update.dispatched",
    type: "counter",
    description: "Updates handed to the worker pool after the offset advanced.",
    tags: ["component", "kind"],
    unit: "count",
  },
  {
    metric_name: "ingestion.poll.failure",
    type: "counter",
    description: "Long-poll fetches that returned a failure.",
    tags: ["component", "failure", "error_code"],
    unit: "count",
  },
  {
    metric_name: "transport.retry.count",
    type: "counter",
    description: "Transport attempts repeated after a timeout or connection failure.",
    tags: ["component", "method", "failure"],
    unit: "count",
  },
  {
    metric_name: "transport.request.failure",
    type: "counter",
    description: "Platform calls that failed after their retry budget.",
    tags: ["component", "method", "failure"],
    unit: "count",
  },
  {
    metric_name: "conversation.step.transition",
    type: "counter",
    description: "Session step transitions across the intake and admin flows.",
    tags: ["component", "previous_step", "next_step", "reason"],
    unit: "count",
  },
  {
    metric_name: "application.submitted",
    type: "counter",
    description: "Completed applications, tagged by persistence and notification outcome.",
    tags: ["component", "saved", "notified"],
    unit: "count",
  },
  {
    metric_name: "admin.query.count",
    type: "counter",
    description: "Reviewer queries against the application store.",
    tags: ["component", "query", "outcome"],
    unit: "count",
  },
] as const satisfies readonly MetricCatalogEntry[];

export type MetricName = (typeof METRIC_CATALOG)[number]["metric_name"];

export const METRIC_CATALOG_BY_NAME: ReadonlyMap<string, MetricCatalogEntry> = new Map(
  METRIC_CATALOG.map((entry) => [entry.metric_name, entry]),
);

const METRIC_NAME_PATTERN = /^[a-z][a-z0-9_]*(\.[a-z0-9_]+)+$/;
const TAG_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

export function validateMetricCatalog(
  entries: readonly MetricCatalogEntry[] = METRIC_CATALOG,
): { valid: true } {
  const seenNames = new Set<string>();
  for (const entry of entries) {
    if (!METRIC_NAME_PATTERN.test(entry.metric_name)) {
      throw new Error(`Invalid metric_name '${entry.metric_name}'.`);
    }
    if (seenNames.has(entry.metric_name)) {
      throw new Error(`Duplicate metric_name '${entry.metric_name}'.`);
    }
    seenNames.add(entry.metric_name);

    if (entry.description.trim().length === 0) {
      throw new Error(`Metric '${entry.metric_name}' requires a non-empty description.`);
    }
    if (entry.unit.trim().length === 0) {
      throw new Error(`Metric '${entry.metric_name}' requires a non-empty unit.`);
    }

    const seenTags = new Set<string>();
    for (const tag of entry.tags) {
      if (!TAG_NAME_PATTERN.test(tag)) {
        throw new Error(`Metric '${entry.metric_name}' has invalid tag '${tag}'.`);
      }
      if (seenTags.has(tag)) {
        throw new Error(`Metric '${entry.metric_name}' has duplicate tag '${tag}'.`);
      }
      seenTags.add(tag);
    }
  }
  return { valid: true };
}

validateMetricCatalog(METRIC_CATALOG);

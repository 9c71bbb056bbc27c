export type EventCategory =
  | "system"
  | "ingestion"
  | "transport"
  | "session"
  | "conversation"
  | "application"
  | "admin";

export type EventCatalogEntry = {
  event_name: string;
  category: EventCategory;
  description: string;
  required_fields: readonly string[];
};

export const EVENT_CATALOG = [
  {
    event_name: "system.startup",
    category: "system",
    description: "Process bootstrap finished and the poller is about to start.",
    required_fields: ["component"],
  },
  {
    event_name: "system.shutdown",
    category: "system",
    description: "A termination signal was received.",
    required_fields: ["signal"],
  },
  {
    event_name: "system.unhandled_error",
    category: "system",
    description: "An error escaped every handler.",
    required_fields: ["phase", "error_name"],
  },
  {
    event_name: "ingestion.poll_failed",
    category: "ingestion",
    description: "A long-poll fetch returned a failure result.",
    required_fields: ["failure"],
  },
  {
    event_name: "ingestion.conflict_detected",
    category: "ingestion",
    description: "Another consumer holds the update feed; the webhook is cleared before retrying.",
    required_fields: ["pause_ms"],
  },
  {
    event_name: "ingestion.auth_failed",
    category: "ingestion",
    description: "The platform rejected the bot credential; the loop terminates.",
    required_fields: ["error_code"],
  },
  {
    event_name: "ingestion.update_ignored",
    category: "ingestion",
    description: "An update carried no message or callback this bot handles.",
    required_fields: ["update_id"],
  },
  {
    event_name: "ingestion.worker_failed",
    category: "ingestion",
    description: "Processing an update threw; the loop keeps running.",
    required_fields: ["update_key", "error_name"],
  },
  {
    event_name: "ingestion.bootstrap_call_failed",
    category: "ingestion",
    description: "A startup call (webhook removal, command registration) failed.",
    required_fields: ["method"],
  },
  {
    event_name: "ingestion.loop_stopped",
    category: "ingestion",
    description: "The polling loop exited and in-flight workers drained.",
    required_fields: ["reason", "offset"],
  },
  {
    event_name: "transport.retry_scheduled",
    category: "transport",
    description: "A transient transport failure will be retried.",
    required_fields: ["method", "attempt", "failure"],
  },
  {
    event_name: "transport.request_failed",
    category: "transport",
    description: "A platform call failed after its retry budget.",
    required_fields: ["method", "failure"],
  },
  {
    event_name: "session.load_failed",
    category: "session",
    description: "Reading session or language state from the store failed.",
    required_fields: ["operation"],
  },
  {
    event_name: "session.mirror_failed",
    category: "session",
    description: "Mirroring a cached write to the store failed; the cache keeps the write.",
    required_fields: ["operation"],
  },
  {
    event_name: "conversation.state_transition",
    category: "conversation",
    description: "A user's session moved between steps.",
    required_fields: ["previous_step", "next_step", "reason"],
  },
  {
    event_name: "conversation.input_rejected",
    category: "conversation",
    description: "Step input failed validation and the step was asked again.",
    required_fields: ["step"],
  },
  {
    event_name: "application.submitted",
    category: "application",
    description: "A completed form went through persistence and reviewer notification.",
    required_fields: ["saved", "notified"],
  },
  {
    event_name: "application.persist_failed",
    category: "application",
    description: "Saving a completed application to the store failed.",
    required_fields: ["attempt"],
  },
  {
    event_name: "application.reviewer_notify_failed",
    category: "application",
    description: "Delivering a completed application to the reviewer channel failed.",
    required_fields: ["method"],
  },
  {
    event_name: "admin.query_performed",
    category: "admin",
    description: "A reviewer query ran against the application store.",
    required_fields: ["query", "result_count"],
  },
  {
    event_name: "admin.store_unavailable",
    category: "admin",
    description: "A reviewer query could not reach the application store.",
    required_fields: ["query", "reason"],
  },
] as const satisfies readonly EventCatalogEntry[];

export type CanonicalEventName = (typeof EVENT_CATALOG)[number]["event_name"];

export const EVENT_CATALOG_BY_NAME: Readonly<Record<string, EventCatalogEntry>> = Object.fromEntries(
  EVENT_CATALOG.map((entry) => [entry.event_name, entry]),
);

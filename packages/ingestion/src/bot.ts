import { createAdminQueries } from "../../core/src/admin/admin-queries.ts";
import { createConversationRouter } from "../../core/src/conversation/conversation-router.ts";
import { logEvent } from "../../core/src/observability/logger.ts";
import { emitMetricBestEffort, startLatencyTimer } from "../../core/src/observability/metrics.ts";
import { startSentrySpan, withSentryContext } from "../../core/src/observability/sentry.ts";
import type { TelegramClient } from "../../messaging/src/client.ts";
import type { InboundUpdate } from "../../messaging/src/updates.ts";
import { createMessageSender } from "../../messaging/src/sender.ts";
import { DEFAULT_LANGUAGE, parseLanguage } from "../../messaging/src/templates/labels.ts";
import type { ApplicationPersistence, SessionPersistence } from "../../db/src/persistence.ts";
import { CachedSessionStore } from "../../db/src/session-store.ts";
import type { RuntimeConfig } from "./config.ts";
import { createWorkerFailureLogger, PollingLoop, type Sleeper } from "./polling-loop.ts";
import { KeyedWorkerPool } from "./worker-pool.ts";

export const BOT_COMMANDS = [
  { command: "start", description: "Start the bot" },
  { command: "menu", description: "Main menu" },
  { command: "admin", description: "Admin panel (reviewers only)" },
] as const;

export type IntakeBotDeps = {
  client: TelegramClient;
  sessionPersistence: SessionPersistence | null;
  applications: ApplicationPersistence | null;
  sleep?: Sleeper;
};

export type IntakeBot = {
  loop: PollingLoop;
  pool: KeyedWorkerPool;
  bootstrap: () => Promise<void>;
};

/** Wires transport, state, conversation handling and ingestion for one process. */
export function createIntakeBot(
  config: Pick<
    RuntimeConfig,
    "reviewerChatId" | "reviewerLanguage" | "pollTimeoutSeconds" | "workerConcurrency" | "reportTimeZone"
  >,
  deps: IntakeBotDeps,
): IntakeBot {
  const sessions = new CachedSessionStore({
    persistence: deps.sessionPersistence,
    defaultLanguage: DEFAULT_LANGUAGE,
    parseLanguage,
  });

  const router = createConversationRouter({
    sender: createMessageSender(deps.client),
    sessions,
    applications: deps.applications,
    adminQueries: createAdminQueries(deps.applications),
    reviewerChatId: config.reviewerChatId,
    reviewerLanguage: config.reviewerLanguage ?? undefined,
    timeZone: config.reportTimeZone,
  });

  const pool = new KeyedWorkerPool({
    concurrency: config.workerConcurrency,
    onTaskError: createWorkerFailureLogger(),
  });

  const loop = new PollingLoop({
    client: deps.client,
    pool,
    pollTimeoutSeconds: config.pollTimeoutSeconds,
    sleep: deps.sleep,
    handleUpdate: (update) =>
      withSentryContext(
        {
          correlation_id: `update:${update.updateId}`,
          user_id: String(update.userId),
          category: "conversation",
        },
        () =>
          startSentrySpan(
            { name: "update.handle", op: "bot.update", attributes: { kind: update.kind } },
            () => timedHandle(update, router.handleUpdate),
          ),
      ),
  });

  return {
    loop,
    pool,
    bootstrap: () => runBootstrapCalls(deps.client),
  };
}

async function timedHandle(
  update: InboundUpdate,
  handle: (update: InboundUpdate) => Promise<void>,
): Promise<void> {
  const elapsedMs = startLatencyTimer();
  let outcome = "error";
  try {
    await handle(update);
    outcome = "success";
  } finally {
    emitMetricBestEffort({
      metric: "system.request.latency",
      value: elapsedMs(),
      correlation_id: `update:${update.updateId}`,
      tags: { component: "conversation_router", operation: update.kind, outcome },
    });
  }
}

/** Drops any webhook so long polling is allowed, then registers the command list. Failures are logged only. */
export async function runBootstrapCalls(client: TelegramClient): Promise<void> {
  const calls: Array<{ method: string; params: Record<string, unknown> }> = [
    { method: "deleteWebhook", params: { drop_pending_updates: true } },
    { method: "setMyCommands", params: { commands: BOT_COMMANDS } },
  ];

  for (const { method, params } of calls) {
    const result = await client.call(method, params);
    if (!result.ok) {
      logEvent({
        event: "ingestion.bootstrap_call_failed",
        level: "warn",
        payload: {
          method,
          failure: result.failure,
          error_code: result.errorCode,
          description: result.description,
        },
      });
    }
  }
}

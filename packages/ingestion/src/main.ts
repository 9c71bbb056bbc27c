import "dotenv/config";
import { errorFields, logEvent } from "../../core/src/observability/logger.ts";
import { flushSentry } from "../../core/src/observability/sentry.ts";
import { createNodeEnvReader, createTelegramClient } from "../../messaging/src/client.ts";
import { createDbClient, resolveSupabaseCredentials } from "../../db/src/client.ts";
import {
  createSupabaseApplicationPersistence,
  createSupabaseSessionPersistence,
} from "../../db/src/persistence.ts";
import { createIntakeBot } from "./bot.ts";
import { ConfigError, resolveRuntimeConfig, type RuntimeConfig } from "./config.ts";
import { startHealthServer } from "./health-server.ts";
import { initializeNodeSentry } from "./sentry-node.ts";

const SENTRY_FLUSH_TIMEOUT_MS = 2_000;

async function main(): Promise<number> {
  const getEnv = createNodeEnvReader();

  let config: RuntimeConfig;
  try {
    config = resolveRuntimeConfig(getEnv);
  } catch (error) {
    if (error instanceof ConfigError) {
      logEvent({
        event: "system.unhandled_error",
        level: "fatal",
        payload: { phase: "config", variable: error.variable, ...errorFields(error) },
      });
      return 1;
    }
    throw error;
  }

  initializeNodeSentry(config.sentry);

  const client = createTelegramClient({
    token: config.telegramBotToken,
    apiBaseUrl: config.telegramApiBaseUrl ?? undefined,
  });

  const credentials = resolveSupabaseCredentials(getEnv);
  const db = credentials ? createDbClient(credentials) : null;

  const bot = createIntakeBot(config, {
    client,
    sessionPersistence: db ? createSupabaseSessionPersistence(db) : null,
    applications: db ? createSupabaseApplicationPersistence(db) : null,
  });

  const server = startHealthServer(config.port);

  const onSignal = (signal: NodeJS.Signals) => {
    logEvent({ event: "system.shutdown", payload: { signal } });
    bot.loop.stop();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  process.on("unhandledRejection", (reason) => {
    logEvent({
      event: "system.unhandled_error",
      level: "error",
      payload: { phase: "unhandled_rejection", ...errorFields(reason) },
    });
  });
  process.on("uncaughtException", (error) => {
    logEvent({
      event: "system.unhandled_error",
      level: "fatal",
      payload: { phase: "uncaught_exception", ...errorFields(error) },
    });
    process.exitCode = 1;
    bot.loop.stop();
  });

  await bot.bootstrap();
  logEvent({
    event: "system.startup",
    payload: {
      component: "polling_loop",
      store_configured: db !== null,
      worker_concurrency: config.workerConcurrency,
      poll_timeout_seconds: config.pollTimeoutSeconds,
    },
  });

  const reason = await bot.loop.run();

  await new Promise<void>((resolve) => {
    server.close(() => resolve());
  });
  await flushSentry(SENTRY_FLUSH_TIMEOUT_MS);
  return reason === "auth_failed" ? 1 : 0;
}

void main().then(
  (code) => {
    if (code !== 0) {
      process.exitCode = code;
    }
  },
  async (error: unknown) => {
    logEvent({
      event: "system.unhandled_error",
      level: "fatal",
      payload: { phase: "bootstrap", ...errorFields(error) },
    });
    await flushSentry(SENTRY_FLUSH_TIMEOUT_MS);
    process.exitCode = 1;
  },
);

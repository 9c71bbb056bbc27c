import type { EnvReader } from "../../messaging/src/client.ts";
import { LANGUAGES, parseLanguage, type Language } from "../../messaging/src/templates/labels.ts";

const DEFAULT_POLL_TIMEOUT_SECONDS = 30;
const DEFAULT_WORKER_CONCURRENCY = 5;
const DEFAULT_PORT = 10_000;
const DEFAULT_TIME_ZONE = "UTC";

export type RuntimeConfig = {
  telegramBotToken: string;
  telegramApiBaseUrl: string | null;
  reviewerChatId: number;
  reviewerLanguage: Language | null;
  pollTimeoutSeconds: number;
  workerConcurrency: number;
  port: number;
  reportTimeZone: string;
  sentry: {
    dsn: string | null;
    environment: string | null;
    release: string | null;
  };
};

export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(message);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

/** Reads and validates every setting the process needs. Store credentials are resolved by the db package. */
export function resolveRuntimeConfig(getEnv: EnvReader): RuntimeConfig {
  return {
    telegramBotToken: readRequiredEnv(getEnv, "TELEGRAM_BOT_TOKEN"),
    telegramApiBaseUrl: readOptionalEnv(getEnv, "TELEGRAM_API_BASE_URL"),
    reviewerChatId: readChatId(getEnv, "REVIEWER_CHAT_ID"),
    reviewerLanguage: readLanguage(getEnv, "REVIEWER_LANGUAGE"),
    pollTimeoutSeconds: readPositiveInteger(getEnv, "POLL_TIMEOUT_SECONDS", DEFAULT_POLL_TIMEOUT_SECONDS),
    workerConcurrency: readPositiveInteger(getEnv, "WORKER_CONCURRENCY", DEFAULT_WORKER_CONCURRENCY),
    port: readPositiveInteger(getEnv, "PORT", DEFAULT_PORT),
    reportTimeZone: readTimeZone(getEnv, "REPORT_TIME_ZONE"),
    sentry: {
      dsn: readOptionalEnv(getEnv, "SENTRY_DSN"),
      environment: readOptionalEnv(getEnv, "SENTRY_ENVIRONMENT") ?? readOptionalEnv(getEnv, "APP_ENV"),
      release: readOptionalEnv(getEnv, "SENTRY_RELEASE"),
    },
  };
}

function readRequiredEnv(getEnv: EnvReader, name: string): string {
  const value = readOptionalEnv(getEnv, name);
  if (!value) {
    throw new ConfigError(name, `Missing required env var: ${name}`);
  }
  return value;
}

function readOptionalEnv(getEnv: EnvReader, name: string): string | null {
  const value = getEnv(name);
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function readChatId(getEnv: EnvReader, name: string): number {
  const raw = readRequiredEnv(getEnv, name);
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigError(name, `${name} must be an integer chat id.`);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new ConfigError(name, `${name} is out of range.`);
  }
  return value;
}

function readPositiveInteger(getEnv: EnvReader, name: string, fallback: number): number {
  const raw = readOptionalEnv(getEnv, name);
  if (raw === null) {
    return fallback;
  }
  if (!/^\d+$/.test(raw) || Number(raw) < 1) {
    throw new ConfigError(name, `${name} must be a positive integer.`);
  }
  return Number(raw);
}

function readLanguage(getEnv: EnvReader, name: string): Language | null {
  const raw = readOptionalEnv(getEnv, name);
  if (raw === null) {
    return null;
  }
  const language = parseLanguage(raw);
  if (!language) {
    throw new ConfigError(name, `${name} must be one of: ${LANGUAGES.join(", ")}.`);
  }
  return language;
}

function readTimeZone(getEnv: EnvReader, name: string): string {
  const timeZone = readOptionalEnv(getEnv, name) ?? DEFAULT_TIME_ZONE;
  try {
    new Intl.DateTimeFormat("en-GB", { timeZone });
  } catch {
    throw new ConfigError(name, `${name} is not a known time zone: ${timeZone}`);
  }
  return timeZone;
}

import { describe, expect, it } from "vitest";
import { ConfigError, resolveRuntimeConfig } from "../../packages/ingestion/src/config";

function envReader(values: Record<string, string>) {
  return (name: string): string | undefined => values[name];
}

const REQUIRED = {
  TELEGRAM_BOT_TOKEN: "test-token",
  REVIEWER_CHAT_ID: "-1001234567890",
};

describe("runtime config", () => {
  it("applies defaults for optional settings", () => {
    expect(resolveRuntimeConfig(envReader(REQUIRED))).toEqual({
      telegramBotToken: "test-token",
      telegramApiBaseUrl: null,
      reviewerChatId: -1001234567890,
      reviewerLanguage: null,
      pollTimeoutSeconds: 30,
      workerConcurrency: 5,
      port: 10000,
      reportTimeZone: "UTC",
      sentry: { dsn: null, environment: null, release: null },
    });
  });

  it("reads overrides and falls back to APP_ENV for the Sentry environment", () => {
    const config = resolveRuntimeConfig(envReader({
      ...REQUIRED,
      POLL_TIMEOUT_SECONDS: "50",
      WORKER_CONCURRENCY: "8",
      PORT: " 8080 ",
      REPORT_TIME_ZONE: "Asia/Tashkent",
      APP_ENV: "staging",
    }));

    expect(config.pollTimeoutSeconds).toBe(50);
    expect(config.workerConcurrency).toBe(8);
    expect(config.port).toBe(8080);
    expect(config.reportTimeZone).toBe("Asia/Tashkent");
    expect(config.sentry.environment).toBe("staging");
  });

  it("names the missing variable", () => {
    expect(() => resolveRuntimeConfig(envReader({ REVIEWER_CHAT_ID: "1" })))
      .toThrow("Missing required env var: TELEGRAM_BOT_TOKEN");
    expect(() => resolveRuntimeConfig(envReader({ TELEGRAM_BOT_TOKEN: "test-token", REVIEWER_CHAT_ID: "  " })))
      .toThrow("Missing required env var: REVIEWER_CHAT_ID");
  });

  it("rejects a reviewer chat id that is not an integer", () => {
    let caught: unknown = null;
    try {
      resolveRuntimeConfig(envReader({ ...REQUIRED, REVIEWER_CHAT_ID: "@reviewers" }));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      variable: "REVIEWER_CHAT_ID",
      message: "REVIEWER_CHAT_ID must be an integer chat id.",
    });
  });

  it("rejects zero and non-numeric counts", () => {
    expect(() => resolveRuntimeConfig(envReader({ ...REQUIRED, WORKER_CONCURRENCY: "0" })))
      .toThrow("WORKER_CONCURRENCY must be a positive integer.");
    expect(() => resolveRuntimeConfig(envReader({ ...REQUIRED, POLL_TIMEOUT_SECONDS: "1.5" })))
      .toThrow("POLL_TIMEOUT_SECONDS must be a positive integer.");
  });

  it("reads the reviewer notification language", () => {
    expect(resolveRuntimeConfig(envReader({ ...REQUIRED, REVIEWER_LANGUAGE: " ru " })).reviewerLanguage).toBe("ru");
    expect(() => resolveRuntimeConfig(envReader({ ...REQUIRED, REVIEWER_LANGUAGE: "de" })))
      .toThrow("REVIEWER_LANGUAGE must be one of: uz, uz_cyrl, en, ru.");
  });

  it("rejects unknown time zones", () => {
    expect(() => resolveRuntimeConfig(envReader({ ...REQUIRED, REPORT_TIME_ZONE: "Mars/Olympus" })))
      .toThrow("REPORT_TIME_ZONE is not a known time zone: Mars/Olympus");
  });
});

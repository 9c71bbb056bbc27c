import type { AddressInfo } from "node:net";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { TelegramClient, TelegramParams, TransportResult } from "../../packages/messaging/src/client";
import { BOT_COMMANDS, createIntakeBot, runBootstrapCalls } from "../../packages/ingestion/src/bot";
import { createHealthApp, HEALTH_BODY } from "../../packages/ingestion/src/health-server";

function recordingClient(respond: (method: string) => TransportResult) {
  const call = vi.fn(async (method: string, _params?: TelegramParams) => respond(method));
  const client: TelegramClient = { call };
  return { client, call };
}

describe("bootstrap calls", () => {
  it("clears the webhook before registering commands", async () => {
    const { client, call } = recordingClient(() => ({ ok: true, result: true }));

    await runBootstrapCalls(client);

    expect(call.mock.calls).toEqual([
      ["deleteWebhook", { drop_pending_updates: true }],
      ["setMyCommands", { commands: BOT_COMMANDS }],
    ]);
  });

  it("logs a failed call and keeps going", async () => {
    const infoSpy = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const { client, call } = recordingClient((method) =>
      method === "deleteWebhook"
        ? { ok: false, description: "Bad Gateway", errorCode: 502, failure: "rejected" }
        : { ok: true, result: true }
    );

    await runBootstrapCalls(client);

    expect(call).toHaveBeenCalledTimes(2);
    const lines = infoSpy.mock.calls.map(([line]) => JSON.parse(String(line)));
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      event: "ingestion.bootstrap_call_failed",
      level: "warn",
      payload: { method: "deleteWebhook", failure: "rejected", error_code: 502, description: "Bad Gateway" },
    });
  });
});

describe("intake bot wiring", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  it("answers /start through the polling loop without a store", async () => {
    const updates: TransportResult = {
      ok: true,
      result: [{
        update_id: 40,
        message: {
          message_id: 1,
          from: { id: 77, is_bot: false, first_name: "Test" },
          chat: { id: 77, type: "private" },
          text: "/start",
        },
      }],
    };
    const { client, call } = recordingClient((method) =>
      method === "getUpdates" ? updates : { ok: true, result: { message_id: 2 } }
    );
    const bot = createIntakeBot(
      { reviewerChatId: -100, reviewerLanguage: null, pollTimeoutSeconds: 30, workerConcurrency: 2, reportTimeZone: "UTC" },
      { client, sessionPersistence: null, applications: null },
    );

    await bot.loop.pollOnce();
    await bot.pool.drain();

    expect(bot.loop.offset).toBe(41);
    const sent = call.mock.calls.filter(([method]) => method === "sendMessage");
    expect(sent).toHaveLength(1);
    expect(sent[0]?.[1]).toMatchObject({ chat_id: 77 });
  });
});

describe("health endpoint", () => {
  it("reports that the bot is running", async () => {
    const server = createHealthApp().listen(0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    try {
      const address: AddressInfo | string | null = server.address();
      const port = typeof address === "object" && address ? address.port : 0;
      const response = await fetch(`http://127.0.0.1:${port}/`);

      expect(response.status).toBe(200);
      expect(response.headers.get("content-type")).toContain("text/plain");
      await expect(response.text()).resolves.toBe(HEALTH_BODY);
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });
});

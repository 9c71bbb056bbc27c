import { logEvent } from "../../core/src/observability/logger.ts";
import { registerSecret } from "../../core/src/observability/redaction.ts";

const DEFAULT_API_BASE_URL = "https://api.telegram.org";
const DEFAULT_TIMEOUT_MS = 10_000;
const MESSAGE_TIMEOUT_MS = 20_000;
const LONG_POLL_GRACE_SECONDS = 5;
const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_RETRY_BASE_DELAY_MS = 500;

const MESSAGE_METHODS: ReadonlySet<string> = new Set([
  "sendMessage",
  "sendPhoto",
  "sendDocument",
  "editMessageText",
]);

export type EnvReader = (name: string) => string | undefined;

export type TransportFailureKind = "timeout" | "connection" | "rejected" | "invalid_response";

export type TransportResult =
  | { ok: true; result: unknown }
  | {
    ok: false;
    description: string;
    errorCode: number | null;
    failure: TransportFailureKind;
  };

export type TransportFailure = Extract<TransportResult, { ok: false }>;

export type TelegramParams = Record<string, unknown>;

export type TelegramClient = {
  call: (method: string, params?: TelegramParams) => Promise<TransportResult>;
};

export type TelegramClientConfig = {
  token: string;
  fetchImpl?: typeof fetch;
  apiBaseUrl?: string;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

export class TelegramClientError extends Error {
  readonly code: "CONFIG" | "TIMEOUT" | "CONNECTION" | "RESPONSE";
  readonly statusCode: number | null;
  readonly retryable: boolean;

  constructor(input: {
    code: "CONFIG" | "TIMEOUT" | "CONNECTION" | "RESPONSE";
    message: string;
    statusCode?: number | null;
    retryable?: boolean;
  }) {
    super(input.message);
    this.name = "TelegramClientError";
    this.code = input.code;
    this.statusCode = input.statusCode ?? null;
    this.retryable = Boolean(input.retryable);
  }
}

/**
 * Bot API client. Every call resolves to a {@link TransportResult}; nothing
 * thrown by the network escapes `call`.
 *
 * Timeouts and connection failures are retried `maxRetries` times with a
 * linear backoff, except for `getUpdates`, whose caller owns the retry policy.
 * A non-2xx response is not retried: the platform's JSON error is returned.
 */
export function createTelegramClient(config: TelegramClientConfig): TelegramClient {
  const token = normalizeRequiredString("TELEGRAM_BOT_TOKEN", config.token);
  registerSecret(token);

  const fetchImpl = config.fetchImpl ?? globalThis.fetch;
  if (typeof fetchImpl !== "function") {
    throw new TelegramClientError({
      code: "CONFIG",
      message: "Fetch implementation is required to create the Telegram client.",
    });
  }

  const baseUrl = (config.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, "");
  const maxRetries = Math.max(0, Math.trunc(config.maxRetries ?? DEFAULT_MAX_RETRIES));
  const retryBaseDelayMs = Math.max(0, config.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS);
  const sleep = config.sleep ?? defaultSleep;

  return {
    call: async (method, params = {}) => {
      const url = `${baseUrl}/bot${token}/${method}`;
      const timeoutMs = resolveTimeoutMs(method, params);
      const retryBudget = method === "getUpdates" ? 0 : maxRetries;

      let attempt = 0;
      while (true) {
        attempt += 1;
        const result = await requestOnce(fetchImpl, url, params, timeoutMs);
        if (result.ok) {
          return result;
        }

        const retryable = result.failure === "timeout" || result.failure === "connection";
        if (retryable && attempt <= retryBudget) {
          logEvent({
            event: "transport.retry_scheduled",
            level: "warn",
            payload: {
              method,
              attempt,
              failure: result.failure,
              delay_ms: retryBaseDelayMs * attempt,
            },
          });
          await sleep(retryBaseDelayMs * attempt);
          continue;
        }

        logEvent({
          event: "transport.request_failed",
          level: "warn",
          payload: {
            method,
            failure: result.failure,
            error_code: result.errorCode,
            description: result.description,
            attempts: attempt,
          },
        });
        return result;
      }
    },
  };
}

export function createNodeEnvReader(
  env: Record<string, string | undefined> = process.env,
): EnvReader {
  return (name) => normalizeOptionalString(env[name]) ?? undefined;
}

export function resolveTimeoutMs(method: string, params: TelegramParams): number {
  if (method === "getUpdates") {
    const pollSeconds = typeof params.timeout === "number" && Number.isFinite(params.timeout)
      ? Math.max(0, params.timeout)
      : 0;
    return (pollSeconds + LONG_POLL_GRACE_SECONDS) * 1_000;
  }
  if (MESSAGE_METHODS.has(method)) {
    return MESSAGE_TIMEOUT_MS;
  }
  return DEFAULT_TIMEOUT_MS;
}

async function requestOnce(
  fetchImpl: typeof fetch,
  url: string,
  params: TelegramParams,
  timeoutMs: number,
): Promise<TransportResult> {
  let reply: FetchedReply;
  try {
    reply = await fetchJsonWithTimeout(
      fetchImpl,
      url,
      {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(params),
      },
      timeoutMs,
    );
  } catch (error) {
    if (error instanceof TelegramClientError && error.code === "TIMEOUT") {
      return { ok: false, description: error.message, errorCode: null, failure: "timeout" };
    }
    return {
      ok: false,
      description: error instanceof Error ? error.message : "Telegram request failed.",
      errorCode: null,
      failure: "connection",
    };
  }

  const { status, statusOk, json } = reply;
  if (!isRecord(json) || typeof json.ok !== "boolean") {
    return {
      ok: false,
      description: `Telegram returned an unreadable response (status ${status}).`,
      errorCode: statusOk ? null : status,
      failure: "invalid_response",
    };
  }

  if (json.ok) {
    return { ok: true, result: json.result };
  }

  return {
    ok: false,
    description: typeof json.description === "string" ? json.description : "Telegram API request failed.",
    errorCode: typeof json.error_code === "number" ? json.error_code : status,
    failure: "rejected",
  };
}

type FetchedReply = {
  status: number;
  statusOk: boolean;
  json: unknown;
};

/** The timeout covers the body read as well as the headers. */
async function fetchJsonWithTimeout(
  fetchImpl: typeof fetch,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<FetchedReply> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort("telegram_timeout");
  }, timeoutMs);

  try {
    let response: Response;
    try {
      response = await fetchImpl(url, {
        ...init,
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted || isAbortError(error)) {
        throw timeoutError();
      }

      throw new TelegramClientError({
        code: "CONNECTION",
        message: "Telegram request failed.",
        retryable: true,
      });
    }

    let json: unknown = null;
    try {
      json = await response.json();
    } catch (error) {
      if (controller.signal.aborted || isAbortError(error)) {
        throw timeoutError();
      }
    }
    return { status: response.status, statusOk: response.ok, json };
  } finally {
    clearTimeout(timeoutId);
  }
}

function timeoutError(): TelegramClientError {
  return new TelegramClientError({
    code: "TIMEOUT",
    message: "Telegram request timed out.",
    retryable: true,
  });
}

function normalizeRequiredString(name: string, value: string): string {
  const normalized = value.trim();
  if (!normalized) {
    throw new TelegramClientError({
      code: "CONFIG",
      message: `${name} is required.`,
    });
  }
  return normalized;
}

function normalizeOptionalString(value: string | null | undefined): string | null {
  if (typeof value !== "string") {
    return null;
  }

  const normalized = value.trim();
  return normalized.length > 0 ? normalized : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

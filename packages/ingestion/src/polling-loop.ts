import { errorFields, logEvent } from "../../core/src/observability/logger.ts";
import { emitMetricBestEffort } from "../../core/src/observability/metrics.ts";
import type { TelegramClient, TransportFailure } from "../../messaging/src/client.ts";
import {
  normalizeUpdate,
  readUpdateId,
  updateSerialKey,
  type InboundUpdate,
} from "../../messaging/src/updates.ts";
import type { KeyedWorkerPool } from "./worker-pool.ts";

const CONFLICT_PAUSE_MS = 2_000;
const FAILURE_PAUSE_MS = 2_000;
const BACKOFF_STEP_SECONDS = 2;
const BACKOFF_MAX_SECONDS = 30;
const UNAUTHORIZED = 401;
const CONFLICT = 409;

export type LoopStopReason = "signal" | "auth_failed";

export type PollOutcome = "dispatched" | "retry" | "fatal";

export type Sleeper = (ms: number, signal: AbortSignal) => Promise<void>;

export type PollingLoopDeps = {
  client: TelegramClient;
  pool: KeyedWorkerPool;
  handleUpdate: (update: InboundUpdate) => Promise<void>;
  pollTimeoutSeconds: number;
  sleep?: Sleeper;
};

/**
 * Long-poll ingestion. The offset moves past each update before the update is
 * handed to the pool, so a crash can drop an in-flight update but never
 * replays one that was already dispatched.
 */
export class PollingLoop {
  private readonly client: TelegramClient;
  private readonly pool: KeyedWorkerPool;
  private readonly handleUpdate: (update: InboundUpdate) => Promise<void>;
  private readonly pollTimeoutSeconds: number;
  private readonly sleep: Sleeper;
  private readonly abort = new AbortController();
  private offsetValue = 0;
  private transientFailures = 0;

  constructor(deps: PollingLoopDeps) {
    this.client = deps.client;
    this.pool = deps.pool;
    this.handleUpdate = deps.handleUpdate;
    this.pollTimeoutSeconds = deps.pollTimeoutSeconds;
    this.sleep = deps.sleep ?? abortableSleep;
  }

  get offset(): number {
    return this.offsetValue;
  }

  get stopping(): boolean {
    return this.abort.signal.aborted;
  }

  /** Polls until stopped or the token is rejected, then waits for in-flight work. */
  async run(): Promise<LoopStopReason> {
    let reason: LoopStopReason = "signal";
    while (!this.stopping) {
      const outcome = await this.pollOnce();
      if (outcome === "fatal") {
        reason = "auth_failed";
        break;
      }
    }

    await this.pool.drain();
    logEvent({
      event: "ingestion.loop_stopped",
      level: reason === "signal" ? "info" : "error",
      payload: { reason, offset: this.offsetValue },
    });
    return reason;
  }

  /** Interrupts any pause and stops scheduling new polls. A poll already in flight runs to completion. */
  stop(): void {
    this.abort.abort();
  }

  async pollOnce(): Promise<PollOutcome> {
    const result = await this.client.call("getUpdates", {
      offset: this.offsetValue,
      timeout: this.pollTimeoutSeconds,
      allowed_updates: ["message", "callback_query"],
    });

    if (!result.ok) {
      return this.handleFailure(result);
    }

    if (!Array.isArray(result.result)) {
      logEvent({
        event: "ingestion.poll_failed",
        level: "error",
        payload: { failure: "invalid_response", error_code: null, delay_ms: FAILURE_PAUSE_MS },
      });
      await this.pause(FAILURE_PAUSE_MS);
      return "retry";
    }

    this.transientFailures = 0;
    for (const raw of result.result) {
      this.dispatch(raw);
    }
    return "dispatched";
  }

  private dispatch(raw: unknown): void {
    const updateId = readUpdateId(raw);
    if (updateId !== null) {
      this.offsetValue = Math.max(this.offsetValue, updateId + 1);
    }

    const update = normalizeUpdate(raw);
    if (!update) {
      logEvent({
        event: "ingestion.update_ignored",
        level: "debug",
        payload: { update_id: updateId ?? "unknown" },
      });
      return;
    }

    const key = updateSerialKey(update);
    this.pool.submit(key, () => this.handleUpdate(update));
    emitMetricBestEffort({
      metric: "ingestion.update.dispatched",
      value: 1,
      correlation_id: `update:${update.updateId}`,
      tags: { component: "polling_loop", kind: update.kind },
    });
  }

  private async handleFailure(failure: TransportFailure): Promise<PollOutcome> {
    if (failure.errorCode === CONFLICT) {
      logEvent({
        event: "ingestion.conflict_detected",
        level: "warn",
        payload: { pause_ms: CONFLICT_PAUSE_MS, description: failure.description },
      });
      await this.client.call("deleteWebhook", { drop_pending_updates: true });
      await this.pause(CONFLICT_PAUSE_MS);
      return "retry";
    }

    if (failure.errorCode === UNAUTHORIZED) {
      logEvent({
        event: "ingestion.auth_failed",
        level: "fatal",
        payload: { error_code: failure.errorCode, description: failure.description },
      });
      return "fatal";
    }

    if (failure.failure === "timeout" || failure.failure === "connection") {
      this.transientFailures += 1;
      const delayMs = Math.min(this.transientFailures * BACKOFF_STEP_SECONDS, BACKOFF_MAX_SECONDS) * 1_000;
      logEvent({
        event: "ingestion.poll_failed",
        level: "warn",
        payload: {
          failure: failure.failure,
          error_code: failure.errorCode,
          consecutive_failures: this.transientFailures,
          delay_ms: delayMs,
        },
      });
      await this.pause(delayMs);
      return "retry";
    }

    logEvent({
      event: "ingestion.poll_failed",
      level: "error",
      payload: {
        failure: failure.failure,
        error_code: failure.errorCode,
        description: failure.description,
        delay_ms: FAILURE_PAUSE_MS,
      },
    });
    await this.pause(FAILURE_PAUSE_MS);
    return "retry";
  }

  private async pause(ms: number): Promise<void> {
    if (this.stopping) {
      return;
    }
    await this.sleep(ms, this.abort.signal);
  }
}

export function createWorkerFailureLogger(): (key: string, error: unknown) => void {
  return (key, error) => {
    logEvent({
      event: "ingestion.worker_failed",
      level: "error",
      payload: { update_key: key, ...errorFields(error) },
    });
  };
}

/** Resolves after `ms`, or early when `signal` aborts. Never rejects. */
export function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

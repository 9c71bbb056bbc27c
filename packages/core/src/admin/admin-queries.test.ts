import { afterEach, describe, expect, it, vi } from "vitest";
import {
  buildApplication,
  createInMemoryApplications,
} from "../../../../tests/support/fakes";
import { aggregatePositions, createAdminQueries } from "./admin-queries";

function minutesAfter(base: number, minutes: number): string {
  return new Date(base + minutes * 60_000).toISOString();
}

const BASE = Date.UTC(2026, 2, 1, 8, 0);

function seeded(count: number) {
  return createInMemoryApplications(
    Array.from({ length: count }, (_, index) =>
      buildApplication({
        id: `app-${index + 1}`,
        createdAt: minutesAfter(BASE, index),
        position: index % 2 === 0 ? "Teacher (Math teacher)" : "Security (Night guard)",
      })
    ),
  );
}

describe("admin queries", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reports a missing store instead of empty results", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const queries = createAdminQueries(null);

    await expect(queries.listRecent(10, 0)).resolves.toEqual({ status: "unavailable", reason: "not_configured" });
    await expect(queries.searchByPosition("teacher")).resolves.toEqual({
      status: "unavailable",
      reason: "not_configured",
    });
  });

  it("reports a failing store as query_failed", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const store = seeded(3);
    store.failWith(new Error("connection reset"));

    await expect(createAdminQueries(store).positionStats(30)).resolves.toEqual({
      status: "unavailable",
      reason: "query_failed",
    });
  });

  it("pages newest first and flags a possible next page when a page is full", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const queries = createAdminQueries(seeded(12));

    const first = await queries.listRecent(10, 0);
    expect(first.status).toBe("ok");
    if (first.status !== "ok") return;
    expect(first.value.items.map((item) => item.id).slice(0, 3)).toEqual(["app-12", "app-11", "app-10"]);
    expect(first.value.hasMore).toBe(true);

    const second = await queries.listRecent(10, 10);
    expect(second).toEqual({
      status: "ok",
      value: {
        items: [expect.objectContaining({ id: "app-2" }), expect.objectContaining({ id: "app-1" })],
        hasMore: false,
      },
    });
  });

  it("searches positions case-insensitively up to the limit", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const queries = createAdminQueries(seeded(6));

    const all = await queries.searchByPosition("  MATH ");
    expect(all.status === "ok" && all.value.map((item) => item.id)).toEqual(["app-5", "app-3", "app-1"]);

    const limited = await queries.searchByPosition("night", { limit: 2 });
    expect(limited.status === "ok" && limited.value.map((item) => item.id)).toEqual(["app-6", "app-4"]);

    await expect(queries.searchByPosition("   ")).resolves.toEqual({ status: "ok", value: [] });
  });

  it("aggregates positions inside the window only", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const store = createInMemoryApplications([
      buildApplication({ id: "old", createdAt: "2026-01-01T00:00:00.000Z", position: "Cook (Head cook)" }),
      buildApplication({ id: "a", createdAt: "2026-02-20T00:00:00.000Z", position: "Driver" }),
      buildApplication({ id: "b", createdAt: "2026-02-21T00:00:00.000Z", position: "Driver" }),
      buildApplication({ id: "c", createdAt: "2026-02-22T00:00:00.000Z", position: "Accountant" }),
    ]);
    const queries = createAdminQueries(store, { now: () => new Date("2026-03-01T00:00:00.000Z") });

    await expect(queries.positionStats(30)).resolves.toEqual({
      status: "ok",
      value: {
        total: 3,
        counts: [
          { position: "Driver", count: 2 },
          { position: "Accountant", count: 1 },
        ],
      },
    });
  });

  it("looks up one application by id", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const queries = createAdminQueries(seeded(2));

    const found = await queries.getApplication(" app-2 ");
    expect(found.status === "ok" && found.value?.id).toBe("app-2");
    await expect(queries.getApplication("missing")).resolves.toEqual({ status: "ok", value: null });
  });
});

describe("position aggregation", () => {
  it("breaks count ties by position name", () => {
    const stats = aggregatePositions([
      buildApplication({ id: "1", createdAt: "2026-03-01T00:00:00.000Z", position: "Security" }),
      buildApplication({ id: "2", createdAt: "2026-03-01T00:00:00.000Z", position: "Cleaning staff" }),
    ]);
    expect(stats.counts.map((entry) => entry.position)).toEqual(["Cleaning staff", "Security"]);
  });
});

import type { ApplicationPersistence } from "../../../db/src/persistence.ts";
import type { Application } from "../../../db/src/types.ts";
import { errorFields, logEvent } from "../observability/logger.ts";

export const DEFAULT_PAGE_SIZE = 10;
export const DEFAULT_SEARCH_LIMIT = 50;
export const DEFAULT_SEARCH_SCAN_LIMIT = 300;
export const DEFAULT_STATS_DAYS = 30;
export const DEFAULT_STATS_LIMIT = 1000;

const DAY_MS = 24 * 60 * 60 * 1000;

export type UnavailableReason = "not_configured" | "query_failed";

export type AdminQueryResult<T> =
  | { status: "ok"; value: T }
  | { status: "unavailable"; reason: UnavailableReason };

export type RecentPage = {
  items: Application[];
  /** True when the page came back full. A full last page still reports more. */
  hasMore: boolean;
};

export type PositionCount = {
  position: string;
  count: number;
};

export type PositionStats = {
  total: number;
  counts: PositionCount[];
};

export type AdminQueries = {
  listRecent: (limit: number, offset: number) => Promise<AdminQueryResult<RecentPage>>;
  searchByPosition: (
    query: string,
    options?: { limit?: number; scanLimit?: number },
  ) => Promise<AdminQueryResult<Application[]>>;
  positionStats: (days?: number, limit?: number) => Promise<AdminQueryResult<PositionStats>>;
  getApplication: (id: string) => Promise<AdminQueryResult<Application | null>>;
};

export function createAdminQueries(
  applications: ApplicationPersistence | null,
  options: { now?: () => Date } = {},
): AdminQueries {
  const now = options.now ?? (() => new Date());

  async function run<T>(
    query: string,
    execute: (store: ApplicationPersistence) => Promise<T>,
    countResults: (value: T) => number,
  ): Promise<AdminQueryResult<T>> {
    if (!applications) {
      logEvent({
        event: "admin.store_unavailable",
        level: "warn",
        payload: { query, reason: "not_configured" },
      });
      return { status: "unavailable", reason: "not_configured" };
    }

    try {
      const value = await execute(applications);
      logEvent({
        event: "admin.query_performed",
        payload: { query, result_count: countResults(value) },
      });
      return { status: "ok", value };
    } catch (error) {
      logEvent({
        event: "admin.store_unavailable",
        level: "error",
        payload: { query, reason: "query_failed", ...errorFields(error) },
      });
      return { status: "unavailable", reason: "query_failed" };
    }
  }

  return {
    listRecent: (limit, offset) =>
      run(
        "list_recent",
        async (store) => {
          const safeLimit = Math.max(1, Math.trunc(limit));
          const safeOffset = Math.max(0, Math.trunc(offset));
          const rows = await store.listRecentApplications(safeOffset + safeLimit);
          const items = rows.slice(safeOffset);
          return { items, hasMore: items.length === safeLimit };
        },
        (page) => page.items.length,
      ),

    searchByPosition: (query, searchOptions = {}) =>
      run(
        "search_position",
        async (store) => {
          const limit = searchOptions.limit ?? DEFAULT_SEARCH_LIMIT;
          const scanLimit = searchOptions.scanLimit ?? DEFAULT_SEARCH_SCAN_LIMIT;
          const needle = query.trim().toLowerCase();
          if (!needle) {
            return [];
          }

          const matches: Application[] = [];
          for (const application of await store.listRecentApplications(scanLimit)) {
            if (application.position.toLowerCase().includes(needle)) {
              matches.push(application);
              if (matches.length >= limit) {
                break;
              }
            }
          }
          return matches;
        },
        (matches) => matches.length,
      ),

    positionStats: (days = DEFAULT_STATS_DAYS, limit = DEFAULT_STATS_LIMIT) =>
      run(
        "position_stats",
        async (store) => {
          const since = new Date(now().getTime() - days * DAY_MS).toISOString();
          return aggregatePositions(await store.listApplicationsSince(since, limit));
        },
        (stats) => stats.total,
      ),

    getApplication: (id) =>
      run(
        "get_application",
        (store) => store.getApplication(id.trim()),
        (application) => (application ? 1 : 0),
      ),
  };
}

/** Counts per distinct position, most frequent first, ties by name. */
export function aggregatePositions(applications: readonly Application[]): PositionStats {
  const counts = new Map<string, number>();
  for (const application of applications) {
    counts.set(application.position, (counts.get(application.position) ?? 0) + 1);
  }

  return {
    total: applications.length,
    counts: [...counts.entries()]
      .map(([position, count]) => ({ position, count }))
      .sort((left, right) => right.count - left.count || left.position.localeCompare(right.position)),
  };
}

import { DB_ERROR_CODES, DbError } from "../errors.ts";
import type { DbClient } from "../types.ts";

const TABLE = "user_languages";

/** Resolve a user's stored language code, or null when none was chosen. */
export async function loadUserLanguage(db: DbClient, userId: number): Promise<string | null> {
  const { data, error } = await db
    .from(TABLE)
    .select("language")
    .eq("user_id", userId)
    .maybeSingle();

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to load user language.", {
      status: 500,
      cause: error,
      context: { user_id: userId, table: TABLE },
    });
  }

  const row: unknown = data;
  if (!row || typeof row !== "object" || !("language" in row) || typeof row.language !== "string") {
    return null;
  }
  return row.language;
}

export async function upsertUserLanguage(
  db: DbClient,
  userId: number,
  language: string,
): Promise<void> {
  const { error } = await db
    .from(TABLE)
    .upsert(
      { user_id: userId, language, updated_at: new Date().toISOString() },
      { onConflict: "user_id" },
    );

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to persist user language.", {
      status: 500,
      cause: error,
      context: { user_id: userId, table: TABLE },
    });
  }
}

import { DB_ERROR_CODES, DbError } from "../errors.ts";
import { parseStoredSession, serializeSession, type DbClient, type Session } from "../types.ts";

const TABLE = "intake_sessions";

/** Load a user's stored conversation session. A malformed row reads as no session. */
export async function loadIntakeSession(db: DbClient, userId: number): Promise<Session | null> {
  const { data, error } = await db
    .from(TABLE)
    .select("user_id,session")
    .eq("user_id", userId)
    .maybeSingle();

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to load intake session.", {
      status: 500,
      cause: error,
      context: { user_id: userId, table: TABLE },
    });
  }

  const row: unknown = data;
  if (!row || typeof row !== "object" || !("session" in row)) {
    return null;
  }
  return parseStoredSession(row.session);
}

export async function upsertIntakeSession(
  db: DbClient,
  userId: number,
  session: Session,
): Promise<void> {
  const { error } = await db
    .from(TABLE)
    .upsert(
      { user_id: userId, session: serializeSession(session), updated_at: new Date().toISOString() },
      { onConflict: "user_id" },
    );

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to persist intake session.", {
      status: 500,
      cause: error,
      context: { user_id: userId, table: TABLE },
    });
  }
}

export async function deleteIntakeSession(db: DbClient, userId: number): Promise<void> {
  const { error } = await db
    .from(TABLE)
    .delete()
    .eq("user_id", userId);

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to clear intake session.", {
      status: 500,
      cause: error,
      context: { user_id: userId, table: TABLE },
    });
  }
}

import { DB_ERROR_CODES, DbError } from "../errors.ts";
import { isRecord, type Application, type AttachmentRef, type DbClient, type NewApplication } from "../types.ts";

const TABLE = "applications";
const COLUMNS = "id,user_id,name,phone,position,experience,attachment_file_id,attachment_kind,created_at";
const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[1-8][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

/** Insert a completed application. `created_at` is assigned by the database. */
export async function insertApplication(db: DbClient, input: NewApplication): Promise<Application> {
  const { data, error } = await db
    .from(TABLE)
    .insert({
      user_id: input.userId,
      name: input.name,
      phone: input.phone,
      position: input.position,
      experience: input.experience,
      attachment_file_id: input.attachment?.fileId ?? null,
      attachment_kind: input.attachment?.kind ?? null,
    })
    .select(COLUMNS)
    .single();

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to insert application.", {
      status: 500,
      cause: error,
      context: { user_id: input.userId, table: TABLE },
    });
  }

  const application = parseApplicationRow(data);
  if (!application) {
    throw new DbError(DB_ERROR_CODES.UNEXPECTED_RESPONSE, "Inserted application row was malformed.", {
      status: 500,
      context: { user_id: input.userId, table: TABLE },
    });
  }
  return application;
}

export async function loadApplicationById(db: DbClient, id: string): Promise<Application | null> {
  if (!UUID_PATTERN.test(id)) {
    return null;
  }

  const { data, error } = await db
    .from(TABLE)
    .select(COLUMNS)
    .eq("id", id)
    .maybeSingle();

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to load application.", {
      status: 500,
      cause: error,
      context: { application_id: id, table: TABLE },
    });
  }

  return parseApplicationRow(data);
}

/** Most recent applications first. */
export async function listRecentApplications(db: DbClient, limit: number): Promise<Application[]> {
  const { data, error } = await db
    .from(TABLE)
    .select(COLUMNS)
    .order("created_at", { ascending: false })
    .limit(limit);

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to list applications.", {
      status: 500,
      cause: error,
      context: { limit, table: TABLE },
    });
  }

  return parseApplicationRows(data);
}

export async function listApplicationsSince(
  db: DbClient,
  sinceIso: string,
  limit: number,
): Promise<Application[]> {
  const { data, error } = await db
    .from(TABLE)
    .select(COLUMNS)
    .gte("created_at", sinceIso)
    .order("created_at", { ascending: false })
    .limit(limit);

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to list applications in window.", {
      status: 500,
      cause: error,
      context: { since: sinceIso, limit, table: TABLE },
    });
  }

  return parseApplicationRows(data);
}

export function parseApplicationRow(row: unknown): Application | null {
  if (!isRecord(row)) {
    return null;
  }

  const id = row.id;
  const userId = row.user_id;
  const createdAt = row.created_at;
  if (typeof id !== "string" || typeof userId !== "number" || typeof createdAt !== "string") {
    return null;
  }

  const fileId = row.attachment_file_id;
  const kind = row.attachment_kind;
  const attachment: AttachmentRef | null = typeof fileId === "string" && (kind === "document" || kind === "photo")
    ? { fileId, kind }
    : null;

  return {
    id,
    userId,
    name: readText(row.name),
    phone: readText(row.phone),
    position: readText(row.position),
    experience: readText(row.experience),
    attachment,
    createdAt,
  };
}

function parseApplicationRows(data: unknown): Application[] {
  if (!Array.isArray(data)) {
    throw new DbError(DB_ERROR_CODES.UNEXPECTED_RESPONSE, "Application list was not an array.", {
      status: 500,
      context: { table: TABLE },
    });
  }

  const applications: Application[] = [];
  for (const row of data) {
    const application = parseApplicationRow(row);
    if (application) {
      applications.push(application);
    }
  }
  return applications;
}

function readText(value: unknown): string {
  return typeof value === "string" ? value : "";
}

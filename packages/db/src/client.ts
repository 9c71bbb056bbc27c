import { readFileSync } from "node:fs";
import { createClient, type SupabaseClientOptions } from "@supabase/supabase-js";
import { assertRequiredEnv, DB_ERROR_CODES, DbError } from "./errors.ts";
import { isRecord, type DbClient } from "./types.ts";

export type DbEnvReader = (name: string) => string | undefined;

export type SupabaseCredentials = {
  url: string;
  serviceRoleKey: string;
};

export type DbCreateClientImpl = (
  supabaseUrl: string,
  supabaseKey: string,
  options: SupabaseClientOptions<"public">,
) => DbClient;

/**
 * Finds the store credential. Checked in order: SUPABASE_URL with
 * SUPABASE_SERVICE_ROLE_KEY, inline JSON in SUPABASE_CREDENTIALS, then a JSON
 * file named by SUPABASE_CREDENTIALS_FILE. Returns null when none is set.
 */
export function resolveSupabaseCredentials(
  getEnv: DbEnvReader,
  readFile: (path: string) => string = (path) => readFileSync(path, "utf8"),
): SupabaseCredentials | null {
  const url = getEnv("SUPABASE_URL")?.trim();
  const key = getEnv("SUPABASE_SERVICE_ROLE_KEY")?.trim();
  if (url || key) {
    return {
      url: assertRequiredEnv("SUPABASE_URL", url),
      serviceRoleKey: assertRequiredEnv("SUPABASE_SERVICE_ROLE_KEY", key),
    };
  }

  const inline = getEnv("SUPABASE_CREDENTIALS")?.trim();
  if (inline) {
    return parseCredentials(inline, "SUPABASE_CREDENTIALS");
  }

  const filePath = getEnv("SUPABASE_CREDENTIALS_FILE")?.trim();
  if (filePath) {
    let contents: string;
    try {
      contents = readFile(filePath);
    } catch (error) {
      throw DbError.fromUnknown({
        code: DB_ERROR_CODES.INVALID_ENV,
        message: "Unable to read SUPABASE_CREDENTIALS_FILE.",
        error,
        context: { env_var: "SUPABASE_CREDENTIALS_FILE" },
      });
    }
    return parseCredentials(contents, "SUPABASE_CREDENTIALS_FILE");
  }

  return null;
}

export function createDbClient(
  credentials: SupabaseCredentials,
  createClientImpl: DbCreateClientImpl = createClient,
): DbClient {
  try {
    return createClientImpl(credentials.url, credentials.serviceRoleKey, {
      auth: {
        persistSession: false,
        autoRefreshToken: false,
      },
    });
  } catch (error) {
    throw DbError.fromUnknown({
      code: DB_ERROR_CODES.CLIENT_INIT_FAILED,
      message: "Unable to create Supabase client.",
      error,
    });
  }
}

function parseCredentials(raw: string, source: string): SupabaseCredentials {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw DbError.fromUnknown({
      code: DB_ERROR_CODES.INVALID_ENV,
      message: `${source} must contain JSON.`,
      error,
      context: { env_var: source },
    });
  }

  if (
    !isRecord(parsed) ||
    typeof parsed.url !== "string" ||
    typeof parsed.serviceRoleKey !== "string" ||
    !parsed.url.trim() ||
    !parsed.serviceRoleKey.trim()
  ) {
    throw new DbError(
      DB_ERROR_CODES.INVALID_ENV,
      `${source} must be an object with "url" and "serviceRoleKey".`,
      { context: { env_var: source } },
    );
  }

  return { url: parsed.url.trim(), serviceRoleKey: parsed.serviceRoleKey.trim() };
}

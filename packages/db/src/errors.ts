export type DbErrorCode =
  | "DB_MISSING_ENV"
  | "DB_INVALID_ENV"
  | "DB_CLIENT_INIT_FAILED"
  | "DB_QUERY_FAILED"
  | "DB_UNEXPECTED_RESPONSE";

export const DB_ERROR_CODES = {
  MISSING_ENV: "DB_MISSING_ENV",
  INVALID_ENV: "DB_INVALID_ENV",
  CLIENT_INIT_FAILED: "DB_CLIENT_INIT_FAILED",
  QUERY_FAILED: "DB_QUERY_FAILED",
  UNEXPECTED_RESPONSE: "DB_UNEXPECTED_RESPONSE",
} as const satisfies Record<string, DbErrorCode>;

const SENSITIVE_KEY_PATTERN = /(key|token|secret|authorization|password|credential|supabase_url)/i;
const REDACTED = "[REDACTED]";

export function sanitizeForError(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sanitizeForError);
  }
  if (!value || typeof value !== "object") {
    return value;
  }

  const output: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    output[key] = SENSITIVE_KEY_PATTERN.test(key) ? REDACTED : sanitizeForError(child);
  }
  return output;
}

export class DbError extends Error {
  readonly code: DbErrorCode;
  readonly status: number;
  readonly context: unknown;

  constructor(
    code: DbErrorCode,
    message: string,
    options: {
      status?: number;
      context?: unknown;
      cause?: unknown;
    } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "DbError";
    this.code = code;
    this.status = options.status ?? 500;
    this.context = sanitizeForError(options.context ?? null);
  }

  toJSON(): {
    name: string;
    code: DbErrorCode;
    message: string;
    status: number;
    context: unknown;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      status: this.status,
      context: this.context,
    };
  }

  static fromUnknown(params: {
    code: DbErrorCode;
    message: string;
    error: unknown;
    status?: number;
    context?: unknown;
  }): DbError {
    if (params.error instanceof DbError) {
      return params.error;
    }
    return new DbError(params.code, params.message, {
      status: params.status,
      context: params.context,
      cause: params.error,
    });
  }
}

export function assertRequiredEnv(name: string, value: string | undefined | null): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new DbError(DB_ERROR_CODES.MISSING_ENV, `Missing required env var: ${name}`, {
      status: 500,
      context: { env_var: name },
    });
  }
  return trimmed;
}

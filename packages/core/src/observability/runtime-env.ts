export type RuntimeEnv = "local" | "staging" | "production";

export function detectRuntimeEnv(): RuntimeEnv {
  return normalizeRuntimeEnv(
    readEnv("APP_ENV") ?? readEnv("SENTRY_ENVIRONMENT") ?? readEnv("NODE_ENV"),
  );
}

export function normalizeRuntimeEnv(value: string | null | undefined): RuntimeEnv {
  const normalized = (value ?? "").trim().toLowerCase();
  if (normalized === "staging") {
    return "staging";
  }
  if (normalized === "production" || normalized === "prod") {
    return "production";
  }
  return "local";
}

function readEnv(name: string): string | null {
  const value = process.env[name];
  if (typeof value === "string" && value.trim()) {
    return value.trim();
  }
  return null;
}

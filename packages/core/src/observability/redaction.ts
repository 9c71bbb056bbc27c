const EMAIL_PATTERN = /\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/gi;
const PHONE_PATTERN = /(?:\+?\d[\d().\-\s]{7,}\d)/g;

const USER_TEXT_KEYS = new Set([
  "text",
  "inbound_text",
  "outbound_text",
  "name",
  "full_name",
  "phone",
  "phone_number",
  "experience",
  "caption",
  "search_query",
  "form_data",
]);

export const REDACTED_USER_TEXT = "[REDACTED_USER_TEXT]";
export const REDACTED_SECRET = "[REDACTED_SECRET]";

const registeredSecrets = new Set<string>();

/** Values registered here are masked wherever they appear in logged strings. */
export function registerSecret(value: string | null | undefined): void {
  const trimmed = value?.trim();
  if (trimmed && trimmed.length >= 6) {
    registeredSecrets.add(trimmed);
  }
}

export function clearRegisteredSecrets(): void {
  registeredSecrets.clear();
}

export function redactPII<T>(input: T): T {
  const seen = new WeakSet<object>();
  return redactValue(input, "", seen) as T;
}

function redactValue(input: unknown, keyName: string, seen: WeakSet<object>): unknown {
  if (input === null || input === undefined) {
    return input;
  }

  if (USER_TEXT_KEYS.has(keyName.toLowerCase())) {
    return REDACTED_USER_TEXT;
  }

  if (typeof input === "string") {
    return redactString(input);
  }

  if (typeof input !== "object") {
    return input;
  }

  if (input instanceof Error) {
    return input;
  }

  if (seen.has(input)) {
    return "[Circular]";
  }
  seen.add(input);

  if (Array.isArray(input)) {
    return input.map((value) => redactValue(value, keyName, seen));
  }

  const output: Record<string, unknown> = {};
  for (const [childKey, childValue] of Object.entries(input)) {
    output[childKey] = redactValue(childValue, childKey, seen);
  }
  return output;
}

function redactString(input: string): string {
  let redacted = input;
  for (const secret of registeredSecrets) {
    redacted = redacted.split(secret).join(REDACTED_SECRET);
  }
  redacted = redacted.replace(EMAIL_PATTERN, "[REDACTED_EMAIL]");
  redacted = redacted.replace(PHONE_PATTERN, (candidate) => {
    const digits = candidate.replace(/\D/g, "");
    if (digits.length < 9 || digits.length > 15) {
      return candidate;
    }
    return "[REDACTED_PHONE]";
  });
  return redacted;
}

import type { SupabaseClient } from "@supabase/supabase-js";

export type DbClient = SupabaseClient;

export const INTAKE_STEPS = ["name", "phone", "position", "position_manual", "exp", "cv"] as const;
export type IntakeStep = (typeof INTAKE_STEPS)[number];

export const ADMIN_STEPS = ["menu", "search_position"] as const;
export type AdminStep = (typeof ADMIN_STEPS)[number];

export type FormData = Record<string, string>;

export type IntakeSession = {
  mode: "intake";
  step: IntakeStep;
  formData: FormData;
};

export type AdminSession = {
  mode: "admin";
  step: AdminStep;
};

/** Per-user conversation state. Absence of a session (null) is the idle "none" mode. */
export type Session = IntakeSession | AdminSession;

export type AttachmentKind = "document" | "photo";

export type AttachmentRef = {
  fileId: string;
  kind: AttachmentKind;
};

export type NewApplication = {
  userId: number;
  name: string;
  phone: string;
  position: string;
  experience: string;
  attachment: AttachmentRef | null;
};

export type Application = NewApplication & {
  id: string;
  createdAt: string;
};

export function isIntakeStep(value: unknown): value is IntakeStep {
  return typeof value === "string" && INTAKE_STEPS.some((step) => step === value);
}

export function isAdminStep(value: unknown): value is AdminStep {
  return typeof value === "string" && ADMIN_STEPS.some((step) => step === value);
}

/** Rebuilds a session from its stored JSON form; anything malformed reads as no session. */
export function parseStoredSession(value: unknown): Session | null {
  if (!isRecord(value)) {
    return null;
  }

  if (value.mode === "admin" && isAdminStep(value.step)) {
    return { mode: "admin", step: value.step };
  }

  if (value.mode === "intake" && isIntakeStep(value.step)) {
    const formData: FormData = {};
    if (isRecord(value.form_data)) {
      for (const [key, entry] of Object.entries(value.form_data)) {
        if (typeof entry === "string") {
          formData[key] = entry;
        }
      }
    }
    return { mode: "intake", step: value.step, formData };
  }

  return null;
}

export function serializeSession(session: Session): Record<string, unknown> {
  if (session.mode === "admin") {
    return { mode: "admin", step: session.step };
  }
  return { mode: "intake", step: session.step, form_data: { ...session.formData } };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

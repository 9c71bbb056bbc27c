import {
  insertApplication,
  listApplicationsSince,
  listRecentApplications,
  loadApplicationById,
} from "./queries/applications.ts";
import { deleteIntakeSession, loadIntakeSession, upsertIntakeSession } from "./queries/intake-sessions.ts";
import { loadUserLanguage, upsertUserLanguage } from "./queries/user-languages.ts";
import type { Application, DbClient, NewApplication, Session } from "./types.ts";

/** Store mirror for per-user session and language state. Implementations throw DbError. */
export type SessionPersistence = {
  loadSession: (userId: number) => Promise<Session | null>;
  saveSession: (userId: number, session: Session) => Promise<void>;
  deleteSession: (userId: number) => Promise<void>;
  loadLanguage: (userId: number) => Promise<string | null>;
  saveLanguage: (userId: number, language: string) => Promise<void>;
};

/** Submitted applications. Implementations throw DbError. */
export type ApplicationPersistence = {
  insertApplication: (input: NewApplication) => Promise<Application>;
  getApplication: (id: string) => Promise<Application | null>;
  /** Newest first. */
  listRecentApplications: (limit: number) => Promise<Application[]>;
  /** Newest first, created at or after `sinceIso`. */
  listApplicationsSince: (sinceIso: string, limit: number) => Promise<Application[]>;
};

export function createSupabaseSessionPersistence(db: DbClient): SessionPersistence {
  return {
    loadSession: (userId) => loadIntakeSession(db, userId),
    saveSession: (userId, session) => upsertIntakeSession(db, userId, session),
    deleteSession: (userId) => deleteIntakeSession(db, userId),
    loadLanguage: (userId) => loadUserLanguage(db, userId),
    saveLanguage: (userId, language) => upsertUserLanguage(db, userId, language),
  };
}

export function createSupabaseApplicationPersistence(db: DbClient): ApplicationPersistence {
  return {
    insertApplication: (input) => insertApplication(db, input),
    getApplication: (id) => loadApplicationById(db, id),
    listRecentApplications: (limit) => listRecentApplications(db, limit),
    listApplicationsSince: (sinceIso, limit) => listApplicationsSince(db, sinceIso, limit),
  };
}

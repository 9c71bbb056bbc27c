import { errorFields, logEvent } from "../../core/src/observability/logger.ts";
import type { SessionPersistence } from "./persistence.ts";
import type { Session } from "./types.ts";

export type SessionStore<TLanguage extends string> = {
  getState: (userId: number) => Promise<Session | null>;
  setState: (userId: number, session: Session | null) => Promise<void>;
  getLanguage: (userId: number) => Promise<TLanguage>;
  setLanguage: (userId: number, language: TLanguage) => Promise<void>;
};

export type CachedSessionStoreOptions<TLanguage extends string> = {
  persistence: SessionPersistence | null;
  defaultLanguage: TLanguage;
  parseLanguage: (value: string) => TLanguage | null;
};

/**
 * Memory-first session and language state with a best-effort store mirror.
 *
 * The cache is authoritative while the process runs. A miss is read from the
 * store once and cached, including "nothing stored". Failed store reads are
 * not cached so a later read can recover; failed mirror writes keep the cached
 * value. Map access never spans an await, so the event loop keeps both maps
 * consistent without a lock.
 */
export class CachedSessionStore<TLanguage extends string> implements SessionStore<TLanguage> {
  private readonly sessions = new Map<number, Session | null>();
  private readonly languages = new Map<number, TLanguage>();
  private readonly persistence: SessionPersistence | null;
  private readonly defaultLanguage: TLanguage;
  private readonly parseLanguage: (value: string) => TLanguage | null;

  constructor(options: CachedSessionStoreOptions<TLanguage>) {
    this.persistence = options.persistence;
    this.defaultLanguage = options.defaultLanguage;
    this.parseLanguage = options.parseLanguage;
  }

  async getState(userId: number): Promise<Session | null> {
    if (this.sessions.has(userId)) {
      return cloneSession(this.sessions.get(userId) ?? null);
    }
    if (!this.persistence) {
      this.sessions.set(userId, null);
      return null;
    }

    let stored: Session | null;
    try {
      stored = await this.persistence.loadSession(userId);
    } catch (error) {
      logEvent({
        event: "session.load_failed",
        level: "warn",
        user_id: userId,
        payload: { operation: "load_session", ...errorFields(error) },
      });
      return null;
    }

    // A write that landed while the read was in flight wins.
    if (!this.sessions.has(userId)) {
      this.sessions.set(userId, stored);
    }
    return cloneSession(this.sessions.get(userId) ?? null);
  }

  async setState(userId: number, session: Session | null): Promise<void> {
    this.sessions.set(userId, cloneSession(session));
    if (!this.persistence) {
      return;
    }

    try {
      if (session) {
        await this.persistence.saveSession(userId, session);
      } else {
        await this.persistence.deleteSession(userId);
      }
    } catch (error) {
      logEvent({
        event: "session.mirror_failed",
        level: "warn",
        user_id: userId,
        payload: { operation: session ? "save_session" : "delete_session", ...errorFields(error) },
      });
    }
  }

  async getLanguage(userId: number): Promise<TLanguage> {
    const cached = this.languages.get(userId);
    if (cached) {
      return cached;
    }
    if (!this.persistence) {
      this.languages.set(userId, this.defaultLanguage);
      return this.defaultLanguage;
    }

    let stored: string | null;
    try {
      stored = await this.persistence.loadLanguage(userId);
    } catch (error) {
      logEvent({
        event: "session.load_failed",
        level: "warn",
        user_id: userId,
        payload: { operation: "load_language", ...errorFields(error) },
      });
      return this.defaultLanguage;
    }

    const language = (stored ? this.parseLanguage(stored) : null) ?? this.defaultLanguage;
    const current = this.languages.get(userId);
    if (current) {
      return current;
    }
    this.languages.set(userId, language);
    return language;
  }

  async setLanguage(userId: number, language: TLanguage): Promise<void> {
    this.languages.set(userId, language);
    if (!this.persistence) {
      return;
    }

    try {
      await this.persistence.saveLanguage(userId, language);
    } catch (error) {
      logEvent({
        event: "session.mirror_failed",
        level: "warn",
        user_id: userId,
        payload: { operation: "save_language", ...errorFields(error) },
      });
    }
  }
}

function cloneSession(session: Session | null): Session | null {
  return session ? structuredClone(session) : null;
}

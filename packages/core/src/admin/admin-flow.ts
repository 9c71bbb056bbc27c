import {
  adminKeyboard,
  mainMenuKeyboard,
  paginationKeyboard,
  type ReplyMarkup,
} from "../../../messaging/src/keyboards.ts";
import type { MessageSender } from "../../../messaging/src/sender.ts";
import { escapeHtml } from "../../../messaging/src/templates/html.ts";
import { label, labelIndex, renderLabel, type Language } from "../../../messaging/src/templates/labels.ts";
import type { SessionStore } from "../../../db/src/session-store.ts";
import type { Application, Session } from "../../../db/src/types.ts";
import type { Logger } from "../observability/logger.ts";
import {
  DEFAULT_PAGE_SIZE,
  DEFAULT_STATS_DAYS,
  DEFAULT_STATS_LIMIT,
  type AdminQueries,
} from "./admin-queries.ts";
import {
  formatTimestamp,
  renderApplicationDetail,
  renderApplicationSummary,
  renderStatsReport,
  splitIntoChunks,
} from "./admin-report.ts";

const DETAIL_COMMAND = "/a ";
const ADMIN_COMMAND = "/admin";

export type AdminFlowDeps = {
  sender: MessageSender;
  sessions: SessionStore<Language>;
  queries: AdminQueries;
  timeZone: string;
  pageSize?: number;
  now?: () => Date;
};

export type AdminMessageInput = {
  chatId: number;
  userId: number;
  text: string;
  session: Session | null;
  language: Language;
  log: Logger;
};

const ADMIN_MENU_SESSION: Session = { mode: "admin", step: "menu" };

/** Reviewer-only commands and the admin sub-flows behind them. */
export class AdminFlow {
  private readonly sender: MessageSender;
  private readonly sessions: SessionStore<Language>;
  private readonly queries: AdminQueries;
  private readonly timeZone: string;
  private readonly pageSize: number;
  private readonly now: () => Date;

  constructor(deps: AdminFlowDeps) {
    this.sender = deps.sender;
    this.sessions = deps.sessions;
    this.queries = deps.queries;
    this.timeZone = deps.timeZone;
    this.pageSize = deps.pageSize ?? DEFAULT_PAGE_SIZE;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Returns true when the message was an admin interaction. Callers must only
   * pass messages from the reviewer chat.
   */
  async handleMessage(input: AdminMessageInput): Promise<boolean> {
    const { chatId, userId, language, log } = input;
    const text = input.text.trim();
    let session = input.session;

    if (
      labelIndex.find(text, language, "open_admin") ||
      text === ADMIN_COMMAND ||
      text.startsWith(`${ADMIN_COMMAND} `)
    ) {
      await this.enterAdmin(userId, session, "admin_opened", log);
      await this.send(chatId, label("admin_panel", language), adminKeyboard(language));
      return true;
    }

    const idle = session === null || session.mode !== "intake";
    if (
      session?.mode !== "admin" &&
      (text.startsWith(DETAIL_COMMAND) || (idle && this.isAdminButton(text, language)))
    ) {
      await this.enterAdmin(userId, session, "admin_button", log);
      session = ADMIN_MENU_SESSION;
    }

    if (session?.mode !== "admin") {
      return false;
    }

    if (labelIndex.find(text, language, "admin_back")) {
      await this.sessions.setState(userId, null);
      logTransition(log, session, null, "admin_closed");
      await this.send(chatId, label("msg_welcome", language), mainMenuKeyboard(language, { isReviewer: true }));
      return true;
    }

    if (labelIndex.find(text, language, "admin_list")) {
      await this.sendRecentPage(chatId, 0, language);
      await this.resetToMenu(userId, session, log);
      return true;
    }

    if (labelIndex.find(text, language, "admin_search")) {
      const next: Session = { mode: "admin", step: "search_position" };
      await this.sessions.setState(userId, next);
      logTransition(log, session, next, "admin_search_requested");
      await this.send(chatId, label("admin_search_ask", language), adminKeyboard(language));
      return true;
    }

    if (labelIndex.find(text, language, "admin_stats")) {
      await this.sendStats(chatId, language);
      await this.resetToMenu(userId, session, log);
      return true;
    }

    if (text.startsWith(DETAIL_COMMAND)) {
      await this.sendDetail(chatId, text.slice(DETAIL_COMMAND.length).trim(), language);
      return true;
    }

    if (session.step === "search_position") {
      await this.sendSearchResults(chatId, text, language);
      await this.resetToMenu(userId, session, log);
      return true;
    }

    return false;
  }

  /** Renders one page of recent applications; an empty page past the first steps back. */
  async sendRecentPage(chatId: number, offset: number, language: Language): Promise<void> {
    const result = await this.queries.listRecent(this.pageSize, offset);
    if (result.status === "unavailable") {
      await this.sendStoreUnavailable(chatId, language);
      return;
    }

    const { items, hasMore } = result.value;
    if (items.length === 0) {
      if (offset === 0) {
        await this.send(chatId, label("admin_no_apps", language), adminKeyboard(language));
        return;
      }
      await this.sendRecentPage(chatId, Math.max(0, offset - this.pageSize), language);
      return;
    }

    if (offset === 0) {
      await this.send(chatId, `<b>${label("admin_apps", language)}</b>`, adminKeyboard(language));
    }

    await this.sendApplicationCards(chatId, items, offset + 1, language);

    const navigation = paginationKeyboard(language, { offset, pageSize: this.pageSize, hasMore });
    if (navigation) {
      const page = Math.floor(offset / this.pageSize) + 1;
      await this.send(chatId, `<i>${renderLabel("admin_page", language, { page })}</i>`, navigation);
    }
  }

  private async sendSearchResults(chatId: number, query: string, language: Language): Promise<void> {
    const result = await this.queries.searchByPosition(query);
    if (result.status === "unavailable") {
      await this.sendStoreUnavailable(chatId, language);
      return;
    }
    if (result.value.length === 0) {
      await this.send(chatId, label("admin_no_results", language), adminKeyboard(language));
      return;
    }

    const title = renderLabel("admin_search_title", language, { query: escapeHtml(query) });
    await this.send(chatId, `<b>${title}</b>`, adminKeyboard(language));
    await this.sendApplicationCards(chatId, result.value, 1, language);
  }

  private async sendStats(chatId: number, language: Language): Promise<void> {
    await this.send(chatId, label("admin_stats_wait", language), null);

    const result = await this.queries.positionStats(DEFAULT_STATS_DAYS, DEFAULT_STATS_LIMIT);
    if (result.status === "unavailable") {
      await this.sendStoreUnavailable(chatId, language);
      return;
    }
    if (result.value.total === 0) {
      await this.send(chatId, label("admin_stats_no_data", language), adminKeyboard(language));
      return;
    }

    const report = renderStatsReport({
      stats: result.value,
      days: DEFAULT_STATS_DAYS,
      language,
      reportTime: formatTimestamp(this.now(), this.timeZone),
    });
    for (const chunk of splitIntoChunks(report)) {
      await this.send(chatId, chunk, adminKeyboard(language));
    }
  }

  private async sendDetail(chatId: number, applicationId: string, language: Language): Promise<void> {
    const result = await this.queries.getApplication(applicationId);
    if (result.status === "unavailable") {
      await this.sendStoreUnavailable(chatId, language);
      return;
    }
    if (!result.value) {
      await this.send(chatId, label("admin_no_results", language), adminKeyboard(language));
      return;
    }

    const application = result.value;
    const body = renderApplicationDetail(application, language, this.timeZone);
    if (application.attachment) {
      await this.sender.sendAttachment({
        chatId,
        attachment: application.attachment,
        caption: body,
        replyMarkup: adminKeyboard(language),
      });
      return;
    }
    await this.send(chatId, body, adminKeyboard(language));
  }

  private async sendApplicationCards(
    chatId: number,
    applications: readonly Application[],
    firstIndex: number,
    language: Language,
  ): Promise<void> {
    for (const [position, application] of applications.entries()) {
      const caption = renderApplicationSummary(application, firstIndex + position, language, this.timeZone);
      if (application.attachment) {
        await this.sender.sendAttachment({ chatId, attachment: application.attachment, caption });
      } else {
        await this.send(chatId, caption, null);
      }
    }
  }

  private async sendStoreUnavailable(chatId: number, language: Language): Promise<void> {
    await this.send(chatId, label("admin_store_unavailable", language), adminKeyboard(language));
  }

  private async enterAdmin(userId: number, previous: Session | null, reason: string, log: Logger): Promise<void> {
    await this.sessions.setState(userId, ADMIN_MENU_SESSION);
    logTransition(log, previous, ADMIN_MENU_SESSION, reason);
  }

  private async resetToMenu(userId: number, previous: Session, log: Logger): Promise<void> {
    await this.sessions.setState(userId, ADMIN_MENU_SESSION);
    if (previous.step !== "menu") {
      logTransition(log, previous, ADMIN_MENU_SESSION, "admin_query_finished");
    }
  }

  private isAdminButton(text: string, language: Language): boolean {
    return labelIndex.resolve(text, language).some((action) =>
      action.kind === "admin_list" ||
      action.kind === "admin_search" ||
      action.kind === "admin_stats"
    );
  }

  private async send(chatId: number, text: string, replyMarkup: ReplyMarkup | null): Promise<void> {
    await this.sender.sendText({ chatId, text, replyMarkup });
  }
}

export function describeSession(session: Session | null): string {
  return session ? `${session.mode}:${session.step}` : "none";
}

export function logTransition(
  log: Logger,
  previous: Session | null,
  next: Session | null,
  reason: string,
): void {
  log({
    event: "conversation.state_transition",
    payload: {
      previous_step: describeSession(previous),
      next_step: describeSession(next),
      reason,
    },
  });
}

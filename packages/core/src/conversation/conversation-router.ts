import {
  adminKeyboard,
  languageKeyboard,
  mainMenuKeyboard,
  parsePageCallback,
  type ReplyMarkup,
} from "../../../messaging/src/keyboards.ts";
import type { MessageSender } from "../../../messaging/src/sender.ts";
import { isActionOfKind, label, labelIndex, type Language, type MenuAction } from "../../../messaging/src/templates/labels.ts";
import type { InboundCallback, InboundMessage, InboundUpdate } from "../../../messaging/src/updates.ts";
import type { ApplicationPersistence } from "../../../db/src/persistence.ts";
import type { SessionStore } from "../../../db/src/session-store.ts";
import type { Session } from "../../../db/src/types.ts";
import { AdminFlow, logTransition } from "../admin/admin-flow.ts";
import type { AdminQueries } from "../admin/admin-queries.ts";
import { renderReviewerNotification } from "../admin/admin-report.ts";
import {
  handleIntakeStep,
  renderStepPrompt,
  startIntake,
  type CompletedForm,
  type IntakeOutboundPlanStep,
} from "../intake/intake-engine.ts";
import { createLogger, errorFields, type Logger } from "../observability/logger.ts";

const RESET_COMMANDS: ReadonlySet<string> = new Set(["/start", "/menu", "Menu"]);
const SAVE_ATTEMPTS = 3;
const SAVE_RETRY_BASE_DELAY_MS = 1_000;

export type ConversationRouterDeps = {
  sender: MessageSender;
  sessions: SessionStore<Language>;
  applications: ApplicationPersistence | null;
  adminQueries: AdminQueries;
  reviewerChatId: number;
  /** Language of reviewer notifications; a group chat has no stored language of its own. */
  reviewerLanguage?: Language;
  timeZone: string;
  pageSize?: number;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

export type ConversationRouter = {
  handleUpdate: (update: InboundUpdate) => Promise<void>;
};

type MessageContext = {
  message: InboundMessage;
  text: string;
  language: Language;
  session: Session | null;
  isReviewer: boolean;
  actions: MenuAction[];
  log: Logger;
};

export function createConversationRouter(deps: ConversationRouterDeps): ConversationRouter {
  const { sender, sessions, reviewerChatId } = deps;
  const sleep = deps.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
  const adminFlow = new AdminFlow({
    sender,
    sessions,
    queries: deps.adminQueries,
    timeZone: deps.timeZone,
    pageSize: deps.pageSize,
    now: deps.now,
  });

  async function send(chatId: number, text: string, replyMarkup: ReplyMarkup | null): Promise<void> {
    await sender.sendText({ chatId, text, replyMarkup });
  }

  async function sendPlan(chatId: number, plan: readonly IntakeOutboundPlanStep[]): Promise<void> {
    for (const step of plan) {
      await send(chatId, step.body, step.replyMarkup);
    }
  }

  function mainMenu(language: Language, chatId: number): ReplyMarkup {
    return mainMenuKeyboard(language, { isReviewer: chatId === reviewerChatId });
  }

  function findAction<K extends MenuAction["kind"]>(
    actions: readonly MenuAction[],
    kind: K,
  ): Extract<MenuAction, { kind: K }> | null {
    for (const action of actions) {
      if (isActionOfKind(action, kind)) {
        return action;
      }
    }
    return null;
  }

  async function handleCallback(callback: InboundCallback): Promise<void> {
    await sender.answerCallback(callback.callbackId);
    if (callback.chatId === null || callback.chatId !== reviewerChatId) {
      return;
    }

    const offset = parsePageCallback(callback.data);
    if (offset === null) {
      return;
    }

    if (callback.messageId !== null) {
      await sender.deleteMessage(callback.chatId, callback.messageId);
    }
    const language = await sessions.getLanguage(callback.userId);
    await adminFlow.sendRecentPage(callback.chatId, offset, language);
  }

  async function switchLanguage(context: MessageContext, language: Language): Promise<void> {
    const { message, session } = context;
    await sessions.setLanguage(message.userId, language);

    if (session?.mode === "intake") {
      await send(message.chatId, label("msg_lang_changed", language), null);
      await sendPlan(message.chatId, [renderStepPrompt(session.step, language, session.formData)]);
      return;
    }
    if (session?.mode === "admin") {
      await send(message.chatId, label("msg_lang_changed", language), adminKeyboard(language));
      return;
    }
    await send(message.chatId, label("msg_lang_changed", language), mainMenu(language, message.chatId));
  }

  async function handleIdle(context: MessageContext): Promise<void> {
    const { message, language, actions } = context;

    const section = findAction(actions, "show_section");
    if (section) {
      const key = section.section === "about"
        ? "msg_about"
        : section.section === "contact"
        ? "msg_contact"
        : "msg_location";
      await send(message.chatId, label(key, language), mainMenu(language, message.chatId));
      return;
    }

    if (findAction(actions, "start_application")) {
      const started = startIntake(language);
      await sessions.setState(message.userId, started.nextSession);
      logTransition(context.log, null, started.nextSession, "intake_started");
      await sendPlan(message.chatId, started.outboundPlan);
      return;
    }

    await send(message.chatId, label("msg_choose_menu", language), mainMenu(language, message.chatId));
  }

  async function persistSubmission(message: InboundMessage, form: CompletedForm, log: Logger): Promise<boolean> {
    if (!deps.applications) {
      return false;
    }

    for (let attempt = 1; attempt <= SAVE_ATTEMPTS; attempt += 1) {
      try {
        await deps.applications.insertApplication({ userId: message.userId, ...form });
        return true;
      } catch (error) {
        log({
          event: "application.persist_failed",
          level: attempt === SAVE_ATTEMPTS ? "error" : "warn",
          payload: { attempt, final: attempt === SAVE_ATTEMPTS, ...errorFields(error) },
        });
        if (attempt < SAVE_ATTEMPTS) {
          await sleep(SAVE_RETRY_BASE_DELAY_MS * attempt);
        }
      }
    }
    return false;
  }

  async function notifyReviewer(form: CompletedForm, log: Logger): Promise<boolean> {
    const reviewerLanguage = deps.reviewerLanguage ?? await sessions.getLanguage(reviewerChatId);
    const body = renderReviewerNotification(form, reviewerLanguage);
    const result = form.attachment
      ? await sender.sendAttachment({ chatId: reviewerChatId, attachment: form.attachment, caption: body })
      : await sender.sendText({ chatId: reviewerChatId, text: body });

    if (!result.ok) {
      log({
        event: "application.reviewer_notify_failed",
        level: "error",
        payload: {
          method: form.attachment ? form.attachment.kind : "text",
          failure: result.failure,
          error_code: result.errorCode,
        },
      });
    }
    return result.ok;
  }

  async function submit(context: MessageContext, session: Session, form: CompletedForm): Promise<void> {
    const { message, language, log } = context;
    const saved = await persistSubmission(message, form, log);
    const notified = await notifyReviewer(form, log);

    log({
      event: "application.submitted",
      level: saved || notified ? "info" : "error",
      payload: { saved, notified, has_attachment: form.attachment !== null },
    });

    if (!saved && !notified) {
      await send(message.chatId, label("msg_submit_failed", language), null);
      return;
    }

    await sessions.setState(message.userId, null);
    logTransition(log, session, null, "intake_submitted");
    await send(message.chatId, label("msg_applied", language), mainMenu(language, message.chatId));
  }

  async function handleMessage(message: InboundMessage): Promise<void> {
    const log = createLogger({ correlation_id: `update:${message.updateId}`, user_id: message.userId });
    const text = message.text.trim();
    const language = await sessions.getLanguage(message.userId);
    const session = await sessions.getState(message.userId);
    const isReviewer = message.chatId === reviewerChatId;

    if (RESET_COMMANDS.has(text) || text.startsWith("/start ")) {
      await sessions.setState(message.userId, null);
      if (session) {
        logTransition(log, session, null, "reset_command");
      }
      await send(message.chatId, label("msg_welcome", language), mainMenu(language, message.chatId));
      return;
    }

    const actions = labelIndex.resolve(text, language);
    const context: MessageContext = { message, text, language, session, isReviewer, actions, log };

    if (findAction(actions, "open_language_menu")) {
      await send(message.chatId, label("msg_select_lang", language), languageKeyboard(language));
      return;
    }

    const languageChoice = findAction(actions, "set_language");
    if (languageChoice) {
      await switchLanguage(context, languageChoice.language);
      return;
    }

    if (isReviewer) {
      const handled = await adminFlow.handleMessage({
        chatId: message.chatId,
        userId: message.userId,
        text,
        session,
        language,
        log,
      });
      if (handled) {
        return;
      }
    }

    if (!session) {
      if (findAction(actions, "back")) {
        await send(message.chatId, label("msg_menu", language), mainMenu(language, message.chatId));
        return;
      }
      await handleIdle(context);
      return;
    }

    if (session.mode === "admin") {
      await send(message.chatId, label("admin_panel", language), adminKeyboard(language));
      return;
    }

    if (findAction(actions, "back")) {
      await sendPlan(message.chatId, [renderStepPrompt(session.step, language, session.formData)]);
      return;
    }

    if (findAction(actions, "cancel")) {
      await sessions.setState(message.userId, null);
      logTransition(log, session, null, "intake_canceled");
      await send(message.chatId, label("msg_canceled", language), mainMenu(language, message.chatId));
      return;
    }

    const result = handleIntakeStep(session, {
      text: message.text,
      contactPhone: message.contactPhone,
      attachment: message.attachment,
      language,
    });

    switch (result.outcome) {
      case "rejected":
        log({ event: "conversation.input_rejected", payload: { step: session.step } });
        await sendPlan(message.chatId, result.outboundPlan);
        return;
      case "advanced":
        await sessions.setState(message.userId, result.nextSession);
        logTransition(log, session, result.nextSession, "step_completed");
        await sendPlan(message.chatId, result.outboundPlan);
        return;
      case "completed":
        await submit(context, session, result.form);
        return;
    }
  }

  return {
    handleUpdate: async (update) => {
      if (update.kind === "callback") {
        await handleCallback(update);
        return;
      }
      await handleMessage(update);
    },
  };
}

import {
  attachmentKeyboard,
  cancelKeyboard,
  phoneKeyboard,
  positionKeyboard,
  removeKeyboard,
  type ReplyMarkup,
} from "../../../messaging/src/keyboards.ts";
import { escapeHtml } from "../../../messaging/src/templates/html.ts";
import {
  label,
  labelIndex,
  renderLabel,
  type LabelKey,
  type Language,
} from "../../../messaging/src/templates/labels.ts";
import type { AttachmentRef, FormData, IntakeSession, IntakeStep } from "../../../db/src/types.ts";
import {
  acceptPhone,
  composePosition,
  isValidExperience,
  isValidName,
  isValidRefinement,
} from "./validators.ts";

export type IntakeOutboundPlanStep = {
  kind: "send";
  message_key: LabelKey;
  body: string;
  replyMarkup: ReplyMarkup | null;
};

export type IntakeInput = {
  text: string;
  contactPhone: string | null;
  attachment: AttachmentRef | null;
  language: Language;
};

export type CompletedForm = {
  name: string;
  phone: string;
  position: string;
  experience: string;
  attachment: AttachmentRef | null;
};

export type IntakeStepResult =
  | {
    outcome: "advanced";
    nextSession: IntakeSession;
    outboundPlan: IntakeOutboundPlanStep[];
  }
  | {
    outcome: "rejected";
    nextSession: IntakeSession;
    outboundPlan: IntakeOutboundPlanStep[];
  }
  | {
    outcome: "completed";
    form: CompletedForm;
  };

export function startIntake(language: Language): {
  nextSession: IntakeSession;
  outboundPlan: IntakeOutboundPlanStep[];
} {
  const nextSession: IntakeSession = { mode: "intake", step: "name", formData: {} };
  return { nextSession, outboundPlan: [renderStepPrompt("name", language, {})] };
}

/** The prompt that asks for `step`, with the keyboard that step expects. */
export function renderStepPrompt(
  step: IntakeStep,
  language: Language,
  formData: Readonly<FormData>,
): IntakeOutboundPlanStep {
  switch (step) {
    case "name":
      return buildSendStep("msg_ask_name", label("msg_ask_name", language), removeKeyboard());
    case "phone":
      return buildSendStep("msg_ask_phone", label("msg_ask_phone", language), phoneKeyboard(language));
    case "position":
      return buildSendStep("msg_ask_position", label("msg_ask_position", language), positionKeyboard(language));
    case "position_manual":
      return buildSendStep(
        "msg_position_selected",
        renderLabel("msg_position_selected", language, { category: escapeHtml(formData.category ?? "") }),
        cancelKeyboard(language),
      );
    case "exp":
      return buildSendStep("msg_ask_exp", label("msg_ask_exp", language), cancelKeyboard(language));
    case "cv":
      return buildSendStep("msg_ask_cv", label("msg_ask_cv", language), attachmentKeyboard(language));
  }
}

/**
 * Applies one inbound message to an intake session. Pure: the caller persists
 * `nextSession` and sends the plan. A rejected input returns the session
 * unchanged.
 */
export function handleIntakeStep(session: IntakeSession, input: IntakeInput): IntakeStepResult {
  const { language } = input;
  const text = input.text.trim();

  switch (session.step) {
    case "name":
      if (!isValidName(text)) {
        const hint = renderLabel("msg_cancel_hint", language, { cancel: label("cancel", language) });
        return reject(session, "msg_invalid_name", `${label("msg_invalid_name", language)}\n\n${hint}`);
      }
      return advance(session, "phone", { name: text }, language);

    case "phone": {
      const phone = acceptPhone(input.text, input.contactPhone);
      if (!phone) {
        return reject(session, "msg_invalid_phone", label("msg_invalid_phone", language));
      }
      return advance(session, "position", { phone }, language);
    }

    case "position":
      if (!text) {
        return reject(
          session,
          "msg_ask_position",
          label("msg_ask_position", language),
          positionKeyboard(language),
        );
      }
      return advance(session, "position_manual", { category: text }, language);

    case "position_manual":
      if (!isValidRefinement(text)) {
        return reject(session, "msg_ask_position_manual", label("msg_ask_position_manual", language));
      }
      return advance(
        session,
        "exp",
        { position: composePosition(session.formData.category ?? "", text, language) },
        language,
      );

    case "exp":
      if (!isValidExperience(text)) {
        return reject(session, "msg_invalid_exp", label("msg_invalid_exp", language));
      }
      return advance(session, "cv", { experience: text }, language);

    case "cv": {
      const skipped = text === "/skip" || labelIndex.find(text, language, "skip") !== null;
      if (!input.attachment && !skipped) {
        return reject(session, "msg_invalid_cv", label("msg_invalid_cv", language));
      }
      return {
        outcome: "completed",
        form: {
          name: session.formData.name ?? "",
          phone: session.formData.phone ?? "",
          position: session.formData.position ?? "",
          experience: session.formData.experience ?? "",
          attachment: input.attachment,
        },
      };
    }
  }
}

function advance(
  session: IntakeSession,
  nextStep: IntakeStep,
  collected: FormData,
  language: Language,
): IntakeStepResult {
  const formData = { ...session.formData, ...collected };
  return {
    outcome: "advanced",
    nextSession: { mode: "intake", step: nextStep, formData },
    outboundPlan: [renderStepPrompt(nextStep, language, formData)],
  };
}

function reject(
  session: IntakeSession,
  messageKey: LabelKey,
  body: string,
  replyMarkup: ReplyMarkup | null = null,
): IntakeStepResult {
  return {
    outcome: "rejected",
    nextSession: session,
    outboundPlan: [buildSendStep(messageKey, body, replyMarkup)],
  };
}

function buildSendStep(
  messageKey: LabelKey,
  body: string,
  replyMarkup: ReplyMarkup | null,
): IntakeOutboundPlanStep {
  return { kind: "send", message_key: messageKey, body, replyMarkup };
}

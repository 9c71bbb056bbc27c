import type { TelegramClient, TransportResult } from "./client.ts";
import type { ReplyMarkup } from "./keyboards.ts";
import type { Attachment } from "./updates.ts";

export type ChatId = number | string;

export type SendTextInput = {
  chatId: ChatId;
  text: string;
  replyMarkup?: ReplyMarkup | null;
};

export type SendAttachmentInput = {
  chatId: ChatId;
  attachment: Attachment;
  caption: string;
  replyMarkup?: ReplyMarkup | null;
};

/** Outbound calls used by the conversation layer. All of them report failure in the result. */
export type MessageSender = {
  sendText: (input: SendTextInput) => Promise<TransportResult>;
  sendAttachment: (input: SendAttachmentInput) => Promise<TransportResult>;
  answerCallback: (callbackId: string) => Promise<TransportResult>;
  deleteMessage: (chatId: ChatId, messageId: number) => Promise<TransportResult>;
};

export function createMessageSender(client: TelegramClient): MessageSender {
  return {
    sendText: (input) =>
      client.call("sendMessage", withMarkup({
        chat_id: input.chatId,
        text: input.text,
        parse_mode: "HTML",
      }, input.replyMarkup)),

    sendAttachment: (input) => {
      const method = attachmentMethod(input.attachment);
      return client.call(method, withMarkup({
        chat_id: input.chatId,
        [input.attachment.kind]: input.attachment.fileId,
        caption: input.caption,
        parse_mode: "HTML",
      }, input.replyMarkup));
    },

    answerCallback: (callbackId) =>
      client.call("answerCallbackQuery", { callback_query_id: callbackId }),

    deleteMessage: (chatId, messageId) =>
      client.call("deleteMessage", { chat_id: chatId, message_id: messageId }),
  };
}

export function attachmentMethod(attachment: Attachment): "sendDocument" | "sendPhoto" {
  return attachment.kind === "document" ? "sendDocument" : "sendPhoto";
}

function withMarkup(
  params: Record<string, unknown>,
  replyMarkup: ReplyMarkup | null | undefined,
): Record<string, unknown> {
  return replyMarkup ? { ...params, reply_markup: replyMarkup } : params;
}

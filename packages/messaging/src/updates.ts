export type AttachmentKind = "document" | "photo";

export type Attachment = {
  fileId: string;
  kind: AttachmentKind;
};

export type InboundMessage = {
  kind: "message";
  updateId: number;
  chatId: number;
  userId: number;
  messageId: number | null;
  text: string;
  contactPhone: string | null;
  attachment: Attachment | null;
};

export type InboundCallback = {
  kind: "callback";
  updateId: number;
  callbackId: string;
  userId: number;
  chatId: number | null;
  messageId: number | null;
  data: string;
};

export type InboundUpdate = InboundMessage | InboundCallback;

export function readUpdateId(update: unknown): number | null {
  if (!isRecord(update)) {
    return null;
  }
  return readInteger(update.update_id);
}

/** Updates from the same user share a key so their handling never overlaps. */
export function updateSerialKey(update: InboundUpdate): string {
  return `user:${update.userId}`;
}

/**
 * Narrows a raw Bot API update to the two shapes this bot acts on. Anything
 * else (edited messages, channel posts, updates without a sender) is null.
 */
export function normalizeUpdate(update: unknown): InboundUpdate | null {
  if (!isRecord(update)) {
    return null;
  }
  const updateId = readInteger(update.update_id);
  if (updateId === null) {
    return null;
  }

  if (isRecord(update.callback_query)) {
    return normalizeCallback(updateId, update.callback_query);
  }
  if (isRecord(update.message)) {
    return normalizeMessage(updateId, update.message);
  }
  return null;
}

function normalizeMessage(updateId: number, message: Record<string, unknown>): InboundMessage | null {
  const chat = isRecord(message.chat) ? message.chat : null;
  const from = isRecord(message.from) ? message.from : null;
  const chatId = chat ? readInteger(chat.id) : null;
  const userId = from ? readInteger(from.id) : null;
  if (chatId === null || userId === null) {
    return null;
  }

  const text = typeof message.text === "string" ? message.text : "";
  const contact = isRecord(message.contact) ? message.contact : null;
  const contactPhone = contact && typeof contact.phone_number === "string" && contact.phone_number.trim()
    ? contact.phone_number.trim()
    : null;

  return {
    kind: "message",
    updateId,
    chatId,
    userId,
    messageId: readInteger(message.message_id),
    text,
    contactPhone,
    attachment: readAttachment(message),
  };
}

function normalizeCallback(updateId: number, query: Record<string, unknown>): InboundCallback | null {
  const from = isRecord(query.from) ? query.from : null;
  const userId = from ? readInteger(from.id) : null;
  const callbackId = typeof query.id === "string" ? query.id : null;
  if (userId === null || callbackId === null) {
    return null;
  }

  const message = isRecord(query.message) ? query.message : null;
  const chat = message && isRecord(message.chat) ? message.chat : null;

  return {
    kind: "callback",
    updateId,
    callbackId,
    userId,
    chatId: chat ? readInteger(chat.id) : null,
    messageId: message ? readInteger(message.message_id) : null,
    data: typeof query.data === "string" ? query.data : "",
  };
}

function readAttachment(message: Record<string, unknown>): Attachment | null {
  if (isRecord(message.document) && typeof message.document.file_id === "string") {
    return { fileId: message.document.file_id, kind: "document" };
  }

  if (!Array.isArray(message.photo) || message.photo.length === 0) {
    return null;
  }

  let best: { fileId: string; area: number } | null = null;
  let last: string | null = null;
  for (const size of message.photo) {
    if (!isRecord(size) || typeof size.file_id !== "string") {
      continue;
    }
    last = size.file_id;
    const width = readInteger(size.width);
    const height = readInteger(size.height);
    if (width === null || height === null) {
      continue;
    }
    const area = width * height;
    if (!best || area > best.area) {
      best = { fileId: size.file_id, area };
    }
  }

  const fileId = best?.fileId ?? last;
  return fileId ? { fileId, kind: "photo" } : null;
}

function readInteger(value: unknown): number | null {
  return typeof value === "number" && Number.isInteger(value) ? value : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

import { describe, expect, it } from "vitest";
import { normalizeUpdate, readUpdateId, updateSerialKey } from "./updates";

const sender = { id: 501, is_bot: false, first_name: "Test" };
const chat = { id: 501, type: "private" };

describe("normalizeUpdate", () => {
  it("reads text messages", () => {
    expect(normalizeUpdate({
      update_id: 10,
      message: { message_id: 3, from: sender, chat, text: "/start" },
    })).toEqual({
      kind: "message",
      updateId: 10,
      chatId: 501,
      userId: 501,
      messageId: 3,
      text: "/start",
      contactPhone: null,
      attachment: null,
    });
  });

  it("takes a shared contact's phone number", () => {
    const update = normalizeUpdate({
      update_id: 11,
      message: { message_id: 4, from: sender, chat, contact: { phone_number: "+998901234567", first_name: "Test" } },
    });
    expect(update).toMatchObject({ kind: "message", text: "", contactPhone: "+998901234567" });
  });

  it("prefers a document over photos", () => {
    const update = normalizeUpdate({
      update_id: 12,
      message: {
        message_id: 5,
        from: sender,
        chat,
        document: { file_id: "doc-1" },
        photo: [{ file_id: "photo-small", width: 90, height: 90 }],
      },
    });
    expect(update).toMatchObject({ attachment: { fileId: "doc-1", kind: "document" } });
  });

  it("picks the largest photo variant", () => {
    const update = normalizeUpdate({
      update_id: 13,
      message: {
        message_id: 6,
        from: sender,
        chat,
        photo: [
          { file_id: "photo-mid", width: 320, height: 320 },
          { file_id: "photo-large", width: 1280, height: 960 },
          { file_id: "photo-small", width: 90, height: 90 },
        ],
      },
    });
    expect(update).toMatchObject({ attachment: { fileId: "photo-large", kind: "photo" } });
  });

  it("reads callback queries", () => {
    expect(normalizeUpdate({
      update_id: 14,
      callback_query: {
        id: "cb-1",
        from: sender,
        data: "page_10",
        message: { message_id: 99, chat: { id: -100 } },
      },
    })).toEqual({
      kind: "callback",
      updateId: 14,
      callbackId: "cb-1",
      userId: 501,
      chatId: -100,
      messageId: 99,
      data: "page_10",
    });
  });

  it("ignores updates it does not handle", () => {
    expect(normalizeUpdate({ update_id: 15, edited_message: { text: "x" } })).toBeNull();
    expect(normalizeUpdate({ message: { from: sender, chat, text: "x" } })).toBeNull();
    expect(normalizeUpdate("nope")).toBeNull();
  });
});

describe("update keys", () => {
  it("serializes by sender and reads integer update ids only", () => {
    const message = normalizeUpdate({ update_id: 1, message: { from: sender, chat, text: "a" } });
    expect(message && updateSerialKey(message)).toBe("user:501");
    expect(readUpdateId({ update_id: 3 })).toBe(3);
    expect(readUpdateId({ update_id: "3" })).toBeNull();
  });
});

import { describe, expect, it } from "vitest";
import {
  mainMenuKeyboard,
  paginationKeyboard,
  parsePageCallback,
  phoneKeyboard,
} from "./keyboards";
import { label } from "./templates/labels";

describe("reply keyboards", () => {
  it("shows the admin button to the reviewer only", () => {
    const applicant = mainMenuKeyboard("en", { isReviewer: false });
    const reviewer = mainMenuKeyboard("en", { isReviewer: true });

    expect(applicant.keyboard.at(-1)).toEqual([{ text: label("menu_lang", "en") }]);
    expect(reviewer.keyboard.at(-1)).toEqual([
      { text: label("menu_lang", "en") },
      { text: label("menu_admin", "en") },
    ]);
  });

  it("asks for the contact on the phone step", () => {
    expect(phoneKeyboard("en").keyboard[0]).toEqual([{ text: "📱 Send contact", request_contact: true }]);
  });
});

describe("pagination", () => {
  it("offers only the directions that exist", () => {
    expect(paginationKeyboard("en", { offset: 0, pageSize: 10, hasMore: true })).toEqual({
      inline_keyboard: [[{ text: "Next ➡️", callback_data: "page_10" }]],
    });
    expect(paginationKeyboard("en", { offset: 10, pageSize: 10, hasMore: false })).toEqual({
      inline_keyboard: [[{ text: "⬅️ Previous", callback_data: "page_0" }]],
    });
    expect(paginationKeyboard("en", { offset: 0, pageSize: 10, hasMore: false })).toBeNull();
  });

  it("never points the previous page below zero", () => {
    const keyboard = paginationKeyboard("en", { offset: 4, pageSize: 10, hasMore: true });
    expect(keyboard?.inline_keyboard[0]?.map((button) => button.callback_data)).toEqual(["page_0", "page_14"]);
  });

  it("parses page callbacks and ignores anything else", () => {
    expect(parsePageCallback("page_20")).toBe(20);
    expect(parsePageCallback("page_-5")).toBeNull();
    expect(parsePageCallback("page_")).toBeNull();
    expect(parsePageCallback("noop")).toBeNull();
  });
});

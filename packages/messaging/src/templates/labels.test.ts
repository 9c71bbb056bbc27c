import { describe, expect, it } from "vitest";
import { DEFAULT_LANGUAGE, LANGUAGES, label, labelIndex, parseLanguage, positionCategories, renderLabel } from "./labels";
import labelTable from "./labels.json";

describe("label table", () => {
  it("translates every key into every language", () => {
    for (const [key, translations] of Object.entries(labelTable.labels)) {
      for (const language of LANGUAGES) {
        expect(translations[language], `${key}.${language}`).toBeTruthy();
      }
    }
  });

  it("offers the other-position category in every language", () => {
    for (const language of LANGUAGES) {
      expect(positionCategories(language).flat()).toContain(label("other_pos", language));
    }
  });

  it("fills placeholders", () => {
    expect(renderLabel("admin_page", "en", { page: 3 })).toBe("Page: 3");
    expect(renderLabel("admin_stats_title", "en", {})).toBe("📊 {days}-day analytical report");
  });

  it("parses language codes", () => {
    expect(parseLanguage(" ru ")).toBe("ru");
    expect(parseLanguage("de")).toBeNull();
    expect(DEFAULT_LANGUAGE).toBe("uz");
  });
});

describe("LabelIndex", () => {
  it("resolves button text in the caller's language", () => {
    expect(labelIndex.find(label("menu_jobs", "en"), "en", "start_application")).toEqual({
      kind: "start_application",
    });
    expect(labelIndex.find(label("lang_ru", "uz"), "uz", "set_language")).toEqual({
      kind: "set_language",
      language: "ru",
    });
  });

  it("falls back to labels of other languages", () => {
    expect(labelIndex.find(label("cancel", "ru"), "en", "cancel")).toEqual({ kind: "cancel" });
  });

  it("returns every action sharing a label", () => {
    const kinds = labelIndex.resolve(label("back", "en"), "en").map((action) => action.kind);
    expect(kinds).toEqual(["back", "admin_back"]);
  });

  it("returns nothing for free text", () => {
    expect(labelIndex.resolve("Ali Valiyev", "uz")).toEqual([]);
    expect(labelIndex.find("Ali Valiyev", "uz", "cancel")).toBeNull();
  });
});

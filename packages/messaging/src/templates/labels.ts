import labelTable from "./labels.json";

export const LANGUAGES = ["uz", "uz_cyrl", "en", "ru"] as const;
export type Language = (typeof LANGUAGES)[number];

export const DEFAULT_LANGUAGE: Language = "uz";

export type LabelKey = keyof typeof labelTable.labels;

const LABELS: Record<LabelKey, Record<Language, string>> = labelTable.labels;
const POSITION_CATEGORIES: Record<Language, string[][]> = labelTable.position_categories;

export function isLanguage(value: unknown): value is Language {
  return typeof value === "string" && LANGUAGES.some((language) => language === value);
}

export function parseLanguage(value: string): Language | null {
  const normalized = value.trim();
  return isLanguage(normalized) ? normalized : null;
}

export function label(key: LabelKey, language: Language): string {
  return LABELS[key][language] || LABELS[key][DEFAULT_LANGUAGE];
}

/** Fills `{name}` placeholders. Unknown placeholders are left as written. */
export function renderLabel(
  key: LabelKey,
  language: Language,
  params: Readonly<Record<string, string | number>>,
): string {
  return label(key, language).replace(/\{([a-z_]+)\}/g, (match, name: string) => {
    const value = params[name];
    return value === undefined ? match : String(value);
  });
}

export function positionCategories(language: Language): string[][] {
  return POSITION_CATEGORIES[language].map((row) => [...row]);
}

export type MainSection = "about" | "contact" | "location";

export type MenuAction =
  | { kind: "show_section"; section: MainSection }
  | { kind: "start_application" }
  | { kind: "open_language_menu" }
  | { kind: "set_language"; language: Language }
  | { kind: "open_admin" }
  | { kind: "back" }
  | { kind: "cancel" }
  | { kind: "skip" }
  | { kind: "other_position" }
  | { kind: "admin_list" }
  | { kind: "admin_search" }
  | { kind: "admin_stats" }
  | { kind: "admin_back" };

export type MenuActionKind = MenuAction["kind"];

export const MENU_ACTION_LABELS: ReadonlyArray<{ key: LabelKey; action: MenuAction }> = [
  { key: "menu_about", action: { kind: "show_section", section: "about" } },
  { key: "menu_contact", action: { kind: "show_section", section: "contact" } },
  { key: "menu_location", action: { kind: "show_section", section: "location" } },
  { key: "menu_jobs", action: { kind: "start_application" } },
  { key: "menu_lang", action: { kind: "open_language_menu" } },
  { key: "menu_admin", action: { kind: "open_admin" } },
  { key: "lang_uz", action: { kind: "set_language", language: "uz" } },
  { key: "lang_uz_cyrl", action: { kind: "set_language", language: "uz_cyrl" } },
  { key: "lang_en", action: { kind: "set_language", language: "en" } },
  { key: "lang_ru", action: { kind: "set_language", language: "ru" } },
  { key: "back", action: { kind: "back" } },
  { key: "cancel", action: { kind: "cancel" } },
  { key: "skip", action: { kind: "skip" } },
  { key: "other_pos", action: { kind: "other_position" } },
  { key: "admin_apps", action: { kind: "admin_list" } },
  { key: "admin_search", action: { kind: "admin_search" } },
  { key: "admin_stats", action: { kind: "admin_stats" } },
  { key: "admin_back", action: { kind: "admin_back" } },
];

/**
 * Reverse lookup from button text to menu actions, built once.
 *
 * The same text can stand for several actions ("Back" is both the language-menu
 * back and the admin back), so lookups return every match. Matches in the
 * caller's language win; the default language is consulted next, then the rest.
 */
export class LabelIndex {
  private readonly byText = new Map<string, Map<Language, MenuAction[]>>();

  constructor(entries: ReadonlyArray<{ key: LabelKey; action: MenuAction }> = MENU_ACTION_LABELS) {
    for (const entry of entries) {
      for (const language of LANGUAGES) {
        const text = label(entry.key, language);
        let perLanguage = this.byText.get(text);
        if (!perLanguage) {
          perLanguage = new Map();
          this.byText.set(text, perLanguage);
        }
        const actions = perLanguage.get(language) ?? [];
        actions.push(entry.action);
        perLanguage.set(language, actions);
      }
    }
  }

  resolve(text: string, language: Language): MenuAction[] {
    const perLanguage = this.byText.get(text.trim());
    if (!perLanguage) {
      return [];
    }

    const order: Language[] = [
      language,
      DEFAULT_LANGUAGE,
      ...LANGUAGES.filter((candidate) => candidate !== language && candidate !== DEFAULT_LANGUAGE),
    ];
    for (const candidate of order) {
      const actions = perLanguage.get(candidate);
      if (actions && actions.length > 0) {
        return [...actions];
      }
    }
    return [];
  }

  find<K extends MenuActionKind>(
    text: string,
    language: Language,
    kind: K,
  ): Extract<MenuAction, { kind: K }> | null {
    for (const action of this.resolve(text, language)) {
      if (isActionOfKind(action, kind)) {
        return action;
      }
    }
    return null;
  }
}

export function isActionOfKind<K extends MenuActionKind>(
  action: MenuAction,
  kind: K,
): action is Extract<MenuAction, { kind: K }> {
  return action.kind === kind;
}

export const labelIndex = new LabelIndex();

import { label, positionCategories, type Language } from "./templates/labels.ts";

export type KeyboardButton = {
  text: string;
  request_contact?: boolean;
};

export type ReplyKeyboard = {
  keyboard: KeyboardButton[][];
  resize_keyboard: true;
  one_time_keyboard?: boolean;
};

export type InlineButton = {
  text: string;
  callback_data: string;
};

export type InlineKeyboard = {
  inline_keyboard: InlineButton[][];
};

export type RemoveKeyboard = {
  remove_keyboard: true;
};

export type ReplyMarkup = ReplyKeyboard | InlineKeyboard | RemoveKeyboard;

export const PAGE_CALLBACK_PREFIX = "page_";

function button(text: string): KeyboardButton {
  return { text };
}

export function mainMenuKeyboard(language: Language, options: { isReviewer: boolean }): ReplyKeyboard {
  const lastRow = [button(label("menu_lang", language))];
  if (options.isReviewer) {
    lastRow.push(button(label("menu_admin", language)));
  }

  return {
    keyboard: [
      [button(label("menu_jobs", language))],
      [button(label("menu_location", language)), button(label("menu_about", language))],
      [button(label("menu_contact", language))],
      lastRow,
    ],
    resize_keyboard: true,
  };
}

export function languageKeyboard(language: Language): ReplyKeyboard {
  return {
    keyboard: [
      [button(label("lang_uz", language)), button(label("lang_uz_cyrl", language))],
      [button(label("lang_en", language)), button(label("lang_ru", language))],
      [button(label("back", language))],
    ],
    resize_keyboard: true,
  };
}

export function adminKeyboard(language: Language): ReplyKeyboard {
  return {
    keyboard: [
      [button(label("admin_apps", language))],
      [button(label("admin_search", language))],
      [button(label("admin_stats", language))],
      [button(label("admin_back", language))],
    ],
    resize_keyboard: true,
  };
}

export function phoneKeyboard(language: Language): ReplyKeyboard {
  return {
    keyboard: [
      [{ text: label("send_contact", language), request_contact: true }],
      [button(label("cancel", language))],
    ],
    resize_keyboard: true,
    one_time_keyboard: true,
  };
}

export function positionKeyboard(language: Language): ReplyKeyboard {
  const rows = positionCategories(language).map((row) => row.map(button));
  rows.push([button(label("cancel", language))]);
  return { keyboard: rows, resize_keyboard: true };
}

export function cancelKeyboard(language: Language): ReplyKeyboard {
  return {
    keyboard: [[button(label("cancel", language))]],
    resize_keyboard: true,
  };
}

export function attachmentKeyboard(language: Language): ReplyKeyboard {
  return {
    keyboard: [[button(label("skip", language))], [button(label("cancel", language))]],
    resize_keyboard: true,
    one_time_keyboard: true,
  };
}

export function removeKeyboard(): RemoveKeyboard {
  return { remove_keyboard: true };
}

/** Forward/back controls for a page of results. Null when there is nowhere to go. */
export function paginationKeyboard(
  language: Language,
  input: { offset: number; pageSize: number; hasMore: boolean },
): InlineKeyboard | null {
  const row: InlineButton[] = [];
  if (input.offset > 0) {
    row.push({
      text: label("admin_prev", language),
      callback_data: `${PAGE_CALLBACK_PREFIX}${Math.max(0, input.offset - input.pageSize)}`,
    });
  }
  if (input.hasMore) {
    row.push({
      text: label("admin_next", language),
      callback_data: `${PAGE_CALLBACK_PREFIX}${input.offset + input.pageSize}`,
    });
  }
  return row.length > 0 ? { inline_keyboard: [row] } : null;
}

export function parsePageCallback(data: string): number | null {
  if (!data.startsWith(PAGE_CALLBACK_PREFIX)) {
    return null;
  }
  const raw = data.slice(PAGE_CALLBACK_PREFIX.length);
  if (!/^\d+$/.test(raw)) {
    return null;
  }
  return Number.parseInt(raw, 10);
}

import type { CompletedForm } from "../intake/intake-engine.ts";
import { stripLeadingIcon } from "../intake/validators.ts";
import { escapeHtml } from "../../../messaging/src/templates/html.ts";
import { label, renderLabel, type Language } from "../../../messaging/src/templates/labels.ts";
import type { Application } from "../../../db/src/types.ts";
import type { PositionStats } from "./admin-queries.ts";

export const MAX_CHUNK_LENGTH = 3500;
const BAR_CELLS = 10;
const SEPARATOR = "⎯".repeat(15);
const EMPTY_VALUE = "—";

/** dd.MM.yyyy HH:mm in the given IANA zone. */
export function formatTimestamp(value: string | Date, timeZone: string): string {
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    return EMPTY_VALUE;
  }

  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    day: "2-digit",
    month: "2-digit",
    year: "numeric",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((entry) => entry.type === type)?.value ?? "";

  return `${part("day")}.${part("month")}.${part("year")} ${part("hour")}:${part("minute")}`;
}

export function displayPosition(position: string, language: Language): string {
  const cleaned = stripLeadingIcon(position);
  return cleaned || label("unknown_position", language);
}

export function renderApplicationSummary(
  application: Application,
  index: number,
  language: Language,
  timeZone: string,
): string {
  return [
    `${index}. 👤 ${text(application.name)}`,
    `   💼 ${escapeHtml(displayPosition(application.position, language))}`,
    `   📞 ${text(application.phone)}`,
    `   📝 ${text(application.experience)}`,
    `   📅 ${formatTimestamp(application.createdAt, timeZone)}`,
  ].join("\n");
}

export function renderApplicationDetail(
  application: Application,
  language: Language,
  timeZone: string,
): string {
  return [
    `<b>${label("admin_detail_title", language)}</b>`,
    SEPARATOR,
    "",
    `👤 <b>${label("detail_candidate", language)}:</b> ${text(application.name)}`,
    `📞 <b>${label("detail_phone", language)}:</b> ${text(application.phone)}`,
    `💼 <b>${label("detail_position", language)}:</b> ${escapeHtml(displayPosition(application.position, language))}`,
    `📝 <b>${label("detail_experience", language)}:</b> ${text(application.experience)}`,
    `🕒 <b>${label("detail_date", language)}:</b> ${formatTimestamp(application.createdAt, timeZone)}`,
  ].join("\n");
}

export function renderReviewerNotification(form: CompletedForm, language: Language): string {
  return [
    `<b>${label("reviewer_new_application", language)}</b>`,
    "",
    `👤 ${label("detail_candidate", language)}: ${text(form.name)}`,
    `📞 ${label("reviewer_phone_short", language)}: ${text(form.phone)}`,
    `💼 ${label("detail_position", language)}: ${text(form.position)}`,
    `📝 ${label("detail_experience", language)}: ${text(form.experience)}`,
  ].join("\n");
}

export function progressBar(percent: number): string {
  const filled = Math.min(BAR_CELLS, Math.max(0, Math.floor((BAR_CELLS * percent) / 100)));
  return "🟢".repeat(filled) + "⚪".repeat(BAR_CELLS - filled);
}

export function dailyAverage(total: number, days: number): string {
  if (days <= 0) {
    return "0.0";
  }
  return (Math.round((total / days) * 10) / 10).toFixed(1);
}

export function renderStatsReport(input: {
  stats: PositionStats;
  days: number;
  language: Language;
  reportTime: string;
}): string {
  const { stats, days, language } = input;
  const lines = [
    `<b>${renderLabel("admin_stats_title", language, { days })}</b>`,
    SEPARATOR,
    `<b>${label("admin_stats_summary", language)}:</b>`,
    `🔹 ${label("admin_stats_total", language)}: <b>${stats.total}</b>`,
    `🔹 ${label("admin_stats_average", language)}: <b>${dailyAverage(stats.total, days)}</b>`,
    "",
    `<b>${label("admin_stats_positions", language)}:</b>`,
  ];

  for (const { position, count } of stats.counts) {
    const percent = stats.total > 0 ? (count / stats.total) * 100 : 0;
    lines.push(`\n<b>${escapeHtml(displayPosition(position, language))}</b>`);
    lines.push(`${progressBar(percent)}  ${count} (${percent.toFixed(1)}%)`);
  }

  lines.push(`\n${SEPARATOR}`);
  lines.push(`<i>${renderLabel("admin_stats_footer", language, { time: input.reportTime })}</i>`);
  return lines.join("\n");
}

/**
 * Splits on line boundaries so each chunk stays within `maxLength`. A single
 * line longer than the limit is cut into pieces of exactly `maxLength`.
 */
export function splitIntoChunks(value: string, maxLength: number = MAX_CHUNK_LENGTH): string[] {
  const chunks: string[] = [];
  let buffer = "";
  let hasBuffer = false;

  for (const line of value.split("\n")) {
    for (const piece of splitLongLine(line, maxLength)) {
      if (!hasBuffer) {
        buffer = piece;
        hasBuffer = true;
        continue;
      }
      const candidate = `${buffer}\n${piece}`;
      if (candidate.length > maxLength) {
        chunks.push(buffer);
        buffer = piece;
      } else {
        buffer = candidate;
      }
    }
  }

  if (hasBuffer && buffer) {
    chunks.push(buffer);
  }
  return chunks;
}

function splitLongLine(line: string, maxLength: number): string[] {
  if (line.length <= maxLength) {
    return [line];
  }
  // Lengths stay in UTF-16 units; a surrogate pair is never cut in half.
  const pieces: string[] = [];
  let piece = "";
  for (const codePoint of line) {
    if (piece && piece.length + codePoint.length > maxLength) {
      pieces.push(piece);
      piece = "";
    }
    piece += codePoint;
  }
  if (piece) {
    pieces.push(piece);
  }
  return pieces;
}

function text(value: string): string {
  const trimmed = value.trim();
  return trimmed ? escapeHtml(trimmed) : EMPTY_VALUE;
}

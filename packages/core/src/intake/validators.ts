import { labelIndex, type Language } from "../../../messaging/src/templates/labels.ts";

const MIN_NAME_LENGTH = 5;
const MIN_NAME_TOKENS = 2;
const MIN_PHONE_DIGITS = 9;
const MAX_PHONE_DIGITS = 15;
const MIN_REFINEMENT_LENGTH = 3;
const MIN_EXPERIENCE_LENGTH = 6;

const LEADING_ICON_PATTERN = /^[^\p{L}\p{N}\s]+\s+/u;

export function isValidName(text: string): boolean {
  const trimmed = text.trim();
  return trimmed.split(/\s+/).filter(Boolean).length >= MIN_NAME_TOKENS &&
    trimmed.length >= MIN_NAME_LENGTH;
}

/**
 * A shared contact is taken as-is. Typed numbers need 9 to 15 digits once
 * separators are dropped; the trimmed text is what gets stored.
 */
export function acceptPhone(text: string, contactPhone: string | null): string | null {
  if (contactPhone) {
    return contactPhone;
  }
  const digits = text.replace(/\D/g, "");
  if (digits.length < MIN_PHONE_DIGITS || digits.length > MAX_PHONE_DIGITS) {
    return null;
  }
  return text.trim();
}

export function isValidRefinement(text: string): boolean {
  return text.trim().length >= MIN_REFINEMENT_LENGTH;
}

export function isValidExperience(text: string): boolean {
  return text.trim().length >= MIN_EXPERIENCE_LENGTH;
}

/** "💼 Management" -> "Management". Text without a leading icon token is unchanged. */
export function stripLeadingIcon(text: string): string {
  return text.trim().replace(LEADING_ICON_PATTERN, "");
}

export function isOtherPositionCategory(category: string, language: Language): boolean {
  return labelIndex.find(category, language, "other_position") !== null;
}

export function composePosition(category: string, refinement: string, language: Language): string {
  const detail = refinement.trim();
  if (isOtherPositionCategory(category, language)) {
    return detail;
  }
  return `${stripLeadingIcon(category)} (${detail})`;
}

import {
  EXPERIENCE_MAX_YEARS,
  EXPERIENCE_MIN_YEARS,
  SKILL_MIN_LENGTH,
} from "../shared/constants";

const NAME_PATTERN = /^\p{L}[\p{L}\-' ]+\p{L}$/u;
const EMAIL_PATTERN = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;
const PHONE_DIGITS_PATTERN = /^\d{7,15}$/;
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const POSITION_PATTERN = /^[A-Za-z ]+$/;
const LOCATION_PATTERN = /^[A-Za-z ,-]+$/;
const LETTER_PATTERN = /\p{L}/u;

const STRICT_PHONE_LAYOUTS: readonly RegExp[] = [
  /^\+?1?\d{10}$/,
  /^\+?\d{10,15}$/,
  /^\(\d{3}\)\s?\d{3}-\d{4}$/,
  /^\d{3}-\d{3}-\d{4}$/,
];

export function isValidName(value: string): boolean {
  const trimmed = value.trim();
  return NAME_PATTERN.test(trimmed) && countWords(trimmed) >= 2;
}

export function isValidEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value.trim());
}

export function isValidPhone(value: string): boolean {
  const compact = value.trim().replace(/[\s-]/g, "");
  return PHONE_DIGITS_PATTERN.test(compact);
}

/**
 * Stricter phone check: no letters at all, 10-15 digits, and one of the
 * common layouts (international, `(555) 123-4567`, `555-123-4567`).
 */
export function isValidPhoneStrict(value: string): boolean {
  const trimmed = value.trim();
  if (containsLetter(trimmed)) {
    return false;
  }
  const digits = trimmed.replace(/\D/g, "");
  if (digits.length < 10 || digits.length > 15) {
    return false;
  }
  return STRICT_PHONE_LAYOUTS.some((layout) => layout.test(trimmed));
}

export function isValidExperience(value: string): boolean {
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return false;
  }
  const years = Number(trimmed);
  return Number.isFinite(years) && years >= EXPERIENCE_MIN_YEARS && years <= EXPERIENCE_MAX_YEARS;
}

export function isValidPosition(value: string): boolean {
  const trimmed = value.trim();
  return POSITION_PATTERN.test(trimmed) && trimmed.length >= 5 && countWords(trimmed) >= 2;
}

export function isValidLocation(value: string): boolean {
  const trimmed = value.trim();
  return LOCATION_PATTERN.test(trimmed) && trimmed.length >= 5 && countWords(trimmed) >= 2;
}

export function containsLetter(value: string): boolean {
  return LETTER_PATTERN.test(value);
}

export function parseSkills(techStackText: string): string[] {
  return techStackText
    .split(/[,;]/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function isValidSkillList(skills: readonly string[]): boolean {
  return skills.length > 0 && skills.every((skill) => skill.length >= SKILL_MIN_LENGTH);
}

function countWords(value: string): number {
  return value.split(/\s+/).filter((part) => part.length > 0).length;
}

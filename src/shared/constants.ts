export const EXIT_KEYWORDS: readonly string[] = ["exit", "quit", "goodbye", "bye"];

export const RETRY_CHOICE_KEYWORDS = {
  retry: "retry",
  skip: "skip",
  rephrase: "rephrase",
} as const;

export const QUESTION_MAX_ATTEMPTS = 3;
export const QUESTION_MIN_LENGTH = 6;
export const SKILL_MIN_LENGTH = 2;

export const EXPERIENCE_MIN_YEARS = 0;
export const EXPERIENCE_MAX_YEARS = 50;

export const ANSWER_KEY_PREFIX = "Q";

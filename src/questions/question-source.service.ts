import { callTextPromptSafe, TextCompletionClient } from "../ai/llm.safe";
import { buildScreeningQuestionV1Prompt } from "../ai/prompts/screening-question.v1.prompt";
import { Logger, logContext } from "../config/logger";
import { QUESTION_MAX_ATTEMPTS, QUESTION_MIN_LENGTH } from "../shared/constants";
import { ScreeningQuestion } from "../shared/types/intake.types";
import { buildDegradedQuestion, findFallbackQuestion } from "./fallback-question-bank";

const PROMPT_NAME = "screening_question_v1";

export class QuestionSourceService {
  constructor(
    private readonly llmClient: TextCompletionClient,
    private readonly logger: Logger,
    private readonly maxAttempts = QUESTION_MAX_ATTEMPTS,
  ) {}

  /**
   * Produces one screening question for `skill`. Generated text must be new
   * relative to `alreadyAsked`; after the attempts run out the static bank is
   * used, then a generic experience question tagged `error_fallback`.
   */
  async getQuestion(skill: string, alreadyAsked: ReadonlySet<string>): Promise<ScreeningQuestion> {
    const prompt = buildScreeningQuestionV1Prompt({ skill });

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      const safe = await callTextPromptSafe({
        llmClient: this.llmClient,
        logger: this.logger,
        prompt,
        promptName: PROMPT_NAME,
      });
      if (!safe.ok) {
        logContext(this.logger, "debug", "question.generation.failed", {
          skill,
          prompt_name: PROMPT_NAME,
          error_code: safe.error_code,
        }, { attempt });
        continue;
      }

      const text = normalizeQuestionText(safe.text);
      if (text.length < QUESTION_MIN_LENGTH) {
        logContext(this.logger, "debug", "question.generation.too_short", {
          skill,
          prompt_name: PROMPT_NAME,
        }, { attempt });
        continue;
      }
      if (alreadyAsked.has(text)) {
        logContext(this.logger, "debug", "question.generation.duplicate", {
          skill,
          prompt_name: PROMPT_NAME,
        }, { attempt });
        continue;
      }

      return { text, skill, source: "generated" };
    }

    const banked = findFallbackQuestion(skill);
    if (banked) {
      logContext(this.logger, "info", "question.fallback.bank", { skill });
      return { text: banked, skill, source: "fallback" };
    }

    logContext(this.logger, "warn", "question.fallback.degraded", { skill }, {
      attempts: this.maxAttempts,
    });
    return { text: buildDegradedQuestion(skill), skill, source: "error_fallback" };
  }
}

export function normalizeQuestionText(raw: string): string {
  return raw
    .replace(/\s+/g, " ")
    .trim()
    .replace(/^question\s*\d*\s*[:.]\s*/i, "")
    .replace(/^[Qq]\d*[:.]\s*/, "")
    .replace(/^\d+\s*[.)]\s*/, "")
    .replace(/^[-•*]\s*/, "")
    .replace(/^["'“]+|["'”]+$/g, "")
    .trim();
}

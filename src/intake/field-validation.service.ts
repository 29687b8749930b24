import { CompletionContext } from "../ai/llm.client";
import { callTextPromptSafe, TextCompletionClient } from "../ai/llm.safe";
import { buildFieldValidationV1Prompt } from "../ai/prompts/field-validation.v1.prompt";
import { Logger, logContext } from "../config/logger";
import { ProfileField } from "../shared/types/intake.types";
import {
  containsLetter,
  isValidEmail,
  isValidExperience,
  isValidLocation,
  isValidName,
  isValidPhone,
  isValidPhoneStrict,
  isValidPosition,
} from "./validators";

const PROMPT_NAME = "field_validation_v1";

export type FieldValidationOutcome =
  | { accepted: true; acceptedBy: "advisory" | "local" }
  | { accepted: false; reason: "letters_in_phone" | "invalid" };

interface FieldRule {
  label: string;
  validate(value: string): boolean;
}

export interface FieldValidationOptions {
  strictPhoneValidation: boolean;
}

export class FieldValidationService {
  private readonly rules: Record<ProfileField, FieldRule>;

  constructor(
    private readonly llmClient: TextCompletionClient,
    private readonly logger: Logger,
    options: FieldValidationOptions,
  ) {
    this.rules = {
      name: { label: "name", validate: isValidName },
      email: { label: "email", validate: isValidEmail },
      phone: {
        label: "phone number",
        validate: options.strictPhoneValidation ? isValidPhoneStrict : isValidPhone,
      },
      experience: { label: "years of professional experience", validate: isValidExperience },
      position: { label: "job position", validate: isValidPosition },
      location: { label: "location", validate: isValidLocation },
    };
  }

  /**
   * Advisory opinion first, local validator second: the model can only add
   * acceptances, never block a value the local check accepts.
   */
  async validate(
    field: ProfileField,
    value: string,
    context?: CompletionContext,
  ): Promise<FieldValidationOutcome> {
    if (field === "phone" && containsLetter(value)) {
      return { accepted: false, reason: "letters_in_phone" };
    }

    const rule = this.rules[field];
    const advisoryAccepted = await this.askAdvisoryOpinion(rule.label, value, context);
    if (advisoryAccepted) {
      return { accepted: true, acceptedBy: "advisory" };
    }

    if (rule.validate(value)) {
      logContext(this.logger, "debug", "field.validation.local_override", {
        field,
        accepted_by: "local",
      });
      return { accepted: true, acceptedBy: "local" };
    }
    return { accepted: false, reason: "invalid" };
  }

  private async askAdvisoryOpinion(
    fieldLabel: string,
    value: string,
    context?: CompletionContext,
  ): Promise<boolean> {
    const safe = await callTextPromptSafe({
      llmClient: this.llmClient,
      logger: this.logger,
      prompt: buildFieldValidationV1Prompt({ fieldLabel, value }),
      promptName: PROMPT_NAME,
      context,
    });
    if (!safe.ok) {
      return false;
    }
    return safe.text.trim().toLowerCase().startsWith("yes");
  }
}

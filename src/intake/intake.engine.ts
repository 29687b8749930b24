import { CompletionContext } from "../ai/llm.client";
import { Logger, logContext } from "../config/logger";
import { buildCandidateDocument } from "../profiles/candidate-document.builder";
import {
  ANSWER_KEY_PREFIX,
  EXIT_KEYWORDS,
  RETRY_CHOICE_KEYWORDS,
  SKILL_MIN_LENGTH,
} from "../shared/constants";
import {
  IntakeSession,
  IntakeTurnResult,
  ProfileField,
  ScreeningQuestion,
} from "../shared/types/intake.types";
import { transitionSession } from "../state/session.service";
import { SessionStore } from "../storage/session-store";
import {
  completionMessage,
  correctiveMessage,
  degradedQuestionNote,
  farewellMessage,
  fallbackMessage,
  firstQuestionMessage,
  invalidSkillNameMessage,
  invalidTechStackMessage,
  nextFieldPromptMessage,
  nextQuestionMessage,
  regeneratedQuestionMessage,
  rephraseSkillPrompt,
  skillUpdatedMessage,
  techStackGenerationFailedMessage,
  welcomeMessage,
} from "../ui/messages";
import { FieldValidationOutcome } from "./field-validation.service";
import { scoreSentiment } from "./sentiment";
import { isValidSkillList, parseSkills } from "./validators";

export interface QuestionSource {
  getQuestion(skill: string, alreadyAsked: ReadonlySet<string>): Promise<ScreeningQuestion>;
}

export interface FieldValidator {
  validate(field: ProfileField, value: string, context?: CompletionContext): Promise<FieldValidationOutcome>;
}

const NEXT_STAGE: Record<ProfileField, Exclude<ProfileField, "name"> | "tech_stack"> = {
  name: "email",
  email: "phone",
  phone: "experience",
  experience: "position",
  position: "location",
  location: "tech_stack",
};

export class IntakeEngine {
  private readonly turns = new Map<string, Promise<void>>();

  constructor(
    private readonly questionSource: QuestionSource,
    private readonly fieldValidator: FieldValidator,
    private readonly store: SessionStore,
    private readonly logger: Logger,
  ) {}

  async start(session: IntakeSession): Promise<IntakeTurnResult> {
    return this.enqueue(session.id, async () => {
      const reply = welcomeMessage();
      transitionSession(session, "name");
      this.appendTranscript(session, "assistant", reply);
      await this.writeAudit(session);
      return { reply, stage: session.stage, ended: false };
    });
  }

  /** Turns on one session run strictly one after another, in arrival order. */
  async handleMessage(session: IntakeSession, rawText: string): Promise<IntakeTurnResult> {
    return this.enqueue(session.id, () => this.processTurn(session, rawText));
  }

  private async processTurn(session: IntakeSession, rawText: string): Promise<IntakeTurnResult> {
    const startedAt = Date.now();
    const fromStage = session.stage;
    const text = rawText.trim();

    this.appendTranscript(session, "user", text);
    const reply = await this.dispatch(session, text);
    this.appendTranscript(session, "assistant", reply);
    await this.writeAudit(session);

    logContext(this.logger, "info", "intake.turn.processed", {
      session_id: session.id,
      stage: fromStage,
      next_stage: session.stage,
      latency_ms: Date.now() - startedAt,
    });
    return { reply, stage: session.stage, ended: session.stage === "ended" };
  }

  private async enqueue<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.turns.get(sessionId) ?? Promise.resolve();
    const current = previous.then(task);
    const settled = current.then(
      () => undefined,
      () => undefined,
    );
    this.turns.set(sessionId, settled);
    try {
      return await current;
    } finally {
      if (this.turns.get(sessionId) === settled) {
        this.turns.delete(sessionId);
      }
    }
  }

  private async dispatch(session: IntakeSession, text: string): Promise<string> {
    if (isExitCommand(text)) {
      return this.endConversation(session);
    }

    switch (session.stage) {
      case "greeting":
        transitionSession(session, "name");
        return welcomeMessage();
      case "name":
      case "email":
      case "phone":
      case "experience":
      case "position":
      case "location":
        return this.handleField(session, session.stage, text);
      case "tech_stack":
        return this.handleTechStack(session, text);
      case "tech_questions":
        return this.handleAnswer(session, text);
      case "retry_choice":
        return this.handleRetryChoice(session, text);
      case "rephrase_skill":
        return this.handleRephraseSkill(session, text);
      default:
        return fallbackMessage(session.record.name, session.record.position);
    }
  }

  private async handleField(session: IntakeSession, field: ProfileField, text: string): Promise<string> {
    const outcome = await this.fieldValidator.validate(field, text, buildCompletionContext(session));
    if (!outcome.accepted) {
      logContext(this.logger, "debug", "intake.field.rejected", {
        session_id: session.id,
        field,
        error_code: outcome.reason,
      });
      return correctiveMessage(field, outcome.reason);
    }

    const next = NEXT_STAGE[field];
    transitionSession(session, next);
    session.record[field] = text;
    logContext(this.logger, "debug", "intake.field.accepted", {
      session_id: session.id,
      field,
      accepted_by: outcome.acceptedBy,
    });
    return nextFieldPromptMessage(next, session.record.name);
  }

  private async handleTechStack(session: IntakeSession, text: string): Promise<string> {
    const skills = parseSkills(text);
    if (!isValidSkillList(skills)) {
      return invalidTechStackMessage();
    }

    const questions: ScreeningQuestion[] = [];
    const asked = new Set<string>();
    for (const skill of skills) {
      const question = await this.questionSource.getQuestion(skill, asked);
      questions.push(question);
      asked.add(question.text);
    }

    if (questions.every((question) => question.source === "error_fallback")) {
      logContext(this.logger, "warn", "intake.tech_stack.no_usable_questions", {
        session_id: session.id,
      }, { skills });
      return techStackGenerationFailedMessage();
    }

    transitionSession(session, "tech_questions");
    session.record.techStack = text;
    session.record.skills = skills;
    session.record.questions = questions;
    session.record.answers = {};
    session.questionCursor = 0;
    return this.presentCurrentQuestion(session, (question) =>
      firstQuestionMessage(question.text, session.record.name),
    );
  }

  private async handleAnswer(session: IntakeSession, text: string): Promise<string> {
    const index = session.questionCursor;
    session.record.answers[`${ANSWER_KEY_PREFIX}${index + 1}`] = text;
    session.questionCursor = index + 1;
    return this.advance(session);
  }

  private async handleRetryChoice(session: IntakeSession, text: string): Promise<string> {
    const choice = text.toLowerCase();
    const current = session.record.questions[session.questionCursor];

    if (choice === RETRY_CHOICE_KEYWORDS.retry) {
      const question = await this.regenerateQuestion(session, current.skill);
      transitionSession(session, "tech_questions");
      return this.presentCurrentQuestion(session, () => regeneratedQuestionMessage(question.text, question.skill));
    }
    if (choice === RETRY_CHOICE_KEYWORDS.skip) {
      logContext(this.logger, "info", "intake.question.skipped", {
        session_id: session.id,
        skill: current.skill,
      });
      session.questionCursor += 1;
      return this.advance(session);
    }
    if (choice === RETRY_CHOICE_KEYWORDS.rephrase) {
      transitionSession(session, "rephrase_skill");
      return rephraseSkillPrompt(current.skill);
    }
    return this.handleAnswer(session, text);
  }

  private async handleRephraseSkill(session: IntakeSession, text: string): Promise<string> {
    if (text.length < SKILL_MIN_LENGTH) {
      return invalidSkillNameMessage();
    }
    session.record.skills[session.questionCursor] = text;
    const question = await this.regenerateQuestion(session, text);
    transitionSession(session, "tech_questions");
    return this.presentCurrentQuestion(session, () => skillUpdatedMessage(question.text, text));
  }

  private async regenerateQuestion(session: IntakeSession, skill: string): Promise<ScreeningQuestion> {
    const index = session.questionCursor;
    const asked = new Set(
      session.record.questions.filter((_, position) => position !== index).map((question) => question.text),
    );
    const question = await this.questionSource.getQuestion(skill, asked);
    session.record.questions[index] = question;
    return question;
  }

  private async advance(session: IntakeSession): Promise<string> {
    if (session.questionCursor >= session.record.questions.length) {
      return this.complete(session);
    }
    if (session.stage !== "tech_questions") {
      transitionSession(session, "tech_questions");
    }
    return this.presentCurrentQuestion(session, (question) =>
      nextQuestionMessage(question.text, session.record.name),
    );
  }

  private presentCurrentQuestion(
    session: IntakeSession,
    format: (question: ScreeningQuestion) => string,
  ): string {
    const question = session.record.questions[session.questionCursor];
    const message = format(question);
    if (question.source !== "error_fallback") {
      return message;
    }
    transitionSession(session, "retry_choice");
    return `${message}\n\n${degradedQuestionNote(question.skill)}`;
  }

  private async complete(session: IntakeSession): Promise<string> {
    transitionSession(session, "completed");
    const message = completionMessage(session.record.name, session.record.position);
    if (!this.store.isEnabled()) {
      return message;
    }

    try {
      session.record.persistenceStatus = await this.store.insertFinal(buildCandidateDocument(session));
    } catch (error) {
      session.record.persistenceStatus = "failure";
      this.logger.error("intake.persist.failed", {
        sessionId: session.id,
        error: error instanceof Error ? error.message : "Unknown error",
      });
    }
    logContext(this.logger, "info", "intake.completed", {
      session_id: session.id,
      ok: session.record.persistenceStatus === "success",
    });
    return message;
  }

  private endConversation(session: IntakeSession): string {
    if (session.stage !== "ended") {
      transitionSession(session, "ended");
    }
    return farewellMessage(session.record.persistenceStatus, session.record.name, session.record.position);
  }

  private async writeAudit(session: IntakeSession): Promise<void> {
    if (!this.store.isEnabled()) {
      return;
    }
    try {
      await this.store.insertAudit(session.transcript, buildCandidateDocument(session));
    } catch (error) {
      this.logger.warn("intake.audit.failed", {
        sessionId: session.id,
        error: error instanceof Error ? error.message : "Unknown error",
      });
    }
  }

  private appendTranscript(session: IntakeSession, role: "user" | "assistant", content: string): void {
    const at = new Date().toISOString();
    if (role === "user") {
      session.transcript.push({ role, content, at, sentiment: scoreSentiment(content) });
    } else {
      session.transcript.push({ role, content, at });
    }
    session.updatedAt = at;
  }
}

export function isExitCommand(text: string): boolean {
  return EXIT_KEYWORDS.includes(text.trim().toLowerCase());
}

function buildCompletionContext(session: IntakeSession): CompletionContext {
  const record = session.record;
  return {
    stage: session.stage,
    candidate: {
      name: record.name,
      email: record.email,
      phone: record.phone,
      experience: record.experience,
      position: record.position,
      location: record.location,
    },
  };
}

import assert from "node:assert/strict";
import { FieldValidationOutcome, FieldValidationService } from "../../intake/field-validation.service";
import { IntakeEngine } from "../../intake/intake.engine";
import { QuestionSourceService } from "../../questions/question-source.service";
import { IntakeSession } from "../../shared/types/intake.types";
import { createSession } from "../../state/session.service";
import { createScriptedLlm, FakeLlm, noopLogger, RecordingStore, skillFromPrompt } from "../support/fakes";

const PROFILE_ANSWERS = [
  "John Smith",
  "john@email.com",
  "555-123-4567",
  "5",
  "Backend Engineer",
  "Berlin, Germany",
];

function basicsQuestion(skill: string): string {
  return `How would you explain the basics of ${skill} to a new teammate?`;
}

function buildEngine(llm: FakeLlm = createScriptedLlm(), store = new RecordingStore()): IntakeEngine {
  return new IntakeEngine(
    new QuestionSourceService(llm, noopLogger),
    new FieldValidationService(llm, noopLogger, { strictPhoneValidation: false }),
    store,
    noopLogger,
  );
}

async function reachTechStack(engine: IntakeEngine): Promise<IntakeSession> {
  const session = createSession();
  await engine.start(session);
  for (const text of PROFILE_ANSWERS) {
    await engine.handleMessage(session, text);
  }
  assert.equal(session.stage, "tech_stack");
  return session;
}

/** Generates for every skill except Elixir until `elixir.available` flips. */
function flakyElixirLlm(elixir: { available: boolean }): FakeLlm {
  return createScriptedLlm({
    question: (prompt) => {
      const skill = skillFromPrompt(prompt);
      if (skill === "Elixir" && !elixir.available) {
        throw new Error("LLM API error: HTTP 500 - model crashed");
      }
      return basicsQuestion(skill);
    },
  });
}

async function testStartGreetsAndAsksForName(): Promise<void> {
  const engine = buildEngine();
  const session = createSession();

  const turn = await engine.start(session);

  assert.equal(turn.stage, "name");
  assert.equal(turn.ended, false);
  assert.ok(turn.reply.endsWith("Let's get started! What's your full name?"));
  assert.deepEqual(session.transcript.map((entry) => entry.role), ["assistant"]);
}

async function testMessageInGreetingStartsTheScript(): Promise<void> {
  const engine = buildEngine();
  const session = createSession();

  const turn = await engine.handleMessage(session, "hi");

  assert.equal(turn.stage, "name");
  assert.ok(turn.reply.startsWith("👋 Hello!"));
}

async function testNameIsAcceptedAndUsed(): Promise<void> {
  const engine = buildEngine();
  const session = createSession();
  await engine.start(session);

  const turn = await engine.handleMessage(session, "John Smith");

  assert.equal(turn.stage, "email");
  assert.equal(session.record.name, "John Smith");
  assert.equal(turn.reply, "Thanks, John Smith! What's your email address?");
  assert.deepEqual(session.transcript.map((entry) => entry.role), ["assistant", "user", "assistant"]);
  assert.equal(session.transcript[1]?.content, "John Smith");
}

async function testInvalidEmailIsRejected(): Promise<void> {
  const engine = buildEngine();
  const session = createSession();
  await engine.start(session);
  await engine.handleMessage(session, "John Smith");

  const turn = await engine.handleMessage(session, "not-an-email");

  assert.equal(turn.stage, "email");
  assert.equal(session.record.email, undefined);
  assert.equal(turn.reply, "Please enter a valid email address (e.g., user@email.com).");
}

async function testPhoneWithLettersIsRejected(): Promise<void> {
  const engine = buildEngine();
  const session = createSession();
  await engine.start(session);
  await engine.handleMessage(session, "John Smith");
  await engine.handleMessage(session, "john@email.com");

  const turn = await engine.handleMessage(session, "555-CALL-NOW");

  assert.equal(turn.stage, "phone");
  assert.equal(turn.reply, "Please enter a valid phone number (digits only, no letters).");
}

async function testFullFlowPersistsAndSaysGoodbye(): Promise<void> {
  const store = new RecordingStore();
  const engine = buildEngine(createScriptedLlm(), store);
  const session = await reachTechStack(engine);

  const stack = await engine.handleMessage(session, "Python, Docker");
  assert.equal(stack.stage, "tech_questions");
  assert.deepEqual(session.record.skills, ["Python", "Docker"]);
  assert.equal(session.record.questions.length, 2);
  assert.equal(session.record.questions[0]?.skill, "Python");
  assert.equal(
    stack.reply,
    `Great, John Smith! Here is your technical question:\n\n${basicsQuestion("Python")}`,
  );

  const second = await engine.handleMessage(session, "Generators, decorators and typing.");
  assert.equal(
    second.reply,
    `Thank you, John Smith! Here is your next technical question:\n\n${basicsQuestion("Docker")}`,
  );

  const done = await engine.handleMessage(session, "Images, containers and compose files.");
  assert.equal(done.stage, "completed");
  assert.equal(
    done.reply,
    "Thank you for answering all the questions! John Smith, we'll be in touch regarding the Backend Engineer position. If you have anything else to add, let me know. Otherwise, type 'exit' to finish.",
  );
  assert.deepEqual(session.record.answers, {
    Q1: "Generators, decorators and typing.",
    Q2: "Images, containers and compose files.",
  });
  assert.equal(session.record.persistenceStatus, "success");
  assert.equal(store.finals.length, 1);
  assert.equal(store.finals[0]?.email, "john@email.com");
  assert.deepEqual(store.finals[0]?.skills, ["Python", "Docker"]);

  const bye = await engine.handleMessage(session, "exit");
  assert.equal(bye.stage, "ended");
  assert.equal(bye.ended, true);
  assert.equal(
    bye.reply,
    "Thank you, your answers have been saved. John Smith, we'll be in touch regarding the Backend Engineer position. You can close the window now.",
  );
  assert.equal(store.audits.length, 11);
  assert.deepEqual(store.audits[0]?.transcript.map((entry) => entry.role), ["assistant"]);
  assert.equal(store.audits[10]?.transcript.length, 21);
}

async function testEveryDeclaredSkillGetsAUniqueQuestion(): Promise<void> {
  const engine = buildEngine();
  const session = await reachTechStack(engine);

  await engine.handleMessage(session, "Python, Docker, SQL, Git");

  const texts = session.record.questions.map((question) => question.text);
  assert.equal(texts.length, 4);
  assert.equal(new Set(texts).size, 4);
  assert.deepEqual(
    session.record.questions.map((question) => question.skill),
    ["Python", "Docker", "SQL", "Git"],
  );
}

async function testRepeatedModelOutputFallsBackToBank(): Promise<void> {
  const llm = createScriptedLlm({ question: () => "What tool do you reach for first?" });
  const engine = buildEngine(llm);
  const session = await reachTechStack(engine);

  await engine.handleMessage(session, "Python, Docker");

  assert.deepEqual(session.record.questions, [
    { text: "What tool do you reach for first?", skill: "Python", source: "generated" },
    {
      text: "What is Docker and how does containerization benefit development workflows?",
      skill: "Docker",
      source: "fallback",
    },
  ]);
}

async function testInvalidTechStackIsRejected(): Promise<void> {
  const engine = buildEngine();
  const session = await reachTechStack(engine);

  const turn = await engine.handleMessage(session, "a, bb");

  assert.equal(turn.stage, "tech_stack");
  assert.deepEqual(session.record.skills, []);
  assert.equal(
    turn.reply,
    "Please enter at least one valid skill in your tech stack, each at least 2 characters (e.g., python, fastapi, langchain).",
  );
}

async function testTechStackWithOnlyDegradedQuestionsIsRetried(): Promise<void> {
  const llm = createScriptedLlm({
    question: () => {
      throw new Error("connect ECONNREFUSED 127.0.0.1:11434");
    },
  });
  const engine = buildEngine(llm);
  const session = await reachTechStack(engine);

  const turn = await engine.handleMessage(session, "Elixir, Haskell");

  assert.equal(turn.stage, "tech_stack");
  assert.deepEqual(session.record.questions, []);
  assert.equal(session.record.techStack, undefined);
  assert.equal(
    turn.reply,
    "I'm having trouble generating technical questions for your tech stack. Please try again or rephrase your tech stack.",
  );
}

async function testDegradedQuestionOffersRetry(): Promise<void> {
  const elixir = { available: false };
  const engine = buildEngine(flakyElixirLlm(elixir));
  const session = await reachTechStack(engine);

  const first = await engine.handleMessage(session, "Elixir, Python");
  assert.equal(first.stage, "retry_choice");
  assert.deepEqual(session.record.questions[0], {
    text: "What is your experience with Elixir? (Describe briefly.)",
    skill: "Elixir",
    source: "error_fallback",
  });
  assert.ok(first.reply.endsWith("'rephrase' to rename the skill."));

  elixir.available = true;
  const retried = await engine.handleMessage(session, "Retry");
  assert.equal(retried.stage, "tech_questions");
  assert.equal(retried.reply, `Here is a new question about Elixir:\n\n${basicsQuestion("Elixir")}`);
  assert.equal(session.record.questions[0]?.source, "generated");
  assert.equal(session.questionCursor, 0);
}

async function testSkipMovesToNextQuestion(): Promise<void> {
  const engine = buildEngine(flakyElixirLlm({ available: false }));
  const session = await reachTechStack(engine);
  await engine.handleMessage(session, "Elixir, Python");

  const skipped = await engine.handleMessage(session, "skip");
  assert.equal(skipped.stage, "tech_questions");
  assert.equal(
    skipped.reply,
    `Thank you, John Smith! Here is your next technical question:\n\n${basicsQuestion("Python")}`,
  );

  const done = await engine.handleMessage(session, "List comprehensions.");
  assert.equal(done.stage, "completed");
  assert.deepEqual(session.record.answers, { Q2: "List comprehensions." });
}

async function testRephraseReplacesSkill(): Promise<void> {
  const engine = buildEngine(flakyElixirLlm({ available: false }));
  const session = await reachTechStack(engine);
  await engine.handleMessage(session, "Elixir, Python");

  const prompt = await engine.handleMessage(session, "rephrase");
  assert.equal(prompt.stage, "rephrase_skill");
  assert.equal(prompt.reply, "Please enter a new skill name to replace 'Elixir':");

  const tooShort = await engine.handleMessage(session, "x");
  assert.equal(tooShort.stage, "rephrase_skill");
  assert.equal(tooShort.reply, "Please enter a valid skill name (at least 2 characters).");

  const updated = await engine.handleMessage(session, "Go");
  assert.equal(updated.stage, "tech_questions");
  assert.deepEqual(session.record.skills, ["Go", "Python"]);
  assert.equal(updated.reply, `Skill updated to 'Go'. Here is your technical question:\n\n${basicsQuestion("Go")}`);
}

async function testFreeTextInRetryChoiceAnswersDegradedQuestion(): Promise<void> {
  const engine = buildEngine(flakyElixirLlm({ available: false }));
  const session = await reachTechStack(engine);
  await engine.handleMessage(session, "Elixir, Python");

  const turn = await engine.handleMessage(session, "Two years of Phoenix apps.");

  assert.equal(turn.stage, "tech_questions");
  assert.deepEqual(session.record.answers, { Q1: "Two years of Phoenix apps." });
  assert.equal(session.questionCursor, 1);
}

async function testExitFarewellReflectsPersistenceStatus(): Promise<void> {
  const engine = buildEngine();

  const early = createSession();
  await engine.start(early);
  const earlyBye = await engine.handleMessage(early, "  QUIT ");
  assert.equal(earlyBye.stage, "ended");
  assert.equal(earlyBye.reply, "Thank you for your time! Have a great day! 👋");

  const named = createSession();
  await engine.start(named);
  await engine.handleMessage(named, "John Smith");
  const namedBye = await engine.handleMessage(named, "bye");
  assert.equal(namedBye.reply, "Thank you for your time! John Smith, Have a great day! 👋");

  const failingStore = new RecordingStore({ finalResult: "failure" });
  const failing = buildEngine(createScriptedLlm(), failingStore);
  const session = await reachTechStack(failing);
  await failing.handleMessage(session, "Python");
  await failing.handleMessage(session, "Generators.");
  assert.equal(session.record.persistenceStatus, "failure");
  const failedBye = await failing.handleMessage(session, "exit");
  assert.equal(
    failedBye.reply,
    "There was an issue saving your information. Error in storing your answers, please try again later.",
  );
}

async function testExitIsWholeMessageOnly(): Promise<void> {
  const engine = buildEngine();
  const session = await reachTechStack(engine);
  await engine.handleMessage(session, "Python");

  const turn = await engine.handleMessage(session, "I would exit the loop early");

  assert.equal(turn.stage, "completed");
  assert.deepEqual(session.record.answers, { Q1: "I would exit the loop early" });
}

async function testTerminalStagesAreIdempotent(): Promise<void> {
  const engine = buildEngine();
  const session = await reachTechStack(engine);
  await engine.handleMessage(session, "Python");
  await engine.handleMessage(session, "Generators.");

  const chatter = await engine.handleMessage(session, "anything else?");
  assert.equal(chatter.stage, "completed");
  assert.equal(
    chatter.reply,
    "I'm here to help with your screening. John Smith, please answer the previous question or type 'exit' to finish. (Position: Backend Engineer)",
  );

  const first = await engine.handleMessage(session, "exit");
  const second = await engine.handleMessage(session, "exit");
  assert.equal(first.stage, "ended");
  assert.equal(second.stage, "ended");
  assert.equal(second.reply, first.reply);

  const after = await engine.handleMessage(session, "hello?");
  assert.equal(after.stage, "ended");
  assert.equal(after.ended, true);
}

async function testDisabledStoreIsNeverCalled(): Promise<void> {
  const store = new RecordingStore({ enabled: false });
  const engine = buildEngine(createScriptedLlm(), store);
  const session = await reachTechStack(engine);
  await engine.handleMessage(session, "Python");
  await engine.handleMessage(session, "Generators.");

  assert.equal(session.record.persistenceStatus, "unset");
  assert.equal(store.audits.length, 0);
  assert.equal(store.finals.length, 0);
}

async function testAuditFailureDoesNotBreakTheTurn(): Promise<void> {
  const store = new RecordingStore({ failAudit: true });
  const engine = buildEngine(createScriptedLlm(), store);
  const session = createSession();
  await engine.start(session);

  const turn = await engine.handleMessage(session, "John Smith");

  assert.equal(turn.stage, "email");
  assert.equal(store.audits.length, 0);
}

async function testConcurrentMessagesRunOneAfterAnother(): Promise<void> {
  const slowLlm = createScriptedLlm();
  const engine = buildEngine(
    new FakeLlm(async (prompt, promptName) => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      return slowLlm.generateText(prompt, { promptName });
    }),
  );
  const session = createSession();
  await engine.start(session);

  const [first, second] = await Promise.all([
    engine.handleMessage(session, "John Smith"),
    engine.handleMessage(session, "Jane Doe"),
  ]);

  assert.equal(first.stage, "email");
  assert.equal(first.reply, "Thanks, John Smith! What's your email address?");
  assert.equal(second.stage, "email");
  assert.equal(second.reply, "Please enter a valid email address (e.g., user@email.com).");
  assert.equal(session.record.name, "John Smith");
  assert.equal(session.record.email, undefined);
  assert.deepEqual(
    session.transcript.filter((entry) => entry.role === "user").map((entry) => entry.content),
    ["John Smith", "Jane Doe"],
  );
}

async function testFailedTurnDoesNotBlockTheNextOne(): Promise<void> {
  let failNext = true;
  const engine = new IntakeEngine(
    new QuestionSourceService(createScriptedLlm(), noopLogger),
    {
      async validate(): Promise<FieldValidationOutcome> {
        if (failNext) {
          failNext = false;
          throw new Error("validator crashed");
        }
        return { accepted: true, acceptedBy: "local" };
      },
    },
    new RecordingStore(),
    noopLogger,
  );
  const session = createSession();
  await engine.start(session);

  await assert.rejects(engine.handleMessage(session, "John Smith"), /validator crashed/);
  assert.equal(session.stage, "name");
  assert.equal(session.record.name, undefined);

  const retried = await engine.handleMessage(session, "John Smith");
  assert.equal(retried.stage, "email");
  assert.equal(session.record.name, "John Smith");
}

async function testSameValueGivesSameNextStage(): Promise<void> {
  const engine = buildEngine();
  const expectedStages = ["email", "phone", "experience", "position", "location", "tech_stack"];

  const runs: Array<Array<{ stage: string; reply: string }>> = [];
  for (let attempt = 0; attempt < 3; attempt += 1) {
    const session = createSession();
    await engine.start(session);
    const turns: Array<{ stage: string; reply: string }> = [];
    for (const text of PROFILE_ANSWERS) {
      const turn = await engine.handleMessage(session, text);
      turns.push({ stage: turn.stage, reply: turn.reply });
    }
    runs.push(turns);
  }

  assert.deepEqual(
    runs[0]?.map((turn) => turn.stage),
    expectedStages,
  );
  assert.deepEqual(runs[1], runs[0]);
  assert.deepEqual(runs[2], runs[0]);
}

async function testCandidateMessagesCarrySentiment(): Promise<void> {
  const engine = buildEngine();
  const session = createSession();
  await engine.start(session);

  await engine.handleMessage(session, "John Smith");
  await engine.handleMessage(session, "I hate forms");

  const [welcome, name, namePrompt, complaint] = session.transcript;
  assert.equal(welcome?.sentiment, undefined);
  assert.deepEqual(name?.sentiment, { score: 0, comparative: 0, label: "neutral" });
  assert.equal(namePrompt?.sentiment, undefined);
  assert.deepEqual(complaint?.sentiment, { score: -3, comparative: -1, label: "negative" });
}

async function run(): Promise<void> {
  await testStartGreetsAndAsksForName();
  await testMessageInGreetingStartsTheScript();
  await testNameIsAcceptedAndUsed();
  await testInvalidEmailIsRejected();
  await testPhoneWithLettersIsRejected();
  await testFullFlowPersistsAndSaysGoodbye();
  await testEveryDeclaredSkillGetsAUniqueQuestion();
  await testRepeatedModelOutputFallsBackToBank();
  await testInvalidTechStackIsRejected();
  await testTechStackWithOnlyDegradedQuestionsIsRetried();
  await testDegradedQuestionOffersRetry();
  await testSkipMovesToNextQuestion();
  await testRephraseReplacesSkill();
  await testFreeTextInRetryChoiceAnswersDegradedQuestion();
  await testExitFarewellReflectsPersistenceStatus();
  await testExitIsWholeMessageOnly();
  await testTerminalStagesAreIdempotent();
  await testDisabledStoreIsNeverCalled();
  await testAuditFailureDoesNotBreakTheTurn();
  await testConcurrentMessagesRunOneAfterAnother();
  await testFailedTurnDoesNotBlockTheNextOne();
  await testSameValueGivesSameNextStage();
  await testCandidateMessagesCarrySentiment();
  process.stdout.write("Intake e2e tests passed.\n");
}

void run();

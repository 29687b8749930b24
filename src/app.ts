import express, { Express, Request, Response } from "express";
import { LlmClient } from "./ai/llm.client";
import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { CandidatesRepository } from "./db/repositories/candidates.repo";
import { IntakeAuditRepository } from "./db/repositories/intake-audit.repo";
import { SupabaseRestClient } from "./db/supabase.client";
import { buildIntakeController } from "./http/intake.controller";
import { FieldValidationService } from "./intake/field-validation.service";
import { IntakeEngine } from "./intake/intake.engine";
import { QuestionSourceService } from "./questions/question-source.service";
import { SessionService } from "./state/session.service";
import { SupabaseSessionStore } from "./storage/session-store";

export interface IntakeRuntime {
  llmClient: LlmClient;
  engine: IntakeEngine;
  candidatesRepository: CandidatesRepository;
  store: SupabaseSessionStore;
}

export interface AppContext {
  app: Express;
  logger: Logger;
  runtime: IntakeRuntime;
  sessionService: SessionService;
}

export function buildIntakeRuntime(env: EnvConfig, logger: Logger): IntakeRuntime {
  const llmClient = new LlmClient(env.llm, logger);
  const supabaseClient =
    env.supabaseUrl && env.supabaseServiceRoleKey
      ? new SupabaseRestClient({
          url: env.supabaseUrl,
          serviceRoleKey: env.supabaseServiceRoleKey,
          timeoutMs: env.supabaseTimeoutMs,
        })
      : undefined;
  const candidatesRepository = new CandidatesRepository(logger, supabaseClient);
  const auditRepository = new IntakeAuditRepository(supabaseClient);
  const store = new SupabaseSessionStore(candidatesRepository, auditRepository, logger);
  const questionSource = new QuestionSourceService(llmClient, logger);
  const fieldValidation = new FieldValidationService(llmClient, logger, {
    strictPhoneValidation: env.strictPhoneValidation,
  });
  const engine = new IntakeEngine(questionSource, fieldValidation, store, logger);

  return { llmClient, engine, candidatesRepository, store };
}

export function createApp(env: EnvConfig): AppContext {
  const logger = createLogger({ minLevel: env.logLevel });
  const app = express();

  app.use(express.json({ limit: "256kb" }));

  const runtime = buildIntakeRuntime(env, logger);
  const sessionService = new SessionService();
  logger.info("Candidate store", { enabled: runtime.store.isEnabled() });

  app.get("/health", async (_request: Request, response: Response) => {
    const llm = await runtime.llmClient.checkStatus();
    response.status(200).json({ ok: true, llm, sessions: sessionService.size() });
  });

  app.use(
    "/api",
    buildIntakeController({
      sessionService,
      engine: runtime.engine,
      candidatesRepository: runtime.candidatesRepository,
      logger,
    }),
  );

  return { app, logger, runtime, sessionService };
}

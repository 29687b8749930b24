import { Request, Response, Router } from "express";
import { Logger } from "../config/logger";
import { CandidatesRepository } from "../db/repositories/candidates.repo";
import { IntakeEngine } from "../intake/intake.engine";
import { buildScreeningSummary } from "../profiles/candidate-document.builder";
import { IntakeSession } from "../shared/types/intake.types";
import { SessionService } from "../state/session.service";

interface IntakeControllerDeps {
  sessionService: SessionService;
  engine: IntakeEngine;
  candidatesRepository: CandidatesRepository;
  logger: Logger;
}

type RouteHandler = (request: Request, response: Response) => Promise<void>;

export function buildIntakeController(deps: IntakeControllerDeps): Router {
  const router = Router();

  const guarded = (name: string, handler: RouteHandler) =>
    async (request: Request, response: Response): Promise<void> => {
      try {
        await handler(request, response);
      } catch (error) {
        deps.logger.error("Failed to handle intake request", {
          route: name,
          error: error instanceof Error ? error.message : "Unknown error",
        });
        response.status(500).json({ ok: false, error: "Internal error" });
      }
    };

  const findSessionOr404 = (request: Request, response: Response): IntakeSession | null => {
    const session = deps.sessionService.getSession(String(request.params.sessionId ?? ""));
    if (!session) {
      response.status(404).json({ ok: false, error: "Session not found" });
    }
    return session;
  };

  router.post("/sessions", guarded("create_session", async (_request, response) => {
    const session = deps.sessionService.create();
    const turn = await deps.engine.start(session);
    deps.logger.info("Intake session created", { sessionId: session.id });
    response.status(201).json({ sessionId: session.id, stage: turn.stage, reply: turn.reply });
  }));

  router.post("/sessions/:sessionId/messages", guarded("post_message", async (request, response) => {
    const session = findSessionOr404(request, response);
    if (!session) {
      return;
    }
    const text = typeof request.body?.text === "string" ? request.body.text.trim() : "";
    if (!text) {
      response.status(400).json({ ok: false, error: "Message text is required" });
      return;
    }
    const turn = await deps.engine.handleMessage(session, text);
    response.status(200).json({
      stage: turn.stage,
      reply: turn.reply,
      ended: turn.ended,
      record: session.record,
    });
  }));

  router.post("/sessions/:sessionId/reset", guarded("reset_session", async (request, response) => {
    const session = deps.sessionService.reset(String(request.params.sessionId ?? ""));
    if (!session) {
      response.status(404).json({ ok: false, error: "Session not found" });
      return;
    }
    const turn = await deps.engine.start(session);
    response.status(200).json({ sessionId: session.id, stage: turn.stage, reply: turn.reply });
  }));

  router.get("/sessions/:sessionId", guarded("get_session", async (request, response) => {
    const session = findSessionOr404(request, response);
    if (!session) {
      return;
    }
    response.status(200).json({
      stage: session.stage,
      record: session.record,
      transcript: session.transcript,
    });
  }));

  router.get("/sessions/:sessionId/summary", guarded("get_summary", async (request, response) => {
    const session = findSessionOr404(request, response);
    if (!session) {
      return;
    }
    response.status(200).json({ summary: buildScreeningSummary(session) });
  }));

  router.delete("/sessions/:sessionId", guarded("delete_session", async (request, response) => {
    const deleted = deps.sessionService.delete(String(request.params.sessionId ?? ""));
    if (!deleted) {
      response.status(404).json({ ok: false, error: "Session not found" });
      return;
    }
    response.status(200).json({ ok: true });
  }));

  router.get("/candidates/:email", guarded("get_candidate", async (request, response) => {
    const candidate = await deps.candidatesRepository.findByEmail(String(request.params.email ?? ""));
    if (!candidate) {
      response.status(404).json({ ok: false, error: "Candidate not found" });
      return;
    }
    response.status(200).json(candidate);
  }));

  return router;
}

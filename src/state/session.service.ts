import { randomUUID } from "node:crypto";
import { CandidateRecord, IntakeSession, IntakeStage } from "../shared/types/intake.types";
import { assertTransition } from "./state-machine";

export function createEmptyRecord(): CandidateRecord {
  return {
    skills: [],
    questions: [],
    answers: {},
    persistenceStatus: "unset",
  };
}

export function createSession(id: string = randomUUID()): IntakeSession {
  const now = new Date().toISOString();
  return {
    id,
    stage: "greeting",
    record: createEmptyRecord(),
    transcript: [],
    questionCursor: 0,
    createdAt: now,
    updatedAt: now,
  };
}

export function transitionSession(session: IntakeSession, to: IntakeStage): IntakeSession {
  assertTransition(session.stage, to);
  session.stage = to;
  session.updatedAt = new Date().toISOString();
  return session;
}

/**
 * In-memory registry of live sessions. Each session is independent; the
 * engine mutates the object it is handed.
 */
export class SessionService {
  private readonly sessions = new Map<string, IntakeSession>();

  create(): IntakeSession {
    const session = createSession();
    this.sessions.set(session.id, session);
    return session;
  }

  getSession(sessionId: string): IntakeSession | null {
    return this.sessions.get(sessionId) ?? null;
  }

  reset(sessionId: string): IntakeSession | null {
    if (!this.sessions.has(sessionId)) {
      return null;
    }
    const session = createSession(sessionId);
    this.sessions.set(sessionId, session);
    return session;
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  size(): number {
    return this.sessions.size;
  }
}

import { Logger } from "../config/logger";
import { CandidatesRepository } from "../db/repositories/candidates.repo";
import { IntakeAuditRepository } from "../db/repositories/intake-audit.repo";
import { CandidateDocument, TranscriptEntry } from "../shared/types/intake.types";

export type FinalWriteResult = "success" | "failure";

export interface SessionStore {
  isEnabled(): boolean;
  insertAudit(transcript: readonly TranscriptEntry[], record: CandidateDocument): Promise<void>;
  insertFinal(record: CandidateDocument): Promise<FinalWriteResult>;
}

export class SupabaseSessionStore implements SessionStore {
  constructor(
    private readonly candidatesRepository: CandidatesRepository,
    private readonly auditRepository: IntakeAuditRepository,
    private readonly logger: Logger,
  ) {}

  isEnabled(): boolean {
    return this.candidatesRepository.isEnabled() && this.auditRepository.isEnabled();
  }

  async insertAudit(transcript: readonly TranscriptEntry[], record: CandidateDocument): Promise<void> {
    await this.auditRepository.insertSnapshot({
      sessionId: record.session_id,
      transcript,
      candidate: record,
    });
  }

  async insertFinal(record: CandidateDocument): Promise<FinalWriteResult> {
    try {
      await this.candidatesRepository.insertCandidate(record);
      return "success";
    } catch (error) {
      this.logger.error("Failed to store candidate record", {
        sessionId: record.session_id,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      return "failure";
    }
  }
}

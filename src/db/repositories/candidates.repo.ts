import { Logger } from "../../config/logger";
import { CandidateDocument } from "../../shared/types/intake.types";
import { SupabaseRestClient } from "../supabase.client";

const CANDIDATES_TABLE = "candidates";

export class CandidatesRepository {
  constructor(
    private readonly logger: Logger,
    private readonly supabaseClient?: SupabaseRestClient,
  ) {}

  isEnabled(): boolean {
    return Boolean(this.supabaseClient);
  }

  async insertCandidate(document: CandidateDocument): Promise<void> {
    if (!this.supabaseClient) {
      return;
    }
    await this.supabaseClient.insert(CANDIDATES_TABLE, { ...document });
    this.logger.debug("Candidate record inserted", {
      sessionId: document.session_id,
      questions: document.questions.length,
    });
  }

  async findByEmail(email: string): Promise<CandidateDocument | null> {
    if (!this.supabaseClient) {
      return null;
    }
    return this.supabaseClient.selectOne<CandidateDocument>(CANDIDATES_TABLE, {
      email: email.trim(),
    });
  }
}

import { CandidateDocument, TranscriptEntry } from "../../shared/types/intake.types";
import { SupabaseRestClient } from "../supabase.client";

const INTAKE_SESSIONS_TABLE = "intake_sessions";

export class IntakeAuditRepository {
  constructor(private readonly supabaseClient?: SupabaseRestClient) {}

  isEnabled(): boolean {
    return Boolean(this.supabaseClient);
  }

  async insertSnapshot(input: {
    sessionId: string;
    transcript: readonly TranscriptEntry[];
    candidate: CandidateDocument;
  }): Promise<void> {
    if (!this.supabaseClient) {
      return;
    }
    await this.supabaseClient.insert(INTAKE_SESSIONS_TABLE, {
      session_id: input.sessionId,
      messages: input.transcript,
      candidate_info: input.candidate,
      created_at: new Date().toISOString(),
    });
  }
}

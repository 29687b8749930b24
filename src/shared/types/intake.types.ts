export type IntakeStage =
  | "greeting"
  | "name"
  | "email"
  | "phone"
  | "experience"
  | "position"
  | "location"
  | "tech_stack"
  | "tech_questions"
  | "retry_choice"
  | "rephrase_skill"
  | "completed"
  | "ended";

export type ProfileField = "name" | "email" | "phone" | "experience" | "position" | "location";

export type QuestionSourceTag = "generated" | "fallback" | "error_fallback";

export type PersistenceStatus = "unset" | "success" | "failure";

export interface ScreeningQuestion {
  text: string;
  skill: string;
  source: QuestionSourceTag;
}

export interface CandidateRecord {
  name?: string;
  email?: string;
  phone?: string;
  experience?: string;
  position?: string;
  location?: string;
  techStack?: string;
  skills: string[];
  questions: ScreeningQuestion[];
  answers: Record<string, string>;
  persistenceStatus: PersistenceStatus;
}

export interface MessageSentiment {
  score: number;
  comparative: number;
  label: "positive" | "neutral" | "negative";
}

export interface TranscriptEntry {
  role: "user" | "assistant";
  content: string;
  at: string;
  /** Set on candidate messages only. */
  sentiment?: MessageSentiment;
}

export interface IntakeSession {
  id: string;
  stage: IntakeStage;
  record: CandidateRecord;
  transcript: TranscriptEntry[];
  questionCursor: number;
  createdAt: string;
  updatedAt: string;
}

export interface IntakeTurnResult {
  reply: string;
  stage: IntakeStage;
  ended: boolean;
}

export interface CandidateDocument {
  session_id: string;
  name: string | null;
  email: string | null;
  phone: string | null;
  experience: string | null;
  position: string | null;
  location: string | null;
  tech_stack: string | null;
  skills: string[];
  questions: string[];
  question_sources: QuestionSourceTag[];
  answers: Record<string, string>;
  persistence_status: PersistenceStatus;
  created_at: string;
}

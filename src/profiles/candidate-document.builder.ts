import { CandidateDocument, IntakeSession } from "../shared/types/intake.types";

export function buildCandidateDocument(session: IntakeSession): CandidateDocument {
  const record = session.record;
  return {
    session_id: session.id,
    name: record.name ?? null,
    email: record.email ?? null,
    phone: record.phone ?? null,
    experience: record.experience ?? null,
    position: record.position ?? null,
    location: record.location ?? null,
    tech_stack: record.techStack ?? null,
    skills: [...record.skills],
    questions: record.questions.map((question) => question.text),
    question_sources: record.questions.map((question) => question.source),
    answers: { ...record.answers },
    persistence_status: record.persistenceStatus,
    created_at: session.createdAt,
  };
}

export function buildScreeningSummary(session: IntakeSession): string {
  const record = session.record;
  const answered = Object.keys(record.answers).length;
  const isComplete = record.questions.length > 0 && session.questionCursor >= record.questions.length;
  const display = (value?: string): string => value ?? "Not provided";

  return [
    `## Screening Summary for ${display(record.name)}`,
    "",
    "### Personal Information",
    `- **Name:** ${display(record.name)}`,
    `- **Email:** ${display(record.email)}`,
    `- **Phone:** ${display(record.phone)}`,
    `- **Experience:** ${display(record.experience)}`,
    `- **Desired Position:** ${display(record.position)}`,
    `- **Location:** ${display(record.location)}`,
    "",
    "### Technical Skills",
    record.skills.length ? record.skills.join(", ") : "Not provided",
    "",
    "### Technical Q&A",
    `${answered} of ${record.questions.length} questions answered`,
    "",
    "### Assessment Status",
    `- **Screening Stage:** ${session.stage}`,
    `- **Interactions:** ${session.transcript.length}`,
    `- **Status:** ${isComplete ? "Complete" : "In Progress"}`,
  ].join("\n");
}

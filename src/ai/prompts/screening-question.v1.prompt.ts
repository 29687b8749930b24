export function buildScreeningQuestionV1Prompt(input: { skill: string }): string {
  return [
    `You are an AI hiring assistant. Generate a technical interview question for a BEGINNER about the following skill: ${input.skill}.`,
    `The question must be specific to ${input.skill} and NOT about any other skill.`,
    "Return only the question, do not number it.",
  ].join(" ");
}

import { IntakeStage } from "../shared/types/intake.types";

const transitionRules: Record<IntakeStage, IntakeStage[]> = {
  greeting: ["name", "ended"],
  name: ["email", "ended"],
  email: ["phone", "ended"],
  phone: ["experience", "ended"],
  experience: ["position", "ended"],
  position: ["location", "ended"],
  location: ["tech_stack", "ended"],
  tech_stack: ["tech_questions", "ended"],
  tech_questions: ["retry_choice", "completed", "ended"],
  retry_choice: ["tech_questions", "rephrase_skill", "completed", "ended"],
  rephrase_skill: ["tech_questions", "ended"],
  completed: ["ended"],
  ended: [],
};

export function isAllowedTransition(from: IntakeStage, to: IntakeStage): boolean {
  return transitionRules[from].includes(to);
}

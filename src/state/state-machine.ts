import { IntakeStage } from "../shared/types/intake.types";
import { isAllowedTransition } from "./transition-rules";

export function assertTransition(from: IntakeStage, to: IntakeStage): void {
  if (!isAllowedTransition(from, to)) {
    throw new Error(`Invalid transition from ${from} to ${to}`);
  }
}

export function buildFieldValidationV1Prompt(input: { fieldLabel: string; value: string }): string {
  return [
    "You are a strict data validator for a job application form.",
    `The user entered the following for the field '${input.fieldLabel}': '${input.value}'.`,
    `Is this a valid ${input.fieldLabel}? Reply only with 'yes' or 'no'.`,
  ].join(" ");
}

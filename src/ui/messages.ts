import { PersistenceStatus, ProfileField } from "../shared/types/intake.types";

export function welcomeMessage(): string {
  return [
    "👋 Hello! Welcome to the candidate screening assistant.",
    "I'll guide you through a quick screening to help match you with the best opportunities.",
    "You can type 'exit' or 'quit' anytime to end the chat.",
    "",
    "Let's get started! What's your full name?",
  ].join("\n");
}

/** Prompt for the field that comes after the one just accepted. */
export function nextFieldPromptMessage(
  next: Exclude<ProfileField, "name"> | "tech_stack",
  name?: string,
): string {
  switch (next) {
    case "email":
      return name ? `Thanks, ${name}! What's your email address?` : "Thanks! What's your email address?";
    case "phone":
      return name ? `Great, ${name}. And your phone number?` : "And your phone number?";
    case "experience":
      return withName(name, "Thank you", "How many years of professional experience do you have?");
    case "position":
      return withName(name, "Thanks", "What position(s) are you interested in?");
    case "location":
      return withName(name, "Thank you", "Where are you currently located? (City, Country)");
    case "tech_stack":
      return withName(
        name,
        "Thanks",
        "Please list your tech stack (programming languages, frameworks, databases, tools), separated by commas.",
      );
  }
}

export function correctiveMessage(field: ProfileField, reason: "letters_in_phone" | "invalid"): string {
  switch (field) {
    case "name":
      return "Please enter a valid full name (first and last name, no numbers or special characters).";
    case "email":
      return "Please enter a valid email address (e.g., user@email.com).";
    case "phone":
      return reason === "letters_in_phone"
        ? "Please enter a valid phone number (digits only, no letters)."
        : "Please enter a valid phone number (digits only, no letters, and a reasonable length).";
    case "experience":
      return "Please enter a valid number of years of professional experience between 0 and 50 (e.g., 3, 5, 10).";
    case "position":
      return "Please enter a valid job position or role (at least two words, only letters and spaces, minimum 5 characters, no symbols or numbers).";
    case "location":
      return "Please enter a valid location (e.g., City, Country). Use only letters, spaces, commas, and hyphens.";
  }
}

export function invalidTechStackMessage(): string {
  return "Please enter at least one valid skill in your tech stack, each at least 2 characters (e.g., python, fastapi, langchain).";
}

export function techStackGenerationFailedMessage(): string {
  return "I'm having trouble generating technical questions for your tech stack. Please try again or rephrase your tech stack.";
}

export function firstQuestionMessage(question: string, name?: string): string {
  const lead = name ? `Great, ${name}! Here is your technical question:` : "Great! Here is your technical question:";
  return `${lead}\n\n${question}`;
}

export function nextQuestionMessage(question: string, name?: string): string {
  const lead = name
    ? `Thank you, ${name}! Here is your next technical question:`
    : "Thank you! Here is your next technical question:";
  return `${lead}\n\n${question}`;
}

export function regeneratedQuestionMessage(question: string, skill: string): string {
  return `Here is a new question about ${skill}:\n\n${question}`;
}

export function skillUpdatedMessage(question: string, skill: string): string {
  return `Skill updated to '${skill}'. Here is your technical question:\n\n${question}`;
}

export function degradedQuestionNote(skill: string): string {
  return [
    `I couldn't generate a specific technical question for ${skill}.`,
    "Answer the question above, or type 'retry' to try again, 'skip' to move on, or 'rephrase' to rename the skill.",
  ].join(" ");
}

export function rephraseSkillPrompt(skill: string): string {
  return `Please enter a new skill name to replace '${skill}':`;
}

export function invalidSkillNameMessage(): string {
  return "Please enter a valid skill name (at least 2 characters).";
}

export function completionMessage(name?: string, position?: string): string {
  let message = "Thank you for answering all the questions! ";
  if (name) {
    message += `${name}, `;
  }
  if (position) {
    message += `we'll be in touch regarding the ${position} position. `;
  }
  return `${message}If you have anything else to add, let me know. Otherwise, type 'exit' to finish.`;
}

export function farewellMessage(status: PersistenceStatus, name?: string, position?: string): string {
  if (status === "failure") {
    return "There was an issue saving your information. Error in storing your answers, please try again later.";
  }
  let message = status === "success" ? "Thank you, your answers have been saved. " : "Thank you for your time! ";
  if (name) {
    message += `${name}, `;
  }
  if (position) {
    message += `we'll be in touch regarding the ${position} position. `;
  }
  return status === "success" ? `${message}You can close the window now.` : `${message}Have a great day! 👋`;
}

export function fallbackMessage(name?: string, position?: string): string {
  let message = "I'm here to help with your screening. ";
  if (name) {
    message += `${name}, `;
  }
  message += "please answer the previous question or type 'exit' to finish.";
  if (position) {
    message += ` (Position: ${position})`;
  }
  return message;
}

function withName(name: string | undefined, lead: string, question: string): string {
  return name ? `${lead}, ${name}. ${question}` : question;
}

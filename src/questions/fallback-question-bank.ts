// Keyed by lower-cased skill name.
const FALLBACK_QUESTIONS: Readonly<Record<string, string>> = {
  react: "What is a React component and how does state management work in React?",
  fastapi: "What is FastAPI and how does it differ from Flask? Give a simple example of a FastAPI endpoint.",
  cpp: "What is RAII in C++ and how does it affect resource management within an application?",
  "c++": "What is RAII in C++ and how does it affect resource management within an application?",
  python: "What is a Python decorator and how is it used? Provide a simple example.",
  javascript: "What is event delegation in JavaScript and why is it useful?",
  typescript: "What is the difference between an interface and a type alias in TypeScript?",
  mongodb: "What is a MongoDB document and how does it differ from a relational database row?",
  sql: "What is a JOIN in SQL? Provide an example query.",
  docker: "What is Docker and how does containerization benefit development workflows?",
  kubernetes: "What is the difference between a Pod and a Service in Kubernetes?",
  git: "What is the difference between git merge and git rebase?",
  html: "What is the purpose of the <head> tag in HTML?",
  css: "What is the box model in CSS?",
  "node.js": "What is the event loop in Node.js?",
  java: "What is inheritance in Java and how is it implemented?",
  aws: "What is the difference between EC2 and Lambda in AWS?",
};

export function findFallbackQuestion(skill: string): string | null {
  const key = skill.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(FALLBACK_QUESTIONS, key) ? FALLBACK_QUESTIONS[key] : null;
}

export function buildDegradedQuestion(skill: string): string {
  return `What is your experience with ${skill}? (Describe briefly.)`;
}

import { Logger } from "../config/logger";
import { CompletionContext } from "./llm.client";

export interface TextCompletionClient {
  generateText(
    prompt: string,
    options?: { promptName?: string; context?: CompletionContext },
  ): Promise<string | string[]>;
  getModelName?(): string;
  getTimeoutMs?(): number;
}

export interface TextSafeCallArgs {
  llmClient: TextCompletionClient;
  prompt: string;
  promptName: string;
  context?: CompletionContext;
  logger?: Logger;
  timeoutMs?: number;
}

export type SafeTextErrorCode =
  | "timeout"
  | "transient_failure"
  | "llm_failure"
  | "empty_response";

export type SafeTextResult = { ok: true; text: string } | { ok: false; error_code: SafeTextErrorCode };

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Single bounded call to the text-completion service. Never rejects: every
 * failure comes back as an error code so callers can fall back.
 */
export async function callTextPromptSafe(args: TextSafeCallArgs): Promise<SafeTextResult> {
  const timeoutMs = normalizeTimeout(args.timeoutMs ?? args.llmClient.getTimeoutMs?.());
  try {
    const output = await withTimeout(
      args.llmClient.generateText(args.prompt, {
        promptName: args.promptName,
        context: args.context,
      }),
      timeoutMs,
    );
    const text = joinCompletionOutput(output);
    if (!text) {
      return { ok: false, error_code: "empty_response" };
    }
    return { ok: true, text };
  } catch (error) {
    const errorCode = isTimeoutError(error)
      ? "timeout"
      : isTransientError(error)
        ? "transient_failure"
        : "llm_failure";
    args.logger?.debug("llm.safe.failed", {
      promptName: args.promptName,
      modelName: args.llmClient.getModelName?.(),
      errorCode,
    });
    return { ok: false, error_code: errorCode };
  }
}

export function joinCompletionOutput(output: string | string[]): string {
  if (Array.isArray(output)) {
    return output
      .filter((item) => typeof item === "string")
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
      .join(" ");
  }
  return typeof output === "string" ? output.trim() : "";
}

function normalizeTimeout(value?: number): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return Math.round(value);
  }
  return DEFAULT_TIMEOUT_MS;
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error("timeout"));
    }, timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

function isTimeoutError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return message.includes("timeout");
}

function isTransientError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return (
    message.includes("econnreset") ||
    message.includes("econnrefused") ||
    message.includes("network") ||
    message.includes("429") ||
    message.includes("rate limit") ||
    message.includes("http 500") ||
    message.includes("http 502") ||
    message.includes("http 503") ||
    message.includes("http 504")
  );
}

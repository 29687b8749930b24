import fetch from "node-fetch";
import { IntakeLlmConfig } from "../config/env";
import { Logger } from "../config/logger";
import { INTAKE_SYSTEM_PROMPT } from "./system/intake.system";

const STATUS_TIMEOUT_MS = 5_000;
const STOP_SEQUENCES = ["\n\n", "User:", "Assistant:"];

export interface CompletionContext {
  stage?: string;
  candidate?: Record<string, string | undefined>;
}

export interface LlmCallOptions {
  promptName?: string;
  context?: CompletionContext;
}

export interface GenerateRequestBody {
  model: string;
  prompt: string;
  stream: false;
  options: {
    temperature: number;
    num_predict: number;
    top_p: number;
    repeat_penalty: number;
    stop: string[];
  };
}

interface GenerateResponse {
  response?: unknown;
}

interface TagsResponse {
  models?: Array<{ name?: unknown }>;
}

export interface LlmStatus {
  connected: boolean;
  modelAvailable: boolean;
  model: string;
  endpoint: string;
  deploymentMode: IntakeLlmConfig["deploymentMode"];
}

export class LlmClient {
  constructor(
    private readonly config: IntakeLlmConfig,
    private readonly logger: Logger,
  ) {}

  getModelName(): string {
    return this.config.model;
  }

  getTimeoutMs(): number {
    return Math.round(this.config.timeoutSeconds * 1000);
  }

  async generateText(prompt: string, options?: LlmCallOptions): Promise<string> {
    const startedAt = Date.now();
    const promptName = options?.promptName ?? "generate_text";
    const requestBody = this.buildGenerateRequestBody(prompt, options?.context);
    try {
      const response = await fetch(`${this.config.endpoint}/api/generate`, {
        method: "POST",
        headers: {
          "content-type": "application/json",
        },
        body: JSON.stringify(requestBody),
        timeout: this.getTimeoutMs(),
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`LLM API error: HTTP ${response.status} - ${body}`);
      }

      const body = (await response.json()) as GenerateResponse;
      const content = typeof body.response === "string" ? cleanCompletionText(body.response) : "";
      if (!content) {
        throw new Error("LLM response does not contain generated text");
      }

      this.logger.info("llm.call.completed", {
        promptName,
        modelName: this.config.model,
        latencyMs: Date.now() - startedAt,
        maxTokens: this.config.maxTokens,
        tokenEstimate: estimateTokenCount(requestBody.prompt, content),
      });
      return content;
    } catch (error) {
      this.logger.warn("llm.call.failed", {
        promptName,
        modelName: this.config.model,
        latencyMs: Date.now() - startedAt,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      throw error;
    }
  }

  async checkStatus(): Promise<LlmStatus> {
    const status: LlmStatus = {
      connected: false,
      modelAvailable: false,
      model: this.config.model,
      endpoint: this.config.endpoint,
      deploymentMode: this.config.deploymentMode,
    };
    try {
      const response = await fetch(`${this.config.endpoint}/api/tags`, {
        method: "GET",
        headers: { accept: "application/json" },
        timeout: STATUS_TIMEOUT_MS,
      });
      if (!response.ok) {
        return status;
      }
      status.connected = true;
      const body = (await response.json()) as TagsResponse;
      const names = Array.isArray(body.models)
        ? body.models.map((model) => (typeof model.name === "string" ? model.name : ""))
        : [];
      status.modelAvailable = names.some((name) => name.includes(this.config.model));
      return status;
    } catch (error) {
      this.logger.debug("llm.status.unreachable", {
        endpoint: this.config.endpoint,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      return status;
    }
  }

  buildGenerateRequestBody(prompt: string, context?: CompletionContext): GenerateRequestBody {
    return {
      model: this.config.model,
      prompt: buildFullPrompt(prompt, context),
      stream: false,
      options: {
        temperature: this.config.temperature,
        num_predict: this.config.maxTokens,
        top_p: 0.9,
        repeat_penalty: 1.1,
        stop: STOP_SEQUENCES,
      },
    };
  }
}

export function buildFullPrompt(prompt: string, context?: CompletionContext): string {
  let contextText = "";
  if (context?.stage) {
    contextText += `\nCurrent Stage: ${context.stage}`;
  }
  const known = Object.entries(context?.candidate ?? {})
    .filter((entry): entry is [string, string] => typeof entry[1] === "string" && entry[1].length > 0)
    .map(([key, value]) => `${key}: ${value}`);
  if (known.length) {
    contextText += `\nCandidate Information: ${known.join("; ")}`;
  }
  return `System: ${INTAKE_SYSTEM_PROMPT}${contextText}\n\nUser: ${prompt}\n\nAssistant:`;
}

export function cleanCompletionText(raw: string): string {
  return raw
    .replace(/System:/g, "")
    .replace(/User:/g, "")
    .replace(/Assistant:/g, "")
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .join(" ");
}

function estimateTokenCount(prompt: string, output: string): number {
  const totalChars = prompt.length + output.length;
  return Math.max(1, Math.round(totalChars / 4));
}

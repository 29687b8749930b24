import dotenv from "dotenv";

dotenv.config();

export type DeploymentMode = "local" | "cloud";
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface IntakeLlmConfig {
  endpoint: string;
  model: string;
  timeoutSeconds: number;
  maxTokens: number;
  temperature: number;
  deploymentMode: DeploymentMode;
}

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  llm: IntakeLlmConfig;
  strictPhoneValidation: boolean;
  supabaseUrl?: string;
  supabaseServiceRoleKey?: string;
  supabaseTimeoutMs: number;
}

const LOCAL_LLM_ENDPOINT = "http://localhost:11434";

function getOptionalTrimmed(name: string): string | undefined {
  const value = process.env[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(): EnvConfig {
  const portRaw = process.env.PORT ?? "3000";
  const port = Number(portRaw);
  const logLevelRaw = (process.env.LOG_LEVEL ?? "info").trim().toLowerCase();
  const deploymentModeRaw = (process.env.DEPLOYMENT_MODE ?? "local").trim().toLowerCase();
  const timeoutRaw = process.env.LLM_TIMEOUT_SECONDS ?? "30";
  const maxTokensRaw = process.env.LLM_MAX_TOKENS ?? "512";
  const temperatureRaw = process.env.LLM_TEMPERATURE ?? "0.7";
  const strictPhoneRaw = process.env.STRICT_PHONE_VALIDATION ?? "false";
  const supabaseTimeoutRaw = process.env.SUPABASE_TIMEOUT_MS ?? "2000";

  const timeoutSeconds = Number(timeoutRaw);
  const maxTokens = Number(maxTokensRaw);
  const temperature = Number(temperatureRaw);
  const supabaseTimeoutMs = Number(supabaseTimeoutRaw);
  const deploymentMode = parseDeploymentMode(deploymentModeRaw);

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0) {
    throw new Error(`Invalid LLM_TIMEOUT_SECONDS value: ${timeoutRaw}`);
  }
  if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
    throw new Error(`Invalid LLM_MAX_TOKENS value: ${maxTokensRaw}`);
  }
  if (!Number.isFinite(temperature) || temperature < 0 || temperature > 2) {
    throw new Error(`Invalid LLM_TEMPERATURE value: ${temperatureRaw}. Expected number between 0 and 2.`);
  }
  if (!Number.isInteger(supabaseTimeoutMs) || supabaseTimeoutMs < 100) {
    throw new Error(`Invalid SUPABASE_TIMEOUT_MS value: ${supabaseTimeoutRaw}`);
  }

  return {
    nodeEnv: process.env.NODE_ENV ?? "development",
    port,
    logLevel: parseLogLevel(logLevelRaw),
    llm: {
      endpoint: resolveLlmEndpoint(deploymentMode, getOptionalTrimmed("LLM_ENDPOINT")),
      model: getOptionalTrimmed("LLM_MODEL") ?? "phi3:mini",
      timeoutSeconds,
      maxTokens,
      temperature,
      deploymentMode,
    },
    strictPhoneValidation: parseBoolean(strictPhoneRaw),
    supabaseUrl: getOptionalTrimmed("SUPABASE_URL"),
    supabaseServiceRoleKey: getOptionalTrimmed("SUPABASE_SERVICE_ROLE_KEY"),
    supabaseTimeoutMs,
  };
}

export function resolveLlmEndpoint(mode: DeploymentMode, configured?: string): string {
  if (configured) {
    return configured.replace(/\/+$/, "");
  }
  if (mode === "cloud") {
    throw new Error("Missing required environment variable: LLM_ENDPOINT (required when DEPLOYMENT_MODE=cloud)");
  }
  return LOCAL_LLM_ENDPOINT;
}

export function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`Invalid boolean value: ${value}`);
}

function parseDeploymentMode(value: string): DeploymentMode {
  if (value === "local" || value === "cloud") {
    return value;
  }
  throw new Error(`Invalid DEPLOYMENT_MODE value: ${value}`);
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}

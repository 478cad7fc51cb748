/**
 * Env-based configuration for the travel desk agents.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export const LLM_PROVIDERS = ["azure", "openai", "anthropic", "stub"] as const;
export type LlmProvider = (typeof LLM_PROVIDERS)[number];

export interface AppConfig {
  /** Chat-completion backend shared by every agent. */
  llm: {
    provider: LlmProvider;
    azureApiKey?: string;
    azureEndpoint?: string;
    azureDeployment?: string;
    azureApiVersion?: string;
    openaiApiKey?: string;
    openaiModel?: string;
    anthropicApiKey?: string;
    anthropicModel?: string;
    /** Max tokens per agent reply. */
    maxTokens: number;
    /** Per-call timeout (ms); a slower backend fails the turn. */
    timeoutMs: number;
  };

  /** Tool/plugin settings. */
  tools: {
    serpApiKey?: string;
    flightSearchCurrency: string;
    flightSearchLanguage: string;
    flightSearchCountry?: string;
  };

  /** Orchestration caps. */
  orchestration: {
    /** Total agent turns for the human-in-the-loop group chat (unset = per-agent cap only). */
    groupChatMaxRounds?: number;
    groupChatMaxRoundsPerAgent: number;
    roundRobinMaxRounds: number;
    handoffMaxTurns: number;
  };
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

/** Positive integer from env; falls back on anything unparsable or < 1. */
function getEnvInt(key: string, defaultValue: number): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n < 1 ? defaultValue : n;
}

function getOptionalEnvInt(key: string): number | undefined {
  const v = getEnv(key);
  if (v === undefined) return undefined;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n < 1 ? undefined : n;
}

function parseProvider(value: string | undefined): LlmProvider {
  const v = (value ?? "").toLowerCase();
  const match = LLM_PROVIDERS.find((p) => p === v);
  return match ?? "azure";
}

/**
 * Build config from environment variables.
 * LLM_PROVIDER selects the backend (azure, openai, anthropic, stub); azure is the default.
 */
export function loadConfig(): AppConfig {
  return {
    llm: {
      provider: parseProvider(getEnv("LLM_PROVIDER")),
      azureApiKey: getEnv("AZURE_OPENAI_API_KEY"),
      azureEndpoint: getEnv("AZURE_OPENAI_ENDPOINT"),
      azureDeployment: getEnv("AZURE_OPENAI_DEPLOYMENT_NAME"),
      azureApiVersion: getEnv("AZURE_OPENAI_API_VERSION") || "2024-10-21",
      openaiApiKey: getEnv("OPENAI_API_KEY"),
      openaiModel: getEnv("OPENAI_MODEL_NAME") || "gpt-4o-mini",
      anthropicApiKey: getEnv("ANTHROPIC_API_KEY"),
      anthropicModel: getEnv("ANTHROPIC_MODEL_NAME") || "claude-3-5-sonnet-20241022",
      maxTokens: getEnvInt("LLM_MAX_TOKENS", 800),
      timeoutMs: getEnvInt("LLM_TIMEOUT_MS", 60_000),
    },
    tools: {
      serpApiKey: getEnv("SERPAPI_API_KEY"),
      flightSearchCurrency: getEnv("FLIGHT_SEARCH_CURRENCY") || "USD",
      flightSearchLanguage: getEnv("FLIGHT_SEARCH_LANGUAGE") || "en",
      flightSearchCountry: getEnv("FLIGHT_SEARCH_COUNTRY"),
    },
    orchestration: {
      groupChatMaxRounds: getOptionalEnvInt("GROUPCHAT_MAX_ROUNDS"),
      groupChatMaxRoundsPerAgent: getEnvInt("GROUPCHAT_MAX_ROUNDS_PER_AGENT", 9),
      roundRobinMaxRounds: getEnvInt("ROUND_ROBIN_MAX_ROUNDS", 5),
      handoffMaxTurns: getEnvInt("HANDOFF_MAX_TURNS", 20),
    },
  };
}

/**
 * Env vars the selected provider still needs; empty when the backend is usable.
 * The stub provider needs nothing.
 */
export function missingLlmEnv(config: AppConfig): string[] {
  const { llm } = config;
  const missing: string[] = [];
  switch (llm.provider) {
    case "azure":
      if (!llm.azureApiKey) missing.push("AZURE_OPENAI_API_KEY");
      if (!llm.azureEndpoint) missing.push("AZURE_OPENAI_ENDPOINT");
      if (!llm.azureDeployment) missing.push("AZURE_OPENAI_DEPLOYMENT_NAME");
      break;
    case "openai":
      if (!llm.openaiApiKey) missing.push("OPENAI_API_KEY");
      break;
    case "anthropic":
      if (!llm.anthropicApiKey) missing.push("ANTHROPIC_API_KEY");
      break;
    case "stub":
      break;
  }
  return missing;
}

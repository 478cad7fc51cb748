/**
 * LLM adapter factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import type { ILLM } from "./types";
import { StubLLM } from "./stub";
import { OpenAILLM } from "./openai";
import { AzureOpenAILLM } from "./azure-openai";
import { AnthropicLLM } from "./anthropic";

export type { ILLM, Message, ChatOptions, ChatResponse, ToolCall, ToolSpec, JsonSchemaObject, JsonSchemaProperty } from "./types";
export { StubLLM } from "./stub";
export { OpenAILLM } from "./openai";
export { AzureOpenAILLM } from "./azure-openai";
export { AnthropicLLM } from "./anthropic";

export function createLLM(config: AppConfig): ILLM {
  const { provider, azureApiKey, azureEndpoint, azureDeployment, azureApiVersion } = config.llm;
  if (provider === "azure" && azureApiKey && azureEndpoint && azureDeployment) {
    return new AzureOpenAILLM({
      apiKey: azureApiKey,
      endpoint: azureEndpoint,
      deployment: azureDeployment,
      apiVersion: azureApiVersion || "2024-10-21",
    });
  }
  const { openaiApiKey, openaiModel, anthropicApiKey, anthropicModel } = config.llm;
  if (provider === "openai" && openaiApiKey) {
    return new OpenAILLM({ apiKey: openaiApiKey, model: openaiModel || "gpt-4o-mini" });
  }
  if (provider === "anthropic" && anthropicApiKey) {
    return new AnthropicLLM({ apiKey: anthropicApiKey, model: anthropicModel || "claude-3-5-sonnet-20241022" });
  }
  return new StubLLM();
}

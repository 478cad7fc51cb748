/**
 * Azure OpenAI adapter: same Chat Completions surface, deployment-scoped client.
 */

import { AzureOpenAI } from "openai";
import { OpenAILLM } from "./openai";

export interface AzureOpenAILlmConfig {
  apiKey: string;
  endpoint: string;
  deployment: string;
  apiVersion: string;
}

export class AzureOpenAILLM extends OpenAILLM {
  constructor(cfg: AzureOpenAILlmConfig) {
    super(
      { model: cfg.deployment },
      new AzureOpenAI({
        apiKey: cfg.apiKey,
        endpoint: cfg.endpoint,
        deployment: cfg.deployment,
        apiVersion: cfg.apiVersion,
      })
    );
  }
}

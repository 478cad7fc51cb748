/**
 * OpenAI Chat Completions LLM adapter with function calling.
 */

import OpenAI from "openai";
import type { ILLM, Message, ChatOptions, ChatResponse, ToolCall, ToolSpec } from "./types";

export interface OpenAILlmConfig {
  apiKey?: string;
  model: string;
}

type ChatMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatTool = OpenAI.Chat.Completions.ChatCompletionTool;

function toOpenAIMessage(m: Message): ChatMessageParam {
  switch (m.role) {
    case "system":
      return { role: "system", content: m.content };
    case "user":
      return { role: "user", content: m.content };
    case "tool":
      return { role: "tool", tool_call_id: m.toolCallId ?? "", content: m.content };
    case "assistant":
      if (m.toolCalls && m.toolCalls.length > 0) {
        return {
          role: "assistant",
          content: m.content || null,
          tool_calls: m.toolCalls.map((c) => ({
            id: c.id,
            type: "function" as const,
            function: { name: c.name, arguments: c.arguments },
          })),
        };
      }
      return { role: "assistant", content: m.content };
  }
}

function toOpenAITool(spec: ToolSpec): ChatTool {
  return {
    type: "function",
    function: { name: spec.name, description: spec.description, parameters: { ...spec.parameters } },
  };
}

export class OpenAILLM implements ILLM {
  private client: OpenAI;

  /** `client` lets a preconfigured client (e.g. AzureOpenAI) stand in for the default one. */
  constructor(private readonly cfg: OpenAILlmConfig, client?: OpenAI) {
    this.client = client ?? new OpenAI({ apiKey: cfg.apiKey });
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const tools = options?.tools ?? [];
    const maxTokens = options?.maxTokens ?? 256;
    const response = await this.client.chat.completions.create({
      model: this.cfg.model,
      messages: messages.map(toOpenAIMessage),
      max_tokens: maxTokens,
      ...(tools.length > 0 ? { tools: tools.map(toOpenAITool) } : {}),
      stream: false,
    });
    const message = response.choices[0]?.message;
    const text = message?.content ?? "";
    const toolCalls: ToolCall[] = (message?.tool_calls ?? []).map((c) => ({
      id: c.id,
      name: c.function.name,
      arguments: c.function.arguments,
    }));
    return toolCalls.length > 0 ? { text, toolCalls } : { text };
  }
}

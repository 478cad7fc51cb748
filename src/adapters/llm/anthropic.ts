/**
 * Anthropic Claude LLM adapter.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ILLM, Message, ChatOptions, ChatResponse, ToolCall, ToolSpec } from "./types";

export interface AnthropicLlmConfig {
  apiKey: string;
  model: string;
}

type AnthropicMessage = Anthropic.Messages.MessageParam;
type AssistantBlock = Anthropic.Messages.TextBlockParam | Anthropic.Messages.ToolUseBlockParam;

/** Tool-use input must be an object; anything else becomes {}. */
function parseInput(raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {};
  }
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) return {};
  return parsed as Record<string, unknown>;
}

/**
 * Tool results ride in a user turn; consecutive results share one turn.
 * Without `withTools` the API rejects tool_use/tool_result blocks, so earlier
 * tool turns are written out as plain text instead.
 */
export function toAnthropicMessages(messages: Message[], withTools: boolean): AnthropicMessage[] {
  const out: AnthropicMessage[] = [];
  const callNames = new Map<string, string>();
  let pendingResults: Anthropic.Messages.ToolResultBlockParam[] = [];
  let pendingText: string[] = [];
  const flushResults = () => {
    if (pendingResults.length > 0) out.push({ role: "user", content: pendingResults });
    if (pendingText.length > 0) out.push({ role: "user", content: pendingText.join("\n") });
    pendingResults = [];
    pendingText = [];
  };
  for (const m of messages) {
    if (m.role === "system") continue;
    if (m.role === "tool") {
      const id = m.toolCallId ?? "";
      if (withTools) pendingResults.push({ type: "tool_result", tool_use_id: id, content: m.content });
      else pendingText.push(`Result from '${callNames.get(id) ?? "tool"}': ${m.content}`);
      continue;
    }
    flushResults();
    if (m.role === "assistant" && m.toolCalls && m.toolCalls.length > 0) {
      for (const c of m.toolCalls) callNames.set(c.id, c.name);
      if (!withTools) {
        const lines = m.content ? [m.content] : [];
        for (const c of m.toolCalls) lines.push(`Called '${c.name}' with arguments '${c.arguments}'`);
        out.push({ role: "assistant", content: lines.join("\n") });
        continue;
      }
      const blocks: AssistantBlock[] = [];
      if (m.content) blocks.push({ type: "text", text: m.content });
      for (const c of m.toolCalls) {
        blocks.push({ type: "tool_use", id: c.id, name: c.name, input: parseInput(c.arguments) });
      }
      out.push({ role: "assistant", content: blocks });
      continue;
    }
    out.push({ role: m.role, content: m.content });
  }
  flushResults();
  return out;
}

function toAnthropicTool(spec: ToolSpec): Anthropic.Messages.Tool {
  return {
    name: spec.name,
    description: spec.description,
    input_schema: { type: "object", properties: spec.parameters.properties, required: spec.parameters.required },
  };
}

export class AnthropicLLM implements ILLM {
  private client: Anthropic;

  constructor(private readonly cfg: AnthropicLlmConfig) {
    this.client = new Anthropic({ apiKey: cfg.apiKey });
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const tools = options?.tools ?? [];
    const maxTokens = options?.maxTokens ?? 256;
    const system = messages
      .filter((m) => m.role === "system")
      .map((m) => m.content)
      .join("\n\n");
    const msgs = toAnthropicMessages(messages, tools.length > 0);
    const response = await this.client.messages.create({
      model: this.cfg.model,
      max_tokens: maxTokens,
      system: system || undefined,
      messages: msgs,
      ...(tools.length > 0 ? { tools: tools.map(toAnthropicTool) } : {}),
    });
    const textParts: string[] = [];
    const toolCalls: ToolCall[] = [];
    for (const block of response.content) {
      if (block.type === "text") textParts.push(block.text);
      else if (block.type === "tool_use") {
        toolCalls.push({ id: block.id, name: block.name, arguments: JSON.stringify(block.input ?? {}) });
      }
    }
    const text = textParts.join("");
    return toolCalls.length > 0 ? { text, toolCalls } : { text };
  }
}

/**
 * ChatAgent: one participant backed by a chat-completion LLM.
 * Turns the shared history into chat messages, runs the function-calling loop
 * against its tools, and returns a single reply for the conversation.
 */

import type { ILLM, Message, ChatResponse } from "../adapters/llm";
import type { History, MessageItem } from "../conversation/types";
import type { Tool, ToolArguments } from "../tools/types";
import { parseToolArguments } from "../tools/types";
import type { AgentResponse, IAgent, ParticipantRole, RespondOptions } from "./types";
import { BackendError, errorMessage } from "../errors";
import { logger, logLlmCall, logToolCall } from "../logging";
import { recordTurnMetrics } from "../metrics";

const DEFAULT_MAX_TOKENS = 800;
const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_TOOL_ITERATIONS = 5;

function withTimeout<T>(p: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
    p.then((v) => { clearTimeout(timer); resolve(v); }, (e) => { clearTimeout(timer); reject(e); });
  });
}

export interface ChatAgentConfig {
  name: string;
  role: ParticipantRole;
  description?: string;
  instructions: string;
  llm: ILLM;
  tools?: Tool[];
  maxTokens?: number;
  /** Per backend call. */
  timeoutMs?: number;
  /** Function-calling rounds before a final call without tools. */
  maxToolIterations?: number;
}

/**
 * Map the conversation onto chat roles from this agent's point of view:
 * its own replies are "assistant", everyone else speaks as "user"
 * (other agents prefixed by name so the model knows who said what).
 */
export function historyToMessages(agentName: string, instructions: string, history: History): Message[] {
  const messages: Message[] = [{ role: "system", content: instructions }];
  for (const m of history) {
    if (!m.content.trim()) continue;
    if (m.role === "assistant" && m.name === agentName) {
      messages.push({ role: "assistant", content: m.content });
    } else if (m.role === "assistant") {
      messages.push({ role: "user", content: `${m.name}: ${m.content}` });
    } else {
      messages.push({ role: "user", content: m.content });
    }
  }
  return messages;
}

export class ChatAgent implements IAgent {
  readonly name: string;
  readonly role: ParticipantRole;
  readonly description: string;
  private readonly instructions: string;
  private readonly llm: ILLM;
  private readonly tools: Tool[];
  private readonly maxTokens: number;
  private readonly timeoutMs: number;
  private readonly maxToolIterations: number;

  constructor(config: ChatAgentConfig) {
    this.name = config.name;
    this.role = config.role;
    this.description = config.description ?? "";
    this.instructions = config.instructions;
    this.llm = config.llm;
    this.tools = config.tools ?? [];
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxToolIterations = config.maxToolIterations ?? DEFAULT_MAX_TOOL_ITERATIONS;
  }

  async respond(history: History, options: RespondOptions = {}): Promise<AgentResponse> {
    const tools = [...this.tools, ...(options.extraTools ?? [])];
    const messages = historyToMessages(this.name, this.instructions, history);
    const items: MessageItem[] = [];
    let llmLatencyMs = 0;
    let llmCalls = 0;
    let toolCalls = 0;

    const finish = (text: string, terminalCall?: { name: string; args: ToolArguments }): AgentResponse => {
      const content = text.trim();
      recordTurnMetrics({ agent: this.name, llmLatencyMs, llmCalls, toolCalls, responseLength: content.length });
      return {
        message: { name: this.name, role: "assistant", content, ...(items.length > 0 ? { items } : {}) },
        ...(terminalCall ? { terminalCall } : {}),
      };
    };

    for (let iteration = 0; ; iteration++) {
      const offered = iteration < this.maxToolIterations ? tools : [];
      const started = Date.now();
      const response = await this.callLlm(messages, offered);
      const durationMs = Date.now() - started;
      llmLatencyMs += durationMs;
      llmCalls++;
      logLlmCall(logger, this.name, messages.length, response.text.length, durationMs);

      const calls = offered.length > 0 ? response.toolCalls ?? [] : [];
      if (calls.length === 0) return finish(response.text);

      messages.push({ role: "assistant", content: response.text, toolCalls: calls });
      let terminalCall: { name: string; args: ToolArguments } | undefined;
      for (const call of calls) {
        const tool = offered.find((t) => t.spec.name === call.name);
        const args = parseToolArguments(call.arguments);
        items.push({ type: "function_call", name: call.name, arguments: call.arguments });
        const result = await this.invokeTool(tool, call.name, args);
        toolCalls++;
        items.push({ type: "function_result", name: call.name, result });
        messages.push({ role: "tool", toolCallId: call.id, content: result });
        if (tool?.terminal && !terminalCall) terminalCall = { name: call.name, args };
      }
      if (terminalCall) return finish(response.text, terminalCall);
    }
  }

  private async callLlm(messages: Message[], tools: Tool[]): Promise<ChatResponse> {
    try {
      return await withTimeout(
        this.llm.chat(messages, {
          maxTokens: this.maxTokens,
          ...(tools.length > 0 ? { tools: tools.map((t) => t.spec) } : {}),
        }),
        this.timeoutMs,
        `LLM(${this.name})`
      );
    } catch (err) {
      logger.warn({ event: "LLM_FAILED", agent: this.name, err: errorMessage(err) }, "LLM failed");
      throw new BackendError(this.name, errorMessage(err), { cause: err });
    }
  }

  /** Tool failures never end the turn: the model gets an "unavailable" result instead. */
  private async invokeTool(tool: Tool | undefined, name: string, args: ToolArguments): Promise<string> {
    if (!tool) {
      logger.warn({ event: "TOOL_UNKNOWN", agent: this.name, tool: name }, "Model called an unknown tool");
      return `Error: tool '${name}' is not available.`;
    }
    const started = Date.now();
    try {
      const result = await tool.invoke(args);
      logToolCall(logger, this.name, name, result.length, Date.now() - started);
      return result;
    } catch (err) {
      logger.warn({ event: "TOOL_FAILED", agent: this.name, tool: name, err: errorMessage(err) }, "Tool failed");
      return `Error: ${name} is unavailable (${errorMessage(err)}).`;
    }
  }
}

/**
 * Unit tests for ChatAgent: message mapping, function-calling loop, failures.
 */

import type { ILLM, ToolCall } from "../../../src/adapters/llm";
import { ChatAgent, historyToMessages } from "../../../src/agents/chat-agent";
import type { ChatMessage } from "../../../src/conversation/types";
import { BackendError } from "../../../src/errors";
import { getLastTurnMetrics } from "../../../src/metrics";
import type { Tool } from "../../../src/tools/types";
import { ScriptedLLM } from "../../helpers/fakes";

function searchTool(invoke: Tool["invoke"]): Tool {
  return {
    spec: { name: "search_flights", description: "Search flights", parameters: { type: "object", properties: {} } },
    invoke,
  };
}

function call(name: string, args = "{}", id = "call-1"): ToolCall {
  return { id, name, arguments: args };
}

function weather(llm: ILLM, tools: Tool[] = [], extra: Partial<{ timeoutMs: number; maxToolIterations: number }> = {}) {
  return new ChatAgent({
    name: "WeatherSpecialist",
    role: "specialist",
    instructions: "You are a weather expert.",
    llm,
    tools,
    ...extra,
  });
}

const task: ChatMessage = { position: 0, name: "User", role: "user", content: "Trip to Oslo" };

describe("historyToMessages", () => {
  it("maps the conversation from the agent's point of view", () => {
    const history: ChatMessage[] = [
      task,
      { position: 1, name: "SupportAgent", role: "assistant", content: "Hi! Where to?" },
      { position: 2, name: "WeatherSpecialist", role: "assistant", content: "Cold and clear." },
      { position: 3, name: "User", role: "user", content: "Thanks" },
      { position: 4, name: "SportSpecialist", role: "assistant", content: "  " },
    ];
    expect(historyToMessages("WeatherSpecialist", "Be brief.", history)).toEqual([
      { role: "system", content: "Be brief." },
      { role: "user", content: "Trip to Oslo" },
      { role: "user", content: "SupportAgent: Hi! Where to?" },
      { role: "assistant", content: "Cold and clear." },
      { role: "user", content: "Thanks" },
    ]);
  });
});

describe("ChatAgent", () => {
  it("replies with the trimmed backend text", async () => {
    const llm = new ScriptedLLM([{ text: "  -3°C and snowing.  " }]);
    const response = await weather(llm).respond([task]);

    expect(response).toEqual({ message: { name: "WeatherSpecialist", role: "assistant", content: "-3°C and snowing." } });
    expect(llm.calls[0].options).toEqual({ maxTokens: 800 });
    expect(llm.calls[0].messages[0]).toEqual({ role: "system", content: "You are a weather expert." });
  });

  it("runs tools and records call and result items", async () => {
    const invoke = jest.fn(async () => "3 flights");
    const llm = new ScriptedLLM([
      { text: "", toolCalls: [call("search_flights", '{"departure":"OTP"}')] },
      { text: "Found 3 flights." },
    ]);
    const response = await weather(llm, [searchTool(invoke)]).respond([task]);

    expect(invoke).toHaveBeenCalledWith({ departure: "OTP" });
    expect(response.message.content).toBe("Found 3 flights.");
    expect(response.message.items).toEqual([
      { type: "function_call", name: "search_flights", arguments: '{"departure":"OTP"}' },
      { type: "function_result", name: "search_flights", result: "3 flights" },
    ]);
    const second = llm.calls[1].messages;
    expect(second.slice(-2)).toEqual([
      { role: "assistant", content: "", toolCalls: [call("search_flights", '{"departure":"OTP"}')] },
      { role: "tool", toolCallId: "call-1", content: "3 flights" },
    ]);
    expect(llm.calls[0].options?.tools?.map((t) => t.name)).toEqual(["search_flights"]);
    expect(getLastTurnMetrics()).toMatchObject({ agent: "WeatherSpecialist", llmCalls: 2, toolCalls: 1, responseLength: 16 });
  });

  it("answers unknown tools with an error result", async () => {
    const llm = new ScriptedLLM([{ text: "", toolCalls: [call("book_hotel")] }, { text: "I cannot book hotels." }]);
    const response = await weather(llm, [searchTool(async () => "unused")]).respond([task]);
    expect(response.message.items?.[1]).toEqual({
      type: "function_result",
      name: "book_hotel",
      result: "Error: tool 'book_hotel' is not available.",
    });
    expect(response.message.content).toBe("I cannot book hotels.");
  });

  it("recovers from a failing tool", async () => {
    const llm = new ScriptedLLM([{ text: "", toolCalls: [call("search_flights")] }, { text: "Search is down." }]);
    const tool = searchTool(async () => {
      throw new Error("quota exceeded");
    });
    const response = await weather(llm, [tool]).respond([task]);
    expect(response.message.items?.[1]).toEqual({
      type: "function_result",
      name: "search_flights",
      result: "Error: search_flights is unavailable (quota exceeded).",
    });
    expect(response.message.content).toBe("Search is down.");
  });

  it("makes a last call without tools after maxToolIterations", async () => {
    const invoke = jest.fn(async () => "result");
    const llm = new ScriptedLLM([
      { text: "", toolCalls: [call("search_flights")] },
      { text: "Done.", toolCalls: [call("search_flights", "{}", "call-2")] },
    ]);
    const response = await weather(llm, [searchTool(invoke)], { maxToolIterations: 1 }).respond([task]);
    expect(invoke).toHaveBeenCalledTimes(1);
    expect(response.message.content).toBe("Done.");
    expect(llm.calls[1].options?.tools).toBeUndefined();
  });

  it("ends the turn on a terminal tool", async () => {
    const transfer: Tool = {
      spec: { name: "transfer_to_SupportAgent", description: "Back to support", parameters: { type: "object", properties: {} } },
      terminal: true,
      invoke: async () => "Transferred to SupportAgent.",
    };
    const llm = new ScriptedLLM([{ text: "Passing you back.", toolCalls: [call("transfer_to_SupportAgent")] }]);
    const response = await weather(llm).respond([task], { extraTools: [transfer] });

    expect(llm.calls).toHaveLength(1);
    expect(response.terminalCall).toEqual({ name: "transfer_to_SupportAgent", args: {} });
    expect(response.message.content).toBe("Passing you back.");
  });

  it("wraps backend failures in BackendError", async () => {
    const llm = new ScriptedLLM([new Error("503 Service Unavailable")]);
    const err = await weather(llm).respond([task]).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BackendError);
    expect(err).toMatchObject({ agent: "WeatherSpecialist", message: "WeatherSpecialist: 503 Service Unavailable" });
  });

  it("times out a backend that never answers", async () => {
    const llm: ILLM = { chat: () => new Promise<never>(() => undefined) };
    await expect(weather(llm, [], { timeoutMs: 20 }).respond([task])).rejects.toThrow(
      "WeatherSpecialist: LLM(WeatherSpecialist) timed out after 20ms"
    );
  });
});

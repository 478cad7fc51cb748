/**
 * Unit tests for LLM adapters (stub, factory, Anthropic message mapping).
 */

import { AnthropicLLM, AzureOpenAILLM, OpenAILLM, StubLLM, createLLM } from "../../../src/adapters/llm";
import type { Message } from "../../../src/adapters/llm";
import { toAnthropicMessages } from "../../../src/adapters/llm/anthropic";
import { ChatAgent } from "../../../src/agents/chat-agent";
import type { AppConfig } from "../../../src/config";
import { ScriptedLLM, testConfig } from "../../helpers/fakes";

function withLlm(llm: Partial<AppConfig["llm"]>): AppConfig {
  const base = testConfig();
  return { ...base, llm: { ...base.llm, ...llm } };
}

describe("StubLLM", () => {
  it("returns empty response", async () => {
    const llm = new StubLLM();
    const result = await llm.chat([{ role: "user", content: "Hello" }]);
    expect(result.text).toBe("");
  });

  it("returns its fixed reply and never calls tools", async () => {
    const llm = new StubLLM("TRAVEL");
    const result = await llm.chat([{ role: "user", content: "Rome?" }], {
      tools: [{ name: "search_flights", description: "", parameters: { type: "object", properties: {} } }],
    });
    expect(result).toEqual({ text: "TRAVEL" });
  });
});

describe("createLLM", () => {
  it("returns StubLLM when provider is stub", () => {
    expect(createLLM(withLlm({ provider: "stub" }))).toBeInstanceOf(StubLLM);
  });

  it("falls back to StubLLM when the provider's credentials are missing", () => {
    expect(createLLM(withLlm({ provider: "azure", azureApiKey: "test-secret" }))).toBeInstanceOf(StubLLM);
    expect(createLLM(withLlm({ provider: "openai" }))).toBeInstanceOf(StubLLM);
  });

  it("builds the Azure adapter from endpoint, deployment and key", () => {
    const llm = createLLM(
      withLlm({
        provider: "azure",
        azureApiKey: "test-secret",
        azureEndpoint: "https://example.openai.azure.com",
        azureDeployment: "chat",
      })
    );
    expect(llm).toBeInstanceOf(AzureOpenAILLM);
    expect(llm).toBeInstanceOf(OpenAILLM);
  });

  it("builds the OpenAI and Anthropic adapters", () => {
    const openai = createLLM(withLlm({ provider: "openai", openaiApiKey: "test-secret" }));
    expect(openai).toBeInstanceOf(OpenAILLM);
    expect(openai).not.toBeInstanceOf(AzureOpenAILLM);
    expect(createLLM(withLlm({ provider: "anthropic", anthropicApiKey: "test-secret" }))).toBeInstanceOf(AnthropicLLM);
  });
});

describe("toAnthropicMessages", () => {
  /** Messages of the last call a one-round tool loop makes, after the tool limit is spent. */
  async function finalCallMessages(): Promise<Message[]> {
    const llm = new ScriptedLLM([
      { text: "", toolCalls: [{ id: "call-1", name: "search_flights", arguments: '{"departure":"OTP"}' }] },
      { text: "Two flights tomorrow." },
    ]);
    const agent = new ChatAgent({
      name: "FlightSpecialist",
      role: "specialist",
      instructions: "You are a flights expert.",
      llm,
      tools: [
        {
          spec: { name: "search_flights", description: "Search flights", parameters: { type: "object", properties: {} } },
          invoke: async () => "2 flights",
        },
      ],
      maxToolIterations: 1,
    });
    await agent.respond([{ position: 0, name: "User", role: "user", content: "Flights to Oslo" }]);
    expect(llm.calls[1].options?.tools).toBeUndefined();
    return llm.calls[1].messages;
  }

  it("writes earlier tool turns as text when no tools are offered", async () => {
    const msgs = toAnthropicMessages(await finalCallMessages(), false);
    expect(msgs).toEqual([
      { role: "user", content: "Flights to Oslo" },
      { role: "assistant", content: `Called 'search_flights' with arguments '{"departure":"OTP"}'` },
      { role: "user", content: "Result from 'search_flights': 2 flights" },
    ]);
  });

  it("keeps tool_use and tool_result blocks while tools are offered", async () => {
    const msgs = toAnthropicMessages(await finalCallMessages(), true);
    expect(msgs).toEqual([
      { role: "user", content: "Flights to Oslo" },
      {
        role: "assistant",
        content: [{ type: "tool_use", id: "call-1", name: "search_flights", input: { departure: "OTP" } }],
      },
      { role: "user", content: [{ type: "tool_result", tool_use_id: "call-1", content: "2 flights" }] },
    ]);
  });

  it("groups consecutive tool results in one user turn", () => {
    const msgs = toAnthropicMessages(
      [
        { role: "system", content: "You are a flights expert." },
        {
          role: "assistant",
          content: "Checking both.",
          toolCalls: [
            { id: "a", name: "search_flights", arguments: "{}" },
            { id: "b", name: "search_hotels", arguments: "{}" },
          ],
        },
        { role: "tool", toolCallId: "a", content: "none" },
        { role: "tool", toolCallId: "b", content: "three" },
      ],
      false
    );
    expect(msgs).toEqual([
      {
        role: "assistant",
        content: "Checking both.\nCalled 'search_flights' with arguments '{}'\nCalled 'search_hotels' with arguments '{}'",
      },
      { role: "user", content: "Result from 'search_flights': none\nResult from 'search_hotels': three" },
    ]);
  });
});

/**
 * Unit tests for handoff orchestration.
 */

import type { AgentResponse } from "../../../src/agents/types";
import {
  COMPLETE_TASK_TOOL,
  HandoffOrchestration,
  OrchestrationHandoffs,
  transferToolName,
} from "../../../src/orchestration/handoff";
import { ScriptedAgent, ScriptedHumanInput } from "../../helpers/fakes";

function control(name: string, tool: string, args: Record<string, unknown> = {}, content = ""): AgentResponse {
  return { message: { name, role: "assistant", content }, terminalCall: { name: tool, args } };
}

function desk() {
  const support = new ScriptedAgent("SupportAgent", "entry", [control("SupportAgent", "transfer_to_SportSpecialist")]);
  const sport = new ScriptedAgent("SportSpecialist", "specialist", ["The final is in June."]);
  const handoffs = new OrchestrationHandoffs()
    .addMany("SupportAgent", { SportSpecialist: "sports questions", TripAdvisor: "unclear intent" })
    .add("SportSpecialist", "SupportAgent", "not about sports");
  const advisor = new ScriptedAgent("TripAdvisor", "router");
  return { support, sport, advisor, handoffs };
}

describe("OrchestrationHandoffs", () => {
  it("collects targets per source", () => {
    const handoffs = new OrchestrationHandoffs().addMany("A", { B: "to b", C: "to c" }).add("B", "A", "back");
    expect([...handoffs.targetsOf("A").entries()]).toEqual([["B", "to b"], ["C", "to c"]]);
    expect(handoffs.sources()).toEqual(["A", "B"]);
    expect(handoffs.targetsOf("C").size).toBe(0);
  });

  it("rejects a handoff to self", () => {
    expect(() => new OrchestrationHandoffs().add("A", "A", "loop")).toThrow("Agent A cannot hand off to itself");
  });
});

describe("transferToolName", () => {
  it("maps names onto function-name characters", () => {
    expect(transferToolName("SportSpecialist")).toBe("transfer_to_SportSpecialist");
    expect(transferToolName("Travel Info")).toBe("transfer_to_Travel_Info");
  });
});

describe("HandoffOrchestration", () => {
  it("offers transfer tools for declared targets plus complete_task", async () => {
    const { support, sport, advisor, handoffs } = desk();
    const orchestration = new HandoffOrchestration({ members: [support, sport, advisor], handoffs });
    const tools = orchestration.controlTools(support);
    expect(tools.map((t) => t.spec.name)).toEqual([
      "transfer_to_SportSpecialist",
      "transfer_to_TripAdvisor",
      COMPLETE_TASK_TOOL,
    ]);
    expect(tools.every((t) => t.terminal)).toBe(true);
    await expect(tools[0].invoke({})).resolves.toBe("Transferred to SportSpecialist.");
  });

  it("transfers control and waits for the user", async () => {
    const { support, sport, advisor, handoffs } = desk();
    const moves: string[] = [];
    const orchestration = new HandoffOrchestration({
      members: [support, sport, advisor],
      handoffs,
      onHandoff: (from, to) => moves.push(`${from}->${to}`),
    });
    const result = await orchestration.invoke("Greet the customer");

    expect(moves).toEqual(["SupportAgent->SportSpecialist"]);
    expect(result.terminationReason).toBe("awaiting_user");
    expect(result.activeAgent).toBe("SportSpecialist");
    expect(result.finalResponse).toBe("The final is in June.");
    expect(result.turns).toBe(2);
    // The transfer turn had no visible content and is not recorded.
    expect(result.history.map((m) => m.name)).toEqual(["User", "SportSpecialist"]);
    expect(sport.options[0].extraTools?.map((t) => t.spec.name)).toEqual(["transfer_to_SupportAgent", COMPLETE_TASK_TOOL]);
  });

  it("completes with the task summary", async () => {
    const { support, advisor, handoffs } = desk();
    const sport = new ScriptedAgent("SportSpecialist", "specialist", [
      control("SportSpecialist", COMPLETE_TASK_TOOL, { task_summary: "Shared the final's date." }, "Enjoy the match!"),
    ]);
    const orchestration = new HandoffOrchestration({ members: [support, sport, advisor], handoffs });
    const result = await orchestration.invoke("task");
    expect(result.terminationReason).toBe("completed");
    expect(result.finalResponse).toBe("Shared the final's date.");
  });

  it("falls back to the last reply when complete_task has no summary", async () => {
    const { support, advisor, handoffs } = desk();
    const sport = new ScriptedAgent("SportSpecialist", "specialist", [
      control("SportSpecialist", COMPLETE_TASK_TOOL, {}, "Enjoy the match!"),
    ]);
    const orchestration = new HandoffOrchestration({ members: [support, sport, advisor], handoffs });
    const result = await orchestration.invoke("task");
    expect(result.finalResponse).toBe("Enjoy the match!");
  });

  it("reads the user between turns of the same agent", async () => {
    const support = new ScriptedAgent("SupportAgent", "entry", [
      "Hello! How can I help?",
      control("SupportAgent", "transfer_to_SportSpecialist"),
    ]);
    const { sport, advisor, handoffs } = desk();
    const human = new ScriptedHumanInput(["When is the final?"]);
    const orchestration = new HandoffOrchestration({ members: [support, sport, advisor], handoffs, humanInput: human });
    const result = await orchestration.invoke("Greet the customer");

    expect(result.history.map((m) => `${m.name}: ${m.content}`)).toEqual([
      "User: Greet the customer",
      "SupportAgent: Hello! How can I help?",
      "User: When is the final?",
      "SportSpecialist: The final is in June.",
    ]);
    expect(result.terminationReason).toBe("human_input_closed");
    expect(result.activeAgent).toBe("SportSpecialist");
    expect(support.seen[1].map((m) => m.content)).toEqual([
      "Greet the customer",
      "Hello! How can I help?",
      "When is the final?",
    ]);
  });

  it("ignores transfers to undeclared targets", async () => {
    const { support, advisor, handoffs } = desk();
    const sport = new ScriptedAgent("SportSpecialist", "specialist", [
      control("SportSpecialist", "transfer_to_TripAdvisor", {}, "Let me check."),
    ]);
    const orchestration = new HandoffOrchestration({ members: [support, sport, advisor], handoffs });
    const result = await orchestration.invoke("task");
    expect(result.terminationReason).toBe("awaiting_user");
    expect(result.activeAgent).toBe("SportSpecialist");
    expect(advisor.seen).toHaveLength(0);
  });

  it("stops after maxTurns", async () => {
    const support = new ScriptedAgent("SupportAgent", "entry");
    const { sport, advisor, handoffs } = desk();
    const orchestration = new HandoffOrchestration({
      members: [support, sport, advisor],
      handoffs,
      humanInput: new ScriptedHumanInput(["a", "b", "c"]),
      maxTurns: 2,
    });
    const result = await orchestration.invoke("task");
    expect(result.terminationReason).toBe("max_turns");
    expect(result.turns).toBe(2);
    expect(result.finalResponse).toBe("SupportAgent#2");
  });

  it("rejects handoffs that name non-members", () => {
    const { support, sport, handoffs } = desk();
    expect(() => new HandoffOrchestration({ members: [support, sport], handoffs })).toThrow(
      "Handoff target is not a member: TripAdvisor"
    );
    const strangers = new OrchestrationHandoffs().add("Ghost", "SupportAgent", "x");
    expect(() => new HandoffOrchestration({ members: [support], handoffs: strangers })).toThrow(
      "Handoff source is not a member: Ghost"
    );
  });
});

/**
 * Unit tests for the sequential pipeline.
 */

import { SequentialOrchestration } from "../../../src/orchestration/sequential";
import { ScriptedAgent } from "../../helpers/fakes";

describe("SequentialOrchestration", () => {
  it("feeds each member the previous member's output", async () => {
    const travel = new ScriptedAgent("TravelAgent", "worker", ["Lisbon is mild in spring."]);
    const summarizer = new ScriptedAgent("SummarizerAgent", "worker", ["Go to Lisbon in spring."]);
    const pipeline = new SequentialOrchestration({ members: [travel, summarizer] });

    const result = await pipeline.invoke("Where should I go in April?");

    expect(travel.seen[0].map((m) => m.content)).toEqual(["Where should I go in April?"]);
    expect(summarizer.seen[0]).toEqual([{ position: 0, name: "User", role: "user", content: "Lisbon is mild in spring." }]);
    expect(result.finalOutput).toBe("Go to Lisbon in spring.");
    expect(result.steps.map((s) => s.name)).toEqual(["TravelAgent", "SummarizerAgent"]);
  });

  it("reports every step", async () => {
    const names: string[] = [];
    const pipeline = new SequentialOrchestration({
      members: [new ScriptedAgent("A", "worker"), new ScriptedAgent("B", "worker")],
      callbacks: { onAgentResponse: (m) => names.push(m.name) },
    });
    await pipeline.invoke("x");
    expect(names).toEqual(["A", "B"]);
  });

  it("stops on the first failing member", async () => {
    const last = new ScriptedAgent("C", "worker");
    const pipeline = new SequentialOrchestration({
      members: [new ScriptedAgent("A", "worker"), new ScriptedAgent("B", "worker", [new Error("boom")]), last],
    });
    await expect(pipeline.invoke("x")).rejects.toThrow("boom");
    expect(last.seen).toHaveLength(0);
  });

  it("rejects an empty member list", () => {
    expect(() => new SequentialOrchestration({ members: [] })).toThrow("Sequential orchestration needs at least one member");
  });
});

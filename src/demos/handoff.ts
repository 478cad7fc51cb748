/**
 * Handoff desk: agents transfer the customer between each other by function call.
 */

import { createHandoffRoster } from "../agents/travel-desk";
import { createResponsePrinter } from "../console/printer";
import { HandoffOrchestration } from "../orchestration/handoff";
import { HANDOFF_TASK } from "../prompts/travel-agents";
import type { Demo } from "./types";

export const handoffDemo: Demo = {
  name: "handoff",
  description: "Support desk that hands the customer to the right specialist",
  exitCommands: ["exit"],
  async run({ config, llm, humanInput, write }) {
    const printer = createResponsePrinter(write);
    const { members, handoffs } = createHandoffRoster({ llm, config, callbacks: { onAgentResponse: printer } });
    const orchestration = new HandoffOrchestration({
      members,
      handoffs,
      humanInput,
      maxTurns: config.orchestration.handoffMaxTurns,
      callbacks: { onAgentResponse: printer },
      onHandoff: (from, to) => write(`[${from} -> ${to}]`),
    });
    const result = await orchestration.invoke(HANDOFF_TASK);
    write(`Conversation ended (${result.terminationReason}) with ${result.activeAgent}: ${result.finalResponse}`);
  },
};

/**
 * Specialists take turns on a fixed task with no human in the loop.
 */

import { createSpecialistRoster } from "../agents/travel-desk";
import { createResponsePrinter } from "../console/printer";
import { RoundRobinGroupChat } from "../orchestration/group-chat";
import { neverRequestHumanInput } from "../orchestration/turn-policy";
import { ROUND_ROBIN_TASK } from "../prompts/travel-agents";
import type { Demo } from "./types";

export const roundRobinDemo: Demo = {
  name: "roundrobin",
  description: "Weather, sport and flight specialists in plain rotation",
  exitCommands: [],
  async run({ config, llm, write }) {
    const chat = new RoundRobinGroupChat({
      members: createSpecialistRoster({ llm, config }),
      turnPolicy: neverRequestHumanInput,
      maxRounds: config.orchestration.roundRobinMaxRounds,
      callbacks: { onAgentResponse: createResponsePrinter(write) },
    });
    const result = await chat.invoke(ROUND_ROBIN_TASK);
    if (result.finalResponse) write(`Final response from ${result.finalResponse.name}: ${result.finalResponse.content}`);
  },
};

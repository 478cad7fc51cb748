/**
 * One travel assistant with flight search, chatting until the user quits.
 */

import { createTravelAssistant } from "../agents/travel-desk";
import { createResponsePrinter } from "../console/printer";
import { SingleAgentChat } from "../orchestration/single-agent-chat";
import { SINGLE_AGENT_OPENING } from "../prompts/travel-agents";
import type { Demo } from "./types";

export const singleAgentDemo: Demo = {
  name: "single",
  description: "Single travel assistant with the flight search tool",
  exitCommands: ["quit"],
  async run({ config, llm, humanInput, write }) {
    const chat = new SingleAgentChat({
      agent: createTravelAssistant({ llm, config }),
      humanInput,
      opening: SINGLE_AGENT_OPENING,
      callbacks: { onAgentResponse: createResponsePrinter(write) },
    });
    await chat.run();
  },
};

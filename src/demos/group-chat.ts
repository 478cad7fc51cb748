/**
 * Support desk group chat: the user answers after the greeting and after each specialist.
 */

import { createSupportRoster } from "../agents/travel-desk";
import { createResponsePrinter } from "../console/printer";
import { RoundRobinGroupChat } from "../orchestration/group-chat";
import { createInterjectionPolicy } from "../orchestration/turn-policy";
import { GROUP_CHAT_TASK } from "../prompts/travel-agents";
import type { Demo } from "./types";

export const groupChatDemo: Demo = {
  name: "groupchat",
  description: "Round-robin support desk with human interjection after greetings and specialist answers",
  exitCommands: ["exit"],
  async run({ config, llm, humanInput, write }) {
    const members = createSupportRoster({ llm, config });
    const chat = new RoundRobinGroupChat({
      members,
      turnPolicy: createInterjectionPolicy(members),
      humanInput,
      maxRounds: config.orchestration.groupChatMaxRounds,
      maxRoundsPerAgent: config.orchestration.groupChatMaxRoundsPerAgent,
      callbacks: { onAgentResponse: createResponsePrinter(write) },
    });
    const result = await chat.invoke(GROUP_CHAT_TASK);
    write(`Conversation ended (${result.terminationReason}) after ${result.rounds} agent turns.`);
    if (result.finalResponse) write(`Final response from ${result.finalResponse.name}: ${result.finalResponse.content}`);
  },
};

/**
 * Sequential pipeline: each member gets the previous member's output as its only input.
 */

import type { IAgent } from "../agents/types";
import type { ChatMessage } from "../conversation/types";
import { ChatHistory } from "../conversation/history";
import type { OrchestrationCallbacks } from "./types";
import { logger, logTurn } from "../logging";

export interface SequentialConfig {
  members: IAgent[];
  callbacks?: OrchestrationCallbacks;
}

export interface SequentialResult {
  finalOutput: string;
  /** One message per member, in order. */
  steps: ChatMessage[];
}

export class SequentialOrchestration {
  constructor(private readonly config: SequentialConfig) {
    if (config.members.length === 0) throw new Error("Sequential orchestration needs at least one member");
  }

  async invoke(task: string): Promise<SequentialResult> {
    let current = task;
    const steps: ChatMessage[] = [];
    for (const agent of this.config.members) {
      const history = new ChatHistory();
      history.appendUser(current);
      logTurn(logger, "start", agent.name);
      const response = await agent.respond(history.snapshot());
      const message = history.append(response.message);
      logTurn(logger, "end", agent.name);
      this.config.callbacks?.onAgentResponse?.(message);
      steps.push(message);
      current = message.content;
    }
    return { finalOutput: current, steps };
  }
}

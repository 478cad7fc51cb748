/**
 * One agent, one user, one growing history: opening line, then a read/reply loop
 * until the input source closes (end of stream or exit command).
 */

import type { IAgent } from "../agents/types";
import type { History } from "../conversation/types";
import { HUMAN_NAME } from "../conversation/types";
import { ChatHistory } from "../conversation/history";
import type { HumanInputSource, OrchestrationCallbacks } from "./types";
import { HumanInputClosedError, errorMessage } from "../errors";
import { logger } from "../logging";

export interface SingleAgentChatConfig {
  agent: IAgent;
  humanInput: HumanInputSource;
  /** First user line, sent before reading any input. */
  opening?: string;
  humanName?: string;
  humanPrompt?: string;
  callbacks?: OrchestrationCallbacks;
}

export interface SingleAgentChatResult {
  history: History;
  /** Agent replies produced. */
  replies: number;
}

export class SingleAgentChat {
  constructor(private readonly config: SingleAgentChatConfig) {}

  async run(): Promise<SingleAgentChatResult> {
    const { agent, humanInput, callbacks } = this.config;
    const humanName = this.config.humanName ?? HUMAN_NAME;
    const history = new ChatHistory();
    let replies = 0;

    const reply = async () => {
      const response = await agent.respond(history.snapshot());
      const message = history.append(response.message);
      replies++;
      callbacks?.onAgentResponse?.(message);
    };

    if (this.config.opening) {
      history.appendUser(this.config.opening, humanName);
      await reply();
    }
    for (;;) {
      let line: string;
      try {
        line = await humanInput.read(this.config.humanPrompt ?? `${humanName}: `);
      } catch (err) {
        if (!(err instanceof HumanInputClosedError)) {
          logger.warn({ event: "HUMAN_INPUT_FAILED", err: errorMessage(err) }, "Human input failed");
        }
        break;
      }
      const human = history.appendUser(line, humanName);
      callbacks?.onHumanMessage?.(human);
      await reply();
    }
    return { history: history.snapshot(), replies };
  }
}

/**
 * Collaborator contracts shared by the orchestrations.
 */

import type { ChatMessage } from "../conversation/types";

/**
 * Where human turns come from. `read` resolves with one line of free text and
 * rejects with HumanInputClosedError once no more input can arrive.
 */
export interface HumanInputSource {
  read(prompt: string): Promise<string>;
}

export interface OrchestrationCallbacks {
  /** Every agent reply, including its function-call items. */
  onAgentResponse?: (message: ChatMessage) => void;
  /** Every human line appended to the history. */
  onHumanMessage?: (message: ChatMessage) => void;
}

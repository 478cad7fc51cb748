/**
 * Participant and agent contracts.
 */

import type { History, NewChatMessage } from "../conversation/types";
import type { Tool, ToolArguments } from "../tools/types";

/**
 * Behavioral tag of a participant, independent of its display name.
 * entry: greets the user and opens the conversation.
 * specialist: answers a topic (weather, sport, flights...).
 * router: classifies intent or dispatches.
 * coordinator: wraps an inner workflow.
 * worker: pipeline step (summarizer, travel notes...).
 */
export const PARTICIPANT_ROLES = ["entry", "specialist", "router", "coordinator", "worker"] as const;
export type ParticipantRole = (typeof PARTICIPANT_ROLES)[number];

export interface Participant {
  readonly name: string;
  readonly role: ParticipantRole;
}

export interface RespondOptions {
  /** Tools offered for this turn only (e.g. handoff transfers). */
  extraTools?: Tool[];
}

export interface AgentResponse {
  message: NewChatMessage;
  /** Set when the turn ended because a terminal tool was called. */
  terminalCall?: { name: string; args: ToolArguments };
}

export interface IAgent extends Participant {
  readonly description: string;
  respond(history: History, options?: RespondOptions): Promise<AgentResponse>;
}

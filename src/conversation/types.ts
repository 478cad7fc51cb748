/**
 * Conversation types shared by agents, policies and orchestrations.
 */

/** Operator-visible record of a function call made during a turn. Never shown to other agents. */
export type MessageItem =
  | { type: "function_call"; name: string; arguments: string }
  | { type: "function_result"; name: string; result: string };

export interface ChatMessage {
  /** 0-based position in the history; assigned on append. */
  position: number;
  /** Sender identity (participant name, or the human). */
  name: string;
  /** "user" for the human and the task, "assistant" for agents. */
  role: "user" | "assistant";
  content: string;
  items?: MessageItem[];
}

/** A message before the history has placed it. */
export type NewChatMessage = Omit<ChatMessage, "position">;

/** Ordered, append-only view of a conversation. */
export type History = readonly ChatMessage[];

/** Name the human participant speaks under unless an orchestration overrides it. */
export const HUMAN_NAME = "User";

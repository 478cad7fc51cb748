/**
 * In-memory chat history: append-only, positions assigned in order.
 * One orchestration run owns it; it is dropped when the run ends.
 */

import type { ChatMessage, History, NewChatMessage } from "./types";
import { HUMAN_NAME } from "./types";

export class ChatHistory {
  private readonly messages: ChatMessage[] = [];

  constructor(initial: NewChatMessage[] = []) {
    for (const m of initial) this.append(m);
  }

  append(message: NewChatMessage): ChatMessage {
    const placed: ChatMessage = { ...message, position: this.messages.length };
    this.messages.push(placed);
    return placed;
  }

  /** Append a human (or task) line. */
  appendUser(content: string, name: string = HUMAN_NAME): ChatMessage {
    return this.append({ name, role: "user", content });
  }

  get length(): number {
    return this.messages.length;
  }

  last(): ChatMessage | undefined {
    return this.messages[this.messages.length - 1];
  }

  /** Last message written by an agent, skipping human lines. */
  lastFromAgent(): ChatMessage | undefined {
    for (let i = this.messages.length - 1; i >= 0; i--) {
      if (this.messages[i].role === "assistant") return this.messages[i];
    }
    return undefined;
  }

  /** Copy of the messages so far; later appends do not show up in it. */
  snapshot(): History {
    return [...this.messages];
  }
}

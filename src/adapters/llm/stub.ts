/**
 * Stub LLM adapter for testing or when no provider is configured.
 * Replies with a fixed text (empty by default) and never calls tools.
 */

import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export class StubLLM implements ILLM {
  constructor(private readonly reply = "") {}

  async chat(_messages: Message[], _options?: ChatOptions): Promise<ChatResponse> {
    return { text: this.reply };
  }
}

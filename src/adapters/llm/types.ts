/**
 * LLM adapter types.
 * Implementations can be swapped via config (Azure OpenAI, OpenAI, Anthropic, stub).
 */

/** A function call requested by the model. `arguments` is the raw JSON text. */
export interface ToolCall {
  id: string;
  name: string;
  arguments: string;
}

export interface Message {
  role: "system" | "user" | "assistant" | "tool";
  content: string;
  /** Calls the assistant asked for in this message. */
  toolCalls?: ToolCall[];
  /** For role "tool": the call this result answers. */
  toolCallId?: string;
}

export interface JsonSchemaProperty {
  type: "string" | "number" | "integer" | "boolean";
  description?: string;
}

export interface JsonSchemaObject {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
}

/** Function the model may call. */
export interface ToolSpec {
  name: string;
  description: string;
  parameters: JsonSchemaObject;
}

export interface ChatOptions {
  /** Max tokens to generate. */
  maxTokens?: number;
  /** Functions offered to the model for this call. */
  tools?: ToolSpec[];
}

export interface ChatResponse {
  /** Full text of the assistant reply. */
  text: string;
  /** Function calls the model made instead of (or besides) replying. */
  toolCalls?: ToolCall[];
}

/**
 * LLM adapter interface: messages in, assistant reply out.
 */
export interface ILLM {
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}

/**
 * Console rendering of agent replies and their function-call items.
 */

import type { ChatMessage } from "../conversation/types";

export type LineWriter = (line: string) => void;

export const stdoutWriter: LineWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

/** `Name: content`, then one line per function call and result. */
export function formatAgentResponse(message: ChatMessage): string[] {
  const lines = [`${message.name}: ${message.content}`];
  for (const item of message.items ?? []) {
    if (item.type === "function_call") {
      lines.push(`Calling '${item.name}' with arguments '${item.arguments}'`);
    } else {
      lines.push(`Result from '${item.name}' is '${item.result}'`);
    }
  }
  return lines;
}

export function createResponsePrinter(write: LineWriter = stdoutWriter): (message: ChatMessage) => void {
  return (message) => {
    for (const line of formatAgentResponse(message)) write(line);
  };
}

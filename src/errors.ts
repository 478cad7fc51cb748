/**
 * Failures that end a conversation.
 * Tool failures are not here: tools recover locally and report "no data" to the agent.
 */

/** Chat backend unreachable, rejected the request, timed out or returned garbage. */
export class BackendError extends Error {
  readonly agent: string;

  constructor(agent: string, message: string, options?: { cause?: unknown }) {
    super(`${agent}: ${message}`, options);
    this.name = "BackendError";
    this.agent = agent;
  }
}

export type HumanInputClosedReason = "closed" | "exit";

/** The human-input stream ended, or the operator typed an exit command. */
export class HumanInputClosedError extends Error {
  readonly reason: HumanInputClosedReason;

  constructor(reason: HumanInputClosedReason = "closed") {
    super(reason === "exit" ? "Human input ended by exit command" : "Human input stream closed");
    this.name = "HumanInputClosedError";
    this.reason = reason;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

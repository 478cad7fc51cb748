/**
 * Human input from a line stream (stdin by default).
 * Lines typed before a read are queued; end of stream or an exit command
 * rejects the pending and every later read with HumanInputClosedError.
 */

import * as readline from "readline";
import type { HumanInputSource } from "../orchestration/types";
import type { HumanInputClosedReason } from "../errors";
import { HumanInputClosedError } from "../errors";

export interface ConsoleHumanInputConfig {
  input?: NodeJS.ReadableStream;
  /** Where prompts are written. */
  output?: NodeJS.WritableStream;
  /** Case-insensitive lines that end the input (e.g. "exit", "quit"). */
  exitCommands?: string[];
}

interface PendingRead {
  resolve: (line: string) => void;
  reject: (err: Error) => void;
}

export class ConsoleHumanInput implements HumanInputSource {
  private readonly rl: readline.Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly exitCommands: Set<string>;
  private readonly queued: string[] = [];
  private pending: PendingRead | null = null;
  private closedReason: HumanInputClosedReason | null = null;

  constructor(config: ConsoleHumanInputConfig = {}) {
    this.output = config.output ?? process.stdout;
    this.exitCommands = new Set((config.exitCommands ?? []).map((c) => c.trim().toLowerCase()));
    this.rl = readline.createInterface({ input: config.input ?? process.stdin, terminal: false });
    this.rl.on("line", (line) => this.onLine(line));
    this.rl.on("close", () => this.finish("closed"));
  }

  read(prompt: string): Promise<string> {
    if (this.queued.length === 0 && this.closedReason) {
      return Promise.reject(new HumanInputClosedError(this.closedReason));
    }
    if (prompt) this.output.write(prompt);
    const line = this.queued.shift();
    if (line !== undefined) return Promise.resolve(line);
    return new Promise<string>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  /** True while a read is waiting for a line. */
  get waiting(): boolean {
    return this.pending !== null;
  }

  /** Stop reading; pending reads reject as closed. */
  close(): void {
    this.rl.close();
  }

  private onLine(line: string): void {
    if (this.closedReason) return;
    if (this.exitCommands.has(line.trim().toLowerCase())) {
      this.finish("exit");
      this.rl.close();
      return;
    }
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.resolve(line);
    } else {
      this.queued.push(line);
    }
  }

  private finish(reason: HumanInputClosedReason): void {
    if (this.closedReason) return;
    this.closedReason = reason;
    const pending = this.pending;
    this.pending = null;
    pending?.reject(new HumanInputClosedError(reason));
  }
}

/** Exit code for a run stopped by Ctrl-C. */
export const INTERRUPT_EXIT_CODE = 130;

/**
 * SIGINT handler: a waiting read is rejected so the demo ends normally.
 * With nothing waiting for input, or on a second interrupt, the process exits.
 */
export function createInterruptHandler(
  input: Pick<ConsoleHumanInput, "waiting" | "close">,
  exit: (code: number) => void
): () => void {
  let interrupted = false;
  return () => {
    const waiting = input.waiting;
    input.close();
    if (interrupted || !waiting) {
      exit(INTERRUPT_EXIT_CODE);
      return;
    }
    interrupted = true;
  };
}

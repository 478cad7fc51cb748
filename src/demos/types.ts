/**
 * Console demo contract: each demo wires one orchestration to the travel desk roster.
 */

import type { ILLM } from "../adapters/llm";
import type { AppConfig } from "../config";
import type { LineWriter } from "../console/printer";
import type { HumanInputSource } from "../orchestration/types";

export interface DemoContext {
  config: AppConfig;
  llm: ILLM;
  humanInput: HumanInputSource;
  write: LineWriter;
}

export interface Demo {
  name: string;
  description: string;
  /** Lines that end the human input for this demo. */
  exitCommands: string[];
  run(ctx: DemoContext): Promise<void>;
}
